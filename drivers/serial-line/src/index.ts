import type { LineSourceFactory, SourceConfig } from "@sensorlog/driver-core";
import { SerialLineSource } from "./driver";

export const createSerialLineSource: LineSourceFactory = (cfg: SourceConfig) => new SerialLineSource(cfg);

export { SerialLineSource };
export type { SerialPortFactory, SerialPortHandle, SerialPortOptions } from "./driver";
export { SerialLineSourceConfigSchema, type SerialLineSourceConfig } from "./config";
export default createSerialLineSource;
