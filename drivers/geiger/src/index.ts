import type { LineSourceFactory } from "@sensorlog/driver-core";
import { GeigerLineSource } from "./driver";

export const createGeigerLineSource: LineSourceFactory = (cfg) => new GeigerLineSource(cfg);

export { GeigerLineSource };
export type { GeigerSourceOptions } from "./driver";
export { GeigerSourceConfigSchema, type GeigerSourceConfig } from "./config";
export default createGeigerLineSource;
