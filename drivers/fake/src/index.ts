import type { LineSourceFactory } from "@sensorlog/driver-core";
import { FakeLineSource } from "./fake-driver";

export const createFakeLineSource: LineSourceFactory = (cfg) => new FakeLineSource(cfg);

export { FakeLineSource };
export default createFakeLineSource;
