import type { LineSourceFactory } from "@sensorlog/driver-core";
import { createFakeLineSource } from "@sensorlog/driver-fake";
import { createGeigerLineSource } from "@sensorlog/driver-geiger";
import { createSerialLineSource } from "@sensorlog/driver-serial-line";

const SOURCE_MAP: Record<string, LineSourceFactory> = {
  fake: createFakeLineSource,
  geiger: createGeigerLineSource,
  serial: createSerialLineSource
};

export function loadSource(name: string): LineSourceFactory {
  const key = name.toLowerCase();
  const factory = SOURCE_MAP[key];
  if (!factory) {
    throw new Error(`Line source not found: ${name}`);
  }
  return factory;
}
