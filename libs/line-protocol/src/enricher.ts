import { formatLine } from "./serializer";
import type { Clock, MetricRecord, StaticTags } from "./types";

const NANOS_PER_MILLI = 1_000_000n;

export const systemClock: Clock = () => BigInt(Date.now()) * NANOS_PER_MILLI;

export function toEpochNanoseconds(date: Date): bigint {
  return BigInt(date.getTime()) * NANOS_PER_MILLI;
}

/**
 * Device tags keep their position and win on key collision; static tags the
 * device did not send are appended in configuration order.
 */
export function mergeTags(deviceTags: ReadonlyMap<string, string>, staticTags: StaticTags): Map<string, string> {
  const merged = new Map(deviceTags);
  for (const [key, value] of staticTags) {
    if (!merged.has(key)) {
      merged.set(key, value);
    }
  }
  return merged;
}

export function enrich(record: MetricRecord, staticTags: StaticTags, now: bigint): string {
  return formatLine({
    measurement: record.measurement,
    tags: mergeTags(record.tags, staticTags),
    fields: record.fields,
    timestamp: now
  });
}
