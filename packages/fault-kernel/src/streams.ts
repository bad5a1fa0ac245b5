import type { StreamKind } from "@devicewatch/contracts";

export type PerStream<T> = Record<StreamKind, T>;

export function mapStreams<T>(fn: (kind: StreamKind) => T): PerStream<T> {
  return { wrist_contact: fn("wrist_contact"), temperature: fn("temperature"), ppg: fn("ppg") };
}
