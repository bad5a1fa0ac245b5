import { z } from "zod";

export const StreamKindZ = z.enum(["wrist_contact", "temperature", "ppg"]);

export type StreamKind = z.infer<typeof StreamKindZ>;

/**
 * One sensor stream as recorded: values in acquisition order at a fixed nominal rate.
 *
 * `started_at_ms` is optional because the on-device CSV export carries no timestamps.
 * When present it lets the aligner check that the streams share a start instant.
 */
export const SampleStreamV1Z = z
  .object({
    rate_hz: z.number().finite().positive(),
    values: z.array(z.number().finite()),
    started_at_ms: z.number().int().nonnegative().optional(),
  })
  .strict();

export type SampleStreamV1 = z.infer<typeof SampleStreamV1Z>;

export const DeviceDayStreamsV1Z = z
  .object({
    wrist_contact: SampleStreamV1Z,
    temperature: SampleStreamV1Z,
    ppg: SampleStreamV1Z,
  })
  .strict();

export type DeviceDayStreamsV1 = z.infer<typeof DeviceDayStreamsV1Z>;

export const STREAM_KINDS: ReadonlyArray<StreamKind> = StreamKindZ.options;
