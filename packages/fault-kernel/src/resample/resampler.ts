// Fault Kernel - zero-order-hold resampler
//
// Brings the three streams of a device-day onto the clock of the fastest one by
// repeating samples (never interpolating), then truncates to the shortest result.

import type { DeviceDayStreamsV1 } from "@devicewatch/contracts";
import { STREAM_KINDS } from "@devicewatch/contracts";

import { ConfigurationError } from "../errors";
import { mapStreams, type PerStream } from "../streams";

// Ratios such as 64 / 0.5 are exact in binary; anything further off is a config mistake.
const RATIO_EPSILON = 1e-9;

export type ResampledStreams = {
  target_rate_hz: number;
  // Repetition factor applied to each stream.
  factors: PerStream<number>;
  // Lengths after upsampling, before truncation.
  upsampled_lengths: PerStream<number>;
  cutoff: number;
  streams: PerStream<ReadonlyArray<number>>;
};

export function resampleFactor(streamRateHz: number, targetRateHz: number, kind: string): number {
  if (!Number.isFinite(streamRateHz) || streamRateHz <= 0) {
    throw new ConfigurationError(`invalid sample rate for ${kind}: ${streamRateHz}`, { kind, rate_hz: streamRateHz });
  }
  const ratio = targetRateHz / streamRateHz;
  const rounded = Math.round(ratio);
  if (rounded < 1 || Math.abs(ratio - rounded) > RATIO_EPSILON) {
    throw new ConfigurationError(
      `non-integral resample ratio for ${kind}: ${targetRateHz} / ${streamRateHz} = ${ratio}`,
      { kind, rate_hz: streamRateHz, target_rate_hz: targetRateHz, ratio }
    );
  }
  return rounded;
}

/**
 * Zero-order hold: sample i of the output is `values[floor(i / factor)]`.
 * Only the first `length` output samples are built.
 */
export function upsample(values: ReadonlyArray<number>, factor: number, length = values.length * factor): number[] {
  const n = Math.min(length, values.length * factor);
  const out = new Array<number>(n);
  for (let i = 0; i < n; i++) out[i] = values[Math.floor(i / factor)];
  return out;
}

export function resampleStreams(input: DeviceDayStreamsV1): ResampledStreams {
  for (const kind of STREAM_KINDS) {
    const rate = input[kind].rate_hz;
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new ConfigurationError(`invalid sample rate for ${kind}: ${rate}`, { kind, rate_hz: rate });
    }
  }

  const target_rate_hz = Math.max(...STREAM_KINDS.map((k) => input[k].rate_hz));

  const factors = mapStreams((kind) => resampleFactor(input[kind].rate_hz, target_rate_hz, kind));
  const upsampled_lengths = mapStreams((kind) => input[kind].values.length * factors[kind]);

  // Lengths first, so a slow stream with a huge factor never materializes past the cutoff.
  const cutoff = Math.min(...STREAM_KINDS.map((k) => upsampled_lengths[k]));

  const streams = mapStreams<ReadonlyArray<number>>((kind) =>
    Object.freeze(upsample(input[kind].values, factors[kind], cutoff))
  );

  return { target_rate_hz, factors, upsampled_lengths, cutoff, streams };
}
