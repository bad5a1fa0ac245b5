// Fault Kernel - pure evaluation entrypoint
//
// raw streams -> resample -> align -> segment -> rules -> verdict
//
// No IO. No clock. No shared state: identical inputs give identical results,
// so callers may evaluate many device-days concurrently.

import type { DeviceDayStreamsV1, FaultThresholdsV1, FaultVerdictV1 } from "@devicewatch/contracts";
import { FaultThresholdsV1Z, STREAM_KINDS, formatIssues, summarizeIssues } from "@devicewatch/contracts";

import { alignStreams, assertCommonStart, type WristContact } from "./align/aligner";
import { ConfigurationError, InsufficientDataError } from "./errors";
import { resampleStreams } from "./resample/resampler";
import { evaluateSegments } from "./rules/evaluator";
import { segmentFrame } from "./segment/segmenter";
import { aggregateVerdict } from "./verdict/aggregator";

export type EvaluateDeviceDayOptions = {
  // Largest allowed spread between declared stream start instants. Default 0.
  max_start_skew_ms?: number;
};

export type SegmentSummary = {
  id: string;
  wrist_contact: WristContact;
  start: number;
  end: number;
};

export type DeviceDayEvaluation = {
  verdict: FaultVerdictV1;
  target_rate_hz: number;
  frame_length: number;
  segments: ReadonlyArray<SegmentSummary>;
};

/**
 * Validates thresholds, including the relational constraints the schema carries.
 * Throws ConfigurationError rather than a ZodError so callers see one taxonomy.
 */
export function parseThresholds(input: unknown): FaultThresholdsV1 {
  const r = FaultThresholdsV1Z.safeParse(input);
  if (!r.success) {
    throw new ConfigurationError(`invalid thresholds: ${summarizeIssues(r.error)}`, { issues: formatIssues(r.error) });
  }
  return r.data;
}

/**
 * Evaluates one device-day.
 *
 * @throws ConfigurationError on invalid rates or thresholds.
 * @throws InsufficientDataError when any stream is empty.
 * @throws InputContractError when the streams break the aligner's preconditions.
 */
export function evaluateDeviceDay(
  streams: DeviceDayStreamsV1,
  thresholds: FaultThresholdsV1,
  options: EvaluateDeviceDayOptions = {}
): DeviceDayEvaluation {
  const cfg = parseThresholds(thresholds);

  const maxSkew = options.max_start_skew_ms ?? 0;
  if (!Number.isFinite(maxSkew) || maxSkew < 0) {
    throw new ConfigurationError(`invalid max_start_skew_ms: ${maxSkew}`, { max_start_skew_ms: maxSkew });
  }

  const resampled = resampleStreams(streams);
  if (resampled.cutoff === 0) {
    const empty = STREAM_KINDS.filter((k) => streams[k].values.length === 0);
    throw new InsufficientDataError(`no aligned samples; empty streams: ${empty.join(",")}`, {
      empty_streams: empty,
    });
  }

  assertCommonStart(streams, maxSkew);

  const frame = alignStreams(resampled.streams);
  const segments = segmentFrame(frame);
  const results = evaluateSegments(segments, cfg);

  return {
    verdict: aggregateVerdict(results),
    target_rate_hz: resampled.target_rate_hz,
    frame_length: frame.length,
    segments: segments.all.map((s) => ({ id: s.id, wrist_contact: s.wrist_contact, start: s.start, end: s.end })),
  };
}
