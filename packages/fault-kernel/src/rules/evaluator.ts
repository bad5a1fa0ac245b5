// Fault Kernel - per-segment rule evaluation
//
// Wrist-on and wrist-off segments get disjoint rule sets. Each segment yields a
// full rule map, violated or not, so the verdict can be audited afterwards.

import type { FaultThresholdsV1, WristOffRuleResultV1, WristOnRuleResultV1 } from "@devicewatch/contracts";

import type { Segment } from "../segment/segmenter";
import { ppgHighVariance, temperatureHighVariance, temperatureOutOfRange } from "./wrist_on";
import { ppgHighVarianceOff, temperatureNotDecreasing } from "./wrist_off";

export type SegmentRuleResult<R> = {
  segment_id: string;
  result: Readonly<R>;
};

export function evaluateWristOnSegment(segment: Segment, thresholds: FaultThresholdsV1): SegmentRuleResult<WristOnRuleResultV1> {
  return {
    segment_id: segment.id,
    result: Object.freeze({
      temperature_out_of_range: temperatureOutOfRange.violated(segment, thresholds),
      temperature_high_variance: temperatureHighVariance.violated(segment, thresholds),
      ppg_high_variance: ppgHighVariance.violated(segment, thresholds),
    }),
  };
}

export function evaluateWristOffSegment(segment: Segment, thresholds: FaultThresholdsV1): SegmentRuleResult<WristOffRuleResultV1> {
  return {
    segment_id: segment.id,
    result: Object.freeze({
      temperature_not_decreasing: temperatureNotDecreasing.violated(segment, thresholds),
      ppg_high_variance_off: ppgHighVarianceOff.violated(segment, thresholds),
    }),
  };
}

export function evaluateSegments(
  segments: { wrist_on: ReadonlyArray<Segment>; wrist_off: ReadonlyArray<Segment> },
  thresholds: FaultThresholdsV1
): {
  wrist_on: ReadonlyArray<SegmentRuleResult<WristOnRuleResultV1>>;
  wrist_off: ReadonlyArray<SegmentRuleResult<WristOffRuleResultV1>>;
} {
  return {
    wrist_on: segments.wrist_on.map((s) => evaluateWristOnSegment(s, thresholds)),
    wrist_off: segments.wrist_off.map((s) => evaluateWristOffSegment(s, thresholds)),
  };
}
