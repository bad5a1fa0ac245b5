import type { FaultThresholdsV1, WristOffRuleName, WristOnRuleName } from "@devicewatch/contracts";

import type { Segment } from "../segment/segmenter";

/**
 * One predicate over one segment. `true` means the check is violated.
 * Predicates are total on non-empty segments.
 */
export interface SegmentRule<N extends string> {
  name: N;
  violated(segment: Segment, thresholds: FaultThresholdsV1): boolean;
}

export type WristOnRule = SegmentRule<WristOnRuleName>;
export type WristOffRule = SegmentRule<WristOffRuleName>;
