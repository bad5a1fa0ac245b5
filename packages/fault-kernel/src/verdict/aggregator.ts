// Fault Kernel - verdict aggregation
//
// One violated rule on one segment is enough to flag the whole device-day.

import type { FaultVerdictV1, WristOffRuleResultV1, WristOnRuleResultV1 } from "@devicewatch/contracts";

import type { SegmentRuleResult } from "../rules/evaluator";

function anyViolated<R extends object>(results: ReadonlyArray<SegmentRuleResult<R>>): boolean {
  return results.some((r) => Object.values(r.result).some((v) => v === true));
}

function byId<R>(results: ReadonlyArray<SegmentRuleResult<R>>): Record<string, R> {
  const out: Record<string, R> = {};
  for (const r of results) out[r.segment_id] = { ...r.result };
  return out;
}

export function aggregateVerdict(results: {
  wrist_on: ReadonlyArray<SegmentRuleResult<WristOnRuleResultV1>>;
  wrist_off: ReadonlyArray<SegmentRuleResult<WristOffRuleResultV1>>;
}): FaultVerdictV1 {
  const verdict: FaultVerdictV1 = {
    is_faulty: anyViolated(results.wrist_on) || anyViolated(results.wrist_off),
    explanation: {
      wrist_on: byId(results.wrist_on),
      wrist_off: byId(results.wrist_off),
    },
  };
  Object.freeze(verdict.explanation.wrist_on);
  Object.freeze(verdict.explanation.wrist_off);
  Object.freeze(verdict.explanation);
  return Object.freeze(verdict);
}
