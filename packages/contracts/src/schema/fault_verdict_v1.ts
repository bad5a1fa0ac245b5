import { z } from "zod";

export const WRIST_ON_RULE_NAMES = ["temperature_out_of_range", "temperature_high_variance", "ppg_high_variance"] as const;
export const WRIST_OFF_RULE_NAMES = ["temperature_not_decreasing", "ppg_high_variance_off"] as const;

export type WristOnRuleName = (typeof WRIST_ON_RULE_NAMES)[number];
export type WristOffRuleName = (typeof WRIST_OFF_RULE_NAMES)[number];

// true = violated
export const WristOnRuleResultV1Z = z
  .object({
    temperature_out_of_range: z.boolean(),
    temperature_high_variance: z.boolean(),
    ppg_high_variance: z.boolean(),
  })
  .strict();

export const WristOffRuleResultV1Z = z
  .object({
    temperature_not_decreasing: z.boolean(),
    ppg_high_variance_off: z.boolean(),
  })
  .strict();

export type WristOnRuleResultV1 = z.infer<typeof WristOnRuleResultV1Z>;
export type WristOffRuleResultV1 = z.infer<typeof WristOffRuleResultV1Z>;

// "<wrist_contact>:<start_index>", e.g. "1:0" or "0:128"
export const SegmentIdZ = z.string().regex(/^[01]:\d+$/);

export const FaultVerdictV1Z = z
  .object({
    is_faulty: z.boolean(),
    explanation: z
      .object({
        wrist_on: z.record(SegmentIdZ, WristOnRuleResultV1Z),
        wrist_off: z.record(SegmentIdZ, WristOffRuleResultV1Z),
      })
      .strict(),
  })
  .strict();

export type FaultVerdictV1 = z.infer<typeof FaultVerdictV1Z>;
