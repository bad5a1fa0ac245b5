import { z } from "zod";

import { FaultVerdictV1Z } from "./fault_verdict_v1";

export const DayZ = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((s) => Number.isFinite(Date.parse(`${s}T00:00:00Z`)) && new Date(`${s}T00:00:00Z`).toISOString().startsWith(s), {
    message: "day must be a calendar date (YYYY-MM-DD)",
  });

// SOURCE_READ_FAILED: the data-access layer could not read the unit (IO error), distinct from empty data.
export const EvaluationErrorCodeZ = z.enum([
  "CONFIGURATION_INVALID",
  "INSUFFICIENT_DATA",
  "INPUT_CONTRACT_VIOLATION",
  "SOURCE_READ_FAILED",
]);

export type EvaluationErrorCode = z.infer<typeof EvaluationErrorCodeZ>;

export const DeviceDayStatusZ = z.enum(["healthy", "faulty", "unable_to_evaluate"]);

const { healthy, faulty, unable_to_evaluate } = DeviceDayStatusZ.enum;

const OutcomeBase = {
  type: z.literal("device_day_outcome_v1"),
  device_id: z.string().min(1),
  day: DayZ,
  evaluated_at_ts: z.number().int().nonnegative(),
  effective_config_hash: z.string().min(1),
};

const EvaluatedFields = {
  verdict: FaultVerdictV1Z,
  frame_length: z.number().int().positive(),
  target_rate_hz: z.number().finite().positive(),
  segment_count: z.number().int().positive(),
};

/**
 * Three outcomes per (device, day). "unable_to_evaluate" is never folded into "healthy".
 */
export const DeviceDayOutcomeV1Z = z.discriminatedUnion("status", [
  z.object({ ...OutcomeBase, status: z.literal(healthy), ...EvaluatedFields }).strict(),
  z.object({ ...OutcomeBase, status: z.literal(faulty), ...EvaluatedFields }).strict(),
  z
    .object({
      ...OutcomeBase,
      status: z.literal(unable_to_evaluate),
      error: z.object({ code: EvaluationErrorCodeZ, message: z.string() }).strict(),
    })
    .strict(),
]);

export type DeviceDayOutcomeV1 = z.infer<typeof DeviceDayOutcomeV1Z>;
export type DeviceDayStatus = z.infer<typeof DeviceDayStatusZ>;

export function parseDeviceDayOutcomeV1(input: unknown): DeviceDayOutcomeV1 {
  return DeviceDayOutcomeV1Z.parse(input);
}
