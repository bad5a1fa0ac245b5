import { z } from "zod";

/**
 * Rule thresholds, in the units the device emits.
 *
 * Relational constraints:
 * - min_temp <= max_temp
 * - ppg_std_off_max < ppg_std_on_max (an unworn device shows flatter PPG than a worn one)
 */
export const FaultThresholdsV1Z = z
  .object({
    min_temp: z.number().finite(),
    max_temp: z.number().finite(),
    temp_std_on_max: z.number().finite().nonnegative(),
    ppg_std_on_max: z.number().finite().nonnegative(),
    temp_decrease_tolerance: z.number().finite().nonnegative(),
    ppg_std_off_max: z.number().finite().nonnegative(),
  })
  .strict()
  .superRefine((v, ctx) => {
    if (v.min_temp > v.max_temp) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `min_temp must be <= max_temp (got ${v.min_temp} > ${v.max_temp})`,
        path: ["min_temp"],
      });
    }
    if (v.ppg_std_off_max >= v.ppg_std_on_max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `ppg_std_off_max must be < ppg_std_on_max (got ${v.ppg_std_off_max} >= ${v.ppg_std_on_max})`,
        path: ["ppg_std_off_max"],
      });
    }
  });

export type FaultThresholdsV1 = z.infer<typeof FaultThresholdsV1Z>;

export const THRESHOLD_KEYS = [
  "min_temp",
  "max_temp",
  "temp_std_on_max",
  "ppg_std_on_max",
  "temp_decrease_tolerance",
  "ppg_std_off_max",
] as const satisfies ReadonlyArray<keyof FaultThresholdsV1>;
