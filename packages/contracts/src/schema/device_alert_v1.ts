import { z } from "zod";

import { DayZ } from "./device_day_outcome_v1";
import { FaultVerdictV1Z } from "./fault_verdict_v1";

export const DeviceAlertV1Z = z
  .object({
    type: z.literal("device_alert_v1"),
    alert_id: z.string().min(1),
    device_id: z.string().min(1),
    day: DayZ,
    created_at_ts: z.number().int().nonnegative(),
    effective_config_hash: z.string().min(1),
    explanation: FaultVerdictV1Z.shape.explanation,
  })
  .strict();

export type DeviceAlertV1 = z.infer<typeof DeviceAlertV1Z>;
