import type { BaseLogger } from "pino";

import type { DeviceAlertV1, FaultVerdictV1 } from "@devicewatch/contracts";
import { DeviceAlertV1Z } from "@devicewatch/contracts";

import { newId } from "../util";

export interface AlertSink {
  deliver(alert: DeviceAlertV1): Promise<void>;
  close?(): Promise<void>;
}

export function makeDeviceAlert(params: {
  device_id: string;
  day: string;
  created_at_ts: number;
  effective_config_hash: string;
  verdict: FaultVerdictV1;
}): DeviceAlertV1 {
  return DeviceAlertV1Z.parse({
    type: "device_alert_v1",
    alert_id: newId("alert"),
    device_id: params.device_id,
    day: params.day,
    created_at_ts: params.created_at_ts,
    effective_config_hash: params.effective_config_hash,
    explanation: params.verdict.explanation,
  });
}

export function formatAlertText(alert: DeviceAlertV1): string {
  return `Device ${alert.device_id} is malfunctioning!\nExplanation:\n${JSON.stringify(alert.explanation, null, 4)}`;
}

export class LoggerAlertSink implements AlertSink {
  constructor(private readonly log: BaseLogger) {}

  async deliver(alert: DeviceAlertV1): Promise<void> {
    this.log.warn({ alert_id: alert.alert_id, device_id: alert.device_id, day: alert.day }, formatAlertText(alert));
  }
}
