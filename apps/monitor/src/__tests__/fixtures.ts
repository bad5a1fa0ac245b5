import pino from "pino";

import type { DeviceAlertV1, DeviceDayStreamsV1 } from "@devicewatch/contracts";

import type { AlertSink } from "../alert/alert_sink";
import type { DayListing, DeviceDayReader } from "../bucket_reader";
import type { MonitorConfigV1 } from "../config";

export const DAY = "2024-03-05";
export const FIXED_TS = 1_700_000_000_000;

export function testConfig(): MonitorConfigV1 {
  return {
    schema_version: "1.0.0",
    sampling: { wrist_contact_hz: 1, temperature_hz: 1, ppg_hz: 1, max_start_skew_ms: 0 },
    thresholds: {
      min_temp: 30,
      max_temp: 40,
      temp_std_on_max: 0.5,
      ppg_std_on_max: 1,
      temp_decrease_tolerance: 0.05,
      ppg_std_off_max: 0.5,
    },
    bucket: {
      device_dir_pattern: "^device_\\d{3}$",
      stream_files: { wrist_contact: "on_wrist.csv", temperature: "temperature.csv", ppg: "ppg.csv" },
    },
  };
}

export function day1Hz(wrist: number[], temperature: number[], ppg: number[]): DeviceDayStreamsV1 {
  return {
    wrist_contact: { rate_hz: 1, values: wrist },
    temperature: { rate_hz: 1, values: temperature },
    ppg: { rate_hz: 1, values: ppg },
  };
}

export const HEALTHY = day1Hz([1, 1, 1], [36.0, 36.1, 36.0], [0.1, 0.1, 0.1]);
export const OVERHEATED = day1Hz([1, 1, 1], [36.0, 42.0, 36.0], [0.1, 0.1, 0.1]);
export const NO_TEMPERATURE = day1Hz([1, 1, 1], [], [0.1, 0.1, 0.1]);

/**
 * In-memory reader. An Error entry is thrown from readDeviceDay.
 */
export class FakeReader implements DeviceDayReader {
  constructor(private readonly days: Record<string, Record<string, DeviceDayStreamsV1 | Error>>) {}

  async listDevices(day: string): Promise<DayListing> {
    const devices = this.days[day];
    if (!devices) return { exists: false };
    return { exists: true, device_ids: Object.keys(devices).sort() };
  }

  async readDeviceDay(deviceId: string, day: string): Promise<DeviceDayStreamsV1> {
    const entry = this.days[day]?.[deviceId];
    if (!entry) throw new Error(`unknown unit ${deviceId}/${day}`);
    if (entry instanceof Error) throw entry;
    return entry;
  }
}

export class RecordingSink implements AlertSink {
  public readonly delivered: DeviceAlertV1[] = [];

  async deliver(alert: DeviceAlertV1): Promise<void> {
    this.delivered.push(alert);
  }
}

export class FailingSink implements AlertSink {
  async deliver(): Promise<void> {
    throw new Error("sink offline");
  }
}

export function silentLogger() {
  return pino({ level: "silent" });
}

// Collects every JSON log line pino writes.
export function capturingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const stream = {
    write(msg: string): void {
      lines.push(JSON.parse(msg));
    },
  };
  return { log: pino({ level: "info" }, stream), lines };
}
