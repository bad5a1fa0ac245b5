import type { BaseLogger } from "pino";

import type { DeviceDayOutcomeV1, DeviceDayStatus, DeviceDayStreamsV1 } from "@devicewatch/contracts";
import { DayZ } from "@devicewatch/contracts";
import { evaluateDeviceDay, isDeviceEvaluationError } from "@devicewatch/fault-kernel";

import { makeDeviceAlert, type AlertSink } from "./alert/alert_sink";
import type { DeviceDayReader } from "./bucket_reader";
import type { MonitorConfigV1 } from "./config";
import { getManifest, resolveEffectiveConfig, type EffectiveConfig, type MonitorConfigManifestV1 } from "./config/patch";
import { mapWithConcurrency } from "./pool";
import type { MonitorSqliteStore, StoredOutcome } from "./store/sqlite_store";
import { newRunId, nowMs } from "./util";

export type MonitorRuntimeDeps = {
  config: MonitorConfigV1;
  reader: DeviceDayReader;
  alertSink: AlertSink;
  log: BaseLogger;
  store?: MonitorSqliteStore | null;
  // Pool size; defaults to one lane per device.
  workers?: number;
  clock?: () => number;
};

export type StatusCounts = Record<DeviceDayStatus, number>;

export type DayRunReport =
  | { status: "no_data_for_day"; day: string; run_id: string }
  | { status: "no_devices"; day: string; run_id: string }
  | {
      status: "processed";
      day: string;
      run_id: string;
      effective_config_hash: string;
      outcomes: DeviceDayOutcomeV1[];
      counts: StatusCounts;
      alerts: { delivered: number; failed: number };
    };

export type EvaluateUnitInput = {
  device_id: string;
  day: string;
  streams: DeviceDayStreamsV1;
  config_patch?: unknown;
};

function emptyCounts(): StatusCounts {
  return { healthy: 0, faulty: 0, unable_to_evaluate: 0 };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class MonitorRuntime {
  private readonly clock: () => number;

  constructor(private readonly deps: MonitorRuntimeDeps) {
    this.clock = deps.clock ?? nowMs;
  }

  get config(): MonitorConfigV1 {
    return this.deps.config;
  }

  manifest(): MonitorConfigManifestV1 {
    return getManifest(this.deps.config);
  }

  /**
   * Runs the kernel for one unit. Taxonomy errors become `unable_to_evaluate`;
   * anything else is a defect and propagates.
   */
  evaluateOutcome(device_id: string, day: string, streams: DeviceDayStreamsV1, eff: EffectiveConfig): DeviceDayOutcomeV1 {
    const base = {
      type: "device_day_outcome_v1" as const,
      device_id,
      day,
      evaluated_at_ts: this.clock(),
      effective_config_hash: eff.effective_config_hash,
    };
    try {
      const r = evaluateDeviceDay(streams, eff.cfg.thresholds, { max_start_skew_ms: eff.cfg.sampling.max_start_skew_ms });
      const evaluated = {
        verdict: r.verdict,
        frame_length: r.frame_length,
        target_rate_hz: r.target_rate_hz,
        segment_count: r.segments.length,
      };
      return r.verdict.is_faulty ? { ...base, status: "faulty", ...evaluated } : { ...base, status: "healthy", ...evaluated };
    } catch (e) {
      if (!isDeviceEvaluationError(e)) throw e;
      return { ...base, status: "unable_to_evaluate", error: { code: e.code, message: e.message } };
    }
  }

  /**
   * Evaluates inline streams. Faulty outcomes alert; the outcome is stored as a one-unit run.
   *
   * @throws ThresholdPatchRejected
   */
  async evaluateUnit(input: EvaluateUnitInput): Promise<DeviceDayOutcomeV1> {
    const eff = resolveEffectiveConfig(this.deps.config, input.config_patch);
    const run_id = newRunId();
    const outcome = this.evaluateOutcome(input.device_id, input.day, input.streams, eff);
    this.logOutcome(outcome);
    await this.alertIfFaulty(outcome);

    const counts = emptyCounts();
    counts[outcome.status]++;
    this.deps.store?.recordRun(
      {
        run_id,
        kind: "evaluate",
        day: input.day,
        created_at_ts: outcome.evaluated_at_ts,
        effective_config_hash: eff.effective_config_hash,
        counts,
      },
      [outcome]
    );
    return outcome;
  }

  /**
   * Evaluates every device found for `day`. One unit's failure never aborts its siblings.
   *
   * @throws ThresholdPatchRejected
   */
  async processDay(day: string, options: { config_patch?: unknown; workers?: number } = {}): Promise<DayRunReport> {
    if (!DayZ.safeParse(day).success) throw new Error(`invalid day: ${day}`);
    const eff = resolveEffectiveConfig(this.deps.config, options.config_patch);
    const run_id = newRunId();
    const log = this.deps.log;

    const listing = await this.deps.reader.listDevices(day);
    if (!listing.exists) {
      log.warn({ day, run_id }, `No data available for date ${day}`);
      return { status: "no_data_for_day", day, run_id };
    }
    if (listing.device_ids.length === 0) {
      log.warn({ day, run_id }, "No devices available!");
      return { status: "no_devices", day, run_id };
    }

    const workers = options.workers ?? this.deps.workers ?? listing.device_ids.length;
    const alerts = { delivered: 0, failed: 0 };

    const outcomes = await mapWithConcurrency(listing.device_ids, workers, async (device_id) => {
      const outcome = await this.readAndEvaluate(device_id, day, eff);
      this.logOutcome(outcome);
      if (await this.alertIfFaulty(outcome)) alerts.delivered++;
      else if (outcome.status === "faulty") alerts.failed++;
      return outcome;
    });

    const counts = emptyCounts();
    for (const o of outcomes) counts[o.status]++;

    this.deps.store?.recordRun(
      { run_id, kind: "day", day, created_at_ts: this.clock(), effective_config_hash: eff.effective_config_hash, counts },
      outcomes
    );

    log.info({ day, run_id, counts, alerts }, "day processed");
    return { status: "processed", day, run_id, effective_config_hash: eff.effective_config_hash, outcomes, counts, alerts };
  }

  listOutcomes(filter: { day?: string; status?: DeviceDayStatus; limit?: number }): StoredOutcome[] {
    return this.deps.store?.listOutcomes(filter) ?? [];
  }

  private async readAndEvaluate(device_id: string, day: string, eff: EffectiveConfig): Promise<DeviceDayOutcomeV1> {
    let streams: DeviceDayStreamsV1;
    try {
      streams = await this.deps.reader.readDeviceDay(device_id, day);
    } catch (e) {
      const base = {
        type: "device_day_outcome_v1" as const,
        device_id,
        day,
        evaluated_at_ts: this.clock(),
        effective_config_hash: eff.effective_config_hash,
        status: "unable_to_evaluate" as const,
      };
      if (isDeviceEvaluationError(e)) return { ...base, error: { code: e.code, message: e.message } };
      return { ...base, error: { code: "SOURCE_READ_FAILED", message: errorMessage(e) } };
    }
    return this.evaluateOutcome(device_id, day, streams, eff);
  }

  // Returns true when an alert was delivered.
  private async alertIfFaulty(outcome: DeviceDayOutcomeV1): Promise<boolean> {
    if (outcome.status !== "faulty") return false;
    const alert = makeDeviceAlert({
      device_id: outcome.device_id,
      day: outcome.day,
      created_at_ts: outcome.evaluated_at_ts,
      effective_config_hash: outcome.effective_config_hash,
      verdict: outcome.verdict,
    });
    try {
      await this.deps.alertSink.deliver(alert);
      return true;
    } catch (err) {
      this.deps.log.error({ err, device_id: outcome.device_id, day: outcome.day, alert_id: alert.alert_id }, "alert delivery failed");
      return false;
    }
  }

  private logOutcome(o: DeviceDayOutcomeV1): void {
    const fields = { device_id: o.device_id, day: o.day, status: o.status };
    if (o.status === "unable_to_evaluate") {
      this.deps.log.warn({ ...fields, code: o.error.code }, o.error.message);
    } else {
      this.deps.log.info(fields, "device evaluated");
    }
  }
}
