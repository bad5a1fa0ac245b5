import path from "node:path";
import fs from "node:fs";
import Database from "better-sqlite3";
import { z } from "zod";

import type { DeviceDayOutcomeV1, DeviceDayStatus } from "@devicewatch/contracts";
import { DeviceDayOutcomeV1Z } from "@devicewatch/contracts";

import { clampInt } from "../util";

export type MonitorStoreConfig = {
  // ":memory:" for an in-process database
  filePath: string;
};

export type RunKind = "day" | "evaluate";

export type StoredOutcome = {
  run_id: string;
  outcome: DeviceDayOutcomeV1;
};

const OutcomeRowZ = z.object({ run_id: z.string(), record_json: z.string() });

export type RunRecord = {
  run_id: string;
  kind: RunKind;
  day: string;
  created_at_ts: number;
  effective_config_hash: string;
  counts: Record<string, number>;
};

export const MAX_LIST_LIMIT = 500;

export class MonitorSqliteStore {
  private db: Database.Database;

  constructor(cfg: MonitorStoreConfig) {
    const inMemory = cfg.filePath === ":memory:";
    if (!inMemory) fs.mkdirSync(path.dirname(cfg.filePath), { recursive: true });
    this.db = new Database(cfg.filePath);
    if (!inMemory) this.db.pragma("journal_mode = WAL");
    this.init();
  }

  private init(): void {
    // append-only tables
    this.db.exec(`
      create table if not exists monitor_runs (
        run_id text primary key,
        kind text not null,
        day text not null,
        created_at_ts integer not null,
        effective_config_hash text not null,
        counts_json text not null
      );

      create table if not exists monitor_outcomes (
        run_id text not null,
        device_id text not null,
        day text not null,
        status text not null,
        evaluated_at_ts integer not null,
        record_json text not null,
        primary key (run_id, device_id, day)
      );

      create index if not exists idx_outcomes_day on monitor_outcomes(day, evaluated_at_ts);
      create index if not exists idx_outcomes_status on monitor_outcomes(status, evaluated_at_ts);
    `);
  }

  insertRun(args: RunRecord): void {
    const stmt = this.db.prepare(
      `insert into monitor_runs (run_id, kind, day, created_at_ts, effective_config_hash, counts_json) values (?, ?, ?, ?, ?, ?)`
    );
    stmt.run(args.run_id, args.kind, args.day, args.created_at_ts, args.effective_config_hash, JSON.stringify(args.counts));
  }

  insertOutcome(run_id: string, outcome: DeviceDayOutcomeV1): void {
    const stmt = this.db.prepare(
      `insert into monitor_outcomes (run_id, device_id, day, status, evaluated_at_ts, record_json) values (?, ?, ?, ?, ?, ?)`
    );
    stmt.run(run_id, outcome.device_id, outcome.day, outcome.status, outcome.evaluated_at_ts, JSON.stringify(outcome));
  }

  /**
   * Run row and its outcome rows in one transaction: all recorded or none.
   */
  recordRun(run: RunRecord, outcomes: ReadonlyArray<DeviceDayOutcomeV1>): void {
    this.db.transaction(() => {
      this.insertRun(run);
      for (const o of outcomes) this.insertOutcome(run.run_id, o);
    })();
  }

  /**
   * Newest first. `limit` is clamped to [1, 500].
   */
  listOutcomes(filter: { day?: string; status?: DeviceDayStatus; limit?: number } = {}): StoredOutcome[] {
    const where: string[] = [];
    const values: Array<string | number> = [];
    if (filter.day) {
      where.push("day = ?");
      values.push(filter.day);
    }
    if (filter.status) {
      where.push("status = ?");
      values.push(filter.status);
    }
    values.push(clampInt(filter.limit ?? 100, 1, MAX_LIST_LIMIT));

    const sql = `
      select run_id, record_json from monitor_outcomes
      ${where.length ? `where ${where.join(" and ")}` : ""}
      order by evaluated_at_ts desc, rowid desc
      limit ?
    `;
    return this.db
      .prepare(sql)
      .all(...values)
      .map((r) => {
        const row = OutcomeRowZ.parse(r);
        return { run_id: row.run_id, outcome: DeviceDayOutcomeV1Z.parse(JSON.parse(row.record_json)) };
      });
  }

  countRuns(): number {
    const r = z.object({ n: z.number() }).parse(this.db.prepare(`select count(*) as n from monitor_runs`).get());
    return r.n;
  }

  close(): void {
    this.db.close();
  }
}
