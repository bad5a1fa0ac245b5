import { Pool } from "pg";

import type { DeviceAlertV1 } from "@devicewatch/contracts";

import type { AlertSink } from "./alert_sink";

export const DEVICE_ALERTS_DDL = `
  create table if not exists device_alerts (
    alert_id text primary key,
    device_id text not null,
    day date not null,
    created_at timestamptz not null,
    explanation jsonb not null
  )
`;

export type SqlStatement = { text: string; values: unknown[] };

export function buildAlertInsert(alert: DeviceAlertV1): SqlStatement {
  return {
    text: `
      insert into device_alerts (alert_id, device_id, day, created_at, explanation)
      values ($1, $2, $3::date, $4::timestamptz, $5::jsonb)
      on conflict do nothing
    `,
    values: [
      alert.alert_id,
      alert.device_id,
      alert.day,
      new Date(alert.created_at_ts).toISOString(),
      JSON.stringify(alert.explanation),
    ],
  };
}

/**
 * Alert records in Postgres. Table is created on first delivery.
 */
export class PgAlertSink implements AlertSink {
  private pool: Pool;
  private ready: Promise<void> | null = null;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async ping(): Promise<void> {
    const r = await this.pool.query("select 1 as ok");
    if (!r?.rows?.length) throw new Error("pg ping failed");
  }

  // Shared by concurrent first deliveries; cleared on failure.
  private init(): Promise<void> {
    if (!this.ready) {
      this.ready = this.pool.query(DEVICE_ALERTS_DDL).then(
        () => undefined,
        (err: unknown) => {
          this.ready = null;
          throw err;
        }
      );
    }
    return this.ready;
  }

  async deliver(alert: DeviceAlertV1): Promise<void> {
    await this.init();
    const q = buildAlertInsert(alert);
    await this.pool.query(q.text, q.values);
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
