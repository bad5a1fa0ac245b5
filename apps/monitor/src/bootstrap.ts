import path from "node:path";

import type { BaseLogger } from "pino";

import { LoggerAlertSink, type AlertSink } from "./alert/alert_sink";
import { PgAlertSink } from "./alert/pg_alert_sink";
import { BucketReader } from "./bucket_reader";
import { loadMonitorConfig, resolveRepoRoot } from "./config";
import type { MonitorEnv } from "./env";
import { MonitorRuntime } from "./runtime";
import { MonitorSqliteStore } from "./store/sqlite_store";

export type MonitorServices = {
  runtime: MonitorRuntime;
  close(): Promise<void>;
};

/**
 * Wires config, reader, alert sink and store from the environment.
 * Postgres alerts when DATABASE_URL is set, logger alerts otherwise.
 */
export async function createMonitorServices(env: MonitorEnv, log: BaseLogger): Promise<MonitorServices> {
  const repoRoot = resolveRepoRoot();
  const config = loadMonitorConfig("default", repoRoot);

  let alertSink: AlertSink;
  if (env.DATABASE_URL) {
    const pg = new PgAlertSink(env.DATABASE_URL);
    await pg.ping();
    alertSink = pg;
  } else {
    alertSink = new LoggerAlertSink(log);
  }

  const store = new MonitorSqliteStore({
    filePath: env.MONITOR_DB_PATH ?? path.join(repoRoot, "apps", "monitor", "data", "monitor.sqlite"),
  });

  const runtime = new MonitorRuntime({
    config,
    reader: new BucketReader(env.BUCKET_PATH, config),
    alertSink,
    store,
    log,
    workers: env.WORKERS,
  });

  return {
    runtime,
    async close() {
      store.close();
      await alertSink.close?.();
    },
  };
}
