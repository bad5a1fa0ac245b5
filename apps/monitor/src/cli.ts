// Daily batch entry point: evaluates every device of one day from the bucket.

import pino from "pino";

import { createMonitorServices } from "./bootstrap";
import { loadEnv, parseMonitorEnv } from "./env";
import { nowMs, previousUtcDay } from "./util";

async function main(): Promise<void> {
  loadEnv();
  const env = parseMonitorEnv();
  const log = pino({ level: env.LOG_LEVEL });

  const day = env.MONITORING_DATE ?? previousUtcDay(nowMs());
  const services = await createMonitorServices(env, log);
  try {
    const report = await services.runtime.processDay(day);
    if (report.status === "processed") {
      log.info({ day, run_id: report.run_id, counts: report.counts, alerts: report.alerts }, "monitoring finished");
    } else {
      log.info({ day, run_id: report.run_id, status: report.status }, "monitoring finished");
    }
  } finally {
    await services.close();
  }
}

main().catch((err) => {
  pino().fatal(err);
  process.exit(1);
});
