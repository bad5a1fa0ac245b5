import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { DayZ } from "@devicewatch/contracts";

function loadDotEnvFile(fp: string): void {
  if (!fs.existsSync(fp)) return;
  const raw = fs.readFileSync(fp, "utf8");
  for (const line of raw.split(/\r?\n/)) {
    const s = line.trim();
    if (!s || s.startsWith("#")) continue;
    const m = s.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let val = m[2] ?? "";
    if ((val.startsWith('"') && val.endsWith('"')) || (val.startsWith("'") && val.endsWith("'"))) {
      val = val.slice(1, -1);
    }
    // Do not overwrite explicitly provided env vars
    if (process.env[key] == null) process.env[key] = val;
  }
}

/**
 * Loads repo root .env first, then the package-local one.
 * Neither overrides variables already set in the process.
 */
export function loadEnv(): void {
  const repoRoot = path.resolve(__dirname, "..", "..", "..");
  loadDotEnvFile(path.join(repoRoot, ".env"));
  loadDotEnvFile(path.join(__dirname, "..", ".env"));
}

const blankAsUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

export const MonitorEnvZ = z.object({
  BUCKET_PATH: z.string().min(1).default("raw_bucket"),
  WORKERS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().optional()),
  MONITORING_DATE: z.preprocess(blankAsUndefined, DayZ.optional()),
  DATABASE_URL: z.preprocess(blankAsUndefined, z.string().optional()),
  MONITOR_DB_PATH: z.preprocess(blankAsUndefined, z.string().optional()),
  PORT: z.coerce.number().int().min(1).max(65535).default(3110),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
});

export type MonitorEnv = z.infer<typeof MonitorEnvZ>;

export function parseMonitorEnv(env: NodeJS.ProcessEnv = process.env): MonitorEnv {
  const r = MonitorEnvZ.safeParse(env);
  if (!r.success) {
    const msg = r.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`invalid environment: ${msg}`);
  }
  return r.data;
}
