// Monitor config SSOT loader + validator.
//
// Source of truth:
//   config/monitor/<profile>.json   (profile "default")
//
// Everything the kernel needs (rates, thresholds) is read from here and passed
// into it explicitly; nothing downstream reads process-wide state.

import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { FaultThresholdsV1Z, formatIssues, summarizeIssues } from "@devicewatch/contracts";
import { ConfigurationError } from "@devicewatch/fault-kernel";

import { findRepoRoot, sha256Hex, stableStringify } from "../util";

const RateZ = z.number().finite().positive();

export const MonitorConfigV1Z = z
  .object({
    schema_version: z.string().regex(/^\d+\.\d+\.\d+$/),
    sampling: z
      .object({
        wrist_contact_hz: RateZ,
        temperature_hz: RateZ,
        ppg_hz: RateZ,
        max_start_skew_ms: z.number().int().nonnegative(),
      })
      .strict(),
    thresholds: FaultThresholdsV1Z,
    bucket: z
      .object({
        device_dir_pattern: z
          .string()
          .min(1)
          .refine(isValidRegex, { message: "device_dir_pattern must be a valid regular expression" }),
        stream_files: z
          .object({
            wrist_contact: z.string().min(1),
            temperature: z.string().min(1),
            ppg: z.string().min(1),
          })
          .strict(),
      })
      .strict(),
  })
  .strict();

export type MonitorConfigV1 = z.infer<typeof MonitorConfigV1Z>;

function isValidRegex(s: string): boolean {
  try {
    new RegExp(s);
    return true;
  } catch {
    return false;
  }
}

export function validateMonitorConfigV1(cfg: unknown): MonitorConfigV1 {
  const r = MonitorConfigV1Z.safeParse(cfg);
  if (!r.success) {
    throw new ConfigurationError(`invalid monitor config: ${summarizeIssues(r.error)}`, { issues: formatIssues(r.error) });
  }
  return r.data;
}

export function computeConfigHash(cfg: unknown): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

export function resolveRepoRoot(): string {
  if (process.env.DEVICEWATCH_REPO_ROOT) return path.resolve(process.env.DEVICEWATCH_REPO_ROOT);
  return findRepoRoot(__dirname, path.join("config", "monitor", "default.json"));
}

export function configFilePath(profile: string, repoRoot: string): string {
  if (!/^[a-z0-9_-]+$/.test(profile)) throw new ConfigurationError(`invalid config profile: ${profile}`, { profile });
  return path.join(repoRoot, "config", "monitor", `${profile}.json`);
}

export function loadMonitorConfig(profile = "default", repoRoot: string = resolveRepoRoot()): MonitorConfigV1 {
  const p = configFilePath(profile, repoRoot);
  let raw: string;
  try {
    raw = fs.readFileSync(p, "utf8");
  } catch (e) {
    throw new ConfigurationError(`cannot read monitor config ${p}: ${e instanceof Error ? e.message : String(e)}`, { path: p });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`monitor config ${p} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, { path: p });
  }
  return validateMonitorConfigV1(parsed);
}
