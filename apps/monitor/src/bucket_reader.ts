import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";

import type { DeviceDayStreamsV1, StreamKind } from "@devicewatch/contracts";
import { STREAM_KINDS } from "@devicewatch/contracts";
import { InputContractError } from "@devicewatch/fault-kernel";

import type { MonitorConfigV1 } from "./config";
import { dayPathParts } from "./util";

export type DayListing = { exists: false } | { exists: true; device_ids: string[] };

/**
 * Where a day runner gets its units from. The kernel never sees this.
 */
export interface DeviceDayReader {
  listDevices(day: string): Promise<DayListing>;
  readDeviceDay(deviceId: string, day: string): Promise<DeviceDayStreamsV1>;
}

function isErrnoCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

/**
 * Headerless CSV, one sample per line; only the first column is read.
 * Blank lines are skipped.
 */
export function parseSampleCsv(text: string, file: string): number[] {
  const out: number[] = [];
  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const s = lines[i].trim();
    if (!s) continue;
    const cell = s.split(",")[0].trim();
    const v = cell === "" ? NaN : Number(cell);
    if (!Number.isFinite(v)) {
      throw new InputContractError(`non-numeric sample at ${file}:${i + 1}`, { file, line: i + 1, cell });
    }
    out.push(v);
  }
  return out;
}

/**
 * Reads `<root>/<YYYY>/<MM>/<DD>/<device>/<stream file>`.
 */
export class BucketReader implements DeviceDayReader {
  private readonly root: string;
  private readonly devicePattern: RegExp;
  private readonly files: MonitorConfigV1["bucket"]["stream_files"];
  private readonly rates: Record<StreamKind, number>;

  constructor(root: string, cfg: MonitorConfigV1) {
    this.root = path.resolve(root);
    this.devicePattern = new RegExp(cfg.bucket.device_dir_pattern);
    this.files = cfg.bucket.stream_files;
    this.rates = {
      wrist_contact: cfg.sampling.wrist_contact_hz,
      temperature: cfg.sampling.temperature_hz,
      ppg: cfg.sampling.ppg_hz,
    };
  }

  dayDir(day: string): string {
    return path.join(this.root, ...dayPathParts(day));
  }

  async listDevices(day: string): Promise<DayListing> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.dayDir(day), { withFileTypes: true });
    } catch (e) {
      if (isErrnoCode(e, "ENOENT") || isErrnoCode(e, "ENOTDIR")) return { exists: false };
      throw e;
    }
    const device_ids = entries
      .filter((d) => d.isDirectory() && this.devicePattern.test(d.name))
      .map((d) => d.name)
      .sort();
    return { exists: true, device_ids };
  }

  async readDeviceDay(deviceId: string, day: string): Promise<DeviceDayStreamsV1> {
    const dir = path.join(this.dayDir(day), deviceId);
    const [wrist_contact, temperature, ppg] = await Promise.all(STREAM_KINDS.map((k) => this.readStream(dir, k)));
    return {
      wrist_contact: { rate_hz: this.rates.wrist_contact, values: wrist_contact },
      temperature: { rate_hz: this.rates.temperature, values: temperature },
      ppg: { rate_hz: this.rates.ppg, values: ppg },
    };
  }

  // Missing file -> empty stream; the kernel reports it as insufficient data.
  private async readStream(dir: string, kind: StreamKind): Promise<number[]> {
    const file = this.files[kind];
    let raw: string;
    try {
      raw = await fs.readFile(path.join(dir, file), "utf8");
    } catch (e) {
      if (isErrnoCode(e, "ENOENT")) return [];
      throw e;
    }
    return parseSampleCsv(raw, file);
  }
}
