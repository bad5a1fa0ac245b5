import { createHash, randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

export function nowMs(): number {
  return Date.now();
}

export function newId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}

export function newRunId(): string {
  return randomUUID();
}

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) {
    return x.map(canonicalize);
  }
  if (typeof x === "object") {
    const entries: Array<[string, unknown]> = Object.entries(x);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [k, v] of entries) out[k] = canonicalize(v);
    return out;
  }
  return x;
}

export function clampInt(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(n, max));
}

/**
 * "2021-02-03" -> ["2021", "02", "03"], the bucket's YYYY/MM/DD layout.
 */
export function dayPathParts(day: string): [string, string, string] {
  const m = day.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) throw new Error(`invalid day: ${day}`);
  return [m[1], m[2], m[3]];
}

// The monitor runs after midnight over the day that just ended.
export function previousUtcDay(tsMs: number): string {
  return new Date(tsMs - 86_400_000).toISOString().slice(0, 10);
}

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 * Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
