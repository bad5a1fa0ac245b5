// Threshold patch (manifest v1).
//
// Contract:
// - replace-only ops
// - path must be in manifest.editable
// - unknown keys are rejected
// - ssot_hash mismatch is 409, every other rejection is 400
// - the patched config is re-validated as a whole

import { z } from "zod";

import { isDeviceEvaluationError } from "@devicewatch/fault-kernel";

import { computeConfigHash, validateMonitorConfigV1, type MonitorConfigV1 } from "./index";

export type EditableItem = {
  path: string;
  type: "int" | "number";
  min?: number;
  max?: number;
  description?: string;
};

export type MonitorConfigManifestV1 = {
  ssot: {
    source: string;
    schema_version: string;
    ssot_hash: string;
  };
  patch: {
    patch_version: "1.0.0";
    op_allowed: ["replace"];
    unknown_keys_policy: "reject";
  };
  editable: EditableItem[];
  thresholds: MonitorConfigV1["thresholds"];
};

const EDITABLE: ReadonlyArray<EditableItem> = [
  { path: "thresholds.min_temp", type: "number" },
  { path: "thresholds.max_temp", type: "number" },
  { path: "thresholds.temp_std_on_max", type: "number", min: 0 },
  { path: "thresholds.ppg_std_on_max", type: "number", min: 0 },
  { path: "thresholds.temp_decrease_tolerance", type: "number", min: 0 },
  { path: "thresholds.ppg_std_off_max", type: "number", min: 0 },
  { path: "sampling.max_start_skew_ms", type: "int", min: 0, max: 3_600_000 },
];

function editableItems(): EditableItem[] {
  return EDITABLE.map((it) => ({ ...it }));
}

export function getManifest(cfg: MonitorConfigV1, source = "config/monitor/default.json"): MonitorConfigManifestV1 {
  return {
    ssot: { source, schema_version: cfg.schema_version, ssot_hash: computeConfigHash(cfg) },
    patch: { patch_version: "1.0.0", op_allowed: ["replace"], unknown_keys_policy: "reject" },
    editable: editableItems(),
    thresholds: cfg.thresholds,
  };
}

export const ThresholdPatchOpV1Z = z.object({ op: z.literal("replace"), path: z.string().min(1), value: z.unknown() }).strict();

export const ThresholdPatchV1Z = z
  .object({
    patch_version: z.literal("1.0.0"),
    base: z.object({ ssot_hash: z.string().min(1) }).strict(),
    ops: z.array(ThresholdPatchOpV1Z),
  })
  .strict();

export type ThresholdPatchV1 = z.infer<typeof ThresholdPatchV1Z>;

export type PatchValidationError = {
  code:
    | "INVALID_PATCH_SCHEMA"
    | "UNKNOWN_KEYS"
    | "SSOT_HASH_MISMATCH"
    | "PATH_NOT_ALLOWED"
    | "VALUE_TYPE_MISMATCH"
    | "VALUE_OUT_OF_RANGE"
    | "INVALID_EFFECTIVE_CONFIG";
  path: string;
  message: string;
  meta?: Record<string, unknown>;
};

export class ThresholdPatchRejected extends Error {
  public readonly status: number;
  public readonly errors: PatchValidationError[];

  constructor(status: number, errors: PatchValidationError[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "ThresholdPatchRejected";
    this.status = status;
    this.errors = errors;
  }
}

function schemaErrors(err: z.ZodError): PatchValidationError[] {
  return err.issues.map((i) => ({
    code: i.code === z.ZodIssueCode.unrecognized_keys ? "UNKNOWN_KEYS" : "INVALID_PATCH_SCHEMA",
    path: ["patch", ...i.path].join("."),
    message: i.message,
  }));
}

function checkValue(item: EditableItem, v: unknown, at: string): PatchValidationError[] {
  if (typeof v !== "number" || !Number.isFinite(v) || (item.type === "int" && !Number.isInteger(v))) {
    return [{ code: "VALUE_TYPE_MISMATCH", path: at, message: `value must be ${item.type}` }];
  }
  const meta = { min: item.min, max: item.max };
  if (typeof item.min === "number" && v < item.min) {
    return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value below min", meta }];
  }
  if (typeof item.max === "number" && v > item.max) {
    return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value above max", meta }];
  }
  return [];
}

/**
 * Strict schema + allowlist validation. Does not compare the base hash.
 */
export function validatePatchStrict(input: unknown): { patch: ThresholdPatchV1 | null; errors: PatchValidationError[] } {
  const r = ThresholdPatchV1Z.safeParse(input);
  if (!r.success) return { patch: null, errors: schemaErrors(r.error) };

  const allowed = new Map(editableItems().map((it) => [it.path, it]));
  const errors: PatchValidationError[] = [];
  r.data.ops.forEach((op, i) => {
    const p = op.path.trim();
    const item = allowed.get(p);
    if (!item) {
      errors.push({ code: "PATH_NOT_ALLOWED", path: `patch.ops.${i}.path`, message: `path not allowed: ${p}` });
      return;
    }
    errors.push(...checkValue(item, op.value, `patch.ops.${i}.value`));
  });
  return { patch: r.data, errors };
}

function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function replaceAt(obj: Record<string, unknown>, dotPath: string, value: unknown): Record<string, unknown> {
  const [head, ...rest] = dotPath.split(".");
  if (rest.length === 0) return { ...obj, [head]: value };
  const child = obj[head];
  return { ...obj, [head]: replaceAt(isObj(child) ? child : {}, rest.join("."), value) };
}

export type EffectiveConfig = {
  cfg: MonitorConfigV1;
  ssot_hash: string;
  effective_config_hash: string;
};

/**
 * Resolves the config a unit is evaluated under. No patch means the SSOT as-is.
 *
 * @throws ThresholdPatchRejected
 */
export function resolveEffectiveConfig(ssot: MonitorConfigV1, patchInput?: unknown): EffectiveConfig {
  const ssotHash = computeConfigHash(ssot);
  if (patchInput === undefined || patchInput === null) {
    return { cfg: ssot, ssot_hash: ssotHash, effective_config_hash: ssotHash };
  }

  const { patch, errors } = validatePatchStrict(patchInput);
  if (errors.length || !patch) throw new ThresholdPatchRejected(400, errors);

  if (patch.base.ssot_hash !== ssotHash) {
    throw new ThresholdPatchRejected(409, [
      {
        code: "SSOT_HASH_MISMATCH",
        path: "patch.base.ssot_hash",
        message: "base ssot_hash does not match current config",
        meta: { expected: ssotHash, got: patch.base.ssot_hash },
      },
    ]);
  }

  let next: Record<string, unknown> = { ...ssot };
  for (const op of patch.ops) next = replaceAt(next, op.path.trim(), op.value);

  let cfg: MonitorConfigV1;
  try {
    cfg = validateMonitorConfigV1(next);
  } catch (e) {
    if (!isDeviceEvaluationError(e)) throw e;
    throw new ThresholdPatchRejected(400, [{ code: "INVALID_EFFECTIVE_CONFIG", path: "patch.ops", message: e.message }]);
  }
  return { cfg, ssot_hash: ssotHash, effective_config_hash: computeConfigHash(cfg) };
}
