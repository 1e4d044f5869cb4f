// Classifier Config Patch (Frozen Manifest v1).
//
// Contract:
// - replace-only ops
// - path must be in manifest.editable
// - unknown keys are rejected (static refusal)
// - ssot_hash mismatch is 409

import type { ClassifierConfigV1 } from "@taxclass/contracts";

import { isObj, sha256Hex, stableStringify } from "../util";
import { EDITABLE_PATHS } from "./ssot";
import type { ClassifierConfigEditableItem, ClassifierConfigManifestV1 } from "./ssot";

export type ClassifierConfigPatchOpV1 = {
  op: "replace";
  path: ClassifierConfigEditableItem["path"];
  value: number;
};

export type ClassifierConfigPatchV1 = {
  patch_version: "1.0.0";
  base: {
    ssot_hash: string;
  };
  ops: ClassifierConfigPatchOpV1[];
};

export type PatchValidationError = {
  code:
    | "INVALID_PATCH_SCHEMA"
    | "UNKNOWN_KEYS"
    | "SSOT_HASH_MISMATCH"
    | "PATH_NOT_ALLOWED"
    | "VALUE_TYPE_MISMATCH"
    | "VALUE_OUT_OF_RANGE";
  path: string;
  message: string;
  meta?: Record<string, unknown>;
};

export class ClassifierConfigPatchRejected extends Error {
  public readonly status: number;
  public readonly errors: PatchValidationError[];

  constructor(status: number, errors: PatchValidationError[]) {
    super(errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "ClassifierConfigPatchRejected";
    this.status = status;
    this.errors = errors;
  }
}

function unknownKeys(obj: Record<string, unknown>, allow: string[]): string[] {
  const s = new Set(allow);
  return Object.keys(obj).filter((k) => !s.has(k));
}

export function computeEffectiveConfigHash(cfg: ClassifierConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

export type PatchParseResult =
  | { ok: true; patch: ClassifierConfigPatchV1 }
  | { ok: false; errors: PatchValidationError[] };

/**
 * Strict schema + allowlist validation. Collects every violation instead of
 * stopping at the first one.
 */
export function parsePatchStrict(patch: unknown, manifest: ClassifierConfigManifestV1): PatchParseResult {
  const errors: PatchValidationError[] = [];

  if (!isObj(patch)) {
    return { ok: false, errors: [{ code: "INVALID_PATCH_SCHEMA", path: "patch", message: "patch must be object" }] };
  }

  const uk = unknownKeys(patch, ["patch_version", "base", "ops"]);
  if (uk.length) {
    errors.push({ code: "UNKNOWN_KEYS", path: "patch", message: `unknown keys: ${uk.join(",")}` });
  }

  if (patch.patch_version !== "1.0.0") {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.patch_version", message: "patch_version must be 1.0.0" });
  }

  const base = patch.base;
  let ssot_hash = "";
  if (!isObj(base)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.base", message: "base must be object" });
  } else {
    const ukb = unknownKeys(base, ["ssot_hash"]);
    if (ukb.length) {
      errors.push({ code: "UNKNOWN_KEYS", path: "patch.base", message: `unknown keys: ${ukb.join(",")}` });
    }
    if (typeof base.ssot_hash !== "string") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.base.ssot_hash", message: "ssot_hash must be string" });
    } else {
      ssot_hash = base.ssot_hash;
    }
  }

  const ops = patch.ops;
  if (!Array.isArray(ops)) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.ops", message: "ops must be array" });
    return { ok: false, errors };
  }

  const validOps: ClassifierConfigPatchOpV1[] = [];

  const allowed = new Map<string, ClassifierConfigEditableItem>();
  for (const it of manifest.editable) allowed.set(it.path, it);

  ops.forEach((op: unknown, i) => {
    const basePath = `patch.ops[${i}]`;
    if (!isObj(op)) {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: basePath, message: "op must be object" });
      return;
    }
    const uko = unknownKeys(op, ["op", "path", "value"]);
    if (uko.length) {
      errors.push({ code: "UNKNOWN_KEYS", path: basePath, message: `unknown keys: ${uko.join(",")}` });
    }

    if (op.op !== "replace") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${basePath}.op`, message: "op must be replace" });
    }
    if (typeof op.path !== "string" || op.path.trim() === "") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${basePath}.path`, message: "path must be string" });
      return;
    }
    const p = op.path.trim();
    const rule = allowed.get(p);
    if (!rule) {
      errors.push({ code: "PATH_NOT_ALLOWED", path: `${basePath}.path`, message: `path not allowed: ${p}` });
      return;
    }

    // Type / range validation
    const v = op.value;
    if (typeof v !== "number" || !Number.isFinite(v) || (rule.type === "int" && !Number.isInteger(v))) {
      errors.push({
        code: "VALUE_TYPE_MISMATCH",
        path: `${basePath}.value`,
        message: rule.type === "int" ? "value must be int" : "value must be a real number",
      });
      return;
    }
    if (v < rule.min) {
      errors.push({ code: "VALUE_OUT_OF_RANGE", path: `${basePath}.value`, message: "value below min", meta: { min: rule.min, max: rule.max } });
    }
    if (v > rule.max) {
      errors.push({ code: "VALUE_OUT_OF_RANGE", path: `${basePath}.value`, message: "value above max", meta: { min: rule.min, max: rule.max } });
    }
    validOps.push({ op: "replace", path: rule.path, value: v });
  });

  if (errors.length) return { ok: false, errors };
  return { ok: true, patch: { patch_version: "1.0.0", base: { ssot_hash }, ops: validOps } };
}

export function applyPatch(cfg: ClassifierConfigV1, patch: ClassifierConfigPatchV1): ClassifierConfigV1 {
  // Pure replace-only application; caller must validate first.
  const out: ClassifierConfigV1 = { ...cfg };
  for (const op of patch.ops) {
    out[op.path] = op.value;
  }
  return out;
}

/**
 * Builds a replace-only patch from plain overrides (CLI flags).
 */
export function patchFromOverrides(
  ssot_hash: string,
  overrides: Partial<Record<ClassifierConfigEditableItem["path"], number>>
): ClassifierConfigPatchV1 {
  const ops: ClassifierConfigPatchOpV1[] = [];
  for (const k of EDITABLE_PATHS) {
    const v = overrides[k];
    if (v !== undefined) ops.push({ op: "replace", path: k, value: v });
  }
  return { patch_version: "1.0.0", base: { ssot_hash }, ops };
}
