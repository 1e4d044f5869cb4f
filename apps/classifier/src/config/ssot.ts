// Classifier Config SSOT / Manifest helpers (v1).
//
// Contract:
// - SSOT file: config/classifier/default.json
// - ssot_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix
// - manifest lists the only paths a run may override

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { ClassifierConfigV1Z } from "@taxclass/contracts";
import type { ClassifierConfigV1 } from "@taxclass/contracts";
import { ClassifierConfigError } from "@taxclass/classifier-kernel";

import { findRepoRoot, nowMs, sha256Hex, stableStringify } from "../util";

export const SSOT_RELATIVE_PATH = "config/classifier/default.json";

export type ManifestValueType = "int" | "number";

export const EDITABLE_PATHS = ["alpha", "beta", "gamma", "eta", "max_iterations"] as const;

export type ClassifierConfigEditableItem = {
  path: (typeof EDITABLE_PATHS)[number];
  type: ManifestValueType;
  min: number;
  max: number;
  description?: string;
};

export type ClassifierConfigManifestV1 = {
  ssot: {
    source: typeof SSOT_RELATIVE_PATH;
    schema_version: string;
    ssot_hash: string;
    updated_at_ts: number;
  };
  patch: {
    patch_version: "1.0.0";
    op_allowed: ["replace"];
    unknown_keys_policy: "reject";
  };
  editable: ClassifierConfigEditableItem[];
  defaults: Record<string, number>;
};

function resolveRepoRoot(): string {
  // 1) explicit override (CI / dev convenience)
  if (process.env.TAXCLASS_REPO_ROOT) return path.resolve(process.env.TAXCLASS_REPO_ROOT);

  // 2) walk upward from this file, then from cwd
  const here = path.dirname(fileURLToPath(import.meta.url));
  try {
    return findRepoRoot(here, SSOT_RELATIVE_PATH);
  } catch {
    return findRepoRoot(process.cwd(), SSOT_RELATIVE_PATH);
  }
}

/**
 * Structural + range validation of a full config object.
 */
export function validateEffectiveConfig(cfg: unknown): ClassifierConfigV1 {
  const r = ClassifierConfigV1Z.safeParse(cfg);
  if (!r.success) {
    throw new ClassifierConfigError(r.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`));
  }
  return r.data;
}

export function loadDefaultConfig(): ClassifierConfigV1 {
  const p = path.join(resolveRepoRoot(), SSOT_RELATIVE_PATH);
  const raw = fs.readFileSync(p, "utf8");
  return validateEffectiveConfig(JSON.parse(raw));
}

export function computeSsotHash(cfg: ClassifierConfigV1): string {
  return `sha256:${sha256Hex(stableStringify(cfg))}`;
}

// Frozen V1 allowlist
const EDITABLE: ReadonlyArray<ClassifierConfigEditableItem> = [
  { path: "alpha", type: "number", min: 0, max: 1, description: "Fraction of reference genes required for genome detection" },
  { path: "beta", type: "number", min: 1e-9, max: 1e9, description: "Adjusted-variability threshold and loss penalty" },
  { path: "gamma", type: "number", min: 0, max: 1000, description: "Detection sensitivity in standard deviations" },
  { path: "eta", type: "number", min: 0, max: 1, description: "Fraction of genome-positive samples for a core gene" },
  { path: "max_iterations", type: "int", min: 1, max: 100000, description: "Safety bound on the fixed-point iteration" },
];

export function getManifest(cfg: ClassifierConfigV1): ClassifierConfigManifestV1 {
  const defaults: Record<string, number> = {};
  for (const it of EDITABLE) defaults[it.path] = cfg[it.path];

  return {
    ssot: {
      source: SSOT_RELATIVE_PATH,
      schema_version: cfg.schema_version,
      ssot_hash: computeSsotHash(cfg),
      updated_at_ts: nowMs(),
    },
    patch: {
      patch_version: "1.0.0",
      op_allowed: ["replace"],
      unknown_keys_policy: "reject",
    },
    editable: EDITABLE.map((it) => ({ ...it })),
    defaults,
  };
}
