import assert from "node:assert";
import { after, describe, it } from "node:test";

import type { ClassifierConfigV1 } from "@taxclass/contracts";

import { buildClassifierServer } from "../app";
import { computeSsotHash } from "../config/ssot";
import type { ClassifierLogger } from "../logger";
import { ClassifierPipelineV1 } from "../pipeline";

const cfg: ClassifierConfigV1 = { schema_version: "1.0.0", alpha: 0.5, beta: 0.5, gamma: 2, eta: 0.8, max_iterations: 10 };

const quiet: ClassifierLogger = {
  info: () => undefined,
  debug: () => undefined,
  warn: () => undefined,
};

const app = buildClassifierServer({ logger: false, pipeline: new ClassifierPipelineV1(quiet, () => cfg) });
after(() => app.close());

const coverage = {
  samples: ["A", "B", "C"],
  rows: [
    { gene_callers_id: 1, coverage: { A: 10, B: 20, C: 30 } },
    { gene_callers_id: 2, coverage: { A: 12, B: 24, C: 36 } },
  ],
};

describe("classifier routes", () => {
  it("GET /api/health", async () => {
    const res = await app.inject({ method: "GET", url: "/api/health" });
    assert.strictEqual(res.statusCode, 200);
    assert.deepStrictEqual(res.json(), { ok: true });
  });

  it("GET /api/classifier/config returns the manifest", async () => {
    const res = await app.inject({ method: "GET", url: "/api/classifier/config" });
    assert.strictEqual(res.statusCode, 200);
    const body = res.json();
    assert.strictEqual(body.ssot.ssot_hash, computeSsotHash(cfg));
    assert.deepStrictEqual(body.patch, { patch_version: "1.0.0", op_allowed: ["replace"], unknown_keys_policy: "reject" });
  });

  it("POST /api/classifier/run classifies the posted table", async () => {
    const res = await app.inject({ method: "POST", url: "/api/classifier/run", payload: { coverage } });
    assert.strictEqual(res.statusCode, 200);
    const body = res.json();
    assert.strictEqual(body.status, "CONVERGED");
    assert.deepStrictEqual(
      body.genes.map((g: { gene_class: string }) => g.gene_class),
      ["TSC", "TSC"]
    );
    assert.strictEqual(res.headers["access-control-allow-origin"], "*");
  });

  it("POST /api/classifier/run rejects a body without coverage", async () => {
    const res = await app.inject({ method: "POST", url: "/api/classifier/run", payload: { options: {} } });
    assert.strictEqual(res.statusCode, 400);
    const body = res.json();
    assert.strictEqual(body.errors[0].code, "INVALID_REQUEST");
    assert.strictEqual(body.errors[0].path, "coverage");
  });

  it("POST /api/classifier/run rejects duplicate genes", async () => {
    const dup = { samples: ["A"], rows: [{ gene_callers_id: 1, coverage: { A: 1 } }, { gene_callers_id: 1, coverage: { A: 2 } }] };
    const res = await app.inject({ method: "POST", url: "/api/classifier/run", payload: { coverage: dup } });
    assert.strictEqual(res.statusCode, 400);
    assert.strictEqual(res.json().errors[0].message, "duplicate gene_callers_id 1");
  });

  it("POST /api/classifier/run answers 409 on a stale ssot_hash", async () => {
    const config_patch = { patch_version: "1.0.0", base: { ssot_hash: "sha256:stale" }, ops: [{ op: "replace", path: "gamma", value: 1 }] };
    const res = await app.inject({ method: "POST", url: "/api/classifier/run", payload: { coverage, options: { config_patch } } });
    assert.strictEqual(res.statusCode, 409);
    assert.strictEqual(res.json().errors[0].code, "SSOT_HASH_MISMATCH");
  });

  it("POST /api/classifier/run answers 400 on an out-of-range knob", async () => {
    const config_patch = { patch_version: "1.0.0", base: { ssot_hash: computeSsotHash(cfg) }, ops: [{ op: "replace", path: "eta", value: 1.5 }] };
    const res = await app.inject({ method: "POST", url: "/api/classifier/run", payload: { coverage, options: { config_patch } } });
    assert.strictEqual(res.statusCode, 400);
    assert.strictEqual(res.json().errors[0].code, "VALUE_OUT_OF_RANGE");
  });
});
