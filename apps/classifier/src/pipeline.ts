// apps/classifier/src/pipeline.ts

import type {
  ClassifierConfigV1,
  ClassifierRunOutputV1,
  CoverageTableV1,
  SampleDetectionV1,
} from "@taxclass/contracts";
import { toClassifierParams } from "@taxclass/contracts";
import { classifyGenes, matrixFromCoverageTable } from "@taxclass/classifier-kernel";
import type { ClassificationResult } from "@taxclass/classifier-kernel";

import { computeSsotHash, getManifest, loadDefaultConfig, validateEffectiveConfig } from "./config/ssot";
import type { ClassifierConfigManifestV1 } from "./config/ssot";
import { applyPatch, ClassifierConfigPatchRejected, computeEffectiveConfigHash, parsePatchStrict } from "./config/patch";
import type { ClassifierLogger } from "./logger";
import { forwardClassifierEvents } from "./logger";
import { sha256Hex, stableStringify } from "./util";

export type ClassifierRunInput = {
  coverage: CoverageTableV1;
  options?: {
    // Inline patch (Frozen Manifest v1). Callers may only replace editable knobs.
    config_patch?: unknown;
    include_summaries?: boolean;
  };
};

export type EffectiveConfig = {
  cfg: ClassifierConfigV1;
  ssot_hash: string;
  effective_config_hash: string;
};

export type ClassifierPipelineRun = {
  input_bundle: Record<string, unknown>;
  output: ClassifierRunOutputV1;
  result: ClassificationResult;
};

export class ClassifierPipelineV1 {
  constructor(
    private readonly logger: ClassifierLogger,
    private readonly loadConfig: () => ClassifierConfigV1 = loadDefaultConfig
  ) {}

  manifest(): ClassifierConfigManifestV1 {
    return getManifest(this.loadConfig());
  }

  resolveConfig(patch?: unknown): EffectiveConfig {
    const ssotCfg = this.loadConfig();
    const ssot_hash = computeSsotHash(ssotCfg);
    if (patch === undefined) {
      return { cfg: ssotCfg, ssot_hash, effective_config_hash: computeEffectiveConfigHash(ssotCfg) };
    }

    // Step-1: ops validation (allowlist/type/range)
    const parsed = parsePatchStrict(patch, getManifest(ssotCfg));
    if (!parsed.ok) throw new ClassifierConfigPatchRejected(400, parsed.errors);

    // Step-2: ssot_hash match (409)
    if (parsed.patch.base.ssot_hash !== ssot_hash) {
      throw new ClassifierConfigPatchRejected(409, [
        {
          code: "SSOT_HASH_MISMATCH",
          path: "patch.base.ssot_hash",
          message: `ssot_hash mismatch: got=${parsed.patch.base.ssot_hash} expected=${ssot_hash}`,
        },
      ]);
    }

    // Step-3: apply patch (pure replace), then validate the effective config
    const cfg = validateEffectiveConfig(applyPatch(ssotCfg, parsed.patch));
    return { cfg, ssot_hash, effective_config_hash: computeEffectiveConfigHash(cfg) };
  }

  run(input: ClassifierRunInput): ClassifierPipelineRun {
    const { cfg, ssot_hash, effective_config_hash } = this.resolveConfig(input.options?.config_patch);

    const matrix = matrixFromCoverageTable(input.coverage);
    this.logger.info(
      { genes: matrix.genes.length, samples: matrix.samples.length, effective_config_hash },
      "classifier run started"
    );

    const result = classifyGenes(matrix, toClassifierParams(cfg), {
      onEvent: forwardClassifierEvents(this.logger),
    });

    const input_bundle = {
      pipeline_version: "classifier_pipeline_v1",
      ssot_hash,
      effective_config_hash,
      samples: [...input.coverage.samples],
      rows: input.coverage.rows,
    };
    const determinism_hash = sha256Hex(stableStringify(input_bundle));

    const sample_detection: SampleDetectionV1[] = matrix.samples.map((s) => ({
      samples: s,
      detection: result.genome_detection.get(s) ?? false,
    }));

    const output: ClassifierRunOutputV1 = {
      determinism_hash,
      effective_config_hash,
      status: result.status,
      iterations: result.iterations,
      loss: result.loss,
      loss_trace: [...result.loss_trace],
      genes: Array.from(result.genes.values()),
      sample_detection,
      summaries: input.options?.include_summaries ? [...result.summaries] : undefined,
      run_meta: { pipeline_version: "classifier_pipeline_v1" },
    };

    this.logger.info(
      {
        status: output.status,
        iterations: output.iterations,
        loss: output.loss,
        positive_samples: sample_detection.filter((s) => s.detection).length,
      },
      "classifier run finished"
    );

    return { input_bundle, output, result };
  }
}
