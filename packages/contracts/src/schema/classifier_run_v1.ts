// Run envelope accepted by POST /api/classifier/run and produced by the pipeline.

import { z } from "zod";

import { CoverageTableV1Z } from "./coverage_table_v1";
import {
  ClassifierStatusV1Z,
  GeneClassRecordV1Z,
  IterationSummaryV1Z,
  SampleDetectionV1Z,
} from "./gene_class_v1";

export const ClassifierRunRequestV1Z = z
  .object({
    coverage: CoverageTableV1Z,
    options: z
      .object({
        // Replace-only patch against the SSOT config; validated by the config layer, not here.
        config_patch: z.unknown().optional(),
        include_summaries: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export const ClassifierRunOutputV1Z = z
  .object({
    determinism_hash: z.string().min(1),
    effective_config_hash: z.string().min(1),
    status: ClassifierStatusV1Z,
    iterations: z.number().int().min(1),
    loss: z.number(),
    loss_trace: z.array(z.number()),
    genes: z.array(GeneClassRecordV1Z),
    sample_detection: z.array(SampleDetectionV1Z),
    summaries: z.array(IterationSummaryV1Z).optional(),
    run_meta: z
      .object({
        pipeline_version: z.literal("classifier_pipeline_v1"),
      })
      .strict(),
  })
  .strict();

export type ClassifierRunRequestV1 = z.infer<typeof ClassifierRunRequestV1Z>;
export type ClassifierRunOutputV1 = z.infer<typeof ClassifierRunOutputV1Z>;
