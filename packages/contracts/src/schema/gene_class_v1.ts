import { z } from "zod";

import { GeneCallersIdZ, SampleIdZ } from "./coverage_table_v1";

export const SpecificityV1Z = z.enum(["TS", "TNS", "UNDETERMINED"]); // taxon-specific / non-specific / too few detections

export const CoreAccessoryV1Z = z.enum(["core", "accessory", "UNDETERMINED"]); // UNDETERMINED: never detected

export const GeneClassV1Z = z.enum(["TSC", "TSA", "TNC", "TNA", "UNDETERMINED"]); // combined label

export const ClassifierStatusV1Z = z.enum(["CONVERGED", "MAX_ITERATIONS_REACHED"]);

export const GeneClassRecordV1Z = z
  .object({
    gene_callers_id: GeneCallersIdZ,
    gene_specificity: SpecificityV1Z,
    core_or_accessory: CoreAccessoryV1Z,
    gene_class: GeneClassV1Z,
    number_of_detections: z.number().int().nonnegative(), // across all samples
    detection_in_positive_samples: z.number().int().nonnegative(), // genome-positive samples only
    portion_detected: z.number().min(0).max(1), // 0 when there are no genome-positive samples
    adjusted_variability: z.number().nonnegative(),
  })
  .strict();

export const SampleDetectionV1Z = z
  .object({
    samples: SampleIdZ,
    detection: z.boolean(),
  })
  .strict();

export const IterationSummaryV1Z = z
  .object({
    iteration: z.number().int().min(1),
    loss: z.number(),
    number_of_TS: z.number().int().nonnegative(),
    number_of_TSC: z.number().int().nonnegative(),
    number_of_TSA: z.number().int().nonnegative(),
    number_of_TNC: z.number().int().nonnegative(),
    number_of_TNA: z.number().int().nonnegative(),
    number_of_undetermined: z.number().int().nonnegative(),
    number_of_positive_samples: z.number().int().nonnegative(),
  })
  .strict();

export type SpecificityV1 = z.infer<typeof SpecificityV1Z>;
export type CoreAccessoryV1 = z.infer<typeof CoreAccessoryV1Z>;
export type GeneClassV1 = z.infer<typeof GeneClassV1Z>;
export type ClassifierStatusV1 = z.infer<typeof ClassifierStatusV1Z>;
export type GeneClassRecordV1 = z.infer<typeof GeneClassRecordV1Z>;
export type SampleDetectionV1 = z.infer<typeof SampleDetectionV1Z>;
export type IterationSummaryV1 = z.infer<typeof IterationSummaryV1Z>;
