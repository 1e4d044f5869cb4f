import { z } from "zod";

const SemVerZ = z.string().regex(/^\d+\.\d+\.\d+$/);

const FractionZ = z.number().finite().min(0).max(1);

export const ClassifierParamsV1Z = z
  .object({
    // Fraction of reference genes that must be detected for the genome to count as present.
    alpha: FractionZ,
    // Dispersion threshold for TS/TNS and the flat loss penalty; 2*beta is the stopping epsilon.
    beta: z.number().finite().positive(),
    // Detection sensitivity in standard deviations below the sample mean.
    gamma: z
      .number({ invalid_type_error: "gamma must be a real number" })
      .finite("gamma must be a real number")
      .min(0, "gamma must be non-negative"),
    // Fraction of genome-positive samples a gene must be detected in to be core.
    eta: FractionZ,
    // Safety bound on the fixed-point iteration.
    max_iterations: z.number().int().min(1).max(100000),
  })
  .strict();

export const ClassifierConfigV1Z = ClassifierParamsV1Z.extend({
  schema_version: SemVerZ,
}).strict();

export type ClassifierParamsV1 = z.infer<typeof ClassifierParamsV1Z>;
export type ClassifierConfigV1 = z.infer<typeof ClassifierConfigV1Z>;

export function parseClassifierConfigV1(input: unknown): ClassifierConfigV1 {
  return ClassifierConfigV1Z.parse(input);
}

/**
 * Strips the SSOT envelope fields and keeps only what the kernel consumes.
 */
export function toClassifierParams(cfg: ClassifierConfigV1): ClassifierParamsV1 {
  return {
    alpha: cfg.alpha,
    beta: cfg.beta,
    gamma: cfg.gamma,
    eta: cfg.eta,
    max_iterations: cfg.max_iterations,
  };
}
