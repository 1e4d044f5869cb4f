// Coverage table v1: the parsed form of a gene x sample coverage file.
//
// One row per gene (gene_callers_id), one numeric cell per sample column.
// Every row must carry every declared sample; extra keys are rejected.

import { z } from "zod";

export const GeneCallersIdZ = z.number().int().nonnegative();

export const SampleIdZ = z.string().min(1);

export const CoverageRowV1Z = z
  .object({
    gene_callers_id: GeneCallersIdZ,
    coverage: z.record(SampleIdZ, z.number().finite().nonnegative()),
  })
  .strict();

export const CoverageTableV1Z = z
  .object({
    samples: z.array(SampleIdZ),
    rows: z.array(CoverageRowV1Z),
  })
  .strict()
  .superRefine((table, ctx) => {
    const declared = new Set(table.samples);
    if (declared.size !== table.samples.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["samples"], message: "sample ids must be unique" });
    }

    const seen = new Set<number>();
    table.rows.forEach((row, i) => {
      if (seen.has(row.gene_callers_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rows", i, "gene_callers_id"],
          message: `duplicate gene_callers_id ${row.gene_callers_id}`,
        });
      }
      seen.add(row.gene_callers_id);

      for (const s of table.samples) {
        if (!Object.prototype.hasOwnProperty.call(row.coverage, s)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["rows", i, "coverage", s],
            message: `missing coverage for sample ${s}`,
          });
        }
      }
      for (const k of Object.keys(row.coverage)) {
        if (!declared.has(k)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["rows", i, "coverage", k],
            message: `undeclared sample ${k}`,
          });
        }
      }
    });
  });

export type CoverageRowV1 = z.infer<typeof CoverageRowV1Z>;
export type CoverageTableV1 = z.infer<typeof CoverageTableV1Z>;

export function parseCoverageTableV1(input: unknown): CoverageTableV1 {
  return CoverageTableV1Z.parse(input);
}
