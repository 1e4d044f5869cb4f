// Classifier Kernel - Coverage Matrix
//
// Immutable gene x sample coverage values. Built once from a parsed coverage
// table and shared read-only by every iteration of the classifier.

import type { CoverageTableV1 } from "@taxclass/contracts";
import { CoverageMatrixError } from "../errors";

export type CoverageMatrix = {
  // Sample ids in column order.
  readonly samples: ReadonlyArray<string>;
  // Gene ids in input row order.
  readonly genes: ReadonlyArray<number>;
  readonly values: ReadonlyMap<number, ReadonlyMap<string, number>>;
};

/**
 * Builds a matrix from rows keyed by gene id.
 *
 * Every row must hold a finite, non-negative value for every sample.
 */
export function createCoverageMatrix(
  rows: ReadonlyArray<{ gene_callers_id: number; coverage: Readonly<Record<string, number>> }>,
  samples: ReadonlyArray<string>
): CoverageMatrix {
  const values = new Map<number, ReadonlyMap<string, number>>();
  const genes: number[] = [];

  for (const row of rows) {
    const id = row.gene_callers_id;
    if (!Number.isInteger(id) || id < 0) {
      throw new CoverageMatrixError(`gene_callers_id must be a non-negative integer: ${id}`);
    }
    if (values.has(id)) throw new CoverageMatrixError(`duplicate gene_callers_id: ${id}`);

    const perSample = new Map<string, number>();
    for (const s of samples) {
      const v = row.coverage[s];
      if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
        throw new CoverageMatrixError(`invalid coverage for gene ${id} in sample ${s}: ${String(v)}`);
      }
      perSample.set(s, v);
    }
    values.set(id, perSample);
    genes.push(id);
  }

  return Object.freeze({
    samples: Object.freeze([...samples]),
    genes: Object.freeze(genes),
    values,
  });
}

export function matrixFromCoverageTable(table: CoverageTableV1): CoverageMatrix {
  return createCoverageMatrix(table.rows, table.samples);
}

export function coverageAt(matrix: CoverageMatrix, gene: number, sample: string): number {
  const v = matrix.values.get(gene)?.get(sample);
  if (v === undefined) throw new CoverageMatrixError(`no coverage for gene ${gene} in sample ${sample}`);
  return v;
}
