// Classifier Kernel - adjusted variability
//
// Dispersion of a gene's coverage normalised by each sample's mean coverage
// of the current taxon-specific set. Only samples where the gene is detected
// and that mean is strictly positive take part.

import type { CoverageMatrix } from "../matrix/coverage_matrix";
import { coverageAt } from "../matrix/coverage_matrix";
import type { SampleStatistics } from "../stats/sample_statistics";
import { meanOf, std } from "../stats/sample_statistics";
import type { GeneDetections } from "../detection/gene_detection";
import { isDetectedIn } from "../detection/gene_detection";

export type AdjustedVariabilities = ReadonlyMap<number, number>;

export function adjustedVariability(
  matrix: CoverageMatrix,
  gene: number,
  samples: ReadonlyArray<string>,
  stats: SampleStatistics,
  detections: GeneDetections
): number {
  const ratios: number[] = [];
  for (const s of samples) {
    const m = meanOf(stats, s);
    if (isDetectedIn(detections, gene, s) && m > 0) ratios.push(coverageAt(matrix, gene, s) / m);
  }
  if (!ratios.length) return 0;
  return std(ratios);
}

export function computeAdjustedVariabilities(
  matrix: CoverageMatrix,
  samples: ReadonlyArray<string>,
  stats: SampleStatistics,
  detections: GeneDetections
): AdjustedVariabilities {
  const out = new Map<number, number>();
  for (const gene of matrix.genes) {
    out.set(gene, adjustedVariability(matrix, gene, samples, stats, detections));
  }
  return out;
}
