import type { CoverageMatrix } from "../matrix/coverage_matrix";
import { coverageAt } from "../matrix/coverage_matrix";

export type SampleStatistic = { mean: number; std: number };

export type SampleStatistics = ReadonlyMap<string, SampleStatistic>;

export function mean(xs: ReadonlyArray<number>): number {
  if (!xs.length) return 0;
  let sum = 0;
  for (const x of xs) sum += x;
  return sum / xs.length;
}

// Population standard deviation (divides by n).
export function std(xs: ReadonlyArray<number>): number {
  if (!xs.length) return 0;
  const m = mean(xs);
  let acc = 0;
  for (const x of xs) acc += (x - m) * (x - m);
  return Math.sqrt(acc / xs.length);
}

/**
 * Mean and standard deviation of coverage per sample, over exactly the genes
 * in `genes`. An empty or absent gene subset means all genes.
 */
export function computeSampleStatistics(
  matrix: CoverageMatrix,
  samples: ReadonlyArray<string>,
  genes?: ReadonlyArray<number>
): SampleStatistics {
  const subset = genes && genes.length ? genes : matrix.genes;
  const out = new Map<string, SampleStatistic>();
  for (const s of samples) {
    const xs = subset.map((g) => coverageAt(matrix, g, s));
    out.set(s, { mean: mean(xs), std: std(xs) });
  }
  return out;
}

// Sentinel 0 for a sample without statistics (e.g. an empty sample list).
export function meanOf(stats: SampleStatistics, sample: string): number {
  return stats.get(sample)?.mean ?? 0;
}
