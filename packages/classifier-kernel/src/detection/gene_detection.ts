// Classifier Kernel - per-gene detection
//
// A gene is detected in a sample iff its coverage exceeds
// max(0, mean - gamma * std) for that sample's current statistics.

import type { CoverageMatrix } from "../matrix/coverage_matrix";
import { coverageAt } from "../matrix/coverage_matrix";
import type { SampleStatistic, SampleStatistics } from "../stats/sample_statistics";
import type { BelowThresholdOccurrence, ClassifierEventSink } from "../events";

export type GeneDetection = {
  readonly gene_callers_id: number;
  readonly detected: ReadonlyMap<string, boolean>;
  // Always equals the number of true flags in `detected`.
  readonly number_of_detections: number;
};

export type GeneDetections = ReadonlyMap<number, GeneDetection>;

export function detectionThreshold(stat: SampleStatistic, gamma: number): number {
  return Math.max(0, stat.mean - gamma * stat.std);
}

export function isDetected(coverage: number, stat: SampleStatistic, gamma: number): boolean {
  return coverage > detectionThreshold(stat, gamma);
}

export function detectGenes(
  matrix: CoverageMatrix,
  samples: ReadonlyArray<string>,
  stats: SampleStatistics,
  gamma: number,
  onEvent?: ClassifierEventSink
): GeneDetections {
  const out = new Map<number, GeneDetection>();
  const belowThreshold: BelowThresholdOccurrence[] = [];

  for (const gene of matrix.genes) {
    const detected = new Map<string, boolean>();
    let n = 0;
    for (const sample of samples) {
      const stat = stats.get(sample) ?? { mean: 0, std: 0 };
      const coverage = coverageAt(matrix, gene, sample);
      const threshold = detectionThreshold(stat, gamma);
      const hit = coverage > threshold;
      detected.set(sample, hit);
      if (hit) n++;
      else if (coverage > 0) belowThreshold.push({ gene_callers_id: gene, sample, coverage, threshold });
    }
    out.set(gene, { gene_callers_id: gene, detected, number_of_detections: n });
  }

  if (belowThreshold.length && onEvent) {
    onEvent({ type: "positive_coverage_not_detected", occurrences: belowThreshold });
  }
  return out;
}

export function isDetectedIn(detections: GeneDetections, gene: number, sample: string): boolean {
  return detections.get(gene)?.detected.get(sample) ?? false;
}

// Detections of `gene` restricted to the given samples.
export function countDetectionsIn(detections: GeneDetections, gene: number, samples: ReadonlyArray<string>): number {
  let n = 0;
  for (const s of samples) if (isDetectedIn(detections, gene, s)) n++;
  return n;
}
