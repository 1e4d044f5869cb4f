import type { GeneDetections } from "./gene_detection";
import { isDetectedIn } from "./gene_detection";

export type GenomeDetection = ReadonlyMap<string, boolean>;

/**
 * The genome is detected in a sample iff strictly more than alpha * |reference|
 * reference genes are detected there. An empty or absent reference set means
 * every gene in `detections`.
 */
export function detectGenome(
  detections: GeneDetections,
  samples: ReadonlyArray<string>,
  alpha: number,
  referenceGenes?: ReadonlyArray<number>
): GenomeDetection {
  const reference = referenceGenes && referenceGenes.length ? referenceGenes : Array.from(detections.keys());
  const out = new Map<string, boolean>();
  for (const sample of samples) {
    let detected = 0;
    for (const gene of reference) if (isDetectedIn(detections, gene, sample)) detected++;
    out.set(sample, detected > alpha * reference.length);
  }
  return out;
}

export function positiveSamples(genome: GenomeDetection, samples: ReadonlyArray<string>): string[] {
  return samples.filter((s) => genome.get(s) === true);
}
