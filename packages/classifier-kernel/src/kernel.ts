// Classifier Kernel - fixed-point classification entrypoint (v1)
//
// Each iteration:
// 1) sample statistics over the current taxon-specific set
// 2) per-gene detection, then genome detection per sample
// 3) adjusted variability per gene
// 4) specificity, core/accessory and combined class per gene
// 5) loss, stopping test, next taxon-specific set (TSC genes)
//
// Only the taxon-specific set and the previous loss are carried between
// iterations; every record is rebuilt from scratch and frozen.
//
// No IO. No side effects beyond the optional event sink.

import type {
  ClassifierParamsV1,
  ClassifierStatusV1,
  GeneClassRecordV1,
  IterationSummaryV1,
  SpecificityV1,
} from "@taxclass/contracts";
import type { CoverageMatrix } from "./matrix/coverage_matrix";
import type { ClassifierEventSink } from "./events";
import { assertClassifierParams } from "./params";
import { computeSampleStatistics } from "./stats/sample_statistics";
import { countDetectionsIn, detectGenes } from "./detection/gene_detection";
import type { GeneDetections } from "./detection/gene_detection";
import { detectGenome, positiveSamples } from "./detection/genome_detection";
import type { GenomeDetection } from "./detection/genome_detection";
import { computeAdjustedVariabilities } from "./variability/adjusted_variability";
import { resolveSpecificity } from "./rules/specificity";
import { resolveCoreAccessory } from "./rules/core_accessory";
import { resolveGeneClass } from "./rules/gene_class";
import { computeLoss } from "./loss/loss_function";

export type ClassifyOptions = {
  onEvent?: ClassifierEventSink;
};

export type ClassificationResult = {
  status: ClassifierStatusV1;
  iterations: number;
  loss: number;
  // Loss after each iteration, in order.
  loss_trace: ReadonlyArray<number>;
  genes: ReadonlyMap<number, GeneClassRecordV1>;
  // Computed after the loop with the final TSC set as reference.
  genome_detection: GenomeDetection;
  summaries: ReadonlyArray<IterationSummaryV1>;
};

type IterationSnapshot = {
  detections: GeneDetections;
  genes: ReadonlyMap<number, GeneClassRecordV1>;
  loss: number;
  summary: IterationSummaryV1;
};

/**
 * Classifies every gene of `matrix` into TSC/TSA/TNC/TNA (or UNDETERMINED).
 *
 * @param params - Unvalidated parameters; rejected with ClassifierConfigError before any work.
 * @returns CONVERGED once two consecutive losses differ by less than 2*beta,
 *          MAX_ITERATIONS_REACHED if the safety bound is hit first.
 */
export function classifyGenes(matrix: CoverageMatrix, params: unknown, options: ClassifyOptions = {}): ClassificationResult {
  const p = assertClassifierParams(params);
  const samples = matrix.samples;
  const epsilon = 2 * p.beta;

  let taxonSpecificGenes: ReadonlyArray<number> = matrix.genes;
  let previousLoss: number | undefined;
  let converged = false;
  let lastDelta: number | null = null;

  const lossTrace: number[] = [];
  const summaries: IterationSummaryV1[] = [];
  let snapshot: IterationSnapshot | undefined;

  for (let iteration = 1; iteration <= p.max_iterations && !converged; iteration++) {
    snapshot = runIteration(matrix, samples, taxonSpecificGenes, p, iteration, options.onEvent);

    if (previousLoss !== undefined) {
      lastDelta = Math.abs(snapshot.loss - previousLoss);
      converged = lastDelta < epsilon;
    }
    previousLoss = snapshot.loss;
    lossTrace.push(snapshot.loss);
    summaries.push(snapshot.summary);
    options.onEvent?.({ type: "iteration_completed", summary: snapshot.summary, converged });

    taxonSpecificGenes = tscGenes(snapshot.genes);
  }

  // max_iterations >= 1 is enforced by the params schema.
  if (!snapshot) throw new Error("classifier ran zero iterations");

  if (!converged) {
    options.onEvent?.({ type: "max_iterations_reached", iterations: lossTrace.length, last_loss_delta: lastDelta });
  }

  const genome_detection = detectGenome(snapshot.detections, samples, p.alpha, taxonSpecificGenes);

  const result: ClassificationResult = {
    status: converged ? "CONVERGED" : "MAX_ITERATIONS_REACHED",
    iterations: lossTrace.length,
    loss: snapshot.loss,
    loss_trace: Object.freeze(lossTrace),
    genes: snapshot.genes,
    genome_detection,
    summaries: Object.freeze(summaries),
  };
  return Object.freeze(result);
}

function runIteration(
  matrix: CoverageMatrix,
  samples: ReadonlyArray<string>,
  taxonSpecificGenes: ReadonlyArray<number>,
  p: ClassifierParamsV1,
  iteration: number,
  onEvent?: ClassifierEventSink
): IterationSnapshot {
  const stats = computeSampleStatistics(matrix, samples, taxonSpecificGenes);
  const detections = detectGenes(matrix, samples, stats, p.gamma, onEvent);
  const genome = detectGenome(detections, samples, p.alpha, taxonSpecificGenes);
  const withGenome = positiveSamples(genome, samples);
  const variabilities = computeAdjustedVariabilities(matrix, samples, stats, detections);

  const specificities = new Map<number, SpecificityV1>();
  for (const gene of matrix.genes) {
    const n = detections.get(gene)?.number_of_detections ?? 0;
    specificities.set(gene, resolveSpecificity(n, variabilities.get(gene) ?? 0, p.beta));
  }
  const loss = computeLoss(specificities, variabilities, p.beta);

  const genes = new Map<number, GeneClassRecordV1>();
  for (const gene of matrix.genes) {
    const n = detections.get(gene)?.number_of_detections ?? 0;
    const inPositive = countDetectionsIn(detections, gene, withGenome);
    const gene_specificity = specificities.get(gene) ?? "UNDETERMINED";
    const core_or_accessory = resolveCoreAccessory(n, inPositive, withGenome.length, p.eta);
    genes.set(
      gene,
      Object.freeze({
        gene_callers_id: gene,
        gene_specificity,
        core_or_accessory,
        gene_class: resolveGeneClass(gene_specificity, core_or_accessory),
        number_of_detections: n,
        detection_in_positive_samples: inPositive,
        portion_detected: inPositive === 0 ? 0 : inPositive / withGenome.length,
        adjusted_variability: variabilities.get(gene) ?? 0,
      })
    );
  }

  return {
    detections,
    genes,
    loss,
    summary: summarizeIteration(iteration, loss, genes, withGenome.length),
  };
}

export function tscGenes(genes: ReadonlyMap<number, GeneClassRecordV1>): number[] {
  const out: number[] = [];
  for (const r of genes.values()) if (r.gene_class === "TSC") out.push(r.gene_callers_id);
  return out;
}

export function summarizeIteration(
  iteration: number,
  loss: number,
  genes: ReadonlyMap<number, GeneClassRecordV1>,
  positiveSampleCount: number
): IterationSummaryV1 {
  const summary: IterationSummaryV1 = {
    iteration,
    loss,
    number_of_TS: 0,
    number_of_TSC: 0,
    number_of_TSA: 0,
    number_of_TNC: 0,
    number_of_TNA: 0,
    number_of_undetermined: 0,
    number_of_positive_samples: positiveSampleCount,
  };
  for (const r of genes.values()) {
    if (r.gene_specificity === "TS") summary.number_of_TS++;
    if (r.gene_class === "TSC") summary.number_of_TSC++;
    else if (r.gene_class === "TSA") summary.number_of_TSA++;
    else if (r.gene_class === "TNC") summary.number_of_TNC++;
    else if (r.gene_class === "TNA") summary.number_of_TNA++;
    else summary.number_of_undetermined++;
  }
  return summary;
}
