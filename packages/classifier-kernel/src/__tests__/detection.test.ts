import assert from "node:assert";
import { describe, it } from "node:test";

import type { ClassifierEvent } from "../events";
import { createCoverageMatrix } from "../matrix/coverage_matrix";
import { detectGenes, detectionThreshold, isDetected } from "../detection/gene_detection";
import { detectGenome, positiveSamples } from "../detection/genome_detection";
import type { SampleStatistics } from "../stats/sample_statistics";

const matrix = createCoverageMatrix(
  [
    { gene_callers_id: 1, coverage: { A: 10, B: 1 } },
    { gene_callers_id: 2, coverage: { A: 0, B: 8 } },
  ],
  ["A", "B"]
);

const stats: SampleStatistics = new Map([
  ["A", { mean: 5, std: 1 }],
  ["B", { mean: 4, std: 1 }],
]);

describe("detectionThreshold", () => {
  it("clamps at zero: coverage 5, mean 2, std 1, gamma 2 is detected", () => {
    assert.strictEqual(detectionThreshold({ mean: 2, std: 1 }, 2), 0);
    assert.strictEqual(isDetected(5, { mean: 2, std: 1 }, 2), true);
  });

  it("requires coverage strictly above the threshold", () => {
    assert.strictEqual(isDetected(4, { mean: 5, std: 1 }, 1), false);
    assert.strictEqual(isDetected(0, { mean: 0, std: 0 }, 3), false);
  });
});

describe("detectGenes", () => {
  it("flags each gene/sample and counts true flags", () => {
    const d = detectGenes(matrix, matrix.samples, stats, 1);
    assert.deepStrictEqual(Array.from(d.get(1)?.detected ?? []), [["A", true], ["B", false]]);
    assert.deepStrictEqual(Array.from(d.get(2)?.detected ?? []), [["A", false], ["B", true]]);
    assert.strictEqual(d.get(1)?.number_of_detections, 1);
    assert.strictEqual(d.get(2)?.number_of_detections, 1);
  });

  it("reports positive coverage that is not detected without changing the result", () => {
    const events: ClassifierEvent[] = [];
    const d = detectGenes(matrix, matrix.samples, stats, 1, (e) => events.push(e));
    assert.deepStrictEqual(events, [
      {
        type: "positive_coverage_not_detected",
        occurrences: [{ gene_callers_id: 1, sample: "B", coverage: 1, threshold: 3 }],
      },
    ]);
    assert.strictEqual(d.get(1)?.detected.get("B"), false);
  });

  it("emits nothing when every positive coverage is detected", () => {
    const events: ClassifierEvent[] = [];
    detectGenes(matrix, matrix.samples, stats, 10, (e) => events.push(e));
    assert.strictEqual(events.length, 0);
  });
});

describe("detectGenome", () => {
  const d = detectGenes(matrix, matrix.samples, stats, 1);

  it("needs strictly more than alpha * |reference| detected genes", () => {
    const g = detectGenome(d, matrix.samples, 0.5);
    assert.deepStrictEqual(Array.from(g), [["A", false], ["B", false]]);
  });

  it("passes once the count exceeds the fraction", () => {
    const g = detectGenome(d, matrix.samples, 0.4);
    assert.deepStrictEqual(Array.from(g), [["A", true], ["B", true]]);
  });

  it("uses only the reference genes when given", () => {
    const g = detectGenome(d, matrix.samples, 0.5, [1]);
    assert.deepStrictEqual(Array.from(g), [["A", true], ["B", false]]);
    assert.deepStrictEqual(positiveSamples(g, matrix.samples), ["A"]);
  });

  it("falls back to all genes for an empty reference", () => {
    const g = detectGenome(d, matrix.samples, 0.4, []);
    assert.deepStrictEqual(positiveSamples(g, matrix.samples), ["A", "B"]);
  });
});
