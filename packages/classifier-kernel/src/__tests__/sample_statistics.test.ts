import assert from "node:assert";
import { describe, it } from "node:test";

import { createCoverageMatrix } from "../matrix/coverage_matrix";
import { computeSampleStatistics, mean, meanOf, std } from "../stats/sample_statistics";

const matrix = createCoverageMatrix(
  [
    { gene_callers_id: 1, coverage: { A: 2, B: 0 } },
    { gene_callers_id: 2, coverage: { A: 4, B: 6 } },
    { gene_callers_id: 3, coverage: { A: 6, B: 3 } },
  ],
  ["A", "B"]
);

describe("mean / std", () => {
  it("uses the population standard deviation", () => {
    assert.strictEqual(mean([2, 4]), 3);
    assert.strictEqual(std([0, 6]), 3);
  });

  it("returns 0 for an empty list", () => {
    assert.strictEqual(mean([]), 0);
    assert.strictEqual(std([]), 0);
  });
});

describe("computeSampleStatistics", () => {
  it("uses every gene when no subset is given", () => {
    const stats = computeSampleStatistics(matrix, matrix.samples);
    assert.deepStrictEqual(stats.get("A"), { mean: 4, std: Math.sqrt(8 / 3) });
    assert.deepStrictEqual(stats.get("B"), { mean: 3, std: Math.sqrt(6) });
  });

  it("treats an empty subset as every gene", () => {
    const stats = computeSampleStatistics(matrix, matrix.samples, []);
    assert.strictEqual(stats.get("A")?.mean, 4);
  });

  it("restricts to exactly the subset", () => {
    const stats = computeSampleStatistics(matrix, matrix.samples, [1, 2]);
    assert.deepStrictEqual(stats.get("A"), { mean: 3, std: 1 });
    assert.deepStrictEqual(stats.get("B"), { mean: 3, std: 3 });
  });

  it("yields no statistics and a zero mean sentinel without samples", () => {
    const stats = computeSampleStatistics(matrix, []);
    assert.strictEqual(stats.size, 0);
    assert.strictEqual(meanOf(stats, "A"), 0);
  });
});
