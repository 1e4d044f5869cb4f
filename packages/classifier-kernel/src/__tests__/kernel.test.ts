import assert from "node:assert";
import { describe, it } from "node:test";

import { ClassifierConfigError } from "../errors";
import type { ClassifierEvent } from "../events";
import { classifyGenes } from "../kernel";
import { createCoverageMatrix } from "../matrix/coverage_matrix";

// Two genes tracking the same abundance trend: coverage/mean is constant per gene.
const proportional = createCoverageMatrix(
  [
    { gene_callers_id: 1, coverage: { A: 10, B: 20, C: 30 } },
    { gene_callers_id: 2, coverage: { A: 12, B: 24, C: 36 } },
  ],
  ["A", "B", "C"]
);

const params = { alpha: 0.5, beta: 0.5, gamma: 2, eta: 0.8, max_iterations: 10 };

describe("classifyGenes", () => {
  it("converges to an all-TSC set whose loss is the sum of adjusted variabilities", () => {
    const r = classifyGenes(proportional, params);

    assert.strictEqual(r.status, "CONVERGED");
    assert.strictEqual(r.iterations, 2);
    assert.strictEqual(r.loss_trace.length, 2);
    assert.ok(r.loss < 1e-12);

    const g1 = r.genes.get(1);
    const g2 = r.genes.get(2);
    assert.strictEqual(g1?.gene_class, "TSC");
    assert.strictEqual(g2?.gene_class, "TSC");
    assert.strictEqual(g1?.number_of_detections, 3);
    assert.strictEqual(g1?.detection_in_positive_samples, 3);
    assert.strictEqual(g1?.portion_detected, 1);
    assert.strictEqual(r.loss, (g1?.adjusted_variability ?? NaN) + (g2?.adjusted_variability ?? NaN));

    assert.deepStrictEqual(Array.from(r.genome_detection), [["A", true], ["B", true], ["C", true]]);
    assert.strictEqual(r.summaries[1]?.number_of_TSC, 2);
    assert.strictEqual(r.summaries[1]?.number_of_positive_samples, 3);
  });

  it("stops when consecutive losses differ by less than 2 * beta", () => {
    const r = classifyGenes(proportional, params);
    const [first, second] = r.loss_trace;
    assert.ok(Math.abs((second ?? NaN) - (first ?? NaN)) < 2 * params.beta);
  });

  it("resolves every detected gene to core when no sample is genome-positive", () => {
    // alpha = 1 can never be exceeded, so the genome is absent everywhere.
    const r = classifyGenes(proportional, { ...params, alpha: 1 });
    for (const g of r.genes.values()) {
      assert.strictEqual(g.core_or_accessory, "core");
      assert.strictEqual(g.detection_in_positive_samples, 0);
      assert.strictEqual(g.portion_detected, 0);
    }
    assert.deepStrictEqual(Array.from(r.genome_detection.values()), [false, false, false]);
  });

  describe("with a taxon-specific core set that changes between iterations", () => {
    // Iteration 1 keeps {3, 5}; over those, iteration 2 finds no genome-positive sample and keeps
    // {1, 2, 3}; iteration 3 shrinks the set to {2} and stops.
    const shifting = createCoverageMatrix(
      [
        { gene_callers_id: 1, coverage: { S1: 30, S2: 0, S3: 6, S4: 12 } },
        { gene_callers_id: 2, coverage: { S1: 16, S2: 8, S3: 20, S4: 10 } },
        { gene_callers_id: 3, coverage: { S1: 30, S2: 12, S3: 12, S4: 0 } },
        { gene_callers_id: 4, coverage: { S1: 16, S2: 12, S3: 6, S4: 0 } },
        { gene_callers_id: 5, coverage: { S1: 20, S2: 8, S3: 16, S4: 0 } },
      ],
      ["S1", "S2", "S3", "S4"]
    );
    const shiftingParams = { alpha: 0.5, beta: 0.3, gamma: 0.5, eta: 0.75, max_iterations: 10 };
    const r = classifyGenes(shifting, shiftingParams);

    it("takes each iteration's statistics from the previous TSC set", () => {
      assert.strictEqual(r.status, "CONVERGED");
      assert.strictEqual(r.iterations, 3);
      assert.deepStrictEqual(
        r.summaries.map((s) => [s.number_of_TSC, s.number_of_positive_samples]),
        [
          [2, 3],
          [3, 0],
          [1, 4],
        ]
      );
      // Genes 1-3 each have a single usable ratio or equal ratios over {3, 5}.
      assert.strictEqual(r.loss_trace[1], 0.6);
    });

    it("stops at the first loss change below 2 * beta", () => {
      const [l1, l2, l3] = r.loss_trace;
      const epsilon = 2 * shiftingParams.beta;
      assert.ok(Math.abs((l2 ?? NaN) - (l1 ?? NaN)) >= epsilon);
      assert.ok(Math.abs((l3 ?? NaN) - (l2 ?? NaN)) < epsilon);
      assert.strictEqual(r.loss, l3);
    });

    it("classifies against the last iteration's genome-positive samples", () => {
      assert.deepStrictEqual(
        Array.from(r.genes.values()).map((g) => [g.gene_callers_id, g.gene_class, g.number_of_detections]),
        [
          [1, "TSA", 2],
          [2, "TSC", 3],
          [3, "TNC", 3],
          [4, "UNDETERMINED", 1],
          [5, "TSA", 2],
        ]
      );
    });

    it("detects the genome with the final TSC set as reference", () => {
      // Against {1, 2, 3} every sample is positive; against the final {2}, S1 is not.
      assert.deepStrictEqual(Array.from(r.genome_detection), [
        ["S1", false],
        ["S2", true],
        ["S3", true],
        ["S4", true],
      ]);
    });
  });

  it("reports MAX_ITERATIONS_REACHED when the bound is hit before the stopping test", () => {
    const events: ClassifierEvent[] = [];
    const r = classifyGenes(proportional, { ...params, max_iterations: 1 }, { onEvent: (e) => events.push(e) });

    assert.strictEqual(r.status, "MAX_ITERATIONS_REACHED");
    assert.strictEqual(r.iterations, 1);
    assert.strictEqual(r.genes.get(1)?.gene_class, "TSC");
    assert.deepStrictEqual(events[events.length - 1], {
      type: "max_iterations_reached",
      iterations: 1,
      last_loss_delta: null,
    });
  });

  it("emits one iteration_completed event per iteration", () => {
    const events: ClassifierEvent[] = [];
    classifyGenes(proportional, params, { onEvent: (e) => events.push(e) });
    const done = events.filter((e) => e.type === "iteration_completed");
    assert.deepStrictEqual(
      done.map((e) => (e.type === "iteration_completed" ? [e.summary.iteration, e.converged] : [])),
      [
        [1, false],
        [2, true],
      ]
    );
  });

  it("leaves every gene UNDETERMINED without samples", () => {
    const empty = createCoverageMatrix(
      [
        { gene_callers_id: 7, coverage: {} },
        { gene_callers_id: 8, coverage: {} },
      ],
      []
    );
    const r = classifyGenes(empty, params);
    assert.strictEqual(r.status, "CONVERGED");
    assert.strictEqual(r.loss, 1);
    assert.strictEqual(r.genes.get(7)?.gene_class, "UNDETERMINED");
    assert.strictEqual(r.genes.get(7)?.core_or_accessory, "UNDETERMINED");
    assert.strictEqual(r.genome_detection.size, 0);
  });

  it("rejects a gamma that is not a real number", () => {
    assert.throws(() => classifyGenes(proportional, { ...params, gamma: "3" }), ClassifierConfigError);
    assert.throws(() => classifyGenes(proportional, { ...params, gamma: Number.NaN }), /gamma must be a real number/);
  });

  it("rejects a negative gamma before any work", () => {
    assert.throws(
      () => classifyGenes(proportional, { ...params, gamma: -2 }),
      (err: unknown) => err instanceof ClassifierConfigError && err.issues[0] === "gamma: gamma must be non-negative"
    );
  });

  it("rejects out-of-range fractions and a non-positive beta", () => {
    assert.throws(
      () => classifyGenes(proportional, { ...params, alpha: 1.5, beta: 0 }),
      (err: unknown) => err instanceof ClassifierConfigError && err.issues.length === 2
    );
  });
});
