// Classifier Kernel - observable events
//
// The kernel performs no IO. Hosts that want progress or diagnostics pass an
// `onEvent` callback; events never alter the computed result.

import type { IterationSummaryV1 } from "@taxclass/contracts";

export type BelowThresholdOccurrence = {
  gene_callers_id: number;
  sample: string;
  coverage: number;
  threshold: number;
};

export type ClassifierEvent =
  | {
      // Strictly positive coverage that still fell at or below the detection threshold.
      type: "positive_coverage_not_detected";
      occurrences: ReadonlyArray<BelowThresholdOccurrence>;
    }
  | {
      type: "iteration_completed";
      summary: IterationSummaryV1;
      converged: boolean;
    }
  | {
      type: "max_iterations_reached";
      iterations: number;
      last_loss_delta: number | null;
    };

export type ClassifierEventSink = (event: ClassifierEvent) => void;
