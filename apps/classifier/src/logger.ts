import pino from "pino";

import type { ClassifierEventSink } from "@taxclass/classifier-kernel";

// The subset of a pino / Fastify logger the classifier writes to.
export type ClassifierLogger = {
  info(obj: object, msg?: string): void;
  debug(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
};

export function createLogger(level = process.env.LOG_LEVEL ?? "info"): pino.Logger {
  return pino({ name: "taxclass", level });
}

/**
 * Routes kernel events to a logger. Detailed below-threshold occurrences only
 * go out at debug level.
 */
export function forwardClassifierEvents(logger: ClassifierLogger): ClassifierEventSink {
  return (event) => {
    switch (event.type) {
      case "iteration_completed":
        logger.info({ ...event.summary, converged: event.converged }, "classifier iteration completed");
        break;
      case "positive_coverage_not_detected":
        logger.info(
          { occurrences: event.occurrences.length },
          "some genes in some samples were marked as not detected due to the detection criteria"
        );
        logger.debug({ occurrences: event.occurrences }, "positive coverage below detection threshold");
        break;
      case "max_iterations_reached":
        logger.warn(
          { iterations: event.iterations, last_loss_delta: event.last_loss_delta },
          "classifier stopped at max_iterations without converging"
        );
        break;
    }
  };
}
