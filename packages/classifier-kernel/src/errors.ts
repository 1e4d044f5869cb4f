// Classifier Kernel - error kinds
//
// All kernel failures are thrown to the caller. The kernel never exits the
// process; the host decides how a fatal error is surfaced.

/**
 * Invalid alpha/beta/gamma/eta/max_iterations. Fatal, never retried.
 */
export class ClassifierConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid classifier config: ${issues.join("; ")}`);
    this.name = "ClassifierConfigError";
    this.issues = issues;
  }
}

/**
 * A specificity or core/accessory label outside its domain reached the class
 * table. Indicates an integration bug upstream, not bad input.
 */
export class GeneClassInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GeneClassInvariantError";
  }
}

export class CoverageMatrixError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CoverageMatrixError";
  }
}
