import type { SpecificityV1 } from "@taxclass/contracts";

/**
 * TS iff the adjusted variability is below beta. A gene detected in at most
 * one sample (across all samples) carries too little evidence either way.
 */
export function resolveSpecificity(numberOfDetections: number, adjustedVariability: number, beta: number): SpecificityV1 {
  if (numberOfDetections <= 1) return "UNDETERMINED";
  return adjustedVariability < beta ? "TS" : "TNS";
}
