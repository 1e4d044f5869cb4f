import type { CoreAccessoryV1 } from "@taxclass/contracts";

/**
 * Core/accessory over genome-positive samples only.
 *
 * With zero positive samples `x < eta * 0` is never true, so every detected
 * gene resolves to "core".
 */
export function resolveCoreAccessory(
  numberOfDetections: number,
  detectionsInPositiveSamples: number,
  positiveSampleCount: number,
  eta: number
): CoreAccessoryV1 {
  if (numberOfDetections === 0) return "UNDETERMINED";
  if (detectionsInPositiveSamples < eta * positiveSampleCount) return "accessory";
  return "core";
}
