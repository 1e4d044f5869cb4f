import { ClassifierParamsV1Z } from "@taxclass/contracts";
import type { ClassifierParamsV1 } from "@taxclass/contracts";
import { ClassifierConfigError } from "./errors";

/**
 * Validates classifier parameters once, before the first iteration.
 *
 * Throws ClassifierConfigError listing every violated constraint.
 */
export function assertClassifierParams(input: unknown): ClassifierParamsV1 {
  const r = ClassifierParamsV1Z.safeParse(input);
  if (!r.success) {
    throw new ClassifierConfigError(r.error.issues.map((i) => `${i.path.join(".") || "params"}: ${i.message}`));
  }
  return r.data;
}
