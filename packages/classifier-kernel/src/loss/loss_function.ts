import type { SpecificityV1 } from "@taxclass/contracts";

/**
 * Sum over genes of the adjusted variability for TS genes and a flat beta for
 * every other gene (TNS or UNDETERMINED).
 */
export function computeLoss(
  specificities: ReadonlyMap<number, SpecificityV1>,
  variabilities: ReadonlyMap<number, number>,
  beta: number
): number {
  let loss = 0;
  for (const [gene, specificity] of specificities) {
    loss += specificity === "TS" ? variabilities.get(gene) ?? 0 : beta;
  }
  return loss;
}
