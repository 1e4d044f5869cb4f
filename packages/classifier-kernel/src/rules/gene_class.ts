import type { CoreAccessoryV1, GeneClassV1, SpecificityV1 } from "@taxclass/contracts";
import { GeneClassInvariantError } from "../errors";

export function resolveGeneClass(specificity: SpecificityV1, coreOrAccessory: CoreAccessoryV1): GeneClassV1 {
  if (specificity === "UNDETERMINED" || coreOrAccessory === "UNDETERMINED") return "UNDETERMINED";

  switch (specificity) {
    case "TS":
      if (coreOrAccessory === "core") return "TSC";
      if (coreOrAccessory === "accessory") return "TSA";
      break;
    case "TNS":
      if (coreOrAccessory === "core") return "TNC";
      if (coreOrAccessory === "accessory") return "TNA";
      break;
    default:
      throw new GeneClassInvariantError(`${String(specificity)} is not valid. Value should be 'TS' or 'TNS'`);
  }
  throw new GeneClassInvariantError(`${String(coreOrAccessory)} is not valid. Value should be 'core' or 'accessory'`);
}
