import type { Deriver } from "./types.js";
import { asiOnDeriver, retbleedMitigationDeriver } from "./mitigations.js";

/** Derivers in the order they run. */
export function createDerivers(): Deriver[] {
  return [asiOnDeriver, retbleedMitigationDeriver];
}
