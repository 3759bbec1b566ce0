import type { Extraction, Run } from "../model/run.js";

/**
 * Computes new facts from a run's existing facts. A deriver whose inputs are
 * missing or of the wrong type returns an empty extraction instead of failing.
 */
export interface Deriver {
  readonly name: string;
  derive(run: Run): Extraction;
}
