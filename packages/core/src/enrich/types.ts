import type { Artifact } from "../model/artifact.js";
import type { Extraction } from "../model/run.js";

export interface EnrichContext {
  /** Reports a non-fatal problem; the driver collects these per phase. */
  warn(message: string): void;
}

/**
 * Extracts facts and metrics from one artifact shape.
 *
 * An enricher returns an empty extraction for artifacts it does not recognize
 * and throws ExtractionError only when a recognized artifact is malformed.
 */
export interface Enricher {
  readonly name: string;
  enrich(artifact: Artifact, context: EnrichContext): Promise<Extraction>;
}
