import type { Enricher } from "./types.js";
import { ansibleEnricher } from "./ansible.js";
import { createArchiveEnricher } from "./archive.js";
import { factsJsonEnricher } from "./facts-json.js";
import { elapsedNsEnricher, fioEnricher } from "./fio.js";
import { phoronixEnricher } from "./phoronix.js";
import { sysfsCpuEnricher } from "./sysfs.js";
import { kconfigEnricher, nixosSystemEnricher, nixosVersionEnricher, osReleaseEnricher } from "./system.js";
import { asiExitsEnricher, traceLogEnricher } from "./trace-log.js";

export const DEFAULT_ARCHIVE_DEPTH = 2;

export interface EnricherSetOptions {
  /** How many levels of archives-within-archives are unpacked. 0 disables archives. */
  archiveDepth?: number;
  scratchRoot?: string;
}

/** Enrichers that look at a single file and never recurse. */
export function leafEnrichers(): Enricher[] {
  return [
    ansibleEnricher,
    phoronixEnricher,
    sysfsCpuEnricher,
    kconfigEnricher,
    traceLogEnricher,
    factsJsonEnricher,
    osReleaseEnricher,
    fioEnricher,
    nixosVersionEnricher,
    asiExitsEnricher,
    nixosSystemEnricher,
    elapsedNsEnricher,
  ];
}

/**
 * The full, ordered enricher set. Each archive enricher is handed the leaf set
 * plus an archive enricher one level shallower, so nesting always terminates.
 */
export function createEnrichers(options: EnricherSetOptions = {}): Enricher[] {
  const depth = options.archiveDepth ?? DEFAULT_ARCHIVE_DEPTH;
  const leaves = leafEnrichers();
  return depth > 0 ? [...leaves, archiveAtDepth(leaves, depth, options.scratchRoot)] : leaves;
}

function archiveAtDepth(leaves: Enricher[], depth: number, scratchRoot?: string): Enricher {
  const inner =
    depth > 1 ? [...leaves, archiveAtDepth(leaves, depth - 1, scratchRoot)] : leaves;
  return createArchiveEnricher({ inner, scratchRoot });
}
