import { resolve } from "node:path";
import chalk from "chalk";
import {
  applyDerivers,
  applyEnrichers,
  createDerivers,
  createEnrichers,
  readCorpusDir,
  type Corpus,
  type PhaseReport,
} from "@falba/core";
import { loadConfig } from "../config.js";

export interface GlobalOptions {
  resultDb?: string;
  /** Directory to search for a config file. Defaults to the working directory. */
  cwd?: string;
}

/** A condition that ends the command with a nonzero exit code. */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

/**
 * Reads the result database and runs enrichment and derivation over it.
 * Warnings and per-run errors go to stderr; the corpus is returned.
 */
export async function loadCorpus(options: GlobalOptions): Promise<Corpus> {
  const cwd = options.cwd ?? process.cwd();
  const config = await loadConfig(cwd);
  const resultDb = resolve(cwd, options.resultDb ?? config.resultDb);

  const corpus = await readCorpusDir(resultDb);
  if (corpus.size === 0) {
    throw new CliError(`No runs found in ${resultDb}`);
  }

  const enrichers = createEnrichers({
    archiveDepth: config.archive.maxDepth,
    scratchRoot: config.archive.scratchDir ? resolve(cwd, config.archive.scratchDir) : undefined,
  });
  printPhaseReport("enrich", await applyEnrichers(corpus, enrichers));
  printPhaseReport("derive", applyDerivers(corpus, createDerivers()));

  return corpus;
}

export function printPhaseReport(phase: string, report: PhaseReport): void {
  for (const warning of report.warnings) {
    console.error(chalk.yellow(`  warning (${phase}): ${warning}`));
  }
  for (const error of report.errors) {
    console.error(chalk.red(`  error (${phase}): ${error.message}`));
  }
}
