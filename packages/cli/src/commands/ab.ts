import chalk from "chalk";
import { filterRuns, formatRunLine } from "@falba/core";
import { loadCorpus, type GlobalOptions } from "./load.js";

/**
 * Prints `<testName>/<runId>` for every run matching `expression`.
 * Returns the number of matches.
 */
export async function runAb(expression: string, options: GlobalOptions): Promise<number> {
  const corpus = await loadCorpus(options);
  const { matches, failures } = filterRuns(corpus, expression);

  for (const failure of failures) {
    console.error(chalk.red(`  error (query): ${failure.run.key}: ${failure.error.message}`));
  }

  for (const run of matches) {
    console.log(formatRunLine(run));
  }

  console.error(chalk.dim(`  ${matches.length} of ${corpus.size} runs matched`));
  return matches.length;
}
