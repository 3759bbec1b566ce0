import chalk from "chalk";
import { filterRuns, printRunDump } from "@falba/core";
import { loadCorpus, type GlobalOptions } from "./load.js";

export async function runDump(expression: string | undefined, options: GlobalOptions): Promise<void> {
  const corpus = await loadCorpus(options);

  if (expression === undefined) {
    printRunDump(corpus.runs());
    return;
  }

  const { matches, failures } = filterRuns(corpus, expression);
  for (const failure of failures) {
    console.error(chalk.red(`  error (query): ${failure.run.key}: ${failure.error.message}`));
  }
  printRunDump(matches);
}
