import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import chalk from "chalk";
import { flattenCorpus, generateJsonExport } from "@falba/core";
import { loadCorpus, type GlobalOptions } from "./load.js";

export interface ExportOptions extends GlobalOptions {
  output: string;
}

export async function runExport(options: ExportOptions): Promise<void> {
  const corpus = await loadCorpus(options);
  const records = flattenCorpus(corpus);

  const outputPath = resolve(options.cwd ?? process.cwd(), options.output);
  await writeFile(outputPath, generateJsonExport(records), "utf-8");
  console.error(chalk.dim(`  ${records.length} records from ${corpus.size} runs → ${outputPath}`));
}
