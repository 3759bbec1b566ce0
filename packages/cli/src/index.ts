#!/usr/bin/env node
import { Command } from "commander";
import { createRequire } from "node:module";
import chalk from "chalk";
import { z } from "zod";
import { CorpusError, EvaluationError } from "@falba/core";
import { runAb } from "./commands/ab.js";
import { runDump } from "./commands/dump.js";
import { runExport } from "./commands/export.js";
import { CliError, type GlobalOptions } from "./commands/load.js";
import { ConfigError } from "./config.js";

const require = createRequire(import.meta.url);
const packageVersion =
  process.env.FALBA_CLI_VERSION ??
  z.object({ version: z.string().optional() }).parse(require("../package.json")).version ??
  "0.0.0";

const program = new Command();

program
  .name("falba")
  .description("Extract facts and metrics from benchmark results and query them with CEL")
  .version(packageVersion)
  .option("--result-db <path>", "Directory holding <test>/<run>/ result trees");

function globalOptions(): GlobalOptions {
  const opts = program.opts<{ resultDb?: string }>();
  return { resultDb: opts.resultDb };
}

// Known failures set the exit code; anything else propagates.
async function handle(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (e) {
    if (
      e instanceof CliError ||
      e instanceof ConfigError ||
      e instanceof CorpusError ||
      e instanceof EvaluationError
    ) {
      console.error(chalk.red(`  ${e.message}`));
      process.exitCode = 1;
      return;
    }
    throw e;
  }
}

program
  .command("ab")
  .description("List runs whose facts satisfy a CEL expression")
  .argument("<expr>", "CEL expression, e.g. 'os_release_id == \"nixos\"'")
  .action(async (expr: string) => {
    await handle(async () => {
      await runAb(expr, globalOptions());
    });
  });

program
  .command("dump")
  .description("Print the facts and metrics of every run, or of the runs matching an expression")
  .argument("[expr]", "Optional CEL expression")
  .action(async (expr: string | undefined) => {
    await handle(() => runDump(expr, globalOptions()));
  });

program
  .command("export")
  .description("Write one JSON record per metric, with the run's facts attached")
  .requiredOption("--output <file>", "Output file")
  .action(async (options: { output: string }) => {
    await handle(() => runExport({ ...globalOptions(), output: options.output }));
  });

await program.parseAsync();
