import chalk from "chalk";
import Table from "cli-table3";
import type { Run } from "../model/run.js";
import { compareStrings } from "../model/run.js";
import { formatValue } from "../model/value.js";

const MAX_VALUE_WIDTH = 60;

export function printRunDump(runs: Run[]): void {
  for (const run of runs) {
    console.log();
    console.log(chalk.bold(`  ${run.key}`));
    console.log(chalk.dim("  " + "─".repeat(50)));

    const facts = [...run.facts.values()].sort((a, b) => compareStrings(a.name, b.name));
    if (facts.length === 0) {
      console.log(chalk.dim("  no facts"));
    } else {
      const table = new Table({
        head: [chalk.bold("Fact"), chalk.bold("Value"), chalk.bold("Unit")],
        style: { head: [], border: [] },
      });
      for (const fact of facts) {
        table.push([fact.name, truncate(formatValue(fact.value), MAX_VALUE_WIDTH), fact.unit ?? ""]);
      }
      console.log(table.toString());
    }

    if (run.metrics.length === 0) {
      console.log(chalk.dim("  no metrics"));
    } else {
      const table = new Table({
        head: [chalk.bold("Metric"), chalk.bold("Value"), chalk.bold("Unit")],
        style: { head: [], border: [] },
      });
      for (const metric of run.metrics) {
        table.push([metric.name, truncate(formatValue(metric.value), MAX_VALUE_WIDTH), metric.unit ?? ""]);
      }
      console.log(table.toString());
    }
  }

  console.log();
  console.log(chalk.dim(`  ${runs.length} runs`));
  console.log();
}

function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + "…";
}
