import { CorpusError } from "../errors.js";
import { Run, compareStrings, runKey } from "./run.js";

/**
 * All runs under analysis, keyed by (testName, runId) so equal run ids in
 * different test groups stay distinct.
 */
export class Corpus {
  private readonly runMap = new Map<string, Run>();

  get size(): number {
    return this.runMap.size;
  }

  add(run: Run): void {
    if (this.runMap.has(run.key)) {
      throw new CorpusError(`Run ${run.key} appears twice in the corpus`);
    }
    this.runMap.set(run.key, run);
  }

  get(testName: string, runId: string): Run | undefined {
    return this.runMap.get(runKey(testName, runId));
  }

  /** Runs ordered by key. */
  runs(): Run[] {
    return [...this.runMap.values()].sort((a, b) => compareStrings(a.key, b.key));
  }
}
