import { EvaluationError } from "../errors.js";
import type { Corpus } from "../model/corpus.js";
import type { Run } from "../model/run.js";
import { buildBinding, PredicateEngine } from "./engine.js";

export interface EvaluationFailure {
  run: Run;
  error: EvaluationError;
}

export interface FilterResult {
  matches: Run[];
  failures: EvaluationFailure[];
}

/**
 * Evaluates `expression` against every run in key order. A run whose
 * evaluation fails is left out of the matches and recorded in `failures`.
 */
export function filterRuns(corpus: Corpus, expression: string): FilterResult {
  const engine = new PredicateEngine(expression);
  const result: FilterResult = { matches: [], failures: [] };

  for (const run of corpus.runs()) {
    try {
      if (engine.evaluate(buildBinding(run))) result.matches.push(run);
    } catch (e) {
      if (!(e instanceof EvaluationError)) throw e;
      result.failures.push({ run, error: e });
    }
  }

  return result;
}

export function formatRunLine(run: Run): string {
  return `${run.testName}/${run.runId}`;
}
