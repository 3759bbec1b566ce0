import type { Deriver } from "../derive/types.js";
import type { EnrichContext, Enricher } from "../enrich/types.js";
import { DuplicateFactError, PipelineError } from "../errors.js";
import type { Corpus } from "../model/corpus.js";
import type { Extraction, Run } from "../model/run.js";

export interface PhaseReport {
  errors: PipelineError[];
  warnings: string[];
}

/**
 * Runs every enricher over every artifact of every run.
 *
 * An enricher that throws stops work on that artifact only; the error is
 * collected and the remaining artifacts and runs carry on.
 */
export async function applyEnrichers(corpus: Corpus, enrichers: Enricher[]): Promise<PhaseReport> {
  const report: PhaseReport = { errors: [], warnings: [] };

  for (const run of corpus.runs()) {
    const context: EnrichContext = {
      warn: (message) => report.warnings.push(`${run.key}: ${message}`),
    };

    for (const artifact of run.artifactList()) {
      for (const enricher of enrichers) {
        let extraction: Extraction;
        try {
          extraction = await enricher.enrich(artifact, context);
        } catch (e) {
          report.errors.push(new PipelineError(run.key, enricher.name, e, artifact.path));
          break;
        }
        mergeInto(run, extraction, report);
      }
    }
  }

  return report;
}

/**
 * Runs every deriver over every run, in registration order. Each deriver's
 * output is merged before the next one runs, so later derivers see it.
 */
export function applyDerivers(corpus: Corpus, derivers: Deriver[]): PhaseReport {
  const report: PhaseReport = { errors: [], warnings: [] };

  for (const run of corpus.runs()) {
    for (const deriver of derivers) {
      let extraction: Extraction;
      try {
        extraction = deriver.derive(run);
      } catch (e) {
        report.errors.push(new PipelineError(run.key, deriver.name, e));
        continue;
      }
      mergeInto(run, extraction, report);
    }
  }

  return report;
}

/** Adds an extraction to a run. Duplicate facts are dropped with a warning. */
export function mergeInto(run: Run, extraction: Extraction, report: PhaseReport): void {
  for (const fact of extraction.facts) {
    try {
      run.addFact(fact);
    } catch (e) {
      if (!(e instanceof DuplicateFactError)) throw e;
      report.warnings.push(`${run.key}: duplicate fact "${e.factName}" ignored, keeping the first value`);
    }
  }
  for (const metric of extraction.metrics) {
    run.addMetric(metric);
  }
}
