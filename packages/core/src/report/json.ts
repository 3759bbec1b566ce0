import type { Corpus } from "../model/corpus.js";
import type { FactValue } from "../model/value.js";

/** One metric observation with its run's facts alongside. */
export interface FlatRecord {
  testName: string;
  runId: string;
  metric: string;
  value: FactValue;
  unit: string | null;
  facts: Record<string, FactValue>;
}

export interface JsonExport {
  createdAt: string;
  summary: {
    runs: number;
    records: number;
    metrics: string[];
  };
  records: FlatRecord[];
}

/** Flattens the corpus into one record per metric, runs in key order. */
export function flattenCorpus(corpus: Corpus): FlatRecord[] {
  const records: FlatRecord[] = [];

  for (const run of corpus.runs()) {
    const facts = { ...run.factValues() };
    for (const metric of run.metrics) {
      records.push({
        testName: run.testName,
        runId: run.runId,
        metric: metric.name,
        value: metric.value,
        unit: metric.unit ?? null,
        facts,
      });
    }
  }

  return records;
}

export function generateJsonExport(
  records: FlatRecord[],
  options?: { createdAt?: Date }
): string {
  const runs = new Set(records.map((r) => `${r.testName}/${r.runId}`));
  const metrics = [...new Set(records.map((r) => r.metric))].sort();

  const report: JsonExport = {
    createdAt: (options?.createdAt ?? new Date()).toISOString(),
    summary: {
      runs: runs.size,
      records: records.length,
      metrics,
    },
    records,
  };

  return JSON.stringify(report, null, 2);
}
