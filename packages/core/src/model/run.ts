import { DuplicateFactError } from "../errors.js";
import type { Artifact } from "./artifact.js";
import type { FactValue } from "./value.js";
import { setOwn } from "./value.js";

/** A uniquely named observation about a run. */
export interface Fact {
  name: string;
  value: FactValue;
  unit?: string;
}

/** A measurement. A run may carry many metrics with the same name. */
export interface Metric {
  name: string;
  value: FactValue;
  unit?: string;
}

/** What an enricher or deriver produces. */
export interface Extraction {
  facts: Fact[];
  metrics: Metric[];
}

export function emptyExtraction(): Extraction {
  return { facts: [], metrics: [] };
}

export function runKey(testName: string, runId: string): string {
  return `${testName}/${runId}`;
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

export class Run {
  readonly testName: string;
  readonly runId: string;
  readonly key: string;

  private readonly artifactMap = new Map<string, Artifact>();
  private readonly factMap = new Map<string, Fact>();
  private readonly metricList: Metric[] = [];

  constructor(testName: string, runId: string) {
    this.testName = testName;
    this.runId = runId;
    this.key = runKey(testName, runId);
  }

  get artifacts(): ReadonlyMap<string, Artifact> {
    return this.artifactMap;
  }

  get facts(): ReadonlyMap<string, Fact> {
    return this.factMap;
  }

  get metrics(): readonly Metric[] {
    return this.metricList;
  }

  addArtifact(artifact: Artifact): void {
    this.artifactMap.set(artifact.path, artifact);
  }

  /** Artifacts ordered by path. */
  artifactList(): Artifact[] {
    return [...this.artifactMap.values()].sort((a, b) => compareStrings(a.path, b.path));
  }

  /**
   * Only one fact with a given name is allowed; the first one wins.
   * @throws DuplicateFactError
   */
  addFact(fact: Fact): void {
    if (this.factMap.has(fact.name)) {
      throw new DuplicateFactError(fact.name, this.key);
    }
    this.factMap.set(fact.name, fact);
  }

  addMetric(metric: Metric): void {
    this.metricList.push(metric);
  }

  /** Snapshot of fact name → value, units dropped. */
  factValues(): Readonly<Record<string, FactValue>> {
    const values: Record<string, FactValue> = {};
    for (const [name, fact] of this.factMap) {
      setOwn(values, name, fact.value);
    }
    return Object.freeze(values);
  }
}
