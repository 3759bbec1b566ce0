// Errors
export {
  FalbaError,
  ArtifactError,
  ExtractionError,
  DuplicateFactError,
  CorpusError,
  EvaluationError,
  PipelineError,
} from "./errors.js";

// Attribute model
export type { FactValue, FactObject } from "./model/value.js";
export { isFactObject, toFactValue, formatValue, setOwn } from "./model/value.js";
export { Artifact } from "./model/artifact.js";
export { Run, emptyExtraction, runKey, compareStrings } from "./model/run.js";
export type { Fact, Metric, Extraction } from "./model/run.js";
export { Corpus } from "./model/corpus.js";

// Discovery
export { readCorpusDir, readRunDir } from "./discovery/reader.js";

// Enrichers
export type { Enricher, EnrichContext } from "./enrich/types.js";
export { createEnrichers, leafEnrichers, DEFAULT_ARCHIVE_DEPTH } from "./enrich/registry.js";
export type { EnricherSetOptions } from "./enrich/registry.js";
export { factsJsonEnricher, FACTS_FILE_NAME } from "./enrich/facts-json.js";
export { ansibleEnricher } from "./enrich/ansible.js";
export { phoronixEnricher } from "./enrich/phoronix.js";
export { traceLogEnricher, asiExitsEnricher, TraceLogParser, parseCount } from "./enrich/trace-log.js";
export { sysfsCpuEnricher, SYSFS_CPU_ARCHIVE } from "./enrich/sysfs.js";
export { osReleaseEnricher, kconfigEnricher, nixosVersionEnricher, nixosSystemEnricher, parseOsRelease } from "./enrich/system.js";
export { fioEnricher, elapsedNsEnricher } from "./enrich/fio.js";
export { createArchiveEnricher, isSafeEntryPath } from "./enrich/archive.js";
export type { ArchiveEnricherOptions } from "./enrich/archive.js";

// Derivers
export type { Deriver } from "./derive/types.js";
export { createDerivers } from "./derive/registry.js";
export { asiOnDeriver, retbleedMitigationDeriver, classifyRetbleed } from "./derive/mitigations.js";
export type { RetbleedMitigation } from "./derive/mitigations.js";

// Pipeline
export { applyEnrichers, applyDerivers, mergeInto } from "./pipeline/driver.js";
export type { PhaseReport } from "./pipeline/driver.js";

// Predicate engine
export type { Binding, CelType, Declaration } from "./query/declarations.js";
export { inferCelType, inferDeclarations, isBindableName } from "./query/declarations.js";
export { PredicateEngine, buildBinding } from "./query/engine.js";
export { filterRuns, formatRunLine } from "./query/filter.js";
export type { FilterResult, EvaluationFailure } from "./query/filter.js";

// Reporters
export { printRunDump } from "./report/terminal.js";
export { flattenCorpus, generateJsonExport } from "./report/json.js";
export type { FlatRecord, JsonExport } from "./report/json.js";
