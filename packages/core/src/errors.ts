/**
 * Base class for every error raised by the pipeline.
 * `code` is stable and safe to match on; `message` is for humans.
 */
export class FalbaError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FalbaError";
    this.code = code;
  }
}

/**
 * An artifact handle could not be created or read.
 */
export class ArtifactError extends FalbaError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super("ARTIFACT_ERROR", `Artifact ${path}: ${reason}`, options);
    this.name = "ArtifactError";
    this.path = path;
  }
}

/**
 * An artifact matched an enricher's shape but its content is malformed.
 */
export class ExtractionError extends FalbaError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super("EXTRACTION_ERROR", `Failed to extract from ${path}: ${reason}`, options);
    this.name = "ExtractionError";
    this.path = path;
  }
}

export class DuplicateFactError extends FalbaError {
  readonly factName: string;
  readonly runKey: string;

  constructor(factName: string, runKey: string) {
    super("DUPLICATE_FACT", `Fact "${factName}" already exists on run ${runKey}`);
    this.name = "DuplicateFactError";
    this.factName = factName;
    this.runKey = runKey;
  }
}

/**
 * The corpus tree is unreadable or inconsistent. Fatal for the whole load.
 */
export class CorpusError extends FalbaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORPUS_ERROR", message, options);
    this.name = "CorpusError";
  }
}

export class EvaluationError extends FalbaError {
  readonly expression: string;

  constructor(expression: string, reason: string, options?: { cause?: unknown }) {
    super("EVALUATION_ERROR", `Expression ${JSON.stringify(expression)} failed: ${reason}`, options);
    this.name = "EvaluationError";
    this.expression = expression;
  }
}

/**
 * An enricher or deriver failed for one run. Collected by the driver, never thrown.
 */
export class PipelineError extends FalbaError {
  readonly runKey: string;
  readonly handler: string;
  readonly artifactPath?: string;

  constructor(
    runKey: string,
    handler: string,
    cause: unknown,
    artifactPath?: string
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const where = artifactPath ? `${runKey} (${artifactPath})` : runKey;
    super("PIPELINE_ERROR", `${handler} failed for ${where}: ${reason}`, { cause });
    this.name = "PipelineError";
    this.runKey = runKey;
    this.handler = handler;
    this.artifactPath = artifactPath;
  }
}
