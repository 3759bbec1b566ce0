import { ExtractionError } from "../errors.js";
import type { Artifact } from "../model/artifact.js";
import { isFactObject, type FactObject } from "../model/value.js";

/** Parses an artifact whose top level must be a JSON object. */
export async function readJsonObject(artifact: Artifact): Promise<FactObject> {
  const value = await artifact.json();
  if (!isFactObject(value)) {
    throw new ExtractionError(artifact.path, "expected a JSON object at the top level");
  }
  return value;
}

export function hasSuffix(artifact: Artifact, ...suffixes: string[]): boolean {
  return suffixes.some((s) => artifact.name.endsWith(s));
}
