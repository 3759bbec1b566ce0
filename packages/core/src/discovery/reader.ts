import { readdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import { CorpusError } from "../errors.js";
import { Artifact } from "../model/artifact.js";
import { Corpus } from "../model/corpus.js";
import { Run, compareStrings } from "../model/run.js";

/**
 * Reads a result database laid out as `<root>/<testName>/<runId>/<files>`.
 * Any directory that cannot be listed is fatal.
 */
export async function readCorpusDir(root: string): Promise<Corpus> {
  const absRoot = resolve(root);
  const corpus = new Corpus();

  for (const testName of await listDirs(absRoot)) {
    const testDir = join(absRoot, testName);
    for (const runId of await listDirs(testDir)) {
      corpus.add(await readRunDir(join(testDir, runId), testName, runId));
    }
  }

  return corpus;
}

export async function readRunDir(dir: string, testName: string, runId: string): Promise<Run> {
  const run = new Run(testName, runId);
  const entries = await listEntries(dir);

  for (const entry of entries) {
    if (!entry.isFile()) continue;
    run.addArtifact(await Artifact.open(join(dir, entry.name)));
  }

  return run;
}

async function listDirs(dir: string): Promise<string[]> {
  const entries = await listEntries(dir);
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort(compareStrings);
}

async function listEntries(dir: string) {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (e) {
    throw new CorpusError(
      `Failed to read directory ${dir}: ${e instanceof Error ? e.message : String(e)}`,
      { cause: e }
    );
  }
}
