import { mkdtemp, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, relative } from "node:path";
import * as tar from "tar";
import type { Enricher } from "./types.js";
import { ExtractionError } from "../errors.js";
import { Artifact } from "../model/artifact.js";
import { compareStrings, emptyExtraction } from "../model/run.js";
import { hasSuffix } from "./shared.js";
import { SYSFS_CPU_ARCHIVE } from "./sysfs.js";

export interface ArchiveEnricherOptions {
  /** Applied to every extracted file. Never includes the enricher being built. */
  inner: Enricher[];
  /** Parent directory for scratch space. Defaults to the OS temp dir. */
  scratchRoot?: string;
}

/** Rejects absolute paths and any `..` component. */
export function isSafeEntryPath(path: string): boolean {
  if (!path) return false;
  if (path.startsWith("/") || path.startsWith("\\") || /^[A-Za-z]:/.test(path)) return false;
  return !path.split(/[\\/]/).includes("..");
}

/**
 * Unpacks `.tar.gz` / `.tgz` artifacts into a private scratch directory and runs
 * the inner enrichers over every regular file inside. The scratch directory is
 * removed whatever happens.
 */
export function createArchiveEnricher(options: ArchiveEnricherOptions): Enricher {
  const { inner, scratchRoot } = options;

  return {
    name: "archive",

    async enrich(artifact, context) {
      if (!hasSuffix(artifact, ".tar.gz", ".tgz")) return emptyExtraction();
      // read in memory by the sysfs enricher
      if (artifact.name === SYSFS_CPU_ARCHIVE) return emptyExtraction();

      const scratch = await mkdtemp(join(scratchRoot ?? tmpdir(), "falba-archive-"));
      try {
        try {
          await tar.x({
            file: artifact.path,
            cwd: scratch,
            filter: (entryPath) => {
              if (isSafeEntryPath(entryPath)) return true;
              context.warn(`Skipping unsafe path in ${artifact.path}: ${entryPath}`);
              return false;
            },
            onwarn: (code, message) => {
              context.warn(`${artifact.path}: ${code} ${message}`);
            },
          });
        } catch (e) {
          throw new ExtractionError(
            artifact.path,
            `failed to unpack: ${e instanceof Error ? e.message : String(e)}`,
            { cause: e }
          );
        }

        const result = emptyExtraction();
        for (const file of await listFiles(scratch)) {
          const entryName = relative(scratch, file);
          const extracted = await Artifact.open(file);

          for (const enricher of inner) {
            try {
              const { facts, metrics } = await enricher.enrich(extracted, context);
              result.facts.push(...facts);
              result.metrics.push(...metrics);
            } catch (e) {
              context.warn(
                `${enricher.name} failed for ${entryName} in ${artifact.path}: ${
                  e instanceof Error ? e.message : String(e)
                }`
              );
            }
          }
        }

        if (result.facts.length === 0 && result.metrics.length === 0) {
          context.warn(`No facts or metrics extracted from archive ${artifact.path}`);
        }
        return result;
      } finally {
        await rm(scratch, { recursive: true, force: true });
      }
    },
  };
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(fullPath)));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }
  return files.sort(compareStrings);
}
