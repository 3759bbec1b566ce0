import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { gzipSync } from "node:zlib";
import { Header } from "tar";
import type { EnrichContext } from "./enrich/types.js";

export async function makeTempDir(prefix = "falba-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Writes `relative path → content` pairs below `root`, creating directories. */
export async function writeTree(root: string, files: Record<string, string | Buffer>): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const target = join(root, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

export interface CapturingContext extends EnrichContext {
  warnings: string[];
}

export function capturingContext(): CapturingContext {
  const warnings: string[] = [];
  return { warnings, warn: (message) => warnings.push(message) };
}

export interface TarEntry {
  name: string;
  content: string | Buffer;
}

const BLOCK = 512;

/**
 * Builds a gzipped tar archive in memory. Entry paths are written as given,
 * so unsafe paths can be produced on purpose.
 */
export function buildTarGz(entries: TarEntry[]): Buffer {
  const blocks: Buffer[] = [];
  for (const entry of entries) {
    const data = typeof entry.content === "string" ? Buffer.from(entry.content, "utf-8") : entry.content;
    const header = Buffer.alloc(BLOCK);
    new Header({ path: entry.name, size: data.length, type: "File", mode: 0o644, mtime: new Date(0) }).encode(
      header,
      0
    );
    blocks.push(header, data);
    const padding = (BLOCK - (data.length % BLOCK)) % BLOCK;
    if (padding > 0) blocks.push(Buffer.alloc(padding));
  }
  blocks.push(Buffer.alloc(BLOCK * 2));
  return gzipSync(Buffer.concat(blocks));
}
