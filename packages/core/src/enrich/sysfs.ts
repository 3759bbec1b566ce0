import * as tar from "tar";
import type { Enricher } from "./types.js";
import { ExtractionError } from "../errors.js";
import type { Fact } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";

export const SYSFS_CPU_ARCHIVE = "sysfs_cpu.tgz";

const VULNERABILITY_ENTRY = /(?:^|\/)sys\/devices\/system\/cpu\/vulnerabilities\/([^/]+)$/;

// tar pads sysfs files with NULs
function cleanSysfsValue(raw: string): string {
  return raw.replace(/^\0+|\0+$/g, "").trim();
}

/**
 * A tarball of /sys/devices/system/cpu. Each file under `vulnerabilities/`
 * becomes a `sysfs_cpu_vuln:<name>` fact. Members are read in memory, so the
 * absolute paths the archive holds never touch the disk.
 */
export const sysfsCpuEnricher: Enricher = {
  name: "sysfs-cpu",

  async enrich(artifact, context) {
    if (artifact.name !== SYSFS_CPU_ARCHIVE) return emptyExtraction();

    const members: { name: string; chunks: Buffer[] }[] = [];
    let irregular: string | undefined;

    try {
      await tar.t({
        file: artifact.path,
        onReadEntry: (entry) => {
          const match = VULNERABILITY_ENTRY.exec(entry.path);
          if (!match) return;
          if (entry.type !== "File" && entry.type !== "OldFile") {
            irregular ??= entry.path;
            return;
          }
          const member: { name: string; chunks: Buffer[] } = { name: match[1], chunks: [] };
          members.push(member);
          entry.on("data", (chunk: Buffer) => {
            member.chunks.push(chunk);
          });
        },
        onwarn: (code, message) => {
          context.warn(`${artifact.path}: ${code} ${message}`);
        },
      });
    } catch (e) {
      throw new ExtractionError(
        artifact.path,
        `failed to read archive: ${e instanceof Error ? e.message : String(e)}`,
        { cause: e }
      );
    }

    if (irregular !== undefined) {
      throw new ExtractionError(artifact.path, `not a regular file: ${irregular}`);
    }

    const facts: Fact[] = members.map((m) => ({
      name: `sysfs_cpu_vuln:${m.name}`,
      value: cleanSysfsValue(Buffer.concat(m.chunks).toString("utf-8")),
    }));
    return { facts, metrics: [] };
  },
};
