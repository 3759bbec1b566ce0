import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { sysfsCpuEnricher } from "./sysfs.js";
import { ExtractionError } from "../errors.js";
import { Artifact } from "../model/artifact.js";
import { buildTarGz, capturingContext, makeTempDir, removeDir, writeTree } from "../test-helpers.js";

const VULNERABILITIES = "/sys/devices/system/cpu/vulnerabilities";

describe("sysfsCpuEnricher", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  async function tarball(name: string, content: Buffer): Promise<Artifact> {
    await writeTree(dir, { [name]: content });
    return Artifact.open(join(dir, name));
  }

  it("reads each vulnerability file as a fact", async () => {
    const file = await tarball(
      "sysfs_cpu.tgz",
      buildTarGz([
        { name: `${VULNERABILITIES}/meltdown`, content: "Not affected\n\0\0" },
        { name: `${VULNERABILITIES}/retbleed`, content: "Mitigation: IBPB\n" },
        { name: "/sys/devices/system/cpu/online", content: "0-7\n" },
      ])
    );
    const context = capturingContext();

    expect(await sysfsCpuEnricher.enrich(file, context)).toEqual({
      facts: [
        { name: "sysfs_cpu_vuln:meltdown", value: "Not affected" },
        { name: "sysfs_cpu_vuln:retbleed", value: "Mitigation: IBPB" },
      ],
      metrics: [],
    });
    expect(context.warnings).toEqual([]);
  });

  it("writes nothing next to the archive", async () => {
    const file = await tarball(
      "sysfs_cpu.tgz",
      buildTarGz([{ name: `${VULNERABILITIES}/mds`, content: "Not affected\n" }])
    );

    await sysfsCpuEnricher.enrich(file, capturingContext());

    expect(existsSync(join(dir, "sys"))).toBe(false);
  });

  it("fails on an archive it cannot read", async () => {
    await writeTree(dir, { "sysfs_cpu.tgz": "not a tarball" });
    const file = await Artifact.open(join(dir, "sysfs_cpu.tgz"));

    await expect(sysfsCpuEnricher.enrich(file, capturingContext())).rejects.toThrow(ExtractionError);
  });

  it("ignores other archives", async () => {
    const file = await tarball(
      "other.tgz",
      buildTarGz([{ name: `${VULNERABILITIES}/meltdown`, content: "Vulnerable\n" }])
    );

    expect(await sysfsCpuEnricher.enrich(file, capturingContext())).toEqual({ facts: [], metrics: [] });
  });
});
