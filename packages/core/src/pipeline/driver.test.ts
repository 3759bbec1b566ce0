import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { join } from "node:path";
import { applyDerivers, applyEnrichers } from "./driver.js";
import { createDerivers } from "../derive/registry.js";
import type { Deriver } from "../derive/types.js";
import { createEnrichers } from "../enrich/registry.js";
import type { Enricher } from "../enrich/types.js";
import { PipelineError } from "../errors.js";
import { readCorpusDir } from "../discovery/reader.js";
import { Corpus } from "../model/corpus.js";
import { Run, emptyExtraction } from "../model/run.js";
import { makeTempDir, removeDir, writeTree } from "../test-helpers.js";

describe("applyEnrichers", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it("leaves a run with only unrecognised files untouched", async () => {
    await writeTree(root, { "boot/r1/notes.txt": "@count: 1\n" });
    const corpus = await readCorpusDir(root);

    const report = await applyEnrichers(corpus, createEnrichers({ scratchRoot: root }));

    expect(report).toEqual({ errors: [], warnings: [] });
    const run = corpus.get("boot", "r1");
    expect(run?.facts.size).toBe(0);
    expect(run?.metrics).toEqual([]);
  });

  it("isolates a failing artifact from the rest of the corpus", async () => {
    await writeTree(root, {
      "boot/r1/falba-facts.json": "{broken",
      "boot/r1/nixos-system.txt": "/nix/store/a",
      "boot/r2/falba-facts.json": JSON.stringify({ cmdline: "quiet" }),
    });
    const corpus = await readCorpusDir(root);

    const report = await applyEnrichers(corpus, createEnrichers({ scratchRoot: root }));

    expect(report.errors).toHaveLength(1);
    const [error] = report.errors;
    expect(error).toBeInstanceOf(PipelineError);
    expect(error.runKey).toBe("boot/r1");
    expect(error.handler).toBe("facts-json");
    expect(error.artifactPath).toBe(join(root, "boot/r1/falba-facts.json"));

    expect(corpus.get("boot", "r1")?.factValues()).toEqual({ nixos_system: "/nix/store/a" });
    expect(corpus.get("boot", "r2")?.factValues()).toEqual({ cmdline: "quiet" });
  });

  it("skips the remaining enrichers for an artifact after a failure", async () => {
    await writeTree(root, { "t/r/data.txt": "" });
    const corpus = await readCorpusDir(root);
    const calls: string[] = [];
    const failing: Enricher = {
      name: "failing",
      async enrich() {
        calls.push("failing");
        throw new Error("boom");
      },
    };
    const after: Enricher = {
      name: "after",
      async enrich() {
        calls.push("after");
        return emptyExtraction();
      },
    };

    const report = await applyEnrichers(corpus, [failing, after]);

    expect(calls).toEqual(["failing"]);
    expect(report.errors.map((e) => e.message)).toEqual([
      `failing failed for t/r (${join(root, "t/r/data.txt")}): boom`,
    ]);
  });

  it("reports duplicate facts from two artifacts as a warning and keeps the first", async () => {
    await writeTree(root, {
      "t/r/ansible.json": JSON.stringify({ ansible_facts: { ansible_cmdline: "first" } }),
      "t/r/falba-facts.json": JSON.stringify({ cmdline: "second" }),
    });
    const corpus = await readCorpusDir(root);

    const report = await applyEnrichers(corpus, createEnrichers());

    expect(report.errors).toEqual([]);
    expect(report.warnings).toEqual(['t/r: duplicate fact "cmdline" ignored, keeping the first value']);
    expect(corpus.get("t", "r")?.facts.get("cmdline")?.value).toBe("first");
  });

  it("prefixes enricher warnings with the run key", async () => {
    await writeTree(root, { "t/r/empty.log": "\n" });
    const corpus = await readCorpusDir(root);

    const report = await applyEnrichers(corpus, createEnrichers());

    expect(report.warnings).toEqual([`t/r: No metrics found in trace log ${join(root, "t/r/empty.log")}`]);
  });
});

describe("applyDerivers", () => {
  function corpusOf(...runs: Run[]): Corpus {
    const corpus = new Corpus();
    for (const run of runs) corpus.add(run);
    return corpus;
  }

  it("lets later derivers see earlier derived facts", () => {
    const run = new Run("t", "r");
    run.addFact({ name: "cmdline", value: "mitigations=auto,nosmt" });
    const echo: Deriver = {
      name: "echo-asi",
      derive: (r) => {
        const asi = r.facts.get("asi_on");
        return asi ? { facts: [{ name: "asi_seen", value: asi.value }], metrics: [] } : emptyExtraction();
      },
    };

    const report = applyDerivers(corpusOf(run), [...createDerivers(), echo]);

    expect(report).toEqual({ errors: [], warnings: [] });
    expect(run.factValues()).toEqual({
      cmdline: "mitigations=auto,nosmt",
      asi_on: true,
      retbleed_mitigation: "unknown",
      asi_seen: true,
    });
  });

  it("warns on a second pass and leaves facts unchanged", () => {
    const run = new Run("t", "r");
    run.addFact({ name: "cmdline", value: "retbleed=off" });
    const corpus = corpusOf(run);

    applyDerivers(corpus, createDerivers());
    const before = run.factValues();
    const second = applyDerivers(corpus, createDerivers());

    expect(second.warnings).toEqual([
      't/r: duplicate fact "asi_on" ignored, keeping the first value',
      't/r: duplicate fact "retbleed_mitigation" ignored, keeping the first value',
    ]);
    expect(run.factValues()).toEqual(before);
  });

  it("collects a throwing deriver and continues with the next", () => {
    const run = new Run("t", "r");
    run.addFact({ name: "cmdline", value: "retbleed=ibpb" });
    const broken: Deriver = {
      name: "broken",
      derive: () => {
        throw new Error("no");
      },
    };

    const report = applyDerivers(corpusOf(run), [broken, ...createDerivers()]);

    expect(report.errors.map((e) => e.message)).toEqual(["broken failed for t/r: no"]);
    expect(run.facts.get("retbleed_mitigation")?.value).toBe("ibpb");
  });
});
