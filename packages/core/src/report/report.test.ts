import { describe, expect, it, vi } from "vitest";
import { flattenCorpus, generateJsonExport } from "./json.js";
import { printRunDump } from "./terminal.js";
import { Corpus } from "../model/corpus.js";
import { Run } from "../model/run.js";

function sampleCorpus(): Corpus {
  const corpus = new Corpus();

  const fio = new Run("fio", "r1");
  fio.addFact({ name: "kernel", value: "6.1" });
  fio.addMetric({ name: "iops", value: 1500 });
  fio.addMetric({ name: "lat", value: 200, unit: "ns" });
  corpus.add(fio);

  const boot = new Run("boot", "r1");
  boot.addFact({ name: "asi_on", value: true });
  corpus.add(boot);

  return corpus;
}

describe("flattenCorpus", () => {
  it("emits one record per metric with the run's facts", () => {
    expect(flattenCorpus(sampleCorpus())).toEqual([
      { testName: "fio", runId: "r1", metric: "iops", value: 1500, unit: null, facts: { kernel: "6.1" } },
      { testName: "fio", runId: "r1", metric: "lat", value: 200, unit: "ns", facts: { kernel: "6.1" } },
    ]);
  });
});

describe("generateJsonExport", () => {
  it("summarizes runs and metric names", () => {
    const records = flattenCorpus(sampleCorpus());
    const parsed: unknown = JSON.parse(
      generateJsonExport(records, { createdAt: new Date("2024-01-01T00:00:00Z") })
    );

    expect(parsed).toEqual({
      createdAt: "2024-01-01T00:00:00.000Z",
      summary: { runs: 1, records: 2, metrics: ["iops", "lat"] },
      records,
    });
  });
});

describe("printRunDump", () => {
  it("prints each run's key and its values", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});

    printRunDump(sampleCorpus().runs());

    const output = log.mock.calls.map((args) => args.join(" ")).join("\n");
    expect(output).toContain("boot/r1");
    expect(output).toContain("fio/r1");
    expect(output).toContain("kernel");
    expect(output).toContain("1500");
    expect(output).toContain("2 runs");
  });
});
