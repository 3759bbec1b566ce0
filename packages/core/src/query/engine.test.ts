import { describe, expect, it } from "vitest";
import { inferCelType, inferDeclarations, isBindableName } from "./declarations.js";
import { PredicateEngine, buildBinding } from "./engine.js";
import { filterRuns, formatRunLine } from "./filter.js";
import { EvaluationError } from "../errors.js";
import { Corpus } from "../model/corpus.js";
import { Run } from "../model/run.js";
import type { FactValue } from "../model/value.js";

function runWith(testName: string, runId: string, facts: Record<string, FactValue>): Run {
  const run = new Run(testName, runId);
  for (const [name, value] of Object.entries(facts)) run.addFact({ name, value });
  return run;
}

describe("inferCelType", () => {
  it("maps every fact value to a CEL type", () => {
    expect(inferCelType(true)).toBe("bool");
    expect(inferCelType(3)).toBe("int");
    expect(inferCelType(3.5)).toBe("double");
    expect(inferCelType("x")).toBe("string");
    expect(inferCelType(null)).toBe("dyn");
    expect(inferCelType([1])).toBe("dyn");
    expect(inferCelType({ a: 1 })).toBe("dyn");
  });
});

describe("inferDeclarations", () => {
  it("declares bindable names in sorted order", () => {
    expect(inferDeclarations({ zeta: 1, alpha: "a", "has-dash": 2, in: true, _ok: 1.5 })).toEqual([
      { name: "_ok", type: "double" },
      { name: "alpha", type: "string" },
      { name: "zeta", type: "int" },
    ]);
  });

  it("rejects reserved words and non-identifiers", () => {
    expect(isBindableName("in")).toBe(false);
    expect(isBindableName("package")).toBe(false);
    expect(isBindableName("9lives")).toBe(false);
    expect(isBindableName("os_release_id")).toBe(true);
  });
});

describe("buildBinding", () => {
  it("adds run_id and test_name over facts of the same name", () => {
    const run = runWith("boot", "r1", { run_id: "fake", cpus: 8 });
    expect(buildBinding(run)).toEqual({ run_id: "r1", test_name: "boot", cpus: 8 });
  });

  it("carries a fact named __proto__ through as a key", () => {
    const run = runWith("boot", "r1", { ["__proto__"]: "x" });
    expect(Object.keys(buildBinding(run))).toEqual(["__proto__", "run_id", "test_name"]);
  });
});

describe("PredicateEngine", () => {
  it("evaluates string comparisons against facts", () => {
    const engine = new PredicateEngine('os_release_id == "nixos" && os_release_version_id == "24.05"');

    expect(engine.evaluate({ os_release_id: "nixos", os_release_version_id: "24.05" })).toBe(true);
    expect(engine.evaluate({ os_release_id: "debian", os_release_version_id: "12" })).toBe(false);
  });

  it("compares integer facts as CEL ints", () => {
    const engine = new PredicateEngine("cpus >= 8");

    expect(engine.evaluate({ cpus: 16 })).toBe(true);
    expect(engine.evaluate({ cpus: 4 })).toBe(false);
  });

  it("fails on an unknown name", () => {
    const engine = new PredicateEngine("missing_name == 1");
    expect(() => engine.evaluate({ cpus: 1 })).toThrow(EvaluationError);
  });

  it("fails on a non-boolean result", () => {
    const engine = new PredicateEngine("cpus");
    expect(() => engine.evaluate({ cpus: 1 })).toThrow(EvaluationError);
  });

  it("cannot reference a fact named after a reserved word", () => {
    const engine = new PredicateEngine("in == true");
    expect(() => engine.evaluate({ in: true })).toThrow(EvaluationError);
  });

  it("rejects an empty expression up front", () => {
    expect(() => new PredicateEngine("  ")).toThrow('Expression "  " failed: expression is empty');
  });

  it("handles bindings with different declarations in turn", () => {
    const engine = new PredicateEngine('test_name == "boot"');

    expect(engine.evaluate({ test_name: "boot" })).toBe(true);
    expect(engine.evaluate({ test_name: "fio", cpus: 2 })).toBe(false);
    expect(engine.evaluate({ test_name: "boot", cpus: 2.5 })).toBe(true);
  });
});

describe("filterRuns", () => {
  it("returns matching runs and records failing ones", () => {
    const corpus = new Corpus();
    corpus.add(runWith("boot", "r1", { os_release_id: "nixos", os_release_version_id: "24.05" }));
    corpus.add(runWith("boot", "r2", { os_release_id: "debian", os_release_version_id: "12" }));
    corpus.add(runWith("boot", "r3", {}));

    const { matches, failures } = filterRuns(corpus, 'os_release_id == "nixos"');

    expect(matches.map(formatRunLine)).toEqual(["boot/r1"]);
    expect(failures.map((f) => f.run.key)).toEqual(["boot/r3"]);
    expect(failures[0].error).toBeInstanceOf(EvaluationError);
  });

  it("matches on run_id and test_name", () => {
    const corpus = new Corpus();
    corpus.add(runWith("boot", "r1", {}));
    corpus.add(runWith("fio", "r1", {}));

    const { matches } = filterRuns(corpus, 'run_id == "r1" && test_name == "fio"');

    expect(matches.map(formatRunLine)).toEqual(["fio/r1"]);
  });
});
