import type { Deriver } from "./types.js";
import type { Run } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";

export type RetbleedMitigation = "off" | "stibp" | "unret" | "ibpb" | "unknown";

function stringFact(run: Run, name: string): string | undefined {
  const value = run.facts.get(name)?.value;
  return typeof value === "string" ? value : undefined;
}

function booleanFact(run: Run, name: string): boolean | undefined {
  const value = run.facts.get(name)?.value;
  return typeof value === "boolean" ? value : undefined;
}

/** ASI is enabled by `mitigations=auto,nosmt`, in either order. */
export const asiOnDeriver: Deriver = {
  name: "asi-on",

  derive(run) {
    const cmdline = stringFact(run, "cmdline");
    if (cmdline === undefined) return emptyExtraction();

    const asiOn =
      cmdline.includes("mitigations=auto,nosmt") || cmdline.includes("nosmt,mitigations=auto");
    return { facts: [{ name: "asi_on", value: asiOn }], metrics: [] };
  },
};

// First match wins. `retbleed=unret` shadows `retbleed=unret,nosmt`; kept in this order.
const RETBLEED_RULES: { pattern: string; outcome: (smpActive: boolean) => RetbleedMitigation }[] = [
  { pattern: "retbleed=off", outcome: () => "off" },
  { pattern: "retbleed=auto,nosmt", outcome: (smp) => (smp ? "stibp" : "unret") },
  { pattern: "retbleed=ibpb", outcome: () => "ibpb" },
  { pattern: "retbleed=unret", outcome: (smp) => (smp ? "stibp" : "unret") },
  { pattern: "retbleed=unret,nosmt", outcome: () => "stibp" },
];

export function classifyRetbleed(cmdline: string, smpActive: boolean): RetbleedMitigation {
  const rule = RETBLEED_RULES.find((r) => cmdline.includes(r.pattern));
  return rule ? rule.outcome(smpActive) : "unknown";
}

export const retbleedMitigationDeriver: Deriver = {
  name: "retbleed-mitigation",

  derive(run) {
    const cmdline = stringFact(run, "cmdline");
    if (cmdline === undefined) return emptyExtraction();

    const smpActive = booleanFact(run, "lscpu_smp_active") ?? false;
    return {
      facts: [{ name: "retbleed_mitigation", value: classifyRetbleed(cmdline, smpActive) }],
      metrics: [],
    };
  },
};
