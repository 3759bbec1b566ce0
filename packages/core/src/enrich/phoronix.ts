import { z } from "zod";
import type { Enricher } from "./types.js";
import type { Fact, Metric } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";
import { isFactObject, type FactValue } from "../model/value.js";
import { readJsonObject } from "./shared.js";

const ResultEntrySchema = z.object({
  title: z.string(),
  // Phoronix usually reports values as strings
  value: z.union([z.string(), z.number()]),
  scale: z.string().optional(),
});

/** Phoronix Test Suite JSON export. */
export const phoronixEnricher: Enricher = {
  name: "phoronix",

  async enrich(artifact) {
    if (artifact.name !== "phoronix.json") return emptyExtraction();

    const obj = await readJsonObject(artifact);
    const facts: Fact[] = [];
    const metrics: Metric[] = [];

    const system = obj.system;
    if (isFactObject(system) && typeof system.hardware === "string") {
      facts.push({ name: "phoronix_system_hardware", value: system.hardware });
    }

    for (const entry of resultEntries(obj.results)) {
      const parsed = ResultEntrySchema.safeParse(entry);
      if (!parsed.success) continue;

      const { title, value, scale } = parsed.data;
      metrics.push({ name: title, value, unit: scale ? scale : undefined });
    }

    return { facts, metrics };
  },
};

function resultEntries(results: FactValue | undefined): FactValue[] {
  if (Array.isArray(results)) return results;
  if (results !== undefined && isFactObject(results)) return Object.values(results);
  return [];
}
