import type { Enricher } from "./types.js";
import type { Fact } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";
import { isFactObject } from "../model/value.js";
import { readJsonObject } from "./shared.js";

export const FACTS_FILE_NAME = "falba-facts.json";

/**
 * Generic facts file. Each top-level key is a fact; `{ "value": ..., "unit": "..." }`
 * objects are unwrapped, anything else is taken verbatim.
 */
export const factsJsonEnricher: Enricher = {
  name: "facts-json",

  async enrich(artifact) {
    if (artifact.name !== FACTS_FILE_NAME) return emptyExtraction();

    const obj = await readJsonObject(artifact);
    const facts: Fact[] = [];

    for (const [name, raw] of Object.entries(obj)) {
      if (isFactObject(raw) && "value" in raw) {
        const unit = raw.unit;
        facts.push({
          name,
          value: raw.value,
          unit: typeof unit === "string" ? unit : undefined,
        });
      } else {
        facts.push({ name, value: raw });
      }
    }

    return { facts, metrics: [] };
  },
};
