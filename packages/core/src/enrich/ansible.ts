import type { Enricher } from "./types.js";
import type { Fact } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";
import { isFactObject } from "../model/value.js";
import { readJsonObject } from "./shared.js";

const PREFIX = "ansible_";

/** Output of Ansible's setup module: `ansible_facts.*`, prefix stripped. */
export const ansibleEnricher: Enricher = {
  name: "ansible",

  async enrich(artifact) {
    if (artifact.name !== "ansible.json") return emptyExtraction();

    const obj = await readJsonObject(artifact);
    const namespace = obj.ansible_facts;
    if (!isFactObject(namespace)) return emptyExtraction();

    const facts: Fact[] = Object.entries(namespace).map(([key, value]) => ({
      name: key.startsWith(PREFIX) ? key.slice(PREFIX.length) : key,
      value,
    }));

    return { facts, metrics: [] };
  },
};
