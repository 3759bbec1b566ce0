import type { Enricher } from "./types.js";
import type { Fact } from "../model/run.js";
import { emptyExtraction } from "../model/run.js";
import { ExtractionError } from "../errors.js";
import { readJsonObject } from "./shared.js";

const OS_RELEASE_FIELDS: Record<string, string> = {
  ID: "os_release_id",
  VERSION_ID: "os_release_version_id",
  VARIANT_ID: "os_release_variant_id",
};

/** A copy of /etc/os-release, as collected by the benchmark harness. */
export const osReleaseEnricher: Enricher = {
  name: "os-release",

  async enrich(artifact) {
    if (artifact.name !== "etc_os-release" && artifact.name !== "os-release") {
      return emptyExtraction();
    }

    const fields = parseOsRelease(await artifact.text(), artifact.path);
    const facts: Fact[] = [];
    for (const [key, factName] of Object.entries(OS_RELEASE_FIELDS)) {
      const value = fields.get(key);
      if (value !== undefined) facts.push({ name: factName, value });
    }
    return { facts, metrics: [] };
  },
};

export function parseOsRelease(text: string, path: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    const eq = line.indexOf("=");
    if (eq <= 0) {
      throw new ExtractionError(path, `invalid os-release line: ${line}`);
    }
    fields.set(line.slice(0, eq), unquote(line.slice(eq + 1)));
  }
  return fields;
}

function unquote(value: string): string {
  const quote = value[0];
  if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
    return value.slice(1, -1);
  }
  return value;
}

/** The kernel's build config. Every `CONFIG_X=value` line becomes fact `kconfig_CONFIG_X`. */
export const kconfigEnricher: Enricher = {
  name: "kconfig",

  async enrich(artifact) {
    if (artifact.name !== "kconfig") return emptyExtraction();

    const facts: Fact[] = [];
    for (const rawLine of (await artifact.text()).split("\n")) {
      const line = rawLine.trim();
      if (!line || line.startsWith("#")) continue;

      const eq = line.indexOf("=");
      if (eq <= 0) {
        throw new ExtractionError(artifact.path, `invalid kconfig line: ${line}`);
      }
      facts.push({ name: `kconfig_${line.slice(0, eq)}`, value: line.slice(eq + 1) });
    }
    return { facts, metrics: [] };
  },
};

/** Output of `nixos-version --json`. */
export const nixosVersionEnricher: Enricher = {
  name: "nixos-version",

  async enrich(artifact) {
    if (artifact.name !== "nixos-version.json") return emptyExtraction();

    const obj = await readJsonObject(artifact);
    const revision = obj.configurationRevision;
    if (typeof revision !== "string") {
      throw new ExtractionError(artifact.path, "missing configurationRevision");
    }
    return {
      facts: [{ name: "nixos_configuration_revision", value: revision }],
      metrics: [],
    };
  },
};

/** Store path of the booted NixOS system. */
export const nixosSystemEnricher: Enricher = {
  name: "nixos-system",

  async enrich(artifact) {
    if (artifact.name !== "nixos-system.txt") return emptyExtraction();

    const text = await artifact.text();
    return { facts: [{ name: "nixos_system", value: text.trimEnd() }], metrics: [] };
  },
};
