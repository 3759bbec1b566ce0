import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";

const ConfigSchema = z
  .object({
    resultDb: z.string().min(1).optional(),
    archive: z
      .object({
        maxDepth: z.number().int().min(1).optional(),
        scratchDir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FalbaConfig = z.infer<typeof ConfigSchema>;

export interface ResolvedConfig {
  resultDb: string;
  archive: {
    maxDepth: number;
    scratchDir?: string;
  };
  /** Config file the values came from, if any. */
  filepath?: string;
}

export const DEFAULT_RESULT_DB = "./results";
export const DEFAULT_MAX_DEPTH = 2;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function defineConfig(config: FalbaConfig): FalbaConfig {
  return config;
}

export async function loadConfig(searchFrom?: string): Promise<ResolvedConfig> {
  const explorer = cosmiconfig("falba", {
    searchPlaces: [
      "falba.config.ts",
      "falba.config.js",
      "falba.config.json",
      ".falbarc",
      ".falbarc.json",
    ],
  });

  const result = searchFrom
    ? await explorer.search(searchFrom)
    : await explorer.search();

  if (!result || result.isEmpty) {
    return resolveConfig({});
  }

  const parsed = ConfigSchema.safeParse(interpolateEnvVars(result.config));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ConfigError(`Invalid config in ${result.filepath}:\n${issues}`);
  }

  return { ...resolveConfig(parsed.data), filepath: result.filepath };
}

export function resolveConfig(config: FalbaConfig): ResolvedConfig {
  return {
    resultDb: config.resultDb ?? DEFAULT_RESULT_DB,
    archive: {
      maxDepth: config.archive?.maxDepth ?? DEFAULT_MAX_DEPTH,
      scratchDir: config.archive?.scratchDir,
    },
  };
}

/** Replaces `${env.NAME}` in every string with the variable's value, or "". */
export function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => {
      return process.env[key] ?? "";
    });
  }
  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = interpolateEnvVars(item);
    }
    return result;
  }
  return value;
}
