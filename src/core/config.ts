import { z } from "zod";

import { configError } from "./errors.js";
import { REMOTE_RESOURCES } from "./types.js";

const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const DEFAULT_ANALYSIS_EXTENSIONS = [
  ".ts",
  ".tsx",
  ".mts",
  ".cts",
  ".js",
  ".jsx",
  ".mjs",
  ".cjs",
] as const;

const DEFAULT_ANALYSIS_EXCLUDE = [
  "node_modules/",
  "dist/",
  "build/",
  "coverage/",
  "vendor/",
  ".d.ts",
  ".min.js",
] as const;

const HOUR_MS = 60 * 60 * 1000;

export const RepositorySchema = z
  .object({
    path: z.string().min(1).default("."),
    branch: z.string().min(1).optional(),
  })
  .strict()
  .default({});

export const RemoteSchema = z
  .object({
    enabled: z.boolean().default(true),
    /** Falls back to the `origin` remote when omitted. */
    owner: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
    token: z.string().min(1).optional(),
    resources: z.array(z.enum(REMOTE_RESOURCES)).default([...REMOTE_RESOURCES]),
    perPage: z.number().int().min(1).max(100).default(100),
    maxPages: z.number().int().positive().default(50),
    maxRetries: z.number().int().min(0).default(3),
    maxRetryWaitMs: z.number().int().positive().default(120_000),
    deadlineMs: z.number().int().positive().optional(),
  })
  .strict()
  .default({});

export const CacheSchema = z
  .object({
    enabled: z.boolean().default(true),
    directory: z.string().min(1).default(".repo-miner/cache"),
    historyTtlMs: z.number().int().positive().nullable().default(null),
    remoteTtlMs: z.number().int().positive().nullable().default(HOUR_MS),
    analysisTtlMs: z.number().int().positive().nullable().default(7 * 24 * HOUR_MS),
  })
  .strict()
  .default({});

export const AnalysisSchema = z
  .object({
    extensions: z.array(z.string().startsWith(".")).default([...DEFAULT_ANALYSIS_EXTENSIONS]),
    exclude: z.array(z.string().min(1)).default([...DEFAULT_ANALYSIS_EXCLUDE]),
    concurrency: z.number().int().positive().default(4),
    /** Analyze every revision of touched files to build complexity series. */
    history: z.boolean().default(true),
  })
  .strict()
  .default({});

export const CorrelationSchema = z
  .object({
    bestEffort: z.boolean().default(true),
  })
  .strict()
  .default({});

export const OutputSchema = z
  .object({
    path: z.string().min(1).default(".repo-miner/dataset.json"),
  })
  .strict()
  .default({});

export const MinerConfigSchema = z
  .object({
    repository: RepositorySchema,
    remote: RemoteSchema,
    cache: CacheSchema,
    analysis: AnalysisSchema,
    correlation: CorrelationSchema,
    output: OutputSchema,
  })
  .strict();

export type MinerConfig = z.output<typeof MinerConfigSchema>;
export type MinerConfigInput = z.input<typeof MinerConfigSchema>;

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>;
}

export function defineConfig(config: MinerConfigInput): MinerConfigInput {
  return config;
}

export function interpolateEnvVars(
  value: string,
  env: Record<string, string | undefined> = process.env,
  path: string[] = [],
): string {
  return value.replaceAll(ENV_VAR_PATTERN, (_, variableName: string) => {
    const interpolated = env[variableName];
    if (interpolated !== undefined) {
      return interpolated;
    }

    throw configError(
      "CONFIG_SECRET_MISSING",
      `Environment variable ${variableName} is referenced in config but not set`,
      {
        context: {
          variableName,
          path: path.length > 0 ? path.join(".") : "<root>",
        },
      },
    );
  });
}

export function loadConfig(config: unknown = {}, options: LoadConfigOptions = {}): MinerConfig {
  const env = options.env ?? process.env;
  const interpolatedConfig = interpolateConfigEnvVars(config, env);
  const parsed = MinerConfigSchema.safeParse(interpolatedConfig);

  if (parsed.success) {
    return parsed.data;
  }

  throw configError("CONFIG_INVALID", "Invalid repo-miner configuration", {
    context: {
      issues: parsed.error.issues.map((issue) => ({
        code: issue.code,
        message: issue.message,
        path: issue.path.join("."),
      })),
    },
  });
}

function interpolateConfigEnvVars(
  value: unknown,
  env: Record<string, string | undefined>,
  path: string[] = [],
): unknown {
  if (typeof value === "string") {
    return interpolateEnvVars(value, env, path);
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => interpolateConfigEnvVars(item, env, [...path, `${index}`]));
  }

  if (!isPlainObject(value)) {
    return value;
  }

  const interpolatedObject: Record<string, unknown> = {};

  for (const [key, nestedValue] of Object.entries(value)) {
    interpolatedObject[key] = interpolateConfigEnvVars(nestedValue, env, [...path, key]);
  }

  return interpolatedObject;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
