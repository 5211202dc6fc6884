/**
 * Configuration
 *
 * Defaults, then `.storyweave/config.json`, then `STORYWEAVE_*` environment
 * variables, then explicit overrides; the merged object is validated once.
 *
 * @module
 */

import { z } from "zod";
import { getConfigPath, getDataDir } from "../utils/paths.js";
import { readJsonFile } from "../utils/fs.js";
import { ConfigurationError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

export const LockPolicySchema = z.enum(["queue", "fail-fast"]);

export type LockPolicy = z.infer<typeof LockPolicySchema>;

export const RetryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  initialDelayMs: z.number().int().min(0).default(50),
  maxDelayMs: z.number().int().min(0).default(2000),
  backoffFactor: z.number().min(1).default(2),
});

export const CoordinatorConfigSchema = z.object({
  lockPolicy: LockPolicySchema.default("queue"),
  lockWaitTimeoutMs: z.number().int().positive().default(30_000),
  prepareDeadlineMs: z.number().int().positive().default(10_000),
  commitDeadlineMs: z.number().int().positive().default(10_000),
  retry: RetryConfigSchema.default({}),
  graphConcurrency: z.number().int().positive().default(8),
  vectorConcurrency: z.number().int().positive().default(8),
});

export type CoordinatorConfig = z.infer<typeof CoordinatorConfigSchema>;

export type CoordinatorConfigInput = z.input<typeof CoordinatorConfigSchema>;

export const ReconciliationConfigSchema = z.object({
  maxAttempts: z.number().int().positive().default(5),
  batchSize: z.number().int().positive().default(50),
  intervalMs: z.number().int().positive().default(60_000),
  concurrency: z.number().int().positive().default(4),
});

export type ReconciliationConfig = z.infer<typeof ReconciliationConfigSchema>;

export type ReconciliationConfigInput = z.input<typeof ReconciliationConfigSchema>;

export const PostgresConfigSchema = z.object({
  connectionString: z.string().optional(),
  host: z.string().default("localhost"),
  port: z.number().int().positive().default(5432),
  database: z.string().default("storyweave"),
  user: z.string().default("storyweave"),
  password: z.string().default(""),
  max: z.number().int().positive().default(10),
});

export type PostgresConfig = z.infer<typeof PostgresConfigSchema>;

export const StoryweaveConfigSchema = z.object({
  dataDir: z.string().min(1).default(getDataDir()),
  /** Where the registry and ledger keep their records */
  storage: z.enum(["memory", "file"]).default("memory"),
  coordinator: CoordinatorConfigSchema.default({}),
  reconciliation: ReconciliationConfigSchema.default({}),
  postgres: PostgresConfigSchema.optional(),
});

export type StoryweaveConfig = z.infer<typeof StoryweaveConfigSchema>;

export type StoryweaveConfigInput = z.input<typeof StoryweaveConfigSchema>;

// =============================================================================
// Loading
// =============================================================================

export interface LoadConfigOptions {
  /** Config file; defaults to `.storyweave/config.json` under the cwd */
  configPath?: string;
  /** Environment to read `STORYWEAVE_*` variables from */
  env?: NodeJS.ProcessEnv;
  /** Applied last */
  overrides?: StoryweaveConfigInput;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: PlainObject, patch: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    const existing = merged[key];
    merged[key] = isPlainObject(existing) && isPlainObject(value) ? deepMerge(existing, value) : value;
  }
  return merged;
}

function parseIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`, { variable: name });
  }
  return value;
}

/**
 * Maps `STORYWEAVE_*` variables onto the config shape
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PlainObject {
  const config: PlainObject = {};
  const coordinator: PlainObject = {};

  if (env.STORYWEAVE_DATA_DIR) config.dataDir = env.STORYWEAVE_DATA_DIR;
  if (env.STORYWEAVE_STORAGE) config.storage = env.STORYWEAVE_STORAGE;
  if (env.STORYWEAVE_LOCK_POLICY) coordinator.lockPolicy = env.STORYWEAVE_LOCK_POLICY;

  const prepareDeadlineMs = parseIntEnv(env, "STORYWEAVE_PREPARE_DEADLINE_MS");
  if (prepareDeadlineMs !== undefined) coordinator.prepareDeadlineMs = prepareDeadlineMs;
  const commitDeadlineMs = parseIntEnv(env, "STORYWEAVE_COMMIT_DEADLINE_MS");
  if (commitDeadlineMs !== undefined) coordinator.commitDeadlineMs = commitDeadlineMs;

  if (Object.keys(coordinator).length > 0) config.coordinator = coordinator;
  if (env.STORYWEAVE_PG_URL) config.postgres = { connectionString: env.STORYWEAVE_PG_URL };

  return config;
}

/**
 * Validates a config object, applying defaults
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseConfig(input: unknown): StoryweaveConfig {
  const result = StoryweaveConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

/**
 * Loads configuration from file, environment and overrides
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StoryweaveConfig> {
  const configPath = options.configPath ?? getConfigPath();

  let fileConfig: unknown;
  try {
    fileConfig = await readJsonFile(configPath);
  } catch (error) {
    throw new ConfigurationError(`Failed to read ${configPath}: ${error instanceof Error ? error.message : String(error)}`, {
      configPath,
    });
  }
  let merged: PlainObject = {};
  if (isPlainObject(fileConfig)) {
    merged = fileConfig;
  } else if (fileConfig !== null) {
    throw new ConfigurationError(`${configPath} must contain a JSON object`, { configPath });
  }

  merged = deepMerge(merged, configFromEnv(options.env ?? process.env));
  if (options.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return parseConfig(merged);
}
