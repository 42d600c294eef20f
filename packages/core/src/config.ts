import { readFileSync } from "node:fs";
import { z } from "zod";
import { PrivacyLevelSchema } from "./schemas.js";
import { ValidationError } from "./errors.js";

const StorageSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("memory") }),
  z.object({ kind: z.literal("file"), directory: z.string().min(1) }),
  z.object({ kind: z.literal("sqlite"), path: z.string().min(1) }),
]);

const CustomPatternSchema = z.object({
  type: z.string().regex(/^[A-Z][A-Z0-9]*$/, "type must be an uppercase identifier without underscores"),
  pattern: z.string().min(1),
  flags: z.string().regex(/^[imsuy]*$/).optional(),
  minLevel: PrivacyLevelSchema.optional(),
});

export const ConfigSchema = z.object({
  defaultPrivacyLevel: PrivacyLevelSchema.default("balanced"),
  storage: StorageSchema.default({ kind: "memory" }),
  persistence: z.enum(["write-through", "deferred"]).default("write-through"),
  normalizeValues: z.boolean().default(false),
  batchConcurrency: z.number().int().min(1).max(64).default(4),
  proximityDistance: z.number().int().min(0).default(50),
  breaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      resetTimeoutMs: z.number().int().min(0).default(60_000),
    })
    .default({}),
  intelligence: z
    .object({
      timeoutMs: z.number().int().positive().default(5000),
      endpoint: z.string().url().optional(),
    })
    .default({}),
  customPatterns: z.array(CustomPatternSchema).default([]),
});

export type TokenVeilConfig = z.infer<typeof ConfigSchema>;
export type TokenVeilConfigInput = z.input<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageSchema>;

export const ENV_PREFIX = "TOKENVEIL_";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Recursive merge of plain objects; arrays and scalars from `over` replace. */
function mergeLayer(base: Record<string, unknown>, over: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(over)) {
    if (value === undefined) continue;
    const current = out[key];
    out[key] = isRecord(current) && isRecord(value) ? mergeLayer(current, value) : value;
  }
  return out;
}

function numberOrRaw(raw: string): number | string {
  const n = Number(raw);
  return raw.trim() !== "" && Number.isFinite(n) ? n : raw;
}

/** Config layer read from TOKENVEIL_* variables. Unset variables contribute nothing. */
export function configFromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const get = (name: string) => {
    const v = env[ENV_PREFIX + name];
    return v === undefined || v === "" ? undefined : v;
  };
  const layer: Record<string, unknown> = {};

  const level = get("PRIVACY_LEVEL");
  if (level) layer.defaultPrivacyLevel = level;

  const storage = get("STORAGE");
  const storagePath = get("STORAGE_PATH");
  if (storage === "memory") layer.storage = { kind: "memory" };
  else if (storage === "file") layer.storage = { kind: "file", directory: storagePath ?? ".tokenveil" };
  else if (storage === "sqlite") layer.storage = { kind: "sqlite", path: storagePath ?? "tokenveil.db" };
  else if (storage) layer.storage = { kind: storage };

  const persistence = get("PERSISTENCE");
  if (persistence) layer.persistence = persistence;

  const normalize = get("NORMALIZE_VALUES");
  if (normalize) layer.normalizeValues = normalize === "true" || normalize === "1";

  const concurrency = get("BATCH_CONCURRENCY");
  if (concurrency) layer.batchConcurrency = numberOrRaw(concurrency);

  const proximity = get("PROXIMITY_DISTANCE");
  if (proximity) layer.proximityDistance = numberOrRaw(proximity);

  const breaker: Record<string, unknown> = {};
  const threshold = get("BREAKER_FAILURE_THRESHOLD");
  if (threshold) breaker.failureThreshold = numberOrRaw(threshold);
  const reset = get("BREAKER_RESET_TIMEOUT_MS");
  if (reset) breaker.resetTimeoutMs = numberOrRaw(reset);
  if (Object.keys(breaker).length > 0) layer.breaker = breaker;

  const intelligence: Record<string, unknown> = {};
  const timeout = get("INTELLIGENCE_TIMEOUT_MS");
  if (timeout) intelligence.timeoutMs = numberOrRaw(timeout);
  const endpoint = get("INTELLIGENCE_ENDPOINT");
  if (endpoint) intelligence.endpoint = endpoint;
  if (Object.keys(intelligence).length > 0) layer.intelligence = intelligence;

  return layer;
}

function readConfigFile(path: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ValidationError(`Cannot read config file ${path}`, {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError(`Config file ${path} is not valid JSON`, { path });
  }
  if (!isRecord(json)) {
    throw new ValidationError(`Config file ${path} must contain a JSON object`, { path });
  }
  return json;
}

export interface LoadConfigOptions {
  /** JSON file layered over the defaults. */
  file?: string;
  /** Defaults to process.env. */
  env?: Record<string, string | undefined>;
  overrides?: TokenVeilConfigInput;
}

/**
 * Resolve configuration: defaults, then the JSON file, then TOKENVEIL_*
 * environment variables, then explicit overrides. Throws ValidationError
 * listing every invalid key.
 */
export function loadConfig(options: LoadConfigOptions = {}): TokenVeilConfig {
  let merged: Record<string, unknown> = {};
  if (options.file) merged = mergeLayer(merged, readConfigFile(options.file));
  merged = mergeLayer(merged, configFromEnv(options.env ?? process.env));
  if (options.overrides) merged = mergeLayer(merged, { ...options.overrides });

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ValidationError("Invalid configuration", {
      issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return result.data;
}
