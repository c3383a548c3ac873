import { readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors.js";
import { MAX_TIMER_MS } from "./utils/retry.js";

export type StagelineConfig = {
  timeouts: {
    /** Per-attempt capability timeout when a task does not set its own. */
    taskDefault: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    maxConcurrency: number;
    maxRuns: number;
    outputTruncation: number;
  };
  store: {
    dbPath: string;
  };
};

export const DEFAULT_DATA_DIR = join(homedir(), ".stageline");

const DEFAULTS: StagelineConfig = {
  timeouts: {
    taskDefault: 60_000,
  },
  retry: {
    maxAttempts: 3,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    maxConcurrency: 8,
    maxRuns: 50,
    outputTruncation: 200,
  },
  store: {
    dbPath: join(DEFAULT_DATA_DIR, "runs.db"),
  },
};

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();
const timerMs = positiveInt.max(MAX_TIMER_MS);
const delayMs = nonNegativeInt.max(MAX_TIMER_MS);

const ConfigFileSchema = z
  .object({
    timeouts: z.object({ taskDefault: timerMs }).partial(),
    retry: z.object({ maxAttempts: positiveInt, baseDelayMs: delayMs, maxDelayMs: delayMs }).partial(),
    limits: z.object({ maxConcurrency: positiveInt, maxRuns: positiveInt, outputTruncation: positiveInt }).partial(),
    store: z.object({ dbPath: z.string().min(1) }).partial(),
  })
  .partial();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

function merge<T extends object>(base: T, overrides: Partial<T> | undefined): T {
  return { ...base, ...stripUndefined(overrides ?? {}) };
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(value) as (keyof T)[]) {
    if (value[key] !== undefined) out[key] = value[key];
  }
  return out;
}

/**
 * Build a config value from the defaults and the given overrides. Returns a
 * fresh object; nothing is stored module-wide, callers pass the result on.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): StagelineConfig {
  return {
    timeouts: merge(DEFAULTS.timeouts, overrides.timeouts),
    retry: merge(DEFAULTS.retry, overrides.retry),
    limits: merge(DEFAULTS.limits, overrides.limits),
    store: merge(DEFAULTS.store, overrides.store),
  };
}

/** Parse and validate config overrides from unknown JSON data. */
export function parseConfig(data: unknown): ConfigOverrides {
  const result = ConfigFileSchema.strict().safeParse(data);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new ConfigError("INVALID_CONFIG", `Invalid config: ${msg}`);
  }
  return result.data;
}

/** Read a JSON config file and merge it over the defaults. */
export function loadConfigFile(path: string): StagelineConfig {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError("INVALID_CONFIG", `Cannot read config file ${path}: ${errorMessage(err)}`);
  }
  return resolveConfig(parseConfig(data));
}

/** The default config values (frozen). */
export const defaults: Readonly<StagelineConfig> = Object.freeze(resolveConfig());
