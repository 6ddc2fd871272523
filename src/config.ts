import { readFileSync } from "node:fs";
import { ConfigError, errorMessage } from "./errors.js";
import { ConfigFileSchema, EngineConfigSchema } from "./schemas.js";

export type EngineConfig = {
  timeouts: {
    oracle: number;
    httpHealth: number;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  limits: {
    maxConcurrency: number;
    /** The run is cancelled once more than this many subtasks have failed. */
    maxFailures: number;
    maxDecomposeAttempts: number;
    tablePreviewRows: number;
    outputTruncation: number;
  };
  retrieval: {
    tools: string[];
    topK: number;
    /** Evidence items shown to the oracle per subtask. */
    promptEvidence: number;
    weights: Record<string, number>;
    /** Weight for tools missing from `weights`. */
    defaultWeight: number;
  };
  oracle: {
    url?: string;
    model: string;
    temperature: number;
    maxTokens: number;
  };
  store: {
    path?: string;
  };
};

export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends unknown[] ? T[P] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

const DEFAULTS: EngineConfig = {
  timeouts: {
    oracle: 60_000,
    httpHealth: 5_000,
  },
  retry: {
    maxAttempts: 2,
    baseDelayMs: 500,
    maxDelayMs: 10_000,
  },
  limits: {
    maxConcurrency: 4,
    maxFailures: 3,
    maxDecomposeAttempts: 2,
    tablePreviewRows: 10,
    outputTruncation: 2_000,
  },
  retrieval: {
    tools: ["sparse", "dense"],
    topK: 5,
    promptEvidence: 3,
    weights: { sparse: 0.3, dense: 0.7 },
    defaultWeight: 0.5,
  },
  oracle: {
    model: "qwen2.5-1.5b-instruct",
    temperature: 0.1,
    maxTokens: 512,
  },
  store: {},
};

let current: EngineConfig = structuredClone(DEFAULTS);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, overrides: Record<string, unknown>): Record<string, unknown> {
  const result = structuredClone(base);
  for (const [key, val] of Object.entries(overrides)) {
    const existing = result[key];
    if (isPlainObject(val) && isPlainObject(existing)) {
      result[key] = deepMerge(existing, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

function mergeConfig(base: EngineConfig, overrides: Record<string, unknown>): EngineConfig {
  const merged = deepMerge(base, overrides);
  const parsed = EngineConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}

/** Override config values. Merges deeply with defaults. */
export function configure(overrides: DeepPartial<EngineConfig>): void {
  current = mergeConfig(DEFAULTS, overrides);
}

/** Load a JSON config file and merge it over the defaults. */
export function loadConfigFile(path: string): EngineConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${path}: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  current = mergeConfig(DEFAULTS, parsed.data);
  return current;
}

/** Reset config to defaults. */
export function resetConfig(): void {
  current = structuredClone(DEFAULTS);
}

/** Get the current config (read-only). */
export function getConfig(): Readonly<EngineConfig> {
  return current;
}

/** The default config values (frozen). */
export const defaults: Readonly<EngineConfig> = Object.freeze(structuredClone(DEFAULTS));
