/**
 * Config loader: reads and validates `.gatewise.yml` configuration files.
 * Uses Zod for schema validation with helpful error messages.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join, isAbsolute } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { logger } from "./logger.js";
import { COMPONENT_NAMES, ComponentNameSchema, type ComponentName } from "./schemas.js";
import { DEFAULT_WEIGHTS } from "./scoring/scorer.js";
import { DEFAULT_FIELDS, type LogFieldMap } from "./sources/log-store.js";
import { DEFAULT_INDEX_PATTERN } from "./sources/elasticsearch.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const CONFIG_FILE = ".gatewise.yml";

export interface ElasticsearchConfig {
  url: string;
  index_pattern: string;
  username?: string;
  password?: string;
}

export interface GatewiseConfig {
  /** Weight per score component; names left out keep their default. */
  weights: Record<ComponentName, number>;
  /** Keyword file for the sensitive-field scan; null uses the built-in list. */
  sensitive_keywords_file: string | null;
  sample_size: number;
  default_range_days: number;
  max_range_days: number;
  /** Directory of exported gateway proxy documents. */
  config_dir: string;
  elasticsearch: ElasticsearchConfig;
  /** Log field-name overrides. */
  fields: Partial<LogFieldMap>;
}

export const DEFAULT_CONFIG: GatewiseConfig = {
  weights: { ...DEFAULT_WEIGHTS },
  sensitive_keywords_file: null,
  sample_size: 1000,
  default_range_days: 7,
  max_range_days: 90,
  config_dir: "./apis",
  elasticsearch: { url: "http://localhost:9200", index_pattern: DEFAULT_INDEX_PATTERN },
  fields: {},
};

/** Allowed distance of the weight sum from 1. */
const WEIGHT_SUM_TOLERANCE = 0.01;

const KNOWN_KEYS = new Set([
  "weights",
  "sensitive_keywords_file",
  "sample_size",
  "default_range_days",
  "max_range_days",
  "config_dir",
  "elasticsearch",
  "fields",
]);

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const gatewiseConfigSchema = z.object({
  weights: z.record(z.string(), z.number()).optional(),
  sensitive_keywords_file: z.string().optional(),
  sample_size: z.number().int().positive().optional(),
  default_range_days: z.number().positive().optional(),
  max_range_days: z.number().positive().optional(),
  config_dir: z.string().optional(),
  elasticsearch: z.object({
    url: z.string().url().optional(),
    index_pattern: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
  }).optional(),
  fields: z.record(z.string(), z.string()).optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function isComponentName(name: string): name is ComponentName {
  return ComponentNameSchema.safeParse(name).success;
}

function isFieldName(name: string): name is keyof LogFieldMap {
  return Object.prototype.hasOwnProperty.call(DEFAULT_FIELDS, name);
}

function hint(input: string, valid: readonly string[]): string {
  const suggestion = didYouMean(input, valid);
  return suggestion ? `. Did you mean '${suggestion}'?` : "";
}

/** Warn when weights do not sum to 1; the scorer itself never checks. */
export function checkWeightSum(weights: Partial<Record<ComponentName, number>>): boolean {
  const sum = COMPONENT_NAMES.reduce((s, name) => s + (weights[name] ?? 0), 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    logger.warn(`Warning: scoring weights sum to ${sum.toFixed(3)}, expected 1.0`);
    return false;
  }
  return true;
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

function defaults(): GatewiseConfig {
  return {
    ...DEFAULT_CONFIG,
    weights: { ...DEFAULT_CONFIG.weights },
    elasticsearch: { ...DEFAULT_CONFIG.elasticsearch },
    fields: {},
  };
}

/**
 * Load `.gatewise.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): GatewiseConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    logger.warn(`Warning: could not read ${CONFIG_FILE}: ${detail}. Using defaults.`);
    return defaults();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    logger.warn(`Warning: could not parse ${CONFIG_FILE}: ${detail}. Using defaults.`);
    return defaults();
  }

  if (!parsed || typeof parsed !== "object") return defaults();

  const result = gatewiseConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`Warning: config validation error at ${issue.path.join(".")}: ${issue.message}`);
    }
    return defaults();
  }

  const data = result.data;

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Warning: unknown config key '${key}'${hint(key, [...KNOWN_KEYS])}`);
    }
  }

  const config = defaults();

  // weights
  if (data.weights) {
    for (const [name, weight] of Object.entries(data.weights)) {
      if (!isComponentName(name)) {
        logger.warn(`Warning: unknown score component '${name}' in weights${hint(name, COMPONENT_NAMES)}`);
        continue;
      }
      if (weight < 0) {
        logger.warn(`Warning: negative weight for '${name}' ignored`);
        continue;
      }
      config.weights[name] = weight;
    }
    checkWeightSum(config.weights);
  }

  if (data.sensitive_keywords_file !== undefined) config.sensitive_keywords_file = data.sensitive_keywords_file;
  if (data.sample_size !== undefined) config.sample_size = data.sample_size;
  if (data.default_range_days !== undefined) config.default_range_days = data.default_range_days;
  if (data.max_range_days !== undefined) config.max_range_days = data.max_range_days;
  if (data.config_dir !== undefined) config.config_dir = data.config_dir;

  if (config.default_range_days > config.max_range_days) {
    logger.warn(
      `Warning: default_range_days (${config.default_range_days}) exceeds max_range_days (${config.max_range_days}); using ${config.max_range_days}`,
    );
    config.default_range_days = config.max_range_days;
  }

  // elasticsearch
  if (data.elasticsearch) {
    const es = data.elasticsearch;
    if (es.url !== undefined) config.elasticsearch.url = es.url;
    if (es.index_pattern !== undefined) config.elasticsearch.index_pattern = es.index_pattern;
    if (es.username !== undefined) config.elasticsearch.username = es.username;
    if (es.password !== undefined) config.elasticsearch.password = es.password;
  }

  // fields
  if (data.fields) {
    for (const [name, field] of Object.entries(data.fields)) {
      if (isFieldName(name)) {
        config.fields[name] = field;
      } else {
        logger.warn(`Warning: unknown log field '${name}'${hint(name, Object.keys(DEFAULT_FIELDS))}`);
      }
    }
  }

  return config;
}

/**
 * Apply GATEWISE_ES_* environment overrides on top of a loaded config.
 */
export function applyEnvOverrides(
  config: GatewiseConfig,
  env: NodeJS.ProcessEnv = process.env,
): GatewiseConfig {
  const es = { ...config.elasticsearch };
  if (env.GATEWISE_ES_URL) es.url = env.GATEWISE_ES_URL;
  if (env.GATEWISE_ES_INDEX) es.index_pattern = env.GATEWISE_ES_INDEX;
  if (env.GATEWISE_ES_USERNAME) es.username = env.GATEWISE_ES_USERNAME;
  if (env.GATEWISE_ES_PASSWORD) es.password = env.GATEWISE_ES_PASSWORD;
  return { ...config, elasticsearch: es };
}

/**
 * Load, default and override the configuration for `dir`. Relative paths in
 * the file are resolved against `dir`.
 */
export function resolveConfig(dir: string, env: NodeJS.ProcessEnv = process.env): GatewiseConfig {
  const config = applyEnvOverrides(loadConfig(dir) ?? defaults(), env);
  const absolute = (p: string) => (isAbsolute(p) ? p : resolve(dir, p));
  return {
    ...config,
    config_dir: absolute(config.config_dir),
    sensitive_keywords_file:
      config.sensitive_keywords_file === null ? null : absolute(config.sensitive_keywords_file),
  };
}
