/**
 * @summary Configuration model and layered resolution for the varscope CLI.
 *
 * Sources, lowest precedence first:
 *
 * 1. built-in defaults (defaultConfig)
 * 2. a JSON file given with `--config` or `VARSCOPE_CONFIG`
 * 3. environment: `VARSCOPE_TRAINER`, `VARSCOPE_TMPDIR`
 * 4. command-line flags
 *
 * Used by:
 * - Every CLI command before it touches the corpus
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigurationError, parseMetricSelector, parseOrderSelector } from "@varscope/core";
import type { MetricSelector, OrderSelector } from "@varscope/core";
import { DEFAULT_TRAINER_BINARY } from "@varscope/runner-vw";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type VarscopeConfig = {
  trainer: {
    binary: string;        // executable name or path of the learner
  };
  tmpDir: string;          // parent of each run's artifact directory
  keepArtifacts: boolean;  // leave probe/model/audit files behind
  verbose: boolean;
  order: OrderSelector;
  metric: MetricSelector;
};

/** One configuration layer; absent fields fall through to lower layers */
export type PartialConfig = {
  trainer?: { binary?: string | undefined } | undefined;
  tmpDir?: string | undefined;
  keepArtifacts?: boolean | undefined;
  verbose?: boolean | undefined;
  order?: string | undefined;
  metric?: string | undefined;
};

export const CONFIG_ENV = "VARSCOPE_CONFIG";
export const TRAINER_ENV = "VARSCOPE_TRAINER";
export const TMPDIR_ENV = "VARSCOPE_TMPDIR";

const TOP_LEVEL_KEYS = new Set(["trainer", "tmpDir", "keepArtifacts", "verbose", "order", "metric"]);

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function defaultConfig(partial?: PartialConfig): VarscopeConfig {
  return {
    trainer: {
      binary: partial?.trainer?.binary ?? DEFAULT_TRAINER_BINARY,
    },
    tmpDir: partial?.tmpDir ?? os.tmpdir(),
    keepArtifacts: partial?.keepArtifacts ?? false,
    verbose: partial?.verbose ?? false,
    order: parseOrderSelector(partial?.order ?? "r"),
    metric: parseMetricSelector(partial?.metric ?? "w"),
  };
}

// ---------------------------------------------------------------------------
// File Layer
// ---------------------------------------------------------------------------

/**
 * Read and validate a JSON configuration file.
 *
 * @throws ConfigurationError if the file is unreadable, not JSON, or has
 * fields of the wrong type
 */
export async function loadConfigFile(filePath: string): Promise<PartialConfig> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read config file ${filePath}`,
      error instanceof Error ? error : undefined
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(
      `Config file ${filePath} is not valid JSON`,
      error instanceof Error ? error : undefined
    );
  }

  const layer = parseConfigObject(parsed, filePath);
  if (layer.tmpDir !== undefined) {
    layer.tmpDir = path.resolve(path.dirname(filePath), layer.tmpDir);
  }
  return layer;
}

/**
 * Validate a decoded configuration object.
 */
export function parseConfigObject(value: unknown, source: string): PartialConfig {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${source}: configuration must be a JSON object`);
  }

  for (const key of Object.keys(value)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      throw new ConfigurationError(`${source}: unknown configuration key "${key}"`);
    }
  }

  let trainer: PartialConfig["trainer"];
  if (value.trainer !== undefined) {
    if (!isRecord(value.trainer)) {
      throw new ConfigurationError(`${source}: "trainer" must be an object`);
    }
    trainer = { binary: optionalString(value.trainer, "binary", `${source}: trainer`) };
  }

  return {
    trainer,
    tmpDir: optionalString(value, "tmpDir", source),
    keepArtifacts: optionalBoolean(value, "keepArtifacts", source),
    verbose: optionalBoolean(value, "verbose", source),
    order: optionalString(value, "order", source),
    metric: optionalString(value, "metric", source),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(obj: Record<string, unknown>, key: string, source: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigurationError(`${source}: "${key}" must be a non-empty string`);
  }
  return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, source: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`${source}: "${key}" must be true or false`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// Environment Layer
// ---------------------------------------------------------------------------

export function configFromEnv(env: NodeJS.ProcessEnv): PartialConfig {
  const binary = nonEmpty(env[TRAINER_ENV]);
  return {
    trainer: binary !== undefined ? { binary } : undefined,
    tmpDir: nonEmpty(env[TMPDIR_ENV]),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Merge layers in order; a defined field in a later layer wins.
 */
export function mergeLayers(layers: readonly PartialConfig[]): PartialConfig {
  const merged: PartialConfig = {};
  for (const layer of layers) {
    const binary = layer.trainer?.binary ?? merged.trainer?.binary;
    if (binary !== undefined) merged.trainer = { binary };
    merged.tmpDir = layer.tmpDir ?? merged.tmpDir;
    merged.keepArtifacts = layer.keepArtifacts ?? merged.keepArtifacts;
    merged.verbose = layer.verbose ?? merged.verbose;
    merged.order = layer.order ?? merged.order;
    merged.metric = layer.metric ?? merged.metric;
  }
  return merged;
}

export interface ConfigSources {
  /** Explicit `--config` path */
  configPath?: string | undefined;
  env: NodeJS.ProcessEnv;
  flags: PartialConfig;
}

/**
 * Build the effective configuration from every source.
 *
 * @throws ConfigurationError for a bad file
 * @throws UnsupportedFeatureError for an unknown order or metric letter
 */
export async function resolveConfig(sources: ConfigSources): Promise<VarscopeConfig> {
  const filePath = sources.configPath ?? nonEmpty(sources.env[CONFIG_ENV]);
  const fileLayer = filePath !== undefined ? await loadConfigFile(filePath) : {};
  return defaultConfig(mergeLayers([fileLayer, configFromEnv(sources.env), sources.flags]));
}
