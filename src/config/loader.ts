/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (KMEANS_LAB_*)
 * 3. Project config file (./kmeans-lab.config.json)
 * 4. User config file (~/.kmeans-lab/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  DEFAULT_CONFIG,
  getConfig,
  isOutputFormat,
  resolvePath,
  type LabConfig,
} from './lab-config.js';
import { isMetricName, METRIC_NAMES } from '../clusters/distance.js';
import { createLogger, isLogLevel } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  clustering?: {
    /** 'euclidean' | 'manhattan'. Default: 'euclidean' */
    metric?: string;
    /** Iteration cap. 0 = no cap. Default: 100 */
    maxIterations?: number;
  };
  logging?: {
    /** 'debug' | 'info' | 'warn' | 'error' | 'silent'. Default: 'info' */
    level?: string;
    json?: boolean;
  };
  output?: {
    /** 'text' | 'json'. Default: 'text' */
    format?: string;
  };
}

/** Default external config values, derived from the runtime defaults */
const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  clustering: {
    metric: DEFAULT_CONFIG.metric,
    maxIterations: DEFAULT_CONFIG.maxIterations ?? 0,
  },
  logging: {
    level: DEFAULT_CONFIG.logLevel,
    json: DEFAULT_CONFIG.logJson,
  },
  output: {
    format: DEFAULT_CONFIG.outputFormat,
  },
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known, correctly typed fields out of parsed JSON.
 * Fields with the wrong type are dropped with a warning.
 */
export function toExternalConfig(raw: unknown, source = 'config'): ExternalConfig {
  const config: ExternalConfig = {};
  if (!isObject(raw)) {
    log.warn(`Ignoring ${source}: expected a JSON object`);
    return config;
  }

  const pick = <T>(
    section: string,
    field: string,
    guard: (v: unknown) => v is T,
  ): T | undefined => {
    const sectionValue = raw[section];
    if (!isObject(sectionValue) || !(field in sectionValue)) return undefined;
    const value = sectionValue[field];
    if (guard(value)) return value;
    log.warn(`Ignoring ${section}.${field} in ${source}: unexpected type`, { value });
    return undefined;
  };
  const isString = (v: unknown): v is string => typeof v === 'string';
  const isNumber = (v: unknown): v is number => typeof v === 'number';
  const isBoolean = (v: unknown): v is boolean => typeof v === 'boolean';

  const metric = pick('clustering', 'metric', isString);
  const maxIterations = pick('clustering', 'maxIterations', isNumber);
  if (metric !== undefined || maxIterations !== undefined) {
    config.clustering = { metric, maxIterations };
  }

  const level = pick('logging', 'level', isString);
  const json = pick('logging', 'json', isBoolean);
  if (level !== undefined || json !== undefined) {
    config.logging = { level, json };
  }

  const format = pick('output', 'format', isString);
  if (format !== undefined) {
    config.output = { format };
  }

  return config;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    return toExternalConfig(JSON.parse(content), path);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Parse an iteration count from a flag or env value. Missing or blank input
 * becomes NaN, not 0, so validation rejects it instead of reading "no cap".
 */
export function parseCount(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return NaN;
  }
  return Number(value);
}

/**
 * Load config from environment variables.
 * Variables are prefixed with KMEANS_LAB_ and use underscores for nesting.
 * Examples:
 *   KMEANS_LAB_CLUSTERING_METRIC=manhattan
 *   KMEANS_LAB_CLUSTERING_MAX_ITERATIONS=25
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};

  // Clustering
  if (process.env.KMEANS_LAB_CLUSTERING_METRIC) {
    config.clustering = config.clustering ?? {};
    config.clustering.metric = process.env.KMEANS_LAB_CLUSTERING_METRIC;
  }
  if (process.env.KMEANS_LAB_CLUSTERING_MAX_ITERATIONS) {
    config.clustering = config.clustering ?? {};
    config.clustering.maxIterations = parseCount(process.env.KMEANS_LAB_CLUSTERING_MAX_ITERATIONS);
  }

  // Logging
  if (process.env.KMEANS_LAB_LOGGING_LEVEL) {
    config.logging = config.logging ?? {};
    config.logging.level = process.env.KMEANS_LAB_LOGGING_LEVEL;
  }
  if (process.env.KMEANS_LAB_LOGGING_JSON) {
    config.logging = config.logging ?? {};
    config.logging.json = process.env.KMEANS_LAB_LOGGING_JSON === 'true';
  }

  // Output
  if (process.env.KMEANS_LAB_OUTPUT_FORMAT) {
    config.output = config.output ?? {};
    config.output.format = process.env.KMEANS_LAB_OUTPUT_FORMAT;
  }

  return config;
}

/**
 * Merge two config objects section by section; defined source fields win.
 */
function mergeConfig(target: ExternalConfig, source: ExternalConfig): ExternalConfig {
  return {
    clustering: {
      metric: source.clustering?.metric ?? target.clustering?.metric,
      maxIterations: source.clustering?.maxIterations ?? target.clustering?.maxIterations,
    },
    logging: {
      level: source.logging?.level ?? target.logging?.level,
      json: source.logging?.json ?? target.logging?.json,
    },
    output: {
      format: source.output?.format ?? target.output?.format,
    },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // Clustering validation
  if (config.clustering?.metric !== undefined && !isMetricName(config.clustering.metric)) {
    errors.push(`clustering.metric must be one of: ${METRIC_NAMES.join(', ')}`);
  }
  if (config.clustering?.maxIterations !== undefined) {
    const { maxIterations } = config.clustering;
    if (!Number.isInteger(maxIterations) || maxIterations < 0) {
      errors.push('clustering.maxIterations must be an integer >= 0 (0 = no cap)');
    }
  }

  // Logging validation
  if (config.logging?.level !== undefined && !isLogLevel(config.logging.level)) {
    errors.push('logging.level must be one of: debug, info, warn, error, silent');
  }

  // Output validation
  if (config.output?.format !== undefined && !isOutputFormat(config.output.format)) {
    errors.push('output.format must be one of: text, json');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): ExternalConfig {
  let config: ExternalConfig = mergeConfig({}, EXTERNAL_DEFAULTS);

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.kmeans-lab/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = mergeConfig(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'kmeans-lab.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = mergeConfig(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = mergeConfig(config, options.cliOverrides);
  }

  return config;
}

/**
 * Convert ExternalConfig to LabConfig (the runtime format).
 *
 * @throws ConfigError with code CONFIG_INVALID listing every violation.
 */
export function toRuntimeConfig(external: ExternalConfig): LabConfig {
  const errors = validateExternalConfig(external);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  const config = getConfig();
  const { metric, maxIterations } = external.clustering ?? {};
  const { level, json } = external.logging ?? {};
  const format = external.output?.format;

  if (metric !== undefined && isMetricName(metric)) config.metric = metric;
  if (maxIterations !== undefined) config.maxIterations = maxIterations === 0 ? undefined : maxIterations;
  if (level !== undefined && isLogLevel(level)) config.logLevel = level;
  if (json !== undefined) config.logJson = json;
  if (format !== undefined && isOutputFormat(format)) config.outputFormat = format;

  return config;
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
