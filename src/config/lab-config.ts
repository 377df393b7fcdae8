/**
 * Runtime configuration for kmeans-lab.
 */

import type { MetricName } from '../clusters/distance.js';
import type { LogLevel } from '../utils/logger.js';

export type OutputFormat = 'text' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

/**
 * Resolved configuration used by the CLI and library helpers.
 */
export interface LabConfig {
  // Clustering
  /** Distance metric used for assignment */
  metric: MetricName;
  /** Iteration cap passed to the engine; undefined = no cap */
  maxIterations: number | undefined;

  // Logging
  logLevel: LogLevel;
  /** Emit one JSON object per log line */
  logJson: boolean;

  // Output
  outputFormat: OutputFormat;
}

export const DEFAULT_CONFIG: LabConfig = {
  metric: 'euclidean',
  maxIterations: 100,
  logLevel: 'info',
  logJson: false,
  outputFormat: 'text',
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<LabConfig> = {}): LabConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}
