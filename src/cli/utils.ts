/**
 * Shared CLI utilities.
 */

import { parseCount, type ExternalConfig } from '../config/loader.js';
import type { LabConfig } from '../config/lab-config.js';
import type { Dataset } from '../input/dataset.js';
import { getDistanceMetric } from '../clusters/distance.js';
import { runKMeans } from '../clusters/kmeans.js';
import { createIterationReporter, formatRunReport, partitionToJSON } from '../report/summary.js';
import { configureLogging } from '../utils/logger.js';
import { isConfigError } from '../utils/errors.js';

/** Flags shared by the clustering commands. */
export interface ClusterFlags {
  positional: string[];
  /** Config overrides taken from --metric, --max-iterations and --json */
  overrides: ExternalConfig;
  verbose: boolean;
}

const VALUE_FLAGS = new Set(['--metric', '--max-iterations']);

/**
 * Split command arguments into positionals and clustering flags.
 */
export function parseClusterFlags(args: string[]): ClusterFlags {
  const positional: string[] = [];
  const overrides: ExternalConfig = {};
  let verbose = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.has(arg)) {
      const value: string | undefined = args[i + 1];
      i++;
      overrides.clustering = overrides.clustering ?? {};
      if (arg === '--metric') {
        overrides.clustering.metric = value ?? '';
      } else {
        overrides.clustering.maxIterations = parseCount(value);
      }
    } else if (arg === '--json') {
      overrides.output = { format: 'json' };
    } else if (arg === '--verbose') {
      verbose = true;
    } else {
      positional.push(arg);
    }
  }

  return { positional, overrides, verbose };
}

/**
 * Cluster a dataset under the given config and render the result.
 * With verbose set, every iteration is logged at debug level and above.
 */
export function runDataset(dataset: Dataset, config: LabConfig, verbose = false): string {
  configureLogging({ level: verbose ? 'debug' : config.logLevel, json: config.logJson });

  const result = runKMeans(
    dataset.records,
    dataset.centroids,
    dataset.k,
    getDistanceMetric(config.metric),
    {
      maxIterations: config.maxIterations,
      onIteration: verbose ? createIterationReporter() : undefined,
    },
  );

  if (config.outputFormat === 'json') {
    return JSON.stringify(partitionToJSON(result), null, 2);
  }
  return formatRunReport(dataset.name, config.metric, result);
}

/**
 * Exit code for an error escaping a command handler: 3 for configuration
 * errors (same as `config validate`), 1 for everything else.
 */
export function exitCodeFor(error: unknown): number {
  return isConfigError(error) ? 3 : 1;
}
