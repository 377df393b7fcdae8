/**
 * Text and JSON renderings of clustering results.
 */

import type { Centroid, DataRecord, FeatureVector } from '../core/feature-vector.js';
import type { Partition } from '../clusters/partition.js';
import type { IterationEvent, KMeansResult } from '../clusters/kmeans.js';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * `Centroid (X=183.5, Y=72.25)`, features in stored order.
 */
export function formatCentroid(centroid: Centroid): string {
  const coords = Object.entries(centroid.coordinates)
    .map(([name, value]) => `${name}=${value}`)
    .join(', ');
  return `Centroid (${coords})`;
}

/**
 * One line per cluster: the centroid followed by its member identifiers.
 */
export function getClusterSummary(centroid: Centroid, records: readonly DataRecord[]): string {
  const ids = records.map((r) => r.identifier).join(', ');
  return `${formatCentroid(centroid)} Record Identifiers: [${ids}]`;
}

export function formatPartition(partition: Partition): string {
  return Array.from(partition, (entry) => getClusterSummary(entry.centroid, entry.records)).join(
    '\n',
  );
}

/**
 * Header lines plus the final partition, as printed by the CLI.
 */
export function formatRunReport(name: string, metricName: string, result: KMeansResult): string {
  const status = result.converged
    ? `Converged after ${result.iterations} iterations`
    : `Stopped after ${result.iterations} iterations without converging`;
  return [
    `Dataset: ${name} (${result.partition.recordCount} records, k=${result.partition.size}, ${metricName})`,
    status,
    formatPartition(result.partition),
  ].join('\n');
}

export interface ClusterJSON {
  centroid: FeatureVector;
  records: string[];
}

export interface ResultJSON {
  iterations: number;
  converged: boolean;
  clusters: ClusterJSON[];
}

export function partitionToJSON(result: KMeansResult): ResultJSON {
  return {
    iterations: result.iterations,
    converged: result.converged,
    clusters: Array.from(result.partition, (entry) => ({
      centroid: { ...entry.centroid.coordinates },
      records: entry.records.map((r) => r.identifier),
    })),
  };
}

/**
 * Iteration observer that logs each iteration's clusters.
 */
export function createIterationReporter(
  reportLogger: Logger = createLogger('kmeans'),
): (event: IterationEvent) => void {
  return ({ iteration, partition }) => {
    reportLogger.info(`Iteration ${iteration}`);
    for (const entry of partition) {
      reportLogger.info(getClusterSummary(entry.centroid, entry.records));
    }
  };
}
