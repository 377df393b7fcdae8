/**
 * K-means clustering over named feature vectors.
 *
 * Caller supplies the starting centroids; the engine alternates
 * assignment (nearest centroid under a pluggable metric) and update
 * (feature-wise mean) until the partition stops changing.
 *
 * Usage:
 * ```typescript
 * const partition = cluster(records, [createCentroid({ x: 11 }), createCentroid({ x: 20 })], 2, euclideanDistance);
 * for (const { centroid, records } of partition) { ... }
 * ```
 */

import type { Centroid, DataRecord, FeatureVector } from '../core/feature-vector.js';
import type { DistanceMetric } from './distance.js';
import { Partition } from './partition.js';
import { ClusterError, InvalidArgumentError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('kmeans');

/** Passed to the iteration observer after each assignment phase. */
export interface IterationEvent {
  /** 1-based iteration number. */
  iteration: number;
  /** Partition built in this iteration. */
  partition: Partition;
  /** Partition from the previous iteration, null on the first. */
  previous: Partition | null;
  /** Centroids this iteration assigned against. */
  centroids: readonly Centroid[];
}

export interface KMeansOptions {
  /**
   * Stop after this many assignment phases even if not converged.
   * Omit for no cap.
   */
  maxIterations?: number;
  /** Observer called once per iteration. Cannot influence the run. */
  onIteration?: (event: IterationEvent) => void;
}

export interface KMeansResult {
  /** Final partition. */
  partition: Partition;
  /** Centroids the final partition was assigned against, in input order. */
  centroids: Centroid[];
  /** Number of assignment phases run. */
  iterations: number;
  /** False when maxIterations stopped the run first. */
  converged: boolean;
}

/**
 * Reject malformed input before any work happens.
 */
function validateInput(
  records: readonly DataRecord[],
  initialCentroids: readonly Centroid[],
  k: number,
  options: KMeansOptions,
): void {
  if (!Number.isInteger(k) || k < 1) {
    throw new InvalidArgumentError(`k must be an integer >= 1, got ${k}`, 'INVALID_K');
  }
  if (initialCentroids.length !== k) {
    throw new InvalidArgumentError(
      `Expected ${k} initial centroids, got ${initialCentroids.length}`,
      'CENTROID_COUNT_MISMATCH',
    );
  }
  if (records.length === 0) {
    throw new InvalidArgumentError('Cannot cluster an empty record list', 'NO_RECORDS');
  }
  const { maxIterations } = options;
  if (maxIterations !== undefined && (!Number.isInteger(maxIterations) || maxIterations < 1)) {
    throw new InvalidArgumentError(
      `maxIterations must be an integer >= 1, got ${maxIterations}`,
      'INVALID_MAX_ITERATIONS',
    );
  }
}

/**
 * Index of the centroid nearest to a record.
 * The incumbent is only replaced by a strictly smaller distance, so ties go
 * to the earliest centroid (and NaN distances never win).
 */
export function nearestCentroidIndex(
  record: DataRecord,
  centroids: readonly Centroid[],
  metric: DistanceMetric,
): number {
  let best = 0;
  let bestDistance = Infinity;

  for (let i = 0; i < centroids.length; i++) {
    const d = metric.distance(record.features, centroids[i].coordinates);
    if (d < bestDistance) {
      bestDistance = d;
      best = i;
    }
  }

  return best;
}

/**
 * Assign every record to its nearest centroid.
 */
export function assignRecords(
  records: readonly DataRecord[],
  centroids: readonly Centroid[],
  metric: DistanceMetric,
): Partition {
  const buckets: DataRecord[][] = centroids.map(() => []);

  for (const record of records) {
    buckets[nearestCentroidIndex(record, centroids, metric)].push(record);
  }

  return Partition.fromAssignments(centroids, buckets);
}

/**
 * Feature-wise arithmetic mean of a non-empty record list.
 *
 * Sums run in record order. Each feature is averaged over the records that
 * carry it, so a name missing from some records does not drag its mean
 * towards zero.
 */
export function meanOf(records: readonly DataRecord[]): FeatureVector {
  const totals = new Map<string, { sum: number; count: number }>();

  for (const record of records) {
    for (const [name, value] of Object.entries(record.features)) {
      const total = totals.get(name);
      if (total) {
        total.sum += value;
        total.count += 1;
      } else {
        totals.set(name, { sum: value, count: 1 });
      }
    }
  }

  return Object.fromEntries(
    Array.from(totals, ([name, { sum, count }]) => [name, sum / count]),
  );
}

/**
 * New centroid list from a partition. Positions with no records keep
 * their previous centroid.
 */
export function updateCentroids(partition: Partition): Centroid[] {
  return Array.from(partition, (entry) =>
    entry.records.length === 0 ? entry.centroid : { coordinates: meanOf(entry.records) },
  );
}

/**
 * Run k-means and report how the run ended.
 */
export function runKMeans(
  records: readonly DataRecord[],
  initialCentroids: readonly Centroid[],
  k: number,
  metric: DistanceMetric,
  options: KMeansOptions = {},
): KMeansResult {
  validateInput(records, initialCentroids, k, options);

  const maxIterations = options.maxIterations ?? Infinity;
  let centroids: Centroid[] = [...initialCentroids];
  let previous: Partition | null = null;
  let iteration = 0;

  log.debug('Starting run', { records: records.length, k, metric: metric.name });

  for (;;) {
    iteration++;
    const current = assignRecords(records, centroids, metric);

    if (options.onIteration) {
      notify(options.onIteration, { iteration, partition: current, previous, centroids });
    }

    if (previous !== null && current.equals(previous)) {
      log.debug('Converged', { iterations: iteration });
      return { partition: current, centroids, iterations: iteration, converged: true };
    }

    if (iteration >= maxIterations) {
      log.warn('Stopped at iteration cap before converging', { maxIterations });
      return { partition: current, centroids, iterations: iteration, converged: false };
    }

    previous = current;
    centroids = updateCentroids(current);
    log.debug('Updated centroids', { iteration });
  }
}

/**
 * Partition records into k clusters starting from the given centroids.
 */
export function cluster(
  records: readonly DataRecord[],
  initialCentroids: readonly Centroid[],
  k: number,
  metric: DistanceMetric,
  options: KMeansOptions = {},
): Partition {
  return runKMeans(records, initialCentroids, k, metric, options).partition;
}

function notify(observer: (event: IterationEvent) => void, event: IterationEvent): void {
  try {
    observer(event);
  } catch (error) {
    throw new ClusterError(
      `Iteration observer failed at iteration ${event.iteration}`,
      'OBSERVER_FAILED',
      error,
    );
  }
}
