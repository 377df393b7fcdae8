/**
 * Distance metrics over named feature vectors.
 *
 * Every metric walks the dimensions of the first operand and skips names
 * the second operand lacks, so vectors with no shared names are at
 * distance 0.
 */

import type { FeatureVector } from '../core/feature-vector.js';
import { ConfigError, InvalidArgumentError } from '../utils/errors.js';

/**
 * Dissimilarity between two feature vectors. Must be >= 0 and must not
 * mutate its inputs.
 */
export interface DistanceMetric {
  readonly name: string;
  distance(a: FeatureVector, b: FeatureVector): number;
}

/** Names accepted by getDistanceMetric(). */
export type MetricName = 'euclidean' | 'manhattan';

export const METRIC_NAMES: readonly MetricName[] = ['euclidean', 'manhattan'];

/**
 * Sum f(a[name] - b[name]) over names present in both vectors.
 */
function sumOverSharedFeatures(
  a: FeatureVector,
  b: FeatureVector,
  term: (name: string, diff: number) => number,
): number {
  let sum = 0;
  for (const name of Object.keys(a)) {
    if (!Object.prototype.hasOwnProperty.call(b, name)) continue;
    sum += term(name, a[name] - b[name]);
  }
  return sum;
}

export const euclideanDistance: DistanceMetric = {
  name: 'euclidean',
  distance: (a, b) => Math.sqrt(sumOverSharedFeatures(a, b, (_name, d) => d * d)),
};

export const manhattanDistance: DistanceMetric = {
  name: 'manhattan',
  distance: (a, b) => sumOverSharedFeatures(a, b, (_name, d) => Math.abs(d)),
};

/**
 * Euclidean distance with a per-feature weight on each squared difference.
 * Features without a weight count with weight 1.
 */
export function createWeightedEuclidean(weights: Readonly<Record<string, number>>): DistanceMetric {
  for (const [name, weight] of Object.entries(weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new InvalidArgumentError(
        `Weight for feature "${name}" must be a finite number >= 0, got ${weight}`,
        'INVALID_WEIGHT',
      );
    }
  }
  const frozen = { ...weights };

  return {
    name: 'weighted-euclidean',
    distance: (a, b) =>
      Math.sqrt(
        sumOverSharedFeatures(a, b, (name, d) => {
          const w = Object.prototype.hasOwnProperty.call(frozen, name) ? frozen[name] : 1;
          return w * d * d;
        }),
      ),
  };
}

export function isMetricName(value: string): value is MetricName {
  return METRIC_NAMES.some((m) => m === value);
}

/**
 * Resolve a metric by its config name.
 */
export function getDistanceMetric(name: string): DistanceMetric {
  if (!isMetricName(name)) {
    throw new ConfigError(
      `Unknown distance metric "${name}" (expected one of: ${METRIC_NAMES.join(', ')})`,
      'UNKNOWN_METRIC',
    );
  }
  return name === 'euclidean' ? euclideanDistance : manhattanDistance;
}
