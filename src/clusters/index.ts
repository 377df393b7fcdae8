/**
 * Clustering exports.
 */

// Distance metrics
export {
  euclideanDistance,
  manhattanDistance,
  createWeightedEuclidean,
  getDistanceMetric,
  isMetricName,
  METRIC_NAMES,
} from './distance.js';
export type { DistanceMetric, MetricName } from './distance.js';

// Partition
export { Partition } from './partition.js';
export type { ClusterEntry } from './partition.js';

// Engine
export {
  cluster,
  runKMeans,
  assignRecords,
  nearestCentroidIndex,
  meanOf,
  updateCentroids,
} from './kmeans.js';
export type { KMeansOptions, KMeansResult, IterationEvent } from './kmeans.js';
