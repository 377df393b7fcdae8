/**
 * kmeans-lab
 *
 * K-means clustering over named feature vectors with a pluggable distance
 * metric and caller-supplied starting centroids.
 *
 * @packageDocumentation
 */

// Value types
export * from './core/index.js';

// Clustering
export * from './clusters/index.js';

// Input construction
export * from './input/index.js';

// Reporting
export {
  formatCentroid,
  getClusterSummary,
  formatPartition,
  formatRunReport,
  partitionToJSON,
  createIterationReporter,
} from './report/summary.js';
export type { ClusterJSON, ResultJSON } from './report/summary.js';

// Configuration
export * from './config/index.js';

// Utils
export * from './utils/errors.js';
export {
  logger,
  createLogger,
  configureLogging,
  setLogLevel,
  getLogLevel,
  setJsonMode,
} from './utils/logger.js';
export type { Logger, LogLevel, LogEntry, LoggingSettings } from './utils/logger.js';
