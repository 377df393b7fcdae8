/**
 * Core value types shared across the codebase.
 */

export type { FeatureVector, DataRecord, Centroid } from './feature-vector.js';

export {
  createRecord,
  createCentroid,
  featureNames,
  featureVectorsEqual,
  centroidsEqual,
  centroidKey,
} from './feature-vector.js';
