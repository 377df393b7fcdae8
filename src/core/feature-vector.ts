/**
 * Value types for the clustering engine.
 *
 * A feature vector is a point whose dimensions are named rather than
 * indexed. Records carry a caller-assigned identifier; centroids carry only
 * coordinates and compare by value.
 */

/** Named numeric features. Key order is insertion order. */
export type FeatureVector = Readonly<Record<string, number>>;

/** An input point with an opaque, caller-assigned identifier. */
export interface DataRecord {
  readonly identifier: string;
  readonly features: FeatureVector;
}

/** The current center of a cluster. */
export interface Centroid {
  readonly coordinates: FeatureVector;
}

/**
 * Build a record, copying the feature mapping.
 */
export function createRecord(identifier: string, features: FeatureVector): DataRecord {
  return { identifier, features: { ...features } };
}

/**
 * Build a centroid, copying the coordinate mapping.
 */
export function createCentroid(coordinates: FeatureVector): Centroid {
  return { coordinates: { ...coordinates } };
}

/**
 * Feature names of a vector, in stored order.
 */
export function featureNames(vector: FeatureVector): string[] {
  return Object.keys(vector);
}

/**
 * True iff both vectors have the same feature names with the same values.
 * Name order is ignored.
 */
export function featureVectorsEqual(a: FeatureVector, b: FeatureVector): boolean {
  const namesA = Object.keys(a);
  if (namesA.length !== Object.keys(b).length) return false;

  for (const name of namesA) {
    if (!Object.prototype.hasOwnProperty.call(b, name)) return false;
    if (!Object.is(a[name], b[name])) return false;
  }
  return true;
}

export function centroidsEqual(a: Centroid, b: Centroid): boolean {
  return featureVectorsEqual(a.coordinates, b.coordinates);
}

/**
 * Canonical key for a centroid: its (name, value) pairs sorted by name.
 *
 * Two centroids have the same key iff centroidsEqual() holds, so the key can
 * stand in for the centroid in a Map.
 */
export function centroidKey(centroid: Centroid): string {
  const pairs = Object.keys(centroid.coordinates)
    .sort()
    .map((name) => [name, encodeValue(centroid.coordinates[name])]);
  return JSON.stringify(pairs);
}

// JSON.stringify collapses -0, NaN and the infinities; keep them distinct.
function encodeValue(value: number): string {
  if (Object.is(value, -0)) return '-0';
  return String(value);
}
