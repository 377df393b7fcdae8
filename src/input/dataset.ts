/**
 * Builds records and starting centroids from literal values or dataset files.
 *
 * Dataset file shape:
 * ```json
 * {
 *   "name": "heights",
 *   "k": 2,
 *   "features": ["X", "Y"],
 *   "records": [{ "id": "1", "values": [185, 72] }],
 *   "centroids": [[185, 72], [170, 56]]
 * }
 * ```
 * `k` defaults to the number of centroids. Whether k and the centroid count
 * agree is left to the engine.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { basename } from 'node:path';
import {
  createCentroid,
  createRecord,
  type Centroid,
  type DataRecord,
  type FeatureVector,
} from '../core/feature-vector.js';
import { DatasetError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('dataset');

/** A validated dataset, ready for the engine. */
export interface Dataset {
  name: string;
  k: number;
  featureNames: string[];
  records: DataRecord[];
  centroids: Centroid[];
}

/** Bundled demo datasets under data/examples/. */
export type ExampleName = 'one-dimensional' | 'two-dimensional';

export const EXAMPLE_NAMES: readonly ExampleName[] = ['one-dimensional', 'two-dimensional'];

const EXAMPLES_DIR = new URL('../../data/examples/', import.meta.url);

function invalid(message: string): DatasetError {
  return new DatasetError(message, 'DATASET_INVALID');
}

function toFeatureVector(row: readonly number[], names: readonly string[], path: string): FeatureVector {
  if (row.length !== names.length) {
    throw invalid(`${path} has ${row.length} values, expected ${names.length}`);
  }
  return Object.fromEntries(names.map((name, i) => [name, row[i]]));
}

/**
 * Build records from numeric rows. Identifiers default to 1-based row numbers.
 */
export function recordsFromValues(
  rows: readonly (readonly number[])[],
  featureNames: readonly string[],
  identifiers?: readonly string[],
): DataRecord[] {
  if (identifiers && identifiers.length !== rows.length) {
    throw invalid(`Got ${identifiers.length} identifiers for ${rows.length} rows`);
  }
  return rows.map((row, i) =>
    createRecord(identifiers?.[i] ?? String(i + 1), toFeatureVector(row, featureNames, `rows[${i}]`)),
  );
}

/**
 * Build centroids from numeric rows.
 */
export function centroidsFromValues(
  rows: readonly (readonly number[])[],
  featureNames: readonly string[],
): Centroid[] {
  return rows.map((row, i) => createCentroid(toFeatureVector(row, featureNames, `centroids[${i}]`)));
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectNumberRow(value: unknown, path: string): number[] {
  if (!Array.isArray(value)) {
    throw invalid(`${path} must be an array of numbers`);
  }
  return value.map((v: unknown, i) => {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw invalid(`${path}[${i}] must be a finite number`);
    }
    return v;
  });
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw invalid(`${path} must be an array`);
  }
  return value;
}

/**
 * Validate parsed JSON into a Dataset.
 */
export function parseDataset(raw: unknown, fallbackName = 'dataset'): Dataset {
  if (!isObject(raw)) {
    throw invalid('Dataset must be a JSON object');
  }

  const name = raw.name === undefined ? fallbackName : raw.name;
  if (typeof name !== 'string') {
    throw invalid('name must be a string');
  }

  const featureNames = expectArray(raw.features, 'features').map((f, i) => {
    if (typeof f !== 'string' || f.length === 0) {
      throw invalid(`features[${i}] must be a non-empty string`);
    }
    return f;
  });
  if (featureNames.length === 0) {
    throw invalid('features must name at least one feature');
  }
  if (new Set(featureNames).size !== featureNames.length) {
    throw invalid('features must not contain duplicates');
  }

  const records = expectArray(raw.records, 'records').map((entry, i) => {
    const path = `records[${i}]`;
    if (!isObject(entry)) {
      throw invalid(`${path} must be an object`);
    }
    const { id } = entry;
    if (typeof id !== 'string' && typeof id !== 'number') {
      throw invalid(`${path}.id must be a string or number`);
    }
    const values = expectNumberRow(entry.values, `${path}.values`);
    return createRecord(String(id), toFeatureVector(values, featureNames, `${path}.values`));
  });

  const centroids = expectArray(raw.centroids, 'centroids').map((row, i) =>
    createCentroid(
      toFeatureVector(expectNumberRow(row, `centroids[${i}]`), featureNames, `centroids[${i}]`),
    ),
  );

  const k = raw.k === undefined ? centroids.length : raw.k;
  if (typeof k !== 'number' || !Number.isInteger(k)) {
    throw invalid('k must be an integer');
  }

  return { name, k, featureNames, records, centroids };
}

/**
 * Read and validate a dataset file.
 */
export async function loadDataset(path: string): Promise<Dataset> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Cannot read dataset ${path}`, 'DATASET_READ_FAILED', error);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new DatasetError(`Dataset ${path} is not valid JSON`, 'DATASET_PARSE_FAILED', error);
  }

  const dataset = parseDataset(raw, basename(path, '.json'));
  log.debug('Loaded dataset', {
    name: dataset.name,
    records: dataset.records.length,
    centroids: dataset.centroids.length,
  });
  return dataset;
}

export function isExampleName(value: string): value is ExampleName {
  return EXAMPLE_NAMES.some((n) => n === value);
}

/**
 * Load one of the bundled demo datasets.
 */
export async function loadExampleDataset(name: string): Promise<Dataset> {
  if (!isExampleName(name)) {
    throw new DatasetError(
      `Unknown example "${name}" (expected one of: ${EXAMPLE_NAMES.join(', ')})`,
      'UNKNOWN_EXAMPLE',
    );
  }
  return loadDataset(fileURLToPath(new URL(`${name}.json`, EXAMPLES_DIR)));
}
