/**
 * Standardized error types for kmeans-lab.
 *
 * All errors extend from KmeansLabError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 *
 * ## Usage
 *
 * ```typescript
 * import { InvalidArgumentError, DatasetError } from './errors.js';
 *
 * throw new InvalidArgumentError('k must be at least 1', 'INVALID_K');
 *
 * try {
 *   await readFile(path, 'utf-8');
 * } catch (err) {
 *   throw new DatasetError(`Cannot read ${path}`, 'DATASET_READ_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all kmeans-lab errors.
 */
export class KmeansLabError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof KmeansLabError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Precondition violations, raised before any clustering work starts.
 *
 * Common codes:
 * - `INVALID_K`: k is not an integer >= 1
 * - `CENTROID_COUNT_MISMATCH`: number of initial centroids differs from k
 * - `NO_RECORDS`: the record list is empty
 * - `INVALID_MAX_ITERATIONS`: iteration cap is not an integer >= 1
 * - `INVALID_WEIGHT`: a metric weight is negative or not finite
 */
export class InvalidArgumentError extends KmeansLabError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Cluster Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors raised while a clustering run is in flight.
 *
 * Common codes:
 * - `OBSERVER_FAILED`: the iteration observer threw
 */
export class ClusterError extends KmeansLabError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Dataset Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors building records and centroids from external input.
 *
 * Common codes:
 * - `DATASET_READ_FAILED`: cannot read the dataset file
 * - `DATASET_PARSE_FAILED`: the file is not valid JSON
 * - `DATASET_INVALID`: the JSON does not have the dataset shape
 * - `UNKNOWN_EXAMPLE`: no bundled dataset with that name
 */
export class DatasetError extends KmeansLabError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: configuration validation failed
 * - `UNKNOWN_METRIC`: no distance metric registered under that name
 */
export class ConfigError extends KmeansLabError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a kmeans-lab error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof KmeansLabError && error.code === code;
}

export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return error instanceof InvalidArgumentError;
}

export function isClusterError(error: unknown): error is ClusterError {
  return error instanceof ClusterError;
}

export function isDatasetError(error: unknown): error is DatasetError {
  return error instanceof DatasetError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a KmeansLabError.
 *
 * Errors that already are KmeansLabErrors pass through unchanged.
 */
export function wrapError(error: unknown, message?: string): KmeansLabError {
  if (error instanceof KmeansLabError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new KmeansLabError(errorMessage, 'UNKNOWN', error);
}
