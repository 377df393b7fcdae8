/**
 * Tests for error types.
 */

import { describe, it, expect } from 'vitest';
import {
  KmeansLabError,
  InvalidArgumentError,
  ClusterError,
  DatasetError,
  ConfigError,
  isErrorWithCode,
  isInvalidArgumentError,
  isClusterError,
  isDatasetError,
  isConfigError,
  wrapError,
} from '../../src/utils/errors.js';

describe('errors', () => {
  describe('KmeansLabError', () => {
    it('has message, code, and name', () => {
      const error = new KmeansLabError('Something failed', 'TEST_ERROR');

      expect(error.message).toBe('Something failed');
      expect(error.code).toBe('TEST_ERROR');
      expect(error.name).toBe('KmeansLabError');
    });

    it('captures cause from Error', () => {
      const cause = new Error('Original error');
      const error = new KmeansLabError('Wrapped error', 'WRAPPED', cause);

      expect(error.cause).toBe(cause);
    });

    it('converts non-Error cause to Error', () => {
      const error = new KmeansLabError('Wrapped error', 'WRAPPED', 'string cause');

      expect(error.cause).toBeInstanceOf(Error);
      expect(error.cause?.message).toBe('string cause');
    });

    it('has undefined cause when not provided', () => {
      expect(new KmeansLabError('No cause', 'NO_CAUSE').cause).toBeUndefined();
    });

    it('toDetailedString includes code', () => {
      const error = new KmeansLabError('Test message', 'TEST_CODE');
      expect(error.toDetailedString()).toBe('KmeansLabError [TEST_CODE]: Test message');
    });

    it('toDetailedString includes the cause and its code', () => {
      const inner = new DatasetError('Cannot read dataset x.json', 'DATASET_READ_FAILED');
      const outer = new KmeansLabError('Run failed', 'RUN_FAILED', inner);

      expect(outer.toDetailedString()).toBe(
        'KmeansLabError [RUN_FAILED]: Run failed\n  Caused by: Cannot read dataset x.json [DATASET_READ_FAILED]',
      );
    });
  });

  describe('subclasses', () => {
    it.each([
      [new InvalidArgumentError('k must be at least 1', 'INVALID_K'), 'InvalidArgumentError'],
      [new ClusterError('observer threw', 'OBSERVER_FAILED'), 'ClusterError'],
      [new DatasetError('bad dataset', 'DATASET_INVALID'), 'DatasetError'],
      [new ConfigError('bad config', 'CONFIG_INVALID'), 'ConfigError'],
    ])('%s is a KmeansLabError named %s', (error, name) => {
      expect(error).toBeInstanceOf(KmeansLabError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
    });
  });

  describe('type guards', () => {
    const invalidArgument = new InvalidArgumentError('x', 'NO_RECORDS');
    const clusterError = new ClusterError('x', 'OBSERVER_FAILED');
    const datasetError = new DatasetError('x', 'UNKNOWN_EXAMPLE');
    const configError = new ConfigError('x', 'UNKNOWN_METRIC');

    it('match only their own class', () => {
      expect(isInvalidArgumentError(invalidArgument)).toBe(true);
      expect(isInvalidArgumentError(clusterError)).toBe(false);
      expect(isClusterError(clusterError)).toBe(true);
      expect(isClusterError(datasetError)).toBe(false);
      expect(isDatasetError(datasetError)).toBe(true);
      expect(isDatasetError(configError)).toBe(false);
      expect(isConfigError(configError)).toBe(true);
      expect(isConfigError(new Error('plain'))).toBe(false);
    });

    it('isErrorWithCode checks the code', () => {
      expect(isErrorWithCode(invalidArgument, 'NO_RECORDS')).toBe(true);
      expect(isErrorWithCode(invalidArgument, 'INVALID_K')).toBe(false);
      expect(isErrorWithCode(new Error('plain'), 'NO_RECORDS')).toBe(false);
      expect(isErrorWithCode('NO_RECORDS', 'NO_RECORDS')).toBe(false);
    });
  });

  describe('wrapError', () => {
    it('passes KmeansLabErrors through', () => {
      const original = new ConfigError('bad config', 'CONFIG_INVALID');
      expect(wrapError(original)).toBe(original);
    });

    it('wraps a plain Error with code UNKNOWN', () => {
      const cause = new Error('disk full');
      const wrapped = wrapError(cause);

      expect(wrapped.message).toBe('disk full');
      expect(wrapped.code).toBe('UNKNOWN');
      expect(wrapped.cause).toBe(cause);
    });

    it('uses the given message', () => {
      expect(wrapError('boom', 'Run failed').message).toBe('Run failed');
    });

    it('stringifies non-Error values', () => {
      expect(wrapError(42).message).toBe('42');
    });
  });
});
