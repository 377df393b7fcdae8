/**
 * Configuration exports.
 */

export {
  DEFAULT_CONFIG,
  OUTPUT_FORMATS,
  getConfig,
  resolvePath,
  isOutputFormat,
} from './lab-config.js';
export type { LabConfig, OutputFormat } from './lab-config.js';

export {
  loadConfig,
  validateExternalConfig,
  toRuntimeConfig,
  toExternalConfig,
  parseCount,
  EXTERNAL_DEFAULTS,
} from './loader.js';
export type { ExternalConfig, LoadConfigOptions } from './loader.js';
