/**
 * Config module exports
 */

export {
  configSchema,
  logConfigSchema,
  callerConfigSchema,
  substitutionConfigSchema,
  outputConfigSchema,
  LOG_ENCODINGS,
  type Config,
  type LogEncoding,
  type LogConfig,
  type CallerConfig,
  type SubstitutionConfig,
  type OutputConfig,
} from './schema.js';

export {
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  toCorrelatorOptions,
  CONFIG_FILE_NAMES,
} from './loader.js';
