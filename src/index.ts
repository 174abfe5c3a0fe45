/**
 * sqltrail - recover executed SQL statements from application logs
 *
 * Pairs each logged statement (`id=<ID> sql=...`) with the parameter dumps
 * logged for the same ID (`id=<ID> params=[type:idx:value]...`), fills the
 * `?` placeholders, and groups repeated executions by template.
 */

// Types
export * from './types/index.js';

// Correlator
export {
  locateById,
  locateLast,
  locateAll,
  indexAllIds,
  groupByTemplate,
  splitLines,
  findStatement,
  findLastStatement,
  findAllParameterSets,
  findAllIds,
  resolveCaller,
  decodeParameters,
  substitutePlaceholders,
  buildExecutions,
  DEFAULT_CORRELATOR_OPTIONS,
  DEFAULT_CALLER_OPTIONS,
  DEFAULT_SUBSTITUTION_OPTIONS,
  UNKNOWN_CALLER,
  type CorrelatorOptions,
  type CallerOptions,
  type SubstitutionOptions,
  type SubstitutionResult,
  type StatementMatch,
  type ParameterMatch,
} from './correlator/index.js';

// Formatting
export { prettyPrintSql, formatParameters } from './format/sql.js';
export {
  executionToJson,
  queryGroupToJson,
  describeFillIssue,
  type ExecutionJson,
  type QueryGroupJson,
} from './format/report.js';

// Reading
export { readLogFile, decodeLogBytes } from './reader/log-reader.js';
export { LogWatcher, type LogWatcherOptions, type LogWatcherEvents } from './reader/watcher.js';

// Server
export { createServer, startStdioServer, registerTools, createToolContext, type ServerOptions, type ToolContext } from './server/index.js';

// Config
export {
  configSchema,
  loadConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
  toCorrelatorOptions,
  type Config,
  type LogEncoding,
} from './config/index.js';
