/**
 * Shared state handed to every tool handler
 */

import type { Config } from '../../config/index.js';
import { toCorrelatorOptions } from '../../config/index.js';
import type { CorrelatorOptions } from '../../correlator/index.js';
import { readLogFile } from '../../reader/log-reader.js';
import type { RenderOptions, ResponseFormat } from './render.js';

export interface ToolContext {
  config: Config;
  options: CorrelatorOptions;
  readLog(logFile: string): Promise<string>;
}

export function createToolContext(config: Config): ToolContext {
  return {
    config,
    options: toCorrelatorOptions(config),
    readLog: (logFile) => readLogFile(logFile, config.log.encoding),
  };
}

export function renderOptionsFor(context: ToolContext, format: ResponseFormat | undefined): RenderOptions {
  return {
    format: format ?? 'compact',
    prettyPrint: context.config.output.prettyPrint,
  };
}
