/**
 * Config and log loading shared by the CLI commands
 */

import { z } from 'zod';
import {
  LOG_ENCODINGS,
  loadConfig,
  loadConfigOrDefault,
  toCorrelatorOptions,
  type Config,
} from '../config/index.js';
import type { CorrelatorOptions } from '../correlator/index.js';
import { readLogFile } from '../reader/log-reader.js';

export interface CommonOptions {
  config?: string;
  encoding?: string;
  pretty?: boolean;
}

export interface LoadedLog {
  config: Config;
  options: CorrelatorOptions;
  text: string;
}

const encodingSchema = z.enum(LOG_ENCODINGS);

export async function resolveConfig(options: CommonOptions): Promise<Config> {
  const config = options.config
    ? await loadConfig(options.config)
    : await loadConfigOrDefault(process.cwd());

  if (options.encoding === undefined) {
    return config;
  }

  const encoding = encodingSchema.safeParse(options.encoding.toLowerCase());
  if (!encoding.success) {
    throw new Error(`Unsupported encoding: ${options.encoding} (expected one of ${LOG_ENCODINGS.join(', ')})`);
  }

  return { ...config, log: { ...config.log, encoding: encoding.data } };
}

export async function loadLog(logFile: string, options: CommonOptions): Promise<LoadedLog> {
  const config = await resolveConfig(options);
  const text = await readLogFile(logFile, config.log.encoding);
  return { config, options: toCorrelatorOptions(config), text };
}

/**
 * `--no-pretty` wins; otherwise the configured default applies.
 */
export function shouldPrettyPrint(options: CommonOptions, config: Config): boolean {
  return options.pretty === false ? false : config.output.prettyPrint;
}
