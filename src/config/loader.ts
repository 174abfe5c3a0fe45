/**
 * Configuration file loader
 */

import fs from 'node:fs';
import path from 'node:path';
import type { CorrelatorOptions } from '../correlator/index.js';
import { configSchema, type Config } from './schema.js';

export const CONFIG_FILE_NAMES = [
  'sqltrail.config.json',
  '.sqltrailrc.json',
  '.sqltrailrc',
];

function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
}

export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = path.resolve(configPath);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const content = await fs.promises.readFile(absolutePath, 'utf-8');

  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${absolutePath}`);
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatIssues(result.error.errors)}`);
  }

  return result.data;
}

export function getDefaultConfig(): Config {
  return configSchema.parse({});
}

async function readPackageConfig(packagePath: string): Promise<Config | null> {
  let packageContent: unknown;
  try {
    packageContent = JSON.parse(await fs.promises.readFile(packagePath, 'utf-8'));
  } catch {
    // A broken package.json is not ours to report
    return null;
  }

  if (typeof packageContent !== 'object' || packageContent === null || !('sqltrail' in packageContent)) {
    return null;
  }

  const result = configSchema.safeParse(packageContent.sqltrail);
  return result.success ? result.data : null;
}

export async function findConfig(startDir: string): Promise<Config | null> {
  let currentDir = path.resolve(startDir);
  const root = path.parse(currentDir).root;

  while (currentDir !== root) {
    for (const configName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, configName);
      if (fs.existsSync(configPath)) {
        return loadConfig(configPath);
      }
    }

    // Check package.json for sqltrail key
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const packageConfig = await readPackageConfig(packagePath);
      if (packageConfig) {
        return packageConfig;
      }
    }

    currentDir = path.dirname(currentDir);
  }

  return null;
}

export async function loadConfigOrDefault(startDir: string): Promise<Config> {
  const config = await findConfig(startDir);
  return config ?? getDefaultConfig();
}

/**
 * Engine options carried by a loaded configuration.
 */
export function toCorrelatorOptions(config: Config): CorrelatorOptions {
  return {
    caller: { ...config.caller },
    substitution: {
      quotedTypes: [...config.substitution.quotedTypes],
      verbatimTypes: [...config.substitution.verbatimTypes],
      nullLiteral: config.substitution.nullLiteral,
    },
  };
}

export { configSchema, type Config } from './schema.js';
