/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

export const LOG_ENCODINGS = ['shift_jis', 'utf-8', 'euc-jp', 'utf-16le', 'utf-16be'] as const;

export const logConfigSchema = z.object({
  encoding: z.enum(LOG_ENCODINGS).default('shift_jis'),
});

export const callerConfigSchema = z.object({
  marker: z.string().min(1).default('Daoの終了'),
  packagePrefix: z.string().default('jp.co.'),
  classSuffix: z.string().min(1).default('Dao'),
  window: z.number().int().min(1).max(1000).default(50),
});

export const substitutionConfigSchema = z.object({
  quotedTypes: z.array(z.string()).default(['string']),
  verbatimTypes: z.array(z.string()).default(['bigdecimal', 'number', 'int', 'long', 'float']),
  nullLiteral: z.string().nullable().default(null),
});

export const outputConfigSchema = z.object({
  prettyPrint: z.boolean().default(true),
  maxBytes: z.number().int().min(256).default(8000), // MCP response budget
});

export const configSchema = z.object({
  log: logConfigSchema.default({}),
  caller: callerConfigSchema.default({}),
  substitution: substitutionConfigSchema.default({}),
  output: outputConfigSchema.default({}),
});

export type Config = z.infer<typeof configSchema>;
export type LogEncoding = (typeof LOG_ENCODINGS)[number];
export type LogConfig = z.infer<typeof logConfigSchema>;
export type CallerConfig = z.infer<typeof callerConfigSchema>;
export type SubstitutionConfig = z.infer<typeof substitutionConfigSchema>;
export type OutputConfig = z.infer<typeof outputConfigSchema>;
