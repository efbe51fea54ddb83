/**
 * SQL Batcher Configuration — validation, defaults, environment loading
 */

import { z } from 'zod';
import type { BatcherConfig, ResolvedBatcherConfig } from './types.js';
import { configurationError } from './errors.js';

const batcherConfigSchema = z.object({
  maxBytes: z.number().int().nonnegative().default(0),
  maxStatements: z.number().int().positive().optional(),
  dryRun: z.boolean().default(false),
  delimiter: z.string().min(1).default(';'),
  logging: z.boolean().default(true),
  slowBatchMs: z.number().int().nonnegative().default(1000),
  sizeOf: z.custom<(text: string) => number>(v => typeof v === 'function', { message: 'Expected a function' }).optional(),
}).strict();

const TRUTHY = ['true', '1', 'yes'];
const FLAG_VALUES = ['true', 'false', '1', '0', 'yes', 'no'] as const;

const envSchema = z.object({
  SQL_BATCHER_MAX_BYTES: z.coerce.number().int().nonnegative().optional(),
  SQL_BATCHER_MAX_STATEMENTS: z.coerce.number().int().positive().optional(),
  SQL_BATCHER_DRY_RUN: z.string().toLowerCase().pipe(z.enum(FLAG_VALUES))
    .transform(v => TRUTHY.includes(v))
    .optional(),
  SQL_BATCHER_DELIMITER: z.string().optional(),
  SQL_BATCHER_SLOW_BATCH_MS: z.coerce.number().int().nonnegative().optional(),
});

/**
 * Apply defaults and validate. Throws CONFIGURATION_ERROR on the first bad field.
 * The result is frozen.
 */
export function resolveConfig(config: BatcherConfig = {}): ResolvedBatcherConfig {
  const result = batcherConfigSchema.safeParse(config);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw configurationError(issue?.path.join('.') || 'config', issue?.message ?? 'invalid value');
  }
  return Object.freeze(result.data);
}

/**
 * Read a BatcherConfig from SQL_BATCHER_* environment variables.
 * Unset and empty variables are left out so constructor defaults apply.
 */
export function loadBatcherConfig(env: NodeJS.ProcessEnv = process.env): BatcherConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('SQL_BATCHER_') && value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw configurationError(issue?.path.join('.') || 'environment', issue?.message ?? 'invalid value');
  }

  const vars = result.data;
  const config: BatcherConfig = {};
  if (vars.SQL_BATCHER_MAX_BYTES !== undefined) config.maxBytes = vars.SQL_BATCHER_MAX_BYTES;
  if (vars.SQL_BATCHER_MAX_STATEMENTS !== undefined) config.maxStatements = vars.SQL_BATCHER_MAX_STATEMENTS;
  if (vars.SQL_BATCHER_DRY_RUN !== undefined) config.dryRun = vars.SQL_BATCHER_DRY_RUN;
  if (vars.SQL_BATCHER_DELIMITER !== undefined) config.delimiter = vars.SQL_BATCHER_DELIMITER;
  if (vars.SQL_BATCHER_SLOW_BATCH_MS !== undefined) config.slowBatchMs = vars.SQL_BATCHER_SLOW_BATCH_MS;
  return config;
}
