/**
 * Ledger configuration
 *
 * Read from the environment and validated with zod. Fail-closed: a missing
 * or invalid backend, path or number throws StoreMisconfiguredError before
 * any store is opened.
 */

import { z } from 'zod';
import { LogLevel, StoreMisconfiguredError } from 'carbon-ledger-core';
import { StoreBackend } from './interfaces';

export const DEFAULT_ANNOTATION_FIELDS = [
  'uncertainty_pct',
  'quality_flags',
  'data_quality_score',
  'confidence_score'
];

export interface StoreConfig {
  backend: StoreBackend;
  path: string; // FILE: dir root, SQLITE: db file path
  sqliteBusyTimeoutMs?: number;
  fileLockTimeoutMs?: number;
}

export interface LedgerConfig extends StoreConfig {
  sqliteBusyTimeoutMs: number;
  fileLockTimeoutMs: number;
  defaultPartition: string;
  appendMaxRetries: number;
  annotationFields: string[];
  anchorIntervalMs: number;
  logLevel: LogLevel;
}

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const integerVar = (fallback: number, min: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const EnvSchema = z.object({
  LEDGER_STORE_BACKEND: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toUpperCase() || undefined : value),
    z.enum(['FILE', 'SQLITE'], {
      errorMap: (issue, ctx) =>
        issue.code === 'invalid_type' && ctx.data === undefined
          ? { message: 'is required (FILE|SQLITE)' }
          : { message: `expected FILE|SQLITE, got ${String(ctx.data)}` }
    })
  ),
  LEDGER_STORE_PATH: z.preprocess(
    blankToUndefined,
    z.string({ required_error: 'is required' }).transform(value => value.trim())
  ),
  LEDGER_DEFAULT_PARTITION: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/, 'is not a valid partition name')
      .default('global')
  ),
  LEDGER_APPEND_MAX_RETRIES: integerVar(3, 1),
  LEDGER_ANNOTATION_FIELDS: z
    .string()
    .optional()
    .transform(value =>
      value === undefined
        ? [...DEFAULT_ANNOTATION_FIELDS]
        : value
            .split(',')
            .map(field => field.trim())
            .filter(field => field.length > 0)
    ),
  LEDGER_SQLITE_BUSY_TIMEOUT_MS: integerVar(5000, 0),
  LEDGER_FILE_LOCK_TIMEOUT_MS: integerVar(5000, 0),
  LEDGER_ANCHOR_INTERVAL_MS: integerVar(24 * 60 * 60 * 1000, 1000),
  LEDGER_LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? value.trim().toLowerCase() || undefined : value),
    z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info')
  )
});

/**
 * Load ledger configuration from environment variables.
 */
export function loadLedgerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new StoreMisconfiguredError(`Invalid ledger configuration: ${problems.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    backend: vars.LEDGER_STORE_BACKEND,
    path: vars.LEDGER_STORE_PATH,
    sqliteBusyTimeoutMs: vars.LEDGER_SQLITE_BUSY_TIMEOUT_MS,
    fileLockTimeoutMs: vars.LEDGER_FILE_LOCK_TIMEOUT_MS,
    defaultPartition: vars.LEDGER_DEFAULT_PARTITION,
    appendMaxRetries: vars.LEDGER_APPEND_MAX_RETRIES,
    annotationFields: vars.LEDGER_ANNOTATION_FIELDS,
    anchorIntervalMs: vars.LEDGER_ANCHOR_INTERVAL_MS,
    logLevel: vars.LEDGER_LOG_LEVEL
  };
}

/**
 * Store-only view of the environment, used by tools that never append.
 */
export function loadStoreConfigFromEnv(env: NodeJS.ProcessEnv = process.env): StoreConfig {
  const { backend, path, sqliteBusyTimeoutMs, fileLockTimeoutMs } = loadLedgerConfigFromEnv(env);
  return { backend, path, sqliteBusyTimeoutMs, fileLockTimeoutMs };
}
