/**
 * Ledger configuration
 *
 * Loan period and the default loan limit have no built-in values: a
 * deployment must choose them.
 */

import { z } from 'zod';
import { ValidationErrors } from '../types/errors';

const configSchema = z.object({
  loanPeriodDays: z.number().positive(),
  defaultLoanLimit: z.number().int().positive(),
  /** Open loans older than this many days count as long-running on the dashboard */
  longLoanAlertDays: z.number().positive().nullable().default(null),
  snapshotTimeoutMs: z.number().int().positive().nullable().default(null),
  autoBackupIntervalMs: z.number().int().positive().nullable().default(null),
  maxLoginAttempts: z.number().int().positive().default(3),
  lockoutMinutes: z.number().positive().default(30),
  minPasswordLength: z.number().int().min(1).default(8),
  /** Site offset from UTC in minutes; sets where a reporting day starts */
  utcOffsetMinutes: z.number().int().min(-840).max(840).default(0),
  storage: z
    .discriminatedUnion('kind', [
      z.object({ kind: z.literal('memory') }),
      z.object({
        kind: z.literal('supabase'),
        url: z.string().url(),
        serviceRoleKey: z.string().min(1),
        snapshotBucket: z.string().min(1).default('ledger-snapshots'),
      }),
    ])
    .default({ kind: 'memory' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type LedgerConfig = z.output<typeof configSchema>;
export type LedgerConfigInput = z.input<typeof configSchema>;
export type StorageConfig = LedgerConfig['storage'];

const ENV_NAMES: Record<string, string> = {
  loanPeriodDays: 'LEDGER_LOAN_PERIOD_DAYS',
  defaultLoanLimit: 'LEDGER_DEFAULT_LOAN_LIMIT',
  longLoanAlertDays: 'LEDGER_LONG_LOAN_ALERT_DAYS',
  snapshotTimeoutMs: 'LEDGER_SNAPSHOT_TIMEOUT_MS',
  autoBackupIntervalMs: 'LEDGER_AUTO_BACKUP_INTERVAL_MS',
  maxLoginAttempts: 'LEDGER_MAX_LOGIN_ATTEMPTS',
  lockoutMinutes: 'LEDGER_LOCKOUT_MINUTES',
  minPasswordLength: 'LEDGER_MIN_PASSWORD_LENGTH',
  utcOffsetMinutes: 'LEDGER_UTC_OFFSET_MINUTES',
  'storage.kind': 'LEDGER_STORAGE',
  'storage.url': 'SUPABASE_URL',
  'storage.serviceRoleKey': 'SUPABASE_SERVICE_ROLE_KEY',
  'storage.snapshotBucket': 'LEDGER_SNAPSHOT_BUCKET',
  logLevel: 'LEDGER_LOG_LEVEL',
};

/**
 * Validate a programmatic configuration and fill in defaults.
 * Throws ValidationError listing every offending field.
 */
export function createConfig(input: LedgerConfigInput): LedgerConfig {
  return parse(input, (path) => path);
}

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const storageKind = blank(env.LEDGER_STORAGE) ?? 'memory';

  const input = {
    loanPeriodDays: numeric(env.LEDGER_LOAN_PERIOD_DAYS),
    defaultLoanLimit: numeric(env.LEDGER_DEFAULT_LOAN_LIMIT),
    longLoanAlertDays: numeric(env.LEDGER_LONG_LOAN_ALERT_DAYS),
    snapshotTimeoutMs: numeric(env.LEDGER_SNAPSHOT_TIMEOUT_MS),
    autoBackupIntervalMs: numeric(env.LEDGER_AUTO_BACKUP_INTERVAL_MS),
    maxLoginAttempts: numeric(env.LEDGER_MAX_LOGIN_ATTEMPTS),
    lockoutMinutes: numeric(env.LEDGER_LOCKOUT_MINUTES),
    minPasswordLength: numeric(env.LEDGER_MIN_PASSWORD_LENGTH),
    utcOffsetMinutes: numeric(env.LEDGER_UTC_OFFSET_MINUTES),
    storage:
      storageKind === 'supabase'
        ? {
            kind: storageKind,
            url: blank(env.SUPABASE_URL),
            serviceRoleKey: blank(env.SUPABASE_SERVICE_ROLE_KEY),
            snapshotBucket: blank(env.LEDGER_SNAPSHOT_BUCKET),
          }
        : { kind: storageKind },
    logLevel: blank(env.LEDGER_LOG_LEVEL),
  };

  return parse(input, (path) => ENV_NAMES[path] ?? path);
}

function parse(input: unknown, fieldName: (path: string) => string): LedgerConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    const issues: Record<string, string> = {};
    for (const issue of result.error.issues) {
      issues[fieldName(issue.path.join('.'))] = issue.message;
    }
    throw ValidationErrors.INVALID_CONFIG(issues);
  }
  return result.data;
}

function blank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function numeric(value: string | undefined): number | undefined {
  const trimmed = blank(value);
  return trimmed === undefined ? undefined : Number(trimmed);
}
