/**
 * Configuration from environment variables and CLI overrides
 */

import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { ConflictStrategy } from './types';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface RateBudgetOptions {
  requestsPerSecond: number;
  burst: number;
}

export interface SyncConfig {
  github: {
    token: string | null;
    repo: string | null;
    statuses: string[];
    doneStatuses: string[];
  };
  stateDir: string;
  matchThreshold: number;
  retry: RetryOptions;
  rateBudget: RateBudgetOptions;
  concurrency: number;
  conflictStrategy: ConflictStrategy | null;
}

export type ConfigOverrides = Partial<{
  stateDir: string;
  matchThreshold: number;
  concurrency: number;
  conflictStrategy: ConflictStrategy;
}>;

export const DEFAULT_STATE_DIR = '.epic-sync';

// Unset and blank environment values both mean "use the default"
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const envNumber = (fallback: number, schema: z.ZodNumber) =>
  z.preprocess(blankToUndefined, z.coerce.number().pipe(schema).default(fallback));

const csvList = (fallback: string[]) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0))
      .pipe(z.array(z.string()).min(1))
      .default(fallback.join(','))
  );

const conflictStrategySchema = z.enum(['prefer-local', 'prefer-remote', 'manual']);

const envSchema = z.object({
  GITHUB_TOKEN: optionalString,
  GITHUB_REPO: z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(/^[^/\s]+\/[^/\s]+$/, 'expected "owner/repo"')
      .optional()
  ),
  EPIC_SYNC_STATE_DIR: optionalString,
  EPIC_SYNC_MATCH_THRESHOLD: envNumber(0.8, z.number().min(0).max(1)),
  EPIC_SYNC_MAX_ATTEMPTS: envNumber(4, z.number().int().min(1)),
  EPIC_SYNC_BASE_DELAY_MS: envNumber(500, z.number().int().min(0)),
  EPIC_SYNC_MAX_DELAY_MS: envNumber(30000, z.number().int().min(0)),
  EPIC_SYNC_TIMEOUT_MS: envNumber(30000, z.number().int().min(1)),
  EPIC_SYNC_REQUESTS_PER_SECOND: envNumber(10, z.number().positive()),
  EPIC_SYNC_BURST: envNumber(20, z.number().int().min(1)),
  EPIC_SYNC_CONCURRENCY: envNumber(2, z.number().int().min(1)),
  EPIC_SYNC_CONFLICT_STRATEGY: z.preprocess(blankToUndefined, conflictStrategySchema.optional()),
  EPIC_SYNC_STATUSES: csvList(['To Do', 'In Progress', 'Done']),
  EPIC_SYNC_DONE_STATUSES: csvList(['Done']),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

/**
 * Build the run configuration. Throws ConfigurationError on invalid input.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): SyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  const threshold = overrides.matchThreshold ?? vars.EPIC_SYNC_MATCH_THRESHOLD;
  if (!(threshold >= 0 && threshold <= 1)) {
    throw new ConfigurationError(`Match threshold must be between 0 and 1, got ${threshold}`);
  }

  const concurrency = overrides.concurrency ?? vars.EPIC_SYNC_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const statuses = vars.EPIC_SYNC_STATUSES;
  const unknownDone = vars.EPIC_SYNC_DONE_STATUSES.filter((status) => !statuses.includes(status));
  if (unknownDone.length > 0) {
    throw new ConfigurationError(`Done statuses not in status list: ${unknownDone.join(', ')}`);
  }

  const stateDir = overrides.stateDir ?? vars.EPIC_SYNC_STATE_DIR ?? DEFAULT_STATE_DIR;

  return {
    github: {
      token: vars.GITHUB_TOKEN ?? null,
      repo: vars.GITHUB_REPO ?? null,
      statuses,
      doneStatuses: vars.EPIC_SYNC_DONE_STATUSES,
    },
    stateDir: path.resolve(cwd, stateDir),
    matchThreshold: threshold,
    retry: {
      maxAttempts: vars.EPIC_SYNC_MAX_ATTEMPTS,
      baseDelayMs: vars.EPIC_SYNC_BASE_DELAY_MS,
      maxDelayMs: vars.EPIC_SYNC_MAX_DELAY_MS,
      timeoutMs: vars.EPIC_SYNC_TIMEOUT_MS,
    },
    rateBudget: {
      requestsPerSecond: vars.EPIC_SYNC_REQUESTS_PER_SECOND,
      burst: vars.EPIC_SYNC_BURST,
    },
    concurrency,
    conflictStrategy: overrides.conflictStrategy ?? vars.EPIC_SYNC_CONFLICT_STRATEGY ?? null,
  };
}

/**
 * Tracker credentials, required by every command that talks to the tracker
 */
export function requireTrackerCredentials(config: SyncConfig): { token: string; repo: string } {
  const { token, repo } = config.github;
  if (!token) {
    throw new ConfigurationError('No GitHub token found. Set GITHUB_TOKEN in the environment or .env.local');
  }
  if (!repo) {
    throw new ConfigurationError('No repository configured. Set GITHUB_REPO=owner/repo');
  }
  return { token, repo };
}

export function parseConflictStrategy(value: string): ConflictStrategy {
  const parsed = conflictStrategySchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Unknown conflict strategy "${value}" (expected prefer-local, prefer-remote or manual)`
    );
  }
  return parsed.data;
}
