#!/usr/bin/env node

/**
 * epic-sync CLI
 *
 * Sync epic documents with an issue tracker: plan, execute, resume, back up and roll back
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import path from 'path';
import { config } from 'dotenv';
import { execSync } from 'child_process';
import { BackupManager, BackupStore } from './lib/backup-manager';
import { ConfigOverrides, SyncConfig, loadConfig, parseConflictStrategy, requireTrackerCredentials } from './lib/config';
import { InquirerConfirmer } from './lib/confirm';
import { InteractiveConflictResolver } from './lib/conflict-resolver';
import { JsonDocumentStore } from './lib/document-store';
import { AuthOrConnectionFatalError, SyncError, errorMessage } from './lib/errors';
import { GitHubTracker } from './lib/github-tracker';
import { ConsoleLogger, Logger } from './lib/logger';
import { MultiEpicSync } from './lib/multi-epic';
import { exitCodeFor, exportReport, formatReport } from './lib/report';
import { RateBudget, RetryExecutor } from './lib/retry';
import { SessionStore } from './lib/session';
import { SyncOrchestrator } from './lib/sync-orchestrator';
import { ALL_PHASES, RunOutcome, SyncPhase, SyncReport } from './lib/types';

// Load environment variables from target project directory
config({ path: path.join(process.cwd(), '.env.local') });
config({ path: path.join(process.cwd(), '.env') });

/**
 * Detect GitHub repo from git remote URL
 */
function detectGitHubRepo(): string | null {
  try {
    const remoteUrl = execSync('git config --get remote.origin.url', {
      cwd: process.cwd(),
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();

    // https://github.com/owner/repo.git or git@github.com:owner/repo.git
    const match = remoteUrl.match(/github\.com[:/]([^/]+\/[^/.]+)/);
    return match ? match[1].replace(/\.git$/, '') : null;
  } catch {
    return null;
  }
}

/**
 * Token from the environment, else from the gh CLI keyring
 */
function getGitHubToken(): string | null {
  if (process.env.GITHUB_TOKEN) {
    return process.env.GITHUB_TOKEN;
  }
  try {
    const token = execSync('gh auth token', {
      encoding: 'utf8',
      stdio: ['pipe', 'pipe', 'pipe'],
    }).trim();
    return token || null;
  } catch {
    return null;
  }
}

interface Runtime {
  config: SyncConfig;
  logger: Logger;
  orchestrator: SyncOrchestrator;
  backups: BackupManager;
  sessions: SessionStore;
}

interface GlobalOptions {
  verbose?: boolean;
  stateDir?: string;
}

function createRuntime(globals: GlobalOptions, overrides: ConfigOverrides = {}): Runtime {
  const config = loadConfig(
    {
      ...process.env,
      GITHUB_REPO: process.env.GITHUB_REPO || detectGitHubRepo() || undefined,
      GITHUB_TOKEN: getGitHubToken() || undefined,
    },
    { ...overrides, ...(globals.stateDir ? { stateDir: globals.stateDir } : {}) }
  );
  const { token, repo } = requireTrackerCredentials(config);
  const logger = new ConsoleLogger({ verbose: globals.verbose });

  const tracker = new GitHubTracker({
    token,
    repo,
    statuses: config.github.statuses,
    doneStatuses: config.github.doneStatuses,
  });
  const retry = new RetryExecutor({ retry: config.retry, budget: new RateBudget(config.rateBudget), logger });
  const sessions = new SessionStore(config.stateDir);
  const backups = new BackupManager({ tracker, store: new BackupStore(config.stateDir), retry, logger });

  const orchestrator = new SyncOrchestrator({
    tracker,
    sessions,
    backups,
    retry,
    logger,
    matchThreshold: config.matchThreshold,
    conflictStrategy: config.conflictStrategy,
    resolver: new InteractiveConflictResolver(),
    confirmer: new InquirerConfirmer(),
  });

  return { config, logger, orchestrator, backups, sessions };
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return parsed;
}

function isPhase(value: string): value is SyncPhase {
  return ALL_PHASES.some((phase) => phase === value);
}

function parsePhases(values: string[] | undefined): SyncPhase[] {
  if (!values || values.includes('all')) {
    return [...ALL_PHASES];
  }
  const phases: SyncPhase[] = [];
  for (const value of values) {
    if (!isPhase(value)) {
      throw new InvalidArgumentError(`Unknown phase "${value}" (expected ${ALL_PHASES.join(', ')} or all)`);
    }
    phases.push(value);
  }
  return phases;
}

/**
 * Worst outcome across several epics
 */
function combinedOutcome(outcomes: RunOutcome[]): RunOutcome {
  const order: RunOutcome[] = ['fatal', 'cancelled', 'partial', 'success'];
  return order.find((outcome) => outcomes.includes(outcome)) ?? 'success';
}

function printReport(report: SyncReport): void {
  console.log();
  console.log(formatReport(report));
  console.log();
}

/**
 * Ctrl-C stops between operations; the session stays resumable
 */
function cancellationSignal(logger: Logger): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Stopping after the current operation...');
    controller.abort();
  });
  return controller.signal;
}

/**
 * Run a command body and turn its outcome into an exit code
 */
function run(body: () => Promise<number>): () => Promise<void> {
  return async () => {
    try {
      process.exitCode = await body();
    } catch (error) {
      if (error instanceof AuthOrConnectionFatalError && error.report) {
        printReport(error.report);
      }
      console.error(chalk.red(`\nError: ${errorMessage(error)}`));
      if (!(error instanceof SyncError) && error instanceof Error && error.stack) {
        console.error(chalk.gray(error.stack));
      }
      process.exitCode = 1;
    }
  };
}

// Create CLI
const program = new Command();

program
  .name('epic-sync')
  .description('Sync epic documents with GitHub issues')
  .version('0.1.0')
  .option('-v, --verbose', 'Show debug output')
  .option('--state-dir <dir>', 'Directory for sessions and backups');

interface SyncCommandOptions {
  execute?: boolean;
  phase?: string[];
  story?: string[];
  incremental?: boolean;
  confirm: boolean;
  backup: boolean;
  conflictStrategy?: string;
  export?: string;
  concurrency?: number;
  threshold?: number;
}

program
  .command('sync')
  .description('Plan (and with --execute, apply) the sync of one or more epic documents')
  .argument('<documents...>', 'Epic document JSON files')
  .option('--execute', 'Apply the plan (default is a dry run)')
  .option('--phase <phases...>', `Phases to sync (${ALL_PHASES.join('|')}|all)`)
  .option('--story <ids...>', 'Only sync these story ids')
  .option('--incremental', 'Skip stories unchanged since their last sync')
  .option('--no-confirm', 'Do not ask before each operation')
  .option('--no-backup', 'Do not capture a backup before executing')
  .option('--conflict-strategy <strategy>', 'prefer-local | prefer-remote | manual')
  .option('--export <path>', 'Write the report as JSON')
  .option('--concurrency <n>', 'Epics synced in parallel', parsePositiveInt)
  .option('--threshold <n>', 'Fuzzy title match threshold (0-1)', parseThreshold)
  .action(async (documents: string[], options: SyncCommandOptions) => {
    await run(async () => {
      const overrides: ConfigOverrides = {};
      if (options.conflictStrategy) {
        overrides.conflictStrategy = parseConflictStrategy(options.conflictStrategy);
      }
      if (options.concurrency !== undefined) {
        overrides.concurrency = options.concurrency;
      }
      if (options.threshold !== undefined) {
        overrides.matchThreshold = options.threshold;
      }

      const { config, logger, orchestrator } = createRuntime(program.opts<GlobalOptions>(), overrides);
      const phases = parsePhases(options.phase);
      const execute = options.execute === true;
      const signal = cancellationSignal(logger);

      const stores = documents.map((file) => new JsonDocumentStore(file));
      const loadSpinner = ora(`Loading ${stores.length} document(s)...`).start();
      const jobs = await Promise.all(
        stores.map(async (store) => ({ document: await store.load(), documentStore: store }))
      ).catch((error: unknown) => {
        loadSpinner.fail('Could not load documents');
        throw error;
      });
      loadSpinner.succeed(`Loaded ${jobs.map((job) => job.document.epicKey).join(', ')}`);

      const common = {
        phases,
        storyIds: options.story,
        incremental: options.incremental === true,
        execute,
        backup: options.backup,
        signal,
      };

      const reports: SyncReport[] = [];
      const outcomes: RunOutcome[] = [];
      if (jobs.length === 1) {
        const [{ document, documentStore }] = jobs;
        const confirm = execute && options.confirm && process.stdin.isTTY === true;
        const spinner = execute ? null : ora(`Planning ${document.epicKey}...`).start();
        try {
          reports.push(await orchestrator.sync(document, { ...common, confirm, document, documentStore }));
        } finally {
          spinner?.stop();
        }
      } else {
        if (execute && options.confirm) {
          logger.info(chalk.gray('Per-operation confirmation is off when syncing several epics'));
        }
        const results = await new MultiEpicSync(orchestrator, config.concurrency, logger).runAll(jobs, common);
        for (const result of results) {
          if (result.status === 'fulfilled') {
            reports.push(result.report);
          } else if (result.error instanceof AuthOrConnectionFatalError && result.error.report) {
            reports.push(result.error.report);
          } else {
            outcomes.push('fatal');
          }
        }
      }

      reports.forEach(printReport);
      if (options.export) {
        await exportReport(reports.length === 1 ? reports[0] : reports, options.export);
        logger.success(`Report written to ${options.export}`);
      }
      if (!execute) {
        logger.info(chalk.gray('Dry run: nothing was changed. Re-run with --execute to apply.'));
      }
      return exitCodeFor(combinedOutcome([...outcomes, ...reports.map((report) => report.outcome)]));
    })();
  });

program
  .command('resume')
  .description('Continue a paused session')
  .argument('<sessionId>', 'Session id (see "epic-sync sessions")')
  .argument('[document]', 'Epic document the session was planned from (not needed for restores)')
  .option('--no-confirm', 'Do not ask before each operation')
  .action(async (sessionId: string, documentPath: string | undefined, options: { confirm: boolean }) => {
    await run(async () => {
      const { logger, orchestrator } = createRuntime(program.opts<GlobalOptions>());
      const documentStore = documentPath ? new JsonDocumentStore(documentPath) : undefined;
      const document = documentStore ? await documentStore.load() : null;

      const report = await orchestrator.resume(sessionId, document, {
        confirm: options.confirm && process.stdin.isTTY === true,
        signal: cancellationSignal(logger),
        documentStore,
      });
      printReport(report);
      return exitCodeFor(report.outcome);
    })();
  });

const sessionsCommand = program.command('sessions').description('Inspect stored sessions');

sessionsCommand
  .command('list', { isDefault: true })
  .description('List sessions, most recent first')
  .action(async () => {
    await run(async () => {
      const { sessions } = createRuntime(program.opts<GlobalOptions>());
      const all = await sessions.list();
      if (all.length === 0) {
        console.log(chalk.gray('No sessions'));
        return 0;
      }
      for (const session of all) {
        const state =
          session.state === 'completed' ? chalk.green(session.state) : chalk.yellow(session.state);
        console.log(
          `${chalk.bold(session.id)}  ${session.epicKey}  ${session.mode}  ${state}  ` +
            chalk.gray(`${session.cursor}/${session.operations.length}  ${session.updatedAt}`)
        );
      }
      return 0;
    })();
  });

sessionsCommand
  .command('delete')
  .description('Delete a stored session')
  .argument('<sessionId>')
  .action(async (sessionId: string) => {
    await run(async () => {
      const { sessions, logger } = createRuntime(program.opts<GlobalOptions>());
      if (!(await sessions.delete(sessionId))) {
        logger.warn(`Session not found: ${sessionId}`);
        return 1;
      }
      logger.success(`Deleted session ${sessionId}`);
      return 0;
    })();
  });

const backupsCommand = program.command('backups').description('Manage pre-sync backups');

backupsCommand
  .command('list')
  .description('List backups, newest first')
  .argument('[epic]', 'Only backups of this epic')
  .action(async (epic: string | undefined) => {
    await run(async () => {
      const { backups } = createRuntime(program.opts<GlobalOptions>());
      const summaries = await backups.list(epic);
      if (summaries.length === 0) {
        console.log(chalk.gray('No backups'));
        return 0;
      }
      for (const summary of summaries) {
        console.log(
          `${chalk.bold(summary.id)}  ${summary.epicKey}  ` +
            chalk.gray(`${summary.issueCount} issue(s)  ${summary.createdAt}`)
        );
      }
      return 0;
    })();
  });

backupsCommand
  .command('diff')
  .description('Compare a backup with the current tracker state')
  .argument('<epic>')
  .option('--backup <id>', 'Backup id (default: latest)')
  .action(async (epic: string, options: { backup?: string }) => {
    await run(async () => {
      const { backups } = createRuntime(program.opts<GlobalOptions>());
      const spinner = ora('Comparing with tracker...').start();
      const changes = await backups.diff(options.backup ?? 'latest', epic);
      spinner.stop();

      if (changes.length === 0) {
        console.log(chalk.green('✓ Tracker matches the backup'));
        return 0;
      }
      for (const change of changes) {
        console.log(chalk.bold(`#${change.key} ${change.field}`));
        console.log(chalk.red(`  Backup:  ${change.backupValue ?? '(none)'}`));
        console.log(chalk.green(`  Current: ${change.currentValue ?? '(none)'}`));
      }
      return 0;
    })();
  });

backupsCommand
  .command('prune')
  .description('Delete old backups')
  .option('--epic <epic>', 'Only prune backups of this epic')
  .option('--keep <n>', 'Backups to keep per epic', parseNonNegativeInt)
  .option('--older-than <days>', 'Delete backups older than this many days', parseNonNegativeInt)
  .action(async (options: { epic?: string; keep?: number; olderThan?: number }) => {
    await run(async () => {
      const { backups, logger } = createRuntime(program.opts<GlobalOptions>());
      if (options.keep === undefined && options.olderThan === undefined) {
        logger.warn('Nothing to prune: pass --keep and/or --older-than');
        return 1;
      }
      const deleted = await backups.prune({ epicKey: options.epic, keep: options.keep, olderThanDays: options.olderThan });
      logger.success(`Deleted ${deleted.length} backup(s)`);
      deleted.forEach((id) => console.log(chalk.gray(`  ${id}`)));
      return 0;
    })();
  });

program
  .command('restore')
  .description('Restore tracker fields from a backup (dry run unless --execute)')
  .argument('<backupId>')
  .option('--execute', 'Apply the restore')
  .action(async (backupId: string, options: { execute?: boolean }) => {
    await run(async () => {
      const { orchestrator } = createRuntime(program.opts<GlobalOptions>());
      const report = await orchestrator.restore(backupId, options.execute === true);
      printReport(report);
      return exitCodeFor(report.outcome);
    })();
  });

program
  .command('rollback')
  .description('Restore the latest backup of an epic (dry run unless --execute)')
  .argument('<epic>')
  .option('--execute', 'Apply the rollback')
  .action(async (epic: string, options: { execute?: boolean }) => {
    await run(async () => {
      const { orchestrator } = createRuntime(program.opts<GlobalOptions>());
      const report = await orchestrator.rollback(epic, options.execute === true);
      printReport(report);
      return exitCodeFor(report.outcome);
    })();
  });

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`\nError: ${errorMessage(error)}`));
  process.exitCode = 1;
});
