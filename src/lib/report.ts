/**
 * SyncReport construction, export and console rendering
 */

import chalk from 'chalk';
import { writeJsonAtomic } from './json-file';
import {
  ALL_PHASES,
  Operation,
  OperationResult,
  PhaseCounts,
  RunOutcome,
  SyncPhase,
  SyncReport,
  SyncSession,
} from './types';

export const DRY_RUN_REASON = 'dry run';

function emptyCounts(): PhaseCounts {
  return { created: 0, updated: 0, skipped: 0, failed: 0 };
}

function tally(counts: PhaseCounts, operation: Operation, result: OperationResult): void {
  switch (result.status) {
    case 'applied':
      if (operation.kind === 'create_issue' || operation.kind === 'create_subtask') {
        counts.created++;
      } else {
        counts.updated++;
      }
      break;
    case 'skipped':
      counts.skipped++;
      break;
    case 'failed':
      counts.failed++;
      break;
  }
}

export interface ReportOptions {
  dryRun?: boolean;
  /** Forced outcome for runs that did not finish (fatal, cancelled) */
  outcome?: RunOutcome;
  now?: Date;
}

function assemble(
  session: SyncSession,
  entries: SyncReport['entries'],
  pending: Operation[],
  options: ReportOptions
): SyncReport {
  const counts: Record<SyncPhase, PhaseCounts> = {
    descriptions: emptyCounts(),
    subtasks: emptyCounts(),
    comments: emptyCounts(),
    statuses: emptyCounts(),
  };
  const totals = emptyCounts();

  for (const { operation, result } of entries) {
    tally(counts[operation.phase], operation, result);
    tally(totals, operation, result);
  }

  return {
    epicKey: session.epicKey,
    sessionId: session.id,
    mode: session.mode,
    generatedAt: (options.now ?? new Date()).toISOString(),
    dryRun: options.dryRun ?? false,
    outcome: options.outcome ?? (totals.failed > 0 ? 'partial' : 'success'),
    counts,
    totals,
    entries,
    pending,
    skippedStories: session.skippedStories,
  };
}

/**
 * Report over everything a session has executed so far
 */
export function buildReport(session: SyncSession, options: ReportOptions = {}): SyncReport {
  const entries = session.results.map((result, index) => ({ operation: session.operations[index], result }));
  return assemble(session, entries, session.operations.slice(session.cursor), options);
}

/**
 * Report for a plan that is only shown, never executed
 */
export function buildPreviewReport(session: SyncSession, now?: Date): SyncReport {
  const entries = session.operations.map((operation) => ({
    operation,
    result: { status: 'skipped' as const, reason: DRY_RUN_REASON },
  }));
  return assemble(session, entries, [], { dryRun: true, now });
}

/**
 * Write one report (or several, as an array) as JSON
 */
export async function exportReport(report: SyncReport | SyncReport[], filePath: string): Promise<void> {
  await writeJsonAtomic(filePath, report);
}

/**
 * Process exit status for a run: 0 success, 2 partial, 1 fatal, 130 cancelled
 */
export function exitCodeFor(outcome: RunOutcome): number {
  switch (outcome) {
    case 'success':
      return 0;
    case 'partial':
      return 2;
    case 'fatal':
      return 1;
    case 'cancelled':
      return 130;
  }
}

export function describeOperation(operation: Operation): string {
  const where = operation.remoteKey ? `#${operation.remoteKey}` : operation.target.storyId;
  const entity =
    operation.target.subtaskNumber === undefined
      ? operation.target.storyId
      : `${operation.target.storyId}/${operation.target.subtaskNumber}`;

  switch (operation.kind) {
    case 'create_issue':
      return `create ${entity} "${operation.payload.summary}"`;
    case 'update_description':
      return `update description of ${entity} (${where})`;
    case 'update_status':
      return `move ${entity} (${where}) from "${operation.payload.from}" to "${operation.payload.to}"`;
    case 'create_subtask':
      return `create subtask ${entity} "${operation.payload.summary}" under ${where}`;
    case 'update_subtask':
      return `update ${Object.keys(operation.payload).join(', ')} of ${entity} (${where})`;
    case 'add_comment':
      return `comment on ${entity} (${where})`;
  }
}

function describeResult(result: OperationResult): string {
  switch (result.status) {
    case 'applied':
      return chalk.green(`✓ #${result.remoteKey}`);
    case 'skipped':
      return chalk.gray(`⊘ ${result.reason}`);
    case 'failed':
      return chalk.red(`✗ ${result.errorType}: ${result.error}`);
  }
}

/**
 * Human-readable report, one line per entry
 */
export function formatReport(report: SyncReport): string {
  const lines: string[] = [];
  const title = report.dryRun ? 'Sync Plan (dry run)' : report.mode === 'restore' ? 'Restore Results' : 'Sync Results';

  lines.push(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  lines.push(chalk.bold.cyan(`${title}: ${report.epicKey}`));
  lines.push(chalk.bold('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  lines.push(chalk.gray(`Session ${report.sessionId}`));
  lines.push('');

  for (const { operation, result } of report.entries) {
    const marker = report.dryRun ? chalk.cyan('•') : describeResult(result);
    lines.push(`  ${marker} ${describeOperation(operation)}`);
    if (operation.kind === 'update_status' && operation.payload.diagnostic) {
      lines.push(chalk.yellow(`      ${operation.payload.diagnostic}`));
    }
  }

  for (const operation of report.pending) {
    lines.push(`  ${chalk.gray('…')} ${describeOperation(operation)}`);
  }

  for (const skip of report.skippedStories) {
    lines.push(chalk.gray(`  ⊘ ${skip.storyId}: ${skip.message}`));
  }

  if (report.entries.length === 0 && report.pending.length === 0) {
    lines.push(chalk.gray('  Nothing to do'));
  }

  lines.push('');
  for (const phase of ALL_PHASES) {
    const counts = report.counts[phase];
    if (counts.created + counts.updated + counts.skipped + counts.failed === 0) {
      continue;
    }
    lines.push(
      `  ${phase.padEnd(13)}` +
        chalk.green(`${counts.created} created  `) +
        chalk.blue(`${counts.updated} updated  `) +
        chalk.gray(`${counts.skipped} skipped  `) +
        (counts.failed > 0 ? chalk.red(`${counts.failed} failed`) : `${counts.failed} failed`)
    );
  }
  if (report.pending.length > 0) {
    lines.push(chalk.yellow(`  ${report.pending.length} operation(s) not yet run; resume with session ${report.sessionId}`));
  }

  return lines.join('\n');
}
