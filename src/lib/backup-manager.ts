/**
 * Backups of remote issue state taken before an execute run mutates anything.
 *
 * Restoring is a sync toward the backup: the snapshot is compared with the
 * current remote state and the differences become an ordinary restore-mode
 * session that runs through the orchestrator's execute path.
 */

import fs from 'fs';
import path from 'path';
import { BackupNotFoundError, NotFoundError } from './errors';
import { findTransitionPath } from './diff-planner';
import { normalizeText, sameStatus } from './field-mapper';
import { isMissingFile, listJsonFiles, readJson, writeJsonAtomic } from './json-file';
import { Logger, silentLogger } from './logger';
import { generateRecordId, safeKey } from './record-id';
import { buildPreviewReport } from './report';
import { RetryExecutor } from './retry';
import { backupSchema } from './schemas';
import { createSession } from './session';
import type { IssueTrackerPort } from './tracker-port';
import {
  Backup,
  BackupSummary,
  FieldChange,
  IssueFieldUpdate,
  IssueSnapshot,
  Operation,
  RemoteIssue,
  SyncReport,
  SyncSession,
} from './types';

export class BackupStore {
  readonly dir: string;

  constructor(stateDir: string) {
    this.dir = path.join(stateDir, 'backups');
  }

  pathFor(backup: Pick<Backup, 'id' | 'epicKey'>): string {
    return path.join(this.dir, safeKey(backup.epicKey), `${backup.id}.json`);
  }

  async save(backup: Backup): Promise<string> {
    const file = this.pathFor(backup);
    await writeJsonAtomic(file, backup);
    return file;
  }

  async load(backupId: string, epicKey?: string): Promise<Backup> {
    const file = await this.find(backupId, epicKey);
    const backup = file ? await readJson(file, backupSchema) : null;
    if (!backup) {
      throw new BackupNotFoundError(`Backup not found: ${backupId}`);
    }
    return backup;
  }

  /**
   * Summaries, newest first
   */
  async list(epicKey?: string): Promise<BackupSummary[]> {
    const summaries: BackupSummary[] = [];
    for (const dir of await this.epicDirs(epicKey)) {
      for (const file of await listJsonFiles(dir)) {
        const backup = await readJson(file, backupSchema);
        if (backup && (epicKey === undefined || backup.epicKey === epicKey)) {
          summaries.push({
            id: backup.id,
            epicKey: backup.epicKey,
            createdAt: backup.createdAt,
            issueCount: backup.issues.length,
            path: file,
          });
        }
      }
    }
    return summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.id.localeCompare(a.id));
  }

  async delete(summary: BackupSummary): Promise<void> {
    await fs.promises.rm(summary.path, { force: true });
  }

  private async find(backupId: string, epicKey?: string): Promise<string | null> {
    if (!/^[A-Za-z0-9._-]+$/.test(backupId)) {
      return null;
    }
    for (const dir of await this.epicDirs(epicKey)) {
      const file = path.join(dir, `${backupId}.json`);
      if (fs.existsSync(file)) {
        return file;
      }
    }
    return null;
  }

  private async epicDirs(epicKey?: string): Promise<string[]> {
    if (epicKey !== undefined) {
      return [path.join(this.dir, safeKey(epicKey))];
    }
    try {
      const entries = await fs.promises.readdir(this.dir, { withFileTypes: true });
      return entries.filter((entry) => entry.isDirectory()).map((entry) => path.join(this.dir, entry.name));
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }
  }
}

/**
 * Anything that can run a session to completion; the orchestrator in practice
 */
export interface SessionRunner {
  execute(session: SyncSession): Promise<SyncReport>;
}

export interface PruneOptions {
  epicKey?: string;
  /** Keep this many newest backups per epic */
  keep?: number;
  olderThanDays?: number;
  now?: Date;
}

export interface BackupManagerOptions {
  tracker: IssueTrackerPort;
  store: BackupStore;
  retry?: RetryExecutor;
  logger?: Logger;
  clock?: () => Date;
}

export class BackupManager {
  private tracker: IssueTrackerPort;
  private retry: RetryExecutor;
  private logger: Logger;
  private clock: () => Date;
  readonly store: BackupStore;

  constructor(options: BackupManagerOptions) {
    this.tracker = options.tracker;
    this.store = options.store;
    this.retry = options.retry ?? new RetryExecutor();
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Snapshot every affected issue (and the subtasks under it) and store the backup
   */
  async capture(
    epicKey: string,
    affectedKeys: string[],
    documentPath = '',
    metadata: Record<string, string> = {}
  ): Promise<Backup> {
    const now = this.clock();
    const capturedAt = now.toISOString();
    const issues: IssueSnapshot[] = [];
    const seen = new Set<string>();

    const add = (issue: RemoteIssue) => {
      if (seen.has(issue.key)) {
        return;
      }
      seen.add(issue.key);
      issues.push(snapshotOf(issue, capturedAt));
    };

    for (const key of affectedKeys) {
      if (seen.has(key)) {
        continue;
      }
      const issue = await this.fetch(key);
      if (!issue) {
        this.logger.warn(`Issue ${key} not found; left out of the backup`);
        continue;
      }
      add(issue);
      issue.subtasks.forEach(add);
    }

    const backup: Backup = {
      id: generateRecordId(epicKey, now),
      epicKey,
      documentPath,
      createdAt: capturedAt,
      issues,
      metadata,
    };

    const file = await this.store.save(backup);
    this.logger.debug(`Backup ${backup.id} written`, { path: file, issues: issues.length });
    return backup;
  }

  list(epicKey?: string): Promise<BackupSummary[]> {
    return this.store.list(epicKey);
  }

  load(backupId: string, epicKey?: string): Promise<Backup> {
    return this.store.load(backupId, epicKey);
  }

  async latest(epicKey: string): Promise<Backup | null> {
    const [newest] = await this.store.list(epicKey);
    return newest ? this.store.load(newest.id, epicKey) : null;
  }

  /**
   * Field-by-field differences between a backup and the tracker's current state.
   * Pass 'latest' to compare against the newest backup of the epic.
   */
  async diff(backupIdOrLatest: string, epicKey: string): Promise<FieldChange[]> {
    const backup = await this.resolve(backupIdOrLatest, epicKey);
    const changes: FieldChange[] = [];

    for (const snapshot of backup.issues) {
      const current = await this.fetch(snapshot.key);
      if (!current) {
        changes.push({ key: snapshot.key, field: 'existence', backupValue: 'present', currentValue: null });
        continue;
      }

      if (snapshot.summary !== current.summary) {
        changes.push({ key: snapshot.key, field: 'summary', backupValue: snapshot.summary, currentValue: current.summary });
      }
      if (normalizeText(snapshot.description) !== normalizeText(current.description)) {
        changes.push({
          key: snapshot.key,
          field: 'description',
          backupValue: snapshot.description,
          currentValue: current.description,
        });
      }
      if (!sameStatus(snapshot.status, current.status)) {
        changes.push({ key: snapshot.key, field: 'status', backupValue: snapshot.status, currentValue: current.status });
      }
      if (snapshot.priority !== current.priority) {
        changes.push({ key: snapshot.key, field: 'priority', backupValue: snapshot.priority, currentValue: current.priority });
      }
      if (snapshot.storyPoints !== current.storyPoints) {
        changes.push({
          key: snapshot.key,
          field: 'storyPoints',
          backupValue: snapshot.storyPoints,
          currentValue: current.storyPoints,
        });
      }
    }

    return changes;
  }

  /**
   * Restore-mode session that moves the tracker back to the backup's field values
   */
  async planRestore(backupId: string): Promise<SyncSession> {
    const backup = await this.store.load(backupId);
    const operations: Operation[] = [];

    for (const snapshot of backup.issues) {
      const current = await this.fetch(snapshot.key);
      if (!current) {
        this.logger.warn(`Issue ${snapshot.key} no longer exists; it cannot be restored`);
        continue;
      }
      operations.push(...(await this.restoreOperations(snapshot, current)));
    }

    return createSession({
      epicKey: backup.epicKey,
      mode: 'restore',
      documentFingerprint: `backup:${backup.id}`,
      operations,
      bindings: [],
      skippedStories: [],
      backupId: backup.id,
      now: this.clock(),
    });
  }

  /**
   * Restore a backup. Without `execute` nothing is changed and every planned
   * operation is reported as skipped.
   */
  async restore(backupId: string, options: { execute: boolean; runner: SessionRunner }): Promise<SyncReport> {
    const session = await this.planRestore(backupId);
    if (!options.execute) {
      return buildPreviewReport(session, this.clock());
    }
    this.logger.info(`Restoring ${session.operations.length} change(s) from backup ${backupId}`);
    return options.runner.execute(session);
  }

  async rollback(epicKey: string, options: { execute: boolean; runner: SessionRunner }): Promise<SyncReport> {
    const backup = await this.latest(epicKey);
    if (!backup) {
      throw new BackupNotFoundError(`No backups found for ${epicKey}`);
    }
    return this.restore(backup.id, options);
  }

  /**
   * Delete backups past the retention policy; returns the deleted ids
   */
  async prune(options: PruneOptions): Promise<string[]> {
    const now = options.now ?? this.clock();
    const cutoff =
      options.olderThanDays === undefined ? null : now.getTime() - options.olderThanDays * 24 * 60 * 60 * 1000;
    const keptPerEpic = new Map<string, number>();
    const deleted: string[] = [];

    for (const summary of await this.store.list(options.epicKey)) {
      const rank = keptPerEpic.get(summary.epicKey) ?? 0;
      const beyondKeep = options.keep !== undefined && rank >= options.keep;
      const tooOld = cutoff !== null && Date.parse(summary.createdAt) < cutoff;

      if (beyondKeep || tooOld) {
        await this.store.delete(summary);
        deleted.push(summary.id);
      } else {
        keptPerEpic.set(summary.epicKey, rank + 1);
      }
    }

    return deleted;
  }

  private async resolve(backupIdOrLatest: string, epicKey: string): Promise<Backup> {
    if (backupIdOrLatest === 'latest') {
      const backup = await this.latest(epicKey);
      if (!backup) {
        throw new BackupNotFoundError(`No backups found for ${epicKey}`);
      }
      return backup;
    }
    return this.store.load(backupIdOrLatest, epicKey);
  }

  private async restoreOperations(snapshot: IssueSnapshot, current: RemoteIssue): Promise<Operation[]> {
    const operations: Operation[] = [];
    const target = { storyId: snapshot.key };
    const prefix = `restore:${snapshot.key}`;

    if (current.issueType === 'subtask') {
      const changes: IssueFieldUpdate = {};
      if (snapshot.summary !== current.summary) {
        changes.summary = snapshot.summary;
      }
      if (normalizeText(snapshot.description) !== normalizeText(current.description)) {
        changes.description = snapshot.description;
      }
      if (snapshot.storyPoints !== current.storyPoints) {
        changes.storyPoints = snapshot.storyPoints;
      }
      if (Object.keys(changes).length > 0) {
        operations.push({
          id: `${prefix}:update_subtask`,
          kind: 'update_subtask',
          phase: 'subtasks',
          target,
          remoteKey: snapshot.key,
          payload: changes,
        });
      }
    } else if (normalizeText(snapshot.description) !== normalizeText(current.description)) {
      operations.push({
        id: `${prefix}:update_description`,
        kind: 'update_description',
        phase: 'descriptions',
        target,
        remoteKey: snapshot.key,
        payload: { description: snapshot.description },
      });
    }

    if (!sameStatus(snapshot.status, current.status)) {
      const transitions = await this.retry.run(`get transitions of ${snapshot.key}`, () =>
        this.tracker.getTransitions(snapshot.key)
      );
      const transitionIds = findTransitionPath(current.status, snapshot.status, transitions);
      operations.push({
        id: `${prefix}:update_status`,
        kind: 'update_status',
        phase: 'statuses',
        target,
        remoteKey: snapshot.key,
        payload:
          transitionIds === null
            ? {
                from: current.status,
                to: snapshot.status,
                transitionIds: [],
                diagnostic: `No transition path from "${current.status}" to "${snapshot.status}"`,
              }
            : { from: current.status, to: snapshot.status, transitionIds },
      });
    }

    return operations;
  }

  private async fetch(key: string): Promise<RemoteIssue | null> {
    try {
      return await this.retry.run(`get issue ${key}`, () => this.tracker.getIssue(key));
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }
}

function snapshotOf(issue: RemoteIssue, capturedAt: string): IssueSnapshot {
  return {
    key: issue.key,
    parentKey: issue.parentKey,
    summary: issue.summary,
    description: issue.description,
    status: issue.status,
    priority: issue.priority,
    storyPoints: issue.storyPoints,
    capturedAt,
  };
}
