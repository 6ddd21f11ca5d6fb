/**
 * Sync orchestrator: plans a document against the tracker, executes the plan
 * one operation at a time and keeps the session resumable throughout.
 *
 * Planning → (backup) → executing → completed, with executing → paused on a
 * fatal error or cancellation and paused → executing on resume.
 */

import { BackupManager } from './backup-manager';
import { ConflictDetector } from './conflict-detector';
import type { ConflictResolver } from './conflict-resolver';
import type { OperationConfirmer } from './confirm';
import { DiffPlanner, keysNeedingTransitions, matchSubtasks } from './diff-planner';
import { DocumentStore, validateStory } from './document-store';
import {
  AuthOrConnectionFatalError,
  ConfigurationError,
  MatchAmbiguityError,
  StaleSessionError,
  TrackerValidationError,
  errorMessage,
  isFatal,
} from './errors';
import { sameStatus } from './field-mapper';
import { fingerprintDocument, fingerprintRemote, fingerprintStory } from './fingerprint';
import { Logger, silentLogger } from './logger';
import { DEFAULT_MATCH_THRESHOLD, Matcher } from './matcher';
import { buildPreviewReport, buildReport, describeOperation } from './report';
import { RetryExecutor } from './retry';
import { SessionStore, advance, createSession, withState } from './session';
import type { IssueTrackerPort } from './tracker-port';
import {
  ALL_PHASES,
  ConflictStrategy,
  EntityRef,
  EpicDocument,
  KeyBinding,
  MatchResult,
  Operation,
  OperationResult,
  RemoteIssue,
  Story,
  StorySkip,
  SyncPhase,
  SyncReport,
  SyncSession,
  Transition,
} from './types';

export interface OrchestratorOptions {
  tracker: IssueTrackerPort;
  sessions: SessionStore;
  backups?: BackupManager | null;
  retry?: RetryExecutor;
  logger?: Logger;
  matchThreshold?: number;
  conflictStrategy?: ConflictStrategy | null;
  resolver?: ConflictResolver | null;
  confirmer?: OperationConfirmer | null;
  clock?: () => Date;
}

export interface PlanOptions {
  phases?: readonly SyncPhase[];
  /** Only plan these story ids */
  storyIds?: readonly string[];
  /** Skip stories whose content is unchanged since their last sync */
  incremental?: boolean;
}

export interface ExecuteOptions {
  /** Ask before every operation */
  confirm?: boolean;
  signal?: AbortSignal;
  /** Document to write remote keys and sync fingerprints back into */
  document?: EpicDocument;
  documentStore?: DocumentStore;
}

export interface SyncOptions extends PlanOptions, ExecuteOptions {
  execute?: boolean;
  /** Capture a backup before mutating (default true) */
  backup?: boolean;
}

export function refKey(target: EntityRef): string {
  return target.subtaskNumber === undefined ? target.storyId : `${target.storyId}/${target.subtaskNumber}`;
}

type OperationOutcome = { result: OperationResult } | { quit: true };

/**
 * Mutable bookkeeping of one execute call; never shared between calls
 */
interface RunState {
  keys: Map<string, string>;
  /** Story ids whose remaining operations are skipped, with the reason */
  blocked: Map<string, string>;
  askEach: boolean;
}

export class SyncOrchestrator {
  private tracker: IssueTrackerPort;
  private sessions: SessionStore;
  private backups: BackupManager | null;
  private retry: RetryExecutor;
  private logger: Logger;
  private matcher: Matcher;
  private detector = new ConflictDetector();
  private conflictStrategy: ConflictStrategy | null;
  private resolver: ConflictResolver | null;
  private confirmer: OperationConfirmer | null;
  private clock: () => Date;

  constructor(options: OrchestratorOptions) {
    this.tracker = options.tracker;
    this.sessions = options.sessions;
    this.backups = options.backups ?? null;
    this.retry = options.retry ?? new RetryExecutor();
    this.logger = options.logger ?? silentLogger;
    this.matcher = new Matcher(options.matchThreshold ?? DEFAULT_MATCH_THRESHOLD);
    this.conflictStrategy = options.conflictStrategy ?? null;
    this.resolver = options.resolver ?? null;
    this.confirmer = options.confirmer ?? null;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Build the full ordered plan for a document. Reads from the tracker, never writes.
   */
  async planAll(document: EpicDocument, options: PlanOptions = {}): Promise<SyncSession> {
    const phases = options.phases ?? ALL_PHASES;
    const incremental = options.incremental ?? false;
    const selected = options.storyIds ? new Set(options.storyIds) : null;

    const remotes = await this.call(`fetch children of ${document.epicKey}`, () =>
      this.tracker.fetchEpicChildren(document.epicKey)
    );
    const remotesByKey = new Map(remotes.map((issue) => [issue.key, issue]));
    this.logger.debug(`Fetched ${remotes.length} issue(s) under ${document.epicKey}`);

    const skippedStories: StorySkip[] = [];
    const candidates: Story[] = [];

    for (const story of document.stories) {
      if (selected && !selected.has(story.id)) {
        skippedStories.push({ storyId: story.id, reason: 'filtered', message: 'Not selected' });
        continue;
      }
      try {
        validateStory(story);
        candidates.push(story);
      } catch (error) {
        this.logger.warn(errorMessage(error));
        skippedStories.push({ storyId: story.id, reason: 'invalid', message: errorMessage(error) });
      }
    }

    const matches = this.matcher.matchAll(candidates, remotes);
    const toPlan: Array<{ story: Story; match: MatchResult; remote: RemoteIssue | null }> = [];

    for (const story of candidates) {
      const match: MatchResult = matches.get(story.id) ?? { kind: 'no_match', bestScore: null };
      const remote = match.kind === 'no_match' ? null : remotesByKey.get(match.key) ?? null;

      if (match.kind === 'no_match') {
        this.logger.debug(new MatchAmbiguityError(story.id, match.bestScore, this.matcher.threshold).message);
      }

      const decision = this.detector.decide(story, remote, { strategy: this.conflictStrategy, incremental });
      if (decision.action === 'skip') {
        if (decision.warn) {
          this.logger.warn(`${story.id}: ${decision.skip.message}`);
        }
        skippedStories.push(decision.skip);
        continue;
      }
      if (decision.action === 'resolve' && remote) {
        const skip = await this.resolveConflict(story, remote);
        if (skip) {
          skippedStories.push(skip);
          continue;
        }
      }
      toPlan.push({ story, match, remote });
    }

    const transitions = phases.includes('statuses')
      ? await this.prefetchTransitions(toPlan)
      : new Map<string, Transition[]>();
    const planner = new DiffPlanner({
      epicKey: document.epicKey,
      phases,
      threshold: this.matcher.threshold,
      remotes: remotesByKey,
      transitions,
    });

    const operations: Operation[] = [];
    const bindings: KeyBinding[] = [];

    for (const { story, match, remote } of toPlan) {
      const plan = planner.plan(story, match);
      if (plan.skip) {
        skippedStories.push(plan.skip);
        continue;
      }
      operations.push(...plan.operations);
      if (match.kind !== 'no_match' && remote) {
        bindings.push(...this.bindingsFor(story, match, remote));
      }
    }

    return createSession({
      epicKey: document.epicKey,
      mode: 'sync',
      documentFingerprint: fingerprintDocument(document),
      phases,
      operations,
      bindings,
      skippedStories,
      now: this.clock(),
    });
  }

  /**
   * Plan, back up and execute. Without `execute` this is a dry run that returns the preview.
   */
  async sync(document: EpicDocument, options: SyncOptions = {}): Promise<SyncReport> {
    let session = await this.planAll(document, options);

    if (!options.execute) {
      return buildPreviewReport(session, this.clock());
    }

    if (session.operations.length > 0 && this.backups && options.backup !== false) {
      const affected = Array.from(
        new Set(session.operations.flatMap((operation) => (operation.remoteKey ? [operation.remoteKey] : [])))
      );
      const backup = await this.backups.capture(document.epicKey, affected, options.documentStore?.path ?? '', {
        sessionId: session.id,
      });
      session = { ...session, backupId: backup.id };
      this.logger.info(`Backup ${backup.id} captured (${backup.issues.length} issue(s))`);
    }

    return this.execute(session, options);
  }

  /**
   * Run a session from its cursor to the end, persisting after every operation
   */
  async execute(session: SyncSession, options: ExecuteOptions = {}): Promise<SyncReport> {
    const run = this.runStateFor(session, options);
    let current = withState(session, 'executing', this.clock());
    await this.sessions.save(current);

    while (current.cursor < current.operations.length) {
      if (options.signal?.aborted) {
        return this.stop(current, options, 'cancelled');
      }

      const operation = current.operations[current.cursor];
      let outcome: OperationOutcome;
      try {
        outcome = await this.runOperation(operation, current, run);
      } catch (error) {
        // The operation at the cursor did not complete and stays pending
        const report = await this.stop(current, options, 'fatal');
        if (!isFatal(error)) {
          throw error;
        }
        const fatal = new AuthOrConnectionFatalError(
          `Sync of ${current.epicKey} halted at operation ${current.cursor + 1}/${current.operations.length}: ${errorMessage(error)}`,
          error
        );
        fatal.report = report;
        throw fatal;
      }

      if ('quit' in outcome) {
        return this.stop(current, options, 'cancelled');
      }

      current = advance(current, outcome.result, this.clock());
      await this.sessions.save(current);
      this.track(operation, outcome.result, run);
    }

    current = withState(current, 'completed', this.clock());
    await this.sessions.save(current);
    await this.writeBack(current, options, true);

    const report = buildReport(current, { now: this.clock() });
    this.logger.info(
      `${current.epicKey}: ${report.totals.created} created, ${report.totals.updated} updated, ` +
        `${report.totals.skipped} skipped, ${report.totals.failed} failed`
    );
    return report;
  }

  /**
   * Continue a paused session. The document must still be the one it was planned against.
   */
  async resume(sessionId: string, document: EpicDocument | null, options: ExecuteOptions = {}): Promise<SyncReport> {
    const session = await this.sessions.load(sessionId);

    if (session.mode === 'sync') {
      if (!document) {
        throw new ConfigurationError(`Session ${sessionId} needs its epic document to resume`);
      }
      if (fingerprintDocument(document) !== session.documentFingerprint) {
        throw new StaleSessionError(sessionId);
      }
    }

    if (session.state === 'completed') {
      this.logger.info(`Session ${sessionId} already completed`);
      return buildReport(session, { now: this.clock() });
    }

    this.logger.info(
      `Resuming ${sessionId} at operation ${session.cursor + 1}/${session.operations.length}`
    );
    return this.execute(session, { ...options, document: document ?? undefined });
  }

  async restore(backupId: string, execute: boolean): Promise<SyncReport> {
    return this.requireBackups().restore(backupId, { execute, runner: this });
  }

  async rollback(epicKey: string, execute: boolean): Promise<SyncReport> {
    return this.requireBackups().rollback(epicKey, { execute, runner: this });
  }

  private requireBackups(): BackupManager {
    if (!this.backups) {
      throw new ConfigurationError('No backup manager configured');
    }
    return this.backups;
  }

  private async call<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await this.retry.run(label, fn);
    } catch (error) {
      if (isFatal(error) && !(error instanceof AuthOrConnectionFatalError)) {
        throw new AuthOrConnectionFatalError(`${label}: ${errorMessage(error)}`, error);
      }
      throw error;
    }
  }

  private async resolveConflict(story: Story, remote: RemoteIssue): Promise<StorySkip | null> {
    if (!this.resolver) {
      return { storyId: story.id, reason: 'conflict', message: 'Changed on both sides; no resolver available' };
    }
    const resolution = await this.resolver.resolve({ story, remote });
    switch (resolution) {
      case 'local':
        return null;
      case 'remote':
        return { storyId: story.id, reason: 'kept_remote', message: 'Kept the remote version' };
      case 'skip':
        return { storyId: story.id, reason: 'conflict', message: 'Skipped during conflict resolution' };
    }
  }

  private async prefetchTransitions(
    stories: Array<{ story: Story; remote: RemoteIssue | null }>
  ): Promise<Map<string, Transition[]>> {
    const transitions = new Map<string, Transition[]>();

    for (const { story, remote } of stories) {
      if (!remote) {
        continue;
      }
      for (const key of keysNeedingTransitions(story, remote, this.matcher.threshold)) {
        try {
          transitions.set(key, await this.call(`get transitions of ${key}`, () => this.tracker.getTransitions(key)));
        } catch (error) {
          if (isFatal(error)) {
            throw error;
          }
          this.logger.warn(`Could not read transitions of ${key}: ${errorMessage(error)}`);
          transitions.set(key, []);
        }
      }
    }

    return transitions;
  }

  private bindingsFor(story: Story, match: MatchResult, remote: RemoteIssue): KeyBinding[] {
    if (match.kind === 'no_match') {
      return [];
    }
    const bindings: KeyBinding[] = [{ target: { storyId: story.id }, remoteKey: remote.key, match: match.kind }];

    const subtaskMatches = matchSubtasks(story.subtasks, remote.subtasks, this.matcher.threshold);
    for (const subtask of story.subtasks) {
      const remoteSubtask = subtaskMatches.get(subtask.number);
      if (remoteSubtask) {
        bindings.push({
          target: { storyId: story.id, subtaskNumber: subtask.number },
          remoteKey: remoteSubtask.key,
          match: subtask.remoteKey === remoteSubtask.key ? 'exact_key' : 'fuzzy_title',
        });
      }
    }
    return bindings;
  }

  /**
   * Rebuild run bookkeeping from what the session already recorded, so a resumed run behaves like an uninterrupted one
   */
  private runStateFor(session: SyncSession, options: ExecuteOptions): RunState {
    const run: RunState = {
      keys: new Map(session.bindings.map((binding) => [refKey(binding.target), binding.remoteKey])),
      blocked: new Map(),
      askEach: options.confirm === true && this.confirmer !== null,
    };
    session.results.forEach((result, index) => this.track(session.operations[index], result, run));
    return run;
  }

  private track(operation: Operation, result: OperationResult, run: RunState): void {
    const { storyId } = operation.target;

    if (result.status === 'applied') {
      if (operation.kind === 'create_issue' || operation.kind === 'create_subtask') {
        run.keys.set(refKey(operation.target), result.remoteKey);
      }
      return;
    }

    if (operation.kind === 'create_issue' && !run.blocked.has(storyId)) {
      run.blocked.set(storyId, `${storyId} was not created`);
    }
    if (result.status === 'failed' && result.errorType === TrackerValidationError.name && !run.blocked.has(storyId)) {
      run.blocked.set(storyId, `an earlier operation on ${storyId} was rejected by the tracker`);
    }
  }

  private async runOperation(operation: Operation, session: SyncSession, run: RunState): Promise<OperationOutcome> {
    const blockedReason = run.blocked.get(operation.target.storyId);
    if (blockedReason) {
      this.logger.debug(`Skipping ${operation.id}: ${blockedReason}`);
      return { result: { status: 'skipped', reason: blockedReason } };
    }

    if (run.askEach && this.confirmer) {
      const answer = await this.confirmer.confirm(operation, session.cursor + 1, session.operations.length);
      if (answer === 'quit') {
        return { quit: true };
      }
      if (answer === 'no') {
        return { result: { status: 'skipped', reason: 'declined' } };
      }
      if (answer === 'all') {
        run.askEach = false;
      }
    }

    try {
      const result = await this.apply(operation, run);
      if (result.status === 'applied') {
        this.logger.success(describeOperation(operation));
      } else if (result.status === 'failed') {
        this.logger.error(`${describeOperation(operation)}: ${result.error}`);
      } else {
        this.logger.debug(`Skipped ${operation.id}: ${result.reason}`);
      }
      return { result };
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      this.logger.error(`${describeOperation(operation)}: ${errorMessage(error)}`);
      return {
        result: {
          status: 'failed',
          error: errorMessage(error),
          errorType: error instanceof Error ? error.name : 'Error',
        },
      };
    }
  }

  private async apply(operation: Operation, run: RunState): Promise<OperationResult> {
    const label = `${operation.kind} ${operation.id}`;
    const storyKey = operation.remoteKey ?? run.keys.get(operation.target.storyId) ?? null;

    switch (operation.kind) {
      case 'create_issue': {
        const issue = await this.retry.run(label, () => this.tracker.createIssue(operation.payload));
        return { status: 'applied', remoteKey: issue.key };
      }

      case 'create_subtask': {
        if (!storyKey) {
          return { status: 'skipped', reason: `${operation.target.storyId} has no remote key` };
        }
        const issue = await this.retry.run(label, () =>
          this.tracker.createIssue({ ...operation.payload, parentKey: storyKey })
        );
        return { status: 'applied', remoteKey: issue.key };
      }

      case 'update_description': {
        const key = operation.remoteKey;
        if (!key) {
          return { status: 'skipped', reason: 'no remote key' };
        }
        await this.retry.run(label, () => this.tracker.updateIssue(key, { description: operation.payload.description }));
        return { status: 'applied', remoteKey: key };
      }

      case 'update_subtask': {
        const key = operation.remoteKey;
        if (!key) {
          return { status: 'skipped', reason: 'no remote key' };
        }
        await this.retry.run(label, () => this.tracker.updateIssue(key, operation.payload));
        return { status: 'applied', remoteKey: key };
      }

      case 'update_status': {
        const key = operation.remoteKey;
        if (!key) {
          return { status: 'skipped', reason: 'no remote key' };
        }
        if (operation.payload.diagnostic) {
          return { status: 'failed', error: operation.payload.diagnostic, errorType: 'NoTransitionPath' };
        }
        for (const transitionId of operation.payload.transitionIds) {
          await this.retry.run(label, () => this.tracker.transition(key, transitionId));
        }
        return { status: 'applied', remoteKey: key };
      }

      case 'add_comment': {
        if (!storyKey) {
          return { status: 'skipped', reason: `${operation.target.storyId} has no remote key` };
        }
        await this.retry.run(label, () => this.tracker.addComment(storyKey, operation.payload.body));
        return { status: 'applied', remoteKey: storyKey };
      }
    }
  }

  /**
   * Pause the session at its cursor and report what ran
   */
  private async stop(
    session: SyncSession,
    options: ExecuteOptions,
    outcome: 'cancelled' | 'fatal'
  ): Promise<SyncReport> {
    const paused = withState(session, 'paused', this.clock());
    await this.sessions.save(paused);
    await this.writeBack(paused, options, outcome === 'cancelled');

    if (outcome === 'cancelled') {
      this.logger.warn(`Sync of ${paused.epicKey} stopped; resume with session ${paused.id}`);
    }
    return buildReport(paused, { outcome, now: this.clock() });
  }

  /**
   * Attach remote keys to the document and record a sync baseline for every
   * story that is now fully in sync. With `refresh` off (connection lost) only
   * keys are written.
   */
  private async writeBack(session: SyncSession, options: ExecuteOptions, refresh: boolean): Promise<void> {
    const { document, documentStore } = options;
    if (session.mode !== 'sync' || !document) {
      return;
    }

    const keys = new Map(session.bindings.map((binding) => [refKey(binding.target), binding.remoteKey]));
    const operationsByStory = new Map<string, Array<{ operation: Operation; result: OperationResult | null }>>();

    session.operations.forEach((operation, index) => {
      const result = index < session.cursor ? session.results[index] : null;
      if (result?.status === 'applied' && (operation.kind === 'create_issue' || operation.kind === 'create_subtask')) {
        keys.set(refKey(operation.target), result.remoteKey);
      }
      const list = operationsByStory.get(operation.target.storyId) ?? [];
      list.push({ operation, result });
      operationsByStory.set(operation.target.storyId, list);
    });

    const skipped = new Set(session.skippedStories.map((skip) => skip.storyId));
    // A baseline is only meaningful when every field class was compared
    const fullPlan = ALL_PHASES.every((phase) => session.phases.includes(phase));
    const syncedAt = this.clock().toISOString();

    for (const story of document.stories) {
      const storyKey = keys.get(story.id);
      if (storyKey) {
        story.remoteKey = storyKey;
      }
      for (const subtask of story.subtasks) {
        const subtaskKey = keys.get(refKey({ storyId: story.id, subtaskNumber: subtask.number }));
        if (subtaskKey) {
          subtask.remoteKey = subtaskKey;
        }
      }

      if (!refresh || !fullPlan || !storyKey || skipped.has(story.id)) {
        continue;
      }
      const entries = operationsByStory.get(story.id) ?? [];
      if (!entries.every((entry) => entry.result?.status === 'applied')) {
        continue;
      }

      let remote: RemoteIssue;
      try {
        remote = await this.call(`get issue ${storyKey}`, () => this.tracker.getIssue(storyKey));
      } catch (error) {
        if (isFatal(error)) {
          break;
        }
        this.logger.warn(`Could not record a sync baseline for ${story.id}: ${errorMessage(error)}`);
        continue;
      }

      // A new issue starts in the tracker's default status; without a baseline the next run moves it
      if (!statusesMatch(story, remote)) {
        continue;
      }

      story.lastSyncedFingerprint = fingerprintStory(story);
      story.lastSyncedRemoteFingerprint = fingerprintRemote(remote);
      story.lastSyncedAt = syncedAt;
    }

    if (documentStore) {
      await documentStore.save(document);
      this.logger.debug(`Wrote sync metadata to ${documentStore.path}`);
    }
  }
}

function statusesMatch(story: Story, remote: RemoteIssue): boolean {
  if (!sameStatus(story.status, remote.status)) {
    return false;
  }
  const remoteSubtasks = new Map(remote.subtasks.map((subtask) => [subtask.key, subtask]));
  return story.subtasks.every((subtask) => {
    const counterpart = subtask.remoteKey ? remoteSubtasks.get(subtask.remoteKey) : undefined;
    return !counterpart || sameStatus(subtask.status, counterpart.status);
  });
}
