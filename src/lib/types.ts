/**
 * Shared types for epic sync system
 */

export type IsoTimestamp = string;

/**
 * Structured "As a / I want / So that" story description
 */
export interface StoryDescription {
  role: string;
  want: string;
  benefit: string;
  context?: string;
}

export interface Subtask {
  /** Sequence number, unique within the parent story */
  number: number;
  title: string;
  description: string;
  storyPoints: number | null;
  status: string;
  remoteKey?: string | null;
}

export interface Story {
  id: string;
  title: string;
  description: StoryDescription;
  priority: string | null;
  status: string;
  storyPoints: number | null;
  subtasks: Subtask[];
  acceptanceCriteria: string[];
  comments: string[];
  remoteKey?: string | null;
  lastSyncedFingerprint?: string | null;
  lastSyncedRemoteFingerprint?: string | null;
  lastSyncedAt?: IsoTimestamp | null;
}

/**
 * Parsed epic document (output of the markdown/YAML front-end)
 */
export interface EpicDocument {
  epicKey: string;
  title?: string;
  stories: Story[];
}

export interface RemoteIssue {
  key: string;
  summary: string;
  description: string;
  status: string;
  priority: string | null;
  storyPoints: number | null;
  issueType: 'story' | 'subtask';
  parentKey: string | null;
  createdAt: IsoTimestamp;
  subtasks: RemoteIssue[];
  comments: string[];
}

export interface Transition {
  id: string;
  name: string;
  to: string;
  /** Statuses the transition is available from; absent means the issue's current status only */
  from?: string[];
}

export interface NewIssueFields {
  issueType: 'story' | 'subtask';
  /** Epic key for stories, parent story key for subtasks */
  parentKey: string;
  summary: string;
  description: string;
  priority: string | null;
  storyPoints: number | null;
}

export interface IssueFieldUpdate {
  summary?: string;
  description?: string;
  storyPoints?: number | null;
}

export type SyncPhase = 'descriptions' | 'subtasks' | 'comments' | 'statuses';

export const ALL_PHASES: readonly SyncPhase[] = ['descriptions', 'subtasks', 'comments', 'statuses'];

export type ConflictStrategy = 'prefer-local' | 'prefer-remote' | 'manual';

export type ConflictStatus = 'none' | 'remote_changed_only' | 'local_changed_only' | 'both_changed';

/**
 * Reference to the local entity an operation targets
 */
export interface EntityRef {
  storyId: string;
  subtaskNumber?: number;
}

export type MatchResult =
  | { kind: 'exact_key'; key: string }
  | { kind: 'fuzzy_title'; key: string; score: number }
  | { kind: 'no_match'; bestScore: number | null };

interface OperationBase {
  /** Deterministic identifier, stable across planning runs */
  id: string;
  phase: SyncPhase;
  target: EntityRef;
  /** Remote key of the issue the operation acts on (parent key for create_subtask), null when not yet known */
  remoteKey: string | null;
}

export type Operation =
  | (OperationBase & { kind: 'create_issue'; payload: NewIssueFields })
  | (OperationBase & { kind: 'update_description'; payload: { description: string } })
  | (OperationBase & {
      kind: 'update_status';
      payload: { from: string; to: string; transitionIds: string[]; diagnostic?: string };
    })
  | (OperationBase & { kind: 'create_subtask'; payload: NewIssueFields })
  | (OperationBase & { kind: 'update_subtask'; payload: IssueFieldUpdate })
  | (OperationBase & { kind: 'add_comment'; payload: { body: string } });

export type OperationKind = Operation['kind'];

export type OperationResult =
  | { status: 'applied'; remoteKey: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: string; errorType: string };

export interface KeyBinding {
  target: EntityRef;
  remoteKey: string;
  match: 'exact_key' | 'fuzzy_title';
}

export interface StorySkip {
  storyId: string;
  reason: 'unchanged' | 'remote_changed' | 'conflict' | 'invalid' | 'filtered' | 'kept_remote';
  message: string;
}

export type SessionState = 'planned' | 'executing' | 'paused' | 'completed';

export type SessionMode = 'sync' | 'restore';

export interface SyncSession {
  version: 1;
  id: string;
  epicKey: string;
  mode: SessionMode;
  documentFingerprint: string;
  /** Phases the plan was built for */
  phases: SyncPhase[];
  state: SessionState;
  createdAt: IsoTimestamp;
  updatedAt: IsoTimestamp;
  /** Immutable once persisted */
  operations: Operation[];
  results: OperationResult[];
  cursor: number;
  bindings: KeyBinding[];
  skippedStories: StorySkip[];
  backupId: string | null;
}

export interface PhaseCounts {
  created: number;
  updated: number;
  skipped: number;
  failed: number;
}

export type RunOutcome = 'success' | 'partial' | 'fatal' | 'cancelled';

export interface SyncReportEntry {
  operation: Operation;
  result: OperationResult;
}

export interface SyncReport {
  epicKey: string;
  sessionId: string;
  mode: SessionMode;
  generatedAt: IsoTimestamp;
  dryRun: boolean;
  outcome: RunOutcome;
  counts: Record<SyncPhase, PhaseCounts>;
  totals: PhaseCounts;
  entries: SyncReportEntry[];
  /** Planned operations not reached (paused, cancelled or fatal runs) */
  pending: Operation[];
  skippedStories: StorySkip[];
}

export interface IssueSnapshot {
  key: string;
  parentKey: string | null;
  summary: string;
  description: string;
  status: string;
  priority: string | null;
  storyPoints: number | null;
  capturedAt: IsoTimestamp;
}

export interface Backup {
  id: string;
  epicKey: string;
  documentPath: string;
  createdAt: IsoTimestamp;
  issues: IssueSnapshot[];
  metadata: Record<string, string>;
}

export interface BackupSummary {
  id: string;
  epicKey: string;
  createdAt: IsoTimestamp;
  issueCount: number;
  path: string;
}

export interface FieldChange {
  key: string;
  field: 'summary' | 'description' | 'status' | 'priority' | 'storyPoints' | 'existence';
  backupValue: string | number | null;
  currentValue: string | number | null;
}
