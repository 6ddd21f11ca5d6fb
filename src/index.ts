/**
 * epic-sync - Programmatic API
 *
 * Export all classes and types for programmatic usage
 */

export { SyncOrchestrator } from './lib/sync-orchestrator';
export type { OrchestratorOptions, PlanOptions, ExecuteOptions, SyncOptions } from './lib/sync-orchestrator';
export { MultiEpicSync } from './lib/multi-epic';
export type { EpicJob, EpicRunResult } from './lib/multi-epic';
export { DiffPlanner, findTransitionPath } from './lib/diff-planner';
export { Matcher, normalizeTitle, titleSimilarity } from './lib/matcher';
export { ConflictDetector, classifyConflict } from './lib/conflict-detector';
export { InteractiveConflictResolver } from './lib/conflict-resolver';
export type { ConflictResolver, ConflictResolution } from './lib/conflict-resolver';
export { InquirerConfirmer } from './lib/confirm';
export type { OperationConfirmer, ConfirmAnswer } from './lib/confirm';
export { FieldMapper } from './lib/field-mapper';
export { fingerprintDocument, fingerprintRemote, fingerprintStory } from './lib/fingerprint';
export { SessionStore, createSession } from './lib/session';
export { BackupManager, BackupStore } from './lib/backup-manager';
export { JsonDocumentStore } from './lib/document-store';
export type { DocumentStore } from './lib/document-store';
export { GitHubTracker } from './lib/github-tracker';
export type { IssueTrackerPort } from './lib/tracker-port';
export { RateBudget, RetryExecutor } from './lib/retry';
export { loadConfig } from './lib/config';
export type { SyncConfig } from './lib/config';
export { ConsoleLogger, silentLogger } from './lib/logger';
export type { Logger } from './lib/logger';
export { buildReport, exitCodeFor, exportReport, formatReport } from './lib/report';
export * from './lib/errors';

export * from './lib/types';
