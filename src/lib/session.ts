/**
 * Resumable sync sessions.
 *
 * A session holds the immutable plan of one run plus the outcome of every
 * operation before the cursor. Execution only ever moves it forward through
 * `advance`; the store persists it after each step.
 */

import fs from 'fs';
import path from 'path';
import { SessionNotFoundError } from './errors';
import { listJsonFiles, readJson, writeJsonAtomic } from './json-file';
import { generateRecordId } from './record-id';
import { sessionSchema } from './schemas';
import {
  ALL_PHASES,
  KeyBinding,
  Operation,
  OperationResult,
  SessionMode,
  SessionState,
  StorySkip,
  SyncPhase,
  SyncSession,
} from './types';

export interface NewSession {
  epicKey: string;
  mode: SessionMode;
  documentFingerprint: string;
  phases?: readonly SyncPhase[];
  operations: Operation[];
  bindings: KeyBinding[];
  skippedStories: StorySkip[];
  backupId?: string | null;
  id?: string;
  now?: Date;
}

export function createSession(input: NewSession): SyncSession {
  const now = (input.now ?? new Date()).toISOString();
  return {
    version: 1,
    id: input.id ?? generateRecordId(input.epicKey, input.now),
    epicKey: input.epicKey,
    mode: input.mode,
    documentFingerprint: input.documentFingerprint,
    phases: [...(input.phases ?? ALL_PHASES)],
    state: 'planned',
    createdAt: now,
    updatedAt: now,
    operations: input.operations,
    results: [],
    cursor: 0,
    bindings: input.bindings,
    skippedStories: input.skippedStories,
    backupId: input.backupId ?? null,
  };
}

/**
 * Record the outcome of the operation at the cursor and move past it
 */
export function advance(session: SyncSession, result: OperationResult, now: Date = new Date()): SyncSession {
  if (session.cursor >= session.operations.length) {
    throw new Error(`Session ${session.id} has no operation left to advance past`);
  }
  return {
    ...session,
    state: 'executing',
    results: [...session.results, result],
    cursor: session.cursor + 1,
    updatedAt: now.toISOString(),
  };
}

export function withState(session: SyncSession, state: SessionState, now: Date = new Date()): SyncSession {
  return { ...session, state, updatedAt: now.toISOString() };
}

export function remainingOperations(session: SyncSession): Operation[] {
  return session.operations.slice(session.cursor);
}

export function isFinished(session: SyncSession): boolean {
  return session.cursor >= session.operations.length;
}

const SESSION_ID = /^[A-Za-z0-9._-]+$/;

export class SessionStore {
  readonly dir: string;

  constructor(stateDir: string) {
    this.dir = path.join(stateDir, 'sessions');
  }

  pathFor(sessionId: string): string {
    return path.join(this.dir, `${sessionId}.json`);
  }

  async save(session: SyncSession): Promise<void> {
    await writeJsonAtomic(this.pathFor(session.id), session);
  }

  async load(sessionId: string): Promise<SyncSession> {
    if (!SESSION_ID.test(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    const session = await readJson(this.pathFor(sessionId), sessionSchema);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * All stored sessions, most recently updated first
   */
  async list(): Promise<SyncSession[]> {
    const sessions: SyncSession[] = [];
    for (const file of await listJsonFiles(this.dir)) {
      const session = await readJson(file, sessionSchema);
      if (session) {
        sessions.push(session);
      }
    }
    return sessions.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async delete(sessionId: string): Promise<boolean> {
    const file = this.pathFor(sessionId);
    if (!SESSION_ID.test(sessionId) || !fs.existsSync(file)) {
      return false;
    }
    await fs.promises.rm(file);
    return true;
  }
}
