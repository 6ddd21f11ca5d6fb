import fs from 'fs';
import os from 'os';
import path from 'path';
import type { DocumentStore } from '../../src/lib/document-store';
import { EpicDocument, RemoteIssue, Story, Subtask } from '../../src/lib/types';

export function makeSubtask(overrides: Partial<Subtask> = {}): Subtask {
  return {
    number: 1,
    title: 'Write migration',
    description: '',
    storyPoints: null,
    status: 'To Do',
    ...overrides,
  };
}

export function makeStory(overrides: Partial<Story> = {}): Story {
  return {
    id: 'US-001',
    title: 'Login with email',
    description: { role: 'user', want: 'to log in with my email', benefit: 'I can reach my account' },
    priority: null,
    status: 'To Do',
    storyPoints: null,
    subtasks: [],
    acceptanceCriteria: [],
    comments: [],
    ...overrides,
  };
}

export function makeDocument(stories: Story[], epicKey = 'PROJ-100'): EpicDocument {
  return { epicKey, stories };
}

export function makeRemote(overrides: Partial<RemoteIssue> = {}): RemoteIssue {
  return {
    key: 'PROJ-1',
    summary: 'Login with email',
    description: '',
    status: 'To Do',
    priority: null,
    storyPoints: null,
    issueType: 'story',
    parentKey: 'PROJ-100',
    createdAt: '2026-01-01T00:00:00.000Z',
    subtasks: [],
    comments: [],
    ...overrides,
  };
}

/**
 * Document store kept in memory; every save is recorded
 */
export class MemoryDocumentStore implements DocumentStore {
  readonly path = '/memory/epic.json';
  readonly saved: EpicDocument[] = [];

  constructor(private document: EpicDocument) {}

  async load(): Promise<EpicDocument> {
    return structuredClone(this.document);
  }

  async save(document: EpicDocument): Promise<void> {
    this.document = structuredClone(document);
    this.saved.push(structuredClone(document));
  }

  get current(): EpicDocument {
    return structuredClone(this.document);
  }
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'epic-sync-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export const noSleep = async (): Promise<void> => {};
