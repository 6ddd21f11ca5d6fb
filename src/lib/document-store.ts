/**
 * Epic documents on disk (JSON output of the markdown front-end)
 */

import path from 'path';
import { ConfigurationError, EntityValidationError, errorMessage } from './errors';
import { readJson, writeJsonAtomic } from './json-file';
import { epicDocumentSchema } from './schemas';
import { EpicDocument, Story } from './types';

export interface DocumentStore {
  readonly path: string;
  load(): Promise<EpicDocument>;
  save(document: EpicDocument): Promise<void>;
}

export class JsonDocumentStore implements DocumentStore {
  readonly path: string;

  constructor(filePath: string) {
    this.path = path.resolve(filePath);
  }

  async load(): Promise<EpicDocument> {
    let document: EpicDocument | null;
    try {
      document = await readJson(this.path, epicDocumentSchema);
    } catch (error) {
      throw new ConfigurationError(`Cannot read document: ${errorMessage(error)}`, error);
    }
    if (!document) {
      throw new ConfigurationError(`Document not found: ${this.path}`);
    }
    return document;
  }

  async save(document: EpicDocument): Promise<void> {
    await writeJsonAtomic(this.path, document);
  }
}

/**
 * Semantic checks on one story. A failure drops only that story from the plan.
 */
export function validateStory(story: Story): void {
  if (story.title.trim() === '') {
    throw new EntityValidationError(story.id, 'title is empty');
  }

  const { role, want, benefit } = story.description;
  if (!role.trim() || !want.trim() || !benefit.trim()) {
    throw new EntityValidationError(story.id, 'description needs a role, a want and a benefit');
  }

  const numbers = new Set<number>();
  for (const subtask of story.subtasks) {
    if (numbers.has(subtask.number)) {
      throw new EntityValidationError(story.id, `subtask number ${subtask.number} is used twice`);
    }
    numbers.add(subtask.number);
    if (subtask.title.trim() === '') {
      throw new EntityValidationError(story.id, `subtask ${subtask.number} has no title`);
    }
  }
}
