/**
 * Content fingerprints for incremental sync and conflict detection.
 *
 * A fingerprint is a SHA-256 over a canonical JSON array of the synced fields,
 * so it depends only on content and field order, never on remote keys,
 * timestamps or object identity.
 */

import { createHash } from 'crypto';
import { FieldMapper, normalizeStatus, normalizeText } from './field-mapper';
import { EpicDocument, RemoteIssue, Story, Subtask } from './types';

type Signature = Array<string | number | null | Signature>;

const mapper = new FieldMapper();

function hash(signature: Signature): string {
  return createHash('sha256').update(JSON.stringify(signature)).digest('hex');
}

function subtaskSignature(subtask: Subtask): Signature {
  return [
    subtask.title.trim(),
    normalizeText(subtask.description),
    subtask.storyPoints,
    normalizeStatus(subtask.status),
  ];
}

function remoteSubtaskSignature(issue: RemoteIssue): Signature {
  return [
    issue.summary.trim(),
    normalizeText(issue.description),
    issue.storyPoints,
    normalizeStatus(issue.status),
  ];
}

export function storySignature(story: Story): Signature {
  return [
    story.title.trim(),
    normalizeText(mapper.storyDescription(story)),
    normalizeStatus(story.status),
    story.priority,
    story.storyPoints,
    story.subtasks.map(subtaskSignature),
  ];
}

export function fingerprintStory(story: Story): string {
  return hash(storySignature(story));
}

/**
 * Fingerprint of a remote issue over the same field set as fingerprintStory
 */
export function fingerprintRemote(issue: RemoteIssue): string {
  return hash([
    issue.summary.trim(),
    normalizeText(issue.description),
    normalizeStatus(issue.status),
    issue.priority,
    issue.storyPoints,
    issue.subtasks.map(remoteSubtaskSignature),
  ]);
}

/**
 * Fingerprint of a whole document; a session can only resume against a document with the same value.
 * Covers everything planning reads: story content, subtask numbers and local comments.
 */
export function fingerprintDocument(document: EpicDocument): string {
  return hash([
    document.epicKey,
    document.stories.map((story) => [
      story.id,
      storySignature(story),
      story.subtasks.map((subtask) => subtask.number),
      story.comments.map(normalizeText),
    ]),
  ]);
}
