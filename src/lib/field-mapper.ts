/**
 * Field mapper between local stories/subtasks and tracker issue fields
 */

import { IssueFieldUpdate, NewIssueFields, RemoteIssue, Story, StoryDescription, Subtask } from './types';

/**
 * Normalize free text for comparison: unix newlines, no trailing spaces, trimmed
 */
export function normalizeText(value: string | null | undefined): string {
  return (value ?? '')
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .join('\n')
    .trim();
}

/**
 * Normalize a status name: case-insensitive, whitespace-collapsed
 */
export function normalizeStatus(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function sameStatus(left: string, right: string): boolean {
  return normalizeStatus(left) === normalizeStatus(right);
}

export class FieldMapper {
  /**
   * Render the structured description plus acceptance criteria as markdown
   */
  renderDescription(description: StoryDescription, acceptanceCriteria: string[] = []): string {
    const parts = [
      `**As a** ${description.role}`,
      `**I want** ${description.want}`,
      `**So that** ${description.benefit}`,
    ];

    if (description.context && description.context.trim()) {
      parts.push('', description.context.trim());
    }

    if (acceptanceCriteria.length > 0) {
      parts.push('', '## Acceptance Criteria', '');
      for (const criterion of acceptanceCriteria) {
        parts.push(`- [ ] ${criterion}`);
      }
    }

    return parts.join('\n');
  }

  storyDescription(story: Story): string {
    return this.renderDescription(story.description, story.acceptanceCriteria);
  }

  storyToIssue(story: Story, epicKey: string): NewIssueFields {
    return {
      issueType: 'story',
      parentKey: epicKey,
      summary: story.title,
      description: this.storyDescription(story),
      priority: story.priority,
      storyPoints: story.storyPoints,
    };
  }

  /**
   * Subtasks are created without a parent key when the parent story is created
   * in the same run; the executor fills it in once the parent exists.
   */
  subtaskToIssue(subtask: Subtask, parentKey: string, priority: string | null): NewIssueFields {
    return {
      issueType: 'subtask',
      parentKey,
      summary: subtask.title,
      description: subtask.description,
      priority,
      storyPoints: subtask.storyPoints,
    };
  }

  /**
   * Fields of a subtask that differ from its remote counterpart (empty when in sync)
   */
  subtaskChanges(subtask: Subtask, remote: RemoteIssue): IssueFieldUpdate {
    const changes: IssueFieldUpdate = {};

    if (subtask.title.trim() !== remote.summary.trim()) {
      changes.summary = subtask.title;
    }
    if (normalizeText(subtask.description) !== normalizeText(remote.description)) {
      changes.description = subtask.description;
    }
    if (subtask.storyPoints !== remote.storyPoints) {
      changes.storyPoints = subtask.storyPoints;
    }

    return changes;
  }

  descriptionDiffers(story: Story, remote: RemoteIssue): boolean {
    return normalizeText(this.storyDescription(story)) !== normalizeText(remote.description);
  }

  /**
   * Local comments not yet present on the remote issue, in document order
   */
  missingComments(story: Story, remote: RemoteIssue | null): string[] {
    const existing = new Set((remote?.comments ?? []).map((comment) => normalizeText(comment)));
    const pending: string[] = [];

    for (const comment of story.comments) {
      const normalized = normalizeText(comment);
      if (normalized === '' || existing.has(normalized)) {
        continue;
      }
      existing.add(normalized);
      pending.push(comment);
    }

    return pending;
  }
}
