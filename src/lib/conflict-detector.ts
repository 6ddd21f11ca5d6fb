/**
 * Conflict detection between local edits and remote drift since the last sync
 */

import { ConflictError } from './errors';
import { FieldMapper } from './field-mapper';
import { fingerprintRemote, fingerprintStory } from './fingerprint';
import { ConflictStatus, ConflictStrategy, RemoteIssue, Story, StorySkip } from './types';

export interface FingerprintSet {
  /** Local fingerprint recorded at the last successful sync */
  lastLocal: string | null;
  currentLocal: string;
  /** Remote fingerprint recorded at the last successful sync */
  lastRemote: string | null;
  currentRemote: string | null;
}

/**
 * Classify a fingerprint set. Without a recorded local baseline the story has
 * never been synced and nothing can be in conflict.
 */
export function classifyConflict(fingerprints: FingerprintSet): ConflictStatus {
  const { lastLocal, currentLocal, lastRemote, currentRemote } = fingerprints;
  if (lastLocal === null) {
    return 'none';
  }

  const localChanged = currentLocal !== lastLocal;
  const remoteChanged = lastRemote !== null && currentRemote !== null && currentRemote !== lastRemote;

  if (localChanged && remoteChanged) {
    return 'both_changed';
  }
  if (remoteChanged) {
    return 'remote_changed_only';
  }
  if (localChanged) {
    return 'local_changed_only';
  }
  return 'none';
}

export type StoryDecision =
  | { action: 'plan' }
  | { action: 'resolve' }
  | { action: 'skip'; skip: StorySkip; warn: boolean };

export interface DecisionOptions {
  strategy: ConflictStrategy | null;
  incremental: boolean;
}

const mapper = new FieldMapper();

export class ConflictDetector {
  fingerprints(story: Story, remote: RemoteIssue | null): FingerprintSet {
    return {
      lastLocal: story.lastSyncedFingerprint ?? null,
      currentLocal: fingerprintStory(story),
      lastRemote: story.lastSyncedRemoteFingerprint ?? null,
      currentRemote: remote ? fingerprintRemote(remote) : null,
    };
  }

  detect(story: Story, remote: RemoteIssue | null): ConflictStatus {
    return classifyConflict(this.fingerprints(story, remote));
  }

  /**
   * What to do with a story before planning it
   */
  decide(story: Story, remote: RemoteIssue | null, options: DecisionOptions): StoryDecision {
    const fingerprints = this.fingerprints(story, remote);
    const status = classifyConflict(fingerprints);

    switch (status) {
      case 'both_changed':
        return this.decideConflict(story, options.strategy);
      case 'remote_changed_only':
        return {
          action: 'skip',
          warn: true,
          skip: {
            storyId: story.id,
            reason: 'remote_changed',
            message: 'Changed remotely since last sync; not overwriting',
          },
        };
      case 'local_changed_only':
        return { action: 'plan' };
      case 'none':
        // Comments are not fingerprinted; a story with unposted comments is never unchanged
        if (
          options.incremental &&
          remote !== null &&
          fingerprints.lastLocal === fingerprints.currentLocal &&
          mapper.missingComments(story, remote).length === 0
        ) {
          return {
            action: 'skip',
            warn: false,
            skip: { storyId: story.id, reason: 'unchanged', message: 'Unchanged since last sync' },
          };
        }
        return { action: 'plan' };
    }
  }

  private decideConflict(story: Story, strategy: ConflictStrategy | null): StoryDecision {
    switch (strategy) {
      case 'prefer-local':
        return { action: 'plan' };
      case 'prefer-remote':
        return {
          action: 'skip',
          warn: true,
          skip: { storyId: story.id, reason: 'kept_remote', message: 'Changed on both sides; kept the remote version' },
        };
      case 'manual':
        return { action: 'resolve' };
      case null:
        return {
          action: 'skip',
          warn: true,
          skip: { storyId: story.id, reason: 'conflict', message: new ConflictError(story.id).message },
        };
    }
  }
}
