/**
 * Diff planner: turns one story and its match into an ordered list of operations.
 *
 * Planning is pure. Everything it needs from the tracker (matched remote issue,
 * allowed transitions) is fetched beforehand and passed in through PlanContext,
 * so a dry run and an execute run of the same inputs see the same plan.
 */

import { FieldMapper, normalizeStatus, sameStatus } from './field-mapper';
import { bestTitleMatch, titleSimilarity } from './matcher';
import {
  EntityRef,
  MatchResult,
  Operation,
  RemoteIssue,
  Story,
  StorySkip,
  Subtask,
  SyncPhase,
  Transition,
} from './types';

export interface PlanContext {
  epicKey: string;
  phases: readonly SyncPhase[];
  threshold: number;
  /** Remote issue for every matched story, by key */
  remotes: Map<string, RemoteIssue>;
  /** Transitions available on each issue whose status has to move, by key */
  transitions: Map<string, Transition[]>;
}

export interface StoryPlan {
  operations: Operation[];
  skip: StorySkip | null;
}

const mapper = new FieldMapper();

/**
 * Shortest sequence of transition ids leading from one status to another,
 * [] when already there, null when the workflow has no path.
 */
export function findTransitionPath(from: string, to: string, transitions: Transition[]): string[] | null {
  const start = normalizeStatus(from);
  const goal = normalizeStatus(to);
  if (start === goal) {
    return [];
  }

  const edges = new Map<string, Array<{ id: string; to: string }>>();
  for (const transition of transitions) {
    const sources = transition.from ? transition.from.map(normalizeStatus) : [start];
    for (const source of sources) {
      const list = edges.get(source) ?? [];
      list.push({ id: transition.id, to: normalizeStatus(transition.to) });
      edges.set(source, list);
    }
  }

  const previous = new Map<string, { status: string; id: string }>();
  const visited = new Set<string>([start]);
  const queue = [start];

  while (queue.length > 0) {
    const status = queue.shift();
    if (status === undefined) {
      break;
    }
    for (const edge of edges.get(status) ?? []) {
      if (visited.has(edge.to)) {
        continue;
      }
      visited.add(edge.to);
      previous.set(edge.to, { status, id: edge.id });
      if (edge.to === goal) {
        return unwind(previous, start, goal);
      }
      queue.push(edge.to);
    }
  }

  return null;
}

function unwind(previous: Map<string, { status: string; id: string }>, start: string, goal: string): string[] {
  const path: string[] = [];
  let current = goal;
  while (current !== start) {
    const step = previous.get(current);
    if (!step) {
      break;
    }
    path.unshift(step.id);
    current = step.status;
  }
  return path;
}

/**
 * Pair local subtasks with remote sub-issues: recorded key first, then the
 * remote at the same position when its title is close enough, then the best
 * remaining title match.
 */
export function matchSubtasks(
  subtasks: Subtask[],
  remotes: RemoteIssue[],
  threshold: number
): Map<number, RemoteIssue> {
  const matched = new Map<number, RemoteIssue>();
  const taken = new Set<string>();
  const byKey = new Map(remotes.map((remote) => [remote.key, remote]));

  for (const subtask of subtasks) {
    const remote = subtask.remoteKey ? byKey.get(subtask.remoteKey) : undefined;
    if (remote && !taken.has(remote.key)) {
      matched.set(subtask.number, remote);
      taken.add(remote.key);
    }
  }

  subtasks.forEach((subtask, index) => {
    if (matched.has(subtask.number)) {
      return;
    }
    const sameSlot = remotes[index];
    if (sameSlot && !taken.has(sameSlot.key) && titleSimilarity(subtask.title, sameSlot.summary) >= threshold) {
      matched.set(subtask.number, sameSlot);
      taken.add(sameSlot.key);
    }
  });

  for (const subtask of subtasks) {
    if (matched.has(subtask.number)) {
      continue;
    }
    const pool = remotes
      .map((remote, order) => ({ item: remote, title: remote.summary, order, createdAt: remote.createdAt }))
      .filter((candidate) => !taken.has(candidate.item.key));
    const { match } = bestTitleMatch(subtask.title, pool, threshold);
    if (match) {
      matched.set(subtask.number, match.item);
      taken.add(match.item.key);
    }
  }

  return matched;
}

/**
 * Keys of matched issues whose status differs from the local one; the
 * orchestrator fetches their transitions before planning.
 */
export function keysNeedingTransitions(story: Story, remote: RemoteIssue, threshold: number): string[] {
  const keys: string[] = [];
  if (!sameStatus(story.status, remote.status)) {
    keys.push(remote.key);
  }
  const subtaskMatches = matchSubtasks(story.subtasks, remote.subtasks, threshold);
  for (const subtask of story.subtasks) {
    const remoteSubtask = subtaskMatches.get(subtask.number);
    if (remoteSubtask && !sameStatus(subtask.status, remoteSubtask.status)) {
      keys.push(remoteSubtask.key);
    }
  }
  return keys;
}

export class DiffPlanner {
  constructor(private context: PlanContext) {}

  plan(story: Story, match: MatchResult): StoryPlan {
    if (match.kind === 'no_match') {
      return this.planCreate(story);
    }

    const remote = this.context.remotes.get(match.key);
    if (!remote) {
      return {
        operations: [],
        skip: { storyId: story.id, reason: 'invalid', message: `Matched issue ${match.key} was not fetched` },
      };
    }
    return { operations: this.planUpdate(story, remote), skip: null };
  }

  private wants(phase: SyncPhase): boolean {
    return this.context.phases.includes(phase);
  }

  private planCreate(story: Story): StoryPlan {
    if (!this.wants('descriptions')) {
      return {
        operations: [],
        skip: {
          storyId: story.id,
          reason: 'filtered',
          message: 'Not in the tracker yet and the descriptions phase is not selected',
        },
      };
    }

    const operations: Operation[] = [
      {
        id: `${story.id}:create_issue`,
        kind: 'create_issue',
        phase: 'descriptions',
        target: { storyId: story.id },
        remoteKey: null,
        payload: mapper.storyToIssue(story, this.context.epicKey),
      },
    ];

    if (this.wants('subtasks')) {
      for (const subtask of story.subtasks) {
        operations.push(this.createSubtask(story, subtask, null));
      }
    }

    if (this.wants('comments')) {
      operations.push(...this.comments(story, null));
    }

    return { operations, skip: null };
  }

  private planUpdate(story: Story, remote: RemoteIssue): Operation[] {
    const operations: Operation[] = [];
    const storyRef: EntityRef = { storyId: story.id };

    if (this.wants('descriptions') && mapper.descriptionDiffers(story, remote)) {
      operations.push({
        id: `${story.id}:update_description`,
        kind: 'update_description',
        phase: 'descriptions',
        target: storyRef,
        remoteKey: remote.key,
        payload: { description: mapper.storyDescription(story) },
      });
    }

    const subtaskMatches = matchSubtasks(story.subtasks, remote.subtasks, this.context.threshold);

    if (this.wants('subtasks')) {
      for (const subtask of story.subtasks) {
        const remoteSubtask = subtaskMatches.get(subtask.number);
        if (!remoteSubtask) {
          operations.push(this.createSubtask(story, subtask, remote.key));
          continue;
        }
        const changes = mapper.subtaskChanges(subtask, remoteSubtask);
        if (Object.keys(changes).length > 0) {
          operations.push({
            id: `${subtaskId(story, subtask)}:update_subtask`,
            kind: 'update_subtask',
            phase: 'subtasks',
            target: { storyId: story.id, subtaskNumber: subtask.number },
            remoteKey: remoteSubtask.key,
            payload: changes,
          });
        }
      }
    }

    if (this.wants('comments')) {
      operations.push(...this.comments(story, remote));
    }

    if (this.wants('statuses')) {
      if (!sameStatus(story.status, remote.status)) {
        operations.push(this.statusChange(story.id, storyRef, remote, story.status));
      }
      for (const subtask of story.subtasks) {
        const remoteSubtask = subtaskMatches.get(subtask.number);
        if (remoteSubtask && !sameStatus(subtask.status, remoteSubtask.status)) {
          operations.push(
            this.statusChange(
              subtaskId(story, subtask),
              { storyId: story.id, subtaskNumber: subtask.number },
              remoteSubtask,
              subtask.status
            )
          );
        }
      }
    }

    return operations;
  }

  private createSubtask(story: Story, subtask: Subtask, parentKey: string | null): Operation {
    return {
      id: `${subtaskId(story, subtask)}:create_subtask`,
      kind: 'create_subtask',
      phase: 'subtasks',
      target: { storyId: story.id, subtaskNumber: subtask.number },
      remoteKey: parentKey,
      payload: mapper.subtaskToIssue(subtask, parentKey ?? '', story.priority),
    };
  }

  private comments(story: Story, remote: RemoteIssue | null): Operation[] {
    return mapper.missingComments(story, remote).map((body, index): Operation => ({
      id: `${story.id}:add_comment:${index + 1}`,
      kind: 'add_comment',
      phase: 'comments',
      target: { storyId: story.id },
      remoteKey: remote ? remote.key : null,
      payload: { body },
    }));
  }

  private statusChange(idPrefix: string, target: EntityRef, remote: RemoteIssue, desired: string): Operation {
    const transitions = this.context.transitions.get(remote.key) ?? [];
    const path = findTransitionPath(remote.status, desired, transitions);

    return {
      id: `${idPrefix}:update_status`,
      kind: 'update_status',
      phase: 'statuses',
      target,
      remoteKey: remote.key,
      payload:
        path === null
          ? {
              from: remote.status,
              to: desired,
              transitionIds: [],
              diagnostic: `No transition path from "${remote.status}" to "${desired}"`,
            }
          : { from: remote.status, to: desired, transitionIds: path },
    };
  }
}

function subtaskId(story: Story, subtask: Subtask): string {
  return `${story.id}/${subtask.number}`;
}
