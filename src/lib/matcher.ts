/**
 * Resolves local stories to remote issues by key, then by fuzzy title
 */

import { diffChars } from 'diff';
import { MatchResult, RemoteIssue, Story } from './types';

export const DEFAULT_MATCH_THRESHOLD = 0.8;

/**
 * Lowercase, strip punctuation, collapse whitespace
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Similarity of two titles on a 0..1 scale: 2 * common characters / total length
 */
export function titleSimilarity(left: string, right: string): number {
  const a = normalizeTitle(left);
  const b = normalizeTitle(right);

  if (a.length === 0 && b.length === 0) {
    return 1;
  }
  if (a === b) {
    return 1;
  }

  let common = 0;
  for (const change of diffChars(a, b)) {
    if (!change.added && !change.removed) {
      common += change.value.length;
    }
  }

  return (2 * common) / (a.length + b.length);
}

interface Candidate<T> {
  item: T;
  title: string;
  order: number;
  createdAt: string;
}

/**
 * Best candidate at or above the threshold. Ties go to the earliest created
 * candidate, then to the earliest in input order.
 */
export function bestTitleMatch<T>(
  title: string,
  candidates: Array<Candidate<T>>,
  threshold: number
): { match: Candidate<T> | null; score: number | null } {
  let best: Candidate<T> | null = null;
  let bestScore: number | null = null;

  for (const candidate of candidates) {
    const score = titleSimilarity(title, candidate.title);
    if (bestScore === null || score > bestScore) {
      best = candidate;
      bestScore = score;
      continue;
    }
    if (best && score === bestScore && isEarlier(candidate, best)) {
      best = candidate;
    }
  }

  if (best === null || bestScore === null || bestScore < threshold) {
    return { match: null, score: bestScore };
  }
  return { match: best, score: bestScore };
}

function isEarlier<T>(candidate: Candidate<T>, current: Candidate<T>): boolean {
  if (candidate.createdAt !== current.createdAt) {
    return candidate.createdAt < current.createdAt;
  }
  return candidate.order < current.order;
}

export class Matcher {
  constructor(readonly threshold: number = DEFAULT_MATCH_THRESHOLD) {}

  /**
   * Match every story in document order. A remote issue is assigned to at most one story.
   */
  matchAll(stories: Story[], remotes: RemoteIssue[]): Map<string, MatchResult> {
    const results = new Map<string, MatchResult>();
    const pool = new Map<string, Candidate<RemoteIssue>>();

    remotes.forEach((issue, order) => {
      if (!pool.has(issue.key)) {
        pool.set(issue.key, { item: issue, title: issue.summary, order, createdAt: issue.createdAt });
      }
    });

    // Key matches first so a fuzzy match can never steal an issue a later story owns
    for (const story of stories) {
      if (story.remoteKey && pool.has(story.remoteKey)) {
        results.set(story.id, { kind: 'exact_key', key: story.remoteKey });
        pool.delete(story.remoteKey);
      }
    }

    for (const story of stories) {
      if (results.has(story.id)) {
        continue;
      }
      results.set(story.id, this.matchOne(story, pool));
    }

    return results;
  }

  private matchOne(story: Story, pool: Map<string, Candidate<RemoteIssue>>): MatchResult {
    const { match, score } = bestTitleMatch(story.title, Array.from(pool.values()), this.threshold);

    if (match === null || score === null) {
      return { kind: 'no_match', bestScore: score };
    }

    pool.delete(match.item.key);
    return { kind: 'fuzzy_title', key: match.item.key, score };
  }
}
