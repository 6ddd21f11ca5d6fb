/**
 * GitHub Issues implementation of IssueTrackerPort, using Octokit.
 *
 * GitHub has no epics, subtasks or workflow, so they are carried in labels:
 *   epic:<epicKey>      on every story and subtask of an epic
 *   parent:<number>     on subtasks, pointing at their story
 *   status:<status>     workflow status (closed issues without one are done)
 *   priority:<value>, points:<n>
 * Issue keys are issue numbers as strings.
 */

import { Octokit } from '@octokit/rest';
import {
  AuthError,
  ConnectionError,
  NotFoundError,
  RateLimitedError,
  TrackerError,
  TrackerValidationError,
  TransientNetworkError,
  errorMessage,
} from './errors';
import { normalizeStatus } from './field-mapper';
import type { IssueTrackerPort } from './tracker-port';
import { IssueFieldUpdate, NewIssueFields, RemoteIssue, Transition } from './types';

interface RawLabel {
  name?: string;
}

interface RawIssue {
  number: number;
  title: string;
  body?: string | null;
  state: string;
  labels: Array<string | RawLabel>;
  created_at: string;
  pull_request?: unknown;
}

type RepoParams = {
  owner: string;
  repo: string;
};

/**
 * The part of Octokit's issues API the tracker uses
 */
export interface GitHubIssuesApi {
  get(params: RepoParams & { issue_number: number }): Promise<{ data: RawIssue }>;
  listForRepo(
    params: RepoParams & { labels?: string; state?: 'open' | 'closed' | 'all'; per_page?: number; page?: number }
  ): Promise<{ data: RawIssue[] }>;
  create(params: RepoParams & { title: string; body?: string; labels?: string[] }): Promise<{ data: RawIssue }>;
  update(
    params: RepoParams & {
      issue_number: number;
      title?: string;
      body?: string;
      labels?: string[];
      state?: 'open' | 'closed';
    }
  ): Promise<{ data: RawIssue }>;
  listComments(
    params: RepoParams & { issue_number: number; per_page?: number; page?: number }
  ): Promise<{ data: Array<{ body?: string }> }>;
  createComment(params: RepoParams & { issue_number: number; body: string }): Promise<unknown>;
  listLabelsForRepo(
    params: RepoParams & { per_page?: number; page?: number }
  ): Promise<{ data: Array<{ name: string; color: string }> }>;
  createLabel(params: RepoParams & { name: string; color: string }): Promise<unknown>;
}

/**
 * Bind the issues API of an Octokit client to GitHubIssuesApi
 */
export function octokitIssuesApi(octokit: Octokit): GitHubIssuesApi {
  const { issues } = octokit.rest;
  return {
    get: async (params) => ({ data: (await issues.get({ ...params })).data }),
    listForRepo: async (params) => ({ data: (await issues.listForRepo({ ...params })).data }),
    create: async (params) => ({ data: (await issues.create({ ...params })).data }),
    update: async (params) => ({ data: (await issues.update({ ...params })).data }),
    listComments: async (params) => ({ data: (await issues.listComments({ ...params })).data }),
    createComment: (params) => issues.createComment({ ...params }),
    listLabelsForRepo: async (params) => ({ data: (await issues.listLabelsForRepo({ ...params })).data }),
    createLabel: (params) => issues.createLabel({ ...params }),
  };
}

export interface GitHubTrackerOptions {
  token: string;
  /** owner/repo */
  repo: string;
  /** Workflow statuses in order; the first is the status of new issues */
  statuses: string[];
  /** Statuses that close the issue */
  doneStatuses: string[];
  issues?: GitHubIssuesApi;
  clock?: () => number;
}

const PAGE_SIZE = 100;

// Label colours by prefix
const LABEL_COLORS: Record<string, string> = {
  'epic:': 'b60205',
  'parent:': 'ededed',
  'status:': '0075ca',
  'priority:': 'fbca04',
  'points:': 'c5def5',
};

function labelNames(issue: RawIssue): string[] {
  return issue.labels
    .map((label) => (typeof label === 'string' ? label : label.name ?? ''))
    .filter((name) => name.length > 0);
}

function labelValue(labels: string[], prefix: string): string | null {
  const label = labels.find((name) => name.startsWith(prefix));
  return label === undefined ? null : label.slice(prefix.length);
}

function issueNumber(key: string): number {
  const value = Number(key);
  if (!Number.isInteger(value) || value <= 0) {
    throw new TrackerValidationError('key', `"${key}" is not a GitHub issue number`, key);
  }
  return value;
}

function readProperty(value: unknown, name: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, name) : undefined;
}

function readHeader(error: unknown, name: string): string | null {
  const headers = readProperty(readProperty(error, 'response'), 'headers');
  const value = readProperty(headers, name);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : null;
}

/**
 * Map an Octokit/network failure onto the tracker error taxonomy
 */
export function classifyGitHubError(error: unknown, key: string | null, now: number = Date.now()): Error {
  if (error instanceof TrackerError) {
    return error;
  }

  const status = readProperty(error, 'status');
  const code = readProperty(error, 'code') ?? readProperty(readProperty(error, 'cause'), 'code');
  const message = errorMessage(error);

  if (status === 429 || (status === 403 && (readHeader(error, 'x-ratelimit-remaining') === '0' || /rate limit/i.test(message)))) {
    const retryAfter = readHeader(error, 'retry-after');
    const reset = readHeader(error, 'x-ratelimit-reset');
    let retryAfterMs: number | null = null;
    if (retryAfter !== null && Number.isFinite(Number(retryAfter))) {
      retryAfterMs = Number(retryAfter) * 1000;
    } else if (reset !== null && Number.isFinite(Number(reset))) {
      retryAfterMs = Math.max(0, Number(reset) * 1000 - now);
    }
    return new RateLimitedError(`GitHub rate limit: ${message}`, retryAfterMs, key);
  }
  if (status === 401 || status === 403) {
    return new AuthError(`GitHub rejected the credentials: ${message}`, key, error);
  }
  if (status === 404 || status === 410) {
    return new NotFoundError(key === null ? message : `Issue #${key} not found`, key, error);
  }
  if (status === 422) {
    const first = readProperty(readProperty(readProperty(error, 'response'), 'data'), 'errors');
    const field = readProperty(Array.isArray(first) ? first[0] : undefined, 'field');
    return new TrackerValidationError(typeof field === 'string' ? field : 'request', message, key);
  }
  if (typeof status === 'number' && status >= 500) {
    return new TransientNetworkError(`GitHub returned ${status}: ${message}`, key, error);
  }
  if (code === 'ENOTFOUND' || code === 'ECONNREFUSED') {
    return new ConnectionError(`Cannot reach GitHub: ${message}`, key, error);
  }
  if (code === 'ECONNRESET' || code === 'ETIMEDOUT' || code === 'EAI_AGAIN' || code === 'EPIPE') {
    return new TransientNetworkError(`Network error talking to GitHub: ${message}`, key, error);
  }
  return new TrackerError(message, key, error);
}

export class GitHubTracker implements IssueTrackerPort {
  readonly name = 'github';
  private issues: GitHubIssuesApi;
  private owner: string;
  private repo: string;
  private statuses: string[];
  private doneStatuses: Set<string>;
  private labelCache: Set<string> | null = null;
  private clock: () => number;

  constructor(options: GitHubTrackerOptions) {
    // Parse owner/repo from full name (e.g., "acme/roadmap")
    const parts = options.repo.split('/');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new Error(`Invalid repo format: ${options.repo}. Expected "owner/repo"`);
    }
    if (options.statuses.length === 0) {
      throw new Error('At least one workflow status is required');
    }
    this.owner = parts[0];
    this.repo = parts[1];
    this.statuses = options.statuses;
    this.doneStatuses = new Set(options.doneStatuses.map(normalizeStatus));
    this.clock = options.clock ?? Date.now;
    this.issues =
      options.issues ??
      octokitIssuesApi(
        new Octokit({
          auth: options.token,
          log: {
            debug: () => {},
            info: () => {},
            warn: () => {},
            error: console.error,
          },
        })
      );
  }

  async fetchEpicChildren(epicKey: string): Promise<RemoteIssue[]> {
    const raw = await this.listByLabel(`epic:${epicKey}`, null);
    const stories: RemoteIssue[] = [];
    const subtasksByParent = new Map<string, RemoteIssue[]>();

    for (const issue of raw) {
      const mapped = this.toRemoteIssue(issue);
      if (mapped.issueType === 'subtask' && mapped.parentKey) {
        const list = subtasksByParent.get(mapped.parentKey) ?? [];
        list.push(mapped);
        subtasksByParent.set(mapped.parentKey, list);
      } else {
        stories.push(mapped);
      }
    }

    for (const story of stories) {
      story.subtasks = sortByNumber(subtasksByParent.get(story.key) ?? []);
      story.comments = await this.listComments(story.key);
    }

    return sortByNumber(stories);
  }

  async getIssue(key: string): Promise<RemoteIssue> {
    const { data } = await this.request(key, () =>
      this.issues.get({ owner: this.owner, repo: this.repo, issue_number: issueNumber(key) })
    );
    if (data.pull_request) {
      throw new NotFoundError(`#${key} is a pull request`, key);
    }

    const issue = this.toRemoteIssue(data);
    if (issue.issueType === 'story') {
      issue.subtasks = sortByNumber((await this.listByLabel(`parent:${key}`, key)).map((raw) => this.toRemoteIssue(raw)));
    }
    issue.comments = await this.listComments(key);
    return issue;
  }

  async createIssue(fields: NewIssueFields): Promise<RemoteIssue> {
    const epicKey = fields.issueType === 'story' ? fields.parentKey : await this.epicOf(fields.parentKey);
    const labels = [`status:${this.statuses[0]}`];
    if (epicKey) {
      labels.push(`epic:${epicKey}`);
    }
    if (fields.issueType === 'subtask') {
      labels.push(`parent:${fields.parentKey}`);
    }
    if (fields.priority) {
      labels.push(`priority:${fields.priority}`);
    }
    if (fields.storyPoints !== null) {
      labels.push(`points:${fields.storyPoints}`);
    }

    await this.ensureLabels(labels);
    const { data } = await this.request(null, () =>
      this.issues.create({
        owner: this.owner,
        repo: this.repo,
        title: fields.summary,
        body: fields.description,
        labels,
      })
    );
    return this.toRemoteIssue(data);
  }

  async updateIssue(key: string, fields: IssueFieldUpdate): Promise<void> {
    const update: { title?: string; body?: string; labels?: string[] } = {};
    if (fields.summary !== undefined) {
      update.title = fields.summary;
    }
    if (fields.description !== undefined) {
      update.body = fields.description;
    }
    if (fields.storyPoints !== undefined) {
      const labels = (await this.currentLabels(key)).filter((name) => !name.startsWith('points:'));
      if (fields.storyPoints !== null) {
        labels.push(`points:${fields.storyPoints}`);
      }
      await this.ensureLabels(labels);
      update.labels = labels;
    }

    await this.request(key, () =>
      this.issues.update({ owner: this.owner, repo: this.repo, issue_number: issueNumber(key), ...update })
    );
  }

  /**
   * Every other configured status is one transition away
   */
  async getTransitions(key: string): Promise<Transition[]> {
    const { data } = await this.request(key, () =>
      this.issues.get({ owner: this.owner, repo: this.repo, issue_number: issueNumber(key) })
    );
    const current = normalizeStatus(this.statusOf(data));
    return this.statuses
      .filter((status) => normalizeStatus(status) !== current)
      .map((status) => ({ id: status, name: `Move to ${status}`, to: status }));
  }

  async transition(key: string, transitionId: string): Promise<void> {
    const target = this.statuses.find((status) => normalizeStatus(status) === normalizeStatus(transitionId));
    if (!target) {
      throw new TrackerValidationError('transition', `unknown status "${transitionId}"`, key);
    }

    const labels = (await this.currentLabels(key)).filter((name) => !name.startsWith('status:'));
    labels.push(`status:${target}`);
    await this.ensureLabels(labels);

    await this.request(key, () =>
      this.issues.update({
        owner: this.owner,
        repo: this.repo,
        issue_number: issueNumber(key),
        labels,
        state: this.doneStatuses.has(normalizeStatus(target)) ? 'closed' : 'open',
      })
    );
  }

  async addComment(key: string, text: string): Promise<void> {
    await this.request(key, () =>
      this.issues.createComment({ owner: this.owner, repo: this.repo, issue_number: issueNumber(key), body: text })
    );
  }

  /**
   * Create any labels the repository does not have yet
   */
  async ensureLabels(labels: string[]): Promise<void> {
    const existing = await this.fetchLabelCache();
    for (const name of labels) {
      if (existing.has(name)) {
        continue;
      }
      const prefix = Object.keys(LABEL_COLORS).find((candidate) => name.startsWith(candidate));
      try {
        await this.request(null, () =>
          this.issues.createLabel({
            owner: this.owner,
            repo: this.repo,
            name,
            color: prefix ? LABEL_COLORS[prefix] : 'ededed',
          })
        );
      } catch (error) {
        // Created concurrently by another run
        if (!(error instanceof TrackerValidationError)) {
          throw error;
        }
      }
      existing.add(name);
    }
  }

  private async fetchLabelCache(): Promise<Set<string>> {
    if (this.labelCache) {
      return this.labelCache;
    }
    const names = new Set<string>();
    for (let page = 1; ; page++) {
      const { data } = await this.request(null, () =>
        this.issues.listLabelsForRepo({ owner: this.owner, repo: this.repo, per_page: PAGE_SIZE, page })
      );
      data.forEach((label) => names.add(label.name));
      if (data.length < PAGE_SIZE) {
        break;
      }
    }
    this.labelCache = names;
    return names;
  }

  private async listByLabel(label: string, key: string | null): Promise<RawIssue[]> {
    const issues: RawIssue[] = [];
    for (let page = 1; ; page++) {
      const { data } = await this.request(key, () =>
        this.issues.listForRepo({
          owner: this.owner,
          repo: this.repo,
          labels: label,
          state: 'all',
          per_page: PAGE_SIZE,
          page,
        })
      );
      issues.push(...data.filter((issue) => !issue.pull_request));
      if (data.length < PAGE_SIZE) {
        return issues;
      }
    }
  }

  private async listComments(key: string): Promise<string[]> {
    const comments: string[] = [];
    for (let page = 1; ; page++) {
      const { data } = await this.request(key, () =>
        this.issues.listComments({
          owner: this.owner,
          repo: this.repo,
          issue_number: issueNumber(key),
          per_page: PAGE_SIZE,
          page,
        })
      );
      comments.push(...data.map((comment) => comment.body ?? ''));
      if (data.length < PAGE_SIZE) {
        return comments;
      }
    }
  }

  private async currentLabels(key: string): Promise<string[]> {
    const { data } = await this.request(key, () =>
      this.issues.get({ owner: this.owner, repo: this.repo, issue_number: issueNumber(key) })
    );
    return labelNames(data);
  }

  private async epicOf(parentKey: string): Promise<string | null> {
    return labelValue(await this.currentLabels(parentKey), 'epic:');
  }

  private statusOf(issue: RawIssue): string {
    const label = labelValue(labelNames(issue), 'status:');
    if (label !== null) {
      return this.statuses.find((status) => normalizeStatus(status) === normalizeStatus(label)) ?? label;
    }
    if (issue.state === 'closed') {
      return this.statuses.find((status) => this.doneStatuses.has(normalizeStatus(status))) ?? 'Done';
    }
    return this.statuses[0];
  }

  private toRemoteIssue(issue: RawIssue): RemoteIssue {
    const labels = labelNames(issue);
    const parent = labelValue(labels, 'parent:');
    const points = labelValue(labels, 'points:');
    const pointsValue = points === null ? NaN : Number(points);

    return {
      key: String(issue.number),
      summary: issue.title,
      description: issue.body ?? '',
      status: this.statusOf(issue),
      priority: labelValue(labels, 'priority:'),
      storyPoints: Number.isFinite(pointsValue) ? pointsValue : null,
      issueType: parent === null ? 'story' : 'subtask',
      parentKey: parent ?? labelValue(labels, 'epic:'),
      createdAt: issue.created_at,
      subtasks: [],
      comments: [],
    };
  }

  private async request<T>(key: string | null, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw classifyGitHubError(error, key, this.clock());
    }
  }
}

function sortByNumber(issues: RemoteIssue[]): RemoteIssue[] {
  return [...issues].sort((a, b) => Number(a.key) - Number(b.key));
}
