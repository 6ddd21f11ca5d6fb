/**
 * Uniform capability set every issue tracker adapter implements.
 *
 * Calls fail with the classified errors from ./errors: NotFoundError,
 * AuthError, ConnectionError, RateLimitedError, TransientNetworkError,
 * TrackerValidationError.
 */

import { IssueFieldUpdate, NewIssueFields, RemoteIssue, Transition } from './types';

export interface IssueTrackerPort {
  readonly name: string;

  /** Stories under the epic, each with its subtasks and comments */
  fetchEpicChildren(epicKey: string): Promise<RemoteIssue[]>;

  createIssue(fields: NewIssueFields): Promise<RemoteIssue>;

  updateIssue(key: string, fields: IssueFieldUpdate): Promise<void>;

  getTransitions(key: string): Promise<Transition[]>;

  transition(key: string, transitionId: string): Promise<void>;

  addComment(key: string, text: string): Promise<void>;

  getIssue(key: string): Promise<RemoteIssue>;
}
