/**
 * Zod schemas for everything read back from disk: epic documents, sessions, backups
 */

import { z } from 'zod';
import {
  Backup,
  EpicDocument,
  IssueFieldUpdate,
  NewIssueFields,
  Operation,
  OperationResult,
  Story,
  Subtask,
  SyncSession,
} from './types';

const timestamp = z.string().datetime({ offset: true });

export const subtaskSchema: z.ZodType<Subtask, z.ZodTypeDef, unknown> = z.object({
  number: z.number().int().positive(),
  title: z.string(),
  description: z.string().default(''),
  storyPoints: z.number().nonnegative().nullable().default(null),
  status: z.string().min(1).default('To Do'),
  remoteKey: z.string().min(1).nullable().optional(),
});

export const storySchema: z.ZodType<Story, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.object({
    role: z.string(),
    want: z.string(),
    benefit: z.string(),
    context: z.string().optional(),
  }),
  priority: z.string().min(1).nullable().default(null),
  status: z.string().min(1).default('To Do'),
  storyPoints: z.number().nonnegative().nullable().default(null),
  subtasks: z.array(subtaskSchema).default([]),
  acceptanceCriteria: z.array(z.string()).default([]),
  comments: z.array(z.string()).default([]),
  remoteKey: z.string().min(1).nullable().optional(),
  lastSyncedFingerprint: z.string().nullable().optional(),
  lastSyncedRemoteFingerprint: z.string().nullable().optional(),
  lastSyncedAt: timestamp.nullable().optional(),
});

export const epicDocumentSchema: z.ZodType<EpicDocument, z.ZodTypeDef, unknown> = z
  .object({
    epicKey: z.string().min(1),
    title: z.string().optional(),
    stories: z.array(storySchema),
  })
  .superRefine((document, ctx) => {
    const seen = new Set<string>();
    document.stories.forEach((story, index) => {
      if (seen.has(story.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['stories', index, 'id'],
          message: `duplicate story id ${story.id}`,
        });
      }
      seen.add(story.id);
    });
  });

const entityRefSchema = z.object({
  storyId: z.string(),
  subtaskNumber: z.number().int().optional(),
});

const newIssueFieldsSchema: z.ZodType<NewIssueFields> = z.object({
  issueType: z.enum(['story', 'subtask']),
  parentKey: z.string(),
  summary: z.string(),
  description: z.string(),
  priority: z.string().nullable(),
  storyPoints: z.number().nullable(),
});

const issueFieldUpdateSchema: z.ZodType<IssueFieldUpdate> = z.object({
  summary: z.string().optional(),
  description: z.string().optional(),
  storyPoints: z.number().nullable().optional(),
});

const phaseSchema = z.enum(['descriptions', 'subtasks', 'comments', 'statuses']);

const operationBase = {
  id: z.string(),
  phase: phaseSchema,
  target: entityRefSchema,
  remoteKey: z.string().nullable(),
};

export const operationSchema: z.ZodType<Operation> = z.discriminatedUnion('kind', [
  z.object({ ...operationBase, kind: z.literal('create_issue'), payload: newIssueFieldsSchema }),
  z.object({ ...operationBase, kind: z.literal('update_description'), payload: z.object({ description: z.string() }) }),
  z.object({
    ...operationBase,
    kind: z.literal('update_status'),
    payload: z.object({
      from: z.string(),
      to: z.string(),
      transitionIds: z.array(z.string()),
      diagnostic: z.string().optional(),
    }),
  }),
  z.object({ ...operationBase, kind: z.literal('create_subtask'), payload: newIssueFieldsSchema }),
  z.object({ ...operationBase, kind: z.literal('update_subtask'), payload: issueFieldUpdateSchema }),
  z.object({ ...operationBase, kind: z.literal('add_comment'), payload: z.object({ body: z.string() }) }),
]);

export const operationResultSchema: z.ZodType<OperationResult> = z.discriminatedUnion('status', [
  z.object({ status: z.literal('applied'), remoteKey: z.string() }),
  z.object({ status: z.literal('skipped'), reason: z.string() }),
  z.object({ status: z.literal('failed'), error: z.string(), errorType: z.string() }),
]);

export const sessionSchema: z.ZodType<SyncSession> = z
  .object({
    version: z.literal(1),
    id: z.string().min(1),
    epicKey: z.string().min(1),
    mode: z.enum(['sync', 'restore']),
    documentFingerprint: z.string(),
    phases: z.array(phaseSchema),
    state: z.enum(['planned', 'executing', 'paused', 'completed']),
    createdAt: timestamp,
    updatedAt: timestamp,
    operations: z.array(operationSchema),
    results: z.array(operationResultSchema),
    cursor: z.number().int().nonnegative(),
    bindings: z.array(
      z.object({
        target: entityRefSchema,
        remoteKey: z.string(),
        match: z.enum(['exact_key', 'fuzzy_title']),
      })
    ),
    skippedStories: z.array(
      z.object({
        storyId: z.string(),
        reason: z.enum(['unchanged', 'remote_changed', 'conflict', 'invalid', 'filtered', 'kept_remote']),
        message: z.string(),
      })
    ),
    backupId: z.string().nullable(),
  })
  .refine((session) => session.results.length === session.cursor, {
    message: 'results must hold exactly one entry per operation before the cursor',
    path: ['results'],
  })
  .refine((session) => session.cursor <= session.operations.length, {
    message: 'cursor is past the end of the plan',
    path: ['cursor'],
  });

export const backupSchema: z.ZodType<Backup> = z.object({
  id: z.string().min(1),
  epicKey: z.string().min(1),
  documentPath: z.string(),
  createdAt: timestamp,
  issues: z.array(
    z.object({
      key: z.string(),
      parentKey: z.string().nullable(),
      summary: z.string(),
      description: z.string(),
      status: z.string(),
      priority: z.string().nullable(),
      storyPoints: z.number().nullable(),
      capturedAt: timestamp,
    })
  ),
  metadata: z.record(z.string()),
});
