import {
  DiffPlanner,
  PlanContext,
  findTransitionPath,
  keysNeedingTransitions,
  matchSubtasks,
} from '../../src/lib/diff-planner';
import { FieldMapper } from '../../src/lib/field-mapper';
import { ALL_PHASES, RemoteIssue, Transition } from '../../src/lib/types';
import { makeRemote, makeStory, makeSubtask } from '../helpers/fixtures';

const mapper = new FieldMapper();

function planner(remotes: RemoteIssue[], overrides: Partial<PlanContext> = {}): DiffPlanner {
  return new DiffPlanner({
    epicKey: 'PROJ-100',
    phases: ALL_PHASES,
    threshold: 0.8,
    remotes: new Map(remotes.map((remote) => [remote.key, remote])),
    transitions: new Map(),
    ...overrides,
  });
}

describe('findTransitionPath', () => {
  const workflow: Transition[] = [
    { id: 'start', name: 'Start', to: 'In Progress', from: ['To Do'] },
    { id: 'finish', name: 'Finish', to: 'Done', from: ['In Progress'] },
    { id: 'reopen', name: 'Reopen', to: 'To Do', from: ['Done'] },
  ];

  it('should return an empty path when already there', () => {
    expect(findTransitionPath('Done', 'done', workflow)).toEqual([]);
  });

  it('should find the shortest multi-step path', () => {
    expect(findTransitionPath('To Do', 'Done', workflow)).toEqual(['start', 'finish']);
  });

  it('should treat transitions without a source as available from the current status', () => {
    const transitions: Transition[] = [
      { id: 'a', name: 'A', to: 'In Progress' },
      { id: 'b', name: 'B', to: 'Done' },
    ];

    expect(findTransitionPath('To Do', 'Done', transitions)).toEqual(['b']);
  });

  it('should return null when the workflow has no path', () => {
    expect(findTransitionPath('To Do', 'Archived', workflow)).toBeNull();
    expect(findTransitionPath('To Do', 'Done', [])).toBeNull();
  });
});

describe('matchSubtasks', () => {
  it('should match by key, then by position, then by best title', () => {
    const subtasks = [
      makeSubtask({ number: 1, title: 'Design schema', remoteKey: 'PROJ-3' }),
      makeSubtask({ number: 2, title: 'Write migration' }),
      makeSubtask({ number: 3, title: 'Add indexes' }),
    ];
    const remotes = [
      makeRemote({ key: 'PROJ-2', summary: 'Add indexes', issueType: 'subtask' }),
      makeRemote({ key: 'PROJ-3', summary: 'Design the schema', issueType: 'subtask' }),
      makeRemote({ key: 'PROJ-4', summary: 'Unrelated work', issueType: 'subtask' }),
    ];

    const matched = matchSubtasks(subtasks, remotes, 0.8);

    expect(matched.get(1)?.key).toBe('PROJ-3');
    expect(matched.has(2)).toBe(false);
    expect(matched.get(3)?.key).toBe('PROJ-2');
  });
});

describe('keysNeedingTransitions', () => {
  it('should list the story and each matched subtask whose status differs', () => {
    const story = makeStory({
      status: 'Done',
      subtasks: [makeSubtask({ number: 1, status: 'Done' }), makeSubtask({ number: 2, title: 'Deploy', status: 'To Do' })],
    });
    const remote = makeRemote({
      subtasks: [
        makeRemote({ key: 'PROJ-2', summary: 'Write migration', status: 'To Do' }),
        makeRemote({ key: 'PROJ-3', summary: 'Deploy', status: 'To Do' }),
      ],
    });

    expect(keysNeedingTransitions(story, remote, 0.8)).toEqual(['PROJ-1', 'PROJ-2']);
  });
});

describe('DiffPlanner', () => {
  describe('unmatched stories', () => {
    it('should plan a create with its subtasks and comments', () => {
      const story = makeStory({
        status: 'Done',
        subtasks: [makeSubtask({ number: 1 }), makeSubtask({ number: 2, title: 'Deploy', storyPoints: 1 })],
        comments: ['Kickoff notes'],
      });

      const plan = planner([]).plan(story, { kind: 'no_match', bestScore: null });

      expect(plan.skip).toBeNull();
      expect(plan.operations.map((operation) => operation.id)).toEqual([
        'US-001:create_issue',
        'US-001/1:create_subtask',
        'US-001/2:create_subtask',
        'US-001:add_comment:1',
      ]);
      expect(plan.operations[0]).toEqual({
        id: 'US-001:create_issue',
        kind: 'create_issue',
        phase: 'descriptions',
        target: { storyId: 'US-001' },
        remoteKey: null,
        payload: mapper.storyToIssue(story, 'PROJ-100'),
      });
      expect(plan.operations[2]).toEqual({
        id: 'US-001/2:create_subtask',
        kind: 'create_subtask',
        phase: 'subtasks',
        target: { storyId: 'US-001', subtaskNumber: 2 },
        remoteKey: null,
        payload: {
          issueType: 'subtask',
          parentKey: '',
          summary: 'Deploy',
          description: '',
          priority: null,
          storyPoints: 1,
        },
      });
      expect(plan.operations[3].remoteKey).toBeNull();
    });

    it('should skip the story when the descriptions phase is not selected', () => {
      const plan = planner([], { phases: ['subtasks', 'statuses'] }).plan(makeStory(), {
        kind: 'no_match',
        bestScore: 0.4,
      });

      expect(plan.operations).toEqual([]);
      expect(plan.skip).toEqual({
        storyId: 'US-001',
        reason: 'filtered',
        message: 'Not in the tracker yet and the descriptions phase is not selected',
      });
    });
  });

  describe('matched stories', () => {
    it('should plan nothing when the remote issue is in sync', () => {
      const story = makeStory({ comments: ['Seen'] });
      const remote = makeRemote({ description: mapper.storyDescription(story), comments: ['Seen'] });

      const plan = planner([remote]).plan(story, { kind: 'exact_key', key: 'PROJ-1' });

      expect(plan).toEqual({ operations: [], skip: null });
    });

    it('should order operations by phase', () => {
      const story = makeStory({
        status: 'In Progress',
        subtasks: [
          makeSubtask({ number: 1, description: 'Use SQL' }),
          makeSubtask({ number: 2, title: 'Deploy to staging' }),
        ],
        comments: ['Ready for review'],
      });
      const remote = makeRemote({
        description: 'Old description',
        subtasks: [makeRemote({ key: 'PROJ-2', summary: 'Write migration', issueType: 'subtask', parentKey: 'PROJ-1' })],
      });
      const transitions = new Map([['PROJ-1', [{ id: 'start', name: 'Start', to: 'In Progress' }]]]);

      const plan = planner([remote], { transitions }).plan(story, { kind: 'fuzzy_title', key: 'PROJ-1', score: 1 });

      expect(plan.operations.map((operation) => [operation.id, operation.remoteKey])).toEqual([
        ['US-001:update_description', 'PROJ-1'],
        ['US-001/1:update_subtask', 'PROJ-2'],
        ['US-001/2:create_subtask', 'PROJ-1'],
        ['US-001:add_comment:1', 'PROJ-1'],
        ['US-001:update_status', 'PROJ-1'],
      ]);
      expect(plan.operations[1].payload).toEqual({ description: 'Use SQL' });
      expect(plan.operations[2].payload).toMatchObject({ parentKey: 'PROJ-1', summary: 'Deploy to staging' });
      expect(plan.operations[4].payload).toEqual({ from: 'To Do', to: 'In Progress', transitionIds: ['start'] });
    });

    it('should plan subtask status changes after the story status', () => {
      const story = makeStory({ status: 'Done', subtasks: [makeSubtask({ status: 'Done' })] });
      const remote = makeRemote({
        description: mapper.storyDescription(story),
        subtasks: [makeRemote({ key: 'PROJ-2', summary: 'Write migration', issueType: 'subtask' })],
      });
      const transitions = new Map([
        ['PROJ-1', [{ id: 'close', name: 'Close', to: 'Done' }]],
        ['PROJ-2', [{ id: 'close', name: 'Close', to: 'Done' }]],
      ]);

      const plan = planner([remote], { transitions }).plan(story, { kind: 'exact_key', key: 'PROJ-1' });

      expect(plan.operations.map((operation) => operation.id)).toEqual([
        'US-001:update_status',
        'US-001/1:update_status',
      ]);
      expect(plan.operations[1].target).toEqual({ storyId: 'US-001', subtaskNumber: 1 });
    });

    it('should record a diagnostic when no transition path exists', () => {
      const story = makeStory({ status: 'Done' });
      const remote = makeRemote({ description: mapper.storyDescription(story) });

      const plan = planner([remote]).plan(story, { kind: 'exact_key', key: 'PROJ-1' });

      expect(plan.operations).toHaveLength(1);
      expect(plan.operations[0].payload).toEqual({
        from: 'To Do',
        to: 'Done',
        transitionIds: [],
        diagnostic: 'No transition path from "To Do" to "Done"',
      });
    });

    it('should only plan the selected phases', () => {
      const story = makeStory({ status: 'Done', comments: ['Note'] });
      const remote = makeRemote({ description: 'Old' });
      const transitions = new Map([['PROJ-1', [{ id: 'close', name: 'Close', to: 'Done' }]]]);

      const plan = planner([remote], { phases: ['comments'], transitions }).plan(story, {
        kind: 'exact_key',
        key: 'PROJ-1',
      });

      expect(plan.operations.map((operation) => operation.kind)).toEqual(['add_comment']);
    });

    it('should skip a story whose matched issue was not fetched', () => {
      const plan = planner([]).plan(makeStory(), { kind: 'exact_key', key: 'PROJ-9' });

      expect(plan.skip).toEqual({
        storyId: 'US-001',
        reason: 'invalid',
        message: 'Matched issue PROJ-9 was not fetched',
      });
    });

    it('should plan the same operations for the same inputs', () => {
      const story = makeStory({ status: 'Done', comments: ['a', 'b'] });
      const remote = makeRemote({ description: 'Old' });

      const first = planner([remote]).plan(story, { kind: 'exact_key', key: 'PROJ-1' });
      const second = planner([remote]).plan(story, { kind: 'exact_key', key: 'PROJ-1' });

      expect(second).toEqual(first);
    });
  });
});
