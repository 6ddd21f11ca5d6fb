import inquirer from 'inquirer';
import chalk from 'chalk';
import { InteractiveConflictResolver, StoryConflict } from '../../src/lib/conflict-resolver';
import { InquirerConfirmer } from '../../src/lib/confirm';
import { FieldMapper } from '../../src/lib/field-mapper';
import { Operation } from '../../src/lib/types';
import { makeRemote, makeStory, makeSubtask } from '../helpers/fixtures';

// Mock inquirer
jest.mock('inquirer');

beforeEach(() => {
  jest.mocked(inquirer.prompt).mockReset();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('InteractiveConflictResolver', () => {
  const mapper = new FieldMapper();
  let level: typeof chalk.level;
  let printed: string[];

  beforeAll(() => {
    level = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = level;
  });

  beforeEach(() => {
    printed = [];
  });

  function conflict(): StoryConflict {
    const story = makeStory({ status: 'In Progress', subtasks: [makeSubtask()] });
    const remote = makeRemote({
      summary: 'Login with e-mail',
      description: mapper.storyDescription(story).replace('my email', 'my e-mail'),
    });
    return { story, remote };
  }

  it('should describe every differing field', () => {
    const resolver = new InteractiveConflictResolver({ print: (line) => printed.push(line) });

    expect(resolver.describeConflict(conflict())).toEqual([
      'Title:',
      '  Local:  Login with email',
      '  Remote: Login with e-mail',
      '',
      'Description:',
      '  - **I want** to log in with my email',
      '  + **I want** to log in with my e-mail',
      '',
      'Status:',
      '  Local:  In Progress',
      '  Remote: To Do',
      '',
      'Subtasks:',
      '  Local:  1',
      '  Remote: 0',
      '',
    ]);
  });

  it('should show the conflict and return the chosen resolution', async () => {
    const prompt = jest.fn().mockResolvedValue('local');
    const resolver = new InteractiveConflictResolver({ prompt, print: (line) => printed.push(line) });

    await expect(resolver.resolve(conflict())).resolves.toBe('local');
    expect(prompt).toHaveBeenCalledTimes(1);
    expect(printed).toContain('Conflict 1: US-001 ↔ #PROJ-1');
  });

  it('should skip every later conflict after skip-all', async () => {
    const prompt = jest.fn().mockResolvedValue('skip-all');
    const resolver = new InteractiveConflictResolver({ prompt, print: (line) => printed.push(line) });

    await expect(resolver.resolve(conflict())).resolves.toBe('skip');
    await expect(resolver.resolve(conflict())).resolves.toBe('skip');
    expect(prompt).toHaveBeenCalledTimes(1);
  });

  it('should ask through inquirer by default', async () => {
    jest.spyOn(console, 'log').mockImplementation();
    jest.mocked(inquirer.prompt).mockResolvedValue({ action: 'remote' });

    await expect(new InteractiveConflictResolver().resolve(conflict())).resolves.toBe('remote');
  });
});

describe('InquirerConfirmer', () => {
  it('should return the chosen answer', async () => {
    const operation: Operation = {
      id: 'US-001:add_comment:1',
      kind: 'add_comment',
      phase: 'comments',
      target: { storyId: 'US-001' },
      remoteKey: 'PROJ-1',
      payload: { body: 'Hello' },
    };
    jest.mocked(inquirer.prompt).mockResolvedValue({ action: 'all' });

    await expect(new InquirerConfirmer().confirm(operation, 2, 5)).resolves.toBe('all');
    expect(jest.mocked(inquirer.prompt).mock.calls[0][0]).toEqual([
      expect.objectContaining({ message: '[2/5] comment on US-001 (#PROJ-1)?' }),
    ]);
  });
});
