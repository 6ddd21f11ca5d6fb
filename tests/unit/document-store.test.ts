import fs from 'fs';
import path from 'path';
import { JsonDocumentStore, validateStory } from '../../src/lib/document-store';
import { ConfigurationError, EntityValidationError } from '../../src/lib/errors';
import { makeStory, makeSubtask, makeTempDir, removeTempDir } from '../helpers/fixtures';

describe('JsonDocumentStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function write(name: string, content: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  it('should load a document and fill defaults', async () => {
    const file = write('epic.json', {
      epicKey: 'PROJ-100',
      stories: [
        {
          id: 'US-001',
          title: 'Login with email',
          description: { role: 'user', want: 'to log in', benefit: 'access' },
          subtasks: [{ number: 1, title: 'Form' }],
        },
      ],
    });

    const document = await new JsonDocumentStore(file).load();

    expect(document.stories[0]).toEqual({
      id: 'US-001',
      title: 'Login with email',
      description: { role: 'user', want: 'to log in', benefit: 'access' },
      priority: null,
      status: 'To Do',
      storyPoints: null,
      subtasks: [{ number: 1, title: 'Form', description: '', storyPoints: null, status: 'To Do' }],
      acceptanceCriteria: [],
      comments: [],
    });
  });

  it('should reject missing files, bad JSON and duplicate story ids', async () => {
    const story = { id: 'US-001', title: 'A', description: { role: 'r', want: 'w', benefit: 'b' } };

    await expect(new JsonDocumentStore(path.join(dir, 'none.json')).load()).rejects.toThrow('Document not found');
    await expect(new JsonDocumentStore(write('bad.json', '{ nope')).load()).rejects.toBeInstanceOf(ConfigurationError);
    await expect(
      new JsonDocumentStore(write('dup.json', { epicKey: 'PROJ-100', stories: [story, story] })).load()
    ).rejects.toThrow('duplicate story id US-001');
  });

  it('should save the document back atomically', async () => {
    const file = path.join(dir, 'nested', 'epic.json');
    const store = new JsonDocumentStore(file);
    const document = { epicKey: 'PROJ-100', stories: [makeStory({ remoteKey: 'PROJ-1' })] };

    await store.save(document);

    expect(await store.load()).toEqual(document);
    expect(fs.readdirSync(path.dirname(file))).toEqual(['epic.json']);
  });
});

describe('validateStory', () => {
  it('should accept a complete story', () => {
    expect(() => validateStory(makeStory({ subtasks: [makeSubtask(), makeSubtask({ number: 2 })] }))).not.toThrow();
  });

  it('should reject incomplete stories', () => {
    expect(() => validateStory(makeStory({ title: '  ' }))).toThrow('US-001: title is empty');
    expect(() => validateStory(makeStory({ description: { role: 'user', want: '', benefit: 'x' } }))).toThrow(
      EntityValidationError
    );
    expect(() => validateStory(makeStory({ subtasks: [makeSubtask(), makeSubtask()] }))).toThrow(
      'US-001: subtask number 1 is used twice'
    );
    expect(() => validateStory(makeStory({ subtasks: [makeSubtask({ title: '' })] }))).toThrow(
      'US-001: subtask 1 has no title'
    );
  });
});
