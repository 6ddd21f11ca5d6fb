import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from '../../src/lib/errors';
import { isMissingFile, listJsonFiles, readJson } from '../../src/lib/json-file';
import { makeTempDir, removeTempDir } from '../helpers/fixtures';

describe('json files', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('should recognise missing-file errors by their code', async () => {
    const readError = await fs.promises.readFile(path.join(dir, 'none.json')).catch((error: unknown) => error);

    expect(isMissingFile(readError)).toBe(true);
    expect(isMissingFile({ code: 'ENOENT', message: 'no such file' })).toBe(true);
    expect(isMissingFile({ code: 'EACCES' })).toBe(false);
    expect(isMissingFile(null)).toBe(false);
  });

  it('should return null or [] for missing files and directories', async () => {
    await expect(readJson(path.join(dir, 'none.json'), z.object({}))).resolves.toBeNull();
    await expect(listJsonFiles(path.join(dir, 'none'))).resolves.toEqual([]);
  });

  it('should read messages from error-shaped values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage({ code: 'ENOENT', message: 'no such file' })).toBe('no such file');
    expect(errorMessage('plain')).toBe('plain');
  });
});
