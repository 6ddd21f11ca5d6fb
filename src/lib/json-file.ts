/**
 * JSON record files written atomically (temp file + rename)
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { errorMessage } from './errors';

/**
 * fs errors may come from another realm, so match on shape rather than class
 */
export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Write a record so that readers see either the previous content or the new one, never a partial file
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.promises.writeFile(tempPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read and validate a JSON record. Returns null when the file does not exist.
 */
export async function readJson<T extends z.ZodTypeAny>(filePath: string, schema: T): Promise<z.output<T> | null> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`${filePath} has an unexpected shape: ${issues}`);
  }
  return parsed.data;
}

/**
 * JSON files directly under a directory, [] when the directory does not exist
 */
export async function listJsonFiles(dir: string): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => path.join(dir, entry.name))
      .sort();
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
}
