/**
 * Local filesystem storage for result tables. Files live directly under the
 * configured output directory.
 */

import { promises as fs } from 'fs';
import path from 'path';

async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

export async function writeTextFile(dir: string, name: string, body: string): Promise<string> {
  const dest = path.join(dir, name);
  await ensureDir(path.dirname(dest));
  await fs.writeFile(dest, body, 'utf-8');
  return dest;
}

/**
 * Read a text file, or null when it does not exist yet.
 */
export async function readTextFile(dir: string, name: string): Promise<string | null> {
  try {
    return await fs.readFile(path.join(dir, name), 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
