/**
 * File utilities
 */

import { access, appendFile, constants, open, readFile, writeFile } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';

/**
 * Check if a file exists
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read file contents as text
 */
export async function readTextFile(path: string): Promise<string> {
  return readFile(path, 'utf-8');
}

/**
 * Write content to file (overwrites existing)
 */
export async function writeTextFile(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf-8');
}

/**
 * Append content to file
 */
export async function appendTextFile(path: string, content: string): Promise<void> {
  await appendFile(path, content, 'utf-8');
}

/**
 * Write chunks one at a time to a truncated file. The handle is closed
 * whether or not the writes succeed.
 */
export async function writeChunks(path: string, chunks: Iterable<string>): Promise<void> {
  let handle: FileHandle | undefined;
  try {
    handle = await open(path, 'w');
    for (const chunk of chunks) {
      await handle.write(chunk, null, 'utf-8');
    }
  } finally {
    await handle?.close();
  }
}
