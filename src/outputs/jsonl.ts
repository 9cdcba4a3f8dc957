/**
 * JSONL output for bulk results
 */

import { appendTextFile } from '../lib/fs';
import type { BulkResult } from '../types';

/**
 * Append a single result as one JSON line
 */
export async function appendJsonl(result: BulkResult, path: string): Promise<void> {
  await appendTextFile(path, `${JSON.stringify(result)}\n`);
}
