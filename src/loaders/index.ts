/**
 * Unified loader for various input sources
 */

import { isGrabError } from '../lib/errors';
import { fileExists, readTextFile } from '../lib/fs';
import { resolveIdentifier, toWatchUrl } from '../lib/url';
import type { VideoSource } from '../types';

export { loadPlaylistCsv, parseCSV } from './playlistCsv';
export type { PlaylistCsvRow } from './playlistCsv';

/**
 * Create video sources from URLs or bare video IDs.
 * Blank lines, # comments, unrecognised and playlist-only inputs are skipped;
 * the first occurrence of a video ID wins.
 */
export function fromUrls(inputs: string[]): VideoSource[] {
  const seen = new Map<string, VideoSource>();

  for (const input of inputs) {
    const trimmed = input.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;

    const url = toWatchUrl(trimmed);
    let videoId: string;
    try {
      ({ videoId } = resolveIdentifier(url));
    } catch (error) {
      if (isGrabError(error, 'INVALID_URL')) continue;
      throw error;
    }

    if (videoId && !seen.has(videoId)) {
      seen.set(videoId, { videoId, url });
    }
  }

  return Array.from(seen.values());
}

/**
 * Load video sources from a file with one URL or ID per line
 */
export async function loadUrlList(filePath: string): Promise<VideoSource[]> {
  const text = await readTextFile(filePath);
  return fromUrls(text.split('\n'));
}

/**
 * Load processed video IDs from an existing JSONL file
 */
export async function loadProcessedIds(jsonlPath: string): Promise<Set<string>> {
  const ids = new Set<string>();

  if (!(await fileExists(jsonlPath))) {
    return ids;
  }

  const text = await readTextFile(jsonlPath);
  const lines = text.split('\n').filter((l) => l.trim());

  for (const line of lines) {
    const videoId = readVideoId(line);
    if (videoId) ids.add(videoId);
  }

  return ids;
}

/**
 * Video ID of one JSONL record, or null for malformed lines
 */
function readVideoId(line: string): string | null {
  let record: unknown;
  try {
    record = JSON.parse(line);
  } catch {
    return null;
  }

  if (typeof record !== 'object' || record === null || !('source' in record)) {
    return null;
  }
  const { source } = record;
  if (typeof source === 'object' && source !== null && 'videoId' in source) {
    return typeof source.videoId === 'string' ? source.videoId : null;
  }
  return null;
}
