/**
 * Playlist CSV export
 */

import { writeChunks } from '../lib/fs';
import { GrabError } from '../lib/errors';
import type { PlaylistItem } from '../types';

export const CSV_HEADER = ['VideoID', 'Title'] as const;

const NEEDS_QUOTES = /[",\r\n]|^[ \t]/;

/**
 * Quote a field when it holds a delimiter, quote, line break or leading blank
 */
export function escapeCsvField(field: string): string {
  return NEEDS_QUOTES.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function formatCsvRow(fields: readonly string[]): string {
  return `${fields.map(escapeCsvField).join(',')}\n`;
}

function* playlistRows(items: readonly PlaylistItem[]): Generator<string> {
  yield formatCsvRow(CSV_HEADER);
  for (const item of items) {
    yield formatCsvRow([item.videoId, item.title]);
  }
}

/**
 * Write a header row and one (id, raw title) row per item, replacing any existing file
 */
export async function savePlaylistCsv(path: string, items: readonly PlaylistItem[]): Promise<void> {
  try {
    await writeChunks(path, playlistRows(items));
  } catch (error) {
    throw new GrabError('IO_ERROR', `could not write playlist CSV ${path}`, {
      stage: 'csv-export',
      cause: error,
    });
  }
}

/**
 * Plain listing used when a playlist is printed instead of saved
 */
export function formatPlaylistTable(playlistId: string, items: readonly PlaylistItem[]): string {
  const lines = [`Playlist: ${playlistId}`, 'VideoId: Title'];
  for (const item of items) {
    lines.push(`${item.videoId}: ${item.title}`);
  }
  return `${lines.join('\n')}\n`;
}
