/**
 * Load a playlist back from an exported CSV file
 */

import { GrabError } from '../lib/errors';
import { readTextFile } from '../lib/fs';

export interface PlaylistCsvRow {
  videoId: string;
  title: string;
}

/**
 * CSV parser for the export format: quoted fields, doubled quotes and
 * line breaks inside quotes. Values are not trimmed.
 */
export function parseCSV(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const nextChar = text[i + 1];

    if (inQuotes) {
      if (char === '"' && nextChar === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && nextChar === '\n') i++;
      row.push(current);
      rows.push(row);
      row = [];
      current = '';
    } else {
      current += char;
    }
  }

  // Last line without a trailing newline
  if (current || row.length) {
    row.push(current);
    rows.push(row);
  }

  return rows;
}

/**
 * Load (VideoID, Title) rows from a playlist CSV, header excluded
 */
export async function loadPlaylistCsv(filePath: string): Promise<PlaylistCsvRow[]> {
  const text = await readTextFile(filePath);
  const [header, ...rows] = parseCSV(text);
  if (!header) return [];

  const idColumn = header.indexOf('VideoID');
  const titleColumn = header.indexOf('Title');
  if (idColumn === -1 || titleColumn === -1) {
    throw new GrabError(
      'PARSE_ERROR',
      `${filePath} is not a playlist CSV (expected VideoID and Title columns)`,
      { stage: 'csv-import' }
    );
  }

  return rows.map((values) => ({
    videoId: values[idColumn] ?? '',
    title: values[titleColumn] ?? '',
  }));
}
