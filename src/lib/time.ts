/**
 * Timestamp formatting and duration parsing
 */

import { GrabError } from './errors';

const DURATION_PATTERN = /PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?/i;

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * Format seconds as HH:MM:SS, truncating fractions
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.trunc(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)}`;
}

/**
 * Convert an ISO-8601 duration (PT#H#M#S) to whole minutes.
 * Seconds are truncated; "PT" alone is zero minutes.
 */
export function parseDuration(value: string): number {
  const match = DURATION_PATTERN.exec(value);
  if (!match) {
    throw new GrabError('INVALID_DURATION', `invalid duration string: '${value}'`, {
      stage: 'duration',
    });
  }

  const [, hours = '0', minutes = '0', seconds = '0'] = match;
  return Number(hours) * 60 + Number(minutes) + Math.floor(Number(seconds) / 60);
}

/**
 * Caption timing attribute policy: missing, non-numeric, non-finite or
 * negative values read as 0.
 */
export function parseTimingAttribute(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return 0;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : 0;
}
