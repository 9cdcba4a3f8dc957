/**
 * Video and playlist ID extraction from loosely formed YouTube URLs
 */

import type { VideoIdentifier } from '../types';
import { GrabError } from './errors';

/**
 * Matches watch?v=, youtu.be/, /embed/, /e/, /v/, /shorts/, /live/ and
 * /<segment>/<anything>/ID forms. The captured ID may be empty.
 */
const VIDEO_PATTERN =
  /(?:https?:\/\/)?(?:www\.)?(?:youtube\.com\/(?:live\/|[^/\n\s]+\/\S+\/|(?:v|e(?:mbed)?)\/|shorts\/|\S*?[?&]v=)|youtu\.be\/)([a-zA-Z0-9_-]*)/;

const PLAYLIST_PATTERN = /[?&]list=([a-zA-Z0-9_-]+)/;

const BARE_VIDEO_ID = /^[a-zA-Z0-9_-]{11}$/;

/**
 * Extract the video and playlist IDs from a URL.
 * Both may be present; a URL with neither is rejected.
 */
export function resolveIdentifier(url: string): VideoIdentifier {
  const videoId = VIDEO_PATTERN.exec(url)?.[1] ?? '';
  const playlistId = PLAYLIST_PATTERN.exec(url)?.[1] ?? '';

  if (!videoId && !playlistId) {
    throw new GrabError(
      'INVALID_URL',
      `invalid YouTube URL, can't get video or playlist ID: '${url}'`,
      { stage: 'resolve' }
    );
  }

  return { videoId, playlistId };
}

/**
 * Turn a bare 11-character video ID into a watch URL; anything else is returned as-is
 */
export function toWatchUrl(input: string): string {
  const trimmed = input.trim();
  return BARE_VIDEO_ID.test(trimmed) ? `https://www.youtube.com/watch?v=${trimmed}` : trimmed;
}
