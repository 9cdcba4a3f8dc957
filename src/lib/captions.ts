/**
 * Caption manifest handling: locating the caption track list inside the
 * watch page's script text, decoding it, and picking a track.
 */

import { z } from 'zod';
import type { CaptionTrack } from '../types';
import { GrabError } from './errors';
import type { Logger } from './logger';

/** Substring that marks a script carrying the caption manifest */
export const CAPTION_MARKER = 'captionTracks';

const CAPTION_KEY = `"${CAPTION_MARKER}":`;

export const YOUTUBE_ORIGIN = 'https://www.youtube.com';

/**
 * Pulls the raw JSON array text that follows the caption marker out of a
 * larger script body. Returns null when no array can be found.
 */
export interface CaptionManifestExtractor {
  extract(scriptText: string): string | null;
}

/**
 * Scans from the marker for a balanced `[...]`, skipping brackets that sit
 * inside JSON string literals.
 */
export const bracketScanExtractor: CaptionManifestExtractor = {
  extract(scriptText) {
    const keyIndex = scriptText.indexOf(CAPTION_KEY);
    if (keyIndex === -1) return null;

    let start = keyIndex + CAPTION_KEY.length;
    while (start < scriptText.length && /\s/.test(scriptText[start])) start++;
    if (scriptText[start] !== '[') return null;

    let depth = 0;
    let inString = false;
    for (let i = start; i < scriptText.length; i++) {
      const char = scriptText[i];

      if (inString) {
        if (char === '\\') i++;
        else if (char === '"') inString = false;
        continue;
      }

      if (char === '"') inString = true;
      else if (char === '[') depth++;
      else if (char === ']') {
        depth--;
        if (depth === 0) return scriptText.slice(start, i + 1);
      }
    }

    return null;
  },
};

const captionTracksSchema = z.array(z.object({ baseUrl: z.string().min(1) }).passthrough());

/**
 * Read the `lang` query parameter of a caption URL
 */
export function captionLanguage(baseUrl: string): string {
  try {
    return new URL(baseUrl, YOUTUBE_ORIGIN).searchParams.get('lang') ?? '';
  } catch {
    return '';
  }
}

/**
 * Decode the extracted JSON array into caption tracks.
 * Other fields of the upstream payload are ignored.
 */
export function parseCaptionTracks(json: string, videoId: string): CaptionTrack[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new GrabError('PARSE_ERROR', `caption track list for ${videoId} is not valid JSON`, {
      stage: 'decode-tracks',
      id: videoId,
      cause: error,
    });
  }

  const parsed = captionTracksSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GrabError('PARSE_ERROR', `unexpected caption track list shape for ${videoId}`, {
      stage: 'decode-tracks',
      id: videoId,
      cause: parsed.error,
    });
  }

  if (!parsed.data.length) {
    throw new GrabError('NO_CAPTIONS', `no caption tracks available for ${videoId}`, {
      stage: 'decode-tracks',
      id: videoId,
    });
  }

  return parsed.data.map(({ baseUrl }) => ({ baseUrl, language: captionLanguage(baseUrl) }));
}

/**
 * Pick the track whose language equals `language` exactly, falling back to
 * the first track with a warning.
 */
export function selectCaptionTrack(
  tracks: readonly CaptionTrack[],
  language: string,
  log?: Logger
): CaptionTrack {
  const [first] = tracks;
  if (!first) {
    throw new GrabError('NO_CAPTIONS', 'no caption tracks to choose from', {
      stage: 'select-track',
    });
  }

  const match = tracks.find((track) => track.language === language);
  if (match) return match;

  log?.warn(
    { language, fallback: first.baseUrl },
    `no exact language match for '${language}', falling back to first available track`
  );
  return first;
}
