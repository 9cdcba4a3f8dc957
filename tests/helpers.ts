/**
 * Shared fixtures: a fake fetch for watch pages and caption documents,
 * and a fake Data API client
 */

import { vi, type Mock } from 'vitest';
import type { YouTubeDataApi } from '../src/lib/client';
import { GrabError } from '../src/lib/errors';

export const VIDEO_ID = 'abcDEF12_-x';

export const CAPTION_TRACKS = [
  { baseUrl: 'https://www.youtube.com/api/timedtext?v=abcDEF12_-x&lang=es', languageCode: 'es' },
  { baseUrl: 'https://www.youtube.com/api/timedtext?v=abcDEF12_-x&lang=en', languageCode: 'en' },
];

export const CAPTION_XML = `<?xml version="1.0" encoding="utf-8" ?>
<transcript>
  <text start="0" dur="1.5">Hello there</text>
  <text start="1.5" dur="2.25">it&amp;#39;s a test</text>
  <text start="3661.2" dur="60">last line</text>
</transcript>`;

export function makeWatchPageHtml(tracks: unknown[] = CAPTION_TRACKS): string {
  const playerResponse = {
    videoDetails: { title: 'Test Video' },
    captions: { playerCaptionsTracklistRenderer: { captionTracks: tracks } },
  };
  return `<!DOCTYPE html><html><head>
<script>window.ytcfg = {"lang":"en"};</script>
</head><body>
<script>var ytInitialPlayerResponse = ${JSON.stringify(playerResponse)};</script>
</body></html>`;
}

export function createMockFetch(overrides?: {
  pageHtml?: string;
  pageStatus?: number;
  xmlBody?: string;
  xmlStatus?: number;
}): Mock<(input: string | URL, init?: RequestInit) => Promise<Response>> {
  const pageHtml = overrides?.pageHtml ?? makeWatchPageHtml();
  const pageStatus = overrides?.pageStatus ?? 200;
  const xmlBody = overrides?.xmlBody ?? CAPTION_XML;
  const xmlStatus = overrides?.xmlStatus ?? 200;

  return vi.fn(async (input: string | URL, _init?: RequestInit) => {
    const url = String(input);

    if (url.includes('youtube.com/watch')) {
      return new Response(pageHtml, { status: pageStatus });
    }
    if (url.includes('timedtext')) {
      return new Response(xmlBody, { status: xmlStatus });
    }
    return new Response('not found', { status: 404 });
  });
}

const unexpectedCall = async (): Promise<never> => {
  throw new Error('unexpected Data API call');
};

/**
 * Any resource left out throws when called
 */
export function createFakeApi(api: Partial<YouTubeDataApi> = {}): YouTubeDataApi {
  return {
    videos: api.videos ?? { list: unexpectedCall },
    commentThreads: api.commentThreads ?? { list: unexpectedCall },
    playlistItems: api.playlistItems ?? { list: unexpectedCall },
  };
}

export async function captureRejection(promise: Promise<unknown>): Promise<GrabError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof GrabError) return error;
    throw error;
  }
  throw new Error('expected the promise to reject');
}

export function captureError(fn: () => unknown): GrabError {
  try {
    fn();
  } catch (error) {
    if (error instanceof GrabError) return error;
    throw error;
  }
  throw new Error('expected the call to throw');
}
