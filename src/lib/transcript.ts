/**
 * Transcript scraping: watch page -> caption manifest -> track -> caption document
 */

import { load } from 'cheerio';
import type { FetchFn, TranscriptSegment } from '../types';
import {
  bracketScanExtractor,
  CAPTION_MARKER,
  type CaptionManifestExtractor,
  parseCaptionTracks,
  selectCaptionTrack,
  YOUTUBE_ORIGIN,
} from './captions';
import { GrabError, getErrorMessage } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { formatTimestamp, parseTimingAttribute } from './time';

export const DEFAULT_TIMEOUT_MS = 10_000;

const BROWSER_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Accept-Language': 'en-US,en;q=0.9',
};

const ESCAPED_APOSTROPHE = /&#39;/g;

export interface TranscriptFetcherOptions {
  fetchFn?: FetchFn;
  /** Per-request timeout in ms (default: 10000) */
  timeoutMs?: number;
  extractor?: CaptionManifestExtractor;
  logger?: Logger;
}

/**
 * Parse a caption document into segments
 */
export function parseCaptionSegments(xml: string): TranscriptSegment[] {
  const $ = load(xml, { xml: true });
  return $('text')
    .toArray()
    .map((node) => {
      const element = $(node);
      return {
        start: parseTimingAttribute(element.attr('start')),
        duration: parseTimingAttribute(element.attr('dur')),
        text: element.text().replace(ESCAPED_APOSTROPHE, "'"),
      };
    });
}

export function formatPlainTranscript(segments: readonly TranscriptSegment[]): string {
  return segments.map((segment) => segment.text).join(' ');
}

/**
 * One "[HH:MM:SS - HH:MM:SS] text" line per segment
 */
export function formatTimestampedTranscript(segments: readonly TranscriptSegment[]): string {
  return segments
    .map(({ start, duration, text }) => {
      return `[${formatTimestamp(start)} - ${formatTimestamp(start + duration)}] ${text}\n`;
    })
    .join('');
}

export class TranscriptFetcher {
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly extractor: CaptionManifestExtractor;
  private readonly log: Logger;

  constructor(options: TranscriptFetcherOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.extractor = options.extractor ?? bracketScanExtractor;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Run the scrape pipeline and return the raw caption document
   */
  async fetchCaptionDocument(videoId: string, language: string): Promise<string> {
    const watchUrl = `${YOUTUBE_ORIGIN}/watch?v=${encodeURIComponent(videoId)}`;
    this.log.debug({ videoId }, 'fetching watch page');
    const html = await this.get(watchUrl, 'watch-page', videoId);

    const manifest = this.findCaptionManifest(html, videoId);
    const tracks = parseCaptionTracks(manifest, videoId);
    const track = selectCaptionTrack(tracks, language, this.log);

    let captionUrl: string;
    try {
      captionUrl = new URL(track.baseUrl, YOUTUBE_ORIGIN).href;
    } catch (error) {
      throw new GrabError('FETCH_ERROR', `caption URL for ${videoId} is invalid: ${track.baseUrl}`, {
        stage: 'caption-document',
        id: videoId,
        cause: error,
      });
    }

    this.log.debug({ videoId, language: track.language }, 'fetching caption document');
    return this.get(captionUrl, 'caption-document', videoId);
  }

  async grabSegments(videoId: string, language: string): Promise<TranscriptSegment[]> {
    try {
      return parseCaptionSegments(await this.fetchCaptionDocument(videoId, language));
    } catch (error) {
      throw new GrabError(
        'TRANSCRIPT_UNAVAILABLE',
        `transcript not available for ${videoId}: ${getErrorMessage(error)}`,
        { stage: 'transcript', id: videoId, cause: error }
      );
    }
  }

  async grabTranscript(videoId: string, language: string): Promise<string> {
    return formatPlainTranscript(await this.grabSegments(videoId, language));
  }

  async grabTranscriptWithTimestamps(videoId: string, language: string): Promise<string> {
    return formatTimestampedTranscript(await this.grabSegments(videoId, language));
  }

  private findCaptionManifest(html: string, videoId: string): string {
    const $ = load(html);
    const candidates = $('script')
      .toArray()
      .map((node) => $(node).text())
      .filter((text) => text.includes(CAPTION_MARKER));

    if (!candidates.length) {
      throw new GrabError('PARSE_ERROR', `no caption manifest in watch page for ${videoId}`, {
        stage: 'caption-manifest',
        id: videoId,
      });
    }

    for (const script of candidates) {
      const fragment = this.extractor.extract(script);
      if (fragment) return fragment;
    }

    throw new GrabError('PARSE_ERROR', `caption track list not found for ${videoId}`, {
      stage: 'caption-manifest',
      id: videoId,
    });
  }

  private async get(url: string, stage: string, videoId: string): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: BROWSER_HEADERS,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new GrabError('FETCH_ERROR', `${stage} request failed: ${getErrorMessage(error)}`, {
        stage,
        id: videoId,
        cause: error,
      });
    }

    if (!response.ok) {
      throw new GrabError('FETCH_ERROR', `${stage} request failed: status code ${response.status}`, {
        stage,
        id: videoId,
      });
    }

    try {
      return await response.text();
    } catch (error) {
      throw new GrabError('FETCH_ERROR', `${stage} body could not be read: ${getErrorMessage(error)}`, {
        stage,
        id: videoId,
        cause: error,
      });
    }
  }
}
