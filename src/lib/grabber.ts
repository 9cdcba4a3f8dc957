/**
 * VideoGrabber: resolves a URL once, then fills the requested fields of a
 * VideoInfo through the transcript scraper and the Data API client.
 *
 * Two composition policies are offered:
 *  - `grab` stops at the first failing field (fail-fast)
 *  - `grabAll` attempts every requested field and collects each failure (best-effort)
 */

import { formatPlaylistTable, savePlaylistCsv } from '../outputs/csv';
import type {
  BestEffortResult,
  FetchFn,
  GrabField,
  GrabOptions,
  GrabResult,
  PlaylistItem,
  TranscriptSegment,
  VideoIdentifier,
  VideoInfo,
  VideoMetadata,
} from '../types';
import type { CaptionManifestExtractor } from './captions';
import { createYouTubeApi, MetadataClient, type YouTubeDataApi } from './client';
import { GrabError, wrapError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { PlaylistEnumerator, type Sleep } from './playlist';
import { TranscriptFetcher } from './transcript';
import { resolveIdentifier } from './url';

export const DEFAULT_LANGUAGE = 'en';

/** Evaluation order of a grab */
export const GRAB_FIELDS: readonly GrabField[] = [
  'metadata',
  'duration',
  'comments',
  'transcript',
  'transcriptWithTimestamps',
];

export interface VideoGrabberOptions {
  /** Data API key; ignored when `api` is given */
  apiKey?: string;
  api?: YouTubeDataApi;
  fetchFn?: FetchFn;
  /** Scrape request timeout in ms (default: 10000) */
  timeoutMs?: number;
  extractor?: CaptionManifestExtractor;
  /** Pause between playlist pages in ms (default: 1000) */
  pageDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

export function emptyVideoInfo(): VideoInfo {
  return { transcript: '', duration: 0, comments: [] };
}

export function requestedFields(options: GrabOptions): GrabField[] {
  return GRAB_FIELDS.filter((field) => options[field] === true);
}

export class VideoGrabber {
  private readonly transcripts: TranscriptFetcher;
  private readonly metadataClient?: MetadataClient;
  private readonly playlists?: PlaylistEnumerator;
  private readonly log: Logger;

  /**
   * Without `api` or `apiKey`, Data API operations fail with MISSING_API_KEY.
   */
  constructor(options: VideoGrabberOptions = {}) {
    this.log = options.logger ?? defaultLogger;
    this.transcripts = new TranscriptFetcher({
      fetchFn: options.fetchFn,
      timeoutMs: options.timeoutMs,
      extractor: options.extractor,
      logger: this.log,
    });

    const api = options.api ?? (options.apiKey ? createYouTubeApi(options.apiKey) : undefined);
    if (api) {
      this.metadataClient = new MetadataClient(api, this.log);
      this.playlists = new PlaylistEnumerator(this.metadataClient, {
        pageDelayMs: options.pageDelayMs,
        sleep: options.sleep,
        logger: this.log,
      });
    }
  }

  resolve(url: string): VideoIdentifier {
    return resolveIdentifier(url);
  }

  // --- per-field operations ---

  grabTranscript(videoId: string, language = DEFAULT_LANGUAGE): Promise<string> {
    return this.transcripts.grabTranscript(videoId, language);
  }

  grabTranscriptWithTimestamps(videoId: string, language = DEFAULT_LANGUAGE): Promise<string> {
    return this.transcripts.grabTranscriptWithTimestamps(videoId, language);
  }

  grabSegments(videoId: string, language = DEFAULT_LANGUAGE): Promise<TranscriptSegment[]> {
    return this.transcripts.grabSegments(videoId, language);
  }

  async grabDuration(videoId: string): Promise<number> {
    return this.requireClient('duration').grabDuration(videoId);
  }

  async grabComments(videoId: string): Promise<string[]> {
    return this.requireClient('comments').grabComments(videoId);
  }

  async grabMetadata(videoId: string): Promise<VideoMetadata> {
    return this.requireClient('metadata').grabMetadata(videoId);
  }

  async grabTranscriptForUrl(url: string, language = DEFAULT_LANGUAGE): Promise<string> {
    return this.grabTranscript(this.videoIdFor(url, true), language);
  }

  async grabDurationForUrl(url: string): Promise<number> {
    return this.grabDuration(this.videoIdFor(url, true));
  }

  // --- aggregates ---

  /**
   * Fill the requested fields in order, stopping at the first failure.
   * Fields populated before the failure are kept in the result.
   */
  async grab(url: string, options: GrabOptions = {}): Promise<GrabResult> {
    const fields = requestedFields(options);
    const videoId = this.videoIdFor(url, fields.length > 0);
    const language = options.language ?? DEFAULT_LANGUAGE;
    const info = emptyVideoInfo();

    for (const field of fields) {
      try {
        await this.fillField(info, field, videoId, language);
      } catch (error) {
        const failure = wrapError(error, 'FETCH_ERROR', field, videoId);
        this.log.debug({ videoId, field, code: failure.code }, 'grab stopped at failing field');
        return { info, error: failure };
      }
    }

    return { info };
  }

  /**
   * Attempt every requested field; failures are collected per field
   */
  async grabAll(url: string, options: GrabOptions = {}): Promise<BestEffortResult> {
    const fields = requestedFields(options);
    const videoId = this.videoIdFor(url, fields.length > 0);
    const language = options.language ?? DEFAULT_LANGUAGE;
    const info = emptyVideoInfo();
    const errors: BestEffortResult['errors'] = {};

    for (const field of fields) {
      try {
        await this.fillField(info, field, videoId, language);
      } catch (error) {
        errors[field] = wrapError(error, 'FETCH_ERROR', field, videoId);
        this.log.warn({ videoId, field, err: errors[field] }, `failed to grab ${field}`);
      }
    }

    return { info, errors };
  }

  // --- playlists ---

  async fetchPlaylistVideos(playlistId: string): Promise<PlaylistItem[]> {
    return this.requirePlaylists().fetchPlaylistVideos(playlistId);
  }

  /**
   * Enumerate a playlist and export it as CSV
   */
  async savePlaylist(playlistId: string, path: string): Promise<PlaylistItem[]> {
    const items = await this.fetchPlaylistVideos(playlistId);
    try {
      await savePlaylistCsv(path, items);
    } catch (error) {
      throw wrapError(error, 'IO_ERROR', 'csv-export', playlistId);
    }
    this.log.info({ playlistId, path, count: items.length }, 'playlist saved');
    return items;
  }

  /**
   * Enumerate a playlist and print it as "id: title" lines
   */
  async printPlaylist(
    playlistId: string,
    write: (text: string) => void = (text) => {
      process.stdout.write(text);
    }
  ): Promise<PlaylistItem[]> {
    const items = await this.fetchPlaylistVideos(playlistId);
    write(formatPlaylistTable(playlistId, items));
    return items;
  }

  // --- internals ---

  /**
   * A URL that carries a video ID is always a video request, even when it also
   * names a playlist. A playlist-only URL is rejected when video fields are wanted.
   */
  private videoIdFor(url: string, wantsVideoFields: boolean): string {
    const { videoId, playlistId } = resolveIdentifier(url);
    if (!videoId && playlistId && wantsVideoFields) {
      throw new GrabError('PLAYLIST_NOT_VIDEO', 'URL is a playlist, not a video', {
        stage: 'resolve',
        id: playlistId,
      });
    }
    return videoId;
  }

  private async fillField(
    info: VideoInfo,
    field: GrabField,
    videoId: string,
    language: string
  ): Promise<void> {
    this.log.debug({ videoId, field }, 'grabbing field');
    switch (field) {
      case 'metadata':
        info.metadata = await this.grabMetadata(videoId);
        break;
      case 'duration':
        info.duration = await this.grabDuration(videoId);
        break;
      case 'comments':
        info.comments = await this.grabComments(videoId);
        break;
      case 'transcript':
        info.transcript = await this.grabTranscript(videoId, language);
        break;
      case 'transcriptWithTimestamps':
        info.transcript = await this.grabTranscriptWithTimestamps(videoId, language);
        break;
    }
  }

  private requireClient(stage: string): MetadataClient {
    if (!this.metadataClient) {
      throw new GrabError('MISSING_API_KEY', 'a YouTube Data API key is required', { stage });
    }
    return this.metadataClient;
  }

  private requirePlaylists(): PlaylistEnumerator {
    if (!this.playlists) {
      throw new GrabError('MISSING_API_KEY', 'a YouTube Data API key is required', {
        stage: 'playlist',
      });
    }
    return this.playlists;
  }
}
