/**
 * ytgrab - Transcripts, durations, comments, metadata and playlists from YouTube URLs
 *
 * @example
 * ```typescript
 * import { VideoGrabber } from 'ytgrab';
 *
 * const grabber = new VideoGrabber({ apiKey: process.env.YOUTUBE_API_KEY });
 *
 * // Stop at the first failing field
 * const { info, error } = await grabber.grab('https://youtu.be/abcdefghijk', {
 *   metadata: true,
 *   transcript: true,
 * });
 *
 * // Or attempt every field and collect failures
 * const { errors } = await grabber.grabAll(url, { comments: true, duration: true });
 *
 * // Export a playlist
 * await grabber.savePlaylist('PL0123456789', './playlist.csv');
 * ```
 */

// Engine
export { VideoGrabber, DEFAULT_LANGUAGE, GRAB_FIELDS, emptyVideoInfo, requestedFields } from './lib/grabber';
export type { VideoGrabberOptions } from './lib/grabber';

// Building blocks
export { resolveIdentifier, toWatchUrl } from './lib/url';
export {
  TranscriptFetcher,
  DEFAULT_TIMEOUT_MS,
  formatPlainTranscript,
  formatTimestampedTranscript,
  parseCaptionSegments,
} from './lib/transcript';
export type { TranscriptFetcherOptions } from './lib/transcript';
export {
  CAPTION_MARKER,
  bracketScanExtractor,
  captionLanguage,
  parseCaptionTracks,
  selectCaptionTrack,
} from './lib/captions';
export type { CaptionManifestExtractor } from './lib/captions';
export { MetadataClient, createYouTubeApi, REPLY_INDENT } from './lib/client';
export type { YouTubeDataApi } from './lib/client';
export { PlaylistEnumerator, normalizeTitle, PLAYLIST_PAGE_SIZE } from './lib/playlist';
export { formatTimestamp, parseDuration, parseTimingAttribute } from './lib/time';

// Bulk processor
export { processVideos, streamVideos } from './lib/processor';

// Errors, config, logging
export { GrabError, isGrabError, getErrorMessage } from './lib/errors';
export type { GrabErrorCode } from './lib/errors';
export { loadConfig } from './lib/config';
export type { Config } from './lib/config';
export { createLogger, logger } from './lib/logger';

// Loaders
export { fromUrls, loadUrlList, loadProcessedIds, loadPlaylistCsv } from './loaders';

// Output formatters
export { savePlaylistCsv, formatPlaylistTable, appendJsonl } from './outputs';

// Types
export type {
  VideoIdentifier,
  CaptionTrack,
  TranscriptSegment,
  VideoMetadata,
  PlaylistItem,
  VideoInfo,
  GrabField,
  GrabOptions,
  GrabResult,
  BestEffortResult,
  VideoSource,
  BulkResult,
  BulkOptions,
  FetchFn,
} from './types';
