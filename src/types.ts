/**
 * Shared types for ytgrab
 */

import type { GrabError } from './lib/errors';

/** Identifiers found in a URL. Empty strings mean "absent". */
export interface VideoIdentifier {
  videoId: string;
  playlistId: string;
}

/** A caption track advertised by the watch page */
export interface CaptionTrack {
  baseUrl: string;
  /** Value of the `lang` query parameter of `baseUrl` */
  language: string;
}

/** Timing is in seconds */
export interface TranscriptSegment {
  start: number;
  duration: number;
  text: string;
}

export interface VideoMetadata {
  id: string;
  title: string;
  description: string;
  publishedAt: string;
  channelId: string;
  channelTitle: string;
  categoryId: string;
  tags: string[];
  viewCount: number;
  likeCount: number;
}

export interface PlaylistItem {
  videoId: string;
  title: string;
  /** Title with every run of non-alphanumeric characters collapsed to `_` */
  normalizedTitle: string;
}

export interface VideoInfo {
  transcript: string;
  /** Whole minutes */
  duration: number;
  comments: string[];
  metadata?: VideoMetadata;
}

/** Fields a grab can populate, in evaluation order */
export type GrabField =
  | 'metadata'
  | 'duration'
  | 'comments'
  | 'transcript'
  | 'transcriptWithTimestamps';

export interface GrabOptions {
  metadata?: boolean;
  duration?: boolean;
  comments?: boolean;
  transcript?: boolean;
  transcriptWithTimestamps?: boolean;
  /** Caption language, compared verbatim with the track's `lang` (default: en) */
  language?: string;
}

/** Outcome of a fail-fast grab: fields populated before the first failure */
export interface GrabResult {
  info: VideoInfo;
  error?: GrabError;
}

/** Outcome of a best-effort grab: every requested field attempted */
export interface BestEffortResult {
  info: VideoInfo;
  errors: Partial<Record<GrabField, GrabError>>;
}

/** A video queued for bulk processing */
export interface VideoSource {
  videoId: string;
  url: string;
}

export interface BulkResult {
  source: VideoSource;
  info: VideoInfo;
  error?: string;
}

export interface BulkOptions extends GrabOptions {
  /** Concurrent grabs (default: 4) */
  concurrency?: number;
  /** Pause after this many grabs (default: 10) */
  pauseAfter?: number;
  /** Pause length in ms (default: 5000) */
  pauseDuration?: number;
  /** Video IDs to skip (for resume) */
  skipIds?: Set<string>;
  onProgress?: (completed: number, total: number, result: BulkResult) => void;
}

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;
