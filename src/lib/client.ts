/**
 * Typed YouTube Data API v3 calls: duration, comments, metadata, playlist pages
 */

import { google, type youtube_v3 } from 'googleapis';
import type { VideoMetadata } from '../types';
import { GrabError, wrapError } from './errors';
import { logger as defaultLogger, type Logger } from './logger';
import { parseDuration } from './time';

/** Marker placed before each reply in a comment listing */
export const REPLY_INDENT = '    - ';

export const MAX_COMMENT_THREADS = 100;

interface ApiResponse<T> {
  data: T;
}

/**
 * The slice of the googleapis client this package calls. Tests substitute a fake.
 */
export interface YouTubeDataApi {
  videos: {
    list(
      params: youtube_v3.Params$Resource$Videos$List
    ): Promise<ApiResponse<youtube_v3.Schema$VideoListResponse>>;
  };
  commentThreads: {
    list(
      params: youtube_v3.Params$Resource$Commentthreads$List
    ): Promise<ApiResponse<youtube_v3.Schema$CommentThreadListResponse>>;
  };
  playlistItems: {
    list(
      params: youtube_v3.Params$Resource$Playlistitems$List
    ): Promise<ApiResponse<youtube_v3.Schema$PlaylistItemListResponse>>;
  };
}

export function createYouTubeApi(apiKey: string): YouTubeDataApi {
  return google.youtube({ version: 'v3', auth: apiKey });
}

function toCount(value: string | null | undefined): number {
  const parsed = Number(value ?? 0);
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : 0;
}

export class MetadataClient {
  constructor(
    private readonly api: YouTubeDataApi,
    private readonly log: Logger = defaultLogger
  ) {}

  /**
   * Video length in whole minutes
   */
  async grabDuration(videoId: string): Promise<number> {
    const video = await this.getVideo(videoId, ['contentDetails'], 'duration');
    try {
      return parseDuration(video.contentDetails?.duration ?? '');
    } catch (error) {
      throw wrapError(error, 'INVALID_DURATION', 'duration', videoId);
    }
  }

  /**
   * Up to 100 top-level threads, each followed by its replies.
   * No further pages are requested.
   */
  async grabComments(videoId: string): Promise<string[]> {
    let threads: youtube_v3.Schema$CommentThread[];
    try {
      const response = await this.api.commentThreads.list({
        part: ['snippet', 'replies'],
        videoId,
        textFormat: 'plainText',
        maxResults: MAX_COMMENT_THREADS,
      });
      threads = response.data.items ?? [];
    } catch (error) {
      this.log.warn({ videoId, err: error }, 'failed to fetch comments');
      throw wrapError(error, 'FETCH_ERROR', 'comments', videoId);
    }

    const comments: string[] = [];
    for (const thread of threads) {
      comments.push(thread.snippet?.topLevelComment?.snippet?.textDisplay ?? '');
      for (const reply of thread.replies?.comments ?? []) {
        comments.push(REPLY_INDENT + (reply.snippet?.textDisplay ?? ''));
      }
    }
    return comments;
  }

  async grabMetadata(videoId: string): Promise<VideoMetadata> {
    const video = await this.getVideo(videoId, ['snippet', 'statistics'], 'metadata');
    const snippet: youtube_v3.Schema$VideoSnippet = video.snippet ?? {};
    const statistics: youtube_v3.Schema$VideoStatistics = video.statistics ?? {};

    return {
      id: video.id ?? videoId,
      title: snippet.title ?? '',
      description: snippet.description ?? '',
      publishedAt: snippet.publishedAt ?? '',
      channelId: snippet.channelId ?? '',
      channelTitle: snippet.channelTitle ?? '',
      categoryId: snippet.categoryId ?? '',
      tags: snippet.tags ?? [],
      viewCount: toCount(statistics.viewCount),
      likeCount: toCount(statistics.likeCount),
    };
  }

  /**
   * One page of a playlist listing
   */
  async listPlaylistPage(
    playlistId: string,
    maxResults: number,
    pageToken?: string
  ): Promise<youtube_v3.Schema$PlaylistItemListResponse> {
    try {
      const response = await this.api.playlistItems.list({
        part: ['snippet'],
        playlistId,
        maxResults,
        pageToken,
      });
      return response.data;
    } catch (error) {
      throw wrapError(error, 'FETCH_ERROR', 'playlist-items', playlistId);
    }
  }

  private async getVideo(
    videoId: string,
    part: string[],
    stage: string
  ): Promise<youtube_v3.Schema$Video> {
    let items: youtube_v3.Schema$Video[];
    try {
      const response = await this.api.videos.list({ part, id: [videoId] });
      items = response.data.items ?? [];
    } catch (error) {
      throw wrapError(error, 'FETCH_ERROR', stage, videoId);
    }

    const [video] = items;
    if (!video) {
      throw new GrabError('NOT_FOUND', `no video found with ID: ${videoId}`, { stage, id: videoId });
    }
    return video;
  }
}
