/**
 * Paginated playlist listing with a fixed pause between page requests
 */

import type { PlaylistItem } from '../types';
import type { MetadataClient } from './client';
import { logger as defaultLogger, type Logger } from './logger';

export const PLAYLIST_PAGE_SIZE = 50;
export const DEFAULT_PAGE_DELAY_MS = 1_000;

const NON_ALPHANUMERIC_RUN = /[^a-zA-Z0-9]+/g;

export type Sleep = (ms: number) => Promise<void>;

export const pause: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface PlaylistEnumeratorOptions {
  /** Pause between page requests in ms (default: 1000) */
  pageDelayMs?: number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Filesystem-safe form of a title
 */
export function normalizeTitle(title: string): string {
  return title.replace(NON_ALPHANUMERIC_RUN, '_');
}

export class PlaylistEnumerator {
  private readonly pageDelayMs: number;
  private readonly sleep: Sleep;
  private readonly log: Logger;

  constructor(
    private readonly client: MetadataClient,
    options: PlaylistEnumeratorOptions = {}
  ) {
    this.pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
    this.sleep = options.sleep ?? pause;
    this.log = options.logger ?? defaultLogger;
  }

  /**
   * Every item of the playlist, in upstream order
   */
  async fetchPlaylistVideos(playlistId: string): Promise<PlaylistItem[]> {
    const items: PlaylistItem[] = [];
    let pageToken: string | undefined;
    let page = 0;

    for (;;) {
      const response = await this.client.listPlaylistPage(
        playlistId,
        PLAYLIST_PAGE_SIZE,
        pageToken
      );
      page++;

      for (const entry of response.items ?? []) {
        const title = entry.snippet?.title ?? '';
        items.push({
          videoId: entry.snippet?.resourceId?.videoId ?? '',
          title,
          normalizedTitle: normalizeTitle(title),
        });
      }

      this.log.debug({ playlistId, page, total: items.length }, 'fetched playlist page');

      pageToken = response.nextPageToken ?? undefined;
      if (!pageToken) break;

      await this.sleep(this.pageDelayMs);
    }

    return items;
  }
}
