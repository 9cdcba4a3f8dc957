/**
 * Bulk grabbing with concurrency control, rate limiting, and resume support
 */

import pLimit from 'p-limit';
import type { BulkOptions, BulkResult, GrabOptions, VideoSource } from '../types';
import { getErrorMessage } from './errors';
import { emptyVideoInfo, type VideoGrabber } from './grabber';
import { pause } from './playlist';

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_PAUSE_AFTER = 10;
const DEFAULT_PAUSE_DURATION = 5000;

/**
 * Split sources into batches of `pauseAfter`. A value that is not a positive
 * integer means no pause: everything runs as one batch.
 */
export function toBatches<T>(items: readonly T[], pauseAfter: number): T[][] {
  if (!items.length) return [];
  const size = Number.isInteger(pauseAfter) && pauseAfter > 0 ? pauseAfter : items.length;
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function limiter(concurrency: number) {
  return pLimit(Number.isInteger(concurrency) && concurrency > 0 ? concurrency : DEFAULT_CONCURRENCY);
}

async function grabOne(
  grabber: VideoGrabber,
  source: VideoSource,
  grabOptions: GrabOptions
): Promise<BulkResult> {
  try {
    const { info, error } = await grabber.grab(source.url, grabOptions);
    return error ? { source, info, error: error.message } : { source, info };
  } catch (error) {
    return { source, info: emptyVideoInfo(), error: getErrorMessage(error) };
  }
}

/**
 * Grab many videos with concurrency control. A failed video is reported in
 * its result and never stops the batch.
 */
export async function processVideos(
  grabber: VideoGrabber,
  sources: VideoSource[],
  options: BulkOptions = {}
): Promise<BulkResult[]> {
  const {
    concurrency = DEFAULT_CONCURRENCY,
    pauseAfter = DEFAULT_PAUSE_AFTER,
    pauseDuration = DEFAULT_PAUSE_DURATION,
    skipIds = new Set(),
    onProgress,
    ...grabOptions
  } = options;

  // Filter out already-processed videos
  const toProcess = sources.filter((s) => !skipIds.has(s.videoId));

  if (!toProcess.length) {
    return [];
  }

  const limit = limiter(concurrency);
  const results: BulkResult[] = [];
  let completed = 0;

  // Process in batches for rate limiting
  const batches = toBatches(toProcess, pauseAfter);

  for (let batchIndex = 0; batchIndex < batches.length; batchIndex++) {
    const batch = batches[batchIndex];

    const batchPromises = batch.map((source) =>
      limit(async () => {
        const result = await grabOne(grabber, source, grabOptions);
        completed++;
        onProgress?.(completed, toProcess.length, result);
        return result;
      })
    );

    const batchResults = await Promise.all(batchPromises);
    results.push(...batchResults);

    // Pause between batches (except after the last one)
    if (batchIndex < batches.length - 1 && pauseDuration > 0) {
      await pause(pauseDuration);
    }
  }

  return results;
}

/**
 * Yield results in input order as they complete. Grabs run concurrently
 * within each batch of `pauseAfter` videos; batches are separated by a pause.
 */
export async function* streamVideos(
  grabber: VideoGrabber,
  sources: VideoSource[],
  options: Omit<BulkOptions, 'onProgress'> = {}
): AsyncGenerator<BulkResult> {
  const {
    concurrency = DEFAULT_CONCURRENCY,
    pauseAfter = DEFAULT_PAUSE_AFTER,
    pauseDuration = DEFAULT_PAUSE_DURATION,
    skipIds = new Set(),
    ...grabOptions
  } = options;

  const limit = limiter(concurrency);
  const batches = toBatches(
    sources.filter((s) => !skipIds.has(s.videoId)),
    pauseAfter
  );

  for (let batchIndex = 0; batchIndex < batches.length; batchIndex++) {
    const pending = batches[batchIndex].map((source) =>
      limit(() => grabOne(grabber, source, grabOptions))
    );

    for (const result of pending) {
      yield await result;
    }

    // Rate limiting
    if (batchIndex < batches.length - 1 && pauseDuration > 0) {
      await pause(pauseDuration);
    }
  }
}
