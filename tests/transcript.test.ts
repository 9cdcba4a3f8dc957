/**
 * Tests for the transcript scrape pipeline, against a mocked fetch
 */

import { describe, test, expect, vi } from 'vitest';
import { createLogger } from '../src/lib/logger';
import {
  formatPlainTranscript,
  formatTimestampedTranscript,
  parseCaptionSegments,
  TranscriptFetcher,
} from '../src/lib/transcript';
import { isGrabError } from '../src/lib/errors';
import {
  CAPTION_XML,
  captureRejection,
  createMockFetch,
  makeWatchPageHtml,
  VIDEO_ID,
} from './helpers';

const silent = createLogger('silent');

describe('parseCaptionSegments', () => {
  test('reads timing attributes and decodes text', () => {
    expect(parseCaptionSegments(CAPTION_XML)).toEqual([
      { start: 0, duration: 1.5, text: 'Hello there' },
      { start: 1.5, duration: 2.25, text: "it's a test" },
      { start: 3661.2, duration: 60, text: 'last line' },
    ]);
  });

  test('decodes a plain apostrophe entity', () => {
    expect(parseCaptionSegments('<transcript><text start="5" dur="1">don&#39;t</text></transcript>')).toEqual([
      { start: 5, duration: 1, text: "don't" },
    ]);
  });

  test('reads malformed or missing timings as 0', () => {
    const xml = '<transcript><text start="abc">x</text><text dur="2">y</text></transcript>';

    expect(parseCaptionSegments(xml)).toEqual([
      { start: 0, duration: 0, text: 'x' },
      { start: 0, duration: 2, text: 'y' },
    ]);
  });

  test('returns no segments for an empty document', () => {
    expect(parseCaptionSegments('<transcript></transcript>')).toEqual([]);
  });
});

describe('transcript formatting', () => {
  const segments = parseCaptionSegments(CAPTION_XML);

  test('plain transcript joins segment text with spaces', () => {
    expect(formatPlainTranscript(segments)).toBe("Hello there it's a test last line");
  });

  test('timestamped transcript has one line per segment', () => {
    expect(formatTimestampedTranscript(segments)).toBe(
      '[00:00:00 - 00:00:01] Hello there\n' +
        "[00:00:01 - 00:00:03] it's a test\n" +
        '[01:01:01 - 01:02:01] last line\n'
    );
  });

  test('empty segment lists format as empty strings', () => {
    expect(formatPlainTranscript([])).toBe('');
    expect(formatTimestampedTranscript([])).toBe('');
  });
});

describe('TranscriptFetcher', () => {
  test('fetches the watch page and then the matching caption track', async () => {
    const fetchFn = createMockFetch();
    const fetcher = new TranscriptFetcher({ fetchFn, logger: silent });

    const transcript = await fetcher.grabTranscript(VIDEO_ID, 'en');

    expect(transcript).toBe("Hello there it's a test last line");
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(String(fetchFn.mock.calls[0][0])).toBe(`https://www.youtube.com/watch?v=${VIDEO_ID}`);
    expect(String(fetchFn.mock.calls[1][0])).toBe(
      `https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=en`
    );
  });

  test('sends browser-like headers', async () => {
    const fetchFn = createMockFetch();
    const fetcher = new TranscriptFetcher({ fetchFn, logger: silent });

    await fetcher.grabTranscript(VIDEO_ID, 'en');

    const init = fetchFn.mock.calls[0][1];
    expect(init?.headers).toMatchObject({ 'Accept-Language': 'en-US,en;q=0.9' });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  test('returns the timestamped transcript', async () => {
    const fetcher = new TranscriptFetcher({ fetchFn: createMockFetch(), logger: silent });

    expect(await fetcher.grabTranscriptWithTimestamps(VIDEO_ID, 'en')).toBe(
      '[00:00:00 - 00:00:01] Hello there\n' +
        "[00:00:01 - 00:00:03] it's a test\n" +
        '[01:01:01 - 01:02:01] last line\n'
    );
  });

  test('falls back to the first track when the language is missing', async () => {
    const fetchFn = createMockFetch();
    const log = createLogger('silent');
    const warn = vi.spyOn(log, 'warn');
    const fetcher = new TranscriptFetcher({ fetchFn, logger: log });

    await fetcher.grabSegments(VIDEO_ID, 'fr');

    expect(String(fetchFn.mock.calls[1][0])).toBe(
      `https://www.youtube.com/api/timedtext?v=${VIDEO_ID}&lang=es`
    );
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('resolves relative caption URLs against the YouTube origin', async () => {
    const fetchFn = createMockFetch({
      pageHtml: makeWatchPageHtml([{ baseUrl: '/api/timedtext?v=rel&lang=en' }]),
    });
    const fetcher = new TranscriptFetcher({ fetchFn, logger: silent });

    await fetcher.grabSegments(VIDEO_ID, 'en');

    expect(String(fetchFn.mock.calls[1][0])).toBe(
      'https://www.youtube.com/api/timedtext?v=rel&lang=en'
    );
  });

  test('uses an injected manifest extractor', async () => {
    const extractor = {
      extract: vi.fn(() => JSON.stringify([{ baseUrl: '/api/timedtext?v=custom&lang=en' }])),
    };
    const fetchFn = createMockFetch();
    const fetcher = new TranscriptFetcher({ fetchFn, extractor, logger: silent });

    await fetcher.grabSegments(VIDEO_ID, 'en');

    expect(extractor.extract).toHaveBeenCalledTimes(1);
    expect(String(fetchFn.mock.calls[1][0])).toBe(
      'https://www.youtube.com/api/timedtext?v=custom&lang=en'
    );
  });

  describe('fetchCaptionDocument failures', () => {
    test('watch page status error is a FETCH_ERROR', async () => {
      const fetcher = new TranscriptFetcher({
        fetchFn: createMockFetch({ pageStatus: 404 }),
        logger: silent,
      });

      const error = await captureRejection(fetcher.fetchCaptionDocument(VIDEO_ID, 'en'));

      expect(error.code).toBe('FETCH_ERROR');
      expect(error.stage).toBe('watch-page');
      expect(error.message).toBe('watch-page request failed: status code 404');
    });

    test('transport error is a FETCH_ERROR', async () => {
      const fetcher = new TranscriptFetcher({
        fetchFn: vi.fn(async () => {
          throw new Error('connect ECONNREFUSED');
        }),
        logger: silent,
      });

      const error = await captureRejection(fetcher.fetchCaptionDocument(VIDEO_ID, 'en'));

      expect(error.code).toBe('FETCH_ERROR');
      expect(error.message).toBe('watch-page request failed: connect ECONNREFUSED');
    });

    test('page without a caption marker is a PARSE_ERROR', async () => {
      const fetcher = new TranscriptFetcher({
        fetchFn: createMockFetch({ pageHtml: '<html><script>var a = 1;</script></html>' }),
        logger: silent,
      });

      const error = await captureRejection(fetcher.fetchCaptionDocument(VIDEO_ID, 'en'));

      expect(error.code).toBe('PARSE_ERROR');
      expect(error.message).toBe(`no caption manifest in watch page for ${VIDEO_ID}`);
    });

    test('marker without a track array is a PARSE_ERROR', async () => {
      const fetcher = new TranscriptFetcher({
        fetchFn: createMockFetch({
          pageHtml: '<html><script>var key = "captionTracks";</script></html>',
        }),
        logger: silent,
      });

      const error = await captureRejection(fetcher.fetchCaptionDocument(VIDEO_ID, 'en'));

      expect(error.code).toBe('PARSE_ERROR');
      expect(error.message).toBe(`caption track list not found for ${VIDEO_ID}`);
      expect(error.stage).toBe('caption-manifest');
    });

    test('empty track list is NO_CAPTIONS', async () => {
      const fetcher = new TranscriptFetcher({
        fetchFn: createMockFetch({ pageHtml: makeWatchPageHtml([]) }),
        logger: silent,
      });

      const error = await captureRejection(fetcher.fetchCaptionDocument(VIDEO_ID, 'en'));

      expect(error.code).toBe('NO_CAPTIONS');
    });

    test('caption document status error is a FETCH_ERROR', async () => {
      const fetcher = new TranscriptFetcher({
        fetchFn: createMockFetch({ xmlStatus: 500 }),
        logger: silent,
      });

      const error = await captureRejection(fetcher.fetchCaptionDocument(VIDEO_ID, 'en'));

      expect(error.code).toBe('FETCH_ERROR');
      expect(error.stage).toBe('caption-document');
      expect(error.message).toBe('caption-document request failed: status code 500');
    });
  });

  test('transcript failures are TRANSCRIPT_UNAVAILABLE wrapping the cause', async () => {
    const fetcher = new TranscriptFetcher({
      fetchFn: createMockFetch({ pageStatus: 404 }),
      logger: silent,
    });

    const error = await captureRejection(fetcher.grabTranscript(VIDEO_ID, 'en'));

    expect(error.code).toBe('TRANSCRIPT_UNAVAILABLE');
    expect(error.id).toBe(VIDEO_ID);
    expect(error.message).toBe(
      `transcript not available for ${VIDEO_ID}: watch-page request failed: status code 404`
    );
    expect(isGrabError(error.cause, 'FETCH_ERROR')).toBe(true);
  });
});
