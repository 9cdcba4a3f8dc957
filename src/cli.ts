#!/usr/bin/env node
/**
 * ytgrab CLI - YouTube transcript, metadata and playlist extraction
 */

import { InvalidArgumentError, program } from 'commander';
import { version } from '../package.json';
import {
  appendJsonl,
  fromUrls,
  getErrorMessage,
  loadConfig,
  loadProcessedIds,
  loadUrlList,
  requestedFields,
  resolveIdentifier,
  streamVideos,
  toWatchUrl,
  VideoGrabber,
} from './index';
import { writeTextFile } from './lib/fs';
import type { GrabOptions, VideoInfo, VideoSource } from './types';

// ANSI colors
const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;

interface FieldFlags {
  metadata?: boolean;
  duration?: boolean;
  comments?: boolean;
  transcript?: boolean;
  timestamps?: boolean;
  lang: string;
  apiKey?: string;
}

interface GrabCommandOptions extends FieldFlags {
  bestEffort?: boolean;
  output?: string;
}

interface PlaylistCommandOptions {
  csv?: string;
  apiKey?: string;
}

interface BulkCommandOptions extends FieldFlags {
  urls?: string;
  file?: string;
  outJsonl: string;
  concurrency: number;
  pauseAfter: number;
  pauseMs: number;
  resume?: boolean;
}

function fail(message: string): never {
  console.error(red(message));
  process.exit(1);
}

function parseCount(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer >= ${min}.`);
    }
    return parsed;
  };
}

function createGrabber(apiKey?: string): VideoGrabber {
  const config = loadConfig();
  return new VideoGrabber({
    apiKey: apiKey ?? config.YOUTUBE_API_KEY,
    timeoutMs: config.YTGRAB_TIMEOUT_MS,
    pageDelayMs: config.YTGRAB_PAGE_DELAY_MS,
  });
}

/**
 * Map CLI flags to grab options; with no field flag the transcript is grabbed
 */
function toGrabOptions(flags: FieldFlags): GrabOptions {
  const options: GrabOptions = {
    metadata: flags.metadata,
    duration: flags.duration,
    comments: flags.comments,
    transcript: flags.transcript,
    transcriptWithTimestamps: flags.timestamps,
    language: flags.lang,
  };
  if (!requestedFields(options).length) {
    options.transcript = true;
  }
  return options;
}

program
  .name('ytgrab')
  .description('Transcripts, durations, comments, metadata and playlists from YouTube URLs')
  .version(version);

// Single video command
program
  .command('grab <video>')
  .description('Grab fields for a single video (ID or URL)')
  .option('--metadata', 'Include video metadata')
  .option('--duration', 'Include duration in minutes')
  .option('--comments', 'Include comments')
  .option('--transcript', 'Include the transcript (default when no field is chosen)')
  .option('--timestamps', 'Include the transcript with timestamps')
  .option('-l, --lang <code>', 'Caption language code', 'en')
  .option('--best-effort', 'Attempt every field instead of stopping at the first failure')
  .option('-o, --output <file>', 'Write to file instead of stdout')
  .option('--api-key <key>', 'YouTube Data API key (default: $YOUTUBE_API_KEY)')
  .action(async (video: string, options: GrabCommandOptions) => {
    const grabber = createGrabber(options.apiKey);
    const url = toWatchUrl(video);
    const grabOptions = toGrabOptions(options);

    let info: VideoInfo;
    let failures: string[];
    try {
      if (options.bestEffort) {
        const result = await grabber.grabAll(url, grabOptions);
        info = result.info;
        failures = Object.entries(result.errors).map(
          ([field, error]) => `${field}: ${getErrorMessage(error)}`
        );
      } else {
        const result = await grabber.grab(url, grabOptions);
        info = result.info;
        failures = result.error ? [result.error.message] : [];
      }
    } catch (error) {
      fail(`Failed: ${getErrorMessage(error)}`);
    }

    const output = JSON.stringify(info, null, 2);
    if (options.output) {
      await writeTextFile(options.output, output);
      console.log(green(`Written to ${options.output}`));
    } else {
      console.log(output);
    }

    for (const failure of failures) {
      console.error(red(`Failed: ${failure}`));
    }
    if (failures.length) {
      process.exitCode = 1;
    }
  });

// Playlist command
program
  .command('playlist <url>')
  .description('List the videos of a playlist, or save them as CSV')
  .option('--csv <file>', 'Write VideoID,Title rows to this file')
  .option('--api-key <key>', 'YouTube Data API key (default: $YOUTUBE_API_KEY)')
  .action(async (url: string, options: PlaylistCommandOptions) => {
    const grabber = createGrabber(options.apiKey);

    try {
      const { playlistId } = resolveIdentifier(url);
      if (!playlistId) {
        fail(`No playlist ID in URL: ${url}`);
      }

      if (options.csv) {
        const items = await grabber.savePlaylist(playlistId, options.csv);
        console.log(green(`Playlist saved to ${options.csv}`) + dim(` (${items.length} videos)`));
      } else {
        await grabber.printPlaylist(playlistId);
      }
    } catch (error) {
      fail(`Failed: ${getErrorMessage(error)}`);
    }
  });

// Bulk processing command
program
  .command('bulk')
  .description('Grab fields for many videos')
  .option('--urls <list>', 'Comma-separated video IDs or URLs')
  .option('--file <file>', 'File with video IDs/URLs (one per line)')
  .option('-o, --out-jsonl <file>', 'Output JSONL file', 'videos.jsonl')
  .option('-c, --concurrency <n>', 'Concurrent requests', parseCount(1), 4)
  .option('--pause-after <n>', 'Pause after N requests', parseCount(1), 10)
  .option('--pause-ms <n>', 'Pause duration in ms', parseCount(0), 5000)
  .option('--metadata', 'Include video metadata')
  .option('--duration', 'Include duration in minutes')
  .option('--comments', 'Include comments')
  .option('--transcript', 'Include the transcript (default when no field is chosen)')
  .option('--timestamps', 'Include the transcript with timestamps')
  .option('-l, --lang <code>', 'Caption language code', 'en')
  .option('--resume', 'Resume from previous run (skip already processed)')
  .option('--api-key <key>', 'YouTube Data API key (default: $YOUTUBE_API_KEY)')
  .action(async (options: BulkCommandOptions) => {
    const sources: VideoSource[] = [];

    // Load from comma-separated list
    if (options.urls) {
      const fromList = fromUrls(options.urls.split(','));
      sources.push(...fromList);
      console.log(`  Added ${fromList.length} videos from --urls`);
    }

    // Load from file
    if (options.file) {
      try {
        const fromFile = await loadUrlList(options.file);
        sources.push(...fromFile);
        console.log(`  Added ${fromFile.length} videos from ${options.file}`);
      } catch (error) {
        console.error(red(`Failed to load file: ${getErrorMessage(error)}`));
      }
    }

    if (!sources.length) {
      fail('No input sources provided. Use --urls or --file');
    }

    // Dedupe across inputs
    const allVideos = fromUrls(sources.map((s) => s.url));
    console.log(`\n${green(String(allVideos.length))} unique videos to process`);

    // Load already processed IDs if resuming
    let skipIds = new Set<string>();
    if (options.resume) {
      skipIds = await loadProcessedIds(options.outJsonl);
      if (skipIds.size > 0) {
        console.log(dim(`Resuming: ${skipIds.size} already processed, skipping...`));
      }
    }

    const toProcess = allVideos.filter((v) => !skipIds.has(v.videoId));
    if (!toProcess.length) {
      console.log(green('All videos already processed!'));
      return;
    }

    console.log(`Processing ${toProcess.length} videos...\n`);

    const grabber = createGrabber(options.apiKey);
    let successCount = 0;
    let failCount = 0;

    for await (const result of streamVideos(grabber, toProcess, {
      ...toGrabOptions(options),
      concurrency: options.concurrency,
      pauseAfter: options.pauseAfter,
      pauseDuration: options.pauseMs,
    })) {
      const status = result.error ? red('FAIL') : green('OK');
      const note = result.error ?? result.info.metadata?.title ?? '';
      console.log(`[${result.source.videoId}] ${status} ${dim(note.slice(0, 60))}`);

      if (result.error) {
        failCount++;
      } else {
        successCount++;
      }

      // Append to JSONL immediately
      await appendJsonl(result, options.outJsonl);
    }

    const summary = `${successCount} succeeded, ${failCount} failed`;
    console.log(`\n${green('Done!')} ${failCount ? yellow(summary) : summary}`);
    console.log(`Output: ${options.outJsonl}`);
  });

program.parseAsync().catch((error: unknown) => {
  fail(`Failed: ${getErrorMessage(error)}`);
});
