import { Command } from 'commander';
import { version } from '../package.json';
import { AppError, toUserMessage } from './core/errors';
import { logger } from './core/logger';
import { ensureOutputRoot } from './core/fs';
import { createSettings } from './core/settings';
import { defaultRunner } from './core/exec';
import { delay } from './core/delay';
import type { DownloaderContext } from './core/context';
import { createConsoleReporter } from './ui/console';
import { ensureYtDlpAvailable } from './ytdlp/availability';
import { processUrl } from './downloader/task';
import { readUrlFile, runBatch } from './downloader/batch';
import { runInteractive, type InteractiveIO } from './downloader/interactive';

export interface CliOptions {
  file?: string;
  playlist?: boolean;
}

export interface CliDeps {
  ctx: DownloaderContext;
  io?: InteractiveIO;
  /** Installs a Ctrl-C handler for batch and single-URL runs; returns its removal. */
  onInterrupt?: (abort: () => void) => () => void;
}

function processInterrupt(abort: () => void): () => void {
  process.on('SIGINT', abort);
  return () => process.off('SIGINT', abort);
}

/**
 * Runs one CLI invocation and resolves to the process exit code. Only a
 * missing or unresponsive yt-dlp is fatal.
 */
export async function runCli(url: string | undefined, options: CliOptions, deps: CliDeps): Promise<number> {
  const { reporter, settings, runner } = deps.ctx;

  await ensureOutputRoot(settings.outputRoot);

  try {
    const ytDlpVersion = await ensureYtDlpAvailable(settings, runner);
    logger.debug({ version: ytDlpVersion }, 'Using yt-dlp');
  } catch (error) {
    if (error instanceof AppError) {
      logger.fatal({ code: error.code, details: error.details }, error.message);
      reporter.error(error.message);
      reporter.error(toUserMessage(error));
      return 1;
    }
    throw error;
  }

  if (!options.file && !url) {
    await runInteractive(deps.ctx, deps.io);
    return 0;
  }

  const controller = new AbortController();
  const removeInterrupt = (deps.onInterrupt ?? processInterrupt)(() => {
    reporter.warning('Interrupted by user');
    controller.abort();
  });
  const ctx: DownloaderContext = { ...deps.ctx, signal: controller.signal };

  try {
    if (options.file) {
      let urls: string[];
      try {
        urls = await readUrlFile(options.file);
      } catch (error) {
        if (error instanceof AppError) {
          reporter.error(error.message);
          return 0;
        }
        throw error;
      }
      await runBatch(urls, ctx);
    } else if (url) {
      await processUrl(url, ctx, { forcePlaylist: options.playlist === true });
    }
  } finally {
    removeInterrupt();
  }
  return 0;
}

export function createProgram(deps?: CliDeps): Command {
  const program = new Command();

  program
    .name('vidgrab')
    .description('Universal Video Downloader - download videos in best MP4 quality using yt-dlp')
    .version(version)
    .argument('[url]', 'Video URL (YouTube, Facebook, TikTok, Instagram, etc.)')
    .option('-f, --file <path>', 'Text file containing multiple video URLs')
    .option('-p, --playlist', 'Force treat as playlist')
    .action(async (url: string | undefined, options: CliOptions) => {
      const resolved = deps ?? {
        ctx: {
          settings: createSettings(),
          runner: defaultRunner,
          reporter: createConsoleReporter(),
          sleep: delay,
        },
      };
      process.exitCode = await runCli(url, options, resolved);
    });

  return program;
}
