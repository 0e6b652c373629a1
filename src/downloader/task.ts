import { logger } from '../core/logger';
import { describeErrorCode, ERROR_CODES, getErrorMessage, type ErrorCode } from '../core/errors';
import { ensureDirWithFallback, makePlaylistDir, platformDir } from '../core/fs';
import { formatMB } from '../core/size';
import type { DownloaderContext } from '../core/context';
import type { Reporter } from '../ui/console';
import { fetchVideoMetadata, placeholderMetadata } from '../ytdlp/metadata';
import { superviseDownload } from '../ytdlp/supervisor';
import { findDownloadedFile } from '../ytdlp/locate';
import type { VideoMetadata } from '../ytdlp/types';
import { toTask } from './url';
import type { DownloadOutcome, ProcessOptions } from './types';

function failure(error: ErrorCode, message: string = describeErrorCode(error)): DownloadOutcome {
  return { success: false, error, message };
}

export function formatDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return `${minutes}:${String(rest).padStart(2, '0')}`;
}

function reportMetadata(metadata: VideoMetadata, reporter: Reporter): void {
  reporter.info(`Title: ${metadata.title}`);
  reporter.info(`Uploader: ${metadata.uploader}`);
  reporter.info(`Platform: ${metadata.platform}`);
  if (metadata.duration) reporter.info(`Duration: ${formatDuration(metadata.duration)}`);
  if (metadata.viewCount) reporter.info(`Views: ${metadata.viewCount.toLocaleString('en-US')}`);
}

export async function downloadVideo(url: string, ctx: DownloaderContext): Promise<DownloadOutcome> {
  const { settings, reporter } = ctx;
  reporter.info(`Processing URL: ${url}`);

  let metadata = await fetchVideoMetadata(url, ctx);
  if (metadata) {
    reportMetadata(metadata, reporter);
  } else {
    reporter.info('Could not get video information, proceeding with download...');
    metadata = placeholderMetadata(url);
  }

  const target = platformDir(settings.outputRoot, metadata.platform);
  const ensured = await ensureDirWithFallback(target, settings.outputRoot);
  if (ensured.fallback) {
    reporter.warning(`Error creating directory ${target}: ${ensured.error ?? 'unknown error'}`);
  }
  reporter.info(`Downloading to: ${ensured.dir}`);

  const run = await superviseDownload({ url, kind: 'video', outDir: ensured.dir }, ctx);
  if (!run.success) {
    reporter.error(`Download failed: ${describeErrorCode(run.error)}`);
    return failure(run.error);
  }

  const file = await findDownloadedFile(metadata.title, ensured.dir);
  if (file) {
    if (file.match === 'newest') {
      reporter.info(`No exact title match, using newest file: ${file.name}`);
    } else {
      reporter.info(`Found matching file: ${file.name}`);
    }
    reporter.success(`Download complete: ${file.name}`);
    reporter.success(`File size: ${formatMB(file.size)}`);
    reporter.success(`Location: ${file.path}`);
  } else {
    reporter.success('Download completed but could not locate the specific file');
    reporter.info(`Check directory: ${ensured.dir}`);
  }

  logger.info({ url, file: file?.path, size: file?.size }, 'Video task finished');
  return { success: true, file };
}

export async function downloadPlaylist(url: string, ctx: DownloaderContext): Promise<DownloadOutcome> {
  const { settings, reporter } = ctx;
  reporter.info(`Processing playlist: ${url}`);

  const ensured = await makePlaylistDir(settings.outputRoot);
  if (ensured.fallback) {
    reporter.warning(`Error creating playlist directory: ${ensured.error ?? 'unknown error'}`);
  }
  reporter.info(`Downloading playlist to: ${ensured.dir}`);

  const run = await superviseDownload({ url, kind: 'playlist', outDir: ensured.dir }, ctx);
  logger.info({ url, success: run.success, playlist: run.playlist }, 'Playlist task finished');

  if (!run.success) {
    reporter.error(`Playlist download failed: ${describeErrorCode(run.error)}`);
    return failure(run.error);
  }
  return run.playlist ? { success: true, file: null, playlist: run.playlist } : { success: true, file: null };
}

/**
 * Validates and classifies one URL, then runs the matching task. Never
 * throws: anything unexpected becomes a failed outcome so a batch or the
 * interactive loop can carry on.
 */
export async function processUrl(
  url: string,
  ctx: DownloaderContext,
  options: ProcessOptions = {}
): Promise<DownloadOutcome> {
  const { reporter } = ctx;
  try {
    const task = toTask(url, options.forcePlaylist);
    if (!task) {
      reporter.error(describeErrorCode(ERROR_CODES.ERR_INVALID_URL));
      return failure(ERROR_CODES.ERR_INVALID_URL);
    }

    if (task.kind === 'playlist') {
      reporter.info(options.forcePlaylist ? 'Treating URL as a playlist...' : 'Detected playlist, downloading all videos...');
      return await downloadPlaylist(task.url, ctx);
    }

    reporter.info('Detected single video, downloading...');
    return await downloadVideo(task.url, ctx);
  } catch (error) {
    logger.error({ url, error }, 'Unexpected error while processing URL');
    reporter.error(`Error processing URL: ${getErrorMessage(error)}`);
    return failure(ERROR_CODES.ERR_INTERNAL, getErrorMessage(error));
  }
}
