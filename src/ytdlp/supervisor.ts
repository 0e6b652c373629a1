import { logger } from '../core/logger';
import { ERROR_CODES, getErrorMessage, type ErrorCode } from '../core/errors';
import type { DownloaderContext } from '../core/context';
import type { StreamResult } from '../core/exec';
import type { Reporter } from '../ui/console';
import { buildDownloadArgs, FORMAT_SPEC } from './args';
import { classifyLine, mapYtDlpError, type ClassifiedLine } from './progress';
import type { DownloadKind, PlaylistCounters, SupervisedRun } from './types';

export interface SuperviseRequest {
  url: string;
  kind: DownloadKind;
  outDir: string;
}

type AttemptResult =
  | { status: 'success' }
  | { status: 'failed'; error: ErrorCode }
  | { status: 'cancelled' };

function renderLine(line: ClassifiedLine, reporter: Reporter): void {
  switch (line.kind) {
    case 'progress':
    case 'complete':
      reporter.progress(line.text);
      break;
    case 'error':
      reporter.error(`Error: ${line.text}`);
      break;
    case 'warning':
      reporter.warning(`Warning: ${line.text}`);
      break;
    case 'playlist-item':
      reporter.info(`Downloading video ${line.index} of ${line.count}`);
      break;
    case 'info':
      reporter.info(line.text);
      break;
  }
}

function timeoutFor(kind: DownloadKind, ctx: DownloaderContext): number {
  const { download } = ctx.settings;
  return kind === 'playlist' ? download.playlistTimeoutMs : download.videoTimeoutMs;
}

async function runAttempt(
  request: SuperviseRequest,
  attempt: number,
  counters: PlaylistCounters,
  ctx: DownloaderContext
): Promise<AttemptResult> {
  const { settings, runner, reporter } = ctx;
  const timeoutMs = timeoutFor(request.kind, ctx);
  const args = buildDownloadArgs(request.kind, request.outDir, request.url);
  const failure: { reason: ErrorCode | null } = { reason: null };
  // Separate video and audio streams each print 100%; count one per item
  const item = { completed: false };

  const onLine = (raw: string) => {
    if (raw.trim().length === 0) return;
    const line = classifyLine(raw);
    if (line.kind === 'playlist-item') {
      counters.attempted += 1;
      item.completed = false;
    }
    if (line.kind === 'complete' && !item.completed) {
      counters.completed += 1;
      item.completed = true;
    }
    if (line.kind === 'error') failure.reason = mapYtDlpError(line.text) ?? failure.reason;
    renderLine(line, reporter);
  };

  logger.info({ url: request.url, kind: request.kind, attempt, outDir: request.outDir }, 'Starting yt-dlp download');

  let result: StreamResult;
  try {
    result = await runner.stream(settings.binary, args, { timeout: timeoutMs, signal: ctx.signal, onLine });
  } catch (error) {
    logger.error({ url: request.url, attempt, error }, 'Unexpected error while running yt-dlp');
    reporter.error(`Error downloading with yt-dlp (attempt ${attempt}): ${getErrorMessage(error)}`);
    return { status: 'failed', error: ERROR_CODES.ERR_INTERNAL };
  }

  logger.info(
    { url: request.url, attempt, code: result.code, timedOut: result.timedOut, aborted: result.aborted, durationMs: result.durationMs },
    'yt-dlp finished'
  );

  if (result.aborted) {
    reporter.warning('Download cancelled');
    return { status: 'cancelled' };
  }
  if (result.timedOut) {
    reporter.error(`Download timed out after ${Math.round(timeoutMs / 1000)} seconds!`);
    return { status: 'failed', error: ERROR_CODES.ERR_TIMEOUT };
  }
  if (result.code === 0) {
    return { status: 'success' };
  }

  reporter.error(`Download failed with exit code: ${result.code}`);
  return { status: 'failed', error: failure.reason ?? ERROR_CODES.ERR_DOWNLOAD_FAILED };
}

function reportPlaylist(counters: PlaylistCounters, success: boolean, reporter: Reporter): void {
  const tally = `${counters.completed}/${counters.attempted}`;
  if (success) {
    reporter.success(`Playlist download completed! Downloaded ${tally} videos successfully.`);
  } else {
    reporter.info(`Successfully downloaded: ${tally} videos`);
  }
}

/**
 * Runs yt-dlp for one URL under a wall-clock timeout, retrying failed
 * attempts with a fixed delay. Single videos and playlists get the same
 * treatment; playlists additionally count the items yt-dlp reports.
 */
export async function superviseDownload(request: SuperviseRequest, ctx: DownloaderContext): Promise<SupervisedRun> {
  const { reporter, sleep } = ctx;
  const { maxAttempts, delayMs } = ctx.settings.download;
  const isPlaylist = request.kind === 'playlist';
  let counters: PlaylistCounters = { attempted: 0, completed: 0 };
  let lastError: ErrorCode = ERROR_CODES.ERR_DOWNLOAD_FAILED;
  const tally = () => (isPlaylist ? { playlist: counters } : {});

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (ctx.signal?.aborted) {
      return { success: false, attempts: attempt - 1, error: ERROR_CODES.ERR_CANCELLED, ...tally() };
    }

    reporter.info(`Download attempt ${attempt}/${maxAttempts}`);
    reporter.info(`Download command: ${ctx.settings.binary} -f ${FORMAT_SPEC} [URL]`);
    reporter.info('Starting download...');

    counters = { attempted: 0, completed: 0 };
    const outcome = await runAttempt(request, attempt, counters, ctx);

    if (outcome.status === 'success') {
      reporter.success('Download completed successfully!');
      if (isPlaylist) reportPlaylist(counters, true, reporter);
      return { success: true, attempts: attempt, ...tally() };
    }

    // The terminal may deliver Ctrl-C to yt-dlp before our own cancel reaches it
    if (outcome.status === 'cancelled' || ctx.signal?.aborted) {
      return { success: false, attempts: attempt, error: ERROR_CODES.ERR_CANCELLED, ...tally() };
    }

    lastError = outcome.error;
    if (attempt < maxAttempts) {
      reporter.info(`Retrying in ${Math.round(delayMs / 1000)} seconds...`);
      await sleep(delayMs);
    }
  }

  logger.error({ url: request.url, attempts: maxAttempts, error: lastError }, 'All download attempts failed');
  reporter.error(`Download failed after ${maxAttempts} attempts`);
  if (isPlaylist) reportPlaylist(counters, false, reporter);
  return { success: false, attempts: maxAttempts, error: lastError, ...tally() };
}
