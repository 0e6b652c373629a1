import { z } from 'zod';
import { logger } from '../core/logger';
import { getErrorMessage } from '../core/errors';
import type { DownloaderContext } from '../core/context';
import type { ExecResult } from '../core/exec';
import { buildMetadataArgs } from './args';
import type { VideoMetadata } from './types';

export const MAX_DESCRIPTION_LENGTH = 200;

const count = z
  .number()
  .nonnegative()
  .transform((value) => Math.floor(value))
  .catch(0);

// Wrong-typed or missing fields fall back instead of failing the whole record
const infoSchema = z.object({
  title: z.string().catch('Unknown Title'),
  uploader: z.string().catch('Unknown Uploader'),
  duration: count,
  view_count: count,
  upload_date: z.string().catch(''),
  description: z.string().catch(''),
  webpage_url: z.string().optional().catch(undefined),
  extractor: z.string().catch('Unknown Platform'),
});

export const PLACEHOLDER_METADATA: Readonly<Omit<VideoMetadata, 'webpageUrl'>> = Object.freeze({
  title: 'Unknown Video',
  uploader: 'Unknown',
  duration: 0,
  viewCount: 0,
  uploadDate: '',
  description: '',
  platform: 'Unknown',
});

export function placeholderMetadata(url: string): VideoMetadata {
  return { ...PLACEHOLDER_METADATA, webpageUrl: url };
}

/**
 * Turns one line of `yt-dlp --dump-json` output into metadata.
 * @throws SyntaxError or ZodError when the line is not a JSON object
 */
export function parseVideoInfo(stdout: string, url: string): VideoMetadata {
  const line = stdout.split('\n').find((l) => l.trim().length > 0) ?? '';
  const info = infoSchema.parse(JSON.parse(line));
  return {
    title: info.title,
    uploader: info.uploader,
    duration: info.duration,
    viewCount: info.view_count,
    uploadDate: info.upload_date,
    description: info.description.slice(0, MAX_DESCRIPTION_LENGTH),
    webpageUrl: info.webpage_url ?? url,
    platform: info.extractor,
  };
}

/**
 * Asks yt-dlp for metadata, retrying a bounded number of times. Metadata is
 * best effort: `null` means none could be had and the caller carries on.
 */
export async function fetchVideoMetadata(url: string, ctx: DownloaderContext): Promise<VideoMetadata | null> {
  const { settings, runner, reporter, sleep } = ctx;
  const { maxAttempts, delayMs, timeoutMs } = settings.metadata;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (ctx.signal?.aborted) return null;
    reporter.info(`Getting video information (attempt ${attempt}/${maxAttempts})...`);

    let result: ExecResult | null = null;
    try {
      result = await runner.run(settings.binary, buildMetadataArgs(url), { timeout: timeoutMs });
    } catch (error) {
      logger.error({ url, attempt, error }, 'yt-dlp metadata invocation failed');
      reporter.error(`Error getting video info (attempt ${attempt}): ${getErrorMessage(error)}`);
    }

    if (result) {
      if (result.timedOut) {
        logger.warn({ url, attempt, timeoutMs }, 'yt-dlp metadata request timed out');
        reporter.warning(`Timeout getting video info (attempt ${attempt})`);
      } else if (result.code !== 0) {
        logger.warn({ url, attempt, code: result.code, stderrPreview: result.stderr.slice(0, 800) }, 'yt-dlp metadata attempt failed');
        reporter.warning(`yt-dlp returned error code: ${result.code}`);
      } else {
        try {
          const metadata = parseVideoInfo(result.stdout, url);
          logger.debug({ url, attempt, title: metadata.title, platform: metadata.platform }, 'Metadata resolved');
          return metadata;
        } catch (error) {
          logger.warn({ url, attempt, error: getErrorMessage(error) }, 'Failed to parse yt-dlp metadata JSON');
          reporter.warning(`Failed to parse video info JSON: ${getErrorMessage(error)}`);
        }
      }
    }

    if (attempt < maxAttempts) {
      await sleep(delayMs);
    }
  }

  logger.warn({ url, attempts: maxAttempts }, 'Giving up on metadata');
  reporter.warning('Failed to get video information after all retries');
  return null;
}
