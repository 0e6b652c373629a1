import * as fs from 'fs-extra';
import { logger } from '../core/logger';
import { AppError, ERROR_CODES, getErrorMessage } from '../core/errors';
import type { DownloaderContext } from '../core/context';
import { processUrl } from './task';
import type { BatchSummary, ProcessOptions, UrlHandler } from './types';

export interface BatchOptions extends ProcessOptions {
  handle?: UrlHandler;
}

function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Non-empty lines that are not `#` comments, trimmed. */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

/**
 * @throws AppError with `ERR_BATCH_FILE` when the file is missing,
 * unreadable or not valid UTF-8
 */
export async function readUrlFile(filePath: string): Promise<string[]> {
  let content: string;
  try {
    const raw = await fs.readFile(filePath);
    content = new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch (error) {
    const code = errnoCode(error);
    logger.error({ filePath, error }, 'Failed to read URL file');
    if (code === 'ENOENT') {
      throw new AppError(ERROR_CODES.ERR_BATCH_FILE, `File not found: ${filePath}`, { filePath });
    }
    if (code === 'EACCES' || code === 'EPERM') {
      throw new AppError(ERROR_CODES.ERR_BATCH_FILE, `Permission denied accessing file: ${filePath}`, { filePath });
    }
    if (code === 'ERR_ENCODING_INVALID_ENCODED_DATA') {
      throw new AppError(ERROR_CODES.ERR_BATCH_FILE, `File encoding error. Please use UTF-8 encoding: ${filePath}`, {
        filePath,
      });
    }
    throw new AppError(ERROR_CODES.ERR_BATCH_FILE, `Error processing file: ${getErrorMessage(error)}`, { filePath });
  }
  return parseUrlList(content);
}

/**
 * Processes URLs one after another with a fixed pause between them. A
 * failing URL is counted and the queue moves on.
 */
export async function runBatch(
  urls: string[],
  ctx: DownloaderContext,
  options: BatchOptions = {}
): Promise<BatchSummary> {
  const { reporter, sleep, settings } = ctx;
  const { handle = processUrl, ...processOptions } = options;

  if (urls.length === 0) {
    reporter.warning('No URLs found in the file');
    return { total: 0, succeeded: 0 };
  }

  reporter.info(`Found ${urls.length} URLs in file`);
  let succeeded = 0;

  for (const [i, url] of urls.entries()) {
    if (ctx.signal?.aborted) {
      reporter.warning('Batch interrupted');
      break;
    }

    reporter.divider();
    reporter.info(`Processing URL ${i + 1}/${urls.length}: ${url}`);
    reporter.divider();

    try {
      const outcome = await handle(url, ctx, processOptions);
      if (outcome.success) succeeded++;
    } catch (error) {
      logger.error({ url, error }, 'Batch item failed');
      reporter.error(`Error processing URL: ${getErrorMessage(error)}`);
    }

    if (i < urls.length - 1 && !ctx.signal?.aborted) {
      reporter.info(`Waiting ${Math.round(settings.batchDelayMs / 1000)} seconds before next download...`);
      await sleep(settings.batchDelayMs);
    }
  }

  reporter.info(`Completed: ${succeeded}/${urls.length} downloads successful`);
  logger.info({ total: urls.length, succeeded }, 'Batch finished');
  return { total: urls.length, succeeded };
}
