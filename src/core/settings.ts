import * as path from 'path';
import { config as appConfig, type Config } from './config';

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly delayMs: number;
}

/**
 * Everything a download run needs to know about its environment. Built once
 * at startup and handed to each component; nothing reads it from globals.
 */
export interface DownloaderSettings {
  readonly binary: string;
  readonly outputRoot: string;
  readonly versionTimeoutMs: number;
  readonly metadata: RetryPolicy & { readonly timeoutMs: number };
  readonly download: RetryPolicy & {
    readonly videoTimeoutMs: number;
    readonly playlistTimeoutMs: number;
  };
  readonly batchDelayMs: number;
}

export const VERSION_TIMEOUT_MS = 10_000;
export const METADATA_TIMEOUT_MS = 30_000;
export const MAX_ATTEMPTS = 3;
export const METADATA_RETRY_DELAY_MS = 2_000;
export const DOWNLOAD_RETRY_DELAY_MS = 3_000;
export const BATCH_DELAY_MS = 3_000;

export function createSettings(config: Config = appConfig): DownloaderSettings {
  return Object.freeze({
    binary: config.YTDLP_PATH,
    outputRoot: path.resolve(config.DOWNLOAD_DIR),
    versionTimeoutMs: VERSION_TIMEOUT_MS,
    metadata: {
      maxAttempts: MAX_ATTEMPTS,
      delayMs: METADATA_RETRY_DELAY_MS,
      timeoutMs: METADATA_TIMEOUT_MS,
    },
    download: {
      maxAttempts: MAX_ATTEMPTS,
      delayMs: DOWNLOAD_RETRY_DELAY_MS,
      videoTimeoutMs: config.DOWNLOAD_TIMEOUT_SECONDS * 1000,
      playlistTimeoutMs: config.PLAYLIST_TIMEOUT_SECONDS * 1000,
    },
    batchDelayMs: BATCH_DELAY_MS,
  });
}
