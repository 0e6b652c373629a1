import type { ProcessRunner } from './exec';
import type { Sleep } from './delay';
import type { DownloaderSettings } from './settings';
import type { Reporter } from '../ui/console';

/** Collaborators shared by every step of a download task. */
export interface DownloaderContext {
  readonly settings: DownloaderSettings;
  readonly runner: ProcessRunner;
  readonly reporter: Reporter;
  readonly sleep: Sleep;
  /** Cancels the running yt-dlp child and any retries still pending. */
  readonly signal?: AbortSignal;
}
