import type { ErrorCode } from '../core/errors';
import type { DownloaderContext } from '../core/context';
import type { DownloadKind, LocatedFile, PlaylistCounters } from '../ytdlp/types';

export interface DownloadTask {
  readonly url: string;
  readonly kind: DownloadKind;
}

export type DownloadOutcome =
  | { success: true; file: LocatedFile | null; playlist?: PlaylistCounters }
  | { success: false; error: ErrorCode; message: string };

export interface ProcessOptions {
  /** Skip classification and hand the URL to the playlist path. */
  forcePlaylist?: boolean;
}

export type UrlHandler = (url: string, ctx: DownloaderContext, options?: ProcessOptions) => Promise<DownloadOutcome>;

export interface BatchSummary {
  total: number;
  succeeded: number;
}
