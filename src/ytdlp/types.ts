import type { ErrorCode } from '../core/errors';

export type DownloadKind = 'video' | 'playlist';

export interface VideoMetadata {
  title: string;
  uploader: string;
  /** Seconds; 0 when unknown. */
  duration: number;
  viewCount: number;
  uploadDate: string;
  description: string;
  webpageUrl: string;
  /** yt-dlp extractor name, used for the per-platform directory. */
  platform: string;
}

export interface LocatedFile {
  path: string;
  name: string;
  size: number;
  match: 'exact' | 'partial' | 'newest';
}

export interface PlaylistCounters {
  attempted: number;
  completed: number;
}

export type SupervisedRun =
  | { success: true; attempts: number; playlist?: PlaylistCounters }
  | { success: false; attempts: number; error: ErrorCode; playlist?: PlaylistCounters };
