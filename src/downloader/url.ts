import type { DownloadKind } from '../ytdlp/types';
import type { DownloadTask } from './types';

const HTTP_SCHEME = /^https?:\/\//i;
const PLAYLIST_QUERY_MARKER = 'list=';

export function isValidUrl(url: string): boolean {
  return HTTP_SCHEME.test(url);
}

export function classifyUrl(url: string): DownloadKind {
  if (url.toLowerCase().includes('playlist') || url.includes(PLAYLIST_QUERY_MARKER)) {
    return 'playlist';
  }
  return 'video';
}

/** `null` when the URL is not http(s). */
export function toTask(url: string, forcePlaylist = false): DownloadTask | null {
  if (!isValidUrl(url)) return null;
  return { url, kind: forcePlaylist ? 'playlist' : classifyUrl(url) };
}
