import { ERROR_CODES, type ErrorCode } from '../core/errors';

export interface ProgressInfo {
  percent: number;
  total?: string;
  speed?: string;
  eta?: string;
}

/**
 * One line of yt-dlp output. Rules are tried in this order and the first
 * match wins:
 *
 * 1. `error`: starts with `ERROR`
 * 2. `warning`: starts with `WARNING`
 * 3. `playlist-item`: `Downloading video N of M` / `Downloading item N of M`
 * 4. `complete`: a `[download]` line with a standalone `100%`
 * 5. `progress`: a `[download]` line with a percentage, or any line with `ETA` or a percentage
 * 6. `info`: anything else
 */
export type ClassifiedLine =
  | { kind: 'error'; text: string }
  | { kind: 'warning'; text: string }
  | { kind: 'playlist-item'; text: string; index: number; count: number }
  | { kind: 'complete'; text: string; progress?: ProgressInfo }
  | { kind: 'progress'; text: string; progress?: ProgressInfo }
  | { kind: 'info'; text: string };

const ERROR_RE = /^ERROR\b/;
const WARNING_RE = /^WARNING\b/;
const PLAYLIST_ITEM_RE = /Downloading (?:video|item) (\d+) of (\d+)/;
const COMPLETE_RE = /(?:^|\s)100%(?:\s|$)/;
const PERCENT_RE = /(\d{1,3}(?:\.\d+)?)%/;
const ETA_RE = /\bETA\b/;
const DETAIL_RE = /(\d{1,3}(?:\.\d+)?)%\s+of\s+~?\s*(\S+)(?:\s+at\s+(\S+))?(?:\s+ETA\s+(\S+))?/;
const DOWNLOAD_MARKER = '[download]';

export function parseProgress(line: string): ProgressInfo | undefined {
  const detail = DETAIL_RE.exec(line);
  if (detail) {
    const info: ProgressInfo = { percent: Number(detail[1]) };
    if (detail[2]) info.total = detail[2];
    if (detail[3]) info.speed = detail[3];
    if (detail[4]) info.eta = detail[4];
    return info;
  }
  const percent = PERCENT_RE.exec(line);
  return percent ? { percent: Number(percent[1]) } : undefined;
}

export function classifyLine(line: string): ClassifiedLine {
  const text = line.trim();

  if (ERROR_RE.test(text)) return { kind: 'error', text };
  if (WARNING_RE.test(text)) return { kind: 'warning', text };

  const item = PLAYLIST_ITEM_RE.exec(text);
  if (item) {
    return { kind: 'playlist-item', text, index: Number(item[1]), count: Number(item[2]) };
  }

  const isDownloadLine = text.includes(DOWNLOAD_MARKER);
  if (isDownloadLine && COMPLETE_RE.test(text)) {
    const progress = parseProgress(text);
    return progress ? { kind: 'complete', text, progress } : { kind: 'complete', text };
  }

  if (PERCENT_RE.test(text) || ETA_RE.test(text)) {
    const progress = parseProgress(text);
    return progress ? { kind: 'progress', text, progress } : { kind: 'progress', text };
  }

  return { kind: 'info', text };
}

/** Best guess at why yt-dlp failed, from the text of its ERROR lines. */
export function mapYtDlpError(output: string): ErrorCode | null {
  const s = output.toLowerCase();
  if (s.includes('http error 429') || s.includes('too many requests') || s.includes('rate limit')) {
    return ERROR_CODES.ERR_RATE_LIMITED;
  }
  if (
    s.includes('login') ||
    s.includes('private') ||
    s.includes('sign in') ||
    s.includes('age-restricted') ||
    s.includes('members-only')
  ) {
    return ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED;
  }
  if (s.includes('in your country') || s.includes('geo restrict') || s.includes('geo-restrict')) {
    return ERROR_CODES.ERR_GEO_BLOCKED;
  }
  if (s.includes('unsupported url') || s.includes('no video formats') || s.includes('video unavailable')) {
    return ERROR_CODES.ERR_UNSUPPORTED_URL;
  }
  return null;
}
