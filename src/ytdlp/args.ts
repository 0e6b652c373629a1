import * as path from 'path';
import type { DownloadKind } from './types';

export const FORMAT_SPEC = 'bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best';
export const MERGE_OUTPUT_FORMAT = 'mp4';

export function buildVersionArgs(): string[] {
  return ['--version'];
}

export function buildMetadataArgs(url: string): string[] {
  return ['--dump-json', '--no-warnings', url];
}

export function outputTemplate(kind: DownloadKind, outDir: string): string {
  return kind === 'playlist'
    ? path.join(outDir, '%(playlist_title)s', '%(title)s.%(ext)s')
    : path.join(outDir, '%(title)s.%(ext)s');
}

export function buildDownloadArgs(kind: DownloadKind, outDir: string, url: string): string[] {
  return [
    '-f',
    FORMAT_SPEC,
    '--merge-output-format',
    MERGE_OUTPUT_FORMAT,
    '-o',
    outputTemplate(kind, outDir),
    '--no-warnings',
    '--newline',
    url,
  ];
}
