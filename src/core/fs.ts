import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from './logger';
import { getErrorMessage } from './errors';

const FORBIDDEN_FILENAME_CHARS = /[<>:"/\\|?*]/g;
const MAX_FILENAME_LENGTH = 150;

export function sanitizeFilename(name: string): string {
  if (!name) return 'video';
  let sanitized = name.replace(FORBIDDEN_FILENAME_CHARS, '');
  if (sanitized.length > MAX_FILENAME_LENGTH) {
    sanitized = sanitized.slice(0, MAX_FILENAME_LENGTH);
  }
  sanitized = sanitized.trim();
  return sanitized.length > 0 ? sanitized : 'video';
}

export interface EnsuredDir {
  dir: string;
  fallback: boolean;
  error?: string;
}

export async function ensureOutputRoot(root: string): Promise<void> {
  try {
    await fs.ensureDir(root);
    logger.debug({ dir: root }, 'Output directory ensured');
  } catch (error) {
    logger.error({ error, dir: root }, 'Failed to ensure output directory');
    throw error;
  }
}

/**
 * Creates `dir`, or settles for `fallbackDir` when that fails. The caller
 * decides how to tell the user about the fallback.
 */
export async function ensureDirWithFallback(dir: string, fallbackDir: string): Promise<EnsuredDir> {
  try {
    await fs.ensureDir(dir);
    return { dir, fallback: false };
  } catch (error) {
    logger.warn({ error, dir, fallbackDir }, 'Failed to create directory, using fallback');
    await fs.ensureDir(fallbackDir);
    return { dir: fallbackDir, fallback: true, error: getErrorMessage(error) };
  }
}

export function platformDir(root: string, platform: string): string {
  return path.join(root, sanitizeFilename(platform));
}

export async function makePlaylistDir(root: string, now: number = Date.now()): Promise<EnsuredDir> {
  const playlistsRoot = path.join(root, 'Playlists');
  const playlistDir = path.join(playlistsRoot, `Playlist_${Math.floor(now / 1000)}`);
  return ensureDirWithFallback(playlistDir, playlistsRoot);
}
