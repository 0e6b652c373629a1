import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../core/logger';
import { sanitizeFilename } from '../core/fs';
import type { LocatedFile } from './types';

// Audio-only extensions are included in case yt-dlp could not merge the streams
export const MEDIA_EXTENSIONS = ['.mp4', '.mkv', '.webm', '.mov', '.avi', '.m4a', '.mp3', '.opus'];

interface Candidate {
  path: string;
  name: string;
  stem: string;
  size: number;
  mtimeMs: number;
}

/**
 * Picks the file yt-dlp most likely just wrote into `outDir`: a file named
 * exactly after the title, else the newest whose name contains the title,
 * else the newest media file. Unrelated downloads with similar titles in the
 * same directory can still be mistaken for this one.
 */
export async function findDownloadedFile(title: string, outDir: string): Promise<LocatedFile | null> {
  try {
    const files = await fs.readdir(outDir);
    const media = files.filter((f) => MEDIA_EXTENSIONS.includes(path.extname(f).toLowerCase()));
    if (media.length === 0) {
      logger.warn({ outDir }, 'No media files found in download directory');
      return null;
    }

    const stats = await Promise.all(
      media.map(async (name) => {
        const p = path.join(outDir, name);
        const st = await fs.stat(p);
        return { st, candidate: { path: p, name, stem: stemOf(name), size: st.size, mtimeMs: st.mtimeMs } };
      })
    );
    const candidates: Candidate[] = stats.filter(({ st }) => st.isFile()).map(({ candidate }) => candidate);
    candidates.sort((a, b) => b.mtimeMs - a.mtimeMs);

    const wanted = sanitizeFilename(title).toLowerCase();
    const exact = candidates.find((c) => c.stem === wanted);
    if (exact) return toLocated(exact, 'exact');
    const partial = candidates.find((c) => c.stem.includes(wanted));
    if (partial) return toLocated(partial, 'partial');
    const newest = candidates[0];
    return newest ? toLocated(newest, 'newest') : null;
  } catch (e) {
    logger.error({ error: e, outDir }, 'findDownloadedFile failed');
    return null;
  }
}

function stemOf(name: string): string {
  return sanitizeFilename(path.basename(name, path.extname(name))).toLowerCase();
}

function toLocated(candidate: Candidate, match: LocatedFile['match']): LocatedFile {
  return { path: candidate.path, name: candidate.name, size: candidate.size, match };
}
