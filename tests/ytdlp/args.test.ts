import * as path from 'path';
import { buildDownloadArgs, buildMetadataArgs, FORMAT_SPEC } from '../../src/ytdlp/args';

describe('yt-dlp arguments', () => {
  it('builds the single-video invocation', () => {
    expect(buildDownloadArgs('video', '/videos/youtube', 'https://example.com/watch?v=abc')).toEqual([
      '-f',
      FORMAT_SPEC,
      '--merge-output-format',
      'mp4',
      '-o',
      path.join('/videos/youtube', '%(title)s.%(ext)s'),
      '--no-warnings',
      '--newline',
      'https://example.com/watch?v=abc',
    ]);
  });

  it('nests playlist output under the playlist title', () => {
    const args = buildDownloadArgs('playlist', '/videos/Playlists/Playlist_1', 'https://example.com/playlist?list=PL1');
    expect(args[args.indexOf('-o') + 1]).toBe(
      path.join('/videos/Playlists/Playlist_1', '%(playlist_title)s', '%(title)s.%(ext)s')
    );
  });

  it('asks for JSON metadata without warnings', () => {
    expect(buildMetadataArgs('https://example.com/v/1')).toEqual(['--dump-json', '--no-warnings', 'https://example.com/v/1']);
  });
});
