import * as fs from 'fs-extra';
import * as path from 'path';
import { parseUrlList, readUrlFile, runBatch } from '../../src/downloader/batch';
import type { DownloadOutcome, UrlHandler } from '../../src/downloader/types';
import { AppError } from '../../src/core/errors';
import { FakeRunner, makeTempDir, testContext } from '../helpers';

const URLS = [
  'https://example.com/v/1',
  'https://example.com/v/2',
  'https://example.com/v/3',
  'https://example.com/v/4',
  'https://example.com/v/5',
];

const ok: DownloadOutcome = { success: true, file: null };
const failed: DownloadOutcome = { success: false, error: 'ERR_DOWNLOAD_FAILED', message: 'failed' };

describe('parseUrlList', () => {
  it('drops blank lines and comments', () => {
    const content = ['# my videos', URLS[0], '', URLS[1], '   ', '  # indented comment', URLS[2]].join('\n');
    expect(parseUrlList(content)).toEqual([URLS[0], URLS[1], URLS[2]]);
  });

  it('handles CRLF line endings', () => {
    expect(parseUrlList(`${URLS[0]}\r\n${URLS[1]}\r\n`)).toEqual([URLS[0], URLS[1]]);
  });
});

describe('readUrlFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('returns the URLs of a file with comments and blank lines', async () => {
    const file = path.join(dir, 'urls.txt');
    await fs.writeFile(file, ['# queue', ...URLS.slice(0, 3), '', ...URLS.slice(3)].join('\n'));

    await expect(readUrlFile(file)).resolves.toEqual(URLS);
  });

  it('reports a missing file', async () => {
    const file = path.join(dir, 'missing.txt');

    await expect(readUrlFile(file)).rejects.toThrow(new AppError('ERR_BATCH_FILE', `File not found: ${file}`));
  });

  it('reports a file that is not UTF-8', async () => {
    const file = path.join(dir, 'latin1.txt');
    await fs.writeFile(file, Buffer.from([0x68, 0x74, 0x74, 0x70, 0xff, 0x0a]));

    await expect(readUrlFile(file)).rejects.toThrow(`File encoding error. Please use UTF-8 encoding: ${file}`);
  });
});

describe('runBatch', () => {
  function recordingHandler(results: DownloadOutcome[] = []): UrlHandler & { urls: string[] } {
    const urls: string[] = [];
    const handler: UrlHandler = async (url) => {
      urls.push(url);
      return results[urls.length - 1] ?? ok;
    };
    return Object.assign(handler, { urls });
  }

  it('processes every URL in order with a pause between items but not after the last', async () => {
    const { ctx, sleep, reporter } = testContext(new FakeRunner());
    const handle = recordingHandler([ok, failed, ok, ok, failed]);

    const summary = await runBatch(parseUrlList(['# comment', ...URLS, ''].join('\n')), ctx, { handle });

    expect(handle.urls).toEqual(URLS);
    expect(sleep.calls).toEqual([3000, 3000, 3000, 3000]);
    expect(summary).toEqual({ total: 5, succeeded: 3 });
    expect(reporter.texts('info')).toContain('Processing URL 5/5: https://example.com/v/5');
    expect(reporter.texts('info').at(-1)).toBe('Completed: 3/5 downloads successful');
  });

  it('keeps going when a handler throws', async () => {
    const { ctx, reporter } = testContext(new FakeRunner());
    let calls = 0;
    const handle: UrlHandler = async () => {
      calls += 1;
      if (calls === 1) throw new Error('boom');
      return ok;
    };

    const summary = await runBatch(URLS.slice(0, 2), ctx, { handle });

    expect(summary).toEqual({ total: 2, succeeded: 1 });
    expect(reporter.texts('error')).toEqual(['Error processing URL: boom']);
  });

  it('passes the forced playlist option to the handler', async () => {
    const { ctx } = testContext(new FakeRunner());
    const seen: Array<boolean | undefined> = [];
    const handle: UrlHandler = async (_url, _ctx, options) => {
      seen.push(options?.forcePlaylist);
      return ok;
    };

    await runBatch(URLS.slice(0, 1), ctx, { handle, forcePlaylist: true });

    expect(seen).toEqual([true]);
  });

  it('reports an empty list without processing anything', async () => {
    const { ctx, reporter } = testContext(new FakeRunner());
    const handle = recordingHandler();

    await expect(runBatch([], ctx, { handle })).resolves.toEqual({ total: 0, succeeded: 0 });
    expect(handle.urls).toEqual([]);
    expect(reporter.texts('warning')).toEqual(['No URLs found in the file']);
  });

  it('stops once the run is interrupted', async () => {
    const { ctx, sleep } = testContext(new FakeRunner());
    const controller = new AbortController();
    const handle: UrlHandler = async () => {
      controller.abort();
      return ok;
    };

    const summary = await runBatch(URLS, { ...ctx, signal: controller.signal }, { handle });

    expect(summary).toEqual({ total: 5, succeeded: 1 });
    expect(sleep.calls).toEqual([]);
  });
});
