import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import type { ExecResult, ProcessRunner, RunOptions, StreamOptions, StreamResult } from '../src/core/exec';
import type { DownloaderSettings } from '../src/core/settings';
import type { Sleep } from '../src/core/delay';
import type { DownloaderContext } from '../src/core/context';
import type { Reporter } from '../src/ui/console';

export interface RunCall {
  command: string;
  args: string[];
  options?: RunOptions;
}

export interface StreamCall {
  command: string;
  args: string[];
  options: StreamOptions;
}

type RunScript = (call: RunCall, index: number) => ExecResult | Promise<ExecResult>;
type StreamScript = (call: StreamCall, index: number) => StreamResult | Promise<StreamResult>;

/** In-process stand-in for yt-dlp: each call is answered by a script. */
export class FakeRunner implements ProcessRunner {
  readonly runCalls: RunCall[] = [];
  readonly streamCalls: StreamCall[] = [];

  constructor(private readonly scripts: { run?: RunScript; stream?: StreamScript } = {}) {}

  async run(command: string, args: string[], options?: RunOptions): Promise<ExecResult> {
    const call: RunCall = options ? { command, args, options } : { command, args };
    this.runCalls.push(call);
    if (!this.scripts.run) throw new Error(`Unexpected run: ${command} ${args.join(' ')}`);
    return this.scripts.run(call, this.runCalls.length - 1);
  }

  async stream(command: string, args: string[], options: StreamOptions): Promise<StreamResult> {
    const call: StreamCall = { command, args, options };
    this.streamCalls.push(call);
    if (!this.scripts.stream) throw new Error(`Unexpected stream: ${command} ${args.join(' ')}`);
    return this.scripts.stream(call, this.streamCalls.length - 1);
  }
}

export function execResult(partial: Partial<ExecResult> = {}): ExecResult {
  return { stdout: '', stderr: '', code: 0, timedOut: false, durationMs: 1, ...partial };
}

export function streamResult(partial: Partial<StreamResult> = {}): StreamResult {
  return { code: 0, timedOut: false, aborted: false, durationMs: 1, ...partial };
}

/** Directory yt-dlp was told to write into, taken from the `-o` template. */
export function outputDirOf(call: StreamCall): string {
  const template = call.args[call.args.indexOf('-o') + 1] ?? '';
  return path.dirname(template);
}

export type ReporterEntryKind = 'info' | 'success' | 'warning' | 'error' | 'progress' | 'divider' | 'header' | 'clear';

export interface ReporterEntry {
  kind: ReporterEntryKind;
  text: string;
}

export interface RecordingReporter extends Reporter {
  entries: ReporterEntry[];
  texts(kind?: ReporterEntryKind): string[];
}

export function recordingReporter(): RecordingReporter {
  const entries: ReporterEntry[] = [];
  const push = (kind: ReporterEntryKind) => (text: string) => {
    entries.push({ kind, text });
  };
  return {
    entries,
    texts: (kind) => entries.filter((e) => kind === undefined || e.kind === kind).map((e) => e.text),
    info: push('info'),
    success: push('success'),
    warning: push('warning'),
    error: push('error'),
    progress: push('progress'),
    divider: () => entries.push({ kind: 'divider', text: '' }),
    header: push('header'),
    clear: () => entries.push({ kind: 'clear', text: '' }),
  };
}

export function recordingSleep(): Sleep & { calls: number[] } {
  const calls: number[] = [];
  const sleep = async (ms: number) => {
    calls.push(ms);
  };
  return Object.assign(sleep, { calls });
}

export function testSettings(overrides: Partial<DownloaderSettings> = {}): DownloaderSettings {
  return {
    binary: 'yt-dlp',
    outputRoot: path.join(os.tmpdir(), 'vidgrab-test-output'),
    versionTimeoutMs: 10_000,
    metadata: { maxAttempts: 3, delayMs: 2_000, timeoutMs: 30_000 },
    download: { maxAttempts: 3, delayMs: 3_000, videoTimeoutMs: 900_000, playlistTimeoutMs: 14_400_000 },
    batchDelayMs: 3_000,
    ...overrides,
  };
}

export interface TestContext {
  ctx: DownloaderContext;
  reporter: RecordingReporter;
  sleep: Sleep & { calls: number[] };
}

export function testContext(runner: ProcessRunner, settings: DownloaderSettings = testSettings()): TestContext {
  const reporter = recordingReporter();
  const sleep = recordingSleep();
  return { ctx: { settings, runner, reporter, sleep }, reporter, sleep };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'vidgrab-'));
}

/** Writes a file and pins its modification time (seconds since epoch). */
export async function writeFileAt(filePath: string, content: string, mtimeSeconds: number): Promise<void> {
  await fs.outputFile(filePath, content);
  await fs.utimes(filePath, mtimeSeconds, mtimeSeconds);
}
