import execa from 'execa';
import * as readline from 'readline';
import { finished } from 'stream/promises';
import { logger } from './logger';

export interface ExecResult {
  stdout: string;
  stderr: string;
  code: number;
  timedOut: boolean;
  durationMs: number;
}

export interface RunOptions {
  cwd?: string;
  timeout?: number;
}

export interface StreamOptions extends RunOptions {
  signal?: AbortSignal;
  onLine: (line: string) => void;
}

export interface StreamResult {
  code: number;
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
}

/**
 * Seam between the downloader and the operating system. The default
 * implementation spawns real processes through execa; tests pass a fake.
 */
export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<ExecResult>;
  stream(command: string, args: string[], options: StreamOptions): Promise<StreamResult>;
}

function isExecaError(error: unknown): error is execa.ExecaError {
  return typeof error === 'object' && error !== null && 'exitCode' in error && 'timedOut' in error;
}

function toExitCode(exitCode: number | undefined): number {
  return typeof exitCode === 'number' ? exitCode : 1;
}

export async function run(
  command: string,
  args: string[] = [],
  options: RunOptions = {}
): Promise<ExecResult> {
  const startTime = Date.now();

  logger.debug({ command, args, cwd: options.cwd, timeout: options.timeout }, 'Executing command');

  try {
    const execaOptions: execa.Options = {
      ...(options.cwd ? { cwd: options.cwd } : {}),
      ...(options.timeout ? { timeout: options.timeout } : {}),
    };

    const result = await execa(command, args, execaOptions);
    const durationMs = Date.now() - startTime;

    logger.debug(
      {
        command,
        args,
        durationMs,
        code: result.exitCode,
        stdoutLength: result.stdout.length,
        stderrLength: result.stderr.length,
      },
      'Command executed successfully'
    );

    return {
      stdout: result.stdout,
      stderr: result.stderr,
      code: result.exitCode,
      timedOut: false,
      durationMs,
    };
  } catch (error) {
    const durationMs = Date.now() - startTime;

    if (isExecaError(error)) {
      const stdout = error.stdout || '';
      const stderr = error.stderr || '';

      logger.error(
        {
          command,
          args: args.slice(0, 10),
          durationMs,
          code: error.exitCode,
          timedOut: error.timedOut,
          stdoutLength: stdout.length,
          stderrLength: stderr.length,
          stderrPreview: stderr.slice(0, 1000),
        },
        'Command execution failed'
      );

      return {
        stdout,
        stderr,
        code: toExitCode(error.exitCode),
        timedOut: error.timedOut,
        durationMs,
      };
    }

    logger.error(
      { command, args, durationMs, error: error instanceof Error ? error.message : String(error) },
      'Unexpected error during command execution'
    );

    throw error;
  }
}

/**
 * Runs a command with stdout and stderr merged, handing every output line to
 * `onLine` as it arrives. A timeout or an aborted signal kills the child and
 * stops reading its output.
 */
export async function stream(
  command: string,
  args: string[],
  options: StreamOptions
): Promise<StreamResult> {
  const startTime = Date.now();

  logger.debug({ command, args, cwd: options.cwd, timeout: options.timeout }, 'Streaming command');

  const execaOptions: execa.Options = {
    all: true,
    buffer: false,
    reject: false,
    ...(options.cwd ? { cwd: options.cwd } : {}),
    ...(options.timeout ? { timeout: options.timeout } : {}),
  };

  const subprocess = execa(command, args, execaOptions);

  const onAbort = () => subprocess.cancel();
  if (options.signal?.aborted) {
    subprocess.cancel();
  } else {
    options.signal?.addEventListener('abort', onAbort, { once: true });
  }

  const output = subprocess.all;
  const lines = output ? readline.createInterface({ input: output, crlfDelay: Infinity }) : undefined;
  lines?.on('line', options.onLine);

  try {
    const result = await subprocess;
    if (output && (result.isCanceled || result.timedOut)) {
      // Grandchildren (ffmpeg during a merge) can hold the pipe open after the kill
      subprocess.stdout?.destroy();
      subprocess.stderr?.destroy();
      output.destroy();
    } else if (output) {
      await finished(output).catch((error: unknown) => {
        logger.debug({ command, error }, 'Output stream closed before end');
      });
    }

    const durationMs = Date.now() - startTime;
    logger.debug(
      { command, durationMs, code: result.exitCode, timedOut: result.timedOut, cancelled: result.isCanceled },
      'Streamed command finished'
    );

    return {
      code: toExitCode(result.exitCode),
      timedOut: result.timedOut,
      aborted: result.isCanceled,
      durationMs,
    };
  } finally {
    lines?.close();
    options.signal?.removeEventListener('abort', onAbort);
  }
}

export const defaultRunner: ProcessRunner = { run, stream };
