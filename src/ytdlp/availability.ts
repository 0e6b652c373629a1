import { AppError, ERROR_CODES, getErrorMessage } from '../core/errors';
import { logger } from '../core/logger';
import type { ExecResult, ProcessRunner } from '../core/exec';
import type { DownloaderSettings } from '../core/settings';
import { buildVersionArgs } from './args';

/**
 * Makes sure yt-dlp can be launched before any work starts.
 *
 * @returns the version string reported by yt-dlp
 * @throws AppError with `ERR_TOOL_UNAVAILABLE` when it cannot be run
 */
export async function ensureYtDlpAvailable(settings: DownloaderSettings, runner: ProcessRunner): Promise<string> {
  const { binary, versionTimeoutMs } = settings;

  let result: ExecResult;
  try {
    result = await runner.run(binary, buildVersionArgs(), { timeout: versionTimeoutMs });
  } catch (error) {
    throw new AppError(ERROR_CODES.ERR_TOOL_UNAVAILABLE, `Failed to run ${binary}: ${getErrorMessage(error)}`, {
      binary,
    });
  }

  if (result.timedOut) {
    throw new AppError(ERROR_CODES.ERR_TOOL_UNAVAILABLE, `Timeout checking ${binary} version`, {
      binary,
      timeoutMs: versionTimeoutMs,
    });
  }

  if (result.code !== 0) {
    throw new AppError(ERROR_CODES.ERR_TOOL_UNAVAILABLE, `${binary} --version exited with code ${result.code}`, {
      binary,
      code: result.code,
      stderr: result.stderr.slice(0, 500),
    });
  }

  const version = result.stdout.trim();
  logger.info({ binary, version }, 'yt-dlp available');
  return version;
}
