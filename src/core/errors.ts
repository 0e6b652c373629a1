export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

export const ERROR_CODES = {
  ERR_TOOL_UNAVAILABLE: 'ERR_TOOL_UNAVAILABLE',
  ERR_INVALID_URL: 'ERR_INVALID_URL',
  ERR_TIMEOUT: 'ERR_TIMEOUT',
  ERR_DOWNLOAD_FAILED: 'ERR_DOWNLOAD_FAILED',
  ERR_PRIVATE_OR_RESTRICTED: 'ERR_PRIVATE_OR_RESTRICTED',
  ERR_GEO_BLOCKED: 'ERR_GEO_BLOCKED',
  ERR_UNSUPPORTED_URL: 'ERR_UNSUPPORTED_URL',
  ERR_RATE_LIMITED: 'ERR_RATE_LIMITED',
  ERR_CANCELLED: 'ERR_CANCELLED',
  ERR_BATCH_FILE: 'ERR_BATCH_FILE',
  ERR_INTERNAL: 'ERR_INTERNAL',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

const messages: Record<ErrorCode, string> = {
  [ERROR_CODES.ERR_TOOL_UNAVAILABLE]: 'yt-dlp is not installed or not responding. Please install it with: pip install yt-dlp',
  [ERROR_CODES.ERR_INVALID_URL]: 'Invalid URL format. Please include http:// or https://',
  [ERROR_CODES.ERR_TIMEOUT]: 'Download timed out',
  [ERROR_CODES.ERR_DOWNLOAD_FAILED]: 'Download failed after all retries',
  [ERROR_CODES.ERR_PRIVATE_OR_RESTRICTED]: 'Video is private, age-restricted, or requires login',
  [ERROR_CODES.ERR_GEO_BLOCKED]: 'Video is geo-blocked in your region',
  [ERROR_CODES.ERR_UNSUPPORTED_URL]: 'Unsupported URL or video not found',
  [ERROR_CODES.ERR_RATE_LIMITED]: 'The site is rate limiting requests. Please try again later',
  [ERROR_CODES.ERR_CANCELLED]: 'Download cancelled',
  [ERROR_CODES.ERR_BATCH_FILE]: 'Could not read the URL file',
  [ERROR_CODES.ERR_INTERNAL]: 'Internal error',
};

export function toUserMessage(error: AppError): string {
  return `${messages[error.code]} (${error.code})`;
}

export function describeErrorCode(code: ErrorCode): string {
  return messages[code];
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
