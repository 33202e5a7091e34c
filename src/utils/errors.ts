export type DownloadFailureKind = 'timeout' | 'connection' | 'request' | 'permission' | 'unexpected';

const CONNECTION_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ETIMEDOUT',
]);

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);

export class DownloadTimeoutError extends Error {
  constructor(
    readonly phase: 'connect' | 'read',
    readonly timeoutMs: number,
  ) {
    super(`${phase} timed out after ${timeoutMs}ms`);
    this.name = 'DownloadTimeoutError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function classifyDownloadError(error: unknown): DownloadFailureKind {
  if (error instanceof DownloadTimeoutError) {
    return 'timeout';
  }

  const code = errorCode(error);
  if (code && PERMISSION_CODES.has(code)) {
    return 'permission';
  }
  if (code === 'UND_ERR_CONNECT_TIMEOUT' || code === 'UND_ERR_HEADERS_TIMEOUT' || code === 'UND_ERR_BODY_TIMEOUT') {
    return 'timeout';
  }
  if (code && (CONNECTION_CODES.has(code) || code.startsWith('UND_ERR_'))) {
    return 'connection';
  }

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'timeout';
  }
  // fetch rejects with a bare TypeError for malformed URLs and unsupported schemes
  if (error instanceof TypeError) {
    return 'request';
  }

  return 'unexpected';
}

export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const code = errorCode(error);
  const cause = error.cause instanceof Error && error.cause.message !== error.message ? ` (${error.cause.message})` : '';
  const base = `${error.message}${cause}`;
  return code && !base.includes(code) ? `${base} [${code}]` : base;
}

function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current instanceof Error; depth += 1) {
    if (isErrnoException(current)) {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}
