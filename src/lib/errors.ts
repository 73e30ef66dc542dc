/**
 * SDK Errors
 * 統一錯誤型別 - 以 kind 分類，保留 cause 鏈供判斷
 */

export enum ErrorKind {
  CONNECTION_FAILED = 'connection_failed',
  TOKEN_RETRIEVAL_FAILED = 'token_retrieval_failed',
  TOKEN_CACHE_NOT_FOUND = 'token_cache_not_found',
  UNEXPECTED_STATUS = 'unexpected_status',
  CLIENT_CREATION_FAILED = 'client_creation_failed',
  RESOURCE_CLOSE_FAILED = 'resource_close_failed',
}

/**
 * SDK 錯誤
 * 訊息不得包含 token 或 client secret
 */
export class SdkError extends Error {
  readonly kind: ErrorKind;
  /** HTTP 狀態碼（僅 UNEXPECTED_STATUS） */
  readonly statusCode?: number;

  constructor(
    kind: ErrorKind,
    message: string,
    options: { cause?: unknown; statusCode?: number } = {}
  ) {
    super(redact(message), options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SdkError';
    this.kind = kind;
    this.statusCode = options.statusCode;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      statusCode: this.statusCode,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

function redact(message: string): string {
  return message
    .replace(/\bBearer\s+[A-Za-z0-9._~+/-]+=*/gi, 'Bearer [REDACTED]')
    .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
    .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]');
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function connectionError(message: string, cause?: unknown): SdkError {
  const text = cause === undefined ? message : `${message}: ${describe(cause)}`;
  return new SdkError(ErrorKind.CONNECTION_FAILED, text, { cause });
}

export function tokenError(message: string, cause?: unknown): SdkError {
  const text = cause === undefined ? message : `${message}: ${describe(cause)}`;
  return new SdkError(ErrorKind.TOKEN_RETRIEVAL_FAILED, text, { cause });
}

export function tokenCacheError(message: string): SdkError {
  return new SdkError(ErrorKind.TOKEN_CACHE_NOT_FOUND, message);
}

export function statusError(statusCode: number, message: string, cause?: unknown): SdkError {
  return new SdkError(ErrorKind.UNEXPECTED_STATUS, `${message}: status code ${statusCode}`, {
    cause,
    statusCode,
  });
}

export function clientCreationError(message: string, cause?: unknown): SdkError {
  const text = cause === undefined ? message : `${message}: ${describe(cause)}`;
  return new SdkError(ErrorKind.CLIENT_CREATION_FAILED, text, { cause });
}

export function resourceCloseError(message: string, cause?: unknown): SdkError {
  const text = cause === undefined ? message : `${message}: ${describe(cause)}`;
  return new SdkError(ErrorKind.RESOURCE_CLOSE_FAILED, text, { cause });
}

/**
 * 沿 cause 鏈尋找指定 kind
 */
export function hasErrorKind(error: unknown, kind: ErrorKind): boolean {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof SdkError && current.kind === kind) {
      return true;
    }
    seen.add(current);
    current = current.cause;
  }

  return false;
}

export function isConnectionError(error: unknown): boolean {
  return hasErrorKind(error, ErrorKind.CONNECTION_FAILED);
}

export function isTokenError(error: unknown): boolean {
  return hasErrorKind(error, ErrorKind.TOKEN_RETRIEVAL_FAILED);
}

export function isTokenCacheError(error: unknown): boolean {
  return hasErrorKind(error, ErrorKind.TOKEN_CACHE_NOT_FOUND);
}

export function isStatusError(error: unknown): boolean {
  return hasErrorKind(error, ErrorKind.UNEXPECTED_STATUS);
}

export function isClientCreationError(error: unknown): boolean {
  return hasErrorKind(error, ErrorKind.CLIENT_CREATION_FAILED);
}

export function isResourceCloseError(error: unknown): boolean {
  return hasErrorKind(error, ErrorKind.RESOURCE_CLOSE_FAILED);
}

/**
 * 找出 cause 鏈上的 HTTP 狀態碼
 */
export function findStatusCode(error: unknown): number | undefined {
  let current: unknown = error;
  const seen = new Set<unknown>();

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof SdkError && current.statusCode !== undefined) {
      return current.statusCode;
    }
    seen.add(current);
    current = current.cause;
  }

  return undefined;
}
