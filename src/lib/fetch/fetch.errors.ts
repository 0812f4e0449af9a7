/**
 * Fetch Error Handling
 * Classification of remote-fetch failures
 */

export enum FetchErrorType {
  TIMEOUT = 'TIMEOUT',
  NETWORK_ERROR = 'NETWORK_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CLIENT_ERROR = 'CLIENT_ERROR',
  SERVER_ERROR = 'SERVER_ERROR',
  UNKNOWN = 'UNKNOWN',
}

export class FetchError extends Error {
  readonly type: FetchErrorType;
  readonly url: string;
  readonly statusCode?: number;
  readonly retryable: boolean;

  constructor(
    url: string,
    type: FetchErrorType,
    message: string,
    options: { statusCode?: number; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(`${message} (${url})`, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.type = type;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Map a non-success HTTP status to a FetchError
 */
export function classifyStatus(url: string, statusCode: number): FetchError {
  if (statusCode === 404) {
    return new FetchError(url, FetchErrorType.NOT_FOUND, 'Page not found', { statusCode });
  }

  if (statusCode === 429) {
    return new FetchError(url, FetchErrorType.CLIENT_ERROR, 'Rate limited by server', {
      statusCode,
      retryable: true,
    });
  }

  if (statusCode >= 500) {
    return new FetchError(url, FetchErrorType.SERVER_ERROR, `Server error ${statusCode}`, {
      statusCode,
      retryable: true,
    });
  }

  if (statusCode >= 400) {
    return new FetchError(url, FetchErrorType.CLIENT_ERROR, `Request rejected with ${statusCode}`, {
      statusCode,
    });
  }

  return new FetchError(url, FetchErrorType.UNKNOWN, `Unexpected status ${statusCode}`, { statusCode });
}

/**
 * Classify an error thrown while fetching
 */
export function classifyFetchError(url: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  const name = error instanceof Error ? error.name : '';
  const message = error instanceof Error ? error.message : String(error);
  const causeCode = readCauseCode(error);

  if (name === 'AbortError' || name === 'TimeoutError' || message.includes('timeout') || causeCode === 'ETIMEDOUT') {
    return new FetchError(url, FetchErrorType.TIMEOUT, 'Request timed out', { retryable: true, cause: error });
  }

  if (
    causeCode !== undefined ||
    message.includes('fetch failed') ||
    message.includes('ECONNREFUSED') ||
    message.includes('ENOTFOUND')
  ) {
    return new FetchError(url, FetchErrorType.NETWORK_ERROR, 'Network connection failed', {
      retryable: true,
      cause: error,
    });
  }

  return new FetchError(url, FetchErrorType.UNKNOWN, message || 'Unknown error', { cause: error });
}

// Node's fetch reports socket failures as TypeError('fetch failed') with a coded cause
function readCauseCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  const cause = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
