/**
 * Store Errors
 */

/**
 * The external store could not execute a primitive (unreachable, retries
 * exhausted, or the command itself was rejected)
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

/**
 * Stored bytes could not be decoded into the requested type
 */
export class DecodeError extends Error {
  readonly key: string;
  readonly raw: string;

  constructor(key: string, raw: string, expected: string) {
    super(`Value at ${key} is not a valid ${expected}: '${raw}'`);
    this.name = 'DecodeError';
    this.key = key;
    this.raw = raw;
  }
}

/**
 * Value cannot be persisted verbatim
 */
export class InvalidValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidValueError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
