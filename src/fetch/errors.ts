/**
 * Base type for failures the fetch engine lets escape to its caller.
 *
 * Remote-side problems (rate limits, flaky responses, permanent HTTP errors)
 * never surface as exceptions; only local trouble does.
 */
export class FetchError extends Error {
  readonly operation: string;
  readonly target: string;

  constructor(operation: string, target: string, message: string, options?: { cause?: unknown }) {
    super(`${operation} ${target}: ${message}`, options);
    this.name = 'FetchError';
    this.operation = operation;
    this.target = target;
  }
}

/**
 * Thrown when the response cache cannot be read or written for a reason
 * other than a missing entry.
 */
export class CacheIOError extends FetchError {
  constructor(operation: string, target: string, options?: { cause?: unknown }) {
    super(operation, target, `cache I/O failed${describeCause(options?.cause)}`, options);
    this.name = 'CacheIOError';
  }
}

/**
 * Thrown when a response body still fails to decode after the cached entry
 * was dropped and fetched again.
 */
export class DecodeError extends FetchError {
  constructor(url: string, options?: { cause?: unknown }) {
    super('decode', url, `response body could not be decoded${describeCause(options?.cause)}`, options);
    this.name = 'DecodeError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? '' : ` (${errorMessage(cause)})`;
}
