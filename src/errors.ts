export type SearchErrorKind =
  | 'InvalidInput'
  | 'UnknownEngine'
  | 'PoolExhausted'
  | 'PoolClosed'
  | 'NavigationTimeout'
  | 'ExtractionFailed'
  | 'Cancelled';

/**
 * Base class for every failure the search core raises on purpose.
 * `retryable` tells callers whether the same request may succeed later.
 */
export abstract class SearchError extends Error {
  abstract readonly kind: SearchErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends SearchError {
  readonly kind = 'InvalidInput';
  readonly retryable = false;
}

export class InvalidPageError extends InvalidInputError {
  constructor(readonly page: number) {
    super(`Page must be an integer >= 1, got ${page}`);
  }
}

export class UnknownEngineError extends SearchError {
  readonly kind = 'UnknownEngine';
  readonly retryable = false;

  constructor(readonly engine: string) {
    super(`Unknown engine: ${engine}`);
  }
}

export class PoolExhaustedError extends SearchError {
  readonly kind = 'PoolExhausted';
  readonly retryable = true;

  constructor(readonly timeoutMs: number) {
    super(`No browser session became available within ${timeoutMs}ms`);
  }
}

export class PoolClosedError extends SearchError {
  readonly kind = 'PoolClosed';
  readonly retryable = false;

  constructor() {
    super('Browser session pool is shutting down');
  }
}

export class NavigationTimeoutError extends SearchError {
  readonly kind = 'NavigationTimeout';
  readonly retryable = true;

  constructor(
    readonly engine: string,
    readonly url: string,
    readonly timeoutMs: number,
    options?: { cause?: unknown },
  ) {
    super(`${engine} results page did not become ready within ${timeoutMs}ms`, options);
  }
}

export class ExtractionFailedError extends SearchError {
  readonly kind = 'ExtractionFailed';
  readonly retryable = false;

  constructor(
    readonly engine: string,
    readonly selector: string,
  ) {
    super(`${engine} results container "${selector}" not found on page`);
  }
}

export class SearchCancelledError extends SearchError {
  readonly kind = 'Cancelled';
  readonly retryable = true;

  constructor(options?: { cause?: unknown }) {
    super('Search was cancelled', options);
  }
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}

/** Playwright raises `TimeoutError` from goto, click and waitForSelector. */
export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}
