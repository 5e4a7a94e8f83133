/**
 * DealRelay — Error Taxonomy
 *
 * Only ConfigError and StateStoreError may terminate the process.
 * Listener and publish failures are contained by the pipeline.
 */

export type RelayErrorCode =
  | 'CONFIG'
  | 'LISTENER'
  | 'PARSE'
  | 'PUBLISH'
  | 'STATE_STORE';

export abstract class RelayError extends Error {
  abstract readonly code: RelayErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or missing configuration. Fatal at startup.
 */
export class ConfigError extends RelayError {
  readonly code = 'CONFIG' as const;

  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/**
 * Transient connectivity problem while reading a source channel.
 */
export class ListenerError extends RelayError {
  readonly code = 'LISTENER' as const;

  constructor(
    message: string,
    readonly chatId: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * A price or discount candidate that could not be turned into a number.
 * Returned by the extractors, never thrown out of scoring.
 */
export class ParseError extends RelayError {
  readonly code = 'PARSE' as const;

  constructor(
    message: string,
    readonly input: string
  ) {
    super(message);
  }
}

/**
 * A destination send failed. Transient failures are retried,
 * permanent ones (missing rights, bad chat) are not.
 */
export class PublishError extends RelayError {
  readonly code = 'PUBLISH' as const;
  readonly transient: boolean;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: { transient: boolean; retryAfterMs?: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.transient = options.transient;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * Cursor or ledger I/O failure. Fatal: continuing could publish twice.
 */
export class StateStoreError extends RelayError {
  readonly code = 'STATE_STORE' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isFatal(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof StateStoreError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
