/**
 * Error classes shared by the client.
 *
 * Every failure surfaced by the library is an `AdeError`, so callers can
 * separate client failures from their own with a single `instanceof`.
 */

/**
 * Base class for all library errors
 */
export class AdeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Caller misconfiguration, detected before any network call
 */
export class ConfigurationError extends AdeError {
  constructor(message: string) {
    super(message);
  }
}

/**
 * Local file read failure or network-level failure (refused connection,
 * DNS, timeout, abort). The underlying error is kept as `cause`.
 */
export class TransportError extends AdeError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
  }
}

/**
 * A success response whose body is not the expected JSON
 */
export class DecodingError extends AdeError {
  body: string;

  constructor(message: string, body: string, cause?: unknown) {
    super(message, { cause });
    this.body = body;
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
