/**
 * MEPS Reader Error Types
 *
 * Every fatal retrieval condition maps to one of these classes. Warnings
 * (local miss, falling back to remote) are notices, not errors.
 */

/**
 * Request had neither an identifier nor a complete (year, type) pair.
 * Thrown before any filesystem or network access.
 */
export class InvalidRequestError extends Error {
  /**
   * @param message - Human-readable error message
   * @param issues - Individual validation problems, if any
   */
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'InvalidRequestError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidRequestError);
    }
  }
}

/**
 * A local file was chosen but could not be read or decoded.
 *
 * RECOVERY:
 * - Remove or replace the damaged file in the local directory
 * - Re-run with preferRemote to bypass the local copy
 */
export class LocalReadError extends Error {
  readonly path: string;
  readonly identifier: string;
  readonly cause: Error;

  constructor(path: string, identifier: string, cause: Error) {
    super(`Failed to read ${path}: ${cause.message}`);
    this.name = 'LocalReadError';
    this.path = path;
    this.identifier = identifier;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LocalReadError);
    }
  }
}

/**
 * The remote fetch collaborator failed. Not retried at this layer.
 */
export class RemoteFetchError extends Error {
  readonly identifier: string;
  readonly cause: Error;

  constructor(identifier: string, cause: Error) {
    super(`Failed to fetch ${identifier} from remote source: ${cause.message}`);
    this.name = 'RemoteFetchError';
    this.identifier = identifier;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RemoteFetchError);
    }
  }
}

/**
 * Bytes were obtained but are not a valid transport file
 */
export class DecodeError extends Error {
  readonly reason: string;
  /** Byte offset where decoding stopped, when known */
  readonly offset?: number;

  constructor(reason: string, offset?: number) {
    super(offset === undefined ? `Decode failed: ${reason}` : `Decode failed at byte ${offset}: ${reason}`);
    this.name = 'DecodeError';
    this.reason = reason;
    this.offset = offset;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DecodeError);
    }
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
