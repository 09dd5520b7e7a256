/**
 * CLI exit codes
 *
 * @module cli/lib/exit-codes
 */

import { DecodeError, LocalReadError, RemoteFetchError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Invalid requests and unknown (year, type) pairs fall through to ERRORS
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof RemoteFetchError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (error instanceof DecodeError || error instanceof LocalReadError) {
    return EXIT_CODES.DATA_INTEGRITY_ERROR;
  }
  return EXIT_CODES.ERRORS;
}
