/**
 * Dataset request validation
 *
 * Turns loose caller input into the DatasetRequest union. This is the only
 * place a request is built, and it runs before any I/O.
 *
 * @module resolution/dataset-request
 */

import { z } from 'zod';
import { InvalidRequestError } from '../core/errors.js';
import {
  FILE_TYPES,
  type DatasetRequest,
  type DatasetRequestInput,
  type FileType,
} from '../core/types.js';

/** First year MEPS public use files were released */
export const FIRST_PUF_YEAR = 1996;

export const IdentifierSchema = z
  .string()
  .trim()
  .min(1, 'identifier must not be empty');

export const YearSchema = z
  .number()
  .int('year must be an integer')
  .min(FIRST_PUF_YEAR, `year must be ${FIRST_PUF_YEAR} or later`);

export const FileTypeSchema = z.enum(FILE_TYPES, {
  errorMap: () => ({ message: `type must be one of: ${FILE_TYPES.join(', ')}` }),
});

/**
 * Validate caller input into a DatasetRequest
 *
 * An identifier takes precedence: when one is given, year and type are not
 * inspected at all.
 *
 * @throws {InvalidRequestError} When neither shape is fully populated or a
 *   supplied value is malformed
 */
export function createDatasetRequest(input: DatasetRequestInput): DatasetRequest {
  if (input.identifier !== undefined) {
    const identifier = IdentifierSchema.safeParse(input.identifier);
    if (!identifier.success) {
      throw new InvalidRequestError(
        'Invalid dataset identifier',
        identifier.error.issues.map((issue) => issue.message)
      );
    }
    // Returned as given; normalization only happens for local matching
    return { kind: 'identifier', identifier: input.identifier };
  }

  if (input.year === undefined || input.type === undefined) {
    throw new InvalidRequestError('Must specify either file or year and type');
  }

  const issues: string[] = [];
  const year = YearSchema.safeParse(input.year);
  const type = FileTypeSchema.safeParse(input.type);

  if (!year.success) {
    issues.push(...year.error.issues.map((issue) => issue.message));
  }
  if (!type.success) {
    issues.push(...type.error.issues.map((issue) => issue.message));
  }

  if (!year.success || !type.success) {
    throw new InvalidRequestError(`Invalid year/type request: ${issues.join('; ')}`, issues);
  }

  return { kind: 'year-type', year: year.data, type: type.data };
}

/**
 * Type guard for FileType strings (CLI input, config files)
 */
export function isFileType(value: string): value is FileType {
  return FileTypeSchema.safeParse(value).success;
}
