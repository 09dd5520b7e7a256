/**
 * Commander argument parsers
 *
 * @module cli/lib/args
 */

import { InvalidArgumentError } from 'commander';
import { isOutputFormat, OUTPUT_FORMATS, type OutputFormat } from './output.js';

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

export function parseOutputFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Format must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return value;
}
