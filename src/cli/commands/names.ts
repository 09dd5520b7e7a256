/**
 * Names Command
 *
 * Look up standardized file names.
 *
 * Usage:
 *   meps-reader names                      List years in the name table
 *   meps-reader names --year 2014          All files for a year
 *   meps-reader names --year 2014 --type FYC
 */

import type { Command } from 'commander';
import { InvalidRequestError } from '../../core/errors.js';
import { FILE_TYPES } from '../../core/types.js';
import { isFileType } from '../../resolution/dataset-request.js';
import { parseInteger } from '../lib/args.js';
import type { CLIContext } from '../lib/context.js';
import { formatJson, formatTable } from '../lib/output.js';

export interface NamesCommandOptions {
  readonly year?: number;
  readonly type?: string;
  readonly web?: boolean;
}

export async function runNames(options: NamesCommandOptions, context: CLIContext): Promise<string> {
  const { config, logger, services } = context;
  const remote = options.web ?? config.web;
  logger.commandStart('names', { year: options.year, type: options.type, remote });

  let rendered: string;

  if (options.year === undefined) {
    if (options.type !== undefined) {
      throw new InvalidRequestError('--type requires --year');
    }
    const years = await services.registry.listYears(remote);
    rendered = config.json ? formatJson(years) : years.join('\n');
  } else if (options.type !== undefined) {
    if (!isFileType(options.type)) {
      throw new InvalidRequestError(`Unknown file type ${options.type}`, [
        `type must be one of: ${FILE_TYPES.join(', ')}`,
      ]);
    }
    const identifier = await services.registry.mapNameToIdentifier(options.year, options.type, remote);
    rendered = config.json ? formatJson({ year: options.year, type: options.type, identifier }) : identifier;
  } else {
    const files = await services.registry.lookupYear(options.year, remote);
    const rows = FILE_TYPES.flatMap((type) => {
      const identifier = files[type];
      return identifier === undefined ? [] : [{ type, identifier }];
    });
    rendered = config.json ? formatJson(rows) : formatTable(rows, ['type', 'identifier']);
  }

  console.log(rendered);
  logger.commandEnd(true);
  return rendered;
}

export function registerNamesCommand(program: Command, getContext: () => CLIContext): void {
  program
    .command('names')
    .description('Look up standardized MEPS file names by year and type')
    .option('--year <n>', 'Data year', parseInteger)
    .option('--type <type>', 'File type, e.g. FYC')
    .option('--web', 'Use the remote name table')
    .action(async (options: NamesCommandOptions) => {
      await runNames(options, getContext());
    });
}
