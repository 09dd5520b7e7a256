/**
 * Read Command
 *
 * Resolve a MEPS file from the local directory (or the MEPS website) and
 * print its rows.
 *
 * Usage:
 *   meps-reader read [identifier] [options]
 *
 * Options:
 *   --year <n>         Data year (with --type, instead of an identifier)
 *   --type <t>         File type: PIT|FYC|Conditions|Jobs|PRPL|PMED|DV|OM|IP|ER|OP|OB|HH|CLNK|RXLK
 *   -d, --dir <path>   Local directory with .ssp files (default: config paths.data)
 *   --web              Download from the MEPS website instead of the local directory
 *   -n, --limit <n>    Rows to print (default: 10)
 *   --format <fmt>     Output format: table|json|ndjson|csv (default: table)
 *   -o, --output <f>   Write output to a file
 *
 * Examples:
 *   meps-reader read h171 --dir mydata
 *   meps-reader read --year 2014 --type FYC --web --format csv --limit 100
 */

import type { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import type { DatasetTable, RetrievalNotice } from '../../core/types.js';
import { parseInteger, parseNonNegativeInteger, parseOutputFormat } from '../lib/args.js';
import type { CLIContext } from '../lib/context.js';
import { formatDataset, type OutputFormat } from '../lib/output.js';

export interface ReadCommandOptions {
  readonly year?: number;
  readonly type?: string;
  readonly dir?: string;
  readonly web?: boolean;
  readonly limit?: number;
  readonly format: OutputFormat;
  readonly output?: string;
}

export interface ReadCommandResult {
  readonly table: DatasetTable;
  readonly rendered: string;
  readonly notices: readonly RetrievalNotice[];
}

export const DEFAULT_ROW_LIMIT = 10;

export async function runRead(
  identifier: string | undefined,
  options: ReadCommandOptions,
  context: CLIContext
): Promise<ReadCommandResult> {
  const { config, logger, services } = context;
  const directory = options.dir ?? config.paths.data;
  const preferRemote = options.web ?? config.web;

  logger.commandStart('read', { identifier, year: options.year, type: options.type, directory, preferRemote });

  const notices: RetrievalNotice[] = [];
  const table = await services.reader.readDataset(
    { identifier, year: options.year, type: options.type },
    { directory, preferRemote, onNotice: (notice) => notices.push(notice) }
  );

  const rendered = formatDataset(table, options.format, options.limit ?? DEFAULT_ROW_LIMIT);

  if (options.output) {
    await writeFile(options.output, `${rendered}\n`, 'utf-8');
    logger.info('Output written', { path: options.output, format: options.format });
  } else {
    console.log(rendered);
  }

  logger.commandEnd(true, { rows: table.rows.length, variables: table.variables.length });
  return { table, rendered, notices };
}

export function registerReadCommand(program: Command, getContext: () => CLIContext): void {
  program
    .command('read [identifier]')
    .description('Load a MEPS public use file from a local directory or the MEPS website')
    .option('--year <n>', 'Data year (use with --type)', parseInteger)
    .option('--type <type>', 'File type, e.g. FYC, PMED, Conditions')
    .option('-d, --dir <path>', 'Local directory containing .ssp files')
    .option('--web', 'Download from the MEPS website')
    .option('-n, --limit <n>', 'Rows to print', parseNonNegativeInteger, DEFAULT_ROW_LIMIT)
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', parseOutputFormat, 'table' as const)
    .option('-o, --output <file>', 'Write output to a file')
    .action(async (identifier: string | undefined, options: ReadCommandOptions) => {
      await runRead(identifier, options, getContext());
    });
}
