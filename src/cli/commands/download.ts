/**
 * Download Command
 *
 * Save a MEPS file into a local directory so later `read` calls load it
 * without touching the network.
 *
 * Usage:
 *   meps-reader download <identifier> [--dir <path>]
 *
 * Examples:
 *   meps-reader download h171 --dir mydata
 */

import type { Command } from 'commander';
import { downloadDataset } from '../../retrieval/download.js';
import type { CLIContext } from '../lib/context.js';
import { formatJson } from '../lib/output.js';
import { formatDuration } from '../lib/logger.js';

export interface DownloadCommandOptions {
  readonly dir?: string;
}

export interface DownloadCommandResult {
  readonly identifier: string;
  readonly path: string;
  readonly durationMs: number;
}

export async function runDownload(
  identifier: string,
  options: DownloadCommandOptions,
  context: CLIContext
): Promise<DownloadCommandResult> {
  const { config, logger, services } = context;
  const directory = options.dir ?? config.paths.data;
  const startTime = Date.now();

  logger.commandStart('download', { identifier, directory });
  const path = await downloadDataset(identifier, directory, services.remoteSource);
  const result = { identifier, path, durationMs: Date.now() - startTime };

  if (config.json) {
    console.log(formatJson(result));
  } else {
    console.log(`Saved ${identifier} to ${path} (${formatDuration(result.durationMs)})`);
  }

  logger.commandEnd(true, { path });
  return result;
}

export function registerDownloadCommand(program: Command, getContext: () => CLIContext): void {
  program
    .command('download <identifier>')
    .description('Download a MEPS public use file into a local directory')
    .option('-d, --dir <path>', 'Target directory')
    .action(async (identifier: string, options: DownloadCommandOptions) => {
      await runDownload(identifier, options, getContext());
    });
}
