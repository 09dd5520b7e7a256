/**
 * Source Selector
 *
 * Decides whether a dataset is read from the local directory or fetched from
 * the MEPS website. A local miss is not an error: it raises one warning
 * notice and selects the remote source. An unreadable or missing directory
 * counts as a miss.
 *
 * @module resolution/source-selector
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { NoticeListener, SourceLocation } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { findMatchingEntry, normalizeFileName } from './file-names.js';

const logger = createLogger({ module: 'resolution/source-selector' });

/**
 * Lists file names in a directory
 */
export type DirectoryLister = (directory: string) => Promise<readonly string[]>;

export interface SelectSourceOptions {
  readonly directory: string;
  readonly preferRemote: boolean;
  /** Receives the info/warning notice for this selection */
  readonly onNotice?: NoticeListener;
  /** Override directory listing (tests, virtual filesystems) */
  readonly listDirectory?: DirectoryLister;
}

/**
 * List regular files (and symlinks) in a directory
 */
export const listDirectoryFiles: DirectoryLister = async (directory) => {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() || entry.isSymbolicLink())
    .map((entry) => entry.name);
};

async function listOrEmpty(
  listDirectory: DirectoryLister,
  directory: string
): Promise<readonly string[]> {
  try {
    return await listDirectory(directory);
  } catch (error) {
    logger.debug('Local directory not listable, treating as empty', {
      directory,
      error: error instanceof Error ? error.message : String(error),
    });
    return [];
  }
}

export async function selectSource(
  identifier: string,
  options: SelectSourceOptions
): Promise<SourceLocation> {
  if (options.preferRemote) {
    return { kind: 'remote', identifier };
  }

  const candidate = normalizeFileName(identifier);
  const entries = await listOrEmpty(
    options.listDirectory ?? listDirectoryFiles,
    options.directory
  );
  const match = findMatchingEntry(identifier, entries);

  if (match === null) {
    options.onNotice?.({
      kind: 'warning',
      message: `${candidate} not found in local directory. Downloading from MEPS website instead.`,
      identifier,
    });
    return { kind: 'remote', identifier };
  }

  options.onNotice?.({
    kind: 'info',
    message: `Loading ${candidate} from ${options.directory}`,
    identifier,
  });

  return {
    kind: 'local',
    directory: options.directory,
    fileName: match,
    path: join(options.directory, match),
  };
}
