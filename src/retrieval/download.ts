/**
 * Save a MEPS file into a local directory so later reads are cache hits
 *
 * @module retrieval/download
 */

import { InvalidRequestError, RemoteFetchError, toError } from '../core/errors.js';
import { MepsRemoteSource } from '../providers/meps-remote-source.js';
import { IdentifierSchema } from '../resolution/dataset-request.js';

/**
 * Download `<identifier>.ssp` into `directory`
 *
 * @returns Path of the written file
 * @throws {InvalidRequestError} For an empty identifier
 * @throws {RemoteFetchError} If the download or extraction fails
 */
export async function downloadDataset(
  identifier: string,
  directory: string,
  source: MepsRemoteSource = new MepsRemoteSource()
): Promise<string> {
  const parsed = IdentifierSchema.safeParse(identifier);
  if (!parsed.success) {
    throw new InvalidRequestError(
      'Invalid dataset identifier',
      parsed.error.issues.map((issue) => issue.message)
    );
  }

  try {
    return await source.download(identifier, directory);
  } catch (error) {
    throw new RemoteFetchError(identifier, toError(error));
  }
}
