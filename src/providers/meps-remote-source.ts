/**
 * MEPS Website Remote Source
 *
 * Downloads `<id>ssp.zip` from the MEPS public use file server, extracts the
 * `.ssp` transport file and writes it to a download directory.
 *
 * Retry and timeout policy belongs to the HTTP client; the retrieval
 * pipeline calls fetchByIdentifier once per request.
 */

import AdmZip from 'adm-zip';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RemoteDatasetSource } from '../core/types.js';
import { getHTTPClient, type HTTPClient } from '../core/http-client.js';
import { atomicWriteBuffer } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { SSP_EXTENSION, toFileStem } from '../resolution/file-names.js';

const logger = createLogger({ module: 'providers/meps-remote-source' });

export const DEFAULT_MEPS_BASE_URL = 'https://meps.ahrq.gov/mepsweb/data_files/pufs';

export const DEFAULT_DOWNLOAD_DIR = join(tmpdir(), 'meps-reader');

/**
 * Downloaded archive has no transport file inside
 */
export class ArchiveContentError extends Error {
  readonly source: string;

  constructor(source: string, entries: readonly string[]) {
    super(`No ${SSP_EXTENSION} file in archive ${source} (entries: ${entries.join(', ') || 'none'})`);
    this.name = 'ArchiveContentError';
    this.source = source;
  }
}

/**
 * Extract the first `.ssp` member of a zip archive
 *
 * @throws {ArchiveContentError} If the archive holds no `.ssp` file
 */
export function extractTransportFile(archive: Uint8Array, source: string): Buffer {
  const zip = new AdmZip(Buffer.from(archive.buffer, archive.byteOffset, archive.byteLength));
  const entries = zip.getEntries().filter((entry) => !entry.isDirectory);
  const transport = entries.find((entry) =>
    entry.entryName.toLowerCase().endsWith(SSP_EXTENSION)
  );

  if (!transport) {
    throw new ArchiveContentError(source, entries.map((entry) => entry.entryName));
  }

  return transport.getData();
}

export interface MepsRemoteSourceOptions {
  readonly baseUrl?: string;
  /** Where fetchByIdentifier() stores files (default: OS temp dir) */
  readonly downloadDir?: string;
  readonly httpClient?: HTTPClient;
}

export class MepsRemoteSource implements RemoteDatasetSource {
  private readonly baseUrl: string;
  private readonly downloadDir: string;
  private readonly httpClient: HTTPClient;

  constructor(options: MepsRemoteSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_MEPS_BASE_URL).replace(/\/+$/, '');
    this.downloadDir = options.downloadDir ?? DEFAULT_DOWNLOAD_DIR;
    this.httpClient = options.httpClient ?? getHTTPClient();
  }

  /**
   * @example
   * source.archiveUrl('H171') // 'https://meps.ahrq.gov/mepsweb/data_files/pufs/h171ssp.zip'
   */
  archiveUrl(identifier: string): string {
    return `${this.baseUrl}/${toFileStem(identifier)}ssp.zip`;
  }

  async fetchByIdentifier(identifier: string): Promise<string> {
    return this.download(identifier, this.downloadDir);
  }

  /**
   * Download and extract a file into `directory` as `<id>.ssp`
   *
   * @returns Path of the written transport file
   */
  async download(identifier: string, directory: string): Promise<string> {
    const url = this.archiveUrl(identifier);
    const startTime = Date.now();

    logger.info('Downloading MEPS archive', { identifier, url });
    const archive = await this.httpClient.fetchBytes(url);
    const data = extractTransportFile(archive, url);

    const target = join(directory, `${toFileStem(identifier)}${SSP_EXTENSION}`);
    await atomicWriteBuffer(target, data);

    logger.info('Saved MEPS transport file', {
      identifier,
      path: target,
      bytes: data.length,
      durationMs: Date.now() - startTime,
    });
    return target;
  }
}
