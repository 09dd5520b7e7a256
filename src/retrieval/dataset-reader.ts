/**
 * Retrieval Orchestrator
 *
 * readDataset() runs one request through the pipeline:
 *
 *   validate → resolve identifier → select source → (local read | remote fetch) → decode
 *
 * Local hits never fall back to the remote source: once a local file is
 * chosen, any read or decode failure is a LocalReadError. Remote fetch
 * failures become RemoteFetchError and undecodable remote bytes DecodeError.
 * One attempt per branch; retries belong to the remote source's HTTP client.
 *
 * Notices raised during selection go to the logger and the caller's listener
 * and never change the outcome; a listener that throws is logged and ignored.
 *
 * @module retrieval/dataset-reader
 */

import { readFile } from 'node:fs/promises';
import {
  DecodeError,
  LocalReadError,
  RemoteFetchError,
  toError,
} from '../core/errors.js';
import type {
  DatasetDecoder,
  DatasetRequestInput,
  DatasetTable,
  LocalSource,
  NoticeListener,
  PufNameMapper,
  RemoteDatasetSource,
  RetrievalNotice,
} from '../core/types.js';
import { createLogger, type StructuredLogger } from '../core/utils/logger.js';
import { XportDecoder } from '../formats/xport/xport-decoder.js';
import { MepsRemoteSource } from '../providers/meps-remote-source.js';
import { PufNameRegistry } from '../providers/puf-name-registry.js';
import { createDatasetRequest } from '../resolution/dataset-request.js';
import { resolveIdentifier } from '../resolution/identifier-resolver.js';
import { selectSource, type DirectoryLister } from '../resolution/source-selector.js';

export type FileReader = (path: string) => Promise<Uint8Array>;

export interface DatasetReaderOptions {
  readonly nameMapper?: PufNameMapper;
  readonly remoteSource?: RemoteDatasetSource;
  readonly decoder?: DatasetDecoder;
  readonly logger?: StructuredLogger;
  readonly listDirectory?: DirectoryLister;
  readonly readFile?: FileReader;
}

export interface ReadDatasetOptions {
  /** Local directory holding `.ssp` files (default: current directory) */
  readonly directory?: string;
  /** Skip the local directory and fetch from the remote source (default: false) */
  readonly preferRemote?: boolean;
  readonly onNotice?: NoticeListener;
}

export class DatasetReader {
  private readonly nameMapper: PufNameMapper;
  private readonly remoteSource: RemoteDatasetSource;
  private readonly decoder: DatasetDecoder;
  private readonly logger: StructuredLogger;
  private readonly listDirectory?: DirectoryLister;
  private readonly readFile: FileReader;

  constructor(options: DatasetReaderOptions = {}) {
    this.nameMapper = options.nameMapper ?? new PufNameRegistry();
    this.remoteSource = options.remoteSource ?? new MepsRemoteSource();
    this.decoder = options.decoder ?? new XportDecoder();
    this.logger = options.logger ?? createLogger({ module: 'retrieval/dataset-reader' });
    this.listDirectory = options.listDirectory;
    this.readFile = options.readFile ?? ((path) => readFile(path));
  }

  /**
   * Resolve a request and return the decoded dataset
   *
   * @throws {InvalidRequestError} Before any I/O, when the request is incomplete
   * @throws {LocalReadError} Local file chosen but unreadable or undecodable
   * @throws {RemoteFetchError} Remote source failed
   * @throws {DecodeError} Remote bytes are not a transport file
   */
  async readDataset(
    input: DatasetRequestInput,
    options: ReadDatasetOptions = {}
  ): Promise<DatasetTable> {
    const request = createDatasetRequest(input);
    const directory = options.directory ?? '.';
    const preferRemote = options.preferRemote ?? false;

    const identifier = await resolveIdentifier(request, {
      nameMapper: this.nameMapper,
      preferRemote,
    });
    this.logger.debug('Resolved dataset identifier', { identifier, request: request.kind });

    const location = await selectSource(identifier, {
      directory,
      preferRemote,
      listDirectory: this.listDirectory,
      onNotice: (notice) => this.forwardNotice(notice, options.onNotice),
    });

    const table =
      location.kind === 'local'
        ? await this.readLocal(location, identifier)
        : await this.readRemote(identifier);

    this.logger.debug('Decoded dataset', {
      identifier,
      source: location.kind,
      variables: table.variables.length,
      rows: table.rows.length,
    });
    return table;
  }

  private async readLocal(location: LocalSource, identifier: string): Promise<DatasetTable> {
    try {
      const bytes = await this.readFile(location.path);
      return await this.decoder.decode(bytes);
    } catch (error) {
      throw new LocalReadError(location.path, identifier, toError(error));
    }
  }

  private async readRemote(identifier: string): Promise<DatasetTable> {
    let bytes: Uint8Array;
    try {
      const fetched = await this.remoteSource.fetchByIdentifier(identifier);
      bytes = typeof fetched === 'string' ? await this.readFile(fetched) : fetched;
    } catch (error) {
      throw new RemoteFetchError(identifier, toError(error));
    }

    try {
      return await this.decoder.decode(bytes);
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      throw new DecodeError(toError(error).message);
    }
  }

  private forwardNotice(notice: RetrievalNotice, listener?: NoticeListener): void {
    if (notice.kind === 'warning') {
      this.logger.warn(notice.message, { identifier: notice.identifier });
    } else {
      this.logger.info(notice.message, { identifier: notice.identifier });
    }
    if (!listener) {
      return;
    }
    try {
      listener(notice);
    } catch (error) {
      this.logger.error('Notice listener failed', {
        identifier: notice.identifier,
        error: toError(error).message,
      });
    }
  }
}

export function createDatasetReader(options?: DatasetReaderOptions): DatasetReader {
  return new DatasetReader(options);
}

let defaultReader: DatasetReader | null = null;

/**
 * Read a dataset with the default collaborators (bundled name table, MEPS
 * website, XPORT decoder)
 *
 * @example
 * ```typescript
 * const fyc2014 = await readDataset({ year: 2014, type: 'FYC' }, { directory: 'mydata' });
 * const h171 = await readDataset({ identifier: 'h171' }, { preferRemote: true });
 * ```
 */
export async function readDataset(
  input: DatasetRequestInput,
  options?: ReadDatasetOptions
): Promise<DatasetTable> {
  // Reject bad input before the default collaborators are built
  createDatasetRequest(input);
  if (!defaultReader) {
    defaultReader = new DatasetReader();
  }
  return defaultReader.readDataset(input, options);
}
