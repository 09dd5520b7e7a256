/**
 * meps-reader
 *
 * Load MEPS public use files, preferring a local directory of `.ssp` files and
 * falling back to the MEPS website.
 *
 * @example
 * ```typescript
 * import { readDataset } from 'meps-reader';
 *
 * const fyc2014 = await readDataset({ year: 2014, type: 'FYC' }, { directory: 'mydata' });
 * console.log(fyc2014.rows.length);
 * ```
 */

export * from './core/types.js';
export {
  InvalidRequestError,
  LocalReadError,
  RemoteFetchError,
  DecodeError,
} from './core/errors.js';
export {
  HTTPClient,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  HTTPJSONParseError,
  createHTTPClient,
  type HTTPClientConfig,
} from './core/http-client.js';
export { createLogger, type StructuredLogger, type LogLevel } from './core/utils/logger.js';

export { createDatasetRequest, isFileType } from './resolution/dataset-request.js';
export { resolveIdentifier } from './resolution/identifier-resolver.js';
export { selectSource, type DirectoryLister } from './resolution/source-selector.js';
export { normalizeFileName, toFileStem, SSP_EXTENSION } from './resolution/file-names.js';

export {
  DatasetReader,
  createDatasetReader,
  readDataset,
  type DatasetReaderOptions,
  type ReadDatasetOptions,
} from './retrieval/dataset-reader.js';
export { downloadDataset } from './retrieval/download.js';

export {
  PufNameRegistry,
  PufNameLookupError,
  type PufNameTable,
} from './providers/puf-name-registry.js';
export {
  MepsRemoteSource,
  ArchiveContentError,
  DEFAULT_MEPS_BASE_URL,
} from './providers/meps-remote-source.js';

export { decodeXport, XportDecoder } from './formats/xport/index.js';
