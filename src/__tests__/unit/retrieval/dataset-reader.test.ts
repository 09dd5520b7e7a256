/**
 * Dataset Reader Tests
 *
 * End-to-end retrieval with in-process collaborators: a temp directory as the
 * local cache, a stub name mapper and a stub remote source that serves
 * in-memory transport files.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DecodeError,
  InvalidRequestError,
  LocalReadError,
  RemoteFetchError,
} from '../../../core/errors.js';
import type {
  DatasetDecoder,
  FetchedDataset,
  FileType,
  PufNameMapper,
  RemoteDatasetSource,
  RetrievalNotice,
} from '../../../core/types.js';
import type { LogMetadata, StructuredLogger } from '../../../core/utils/logger.js';
import { DatasetReader } from '../../../retrieval/dataset-reader.js';
import { buildXport, SAMPLE_DATASET } from '../../utils/xport-builder.js';

interface RecordedLog {
  readonly level: 'debug' | 'info' | 'warn' | 'error';
  readonly message: string;
  readonly metadata?: LogMetadata;
}

function createRecordingLogger(): StructuredLogger & { readonly entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    debug: (message, metadata) => entries.push({ level: 'debug', message, metadata }),
    info: (message, metadata) => entries.push({ level: 'info', message, metadata }),
    warn: (message, metadata) => entries.push({ level: 'warn', message, metadata }),
    error: (message, metadata) => entries.push({ level: 'error', message, metadata }),
  };
}

const transport = buildXport(SAMPLE_DATASET);

function createNameMapper() {
  return {
    mapNameToIdentifier: vi.fn(async (_year: number, _type: FileType, _remote: boolean) => 'h171'),
  } satisfies PufNameMapper;
}

function createRemoteSource() {
  return {
    fetchByIdentifier: vi.fn(
      async (_identifier: string): Promise<FetchedDataset> => new Uint8Array(transport)
    ),
  } satisfies RemoteDatasetSource;
}

describe('DatasetReader', () => {
  let directory: string;
  let notices: RetrievalNotice[];
  let logger: ReturnType<typeof createRecordingLogger>;
  let nameMapper: ReturnType<typeof createNameMapper>;
  let remoteSource: ReturnType<typeof createRemoteSource>;

  function createReader(overrides: { decoder?: DatasetDecoder } = {}): DatasetReader {
    return new DatasetReader({ nameMapper, remoteSource, logger, ...overrides });
  }

  function onNotice(notice: RetrievalNotice): void {
    notices.push(notice);
  }

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'meps-reader-'));
    notices = [];
    logger = createRecordingLogger();
    nameMapper = createNameMapper();
    remoteSource = createRemoteSource();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  describe('local hit', () => {
    beforeEach(async () => {
      await writeFile(join(directory, 'h171.ssp'), transport);
    });

    it('should read from the local directory with one info notice', async () => {
      const table = await createReader().readDataset(
        { identifier: 'h171' },
        { directory, onNotice }
      );

      expect(table.rows).toEqual([
        { DUPERSID: '10001101', AGE14X: 42 },
        { DUPERSID: '10001102', AGE14X: 7 },
      ]);
      expect(notices).toEqual([
        { kind: 'info', message: `Loading h171.ssp from ${directory}`, identifier: 'h171' },
      ]);
      expect(remoteSource.fetchByIdentifier).not.toHaveBeenCalled();
      expect(nameMapper.mapNameToIdentifier).not.toHaveBeenCalled();
    });

    it('should forward the notice to the logger', async () => {
      await createReader().readDataset({ identifier: 'H171.ssp' }, { directory });

      const visible = logger.entries.filter((entry) => entry.level !== 'debug');
      expect(visible).toEqual([
        {
          level: 'info',
          message: `Loading h171.ssp from ${directory}`,
          metadata: { identifier: 'H171.ssp' },
        },
      ]);
    });

    it('should resolve year/type requests through the name mapper', async () => {
      const table = await createReader().readDataset(
        { year: 2014, type: 'FYC' },
        { directory, onNotice }
      );

      expect(table.name).toBe('H171');
      expect(nameMapper.mapNameToIdentifier).toHaveBeenCalledWith(2014, 'FYC', false);
      expect(notices.map((notice) => notice.kind)).toEqual(['info']);
    });

    it('should finish the read when the notice listener throws', async () => {
      const listener = vi.fn((_notice: RetrievalNotice): void => {
        throw new Error('listener exploded');
      });

      const table = await createReader().readDataset(
        { identifier: 'h171' },
        { directory, onNotice: listener }
      );

      expect(table.rows).toHaveLength(2);
      expect(listener).toHaveBeenCalledOnce();
      expect(logger.entries.filter((entry) => entry.level === 'error')).toEqual([
        {
          level: 'error',
          message: 'Notice listener failed',
          metadata: { identifier: 'h171', error: 'listener exploded' },
        },
      ]);
      expect(remoteSource.fetchByIdentifier).not.toHaveBeenCalled();
    });

    it('should return equal tables for repeated reads', async () => {
      const reader = createReader();

      const first = await reader.readDataset({ identifier: 'h171' }, { directory });
      const second = await reader.readDataset({ identifier: 'h171' }, { directory });

      expect(second).toEqual(first);
      expect(remoteSource.fetchByIdentifier).not.toHaveBeenCalled();
    });

    it('should not fall back to the remote source when the local file is corrupt', async () => {
      await writeFile(join(directory, 'h171.ssp'), 'not a transport file');

      const error = await createReader()
        .readDataset({ identifier: 'h171' }, { directory })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(LocalReadError);
      if (error instanceof LocalReadError) {
        expect(error.path).toBe(join(directory, 'h171.ssp'));
        expect(error.identifier).toBe('h171');
        expect(error.cause).toBeInstanceOf(DecodeError);
      }
      expect(remoteSource.fetchByIdentifier).not.toHaveBeenCalled();
    });
  });

  describe('local miss', () => {
    it('should warn once and fetch the identifier remotely', async () => {
      const table = await createReader().readDataset(
        { identifier: 'h171' },
        { directory, onNotice }
      );

      expect(table.rows).toHaveLength(2);
      expect(notices).toEqual([
        {
          kind: 'warning',
          message: 'h171.ssp not found in local directory. Downloading from MEPS website instead.',
          identifier: 'h171',
        },
      ]);
      expect(remoteSource.fetchByIdentifier).toHaveBeenCalledOnce();
      expect(remoteSource.fetchByIdentifier).toHaveBeenCalledWith('h171');
      expect(logger.entries.filter((entry) => entry.level === 'warn')).toHaveLength(1);
    });

    it('should read the file a remote source returns as a path', async () => {
      const downloaded = join(directory, 'downloads-h171.ssp');
      await writeFile(downloaded, transport);
      remoteSource.fetchByIdentifier.mockResolvedValue(downloaded);

      const table = await createReader().readDataset(
        { identifier: 'h171' },
        { directory: join(directory, 'empty') }
      );

      expect(table.variables.map((variable) => variable.name)).toEqual(['DUPERSID', 'AGE14X']);
    });

    it('should wrap remote failures in RemoteFetchError', async () => {
      remoteSource.fetchByIdentifier.mockRejectedValue(new Error('HTTP 404: Not Found'));

      const error = await createReader()
        .readDataset({ identifier: 'h999' }, { directory })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteFetchError);
      if (error instanceof RemoteFetchError) {
        expect(error.identifier).toBe('h999');
        expect(error.message).toBe('Failed to fetch h999 from remote source: HTTP 404: Not Found');
      }
    });

    it('should raise DecodeError for undecodable remote bytes', async () => {
      remoteSource.fetchByIdentifier.mockResolvedValue(new Uint8Array(16));

      await expect(
        createReader().readDataset({ identifier: 'h171' }, { directory })
      ).rejects.toBeInstanceOf(DecodeError);
    });

    it('should wrap non-decode decoder failures in DecodeError', async () => {
      const decoder: DatasetDecoder = {
        decode: vi.fn(async () => {
          throw new RangeError('offset out of range');
        }),
      };

      await expect(
        createReader({ decoder }).readDataset({ identifier: 'h171' }, { directory })
      ).rejects.toThrow('Decode failed: offset out of range');
    });
  });

  describe('remote preferred', () => {
    it('should skip the directory and pass the preference to the name mapper', async () => {
      await writeFile(join(directory, 'h171.ssp'), transport);
      const listDirectory = vi.fn(async (): Promise<readonly string[]> => ['h171.ssp']);
      const reader = new DatasetReader({ nameMapper, remoteSource, logger, listDirectory });

      await reader.readDataset(
        { year: 2014, type: 'FYC' },
        { directory, preferRemote: true, onNotice }
      );

      expect(nameMapper.mapNameToIdentifier).toHaveBeenCalledWith(2014, 'FYC', true);
      expect(listDirectory).not.toHaveBeenCalled();
      expect(remoteSource.fetchByIdentifier).toHaveBeenCalledWith('h171');
      expect(notices).toEqual([]);
    });
  });

  describe('invalid requests', () => {
    it('should throw before touching any collaborator', async () => {
      const listDirectory = vi.fn(async (): Promise<readonly string[]> => []);
      const reader = new DatasetReader({ nameMapper, remoteSource, logger, listDirectory });

      await expect(reader.readDataset({}, { directory, onNotice })).rejects.toBeInstanceOf(
        InvalidRequestError
      );

      expect(nameMapper.mapNameToIdentifier).not.toHaveBeenCalled();
      expect(listDirectory).not.toHaveBeenCalled();
      expect(remoteSource.fetchByIdentifier).not.toHaveBeenCalled();
      expect(notices).toEqual([]);
    });
  });
});
