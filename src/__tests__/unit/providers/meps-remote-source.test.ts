/**
 * MEPS Remote Source Tests
 *
 * The HTTP client is stubbed; archives are built in memory with adm-zip.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import AdmZip from 'adm-zip';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { HTTPClient, HTTPError } from '../../../core/http-client.js';
import {
  ArchiveContentError,
  MepsRemoteSource,
  extractTransportFile,
} from '../../../providers/meps-remote-source.js';
import { buildXport, SAMPLE_DATASET } from '../../utils/xport-builder.js';

function zipOf(entries: Record<string, Buffer>): Buffer {
  const zip = new AdmZip();
  for (const [name, data] of Object.entries(entries)) {
    zip.addFile(name, data);
  }
  return zip.toBuffer();
}

describe('extractTransportFile', () => {
  it('should return the .ssp member of an archive', () => {
    const transport = buildXport(SAMPLE_DATASET);
    const archive = zipOf({ 'README.txt': Buffer.from('notes'), 'H171.SSP': transport });

    expect(extractTransportFile(archive, 'h171ssp.zip').equals(transport)).toBe(true);
  });

  it('should throw ArchiveContentError when no .ssp member exists', () => {
    const archive = zipOf({ 'h171.dat': Buffer.from('fixed width') });

    expect(() => extractTransportFile(archive, 'h171ssp.zip')).toThrow(ArchiveContentError);
    expect(() => extractTransportFile(archive, 'h171ssp.zip')).toThrow(
      'No .ssp file in archive h171ssp.zip (entries: h171.dat)'
    );
  });
});

describe('MepsRemoteSource', () => {
  let directory: string;
  let httpClient: HTTPClient;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'meps-remote-'));
    httpClient = new HTTPClient({ maxRetries: 0 });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it('should build archive URLs from lower-cased stems', () => {
    const source = new MepsRemoteSource({ httpClient });

    expect(source.archiveUrl('H171')).toBe(
      'https://meps.ahrq.gov/mepsweb/data_files/pufs/h171ssp.zip'
    );
    expect(source.archiveUrl('h168if1.ssp')).toBe(
      'https://meps.ahrq.gov/mepsweb/data_files/pufs/h168if1ssp.zip'
    );
  });

  it('should strip trailing slashes from a configured base URL', () => {
    const source = new MepsRemoteSource({ baseUrl: 'https://mirror.example.test/pufs//', httpClient });

    expect(source.archiveUrl('h171')).toBe('https://mirror.example.test/pufs/h171ssp.zip');
  });

  it('should download, extract and write <id>.ssp into the directory', async () => {
    const transport = buildXport(SAMPLE_DATASET);
    const fetchBytes = vi
      .spyOn(httpClient, 'fetchBytes')
      .mockResolvedValue(new Uint8Array(zipOf({ 'h171.ssp': transport })));
    const source = new MepsRemoteSource({ httpClient });

    const path = await source.download('H171', directory);

    expect(path).toBe(join(directory, 'h171.ssp'));
    expect(fetchBytes).toHaveBeenCalledWith(
      'https://meps.ahrq.gov/mepsweb/data_files/pufs/h171ssp.zip'
    );
    expect((await readFile(path)).equals(transport)).toBe(true);
    expect(await readdir(directory)).toEqual(['h171.ssp']);
  });

  it('should fetch into the download directory for retrieval requests', async () => {
    vi.spyOn(httpClient, 'fetchBytes').mockResolvedValue(
      new Uint8Array(zipOf({ 'h171.ssp': buildXport(SAMPLE_DATASET) }))
    );
    const downloadDir = join(directory, 'cache');
    const source = new MepsRemoteSource({ httpClient, downloadDir });

    await expect(source.fetchByIdentifier('h171')).resolves.toBe(join(downloadDir, 'h171.ssp'));
  });

  it('should leave nothing behind when the archive has no transport file', async () => {
    vi.spyOn(httpClient, 'fetchBytes').mockResolvedValue(
      new Uint8Array(zipOf({ 'h171.txt': Buffer.from('not a transport file') }))
    );
    const source = new MepsRemoteSource({ httpClient });

    await expect(source.download('h171', directory)).rejects.toBeInstanceOf(ArchiveContentError);
    expect(await readdir(directory)).toEqual([]);
  });

  it('should propagate HTTP failures', async () => {
    vi.spyOn(httpClient, 'fetchBytes').mockRejectedValue(
      new HTTPError('HTTP 404: Not Found', 404, 'https://meps.ahrq.gov/mepsweb/data_files/pufs/h999ssp.zip')
    );
    const source = new MepsRemoteSource({ httpClient });

    await expect(source.download('h999', directory)).rejects.toThrow('HTTP 404: Not Found');
  });
});
