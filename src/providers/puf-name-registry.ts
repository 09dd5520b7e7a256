/**
 * MEPS Public Use File Name Registry
 *
 * Maps (year, file type) to standardized file names such as `h171`. The
 * bundled table lives in data/puf-names.json; a remote table with the same
 * shape can be configured and is consulted when the caller prefers remote
 * sources. Each table is loaded once per registry.
 *
 * Table shape:
 * ```json
 * { "years": [ { "year": 2014, "files": { "FYC": "h171", "PMED": "h168a" } } ] }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { FileType, PufNameMapper } from '../core/types.js';
import { getHTTPClient, type HTTPClient } from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';
import { packageFile } from '../core/utils/package-paths.js';

const logger = createLogger({ module: 'providers/puf-name-registry' });

// ============================================================================
// Schema
// ============================================================================

export const PufNameTableSchema = z.object({
  source: z.string().optional(),
  years: z.array(
    z.object({
      year: z.number().int(),
      files: z.record(z.string(), z.string().min(1)),
    })
  ),
});

export type PufNameTable = z.infer<typeof PufNameTableSchema>;

// ============================================================================
// Errors
// ============================================================================

/**
 * No file name is registered for the requested (year, type)
 */
export class PufNameLookupError extends Error {
  readonly year: number;
  readonly type: FileType;

  constructor(year: number, type: FileType, tableSource: string) {
    super(`No ${type} file registered for ${year} in ${tableSource}`);
    this.name = 'PufNameLookupError';
    this.year = year;
    this.type = type;
  }
}

// ============================================================================
// Registry
// ============================================================================

export interface PufNameRegistryOptions {
  /** Local table path (default: bundled data/puf-names.json) */
  readonly tablePath?: string;
  /** Remote table URL, used when remote lookups are requested */
  readonly remoteUrl?: string;
  readonly httpClient?: HTTPClient;
}

export class PufNameRegistry implements PufNameMapper {
  private readonly tablePath?: string;
  private readonly remoteUrl?: string;
  private readonly httpClient: HTTPClient;
  private localTable: Promise<PufNameTable> | null = null;
  private remoteTable: Promise<PufNameTable> | null = null;

  constructor(options: PufNameRegistryOptions = {}) {
    this.tablePath = options.tablePath;
    this.remoteUrl = options.remoteUrl;
    this.httpClient = options.httpClient ?? getHTTPClient();
  }

  /**
   * @throws {PufNameLookupError} If the table has no entry for (year, type)
   */
  async mapNameToIdentifier(year: number, type: FileType, remote: boolean): Promise<string> {
    const files = await this.lookupYear(year, remote);
    const identifier = files[type];

    if (identifier === undefined) {
      throw new PufNameLookupError(year, type, this.describeSource(remote));
    }

    logger.debug('Mapped PUF name', { year, type, identifier });
    return identifier;
  }

  /**
   * All registered file names for one year (empty when the year is unknown)
   */
  async lookupYear(year: number, remote = false): Promise<Readonly<Partial<Record<string, string>>>> {
    const table = await this.loadTable(remote);
    return table.years.find((entry) => entry.year === year)?.files ?? {};
  }

  /**
   * Years present in the table, ascending
   */
  async listYears(remote = false): Promise<number[]> {
    const table = await this.loadTable(remote);
    return table.years.map((entry) => entry.year).sort((a, b) => a - b);
  }

  private describeSource(remote: boolean): string {
    return remote && this.remoteUrl ? this.remoteUrl : this.localTablePath();
  }

  // Resolved on first use so constructing a registry touches no files
  private localTablePath(): string {
    return this.tablePath ?? packageFile('data', 'puf-names.json');
  }

  private loadTable(remote: boolean): Promise<PufNameTable> {
    const remoteUrl = this.remoteUrl;
    if (remote && remoteUrl) {
      if (!this.remoteTable) {
        this.remoteTable = this.fetchRemoteTable(remoteUrl).catch((error: unknown) => {
          this.remoteTable = null;
          throw error;
        });
      }
      return this.remoteTable;
    }

    if (!this.localTable) {
      this.localTable = this.readLocalTable().catch((error: unknown) => {
        this.localTable = null;
        throw error;
      });
    }
    return this.localTable;
  }

  private async readLocalTable(): Promise<PufNameTable> {
    const content = await readFile(this.localTablePath(), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return PufNameTableSchema.parse(parsed);
  }

  private async fetchRemoteTable(url: string): Promise<PufNameTable> {
    logger.info('Fetching PUF name table', { url });
    const data = await this.httpClient.fetchJSON<unknown>(url);
    return PufNameTableSchema.parse(data);
  }
}
