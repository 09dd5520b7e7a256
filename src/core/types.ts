/**
 * Core types for MEPS dataset retrieval
 *
 * Requests, source locations, notices, decoded tables and the ports the
 * retrieval pipeline talks to (name mapping, remote fetch, decoding).
 *
 * @module core/types
 */

// ============================================================================
// File Types
// ============================================================================

/**
 * MEPS public use file types
 *
 * - PIT: Point-in-time
 * - FYC: Full-year consolidated
 * - Conditions, Jobs, PRPL (person-round-plan)
 * - Event files: PMED, DV, OM, IP, ER, OP, OB, HH
 * - Link files: CLNK (conditions-event), RXLK (PMED-event)
 */
export const FILE_TYPES = [
  'PIT',
  'FYC',
  'Conditions',
  'Jobs',
  'PRPL',
  'PMED',
  'DV',
  'OM',
  'IP',
  'ER',
  'OP',
  'OB',
  'HH',
  'CLNK',
  'RXLK',
] as const;

export type FileType = (typeof FILE_TYPES)[number];

// ============================================================================
// Requests
// ============================================================================

/**
 * Raw caller input. Either `identifier`, or both `year` and `type`.
 */
export interface DatasetRequestInput {
  readonly identifier?: string;
  readonly year?: number;
  readonly type?: string;
}

/**
 * Validated request. Built only through createDatasetRequest().
 */
export type DatasetRequest =
  | { readonly kind: 'identifier'; readonly identifier: string }
  | { readonly kind: 'year-type'; readonly year: number; readonly type: FileType };

// ============================================================================
// Source Selection
// ============================================================================

export interface LocalSource {
  readonly kind: 'local';
  readonly directory: string;
  /** Directory entry as it exists on disk */
  readonly fileName: string;
  readonly path: string;
}

export interface RemoteSource {
  readonly kind: 'remote';
  readonly identifier: string;
}

export type SourceLocation = LocalSource | RemoteSource;

export type NoticeKind = 'info' | 'warning';

/**
 * Observational event raised during source selection
 */
export interface RetrievalNotice {
  readonly kind: NoticeKind;
  readonly message: string;
  readonly identifier: string;
}

export type NoticeListener = (notice: RetrievalNotice) => void;

// ============================================================================
// Decoded Tables
// ============================================================================

export type VariableType = 'numeric' | 'character';

export interface VariableDescriptor {
  readonly name: string;
  readonly label: string;
  readonly type: VariableType;
  /** Width in bytes inside one observation */
  readonly length: number;
  /** Byte offset inside one observation */
  readonly position: number;
  readonly format: string;
  readonly informat: string;
}

/** `null` marks a SAS missing value */
export type CellValue = number | string | null;

export type DatasetRow = Readonly<Record<string, CellValue>>;

export interface DatasetTable {
  readonly name: string;
  readonly label: string;
  readonly variables: readonly VariableDescriptor[];
  readonly rows: readonly DatasetRow[];
}

// ============================================================================
// Collaborator Ports
// ============================================================================

/**
 * Maps (year, file type) to a standardized file name such as `h171`
 */
export interface PufNameMapper {
  mapNameToIdentifier(year: number, type: FileType, remote: boolean): Promise<string>;
}

/**
 * Path to a fetched file, or its bytes
 */
export type FetchedDataset = string | Uint8Array;

/**
 * Fetches a dataset from the remote file server
 */
export interface RemoteDatasetSource {
  fetchByIdentifier(identifier: string): Promise<FetchedDataset>;
}

/**
 * Decodes transport-file bytes into a table
 */
export interface DatasetDecoder {
  decode(bytes: Uint8Array): Promise<DatasetTable>;
}
