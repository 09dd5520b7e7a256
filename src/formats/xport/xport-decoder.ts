/**
 * SAS Transport (XPORT v5) Decoder
 *
 * MEPS `.ssp` files are SAS transport libraries. Layout, in 80-byte records:
 *
 *   LIBRARY header, 2 library records
 *   MEMBER header (namestr length at chars 74-77)
 *   DSCRPTR header, 2 member records (name, label)
 *   NAMESTR header (variable count at chars 54-57)
 *   NAMESTR records, 140 bytes each, blank-padded to a record boundary
 *   OBS header
 *   observations, packed, blank-padded to a record boundary
 *
 * Only the first member is decoded. An observation made entirely of blanks
 * inside the final record cannot be told apart from padding and is dropped.
 *
 * @module formats/xport/xport-decoder
 */

import { DecodeError } from '../../core/errors.js';
import type {
  CellValue,
  DatasetDecoder,
  DatasetTable,
  VariableDescriptor,
} from '../../core/types.js';
import { decodeIbmFloat } from './ibm-float.js';

// ============================================================================
// Constants
// ============================================================================

export const RECORD_LENGTH = 80;

const HEADER_PREFIX = 'HEADER RECORD*******';
const HEADER_SUFFIX = ' HEADER RECORD!!!!!!!';

export const HEADERS = {
  library: `${HEADER_PREFIX}LIBRARY${HEADER_SUFFIX}`,
  libraryV8: `${HEADER_PREFIX}LIBV8  ${HEADER_SUFFIX}`,
  member: `${HEADER_PREFIX}MEMBER ${HEADER_SUFFIX}`,
  descriptor: `${HEADER_PREFIX}DSCRPTR${HEADER_SUFFIX}`,
  namestr: `${HEADER_PREFIX}NAMESTR${HEADER_SUFFIX}`,
  observations: `${HEADER_PREFIX}OBS    ${HEADER_SUFFIX}`,
} as const;

const BLANK = 0x20;
const NUMERIC_TYPE = 1;
const CHARACTER_TYPE = 2;

// ============================================================================
// Byte Helpers
// ============================================================================

function readText(bytes: Uint8Array, start: number, length: number): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset + start, length).toString('latin1');
}

function trimBlanks(value: string): string {
  return value.replace(/[ \0]+$/, '');
}

function startsWithText(bytes: Uint8Array, offset: number, text: string): boolean {
  if (offset + text.length > bytes.length) {
    return false;
  }
  for (let i = 0; i < text.length; i++) {
    if (bytes[offset + i] !== text.charCodeAt(i)) {
      return false;
    }
  }
  return true;
}

function isBlank(bytes: Uint8Array, start: number, length: number): boolean {
  for (let i = start; i < start + length; i++) {
    if (bytes[i] !== BLANK) {
      return false;
    }
  }
  return true;
}

function roundUpToRecord(length: number): number {
  return Math.ceil(length / RECORD_LENGTH) * RECORD_LENGTH;
}

function formatName(name: string, width: number, decimals: number): string {
  if (name === '' && width === 0 && decimals === 0) {
    return '';
  }
  return `${name}${width > 0 ? width : ''}.${decimals > 0 ? decimals : ''}`;
}

// ============================================================================
// Decoder
// ============================================================================

class XportReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  decode(): DatasetTable {
    this.expectLibraryHeader();
    this.offset += 3 * RECORD_LENGTH;

    const namestrLength = this.readMemberHeader();
    this.expectHeader(HEADERS.descriptor, 'member descriptor header');
    this.requireRecords(2, 'member descriptor');
    const name = trimBlanks(readText(this.bytes, this.offset + 8, 8));
    const label = trimBlanks(readText(this.bytes, this.offset + RECORD_LENGTH + 32, 40));
    this.offset += 2 * RECORD_LENGTH;

    const variableCount = this.readNamestrHeader();
    const variables = this.readNamestrs(variableCount, namestrLength);

    this.expectHeader(HEADERS.observations, 'observation header');
    const rows = this.readObservations(variables);

    return { name, label, variables, rows };
  }

  private expectLibraryHeader(): void {
    if (startsWithText(this.bytes, 0, HEADERS.libraryV8)) {
      throw new DecodeError('SAS transport version 8 files are not supported', 0);
    }
    if (!startsWithText(this.bytes, 0, HEADERS.library)) {
      throw new DecodeError('missing library header record', 0);
    }
    this.requireRecords(3, 'library header');
  }

  private requireRecords(count: number, what: string): void {
    if (this.offset + count * RECORD_LENGTH > this.bytes.length) {
      throw new DecodeError(`file truncated in ${what}`, this.offset);
    }
  }

  private expectHeader(header: string, what: string): void {
    this.requireRecords(1, what);
    if (!startsWithText(this.bytes, this.offset, header)) {
      throw new DecodeError(`expected ${what}`, this.offset);
    }
    this.offset += RECORD_LENGTH;
  }

  private readMemberHeader(): number {
    const start = this.offset;
    this.expectHeader(HEADERS.member, 'member header');
    const namestrLength = parseInt(readText(this.bytes, start + 74, 4), 10);
    if (namestrLength !== 140 && namestrLength !== 136) {
      throw new DecodeError(`unsupported NAMESTR length ${namestrLength}`, start + 74);
    }
    return namestrLength;
  }

  private readNamestrHeader(): number {
    const start = this.offset;
    this.expectHeader(HEADERS.namestr, 'NAMESTR header');
    const count = parseInt(readText(this.bytes, start + 54, 4), 10);
    if (!Number.isInteger(count) || count < 0) {
      throw new DecodeError('invalid variable count in NAMESTR header', start + 54);
    }
    return count;
  }

  private readNamestrs(count: number, namestrLength: number): VariableDescriptor[] {
    const blockLength = roundUpToRecord(count * namestrLength);
    if (this.offset + blockLength > this.bytes.length) {
      throw new DecodeError(`file truncated in NAMESTR records (${count} variables)`, this.offset);
    }

    const variables: VariableDescriptor[] = [];
    for (let i = 0; i < count; i++) {
      variables.push(this.readNamestr(this.offset + i * namestrLength));
    }

    this.offset += blockLength;
    return variables;
  }

  private readNamestr(at: number): VariableDescriptor {
    const typeCode = this.view.getInt16(at);
    const length = this.view.getInt16(at + 4);
    const name = trimBlanks(readText(this.bytes, at + 8, 8));

    if (typeCode !== NUMERIC_TYPE && typeCode !== CHARACTER_TYPE) {
      throw new DecodeError(`variable ${name} has unknown type code ${typeCode}`, at);
    }
    const type = typeCode === NUMERIC_TYPE ? 'numeric' : 'character';

    if (type === 'numeric' ? length < 2 || length > 8 : length < 1) {
      throw new DecodeError(`variable ${name} has invalid ${type} length ${length}`, at + 4);
    }

    const position = this.view.getInt32(at + 84);
    if (position < 0) {
      throw new DecodeError(`variable ${name} has negative position ${position}`, at + 84);
    }

    return {
      name,
      label: trimBlanks(readText(this.bytes, at + 16, 40)),
      type,
      length,
      position,
      format: formatName(
        trimBlanks(readText(this.bytes, at + 56, 8)),
        this.view.getInt16(at + 64),
        this.view.getInt16(at + 66)
      ),
      informat: formatName(
        trimBlanks(readText(this.bytes, at + 72, 8)),
        this.view.getInt16(at + 80),
        this.view.getInt16(at + 82)
      ),
    };
  }

  private findDataEnd(): number {
    for (let at = this.offset; at + RECORD_LENGTH <= this.bytes.length; at += RECORD_LENGTH) {
      if (startsWithText(this.bytes, at, HEADERS.member)) {
        return at;
      }
    }
    return this.bytes.length;
  }

  private readObservations(variables: readonly VariableDescriptor[]): Record<string, CellValue>[] {
    const observationLength = variables.reduce(
      (max, variable) => Math.max(max, variable.position + variable.length),
      0
    );
    if (observationLength === 0) {
      return [];
    }

    const start = this.offset;
    const end = this.findDataEnd();
    let count = Math.floor((end - start) / observationLength);

    while (count > 0) {
      const lastStart = start + (count - 1) * observationLength;
      if (lastStart > end - RECORD_LENGTH && isBlank(this.bytes, lastStart, observationLength)) {
        count--;
      } else {
        break;
      }
    }

    const rows: Record<string, CellValue>[] = [];
    for (let i = 0; i < count; i++) {
      const base = start + i * observationLength;
      const row: Record<string, CellValue> = {};

      for (const variable of variables) {
        const at = base + variable.position;
        row[variable.name] =
          variable.type === 'numeric'
            ? decodeIbmFloat(this.bytes, at, variable.length)
            : trimBlanks(readText(this.bytes, at, variable.length));
      }

      rows.push(row);
    }

    this.offset = start + count * observationLength;
    return rows;
  }
}

/**
 * Decode the first member of a SAS transport file
 *
 * @throws {DecodeError} If the bytes are not a well-formed XPORT v5 file
 */
export function decodeXport(bytes: Uint8Array): DatasetTable {
  return new XportReader(bytes).decode();
}

/**
 * DatasetDecoder for `.ssp` files
 */
export class XportDecoder implements DatasetDecoder {
  async decode(bytes: Uint8Array): Promise<DatasetTable> {
    return decodeXport(bytes);
  }
}
