import { describe, it, expect } from 'vitest';
import type { DatasetTable } from '../../../core/types.js';
import {
  formatCsv,
  formatDataset,
  formatNdjson,
  formatTable,
  isOutputFormat,
} from '../../../cli/lib/output.js';

const table: DatasetTable = {
  name: 'H171',
  label: 'TEST DATASET',
  variables: [
    { name: 'ID', label: '', type: 'character', length: 4, position: 0, format: '', informat: '' },
    { name: 'AGE', label: '', type: 'numeric', length: 8, position: 4, format: '', informat: '' },
  ],
  rows: [
    { ID: 'a1', AGE: 42 },
    { ID: 'b,2', AGE: null },
    { ID: 'c3', AGE: 7 },
  ],
};

describe('formatTable', () => {
  it('should align strings left and numbers right', () => {
    expect(formatTable(table.rows.slice(0, 2), ['ID', 'AGE'])).toBe(
      ['ID  | AGE', '----+----', 'a1  |  42', 'b,2 | .  '].join('\n')
    );
  });

  it('should size columns over more rows than a call can take as arguments', () => {
    const rows = Array.from({ length: 500_000 }, (_, i) => ({ ID: i === 499_999 ? 'widest-id' : 'x' }));

    const lines = formatTable(rows, ['ID']).split('\n');

    expect(lines).toHaveLength(500_002);
    expect(lines[0]).toBe('ID       ');
    expect(lines[2]).toBe('x        ');
    expect(lines[500_001]).toBe('widest-id');
  });

  it('should report empty results', () => {
    expect(formatTable([], ['ID'])).toBe('No rows.');
  });
});

describe('formatCsv', () => {
  it('should quote values containing commas and leave missing values empty', () => {
    expect(formatCsv(table.rows.slice(0, 2), ['ID', 'AGE'])).toBe('ID,AGE\na1,42\n"b,2",');
  });
});

describe('formatNdjson', () => {
  it('should write one JSON object per line', () => {
    expect(formatNdjson([{ ID: 'a1' }, { ID: 'c3' }])).toBe('{"ID":"a1"}\n{"ID":"c3"}');
  });
});

describe('formatDataset', () => {
  it('should limit rows', () => {
    expect(formatDataset(table, 'csv', 1)).toBe('ID,AGE\na1,42');
  });

  it('should include metadata and the full row count in JSON output', () => {
    const parsed: unknown = JSON.parse(formatDataset(table, 'json', 1));

    expect(parsed).toEqual({
      name: 'H171',
      label: 'TEST DATASET',
      variables: table.variables,
      rowCount: 3,
      rows: [{ ID: 'a1', AGE: 42 }],
    });
  });
});

describe('isOutputFormat', () => {
  it('should accept known formats only', () => {
    expect(isOutputFormat('ndjson')).toBe(true);
    expect(isOutputFormat('xml')).toBe(false);
  });
});
