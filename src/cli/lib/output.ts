/**
 * Output Formatting for CLI Commands
 *
 * Renders decoded datasets and small record lists as table, json, ndjson or
 * csv text.
 *
 * @module cli/lib/output
 */

import type { CellValue, DatasetRow, DatasetTable } from '../../core/types.js';

export const OUTPUT_FORMATS = ['table', 'json', 'ndjson', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Missing values render as `.` in text formats, as SAS prints them
 */
export function formatCell(value: CellValue): string {
  return value === null ? '.' : String(value);
}

/**
 * Format rows as an aligned text table
 */
export function formatTable(rows: readonly DatasetRow[], columns: readonly string[]): string {
  if (rows.length === 0) {
    return 'No rows.';
  }

  const widths = columns.map((column) =>
    rows.reduce(
      (width, row) => Math.max(width, formatCell(row[column] ?? null).length),
      column.length
    )
  );

  const headerRow = columns.map((column, i) => column.padEnd(widths[i])).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = rows.map((row) =>
    columns
      .map((column, i) => {
        const value = row[column] ?? null;
        const text = formatCell(value);
        return typeof value === 'number' ? text.padStart(widths[i]) : text.padEnd(widths[i]);
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson<T>(data: readonly T[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

export function formatCsv(rows: readonly DatasetRow[], columns: readonly string[]): string {
  const headerRow = columns.map(escapeCSV).join(',');
  const dataRows = rows.map((row) =>
    columns
      .map((column) => {
        const value = row[column] ?? null;
        return value === null ? '' : escapeCSV(String(value));
      })
      .join(',')
  );

  return [headerRow, ...dataRows].join('\n');
}

function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render the first `limit` rows of a dataset
 */
export function formatDataset(
  table: DatasetTable,
  format: OutputFormat,
  limit?: number
): string {
  const rows = limit === undefined ? table.rows : table.rows.slice(0, limit);
  const columns = table.variables.map((variable) => variable.name);

  switch (format) {
    case 'json':
      return formatJson({
        name: table.name,
        label: table.label,
        variables: table.variables,
        rowCount: table.rows.length,
        rows,
      });
    case 'ndjson':
      return formatNdjson(rows);
    case 'csv':
      return formatCsv(rows, columns);
    case 'table':
      return formatTable(rows, columns);
  }
}
