// ──────────────────────────────────────────
// Ingestion: CSV table codec
// ──────────────────────────────────────────
// Reads CSV text into a RawTable with one inferred type per column, the way
// a dataframe reader does: a column becomes numeric only when every
// non-empty cell parses as a number. Mixed columns stay strings.

import { CellValue, RawTable } from '../../shared/types';
import { FormatError } from '../../shared/errors';

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function isNumericText(value: string): boolean {
  return NUMBER_PATTERN.test(value.trim());
}

/** Splits CSV text into records of raw fields. Quoted fields may hold commas, quotes and newlines. */
export function tokenizeCsv(text: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;

  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;

  for (let i = 0; i < source.length; i++) {
    const char = source[i];

    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      record.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && source[i + 1] === '\n') i++;
      record.push(field);
      records.push(record);
      record = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || record.length > 0) {
    record.push(field);
    records.push(record);
  }

  // Blank lines carry no data
  return records.filter((r) => !(r.length === 1 && r[0].trim() === ''));
}

/**
 * Throws FormatError when a data row carries more fields than the header.
 * Short rows are padded with empty cells.
 */
export function parseCsv(text: string): RawTable {
  const records = tokenizeCsv(text);
  if (records.length === 0) {
    return { columns: [], rows: [] };
  }

  const columns = records[0].map((header) => header.trim());
  const body = records.slice(1);

  body.forEach((record, index) => {
    if (record.length > columns.length) {
      throw new FormatError(`Expected ${columns.length} fields in row ${index + 1}, saw ${record.length}`);
    }
  });

  const numericColumns = new Set(
    columns.filter((_, index) => {
      const present = body
        .map((r) => r[index] ?? '')
        .filter((value) => value.trim() !== '');
      return present.length > 0 && present.every(isNumericText);
    })
  );

  const rows = body.map((record) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, index) => {
      const value = record[index] ?? '';
      if (value.trim() === '') {
        row[column] = null;
      } else if (numericColumns.has(column)) {
        row[column] = Number(value.trim());
      } else {
        row[column] = value;
      }
    });
    return row;
  });

  return { columns, rows };
}

function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCell(value: CellValue): string {
  if (value === null) return '';
  if (typeof value === 'number') return String(value);
  return escapeField(value);
}

export function stringifyCsv(columns: readonly string[], rows: readonly Record<string, CellValue>[]): string {
  const lines = [columns.map(escapeField).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => formatCell(row[column] ?? null)).join(','));
  }
  return lines.join('\n') + '\n';
}
