// ──────────────────────────────────────────
// Ingestion: Record validator
// ──────────────────────────────────────────

import {
  AdRecord,
  CalendarDate,
  CellValue,
  NUMERIC_COLUMNS,
  NumericColumn,
  RawTable,
  REQUIRED_COLUMNS,
  ValidateOptions,
  ValidationResult,
} from '../../shared/types';
import {
  ColumnTypeError,
  ConsistencyError,
  FormatError,
  PipelineError,
  SchemaError,
} from '../../shared/errors';

const YEAR_FIRST = /^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})$/;
const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;
const MONTH_FIRST = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const DAY_MONTH_NAME = /^(\d{1,2})(?:\s+|-)([A-Za-z]+)\.?,?(?:\s+|-)(\d{4})$/;
const MONTH_NAME_DAY = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/;

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

/** Tolerance for derived columns stored at 2-decimal precision. */
export const CONSISTENCY_TOLERANCE = 0.01;

function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex(
    (month) => month === lower || month.slice(0, 3) === lower || (lower === 'sept' && month === 'september')
  );
  return index === -1 ? null : index + 1;
}

function calendarDate(year: number, month: number | null, day: number): CalendarDate | null {
  if (month === null) return null;
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }
  const pad = (n: number, width: number) => String(n).padStart(width, '0');
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}`;
}

/**
 * Parses a cell into a calendar date. Accepted layouts:
 * - year first: `2024-01-15`, `2024/1/15`, `2024.01.15`
 * - ISO timestamps, keeping the date part as written (no timezone shift)
 * - slashes with the year last read month first: `01/02/2024` is 2 January
 * - English month names: `15 Jan 2024`, `15-Jan-2024`, `January 15, 2024`
 *
 * Impossible dates (`2023-02-29`, `13/01/2024`) are rejected.
 */
export function parseCalendarDate(value: CellValue): CalendarDate | null {
  if (typeof value !== 'string') return null;
  const text = value.trim();

  let match = YEAR_FIRST.exec(text);
  if (match) return calendarDate(Number(match[1]), Number(match[3]), Number(match[4]));

  match = ISO_TIMESTAMP.exec(text);
  if (match) return calendarDate(Number(match[1]), Number(match[2]), Number(match[3]));

  match = MONTH_FIRST.exec(text);
  if (match) return calendarDate(Number(match[3]), Number(match[1]), Number(match[2]));

  match = DAY_MONTH_NAME.exec(text);
  if (match) return calendarDate(Number(match[3]), monthFromName(match[2]), Number(match[1]));

  match = MONTH_NAME_DAY.exec(text);
  if (match) return calendarDate(Number(match[3]), monthFromName(match[1]), Number(match[2]));

  return null;
}

function expectedPerMille(revenue: number, impressions: number): number {
  return impressions === 0 ? 0 : (revenue / impressions) * 1000;
}

function checkSchema(table: RawTable): void {
  const present = new Set(table.columns);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new SchemaError(`Missing required columns: ${missing.join(', ')}`);
  }

  const duplicated = REQUIRED_COLUMNS.filter(
    (column) => table.columns.filter((name) => name === column).length > 1
  );
  if (duplicated.length > 0) {
    throw new SchemaError(`Duplicate columns: ${duplicated.join(', ')}`);
  }
}

function checkDates(table: RawTable): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (const row of table.rows) {
    const parsed = parseCalendarDate(row.date ?? null);
    if (parsed === null) {
      throw new FormatError('Invalid date format. Use YYYY-MM-DD');
    }
    dates.push(parsed);
  }
  return dates;
}

// First offending column wins; see DESIGN.md on the asymmetry with checkSchema
function checkNumericTypes(table: RawTable): void {
  for (const column of NUMERIC_COLUMNS) {
    const allNumeric = table.rows.every((row) => {
      const value = row[column];
      return typeof value === 'number' && !Number.isNaN(value);
    });
    if (!allNumeric) {
      throw new ColumnTypeError(`Column ${column} must be numeric`);
    }
  }
}

function checkConsistency(records: readonly AdRecord[]): void {
  const derived: NumericColumn[] = ['ecpm', 'page_rpm'];
  records.forEach((record, index) => {
    const expected = expectedPerMille(record.revenue, record.impressions);
    for (const column of derived) {
      if (Math.abs(record[column] - expected) > CONSISTENCY_TOLERANCE) {
        throw new ConsistencyError(
          `Row ${index + 1}: ${column} ${record[column]} does not match revenue/impressions*1000 (${expected.toFixed(2)})`
        );
      }
    }
  });
}

function numberAt(row: Record<string, CellValue>, column: NumericColumn): number {
  const value = row[column];
  // checkNumericTypes has already rejected anything else
  return typeof value === 'number' ? value : Number.NaN;
}

function toRecords(table: RawTable, dates: CalendarDate[]): AdRecord[] {
  return table.rows.map((row, index) => ({
    date: dates[index],
    source: String(row.source ?? ''),
    revenue: numberAt(row, 'revenue'),
    impressions: numberAt(row, 'impressions'),
    page_rpm: numberAt(row, 'page_rpm'),
    fill_rate: numberAt(row, 'fill_rate'),
    ecpm: numberAt(row, 'ecpm'),
    ctr: numberAt(row, 'ctr'),
  }));
}

/**
 * Checks an untrusted table against the record contract and, when it holds,
 * returns it as a Dataset. The table is read, never modified.
 *
 * Checks run schema → dates → numeric types → (optional) derived-metric
 * consistency, and the first failing stage rejects the whole table.
 */
export function validate(table: RawTable, options: ValidateOptions = {}): ValidationResult {
  try {
    checkSchema(table);
    const dates = checkDates(table);
    checkNumericTypes(table);
    const dataset = toRecords(table, dates);
    if (options.checkDerivedConsistency) {
      checkConsistency(dataset);
    }
    return { ok: true, message: 'Valid data', dataset };
  } catch (err) {
    if (err instanceof PipelineError) return err.toFailure();
    throw err;
  }
}
