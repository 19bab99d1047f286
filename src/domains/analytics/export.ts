// ──────────────────────────────────────────
// Analytics: CSV export
// ──────────────────────────────────────────

import { CellValue, Dataset, REQUIRED_COLUMNS } from '../../shared/types';
import { stringifyCsv } from '../ingestion/csv';

/** Re-serializes records with the eight input columns, in row order. */
export function toCsv(dataset: Dataset): string {
  const rows = dataset.map((r): Record<string, CellValue> => ({
    date: r.date,
    source: r.source,
    revenue: r.revenue,
    impressions: r.impressions,
    page_rpm: r.page_rpm,
    fill_rate: r.fill_rate,
    ecpm: r.ecpm,
    ctr: r.ctr,
  }));
  return stringifyCsv(REQUIRED_COLUMNS, rows);
}

const pad = (value: number): string => String(value).padStart(2, '0');

export function exportFileName(now: Date = new Date()): string {
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `dashboard_data_${stamp}.csv`;
}
