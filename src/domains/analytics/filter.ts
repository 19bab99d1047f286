// ──────────────────────────────────────────
// Analytics: Filter engine
// ──────────────────────────────────────────

import { EmptyResultError } from '../../shared/errors';
import {
  CalendarDate,
  Dataset,
  DateRange,
  PipelineFailure,
  Selection,
  Technology,
} from '../../shared/types';

/**
 * Keeps rows inside the inclusive date range whose source is selected.
 * A range that is not exactly two bounds is ignored and only the sources
 * narrow the result. Row order is preserved.
 */
export function filterDataset(
  dataset: Dataset,
  dateRange: readonly CalendarDate[],
  sources: readonly string[]
): Dataset {
  const selected = new Set(sources);
  if (selected.size === 0) return [];

  if (dateRange.length !== 2) {
    return dataset.filter((r) => selected.has(r.source));
  }

  const [start, end] = dateRange;
  // YYYY-MM-DD compares correctly as a string
  return dataset.filter((r) => r.date >= start && r.date <= end && selected.has(r.source));
}

export function applySelection(dataset: Dataset, selection: Selection): Dataset {
  return filterDataset(dataset, selection.dateRange, selection.sources);
}

export function requireRows(dataset: Dataset): PipelineFailure | null {
  if (dataset.length > 0) return null;
  return new EmptyResultError('No data for the selected filters').toFailure();
}

export function filterByTechnology(dataset: Dataset, technology: Technology): Dataset {
  return dataset.filter((r) => r.source.includes(technology));
}

export function listSources(dataset: Dataset): string[] {
  return Array.from(new Set(dataset.map((r) => r.source))).sort(compareKeys);
}

export function dateBounds(dataset: Dataset): DateRange | null {
  if (dataset.length === 0) return null;
  let start = dataset[0].date;
  let end = dataset[0].date;
  for (const r of dataset) {
    if (r.date < start) start = r.date;
    if (r.date > end) end = r.date;
  }
  return { start, end };
}

/** Full-range, all-sources selection for a freshly loaded dataset. */
export function defaultSelection(dataset: Dataset): Selection {
  const bounds = dateBounds(dataset);
  return {
    dateRange: bounds ? [bounds.start, bounds.end] : [],
    sources: listSources(dataset),
  };
}

/** Code-point order, matching how group keys are sorted. */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
