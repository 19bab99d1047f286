// ──────────────────────────────────────────
// Shared type definitions for the revenue monitor
// ──────────────────────────────────────────

/** Calendar date without time component, always `YYYY-MM-DD`. */
export type CalendarDate = string;

export type Severity = 'warning' | 'danger';
export type Technology = 'Google' | 'Prebid' | 'TAM';
export type FailureKind =
  | 'SchemaError'
  | 'FormatError'
  | 'TypeError'
  | 'EmptyResultError'
  | 'ConsistencyError';

export const REQUIRED_COLUMNS = [
  'date',
  'source',
  'revenue',
  'impressions',
  'page_rpm',
  'fill_rate',
  'ecpm',
  'ctr',
] as const;

export const NUMERIC_COLUMNS = [
  'revenue',
  'impressions',
  'page_rpm',
  'fill_rate',
  'ecpm',
  'ctr',
] as const;

export const TECHNOLOGIES: readonly Technology[] = ['Google', 'Prebid', 'TAM'];

export type NumericColumn = (typeof NUMERIC_COLUMNS)[number];

/** One (date, source) observation. */
export interface AdRecord {
  date: CalendarDate;
  source: string;
  revenue: number;
  impressions: number;
  page_rpm: number;
  fill_rate: number;
  ecpm: number;
  ctr: number;
}

export type Dataset = readonly AdRecord[];

// ── Raw input, as handed over by the CSV reader ──

export type CellValue = string | number | null;

export interface RawTable {
  columns: string[];
  rows: Record<string, CellValue>[];
}

// ── Filtering ──

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

export interface Selection {
  /** Anything other than exactly two bounds filters by source only. */
  dateRange: readonly CalendarDate[];
  sources: readonly string[];
}

// ── Aggregation ──

export interface AggregatedMetrics {
  revenue_sum: number;
  revenue_mean: number;
  impressions_sum: number;
  page_rpm_mean: number;
  fill_rate_mean: number;
  ecpm_mean: number;
  ctr_mean: number;
}

export interface SourceMetrics extends AggregatedMetrics {
  source: string;
}

export interface SourceDateRevenue {
  source: string;
  date: CalendarDate;
  revenue_sum: number;
}

export interface DailyRevenue {
  date: CalendarDate;
  revenue_sum: number;
}

export interface TechnologyMetrics {
  source: string;
  revenue_sum: number;
  impressions_sum: number;
  fill_rate_mean: number;
  ecpm_mean: number;
}

export interface DatasetSummary {
  total_revenue: number;
  total_impressions: number;
  page_rpm_overall: number;
  avg_fill_rate: number;
  avg_ecpm: number;
}

export interface RankedSource {
  source: string;
  revenue: number;
}

// ── Alerts ──

export interface Alert {
  severity: Severity;
  source: string;
  message: string;
}

export type AlertReport =
  | { status: 'not_evaluated'; alerts: Alert[] }
  | { status: 'all_clear'; alerts: Alert[]; evaluated_at: Date }
  | { status: 'alerts'; alerts: Alert[]; evaluated_at: Date };

// ── Results ──

export interface PipelineFailure {
  ok: false;
  kind: FailureKind;
  message: string;
}

export type ValidationResult =
  | { ok: true; message: string; dataset: Dataset }
  | PipelineFailure;

export interface ValidateOptions {
  checkDerivedConsistency?: boolean;
}

export interface PipelineReport {
  ok: true;
  rows: number;
  summary: DatasetSummary;
  sources: SourceMetrics[];
  alerts: AlertReport;
  top: RankedSource[];
}

export type PipelineResult = PipelineReport | PipelineFailure;

// ── Sessions ──

export interface SessionContext {
  id: string;
  dataset: Dataset;
  selection: Selection;
  alerts: AlertReport;
  created_at: Date;
  loaded_at: Date | null;
  last_used: Date;
}

export interface DatasetOverview {
  message: string;
  rows: number;
  sources: string[];
  date_range: DateRange | null;
}
