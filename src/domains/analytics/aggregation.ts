// ──────────────────────────────────────────
// Analytics: Aggregator
// ──────────────────────────────────────────
// Groups records into per-key accumulators, then emits metrics in sorted
// key order. Sums and means stay at full precision here; rounding happens
// once, in the round* helpers, when results leave the service.

import {
  AdRecord,
  AggregatedMetrics,
  CalendarDate,
  DailyRevenue,
  Dataset,
  DatasetSummary,
  SourceDateRevenue,
  SourceMetrics,
  Technology,
  TechnologyMetrics,
} from '../../shared/types';
import { compareKeys, filterByTechnology } from './filter';

interface Accumulator {
  count: number;
  revenue: number;
  impressions: number;
  page_rpm: number;
  fill_rate: number;
  ecpm: number;
  ctr: number;
}

function emptyAccumulator(): Accumulator {
  return { count: 0, revenue: 0, impressions: 0, page_rpm: 0, fill_rate: 0, ecpm: 0, ctr: 0 };
}

function accumulate(acc: Accumulator, r: AdRecord): void {
  acc.count += 1;
  acc.revenue += r.revenue;
  acc.impressions += r.impressions;
  acc.page_rpm += r.page_rpm;
  acc.fill_rate += r.fill_rate;
  acc.ecpm += r.ecpm;
  acc.ctr += r.ctr;
}

const mean = (total: number, count: number): number => (count > 0 ? total / count : 0);

/** Revenue per thousand impressions; zero impressions yield 0. */
export function perMille(revenue: number, impressions: number): number {
  return impressions > 0 ? (revenue / impressions) * 1000 : 0;
}

/** Two decimals, ties to even on the scaled value: 0.125 → 0.12, 0.375 → 0.38. */
export function round2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  const fraction = scaled - floor;
  const up = fraction > 0.5 || (fraction === 0.5 && floor % 2 !== 0);
  return (up ? floor + 1 : floor) / 100;
}

function groupBy(dataset: Dataset, keyOf: (r: AdRecord) => string): Map<string, Accumulator> {
  const groups = new Map<string, Accumulator>();
  for (const r of dataset) {
    const key = keyOf(r);
    let acc = groups.get(key);
    if (!acc) {
      acc = emptyAccumulator();
      groups.set(key, acc);
    }
    accumulate(acc, r);
  }
  return new Map(Array.from(groups.entries()).sort(([a], [b]) => compareKeys(a, b)));
}

function toMetrics(acc: Accumulator): AggregatedMetrics {
  return {
    revenue_sum: acc.revenue,
    revenue_mean: mean(acc.revenue, acc.count),
    impressions_sum: acc.impressions,
    page_rpm_mean: mean(acc.page_rpm, acc.count),
    fill_rate_mean: mean(acc.fill_rate, acc.count),
    ecpm_mean: mean(acc.ecpm, acc.count),
    ctr_mean: mean(acc.ctr, acc.count),
  };
}

/** Per-source metrics, keyed and ordered by source name. */
export function aggregateBySource(dataset: Dataset): Map<string, AggregatedMetrics> {
  const result = new Map<string, AggregatedMetrics>();
  for (const [source, acc] of groupBy(dataset, (r) => r.source)) {
    result.set(source, toMetrics(acc));
  }
  return result;
}

export function sourceDateKey(source: string, date: CalendarDate): string {
  return `${date}|${source}`;
}

/** Revenue per (source, date) pair, ordered by date then source. */
export function aggregateBySourceAndDate(dataset: Dataset): Map<string, SourceDateRevenue> {
  const labels = new Map<string, { source: string; date: CalendarDate }>();
  for (const r of dataset) {
    labels.set(sourceDateKey(r.source, r.date), { source: r.source, date: r.date });
  }

  const result = new Map<string, SourceDateRevenue>();
  for (const [key, acc] of groupBy(dataset, (r) => sourceDateKey(r.source, r.date))) {
    const label = labels.get(key);
    if (label) result.set(key, { ...label, revenue_sum: acc.revenue });
  }
  return result;
}

/** Total revenue per day across every source. */
export function aggregateByDate(dataset: Dataset): DailyRevenue[] {
  return Array.from(groupBy(dataset, (r) => r.date), ([date, acc]) => ({
    date,
    revenue_sum: acc.revenue,
  }));
}

export function summarizeTechnology(dataset: Dataset, technology: Technology): TechnologyMetrics[] {
  return toRows(aggregateBySource(filterByTechnology(dataset, technology))).map((m) => ({
    source: m.source,
    revenue_sum: m.revenue_sum,
    impressions_sum: m.impressions_sum,
    fill_rate_mean: m.fill_rate_mean,
    ecpm_mean: m.ecpm_mean,
  }));
}

/**
 * Dataset-wide scalars. `page_rpm_overall` is derived from the totals and
 * is deliberately not the mean of the per-row page_rpm column.
 */
export function summarizeDataset(dataset: Dataset): DatasetSummary {
  const acc = emptyAccumulator();
  for (const r of dataset) accumulate(acc, r);

  return {
    total_revenue: acc.revenue,
    total_impressions: acc.impressions,
    page_rpm_overall: perMille(acc.revenue, acc.impressions),
    avg_fill_rate: mean(acc.fill_rate, acc.count),
    avg_ecpm: mean(acc.ecpm, acc.count),
  };
}

export function toRows(metrics: Map<string, AggregatedMetrics>): SourceMetrics[] {
  return Array.from(metrics, ([source, m]) => ({ source, ...m }));
}

export function roundAggregated(m: AggregatedMetrics): AggregatedMetrics {
  return {
    revenue_sum: round2(m.revenue_sum),
    revenue_mean: round2(m.revenue_mean),
    impressions_sum: round2(m.impressions_sum),
    page_rpm_mean: round2(m.page_rpm_mean),
    fill_rate_mean: round2(m.fill_rate_mean),
    ecpm_mean: round2(m.ecpm_mean),
    ctr_mean: round2(m.ctr_mean),
  };
}

export function roundSummary(s: DatasetSummary): DatasetSummary {
  return {
    total_revenue: round2(s.total_revenue),
    total_impressions: round2(s.total_impressions),
    page_rpm_overall: round2(s.page_rpm_overall),
    avg_fill_rate: round2(s.avg_fill_rate),
    avg_ecpm: round2(s.avg_ecpm),
  };
}

export function roundTechnology(t: TechnologyMetrics): TechnologyMetrics {
  return {
    source: t.source,
    revenue_sum: round2(t.revenue_sum),
    impressions_sum: round2(t.impressions_sum),
    fill_rate_mean: round2(t.fill_rate_mean),
    ecpm_mean: round2(t.ecpm_mean),
  };
}
