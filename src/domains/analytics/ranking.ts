// ──────────────────────────────────────────
// Analytics: Top-N ranking
// ──────────────────────────────────────────

import { Dataset, RankedSource } from '../../shared/types';
import { aggregateBySource } from './aggregation';

export const DEFAULT_TOP_N = 10;

/** Sources by summed revenue, highest first. Ties keep source-name order. */
export function topSourcesByRevenue(dataset: Dataset, n: number = DEFAULT_TOP_N): RankedSource[] {
  if (n <= 0) return [];
  // Array.prototype.sort is stable, so equal revenues stay in mapping order
  return Array.from(aggregateBySource(dataset), ([source, m]) => ({ source, revenue: m.revenue_sum }))
    .sort((a, b) => b.revenue - a.revenue)
    .slice(0, n);
}
