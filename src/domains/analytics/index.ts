// ──────────────────────────────────────────
// Analytics domain — barrel export
// ──────────────────────────────────────────

export { filterDataset, applySelection, requireRows, filterByTechnology } from './filter';
export { aggregateBySource, aggregateBySourceAndDate, aggregateByDate, summarizeDataset } from './aggregation';
export { evaluateAlerts } from './alerts';
export { topSourcesByRevenue } from './ranking';
export { toCsv, exportFileName } from './export';
export { MetricsService } from './metrics.service';
export { createAnalyticsRoutes } from './routes';
