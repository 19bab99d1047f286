// ──────────────────────────────────────────
// Analytics: Metrics service
// ──────────────────────────────────────────
// Runs the post-validation half of the pipeline for a session:
// filter → aggregate → evaluate. Every call recomputes from the session's
// current dataset and selection; nothing is cached between calls.

import { SessionContract } from '../../shared/contracts';
import { createLogger } from '../../shared/logger';
import {
  AlertReport,
  DailyRevenue,
  Dataset,
  DatasetSummary,
  PipelineFailure,
  PipelineResult,
  RankedSource,
  SourceDateRevenue,
  SourceMetrics,
  Technology,
  TechnologyMetrics,
} from '../../shared/types';
import { applySelection, requireRows } from './filter';
import {
  aggregateByDate,
  aggregateBySource,
  aggregateBySourceAndDate,
  roundAggregated,
  roundSummary,
  roundTechnology,
  round2,
  summarizeDataset,
  summarizeTechnology,
  toRows,
} from './aggregation';
import { evaluateAlerts } from './alerts';
import { topSourcesByRevenue } from './ranking';
import { toCsv } from './export';

const log = createLogger('Metrics');

export type Outcome<T> = { ok: true; data: T } | PipelineFailure;

export interface MetricsOptions {
  currencySymbol: string;
  topSourcesLimit: number;
}

export class MetricsService {
  constructor(
    private sessions: SessionContract,
    private options: MetricsOptions
  ) {}

  /** Full pipeline pass: summary, per-source metrics, alerts and ranking. */
  run(sessionId: string): PipelineResult {
    const filtered = this.filtered(sessionId);
    if (!filtered.ok) return filtered;

    const dataset = filtered.data;
    const bySource = aggregateBySource(dataset);
    const alerts = evaluateAlerts(bySource, { currencySymbol: this.options.currencySymbol });
    this.sessions.recordAlerts(sessionId, alerts);

    return {
      ok: true,
      rows: dataset.length,
      summary: roundSummary(summarizeDataset(dataset)),
      sources: toRows(bySource).map((m) => ({ source: m.source, ...roundAggregated(m) })),
      alerts,
      top: this.rank(dataset, this.options.topSourcesLimit),
    };
  }

  getSummary(sessionId: string): Outcome<DatasetSummary> {
    return this.withRows(sessionId, (dataset) => roundSummary(summarizeDataset(dataset)));
  }

  getSourceMetrics(sessionId: string): Outcome<SourceMetrics[]> {
    return this.withRows(sessionId, (dataset) =>
      toRows(aggregateBySource(dataset)).map((m) => ({ source: m.source, ...roundAggregated(m) }))
    );
  }

  getSourceTimeSeries(sessionId: string): Outcome<SourceDateRevenue[]> {
    return this.withRows(sessionId, (dataset) =>
      Array.from(aggregateBySourceAndDate(dataset).values()).map((p) => ({
        ...p,
        revenue_sum: round2(p.revenue_sum),
      }))
    );
  }

  getDailyTotals(sessionId: string): Outcome<DailyRevenue[]> {
    return this.withRows(sessionId, (dataset) =>
      aggregateByDate(dataset).map((p) => ({ ...p, revenue_sum: round2(p.revenue_sum) }))
    );
  }

  getTopSources(sessionId: string, n?: number): Outcome<RankedSource[]> {
    return this.withRows(sessionId, (dataset) => this.rank(dataset, n ?? this.options.topSourcesLimit));
  }

  getTechnology(sessionId: string, technology: Technology): Outcome<TechnologyMetrics[]> {
    return this.withRows(sessionId, (dataset) => summarizeTechnology(dataset, technology).map(roundTechnology));
  }

  evaluate(sessionId: string): Outcome<AlertReport> {
    return this.withRows(sessionId, (dataset) => {
      const report = evaluateAlerts(aggregateBySource(dataset), {
        currencySymbol: this.options.currencySymbol,
      });
      this.sessions.recordAlerts(sessionId, report);
      if (report.status === 'alerts') {
        log.info(`Session ${sessionId}: ${report.alerts.length} alert(s) raised`);
      }
      return report;
    });
  }

  /** Last stored report; `not_evaluated` until the first evaluation. */
  lastAlerts(sessionId: string): AlertReport {
    return this.sessions.get(sessionId).alerts;
  }

  exportCsv(sessionId: string): Outcome<string> {
    return this.withRows(sessionId, (dataset) => toCsv(dataset));
  }

  // ── Helpers ──

  private filtered(sessionId: string): Outcome<Dataset> {
    const session = this.sessions.get(sessionId);
    const dataset = applySelection(session.dataset, session.selection);
    const empty = requireRows(dataset);
    if (empty) {
      log.warn(`Session ${sessionId}: ${empty.message}`);
      return empty;
    }
    return { ok: true, data: dataset };
  }

  private withRows<T>(sessionId: string, fn: (dataset: Dataset) => T): Outcome<T> {
    const filtered = this.filtered(sessionId);
    if (!filtered.ok) return filtered;
    return { ok: true, data: fn(filtered.data) };
  }

  private rank(dataset: Dataset, n: number): RankedSource[] {
    return topSourcesByRevenue(dataset, n).map((r) => ({ ...r, revenue: round2(r.revenue) }));
  }
}
