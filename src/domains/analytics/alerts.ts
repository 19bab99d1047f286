// ──────────────────────────────────────────
// Analytics: Alert evaluator
// ──────────────────────────────────────────

import { AggregatedMetrics, Alert, AlertReport } from '../../shared/types';
import { round2 } from './aggregation';

export const FILL_RATE_THRESHOLD = 80;
export const ECPM_THRESHOLD = 1.0;

export interface EvaluateOptions {
  currencySymbol?: string;
  now?: Date;
}

/**
 * Applies the fixed health thresholds to each source, in mapping order.
 * Values are compared as presented (rounded to 2 decimals). A source can
 * raise both a danger and a warning in the same pass.
 */
export function evaluateAlerts(
  metrics: ReadonlyMap<string, AggregatedMetrics>,
  options: EvaluateOptions = {}
): AlertReport {
  const currency = options.currencySymbol ?? '$';
  const alerts: Alert[] = [];

  for (const [source, m] of metrics) {
    const fillRate = round2(m.fill_rate_mean);
    const ecpm = round2(m.ecpm_mean);

    if (fillRate < FILL_RATE_THRESHOLD) {
      alerts.push({
        severity: 'danger',
        source,
        message: `${source}: low fill rate (${fillRate.toFixed(1)}%)`,
      });
    }

    if (ecpm < ECPM_THRESHOLD) {
      alerts.push({
        severity: 'warning',
        source,
        message: `${source}: low eCPM (${currency}${ecpm.toFixed(2)})`,
      });
    }
  }

  const evaluated_at = options.now ?? new Date();
  if (alerts.length === 0) {
    return { status: 'all_clear', alerts: [], evaluated_at };
  }
  return { status: 'alerts', alerts, evaluated_at };
}
