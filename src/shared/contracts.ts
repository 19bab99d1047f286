// ──────────────────────────────────────────
// Domain contracts — typed interfaces between domains
// ──────────────────────────────────────────

import { AlertReport, Dataset, SessionContext, Selection } from './types';

/**
 * Session contract — exposed by the platform to Ingestion and Analytics.
 * Domains never hold a dataset themselves; they read and replace it here.
 */
export interface SessionContract {
  get(sessionId: string): SessionContext;
  replaceDataset(sessionId: string, dataset: Dataset, selection: Selection): SessionContext;
  setSelection(sessionId: string, selection: Selection): SessionContext;
  recordAlerts(sessionId: string, report: AlertReport): void;
}

/**
 * Sample contract — the Ingestion side's synthetic data source.
 */
export interface SampleContract {
  generate(params: { start: string; end: string; seed?: number }): Dataset;
}
