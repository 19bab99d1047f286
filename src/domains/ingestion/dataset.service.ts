// ──────────────────────────────────────────
// Ingestion: Dataset service — the single funnel into a session
// ──────────────────────────────────────────

import { SampleContract, SessionContract } from '../../shared/contracts';
import { createLogger } from '../../shared/logger';
import {
  CalendarDate,
  Dataset,
  DatasetOverview,
  PipelineFailure,
  RawTable,
  ValidateOptions,
} from '../../shared/types';
import { PipelineError } from '../../shared/errors';
import { dateBounds, defaultSelection } from '../analytics/filter';
import { parseCsv } from './csv';
import { validate } from './validator';

const log = createLogger('Ingestion');

export type LoadResult = ({ ok: true } & DatasetOverview) | PipelineFailure;

export interface SampleParams {
  start?: CalendarDate;
  end?: CalendarDate;
  seed?: number;
}

export const DEFAULT_SAMPLE_RANGE = { start: '2024-01-01', end: '2024-01-31' } as const;

export class DatasetService {
  constructor(
    private sessions: SessionContract,
    private sampler: SampleContract,
    private defaultSeed?: number
  ) {}

  /**
   * Parses and validates an uploaded CSV. A valid table replaces the
   * session's dataset wholesale; an invalid one leaves it untouched.
   */
  loadCsv(sessionId: string, text: string, options: ValidateOptions = {}): LoadResult {
    let table: RawTable;
    try {
      table = parseCsv(text);
    } catch (err) {
      if (!(err instanceof PipelineError)) throw err;
      return this.reject(sessionId, err.toFailure());
    }

    const result = validate(table, options);
    if (!result.ok) {
      return this.reject(sessionId, result);
    }

    this.install(sessionId, result.dataset);
    log.info(`Session ${sessionId}: loaded ${result.dataset.length} rows from CSV`);
    return { ok: true, ...this.describe(result.message, result.dataset) };
  }

  loadSample(sessionId: string, params: SampleParams = {}): LoadResult {
    const dataset = this.sampler.generate({
      start: params.start ?? DEFAULT_SAMPLE_RANGE.start,
      end: params.end ?? DEFAULT_SAMPLE_RANGE.end,
      seed: params.seed ?? this.defaultSeed,
    });

    this.install(sessionId, dataset);
    log.info(`Session ${sessionId}: loaded ${dataset.length} sample rows`);
    return { ok: true, ...this.describe('Using sample data', dataset) };
  }

  overview(sessionId: string): DatasetOverview {
    const session = this.sessions.get(sessionId);
    return this.describe(session.loaded_at ? 'Dataset loaded' : 'No dataset loaded', session.dataset);
  }

  private reject(sessionId: string, failure: PipelineFailure): PipelineFailure {
    log.warn(`Session ${sessionId}: rejected upload (${failure.kind}) — ${failure.message}`);
    return failure;
  }

  private install(sessionId: string, dataset: Dataset): void {
    this.sessions.replaceDataset(sessionId, dataset, defaultSelection(dataset));
  }

  private describe(message: string, dataset: Dataset): DatasetOverview {
    const selection = defaultSelection(dataset);
    return {
      message,
      rows: dataset.length,
      sources: [...selection.sources],
      date_range: dateBounds(dataset),
    };
  }
}
