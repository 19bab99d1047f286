// ──────────────────────────────────────────
// Ingestion domain — barrel export
// ──────────────────────────────────────────

export { parseCsv, stringifyCsv } from './csv';
export { validate, parseCalendarDate } from './validator';
export { SampleGenerator, SAMPLE_SOURCES } from './sample';
export { DatasetService } from './dataset.service';
export { createIngestionRoutes } from './routes';
