// ──────────────────────────────────────────
// App — wires platform and domains into Express
// ──────────────────────────────────────────

import express, { Express } from 'express';
import { AppConfig } from './config';
import { createLogger } from './shared/logger';

// Platform
import { SessionStore } from './platform/session';
import { sessionScope } from './platform/middleware';
import { sessionOf } from './platform/context';

// Ingestion
import { DatasetService, SampleGenerator, createIngestionRoutes } from './domains/ingestion';

// Analytics
import { MetricsService, createAnalyticsRoutes } from './domains/analytics';

const log = createLogger('App');

export interface AppDeps {
  config: AppConfig;
  sessions?: SessionStore;
}

export function createApp({
  config,
  sessions = new SessionStore({ ttlMs: config.sessionTtlMs, maxSessions: config.maxSessions }),
}: AppDeps): Express {
  // ── Domains ──
  const datasetService = new DatasetService(sessions, new SampleGenerator(), config.sampleSeed);
  const metricsService = new MetricsService(sessions, {
    currencySymbol: config.currencySymbol,
    topSourcesLimit: config.topSourcesLimit,
  });

  // ── Express app ──
  const app = express();
  app.use(express.json());
  app.use(express.text({ type: ['text/csv', 'text/plain'], limit: config.maxUploadBytes }));

  // Sessions are created unscoped; everything else runs inside one
  app.post('/api/v1/sessions', (_req, res) => {
    const session = sessions.create();
    log.info(`Created session ${session.id}`);
    res.status(201).json({ id: session.id });
  });

  const scoped = sessionScope(sessions);
  app.delete('/api/v1/session', scoped, (req, res) => {
    sessions.delete(sessionOf(req).id);
    res.status(204).end();
  });
  app.use('/api/v1', scoped, createIngestionRoutes(datasetService, sessions));
  app.use('/api/v1', scoped, createAnalyticsRoutes(metricsService));

  // Health check
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: sessions.size });
  });

  return app;
}
