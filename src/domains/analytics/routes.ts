// ──────────────────────────────────────────
// Analytics: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { MetricsService, Outcome } from './metrics.service';
import { exportFileName } from './export';
import { sessionOf } from '../../platform/context';
import { createLogger } from '../../shared/logger';
import { sendError, sendFailure } from '../../shared/http';
import { TECHNOLOGIES, Technology } from '../../shared/types';

const log = createLogger('Analytics');

const topQuery = z.object({ n: z.coerce.number().int().positive().max(1000).optional() });
const seriesQuery = z.object({ by: z.enum(['source', 'total']).default('source') });

function sendOutcome<T>(res: Response, outcome: Outcome<T>): void {
  if (!outcome.ok) {
    sendFailure(res, outcome);
    return;
  }
  res.json({ data: outcome.data });
}

function isTechnology(value: string): value is Technology {
  return TECHNOLOGIES.some((t) => t === value);
}

export function createAnalyticsRoutes(metricsService: MetricsService): Router {
  const router = Router();

  // GET /metrics — full pipeline pass (summary, sources, alerts, top)
  router.get('/metrics', (req: Request, res: Response) => {
    try {
      const result = metricsService.run(sessionOf(req).id);
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /metrics/summary — headline cards
  router.get('/metrics/summary', (req: Request, res: Response) => {
    try {
      sendOutcome(res, metricsService.getSummary(sessionOf(req).id));
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /metrics/sources — detailed per-source table
  router.get('/metrics/sources', (req: Request, res: Response) => {
    try {
      sendOutcome(res, metricsService.getSourceMetrics(sessionOf(req).id));
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /metrics/timeseries?by=source|total — daily revenue
  router.get('/metrics/timeseries', (req: Request, res: Response) => {
    try {
      const query = seriesQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'by must be "source" or "total"' });
        return;
      }
      const sessionId = sessionOf(req).id;
      if (query.data.by === 'total') {
        sendOutcome(res, metricsService.getDailyTotals(sessionId));
      } else {
        sendOutcome(res, metricsService.getSourceTimeSeries(sessionId));
      }
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /metrics/top?n=10 — sources ranked by revenue
  router.get('/metrics/top', (req: Request, res: Response) => {
    try {
      const query = topQuery.safeParse(req.query);
      if (!query.success) {
        res.status(400).json({ error: 'n must be a positive integer' });
        return;
      }
      sendOutcome(res, metricsService.getTopSources(sessionOf(req).id, query.data.n));
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /metrics/technologies/:technology — Google / Prebid / TAM breakdown
  router.get('/metrics/technologies/:technology', (req: Request, res: Response) => {
    try {
      const technology = req.params.technology;
      if (!isTechnology(technology)) {
        res.status(400).json({ error: `Unsupported technology: ${technology}` });
        return;
      }
      sendOutcome(res, metricsService.getTechnology(sessionOf(req).id, technology));
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /alerts — evaluate thresholds now
  router.get('/alerts', (req: Request, res: Response) => {
    try {
      sendOutcome(res, metricsService.evaluate(sessionOf(req).id));
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /alerts/last — stored report, without re-evaluating
  router.get('/alerts/last', (req: Request, res: Response) => {
    try {
      res.json({ data: metricsService.lastAlerts(sessionOf(req).id) });
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /export — filtered rows as a CSV download
  router.get('/export', (req: Request, res: Response) => {
    try {
      const outcome = metricsService.exportCsv(sessionOf(req).id);
      if (!outcome.ok) {
        sendFailure(res, outcome);
        return;
      }
      res
        .status(200)
        .type('text/csv')
        .attachment(exportFileName())
        .send(outcome.data);
    } catch (err) {
      sendError(res, err, log);
    }
  });

  return router;
}
