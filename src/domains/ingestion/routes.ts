// ──────────────────────────────────────────
// Ingestion: API routes
// ──────────────────────────────────────────

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { DEFAULT_SAMPLE_RANGE, DatasetService } from './dataset.service';
import { MAX_SAMPLE_DAYS, daySpan } from './sample';
import { parseCalendarDate } from './validator';
import { SessionContract } from '../../shared/contracts';
import { sessionOf } from '../../platform/context';
import { createLogger } from '../../shared/logger';
import { sendError, sendFailure } from '../../shared/http';
import { listSources } from '../analytics/filter';

const log = createLogger('Ingestion');

const calendarDate = z.string().transform((value, ctx) => {
  const parsed = parseCalendarDate(value);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` });
    return z.NEVER;
  }
  return parsed;
});

const sampleBody = z
  .object({
    start: calendarDate.optional(),
    end: calendarDate.optional(),
    seed: z.number().int().optional(),
  })
  .transform((body) => ({
    start: body.start ?? DEFAULT_SAMPLE_RANGE.start,
    end: body.end ?? DEFAULT_SAMPLE_RANGE.end,
    seed: body.seed,
  }))
  .refine((body) => body.start <= body.end, { message: 'start must not be after end' })
  .refine((body) => daySpan(body.start, body.end) <= MAX_SAMPLE_DAYS, {
    message: `Sample range is limited to ${MAX_SAMPLE_DAYS} days`,
  });

const selectionBody = z.object({
  date_range: z.array(calendarDate).optional(),
  sources: z.array(z.string()).optional(),
});

export function createIngestionRoutes(datasetService: DatasetService, sessions: SessionContract): Router {
  const router = Router();

  // POST /datasets — CSV upload (text/csv body)
  router.post('/datasets', (req: Request, res: Response) => {
    try {
      if (typeof req.body !== 'string' || req.body.trim() === '') {
        res.status(400).json({ error: 'Expected a text/csv request body' });
        return;
      }

      const result = datasetService.loadCsv(sessionOf(req).id, req.body, {
        checkDerivedConsistency: req.query.check_consistency === 'true',
      });
      if (!result.ok) {
        sendFailure(res, result);
        return;
      }
      res.json(result);
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // POST /datasets/sample — synthetic dataset for demos
  router.post('/datasets/sample', (req: Request, res: Response) => {
    try {
      const body = sampleBody.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: body.error.issues.map((i) => i.message).join('; ') });
        return;
      }
      res.json(datasetService.loadSample(sessionOf(req).id, body.data));
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /datasets — what is currently loaded
  router.get('/datasets', (req: Request, res: Response) => {
    try {
      res.json(datasetService.overview(sessionOf(req).id));
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // GET /selection — active filters
  router.get('/selection', (req: Request, res: Response) => {
    try {
      res.json(sessionOf(req).selection);
    } catch (err) {
      sendError(res, err, log);
    }
  });

  // PUT /selection — replace active filters; omitted sources mean all
  router.put('/selection', (req: Request, res: Response) => {
    try {
      const body = selectionBody.safeParse(req.body ?? {});
      if (!body.success) {
        res.status(400).json({ error: body.error.issues.map((i) => i.message).join('; ') });
        return;
      }

      const session = sessionOf(req);
      const updated = sessions.setSelection(session.id, {
        dateRange: body.data.date_range ?? [],
        sources: body.data.sources ?? listSources(session.dataset),
      });
      res.json(updated.selection);
    } catch (err) {
      sendError(res, err, log);
    }
  });

  return router;
}
