// ──────────────────────────────────────────
// Shared: HTTP response helpers
// ──────────────────────────────────────────

import { Response } from 'express';
import { errorMessage } from './errors';
import { Logger } from './logger';
import { FailureKind, PipelineFailure } from './types';

const FAILURE_STATUS: Record<FailureKind, number> = {
  SchemaError: 422,
  FormatError: 422,
  TypeError: 422,
  ConsistencyError: 422,
  EmptyResultError: 409,
};

export function sendFailure(res: Response, failure: PipelineFailure): void {
  res.status(FAILURE_STATUS[failure.kind]).json({ error: failure.kind, message: failure.message });
}

export function sendError(res: Response, err: unknown, log: Logger): void {
  const message = errorMessage(err);
  log.error('Request failed:', message);
  res.status(500).json({ error: message });
}
