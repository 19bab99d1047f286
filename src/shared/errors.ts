// ──────────────────────────────────────────
// Shared error taxonomy
// ──────────────────────────────────────────

import { FailureKind, PipelineFailure } from './types';

export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;

  toFailure(): PipelineFailure {
    return { ok: false, kind: this.kind, message: this.message };
  }
}

export class SchemaError extends PipelineError {
  readonly kind = 'SchemaError' as const;
  name = 'SchemaError';
}

export class FormatError extends PipelineError {
  readonly kind = 'FormatError' as const;
  name = 'FormatError';
}

/** Non-numeric required column. Named apart from the global TypeError. */
export class ColumnTypeError extends PipelineError {
  readonly kind = 'TypeError' as const;
  name = 'ColumnTypeError';
}

export class EmptyResultError extends PipelineError {
  readonly kind = 'EmptyResultError' as const;
  name = 'EmptyResultError';
}

export class ConsistencyError extends PipelineError {
  readonly kind = 'ConsistencyError' as const;
  name = 'ConsistencyError';
}

export class SessionNotFoundError extends Error {
  name = 'SessionNotFoundError';

  constructor(sessionId: string) {
    super(`Unknown session: ${sessionId}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
