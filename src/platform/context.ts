// ──────────────────────────────────────────
// Platform: Per-request session context
// ──────────────────────────────────────────
// The session middleware resolves the caller's session once and attaches
// the snapshot to the request. Handlers read it back from the request they
// were given; nothing is looked up from ambient state.

import { Request } from 'express';
import { SessionContext } from '../shared/types';

const resolved = new WeakMap<Request, SessionContext>();

export function bindSession(req: Request, session: SessionContext): void {
  resolved.set(req, session);
}

/** The session snapshot taken when the request entered the scoped routes. */
export function sessionOf(req: Request): SessionContext {
  const session = resolved.get(req);
  if (!session) {
    throw new Error(`${req.method} ${req.path} is not mounted behind the session middleware`);
  }
  return session;
}
