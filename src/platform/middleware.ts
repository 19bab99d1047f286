// ──────────────────────────────────────────
// Platform: Session-scope middleware
// ──────────────────────────────────────────

import { Request, Response, NextFunction } from 'express';
import { SessionStore } from './session';
import { bindSession } from './context';

export function sessionScope(store: SessionStore) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const sessionId = req.header('x-session-id');
    if (!sessionId) {
      res.status(400).json({ error: 'Missing x-session-id header' });
      return;
    }

    // Expired sessions resolve to null as well
    const session = store.resolve(sessionId);
    if (!session) {
      res.status(404).json({ error: `Unknown session: ${sessionId}` });
      return;
    }

    bindSession(req, session);
    next();
  };
}
