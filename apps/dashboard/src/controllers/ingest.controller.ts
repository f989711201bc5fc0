import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { PushTelemetrySource } from '@vehicle-dash/adapters';

/** POST /api/ingest/readings: push-mode telemetry */
export function ingestRouter(push: PushTelemetrySource | null): Router {
  const router = Router();

  router.post('/readings', (req: Request, res: Response, next: NextFunction) => {
    if (!push) {
      res.status(404).json({ error: 'push ingestion is not enabled' });
      return;
    }
    try {
      const result = push.push(req.body);
      res.status(202).json(result);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
