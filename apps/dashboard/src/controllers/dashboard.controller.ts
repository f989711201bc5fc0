import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { DashboardQueryPort } from '@vehicle-dash/domain';
import { UnknownMetricError, isMetricName } from '@vehicle-dash/domain';

export function dashboardRouter(query: DashboardQueryPort): Router {
  const router = Router();

  /** GET /api/snapshot: the most recently rendered frame */
  router.get('/snapshot', (_req: Request, res: Response) => {
    const frame = query.latestFrame();
    if (!frame) {
      res.status(404).json({ error: 'no frame rendered yet' });
      return;
    }
    res.json(frame);
  });

  /** GET /api/alerts: alerts for the current state, not the last frame */
  router.get('/alerts', (_req: Request, res: Response) => {
    const alerts = query.currentAlerts();
    res.json({ data: alerts, total: alerts.length });
  });

  /** GET /api/history/:metric: rolling history, oldest first */
  router.get('/history/:metric', (req: Request, res: Response, next: NextFunction) => {
    const { metric } = req.params;
    if (!metric || !isMetricName(metric)) {
      next(new UnknownMetricError(metric ?? ''));
      return;
    }
    const data = query.history(metric);
    res.json({ metric, data, total: data.length });
  });

  return router;
}
