import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { DashboardQueryPort, LoggerPort } from '@vehicle-dash/domain';
import type { PushTelemetrySource } from '@vehicle-dash/adapters';

import { dashboardRouter } from './controllers/dashboard.controller.js';
import { ingestRouter } from './controllers/ingest.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDeps {
  query: DashboardQueryPort;
  /** Set when TELEMETRY_SOURCE=http-push */
  push: PushTelemetrySource | null;
  logger: LoggerPort;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: process.env['CORS_ORIGIN'] ?? '*' }));
  app.use(morgan('combined', { stream: { write: (line: string) => deps.logger.debug(line.trimEnd()) } }));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api', dashboardRouter(deps.query));
  app.use('/api/ingest', ingestRouter(deps.push));

  app.get('/healthz', (_req, res) => {
    const source = deps.query.sourceHealth();
    res.json({
      status: source.state === 'unavailable' ? 'degraded' : 'ok',
      ts: new Date().toISOString(),
      source,
      ticks: deps.query.ticksRendered(),
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
