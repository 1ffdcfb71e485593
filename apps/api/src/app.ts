import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { ValuationUseCasePort } from '@valuation/domain';

import { createValuationRouter } from './controllers/valuation.controller.js';
import { createIdvRouter } from './controllers/idv.controller.js';
import { createRcRouter } from './controllers/rc.controller.js';
import { createHistoryRouter } from './controllers/history.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface AppDeps {
  service: ValuationUseCasePort;
  corsOrigin?: string;
  /** Set false to silence request logging (tests). */
  requestLogging?: boolean;
}

export function buildApp(deps: AppDeps): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  if (deps.requestLogging !== false) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/v1/valuation', createValuationRouter(deps.service));
  app.use('/api/v1/idv', createIdvRouter(deps.service));
  app.use('/api/v1/rc', createRcRouter(deps.service));
  app.use('/api/v1/valuations', createHistoryRouter(deps.service));

  app.get('/health', (_req, res) => {
    res.json({ success: true, status: 'healthy', ts: new Date().toISOString() });
  });

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: 'Not found' });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
