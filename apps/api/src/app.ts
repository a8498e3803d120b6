import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import { createActionsRouter } from './controllers/actions.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import type { AppContainer } from './container.js';

export interface BuildAppOptions {
  corsOrigin?: string;
  accessLog?: boolean;
}

export function buildApp(container: AppContainer, options: BuildAppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  if (options.accessLog ?? true) app.use(morgan('combined'));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/integrations', createActionsRouter(container.actions));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
