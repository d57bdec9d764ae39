/**
 * ============================================
 * LENDING HUB - API SERVER
 * ============================================
 *
 * API SURFACE:
 * - GET  /health
 * - POST /v1/actions          (hub key)
 * - GET  /v1/...              (hub key)
 * - POST /admin/actions       (admin key)
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { AppConfig } from '../config';
import { LoanManagerService } from '../modules/loan-manager';
import { ActionProcessor } from '../workers/actionProcessor';
import { adminAuthMiddleware, hubAuthMiddleware } from './middleware/auth.middleware';
import { createActionRoutes } from './routes/action.routes';
import { createQueryRoutes } from './routes/query.routes';

export interface ServerDependencies {
  service: LoanManagerService;
  processor: ActionProcessor;
  mode: 'postgres' | 'memory';
}

export function createServer(deps: ServerDependencies, config: AppConfig): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      limit: config.RATE_LIMIT_PER_MINUTE,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // Health check (public)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'OK', service: 'lending-hub', storage: deps.mode, timestamp: new Date().toISOString() });
  });

  const hubAuth = hubAuthMiddleware(config);
  app.use('/v1/actions', hubAuth, createActionRoutes(deps.processor, 'hub'));
  app.use('/v1', hubAuth, createQueryRoutes(deps.service));
  app.use('/admin/actions', adminAuthMiddleware(config), createActionRoutes(deps.processor, 'admin'));

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('[Error]', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
