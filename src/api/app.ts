/**
 * Express application for Cleaning Dispatch
 */

import express from 'express';
import cors from 'cors';

import { config } from '../lib/config';
import type { ServiceDeps } from '../lib/services';
import { createAssignmentRouter } from './routes/assignment';
import { createRosterRouter } from './routes/roster';

export function createApp(deps: ServiceDeps, corsOrigin: string = config.corsOrigin): express.Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: corsOrigin,
    credentials: true,
  }));
  app.use(express.json({ limit: '5mb' }));

  // Request logging
  app.use((req, res, next) => {
    console.log(`[${new Date().toISOString()}] ${req.method} ${req.path}`);
    next();
  });

  // Health check endpoint
  app.get('/api/health', (req, res) => {
    const roster = deps.rosterStore.status();
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      roster: {
        loaded: roster.loaded,
        technicianCount: roster.technicianCount,
        lastLoadedAt: roster.lastLoadedAt,
        source: roster.source,
      },
    });
  });

  // Mount routes
  app.use('/api/assign', createAssignmentRouter(deps));
  app.use('/api/roster', createRosterRouter(deps.rosterStore));

  // Error handling middleware
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error('API Error:', err);
    // Unparseable JSON bodies are the caller's fault
    const status = err instanceof SyntaxError ? 400 : 500;
    res.status(status).json({
      error: true,
      message: err.message || 'Internal server error',
    });
  });

  return app;
}
