import express, { Express } from 'express';
import type { RouteContext } from './routes/types.js';
import { configurationRoutes, pluginRoutes, settingRoutes } from './routes/index.js';
import { isEditorConfigError } from '../errors.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('http');

const ALLOWED_ORIGIN = /^http:\/\/(localhost|127\.0\.0\.1):\d+$/;

export function createHttpServer(ctx: RouteContext): Express {
  const app = express();

  app.use((req, res, next) => {
    const origin = req.headers.origin;
    if (origin && ALLOWED_ORIGIN.test(origin)) {
      res.header('Access-Control-Allow-Origin', origin);
    }
    res.header('Access-Control-Allow-Methods', 'GET, PUT, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, X-User-Id');
    res.header('X-Content-Type-Options', 'nosniff');
    if (req.method === 'OPTIONS') {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(configurationRoutes(ctx));
  app.use(pluginRoutes(ctx));
  app.use(settingRoutes(ctx));

  // Error middleware; registered after every router
  app.use((err: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (res.headersSent) return;
    if (isEditorConfigError(err)) {
      log.info({ kind: err.kind, path: req.path }, err.message);
      res.status(err.status).json({ success: false, kind: err.kind, error: err.message });
      return;
    }
    log.error({ err, path: req.path }, 'Unhandled route error');
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}
