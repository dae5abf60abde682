import express from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import type { Assistant } from './assistant.js';
import { createApiRouter } from './api/apiRouter.js';
import { createWebhookRouter } from './adapters/telegram/webhookRouter.js';

const logger = createLogger({ component: 'server' });

export function createApp(assistant: Assistant): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  // Routes
  app.use('/api', createApiRouter(assistant));
  if (assistant.telegram) {
    app.use('/webhook', createWebhookRouter(assistant.telegram));
  }

  // Health check
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Error handling
  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    const status = 'status' in err && typeof err.status === 'number' && err.status < 500 ? err.status : 500;
    res.status(status).json({ success: false, error: status === 500 ? 'Internal server error' : err.message });
  });

  return app;
}

export async function startServer(assistant: Assistant, port: number, host: string = '0.0.0.0'): Promise<Server> {
  const app = createApp(assistant);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
