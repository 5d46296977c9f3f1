import express, { type Express } from 'express';
import type { Server } from 'node:http';
import { createLogger } from './utils/logger.js';
import type { LineAdapter } from './adapters/line/LineAdapter.js';
import { createWebhookRouter } from './adapters/line/webhookRouter.js';

const logger = createLogger({ component: 'server' });

export function createApp(adapter: LineAdapter, channelSecret: string): Express {
  const app = express();

  // No body parser here: the LINE middleware needs the raw body to verify signatures.
  app.use((req, _res, next) => {
    logger.info({ method: req.method, path: req.path }, 'Incoming request');
    next();
  });

  app.use('/webhook', createWebhookRouter(adapter, channelSecret));

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    logger.error({ error: err }, 'Unhandled error in Express');
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

export async function startServer(
  adapter: LineAdapter,
  channelSecret: string,
  port: number,
  host: string = '0.0.0.0'
): Promise<Server> {
  const app = createApp(adapter, channelSecret);

  return new Promise((resolve) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
  });
}
