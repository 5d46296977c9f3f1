import type { Router } from 'express';
import express from 'express';
import { middleware, SignatureValidationFailed, type WebhookEvent } from '@line/bot-sdk';
import type { LineAdapter } from './LineAdapter.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';

export function readWebhookEvents(body: unknown): WebhookEvent[] | null {
  if (typeof body !== 'object' || body === null || !('events' in body) || !Array.isArray(body.events)) {
    return null;
  }
  return body.events;
}

export function createWebhookRouter(adapter: LineAdapter, channelSecret: string): Router {
  const logger = createLogger({ component: 'webhookRouter' });
  const router = express.Router();

  // The LINE middleware verifies the signature against the raw body and parses it itself.
  router.post('/line', middleware({ channelSecret }), async (req, res) => {
    const correlationId = generateCorrelationId();
    const requestLogger = logger.child({ correlationId });

    const events = readWebhookEvents(req.body);
    if (!events) {
      requestLogger.warn('Webhook body without events');
      res.status(400).json({ ok: false, error: 'Invalid webhook body' });
      return;
    }

    try {
      requestLogger.info({ eventCount: events.length }, 'Received webhook request');
      await adapter.handleWebhook(events, correlationId);
      res.status(200).json({ ok: true });
    } catch (error) {
      requestLogger.error({ error }, 'Error processing webhook');
      res.status(500).json({ ok: false, error: 'Internal server error' });
    }
  });

  router.use((err: Error, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof SignatureValidationFailed) {
      logger.warn({ error: err }, 'Rejected webhook with invalid signature');
      res.status(401).json({ ok: false, error: 'Invalid signature' });
      return;
    }
    next(err);
  });

  return router;
}
