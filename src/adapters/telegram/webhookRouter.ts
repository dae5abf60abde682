import type { Router } from 'express';
import express from 'express';
import type { TelegramChannelAdapter } from './TelegramChannelAdapter.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { ChannelError } from '../../utils/errors.js';

export function createWebhookRouter(adapter: TelegramChannelAdapter): Router {
  const logger = createLogger({ component: 'webhookRouter' });
  const router = express.Router();

  router.post('/telegram', express.json(), async (req, res) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });

    try {
      requestLogger.debug({ body: req.body }, 'Received webhook request');
      await adapter.handleWebhook(req.body);

      // Telegram expects 200 OK
      res.status(200).json({ ok: true });
    } catch (error) {
      if (error instanceof ChannelError && error.status === 400) {
        requestLogger.warn({ error }, 'Rejected webhook body');
        res.status(400).json({ ok: false, error: error.message });
        return;
      }
      requestLogger.error({ error }, 'Error processing webhook');
      res.status(500).json({ ok: false, error: 'Internal server error' });
    }
  });

  return router;
}
