import type { Router } from 'express';
import express from 'express';
import { basename, resolve } from 'node:path';
import { z } from 'zod';
import type { Assistant } from '../assistant.js';
import { DEFAULT_IMAGES_DIR } from '../adapters/image/imageFiles.js';
import { CONTENT_TYPES } from '../core/capabilities/providers/TextCapability.js';
import { createLogger, generateCorrelationId } from '../utils/logger.js';

const commandBodySchema = z.object({
  command: z.string().trim().min(1, 'command must not be empty').max(4000),
});

const IMAGE_FILENAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/** Generated images are served by file name; the local path never leaves the process. */
function withImageUrl(data: Record<string, unknown>): Record<string, unknown> {
  const reference = data.imageReference;
  if (typeof reference !== 'string') {
    return data;
  }
  return { ...data, imageUrl: `/api/images/${encodeURIComponent(basename(reference))}` };
}

const historyQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(20),
});

export function createApiRouter(assistant: Assistant): Router {
  const logger = createLogger({ component: 'apiRouter' });
  const router = express.Router();

  router.post('/command', async (req, res, next) => {
    const requestLogger = logger.child({ correlationId: generateCorrelationId() });
    const parsed = commandBodySchema.safeParse(req.body);
    if (!parsed.success) {
      const error = parsed.error.issues[0]?.message ?? 'Invalid request body';
      requestLogger.warn({ issues: parsed.error.issues }, 'Rejected command body');
      res.status(400).json({ success: false, error });
      return;
    }

    try {
      const outcome = await assistant.executor.execute(parsed.data.command);
      requestLogger.info({ commandId: outcome.commandId, status: outcome.status }, 'Command handled');
      res.status(200).json({
        success: outcome.success,
        message: outcome.message,
        intent: outcome.intent,
        status: outcome.status,
        commandId: outcome.commandId,
        ...(outcome.data ? { data: withImageUrl(outcome.data) } : {}),
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/status', (_req, res) => {
    res.status(200).json(assistant.ledger.statusSnapshot(new Date()));
  });

  router.get('/commands', (req, res) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: parsed.error.issues[0]?.message ?? 'Invalid query' });
      return;
    }
    res.status(200).json(assistant.ledger.commandHistory(parsed.data.page, parsed.data.per_page));
  });

  router.get('/providers', (_req, res) => {
    res.status(200).json({
      providers: assistant.registry.describe(),
      channels: assistant.supervisor.channels().map((channel) => ({
        channel,
        interval_ms: assistant.supervisor.intervalFor(channel) ?? null,
      })),
    });
  });

  router.get('/images/:filename', (req, res, next) => {
    const { filename } = req.params;
    if (!IMAGE_FILENAME.test(filename) || filename.includes('..')) {
      res.status(400).json({ success: false, error: 'Invalid image name' });
      return;
    }
    const root = resolve(assistant.config.generatedImagesDir ?? DEFAULT_IMAGES_DIR);
    res.sendFile(filename, { root, dotfiles: 'deny' }, (error) => {
      if (!error) return;
      if (res.headersSent) {
        next(error);
        return;
      }
      res.status(404).json({ success: false, error: 'Image not found' });
    });
  });

  router.get('/content-types', (_req, res) => {
    res.status(200).json({
      success: true,
      content_types: Object.entries(CONTENT_TYPES).map(([type, description]) => ({
        type,
        name: type
          .split('_')
          .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
          .join(' '),
        description,
      })),
    });
  });

  router.post('/auto-reply/run', async (_req, res, next) => {
    try {
      const outcomes = await assistant.supervisor.runNow();
      res.status(200).json({ success: true, outcomes });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
