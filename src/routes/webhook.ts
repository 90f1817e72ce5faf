/**
 * Webhook route - receives Telegram updates and hands them to the bot
 */

import express, { Request, Response } from 'express';
import TelegramBot from 'node-telegram-bot-api';
import { z } from 'zod';
import { createLogger } from '../utils/logger';
import { ValidationError } from '../utils/errors';
import { asyncHandler } from '../middleware/errorHandler';

const routeLogger = createLogger('WebhookRoutes');

export interface UpdateConsumer {
  processUpdate(update: TelegramBot.Update): void;
}

const updateSchema = z.object({
  update_id: z.number().int(),
});

export function createWebhookRouter(bot: UpdateConsumer): express.Router {
  const router = express.Router();

  /**
   * POST /webhook
   * Telegram delivers one update per request and only needs a 200 back
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const validationResult = updateSchema.safeParse(req.body);
      if (!validationResult.success) {
        throw new ValidationError('Invalid update payload');
      }

      routeLogger.debug('Update received', {
        updateId: validationResult.data.update_id,
      });
      bot.processUpdate(req.body);

      res.status(200).json({ ok: true });
    }),
  );

  return router;
}
