/**
 * HTTP surface: health check and Telegram webhook
 */

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { createWebhookRouter, UpdateConsumer } from './routes/webhook';
import {
  requestLogger,
  errorHandler,
  notFoundHandler,
} from './middleware/errorHandler';

export interface HealthSource {
  getStatus(): { connected: boolean };
}

export interface AppDependencies {
  bot: UpdateConsumer;
  database: HealthSource;
  environment: string;
}

export function createApp({ bot, database, environment }: AppDependencies): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req, res) => {
    const db = database.getStatus();
    res.status(db.connected ? 200 : 503).json({
      status: db.connected ? 'OK' : 'DEGRADED',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment,
      database: db,
    });
  });

  app.use('/webhook', createWebhookRouter(bot));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Global error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
