import { Server } from 'http';
import TelegramBot from 'node-telegram-bot-api';
import { createApp } from './app';
import { TelegramBotService } from './bot/TelegramBot';
import { AppConfig, loadConfig } from './config';
import { DatabaseConnection } from './database/connection';
import { ChannelDAO, ScheduleDAO, UserDAO } from './database/dao';
import { TelegramPlatformClient } from './platform/TelegramPlatformClient';
import { VkPlatformClient } from './platform/VkPlatformClient';
import { AccessControlService } from './services/AccessControlService';
import {
  ChannelDiscoveries,
  ChannelRegistryService,
} from './services/ChannelRegistryService';
import { DispatchLoop, PlatformClients } from './services/DispatchLoop';
import { ScheduleService } from './services/ScheduleService';
import { createLogger } from './utils/logger';

const logger = createLogger('Main');

const SHUTDOWN_TIMEOUT_MS = 10000;

async function main(config: AppConfig): Promise<void> {
  const database = new DatabaseConnection(config.database);
  await database.connect();
  await database.migrate();

  const api = new TelegramBot(config.botToken, { polling: false });
  const telegram = new TelegramPlatformClient(api);
  const vk = config.vk ? new VkPlatformClient(config.vk, api) : undefined;

  const clients: PlatformClients = { telegram, vk };
  const discoveries: ChannelDiscoveries = { telegram, vk };

  const access = new AccessControlService(new UserDAO(database), {
    registrationQueueCap: config.scheduling.registrationQueueCap,
    defaultTzOffsetMinutes: config.scheduling.defaultTzOffsetMinutes,
  });
  const registry = new ChannelRegistryService(
    new ChannelDAO(database),
    discoveries,
    access,
  );
  const scheduleStore = new ScheduleDAO(database);
  const schedules = new ScheduleService(scheduleStore, access, registry, {
    historyLimit: config.scheduling.historyLimit,
  });
  const dispatch = new DispatchLoop(scheduleStore, clients, {
    intervalSeconds: config.scheduling.dispatchIntervalSeconds,
    timeoutMs: config.scheduling.dispatchTimeoutMs,
  });

  const bot = new TelegramBotService(
    api,
    { access, registry, schedules, dispatch },
    { webhookUrl: config.webhookUrl },
  );
  await bot.initialize();
  dispatch.start();

  const app = createApp({ bot, database, environment: config.nodeEnv });
  const server: Server = app.listen(config.port, () => {
    logger.info(`🚀 Server is running on port ${config.port}`);
    logger.info(`📝 Environment: ${config.nodeEnv}`);
    logger.info(`📬 Updates via ${bot.polling ? 'polling' : 'webhook'}`);
    logger.info(
      `⏱ Dispatch every ${config.scheduling.dispatchIntervalSeconds}s${vk ? ', VK enabled' : ''}`,
    );
  });

  let shuttingDown = false;
  const gracefulShutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`📊 Received ${signal}. Starting graceful shutdown...`);

    // Force shutdown after timeout
    setTimeout(() => {
      logger.error('❌ Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    await new Promise<void>((resolve) => server.close(() => resolve()));
    logger.info('✅ HTTP server closed');
    await bot.stop();
    await dispatch.stop();
    await database.disconnect();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    gracefulShutdown(signal).catch((error: unknown) => {
      logger.error('Error during shutdown', { error });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

try {
  const config = loadConfig();
  main(config).catch((error: unknown) => {
    logger.error('Failed to start', { error });
    process.exit(1);
  });
} catch (error) {
  logger.error('Invalid configuration', { error });
  process.exit(1);
}
