/**
 * RecurringTask - запускает асинхронную задачу по расписанию node-cron,
 * не допуская параллельных запусков
 */

import cron, { ScheduledTask } from 'node-cron';
import { Logger } from 'winston';
import { createLogger } from '../utils/logger';

export class RecurringTask {
  private logger: Logger;
  private cronTask: ScheduledTask | null = null;
  private isProcessing: boolean = false;
  private rerunRequested: boolean = false;
  private current: Promise<void> | null = null;

  constructor(
    private readonly name: string,
    private readonly cronExpression: string,
    private readonly job: () => Promise<void>,
  ) {
    this.logger = createLogger(`RecurringTask:${name}`);
  }

  /**
   * Запускает тикер
   */
  start(): void {
    if (this.cronTask) {
      return;
    }
    this.logger.info(`Задача ${this.name} запущена по расписанию ${this.cronExpression}`);
    this.cronTask = cron.schedule(this.cronExpression, () => {
      void this.tick();
    });
  }

  /**
   * Останавливает тикер и дожидается текущего запуска
   */
  async stop(): Promise<void> {
    if (this.cronTask) {
      this.cronTask.stop();
      this.cronTask = null;
    }
    this.rerunRequested = false;
    if (this.current) {
      await this.current;
    }
    this.logger.info(`Задача ${this.name} остановлена`);
  }

  /**
   * Ручной запуск. Если задача уже выполняется, после нее будет еще один проход.
   */
  runNow(): Promise<void> {
    if (this.isProcessing) {
      this.rerunRequested = true;
      return this.current ?? Promise.resolve();
    }
    return this.execute();
  }

  get running(): boolean {
    return this.isProcessing;
  }

  private tick(): Promise<void> {
    if (this.isProcessing) {
      this.logger.debug(`Предыдущий запуск ${this.name} еще не завершен, пропускаю тик`);
      return Promise.resolve();
    }
    return this.execute();
  }

  private execute(): Promise<void> {
    this.isProcessing = true;
    this.current = this.loop().finally(() => {
      this.isProcessing = false;
      this.current = null;
    });
    return this.current;
  }

  private async loop(): Promise<void> {
    do {
      this.rerunRequested = false;
      try {
        await this.job();
      } catch (error) {
        this.logger.error(`Ошибка при выполнении задачи ${this.name}:`, error);
      }
    } while (this.rerunRequested);
  }
}
