/**
 * DispatchLoop - periodically claims due posts and publishes them to every target
 */

import { Logger } from 'winston';
import {
  DeliveryMethod,
  Platform,
  ScheduledPost,
  TargetRef,
  TargetResult,
} from '../database/models';
import { ScheduleStore } from '../database/repositories';
import { PlatformClient, SendResult, sendFailure } from '../platform/types';
import { withTimeout } from '../utils/async';
import { intervalToCronExpression } from '../utils/cron';
import {
  ConfigError,
  NotFoundError,
  RepositoryError,
  StateConflictError,
  errorMessage,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { aggregateState } from './postStateMachine';
import { RecurringTask } from './RecurringTask';

export type Clock = () => Date;

export type PlatformClients = Partial<Record<Platform, PlatformClient>>;

export interface DispatchLoopOptions {
  intervalSeconds: number;
  /** Upper bound for a single platform call */
  timeoutMs: number;
}

export interface TickSummary {
  due: number;
  claimed: number;
  sent: number;
  failed: number;
  skipped: number;
}

export class DispatchLoop {
  private logger: Logger;
  private task: RecurringTask;

  constructor(
    private readonly schedules: ScheduleStore,
    private readonly clients: PlatformClients,
    private readonly options: DispatchLoopOptions,
    private readonly clock: Clock = () => new Date(),
  ) {
    this.logger = createLogger('DispatchLoop');

    const expression = intervalToCronExpression(options.intervalSeconds);
    if (!expression) {
      throw new ConfigError(
        `Dispatch interval of ${options.intervalSeconds}s cannot be scheduled`,
      );
    }
    this.task = new RecurringTask('dispatch', expression, async () => {
      await this.tick();
    });
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  /**
   * Runs a tick outside the schedule, e.g. right after a "send now" post
   */
  trigger(): Promise<void> {
    return this.task.runNow();
  }

  /**
   * One pass over due posts. RepositoryError aborts the pass, anything else
   * is contained to the post it happened on.
   */
  async tick(): Promise<TickSummary> {
    const summary: TickSummary = {
      due: 0,
      claimed: 0,
      sent: 0,
      failed: 0,
      skipped: 0,
    };

    const due = await this.schedules.listDue(this.clock());
    summary.due = due.length;
    if (due.length === 0) {
      return summary;
    }

    this.logger.info(`Found ${due.length} due posts`);

    for (const post of due) {
      const claimed = await this.claim(post);
      if (!claimed) {
        summary.skipped++;
        continue;
      }
      summary.claimed++;

      const results = await this.dispatchPost(claimed);
      const finalState = aggregateState(results);

      try {
        await this.schedules.transition(
          claimed.id,
          'dispatching',
          finalState,
          results,
        );
      } catch (error) {
        if (error instanceof RepositoryError) {
          throw error;
        }
        this.logger.error('Failed to record dispatch outcome', {
          postId: claimed.id,
          error: errorMessage(error),
        });
        continue;
      }

      if (finalState === 'sent') {
        summary.sent++;
      } else {
        summary.failed++;
      }
      this.logger.info(`Post ${claimed.id} ${finalState}`, {
        postId: claimed.id,
        results: results.map((result) => ({
          target: `${result.platform}:${result.externalId}`,
          status: result.status,
          method: result.method,
          reason: result.reason,
        })),
      });
    }

    return summary;
  }

  private async claim(post: ScheduledPost): Promise<ScheduledPost | null> {
    try {
      return await this.schedules.transition(post.id, 'scheduled', 'dispatching');
    } catch (error) {
      if (error instanceof StateConflictError || error instanceof NotFoundError) {
        this.logger.debug('Post already claimed elsewhere', {
          postId: post.id,
          error: error.message,
        });
        return null;
      }
      throw error;
    }
  }

  private async dispatchPost(post: ScheduledPost): Promise<TargetResult[]> {
    const results: TargetResult[] = [];
    for (const target of post.targets) {
      results.push(await this.deliver(post, target));
    }
    return results;
  }

  private async deliver(
    post: ScheduledPost,
    target: TargetRef,
  ): Promise<TargetResult> {
    const client = this.clients[target.platform];
    if (!client) {
      return toTargetResult(
        target,
        undefined,
        sendFailure('other', `Platform ${target.platform} is not configured`),
      );
    }

    if (!client.supportsForward) {
      if (!post.source.text && !post.source.photoFileId) {
        return toTargetResult(
          target,
          'post',
          sendFailure('other', 'Source message has no text or photo to publish'),
        );
      }
      const posted = await this.bounded(() => client.publish(post.source, target));
      return toTargetResult(target, 'post', posted);
    }

    const forwarded = await this.bounded(() => client.forward(post.source, target));
    if (forwarded.success || forwarded.reason !== 'not_member') {
      return toTargetResult(target, 'forward', forwarded);
    }

    this.logger.info('Forward rejected, falling back to copy', {
      postId: post.id,
      target: target.externalId,
      from: post.source.fallback?.chatId ?? post.source.chatId,
    });
    const copied = await this.bounded(() => client.copy(post.source, target));
    return toTargetResult(target, 'copy', copied);
  }

  private bounded(call: () => Promise<SendResult>): Promise<SendResult> {
    const { timeoutMs } = this.options;
    const guarded = call().catch((error: unknown) =>
      sendFailure('other', errorMessage(error)),
    );
    return withTimeout(guarded, timeoutMs, () =>
      sendFailure('transient', `Platform call timed out after ${timeoutMs} ms`),
    );
  }
}

function toTargetResult(
  target: TargetRef,
  method: DeliveryMethod | undefined,
  result: SendResult,
): TargetResult {
  if (result.success) {
    return {
      platform: target.platform,
      externalId: target.externalId,
      status: 'sent',
      method,
      messageRef: result.messageRef,
    };
  }
  return {
    platform: target.platform,
    externalId: target.externalId,
    status: 'failed',
    method,
    reason: result.reason,
    error: result.error,
  };
}
