/**
 * ScheduleService - creates, cancels and lists scheduled posts on behalf of bot users
 */

import { isBefore } from 'date-fns';
import { Logger } from 'winston';
import {
  PostState,
  ScheduledPost,
  SourceRef,
  UserRecord,
} from '../database/models';
import { ScheduleStore } from '../database/repositories';
import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { parseTimeInput, resolveDispatchInstant } from '../utils/timezone';
import { AccessControlService } from './AccessControlService';
import {
  ChannelRegistryService,
  TargetSelection,
} from './ChannelRegistryService';

export interface PostDraft {
  source: SourceRef;
  targets: TargetSelection[];
}

export interface ScheduleServiceOptions {
  historyLimit: number;
}

const RESCHEDULABLE_STATES: readonly PostState[] = ['failed', 'cancelled'];

export class ScheduleService {
  private logger: Logger;

  constructor(
    private readonly schedules: ScheduleStore,
    private readonly access: AccessControlService,
    private readonly registry: ChannelRegistryService,
    private readonly options: ScheduleServiceOptions,
  ) {
    this.logger = createLogger('ScheduleService');
  }

  /**
   * `timeText` null means "send now". The dispatch instant is fixed here
   * with the owner's current offset.
   */
  async schedule(
    ownerId: number,
    draft: PostDraft,
    timeText: string | null,
    now: Date,
  ): Promise<ScheduledPost> {
    const owner = await this.access.requireAuthorized(ownerId);
    const targets = await this.registry.resolveTargets(draft.targets);
    const { requestedTime, dispatchAt } = this.resolveTime(owner, timeText, now);

    const post = await this.schedules.create({
      ownerId,
      source: draft.source,
      targets,
      requestedTime,
      dispatchAt,
    });
    this.logger.info('Post scheduled', {
      postId: post.id,
      ownerId,
      dispatchAt: dispatchAt.toISOString(),
    });
    return post;
  }

  async cancel(actorId: number, postId: number): Promise<ScheduledPost> {
    const actor = await this.access.requireAuthorized(actorId);
    const post = await this.getOwnedPost(actor, postId);
    return this.schedules.cancel(post.id);
  }

  /**
   * Schedules a fresh copy of a failed or cancelled post. The original stays untouched.
   */
  async reschedule(
    actorId: number,
    postId: number,
    timeText: string,
    now: Date,
  ): Promise<ScheduledPost> {
    const actor = await this.access.requireAuthorized(actorId);
    const post = await this.getOwnedPost(actor, postId);

    if (!RESCHEDULABLE_STATES.includes(post.state)) {
      throw new ValidationError(
        `Post ${post.id} is ${post.state}, only failed or cancelled posts can be rescheduled`,
        'INVALID_STATE',
      );
    }

    const owner =
      post.ownerId === actor.userId
        ? actor
        : (await this.access.getUser(post.ownerId)) ?? actor;
    const targets = await this.registry.resolveTargets(post.targets);
    const { requestedTime, dispatchAt } = this.resolveTime(owner, timeText, now);

    const created = await this.schedules.create({
      ownerId: post.ownerId,
      source: post.source,
      targets,
      requestedTime,
      dispatchAt,
    });
    this.logger.info('Post rescheduled', {
      fromPostId: post.id,
      postId: created.id,
      dispatchAt: dispatchAt.toISOString(),
    });
    return created;
  }

  async listScheduled(actorId: number): Promise<ScheduledPost[]> {
    const actor = await this.access.requireAuthorized(actorId);
    return this.schedules.listScheduled(
      actor.status === 'superadmin' ? undefined : actor.userId,
    );
  }

  async listHistory(
    actorId: number,
    limit: number = this.options.historyLimit,
  ): Promise<ScheduledPost[]> {
    const actor = await this.access.requireAuthorized(actorId);
    return this.schedules.listHistory(
      actor.status === 'superadmin' ? undefined : actor.userId,
      limit,
    );
  }

  private resolveTime(
    owner: UserRecord,
    timeText: string | null,
    now: Date,
  ): { requestedTime: string | null; dispatchAt: Date } {
    const localTime = timeText === null ? { kind: 'now' as const } : parseTimeInput(timeText);
    const dispatchAt = resolveDispatchInstant(localTime, owner.tzOffsetMinutes, now);

    if (isBefore(dispatchAt, now)) {
      throw new ValidationError('This time has already passed', 'INVALID_TIME');
    }

    return {
      requestedTime: localTime.kind === 'now' ? null : timeText,
      dispatchAt,
    };
  }

  private async getOwnedPost(
    actor: UserRecord,
    postId: number,
  ): Promise<ScheduledPost> {
    const post = await this.schedules.get(postId);
    if (!post) {
      throw new NotFoundError(`Scheduled post ${postId}`);
    }
    if (post.ownerId !== actor.userId && actor.status !== 'superadmin') {
      throw new AuthorizationError(
        'NOT_AUTHORIZED',
        'Only the owner can manage this post',
      );
    }
    return post;
  }
}
