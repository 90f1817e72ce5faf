/**
 * ScheduleDAO - Data Access Object для запланированных публикаций
 */

import { z } from 'zod';
import { DatabaseConnection } from '../connection';
import {
  NewScheduledPost,
  PostState,
  ScheduledPost,
  TargetResult,
} from '../models';
import { ScheduleStore } from '../repositories';
import { assertTransition } from '../../services/postStateMachine';
import {
  NotFoundError,
  StateConflictError,
  ValidationError,
} from '../../utils/errors';
import { targetRefSchema, targetResultSchema } from '../../utils/validation';
import { createLogger, Logger } from '../../utils/logger';

type ScheduledPostRow = {
  post_id: number;
  owner_id: string;
  source_chat_id: string;
  source_message_id: string;
  source_text: string | null;
  source_photo_file_id: string | null;
  fallback_chat_id: string | null;
  fallback_message_id: string | null;
  targets: unknown;
  requested_time: string | null;
  dispatch_at: Date;
  state: string;
  results: unknown;
  created_at: Date;
  updated_at: Date;
};

const postStateSchema = z.enum([
  'scheduled',
  'dispatching',
  'sent',
  'failed',
  'cancelled',
]);

export class ScheduleDAO implements ScheduleStore {
  private logger: Logger;

  constructor(private readonly db: DatabaseConnection) {
    this.logger = createLogger('ScheduleDAO');
  }

  private parsePostRow(row: ScheduledPostRow): ScheduledPost {
    return {
      id: row.post_id,
      ownerId: Number(row.owner_id),
      source: {
        chatId: Number(row.source_chat_id),
        messageId: Number(row.source_message_id),
        text: row.source_text ?? undefined,
        photoFileId: row.source_photo_file_id ?? undefined,
        fallback:
          row.fallback_chat_id !== null && row.fallback_message_id !== null
            ? {
                chatId: Number(row.fallback_chat_id),
                messageId: Number(row.fallback_message_id),
              }
            : undefined,
      },
      targets: targetRefSchema.array().parse(row.targets),
      requestedTime: row.requested_time,
      dispatchAt: row.dispatch_at,
      state: postStateSchema.parse(row.state),
      results: targetResultSchema.array().parse(row.results ?? []),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async create(post: NewScheduledPost): Promise<ScheduledPost> {
    const query = `
      INSERT INTO scheduled_posts (
        owner_id,
        source_chat_id,
        source_message_id,
        source_text,
        source_photo_file_id,
        fallback_chat_id,
        fallback_message_id,
        targets,
        requested_time,
        dispatch_at,
        state
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, 'scheduled')
      RETURNING *
    `;
    const result = await this.db.query<ScheduledPostRow>(query, [
      post.ownerId,
      post.source.chatId,
      post.source.messageId,
      post.source.text ?? null,
      post.source.photoFileId ?? null,
      post.source.fallback?.chatId ?? null,
      post.source.fallback?.messageId ?? null,
      JSON.stringify(post.targets),
      post.requestedTime,
      post.dispatchAt,
    ]);

    const created = this.parsePostRow(result.rows[0]);
    this.logger.info('Публикация запланирована', {
      postId: created.id,
      ownerId: created.ownerId,
      dispatchAt: created.dispatchAt.toISOString(),
      targets: created.targets.length,
    });
    return created;
  }

  async get(id: number): Promise<ScheduledPost | null> {
    const result = await this.db.query<ScheduledPostRow>(
      'SELECT * FROM scheduled_posts WHERE post_id = $1',
      [id],
    );
    return result.rows.length > 0 ? this.parsePostRow(result.rows[0]) : null;
  }

  async listDue(now: Date): Promise<ScheduledPost[]> {
    const result = await this.db.query<ScheduledPostRow>(
      `SELECT * FROM scheduled_posts
       WHERE state = 'scheduled' AND dispatch_at <= $1
       ORDER BY dispatch_at ASC, post_id ASC`,
      [now],
    );
    return result.rows.map((row) => this.parsePostRow(row));
  }

  async listScheduled(ownerId?: number): Promise<ScheduledPost[]> {
    const result =
      ownerId === undefined
        ? await this.db.query<ScheduledPostRow>(
            `SELECT * FROM scheduled_posts
             WHERE state = 'scheduled'
             ORDER BY dispatch_at ASC, post_id ASC`,
          )
        : await this.db.query<ScheduledPostRow>(
            `SELECT * FROM scheduled_posts
             WHERE state = 'scheduled' AND owner_id = $1
             ORDER BY dispatch_at ASC, post_id ASC`,
            [ownerId],
          );
    return result.rows.map((row) => this.parsePostRow(row));
  }

  async listHistory(
    ownerId: number | undefined,
    limit: number,
  ): Promise<ScheduledPost[]> {
    const result =
      ownerId === undefined
        ? await this.db.query<ScheduledPostRow>(
            `SELECT * FROM scheduled_posts
             WHERE state IN ('sent', 'failed')
             ORDER BY dispatch_at DESC, post_id DESC
             LIMIT $1`,
            [limit],
          )
        : await this.db.query<ScheduledPostRow>(
            `SELECT * FROM scheduled_posts
             WHERE state IN ('sent', 'failed') AND owner_id = $1
             ORDER BY dispatch_at DESC, post_id DESC
             LIMIT $2`,
            [ownerId, limit],
          );
    return result.rows.map((row) => this.parsePostRow(row));
  }

  /**
   * Атомарный переход состояния: UPDATE срабатывает только если
   * сохраненное состояние совпадает с ожидаемым
   */
  async transition(
    id: number,
    from: PostState,
    to: PostState,
    results?: TargetResult[],
  ): Promise<ScheduledPost> {
    assertTransition(from, to);

    const result = await this.db.query<ScheduledPostRow>(
      `UPDATE scheduled_posts
       SET state = $3,
           results = COALESCE($4::jsonb, results),
           updated_at = NOW()
       WHERE post_id = $1 AND state = $2
       RETURNING *`,
      [id, from, to, results ? JSON.stringify(results) : null],
    );

    if (result.rows.length > 0) {
      return this.parsePostRow(result.rows[0]);
    }

    const current = await this.get(id);
    if (!current) {
      throw new NotFoundError(`Scheduled post ${id}`);
    }
    throw new StateConflictError(
      `Post ${id} is ${current.state}, expected ${from}`,
      from,
      current.state,
    );
  }

  async cancel(id: number): Promise<ScheduledPost> {
    const result = await this.db.query<ScheduledPostRow>(
      `UPDATE scheduled_posts
       SET state = 'cancelled', updated_at = NOW()
       WHERE post_id = $1 AND state = 'scheduled'
       RETURNING *`,
      [id],
    );

    if (result.rows.length > 0) {
      this.logger.info('Публикация отменена', { postId: id });
      return this.parsePostRow(result.rows[0]);
    }

    const current = await this.get(id);
    if (!current) {
      throw new NotFoundError(`Scheduled post ${id}`);
    }
    throw new ValidationError(
      `Post ${id} cannot be cancelled, it is already ${current.state}`,
      'INVALID_STATE',
    );
  }
}
