/**
 * UserDAO - Data Access Object для пользователей и их статуса доступа
 */

import { z } from 'zod';
import { DatabaseConnection } from '../connection';
import { UserIdentity, UserRecord, UserStatus } from '../models';
import { UserStore } from '../repositories';
import { createLogger, Logger } from '../../utils/logger';

type UserRow = {
  user_id: string; // BIGINT приходит строкой
  username: string | null;
  status: string;
  tz_offset_minutes: number;
  created_at: Date;
  updated_at: Date;
};

const userStatusSchema = z.enum(['pending', 'approved', 'rejected', 'superadmin']);

export class UserDAO implements UserStore {
  private logger: Logger;

  constructor(private readonly db: DatabaseConnection) {
    this.logger = createLogger('UserDAO');
  }

  private parseUserRow(row: UserRow): UserRecord {
    return {
      userId: Number(row.user_id),
      username: row.username ?? undefined,
      status: userStatusSchema.parse(row.status),
      tzOffsetMinutes: row.tz_offset_minutes,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  async findById(userId: number): Promise<UserRecord | null> {
    const result = await this.db.query<UserRow>(
      'SELECT * FROM users WHERE user_id = $1',
      [userId],
    );
    return result.rows.length > 0 ? this.parseUserRow(result.rows[0]) : null;
  }

  /**
   * Создает суперадмина, если его еще нет. Уникальный частичный индекс
   * не дает двум одновременным первым контактам стать суперадминами.
   */
  async createSuperadmin(
    identity: UserIdentity,
    tzOffsetMinutes: number,
  ): Promise<UserRecord | null> {
    const query = `
      INSERT INTO users (user_id, username, status, tz_offset_minutes)
      SELECT $1, $2, 'superadmin', $3
      WHERE NOT EXISTS (SELECT 1 FROM users WHERE status = 'superadmin')
      ON CONFLICT DO NOTHING
      RETURNING *
    `;
    const result = await this.db.query<UserRow>(query, [
      identity.userId,
      identity.username ?? null,
      tzOffsetMinutes,
    ]);

    if (result.rows.length === 0) {
      return null;
    }
    this.logger.info('Суперадмин зарегистрирован', { userId: identity.userId });
    return this.parseUserRow(result.rows[0]);
  }

  /**
   * Добавляет пользователя в очередь на одобрение, если очередь не заполнена
   */
  async createPending(
    identity: UserIdentity,
    tzOffsetMinutes: number,
    queueCap: number,
  ): Promise<UserRecord | null> {
    const query = `
      INSERT INTO users (user_id, username, status, tz_offset_minutes)
      SELECT $1, $2, 'pending', $3
      WHERE (SELECT COUNT(*) FROM users WHERE status = 'pending') < $4
      ON CONFLICT (user_id) DO NOTHING
      RETURNING *
    `;
    const result = await this.db.query<UserRow>(query, [
      identity.userId,
      identity.username ?? null,
      tzOffsetMinutes,
      queueCap,
    ]);

    if (result.rows.length === 0) {
      return null;
    }
    this.logger.info('Заявка на доступ создана', { userId: identity.userId });
    return this.parseUserRow(result.rows[0]);
  }

  async setStatus(
    userId: number,
    status: UserStatus,
  ): Promise<UserRecord | null> {
    const result = await this.db.query<UserRow>(
      `UPDATE users SET status = $2, updated_at = NOW()
       WHERE user_id = $1
       RETURNING *`,
      [userId, status],
    );
    return result.rows.length > 0 ? this.parseUserRow(result.rows[0]) : null;
  }

  async setTimezone(
    userId: number,
    tzOffsetMinutes: number,
  ): Promise<UserRecord | null> {
    const result = await this.db.query<UserRow>(
      `UPDATE users SET tz_offset_minutes = $2, updated_at = NOW()
       WHERE user_id = $1
       RETURNING *`,
      [userId, tzOffsetMinutes],
    );
    return result.rows.length > 0 ? this.parseUserRow(result.rows[0]) : null;
  }

  async delete(userId: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM users WHERE user_id = $1', [
      userId,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async listByStatus(statuses: readonly UserStatus[]): Promise<UserRecord[]> {
    const result = await this.db.query<UserRow>(
      'SELECT * FROM users WHERE status = ANY($1) ORDER BY created_at ASC',
      [statuses],
    );
    return result.rows.map((row) => this.parseUserRow(row));
  }
}
