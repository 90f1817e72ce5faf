/**
 * ChannelDAO - Data Access Object для каналов и групп, куда публикует бот
 */

import { QueryResultRow } from 'pg';
import { DatabaseConnection, QueryFn } from '../connection';
import { ChannelTarget, DiscoveredTarget, Platform } from '../models';
import { ChannelStore } from '../repositories';
import { platformSchema } from '../../utils/validation';
import { createLogger, Logger } from '../../utils/logger';

type ChannelRow = {
  platform: string;
  external_id: string;
  title: string;
  can_post: boolean;
  updated_at: Date;
};

const UPSERT_QUERY = `
  INSERT INTO channels (platform, external_id, title, can_post)
  VALUES ($1, $2, $3, $4)
  ON CONFLICT (platform, external_id)
  DO UPDATE SET title = EXCLUDED.title,
                can_post = EXCLUDED.can_post,
                updated_at = NOW()
  RETURNING *
`;

export class ChannelDAO implements ChannelStore {
  private logger: Logger;

  constructor(private readonly db: DatabaseConnection) {
    this.logger = createLogger('ChannelDAO');
  }

  private parseChannelRow(row: ChannelRow): ChannelTarget {
    return {
      platform: platformSchema.parse(row.platform),
      externalId: row.external_id,
      title: row.title,
      canPost: row.can_post,
      updatedAt: row.updated_at,
    };
  }

  private async upsertWith(
    query: QueryFn,
    target: DiscoveredTarget,
  ): Promise<ChannelTarget> {
    const result = await query<ChannelRow>(UPSERT_QUERY, [
      target.platform,
      target.externalId,
      target.title,
      target.canPost,
    ]);
    return this.parseChannelRow(result.rows[0]);
  }

  /**
   * Создает или обновляет канал
   */
  async upsert(target: DiscoveredTarget): Promise<ChannelTarget> {
    const channel = await this.upsertWith(
      <T extends QueryResultRow>(text: string, params?: unknown[]) =>
        this.db.query<T>(text, params),
      target,
    );
    this.logger.info(`Канал сохранен: ${target.title}`, {
      platform: target.platform,
      externalId: target.externalId,
      canPost: target.canPost,
    });
    return channel;
  }

  /**
   * Полностью заменяет набор каналов платформы в одной транзакции
   */
  async replacePlatform(
    platform: Platform,
    targets: DiscoveredTarget[],
  ): Promise<ChannelTarget[]> {
    const saved = await this.db.transaction(async (query) => {
      await query('DELETE FROM channels WHERE platform = $1', [platform]);
      const rows: ChannelTarget[] = [];
      for (const target of targets) {
        rows.push(await this.upsertWith(query, { ...target, platform }));
      }
      return rows;
    });

    this.logger.info('Список каналов платформы обновлен', {
      platform,
      count: saved.length,
    });
    return saved;
  }

  async find(
    platform: Platform,
    externalId: string,
  ): Promise<ChannelTarget | null> {
    const result = await this.db.query<ChannelRow>(
      'SELECT * FROM channels WHERE platform = $1 AND external_id = $2',
      [platform, externalId],
    );
    return result.rows.length > 0 ? this.parseChannelRow(result.rows[0]) : null;
  }

  async list(platform?: Platform): Promise<ChannelTarget[]> {
    const result = platform
      ? await this.db.query<ChannelRow>(
          'SELECT * FROM channels WHERE platform = $1 ORDER BY title, external_id',
          [platform],
        )
      : await this.db.query<ChannelRow>(
          'SELECT * FROM channels ORDER BY platform, title, external_id',
        );
    return result.rows.map((row) => this.parseChannelRow(row));
  }

  async delete(platform: Platform, externalId: string): Promise<boolean> {
    const result = await this.db.query(
      'DELETE FROM channels WHERE platform = $1 AND external_id = $2',
      [platform, externalId],
    );
    return (result.rowCount ?? 0) > 0;
  }
}
