/**
 * ChannelRegistryService - keeps the list of channels and groups the bot may publish to
 */

import { Logger } from 'winston';
import {
  AdminStatusEvent,
  ChannelTarget,
  Platform,
  TargetRef,
} from '../database/models';
import { ChannelStore } from '../database/repositories';
import { hasPostingRights } from '../platform/TelegramPlatformClient';
import { ChannelDiscovery } from '../platform/types';
import { NotFoundError, ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { AccessControlService } from './AccessControlService';

export type ChannelDiscoveries = Partial<Record<Platform, ChannelDiscovery>>;

export type TargetSelection = Pick<TargetRef, 'platform' | 'externalId'>;

export class ChannelRegistryService {
  private logger: Logger;

  constructor(
    private readonly channels: ChannelStore,
    private readonly discoveries: ChannelDiscoveries,
    private readonly access: AccessControlService,
  ) {
    this.logger = createLogger('ChannelRegistryService');
  }

  /**
   * Applies a my_chat_member update. Losing admin rights keeps the channel
   * but clears canPost; an unknown channel we are not admin of is ignored.
   */
  async upsertFromEvent(event: AdminStatusEvent): Promise<ChannelTarget | null> {
    const externalId = String(event.chatId);
    const canPost = hasPostingRights(event.status, event.canPostMessages);

    if (!canPost) {
      const known = await this.channels.find('telegram', externalId);
      if (!known) {
        return null;
      }
    }

    const channel = await this.channels.upsert({
      platform: 'telegram',
      externalId,
      title: event.title,
      canPost,
    });
    this.logger.info('Channel status updated', {
      chatId: externalId,
      status: event.status,
      canPost,
    });
    return channel;
  }

  /**
   * VK: the discovered groups replace the stored VK set.
   * Telegram: rights of every known channel are re-checked, nothing is pruned.
   */
  async refresh(platform: Platform): Promise<ChannelTarget[]> {
    const discovery = this.discoveries[platform];
    if (!discovery) {
      throw new ValidationError(
        `Platform ${platform} is not configured`,
        'INVALID_TARGET',
      );
    }

    const known = await this.channels.list(platform);
    const discovered = await discovery.discover(known);

    if (platform === 'vk') {
      const saved = await this.channels.replacePlatform('vk', discovered);
      this.logger.info(`VK groups refreshed: ${saved.length}`);
      return saved;
    }

    for (const target of discovered) {
      await this.channels.upsert(target);
    }
    this.logger.info(`Telegram channels re-checked: ${discovered.length}`);
    return this.channels.list(platform);
  }

  list(platform?: Platform): Promise<ChannelTarget[]> {
    return this.channels.list(platform);
  }

  async remove(
    adminId: number,
    platform: Platform,
    externalId: string,
  ): Promise<void> {
    await this.access.requireAuthorized(adminId);
    const deleted = await this.channels.delete(platform, externalId);
    if (!deleted) {
      throw new NotFoundError(`Channel ${platform}:${externalId}`);
    }
    this.logger.info('Channel removed', { adminId, platform, externalId });
  }

  /**
   * Checks that every selected target is known and postable
   */
  async resolveTargets(selection: TargetSelection[]): Promise<TargetRef[]> {
    if (selection.length === 0) {
      throw new ValidationError('Select at least one target', 'INVALID_TARGET');
    }

    const seen = new Set<string>();
    const resolved: TargetRef[] = [];

    for (const ref of selection) {
      const key = `${ref.platform}:${ref.externalId}`;
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const channel = await this.channels.find(ref.platform, ref.externalId);
      if (!channel) {
        throw new ValidationError(`Unknown target ${key}`, 'INVALID_TARGET');
      }
      if (!channel.canPost) {
        throw new ValidationError(
          `Bot cannot post to ${channel.title}`,
          'INVALID_TARGET',
        );
      }
      resolved.push({
        platform: channel.platform,
        externalId: channel.externalId,
        title: channel.title,
      });
    }

    return resolved;
  }
}
