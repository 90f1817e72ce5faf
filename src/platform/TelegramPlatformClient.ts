/**
 * TelegramPlatformClient - forwards and copies messages through the Bot API
 */

import TelegramBot from 'node-telegram-bot-api';
import { z } from 'zod';
import { Logger } from 'winston';
import {
  ChannelTarget,
  DeliveryFailureReason,
  DiscoveredTarget,
  SourceRef,
  TargetRef,
} from '../database/models';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { ChannelDiscovery, PlatformClient, SendResult, sendFailure } from './types';

// node-telegram-bot-api rejects with { code: 'ETELEGRAM', response: { body } } on API errors
const telegramErrorSchema = z.object({
  code: z.string().optional(),
  response: z
    .object({
      statusCode: z.number().optional(),
      body: z
        .object({
          error_code: z.number().optional(),
          description: z.string().optional(),
        })
        .optional(),
    })
    .optional(),
});

// Descriptions that point at the source message, not at the target channel
const SOURCE_INACCESSIBLE = [
  /chat not found/i,
  /message to forward not found/i,
  /message to copy not found/i,
  /can't be forwarded/i,
  /protected content/i,
];

/**
 * Maps a Bot API failure to the delivery taxonomy
 */
export function classifyTelegramError(error: unknown): DeliveryFailureReason {
  const parsed = telegramErrorSchema.safeParse(error);
  if (!parsed.success) {
    return 'other';
  }

  const { code, response } = parsed.data;
  if (code === 'EFATAL') {
    return 'transient';
  }

  const status = response?.body?.error_code ?? response?.statusCode;
  const description = response?.body?.description ?? '';

  if (status === 429) {
    return 'rate_limited';
  }
  // Only descriptions that name the source; other 403s are about the target
  if (
    (status === 400 || status === 403) &&
    SOURCE_INACCESSIBLE.some((re) => re.test(description))
  ) {
    return 'not_member';
  }
  if (status !== undefined && status >= 500) {
    return 'transient';
  }
  return 'other';
}

export class TelegramPlatformClient implements PlatformClient, ChannelDiscovery {
  readonly platform = 'telegram' as const;
  readonly supportsForward = true;

  private logger: Logger;
  private botId: number | null = null;

  constructor(private readonly api: TelegramBot) {
    this.logger = createLogger('TelegramPlatformClient');
  }

  async forward(source: SourceRef, target: TargetRef): Promise<SendResult> {
    try {
      const message = await this.api.forwardMessage(
        target.externalId,
        source.chatId,
        source.messageId,
      );
      return {
        success: true,
        messageRef: `${message.chat.id}:${message.message_id}`,
      };
    } catch (error) {
      return this.failure('forward', target, error);
    }
  }

  async copy(source: SourceRef, target: TargetRef): Promise<SendResult> {
    const from = source.fallback ?? source;
    try {
      const copied = await this.api.copyMessage(
        target.externalId,
        from.chatId,
        from.messageId,
      );
      return {
        success: true,
        messageRef: `${target.externalId}:${copied.message_id}`,
      };
    } catch (error) {
      return this.failure('copy', target, error);
    }
  }

  async postText(text: string, target: TargetRef): Promise<SendResult> {
    try {
      const message = await this.api.sendMessage(target.externalId, text);
      return {
        success: true,
        messageRef: `${message.chat.id}:${message.message_id}`,
      };
    } catch (error) {
      return this.failure('sendMessage', target, error);
    }
  }

  async publish(source: SourceRef, target: TargetRef): Promise<SendResult> {
    if (!source.photoFileId) {
      return source.text
        ? this.postText(source.text, target)
        : sendFailure('other', 'Source message has no text or photo to publish');
    }
    try {
      const message = await this.api.sendPhoto(target.externalId, source.photoFileId, {
        caption: source.text,
      });
      return {
        success: true,
        messageRef: `${message.chat.id}:${message.message_id}`,
      };
    } catch (error) {
      return this.failure('sendPhoto', target, error);
    }
  }

  /**
   * Re-checks posting rights in every known channel. Channels are never dropped here:
   * losing admin rights only clears canPost.
   */
  async discover(known: ChannelTarget[]): Promise<DiscoveredTarget[]> {
    const botId = await this.getBotId();
    const discovered: DiscoveredTarget[] = [];

    for (const channel of known) {
      if (channel.platform !== 'telegram') {
        continue;
      }
      try {
        const member = await this.api.getChatMember(channel.externalId, botId);
        discovered.push({
          platform: 'telegram',
          externalId: channel.externalId,
          title: channel.title,
          canPost: hasPostingRights(member.status, member.can_post_messages),
        });
      } catch (error) {
        this.logger.warn('Channel is not accessible', {
          chatId: channel.externalId,
          error: errorMessage(error),
        });
        discovered.push({
          platform: 'telegram',
          externalId: channel.externalId,
          title: channel.title,
          canPost: false,
        });
      }
    }

    return discovered;
  }

  private async getBotId(): Promise<number> {
    if (this.botId === null) {
      const me = await this.api.getMe();
      this.botId = me.id;
    }
    return this.botId;
  }

  private failure(
    operation: string,
    target: TargetRef,
    error: unknown,
  ): SendResult {
    const reason = classifyTelegramError(error);
    this.logger.warn(`Telegram ${operation} failed`, {
      chatId: target.externalId,
      reason,
      error: errorMessage(error),
    });
    return sendFailure(reason, errorMessage(error));
  }
}

export function hasPostingRights(
  status: string,
  canPostMessages?: boolean,
): boolean {
  if (status === 'creator') {
    return true;
  }
  // can_post_messages is only reported for channels
  return status === 'administrator' && canPostMessages !== false;
}
