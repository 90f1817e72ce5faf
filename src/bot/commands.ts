/**
 * Команды бота: разбор текста в закрытый набор команд и таблица обработчиков.
 * Обработчики работают только через сервисы и возвращают ответ, не трогая Telegram API.
 */

import TelegramBot from 'node-telegram-bot-api';
import {
  ChannelTarget,
  Platform,
  ScheduledPost,
  UserRecord,
} from '../database/models';
import { AccessControlService } from '../services/AccessControlService';
import { ChannelRegistryService } from '../services/ChannelRegistryService';
import { ScheduleService } from '../services/ScheduleService';
import { ValidationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { formatLocal, formatOffset } from '../utils/timezone';
import { platformAliasSchema, telegramIdSchema } from '../utils/validation';

const logger = createLogger('BotCommands');

type NoArgs = Record<string, never>;

export interface CommandArgs {
  start: NoArgs;
  help: NoArgs;
  pending: NoArgs;
  approve: { userId: number };
  reject: { userId: number };
  removeUser: { userId: number };
  listUsers: NoArgs;
  channels: NoArgs;
  refreshVkGroups: NoArgs;
  refreshChannels: NoArgs;
  removeChannel: { platform: Platform; externalId: string };
  scheduled: NoArgs;
  history: NoArgs;
  timezone: { offset?: string };
  reschedule: { postId: number; time: string };
  cancel: { postId: number };
  unknown: { name: string };
}

export type CommandType = keyof CommandArgs;

export type BotCommand<K extends CommandType = CommandType> = {
  [P in K]: { type: P; args: CommandArgs[P] };
}[K];

export type InlineKeyboard = TelegramBot.InlineKeyboardButton[][];

export interface OutgoingMessage {
  chatId: number;
  text: string;
  keyboard?: InlineKeyboard;
}

export interface Reply {
  text: string;
  keyboard?: InlineKeyboard;
  /** Messages for other users, e.g. approvers of a new registration */
  notify?: OutgoingMessage[];
}

export interface CommandContext {
  userId: number;
  username?: string;
  now: Date;
}

export interface DispatchTrigger {
  trigger(): Promise<void>;
}

export interface BotServices {
  access: AccessControlService;
  registry: ChannelRegistryService;
  schedules: ScheduleService;
  dispatch: DispatchTrigger;
}

type CommandHandler<K extends CommandType> = (
  args: CommandArgs[K],
  ctx: CommandContext,
  services: BotServices,
) => Promise<Reply>;

export const HELP_TEXT = `
📋 <b>Справка</b>

Перешлите боту сообщение, выберите площадку и канал, затем введите время публикации
(<code>HH:MM</code> или <code>DD.MM.YYYY HH:MM</code>) или нажмите «Отправить сейчас».

<b>Публикации</b>
/scheduled - запланированные публикации
/history - последние отправленные
/reschedule &lt;id&gt; &lt;время&gt; - повторить неудачную или отмененную
/cancel &lt;id&gt; - отменить публикацию
/tz &lt;±HH:MM&gt; - ваш часовой пояс

<b>Каналы</b>
/channels - список каналов и групп
/refresh_channels - перепроверить права в каналах Telegram
/refresh_vkgroups - обновить группы VK
/remove_channel &lt;tg|vk&gt; &lt;id&gt; - удалить канал

<b>Пользователи</b>
/pending - заявки на доступ
/approve &lt;id&gt;, /reject &lt;id&gt; - решение по заявке
/list_users - пользователи с доступом
/remove_user &lt;id&gt; - удалить пользователя
`.trim();

const COMMAND_PATTERN = /^\/([a-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i;

/**
 * Returns null when the text is not a command
 */
export function parseCommand(text: string): BotCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const name = match[1].toLowerCase();
  const args = (match[2] ?? '').trim().split(/\s+/).filter(Boolean);

  switch (name) {
    case 'start':
      return { type: 'start', args: {} };
    case 'help':
      return { type: 'help', args: {} };
    case 'pending':
      return { type: 'pending', args: {} };
    case 'approve':
      return { type: 'approve', args: { userId: parseId(args[0], '/approve <user_id>') } };
    case 'reject':
      return { type: 'reject', args: { userId: parseId(args[0], '/reject <user_id>') } };
    case 'remove_user':
      return {
        type: 'removeUser',
        args: { userId: parseId(args[0], '/remove_user <user_id>') },
      };
    case 'list_users':
      return { type: 'listUsers', args: {} };
    case 'channels':
      return { type: 'channels', args: {} };
    case 'refresh_vkgroups':
      return { type: 'refreshVkGroups', args: {} };
    case 'refresh_channels':
      return { type: 'refreshChannels', args: {} };
    case 'remove_channel': {
      const platform = platformAliasSchema.safeParse(args[0]?.toLowerCase());
      if (!platform.success || !args[1]) {
        throw usage('/remove_channel <tg|vk> <id>');
      }
      return {
        type: 'removeChannel',
        args: { platform: platform.data, externalId: args[1] },
      };
    }
    case 'scheduled':
      return { type: 'scheduled', args: {} };
    case 'history':
      return { type: 'history', args: {} };
    case 'tz':
    case 'timezone':
      return { type: 'timezone', args: { offset: args[0] } };
    case 'reschedule': {
      const postId = parseId(args[0], '/reschedule <id> <HH:MM | DD.MM.YYYY HH:MM>');
      const time = args.slice(1).join(' ');
      if (!time) {
        throw usage('/reschedule <id> <HH:MM | DD.MM.YYYY HH:MM>');
      }
      return { type: 'reschedule', args: { postId, time } };
    }
    case 'cancel':
      return { type: 'cancel', args: { postId: parseId(args[0], '/cancel <id>') } };
    default:
      return { type: 'unknown', args: { name } };
  }
}

function parseId(value: string | undefined, usageText: string): number {
  const result = telegramIdSchema.safeParse(value);
  if (!result.success) {
    throw usage(usageText);
  }
  return result.data;
}

function usage(usageText: string): ValidationError {
  return new ValidationError(`Usage: ${usageText}`);
}

export const commandHandlers: { [K in CommandType]: CommandHandler<K> } = {
  async start(_args, ctx, { access }) {
    const { user, created } = await access.register({
      userId: ctx.userId,
      username: ctx.username,
    });

    switch (user.status) {
      case 'superadmin':
        return {
          text: created
            ? `👑 Вы суперадмин этого бота.\n\n${HELP_TEXT}`
            : `✅ Бот работает.\n\n${HELP_TEXT}`,
        };
      case 'approved':
        return { text: `✅ Бот работает.\n\n${HELP_TEXT}` };
      default: {
        if (!created) {
          return { text: '⏳ Ваша заявка еще на рассмотрении.' };
        }
        const approvers = await access.listApproved();
        return {
          text: '⏳ Заявка на доступ отправлена администраторам.',
          notify: approvers.map((approver) => ({
            chatId: approver.userId,
            text: `🆕 Новая заявка на доступ: ${userLink(user)}`,
            keyboard: approvalKeyboard(user.userId),
          })),
        };
      }
    }
  },

  async help() {
    return { text: HELP_TEXT };
  },

  async pending(_args, ctx, { access }) {
    await access.requireAuthorized(ctx.userId);
    const users = await access.listPending();
    if (users.length === 0) {
      return { text: 'Нет заявок на рассмотрении.' };
    }
    return {
      text: `<b>Заявки на доступ:</b>\n${users.map((user) => `• ${userLink(user)}`).join('\n')}`,
      keyboard: users.flatMap((user) => approvalKeyboard(user.userId)),
    };
  },

  async approve({ userId }, ctx, { access }) {
    const user = await access.approve(ctx.userId, userId);
    return {
      text: `✅ Пользователь ${userLink(user)} одобрен.`,
      notify: [
        {
          chatId: user.userId,
          text: '✅ Доступ открыт. Перешлите сообщение, чтобы запланировать публикацию.',
        },
      ],
    };
  },

  async reject({ userId }, ctx, { access }) {
    const user = await access.reject(ctx.userId, userId);
    return {
      text: `🚫 Пользователь ${userLink(user)} отклонен.`,
      notify: [{ chatId: user.userId, text: '🚫 Ваша заявка на доступ отклонена.' }],
    };
  },

  async removeUser({ userId }, ctx, { access }) {
    await access.remove(ctx.userId, userId);
    return { text: `🗑 Пользователь ${userId} удален.` };
  },

  async listUsers(_args, ctx, { access }) {
    await access.requireAuthorized(ctx.userId);
    const users = await access.listApproved();
    const lines = users.map(
      (user) =>
        `• ${userLink(user)}${user.status === 'superadmin' ? ' (суперадмин)' : ''}`,
    );
    return { text: `<b>Пользователи:</b>\n${lines.join('\n')}` };
  },

  async channels(_args, ctx, { access, registry }) {
    await access.requireAuthorized(ctx.userId);
    const channels = await registry.list();
    if (channels.length === 0) {
      return { text: 'Каналов пока нет. Добавьте бота администратором в канал.' };
    }
    return {
      text: `<b>Каналы:</b>\n${channels.map(formatChannel).join('\n')}`,
    };
  },

  async refreshVkGroups(_args, ctx, { access, registry }) {
    await access.requireAuthorized(ctx.userId);
    const groups = await registry.refresh('vk');
    return { text: `🔄 Группы VK обновлены: ${groups.length}` };
  },

  async refreshChannels(_args, ctx, { access, registry }) {
    await access.requireAuthorized(ctx.userId);
    const channels = await registry.refresh('telegram');
    const postable = channels.filter((channel) => channel.canPost).length;
    return {
      text: `🔄 Каналы Telegram проверены: ${postable} из ${channels.length} доступны для публикации`,
    };
  },

  async removeChannel({ platform, externalId }, ctx, { registry }) {
    await registry.remove(ctx.userId, platform, externalId);
    return { text: `🗑 Канал ${externalId} удален.` };
  },

  async scheduled(_args, ctx, { access, schedules }) {
    const actor = await access.requireAuthorized(ctx.userId);
    const posts = await schedules.listScheduled(ctx.userId);
    if (posts.length === 0) {
      return { text: 'Запланированных публикаций нет.' };
    }
    return {
      text: `<b>Запланировано:</b>\n${posts.map((post) => formatPost(post, actor)).join('\n')}`,
      keyboard: posts.map((post) => [
        { text: `Отменить #${post.id}`, callback_data: `cancel:${post.id}` },
      ]),
    };
  },

  async history(_args, ctx, { access, schedules }) {
    const actor = await access.requireAuthorized(ctx.userId);
    const posts = await schedules.listHistory(ctx.userId);
    if (posts.length === 0) {
      return { text: 'История пуста.' };
    }
    return {
      text: `<b>История:</b>\n${posts.map((post) => formatHistoryEntry(post, actor)).join('\n')}`,
    };
  },

  async timezone({ offset }, ctx, { access }) {
    if (!offset) {
      const user = await access.requireAuthorized(ctx.userId);
      return {
        text: `🕒 Ваш часовой пояс: UTC${formatOffset(user.tzOffsetMinutes)}\nИзменить: /tz +03:00`,
      };
    }
    const user = await access.setTimezone(ctx.userId, offset);
    return {
      text: `🕒 Часовой пояс обновлен: UTC${formatOffset(user.tzOffsetMinutes)}`,
    };
  },

  async reschedule({ postId, time }, ctx, services) {
    const actor = await services.access.requireAuthorized(ctx.userId);
    const post = await services.schedules.reschedule(ctx.userId, postId, time, ctx.now);
    if (post.requestedTime === null) {
      triggerDispatch(services.dispatch);
    }
    return { text: scheduledText(post, actor.tzOffsetMinutes) };
  },

  async cancel({ postId }, ctx, { schedules }) {
    const post = await schedules.cancel(ctx.userId, postId);
    return { text: `🚫 Публикация #${post.id} отменена.` };
  },

  async unknown({ name }) {
    return { text: `Неизвестная команда /${escapeHtml(name)}. Список команд: /help` };
  },
};

/**
 * Resolves the handler for the command's tag and runs it
 */
export function runCommand<K extends CommandType>(
  command: BotCommand<K>,
  ctx: CommandContext,
  services: BotServices,
): Promise<Reply> {
  const handler: CommandHandler<K> = commandHandlers[command.type];
  return handler(command.args, ctx, services);
}

/**
 * Starts a dispatch pass without waiting for it
 */
export function triggerDispatch(dispatch: DispatchTrigger): void {
  dispatch.trigger().catch((error: unknown) => {
    logger.error('Manual dispatch failed', { error });
  });
}

export function scheduledText(post: ScheduledPost, offsetMinutes: number): string {
  if (post.requestedTime === null) {
    return `🚀 Публикация #${post.id} отправляется.`;
  }
  return `🗓 Публикация #${post.id} запланирована на ${formatLocal(
    post.dispatchAt,
    offsetMinutes,
  )} (UTC${formatOffset(offsetMinutes)}).`;
}

export function approvalKeyboard(userId: number): InlineKeyboard {
  return [
    [
      { text: '✅ Одобрить', callback_data: `approve:${userId}` },
      { text: '❌ Отклонить', callback_data: `reject:${userId}` },
    ],
  ];
}

export function userLink(user: Pick<UserRecord, 'userId' | 'username'>): string {
  const label = user.username ? `@${user.username}` : String(user.userId);
  return `<a href="tg://user?id=${user.userId}">${escapeHtml(label)}</a>`;
}

const PLATFORM_LABELS: Record<Platform, string> = {
  telegram: 'TG',
  vk: 'VK',
};

function formatChannel(channel: ChannelTarget): string {
  const rights = channel.canPost ? '' : ' ⚠️ нет прав на публикацию';
  return `• [${PLATFORM_LABELS[channel.platform]}] ${escapeHtml(channel.title)} (<code>${channel.externalId}</code>)${rights}`;
}

function formatPost(post: ScheduledPost, viewer: UserRecord): string {
  const targets = post.targets.map((target) => escapeHtml(target.title)).join(', ');
  return `#${post.id} ${formatLocal(post.dispatchAt, viewer.tzOffsetMinutes)} → ${targets}`;
}

function formatHistoryEntry(post: ScheduledPost, viewer: UserRecord): string {
  const icon = post.state === 'sent' ? '✅' : '❌';
  const failures = post.results
    .filter((result) => result.status === 'failed')
    .map((result) => {
      const title =
        post.targets.find(
          (target) =>
            target.platform === result.platform &&
            target.externalId === result.externalId,
        )?.title ?? result.externalId;
      return `\n   ${escapeHtml(title)}: ${result.reason ?? 'other'}`;
    })
    .join('');
  return `${icon} ${formatPost(post, viewer)}${failures}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}
