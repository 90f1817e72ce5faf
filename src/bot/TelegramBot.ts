/**
 * TelegramBot - принимает обновления Telegram, ведет диалог создания публикации
 * и передает команды в таблицу обработчиков
 */

import TelegramBot from 'node-telegram-bot-api';
import { Logger } from 'winston';
import {
  Platform,
  SourceRef,
  isAuthorizedStatus,
} from '../database/models';
import { TargetSelection } from '../services/ChannelRegistryService';
import { AppError, RepositoryError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { ValidationUtils, platformAliasSchema } from '../utils/validation';
import {
  BotCommand,
  BotServices,
  InlineKeyboard,
  OutgoingMessage,
  Reply,
  escapeHtml,
  parseCommand,
  runCommand,
  scheduledText,
  triggerDispatch,
} from './commands';

export interface BotConfig {
  /** Public base URL; updates are delivered to `${webhookUrl}/webhook` */
  webhookUrl?: string;
}

interface PostDraftState {
  source: SourceRef;
  targets: TargetSelection[];
  startedAt: Date;
}

// An unfinished draft is dropped after an hour
const DRAFT_TTL_MS = 60 * 60 * 1000;

const TARGET_CALLBACK_PREFIX: Record<Platform, string> = {
  telegram: 'tgch',
  vk: 'vkgrp',
};

const NOT_AUTHORIZED_TEXT =
  '⛔ У вас нет доступа. Отправьте /start, чтобы подать заявку.';

export class TelegramBotService {
  private logger: Logger;
  private isInitialized: boolean = false;
  private drafts: Map<number, PostDraftState> = new Map();

  constructor(
    private readonly bot: TelegramBot,
    private readonly services: BotServices,
    private readonly config: BotConfig = {},
    private readonly clock: () => Date = () => new Date(),
  ) {
    this.logger = createLogger('TelegramBot');
  }

  get polling(): boolean {
    return !this.config.webhookUrl;
  }

  /**
   * Инициализирует бота: webhook или long polling
   */
  async initialize(): Promise<void> {
    try {
      this.logger.info('Initializing Telegram Bot...');
      this.setupHandlers();

      if (this.config.webhookUrl) {
        const url = `${this.config.webhookUrl.replace(/\/+$/, '')}/webhook`;
        await this.bot.setWebHook(url);
        this.logger.info('Webhook set successfully', { url });
      } else {
        await this.bot.deleteWebHook();
        await this.bot.startPolling();
        this.logger.info('Polling started');
      }

      const botInfo = await this.bot.getMe();
      this.logger.info('Bot initialized successfully', {
        username: botInfo.username,
        id: botInfo.id,
      });

      this.isInitialized = true;
    } catch (error) {
      this.logger.error('Failed to initialize Telegram Bot', { error });
      throw error;
    }
  }

  /**
   * Обновление, пришедшее через webhook
   */
  processUpdate(update: TelegramBot.Update): void {
    this.bot.processUpdate(update);
  }

  private setupHandlers(): void {
    this.bot.on('message', (msg: TelegramBot.Message) => {
      this.handleMessage(msg).catch((error: unknown) =>
        this.logger.error('Failed to handle message', { error: errorMessage(error) }),
      );
    });

    this.bot.on('callback_query', (query: TelegramBot.CallbackQuery) => {
      this.handleCallbackQuery(query).catch((error: unknown) =>
        this.logger.error('Failed to handle callback query', {
          error: errorMessage(error),
        }),
      );
    });

    this.bot.on('my_chat_member', (update: TelegramBot.ChatMemberUpdated) => {
      this.handleChatMemberUpdate(update).catch((error: unknown) =>
        this.logger.error('Failed to handle chat member update', {
          error: errorMessage(error),
        }),
      );
    });

    this.bot.on('polling_error', (error: Error) => {
      this.logger.error('Polling error', { error: error.message });
    });

    this.bot.on('webhook_error', (error: Error) => {
      this.logger.error('Webhook error', { error: error.message });
    });
  }

  /**
   * Личные сообщения: команды, пересланные посты и ввод времени
   */
  async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const from = msg.from;
    if (msg.chat.type !== 'private' || !from) {
      return;
    }

    await this.respond(msg.chat.id, async () => {
      const command = msg.text ? parseCommand(msg.text) : null;
      if (command) {
        // Any command abandons the draft in progress
        this.drafts.delete(from.id);
        return this.executeCommand(command, from);
      }
      return this.handleDraftMessage(msg, from.id);
    });
  }

  async handleCallbackQuery(query: TelegramBot.CallbackQuery): Promise<void> {
    await this.bot.answerCallbackQuery(query.id);

    const data = query.data;
    if (!data) {
      return;
    }

    const userId = query.from.id;
    const chatId = query.message?.chat.id ?? userId;
    const separator = data.indexOf(':');
    const action = separator === -1 ? data : data.slice(0, separator);
    const value = separator === -1 ? '' : data.slice(separator + 1);

    this.logger.debug(`Received callback_query: ${data}`, { userId });

    await this.respond(chatId, async () => {
      switch (action) {
        case 'approve':
          return this.executeCommand(
            { type: 'approve', args: { userId: ValidationUtils.validateTelegramId(value) } },
            query.from,
          );
        case 'reject':
          return this.executeCommand(
            { type: 'reject', args: { userId: ValidationUtils.validateTelegramId(value) } },
            query.from,
          );
        case 'cancel':
          return this.executeCommand(
            { type: 'cancel', args: { postId: ValidationUtils.validateTelegramId(value) } },
            query.from,
          );
        case 'svc': {
          const platform = platformAliasSchema.safeParse(value);
          return platform.success ? this.showTargets(userId, platform.data) : null;
        }
        case 'tgch':
          return this.addTarget(userId, 'telegram', value);
        case 'vkgrp':
          return this.addTarget(userId, 'vk', value);
        case 'sendnow':
          return this.sendNow(userId);
        default:
          this.logger.warn('Unknown callback data', { data });
          return null;
      }
    });
  }

  /**
   * Бот добавлен в канал или лишился прав администратора
   */
  async handleChatMemberUpdate(update: TelegramBot.ChatMemberUpdated): Promise<void> {
    if (update.chat.type !== 'channel') {
      return;
    }

    await this.services.registry.upsertFromEvent({
      chatId: update.chat.id,
      title: update.chat.title ?? String(update.chat.id),
      status: update.new_chat_member.status,
      canPostMessages: update.new_chat_member.can_post_messages,
    });
  }

  private executeCommand(
    command: BotCommand,
    from: TelegramBot.User,
  ): Promise<Reply> {
    this.logger.info(`Command ${command.type}`, { userId: from.id });
    return runCommand(
      command,
      { userId: from.id, username: from.username, now: this.clock() },
      this.services,
    );
  }

  private async handleDraftMessage(
    msg: TelegramBot.Message,
    userId: number,
  ): Promise<Reply> {
    const user = await this.services.access.getUser(userId);
    if (!user || !isAuthorizedStatus(user.status)) {
      return { text: NOT_AUTHORIZED_TEXT };
    }

    const draft = this.draftFor(userId);
    const isForward = msg.forward_from_chat !== undefined || msg.forward_from !== undefined;

    // Текст после выбора каналов считается временем публикации
    if (draft && draft.targets.length > 0 && msg.text && !isForward) {
      const post = await this.services.schedules.schedule(
        userId,
        draft,
        msg.text,
        this.clock(),
      );
      this.drafts.delete(userId);
      if (post.requestedTime === null) {
        triggerDispatch(this.services.dispatch);
      }
      return {
        text: scheduledText(post, user.tzOffsetMinutes),
        keyboard: [[{ text: 'Отменить', callback_data: `cancel:${post.id}` }]],
      };
    }

    this.startDraft(userId, sourceOf(msg));
    return {
      text: '📨 Куда публикуем?',
      keyboard: serviceKeyboard(),
    };
  }

  private draftFor(userId: number): PostDraftState | undefined {
    const draft = this.drafts.get(userId);
    if (draft && this.isExpired(draft)) {
      this.drafts.delete(userId);
      return undefined;
    }
    return draft;
  }

  private startDraft(userId: number, source: SourceRef): void {
    for (const [id, draft] of this.drafts) {
      if (this.isExpired(draft)) {
        this.drafts.delete(id);
      }
    }
    this.drafts.set(userId, { source, targets: [], startedAt: this.clock() });
  }

  private isExpired(draft: PostDraftState): boolean {
    return this.clock().getTime() - draft.startedAt.getTime() > DRAFT_TTL_MS;
  }

  private async showTargets(userId: number, platform: Platform): Promise<Reply> {
    const draft = this.draftFor(userId);
    if (!draft) {
      return { text: 'Сначала перешлите сообщение для публикации.' };
    }

    const channels = (await this.services.registry.list(platform)).filter(
      (channel) => channel.canPost,
    );
    if (channels.length === 0) {
      return {
        text:
          platform === 'vk'
            ? 'Нет доступных групп VK. Обновите список: /refresh_vkgroups'
            : 'Нет доступных каналов. Добавьте бота администратором в канал.',
      };
    }

    const prefix = TARGET_CALLBACK_PREFIX[platform];
    return {
      text: platform === 'vk' ? 'Выберите группу:' : 'Выберите канал:',
      keyboard: channels.map((channel) => {
        const selected = draft.targets.some(
          (target) =>
            target.platform === platform && target.externalId === channel.externalId,
        );
        return [
          {
            text: `${selected ? '✓ ' : ''}${channel.title}`,
            callback_data: `${prefix}:${channel.externalId}`,
          },
        ];
      }),
    };
  }

  private async addTarget(
    userId: number,
    platform: Platform,
    externalId: string,
  ): Promise<Reply> {
    const draft = this.draftFor(userId);
    if (!draft) {
      return { text: 'Сначала перешлите сообщение для публикации.' };
    }

    const alreadySelected = draft.targets.some(
      (target) => target.platform === platform && target.externalId === externalId,
    );
    const targets = alreadySelected
      ? draft.targets
      : [...draft.targets, { platform, externalId }];

    // Недоступный канал не попадает в черновик
    const selected = await this.services.registry.resolveTargets(targets);
    draft.targets = targets;
    return {
      text: [
        `Выбрано: ${selected.map((target) => escapeHtml(target.title)).join(', ')}`,
        'Введите время публикации (<code>HH:MM</code> или <code>DD.MM.YYYY HH:MM</code>) или нажмите «Отправить сейчас».',
        'Можно выбрать еще один канал.',
      ].join('\n'),
      keyboard: [...serviceKeyboard(), [{ text: '🚀 Отправить сейчас', callback_data: 'sendnow' }]],
    };
  }

  private async sendNow(userId: number): Promise<Reply> {
    const draft = this.draftFor(userId);
    if (!draft || draft.targets.length === 0) {
      return { text: 'Сначала перешлите сообщение и выберите канал.' };
    }

    const post = await this.services.schedules.schedule(userId, draft, null, this.clock());
    this.drafts.delete(userId);
    triggerDispatch(this.services.dispatch);
    return { text: scheduledText(post, 0) };
  }

  /**
   * Выполняет действие и отправляет ответ; ошибки превращаются в сообщение пользователю
   */
  private async respond(
    chatId: number,
    action: () => Promise<Reply | null>,
  ): Promise<void> {
    let reply: Reply | null;
    try {
      reply = await action();
    } catch (error) {
      reply = this.errorReply(error);
    }
    if (!reply) {
      return;
    }

    await this.send({ chatId, text: reply.text, keyboard: reply.keyboard });
    for (const notification of reply.notify ?? []) {
      try {
        await this.send(notification);
      } catch (error) {
        // Пользователь мог заблокировать бота
        this.logger.warn('Failed to deliver notification', {
          chatId: notification.chatId,
          error: errorMessage(error),
        });
      }
    }
  }

  private errorReply(error: unknown): Reply {
    if (error instanceof RepositoryError || !(error instanceof AppError)) {
      this.logger.error('Unexpected error while handling update', {
        error: errorMessage(error),
      });
      return { text: '⚠️ Что-то пошло не так, попробуйте позже.' };
    }
    return { text: `❌ ${escapeHtml(error.message)}` };
  }

  private async send(message: OutgoingMessage): Promise<void> {
    await this.bot.sendMessage(message.chatId, message.text, {
      parse_mode: 'HTML',
      disable_web_page_preview: true,
      reply_markup: message.keyboard
        ? { inline_keyboard: message.keyboard }
        : undefined,
    });
  }

  /**
   * Останавливает бота
   */
  async stop(): Promise<void> {
    try {
      if (this.polling && this.isInitialized) {
        await this.bot.stopPolling();
      }
      this.logger.info('Bot stopped successfully');
    } catch (error) {
      this.logger.error('Error stopping bot', { error });
    }
  }

  isReady(): boolean {
    return this.isInitialized;
  }
}

/**
 * Пересланный из канала пост копируется из канала, остальное из личного чата с ботом
 */
function sourceOf(msg: TelegramBot.Message): SourceRef {
  const own = { chatId: msg.chat.id, messageId: msg.message_id };
  const sizes = msg.photo ?? [];
  const content = {
    text: msg.text ?? msg.caption,
    photoFileId: sizes.length > 0 ? sizes[sizes.length - 1].file_id : undefined,
  };
  if (msg.forward_from_chat && msg.forward_from_message_id !== undefined) {
    return {
      chatId: msg.forward_from_chat.id,
      messageId: msg.forward_from_message_id,
      ...content,
      fallback: own,
    };
  }
  return { ...own, ...content };
}

function serviceKeyboard(): InlineKeyboard {
  return [
    [
      { text: 'Telegram', callback_data: 'svc:tg' },
      { text: 'VK', callback_data: 'svc:vk' },
    ],
  ];
}
