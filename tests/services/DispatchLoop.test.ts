/**
 * DispatchLoop unit tests
 */

import TelegramBot from 'node-telegram-bot-api';
import { NewScheduledPost } from '../../src/database/models';
import { TelegramPlatformClient } from '../../src/platform/TelegramPlatformClient';
import { sendFailure } from '../../src/platform/types';
import { DispatchLoop, PlatformClients } from '../../src/services/DispatchLoop';
import { ConfigError, RepositoryError } from '../../src/utils/errors';
import {
  FakePlatformClient,
  InMemoryScheduleStore,
  sent,
} from '../helpers/fakes';

describe('DispatchLoop', () => {
  const now = new Date('2024-05-01T12:00:00Z');
  const clock = () => now;
  const options = { intervalSeconds: 30, timeoutMs: 1000 };

  let store: InMemoryScheduleStore;
  let telegram: FakePlatformClient;
  let vk: FakePlatformClient;
  let clients: PlatformClients;

  const newPost = (overrides: Partial<NewScheduledPost> = {}): NewScheduledPost => ({
    ownerId: 2,
    source: { chatId: 500, messageId: 7, text: 'hello' },
    targets: [{ platform: 'telegram', externalId: '-1001', title: 'News' }],
    requestedTime: null,
    dispatchAt: new Date('2024-05-01T11:59:00Z'),
    ...overrides,
  });

  beforeEach(() => {
    store = new InMemoryScheduleStore();
    telegram = new FakePlatformClient('telegram', true);
    vk = new FakePlatformClient('vk', false);
    clients = { telegram, vk };
  });

  it('should refuse intervals cron cannot express', () => {
    expect(
      () => new DispatchLoop(store, clients, { ...options, intervalSeconds: 45 }, clock),
    ).toThrow(ConfigError);
  });

  it('should forward due posts and mark them sent', async () => {
    const post = await store.create(newPost());
    telegram.forward.mockResolvedValue(sent('-1001:55'));

    const summary = await new DispatchLoop(store, clients, options, clock).tick();

    expect(summary).toEqual({ due: 1, claimed: 1, sent: 1, failed: 0, skipped: 0 });
    expect(telegram.forward).toHaveBeenCalledWith(post.source, post.targets[0]);
    expect(await store.get(post.id)).toMatchObject({
      state: 'sent',
      results: [
        {
          platform: 'telegram',
          externalId: '-1001',
          status: 'sent',
          method: 'forward',
          messageRef: '-1001:55',
        },
      ],
    });
  });

  it('should leave posts that are not due yet', async () => {
    const post = await store.create(newPost({ dispatchAt: new Date('2024-05-01T12:01:00Z') }));

    const summary = await new DispatchLoop(store, clients, options, clock).tick();

    expect(summary.due).toBe(0);
    expect((await store.get(post.id))?.state).toBe('scheduled');
    expect(telegram.forward).not.toHaveBeenCalled();
  });

  it('should fall back to copy when forwarding is not allowed', async () => {
    const post = await store.create(newPost());
    telegram.forward.mockResolvedValue(sendFailure('not_member', 'forbidden'));
    telegram.copy.mockResolvedValue(sent('-1001:56'));

    await new DispatchLoop(store, clients, options, clock).tick();

    expect((await store.get(post.id))?.results).toEqual([
      {
        platform: 'telegram',
        externalId: '-1001',
        status: 'sent',
        method: 'copy',
        messageRef: '-1001:56',
      },
    ]);
  });

  it('should not copy after other forward failures', async () => {
    const post = await store.create(newPost());
    telegram.forward.mockResolvedValue(sendFailure('transient', 'socket hang up'));

    await new DispatchLoop(store, clients, options, clock).tick();

    expect(telegram.copy).not.toHaveBeenCalled();
    expect(await store.get(post.id)).toMatchObject({
      state: 'failed',
      results: [
        {
          status: 'failed',
          method: 'forward',
          reason: 'transient',
          error: 'socket hang up',
        },
      ],
    });
  });

  it('should publish to VK and fail when the source has nothing to post', async () => {
    const withText = await store.create(
      newPost({ targets: [{ platform: 'vk', externalId: '20', title: 'Group' }] }),
    );
    const empty = await store.create(
      newPost({
        source: { chatId: 500, messageId: 8 },
        targets: [{ platform: 'vk', externalId: '20', title: 'Group' }],
      }),
    );
    vk.publish.mockResolvedValue(sent('wall-20_3'));

    const summary = await new DispatchLoop(store, clients, options, clock).tick();

    expect(summary).toEqual({ due: 2, claimed: 2, sent: 1, failed: 1, skipped: 0 });
    expect(vk.publish).toHaveBeenCalledTimes(1);
    expect(vk.publish).toHaveBeenCalledWith(withText.source, withText.targets[0]);
    expect((await store.get(empty.id))?.results).toEqual([
      {
        platform: 'vk',
        externalId: '20',
        status: 'failed',
        method: 'post',
        reason: 'other',
        error: 'Source message has no text or photo to publish',
      },
    ]);
  });

  it('should publish photos without a caption to VK', async () => {
    const post = await store.create(
      newPost({
        source: { chatId: 500, messageId: 9, photoFileId: 'photo-large' },
        targets: [{ platform: 'vk', externalId: '20', title: 'Group' }],
      }),
    );
    vk.publish.mockResolvedValue(sent('wall-20_4'));

    await new DispatchLoop(store, clients, options, clock).tick();

    expect(vk.publish).toHaveBeenCalledWith(post.source, post.targets[0]);
    expect(await store.get(post.id)).toMatchObject({
      state: 'sent',
      results: [{ status: 'sent', method: 'post', messageRef: 'wall-20_4' }],
    });
  });

  it('should fail the whole post when any target fails', async () => {
    const post = await store.create(
      newPost({
        targets: [
          { platform: 'telegram', externalId: '-1001', title: 'News' },
          { platform: 'vk', externalId: '20', title: 'Group' },
        ],
      }),
    );
    telegram.forward.mockResolvedValue(sent('-1001:57'));
    vk.publish.mockResolvedValue(sendFailure('rate_limited', 'VK error wall.post: Too many requests'));

    await new DispatchLoop(store, clients, options, clock).tick();

    const stored = await store.get(post.id);
    expect(stored?.state).toBe('failed');
    expect(stored?.results.map((result) => result.status)).toEqual(['sent', 'failed']);
  });

  it('should report targets of unconfigured platforms', async () => {
    const post = await store.create(
      newPost({ targets: [{ platform: 'vk', externalId: '20', title: 'Group' }] }),
    );

    await new DispatchLoop(store, { telegram }, options, clock).tick();

    expect((await store.get(post.id))?.results).toEqual([
      {
        platform: 'vk',
        externalId: '20',
        status: 'failed',
        method: undefined,
        reason: 'other',
        error: 'Platform vk is not configured',
      },
    ]);
  });

  it('should turn thrown client errors into failures', async () => {
    const post = await store.create(newPost());
    telegram.forward.mockRejectedValue(new Error('boom'));

    await new DispatchLoop(store, clients, options, clock).tick();

    expect((await store.get(post.id))?.results[0]).toMatchObject({
      status: 'failed',
      reason: 'other',
      error: 'boom',
    });
  });

  it('should give up on platform calls that hang', async () => {
    const post = await store.create(newPost());
    telegram.forward.mockImplementation(() => new Promise(() => undefined));

    await new DispatchLoop(store, clients, { ...options, timeoutMs: 20 }, clock).tick();

    expect((await store.get(post.id))?.results[0]).toMatchObject({
      status: 'failed',
      method: 'forward',
      reason: 'transient',
      error: 'Platform call timed out after 20 ms',
    });
    expect(telegram.copy).not.toHaveBeenCalled();
  });

  it('should deliver a post exactly once when two loops race', async () => {
    const post = await store.create(newPost());
    telegram.forward.mockResolvedValue(sent('-1001:58'));

    const [first, second] = await Promise.all([
      new DispatchLoop(store, clients, options, clock).tick(),
      new DispatchLoop(store, clients, options, clock).tick(),
    ]);

    expect(telegram.forward).toHaveBeenCalledTimes(1);
    expect(first.claimed + second.claimed).toBe(1);
    expect(first.skipped + second.skipped).toBe(1);
    expect((await store.get(post.id))?.state).toBe('sent');
  });

  it('should skip posts cancelled after being listed', async () => {
    const post = await store.create(newPost());
    const listDue = store.listDue.bind(store);
    jest.spyOn(store, 'listDue').mockImplementation(async (at) => {
      const due = await listDue(at);
      await store.cancel(post.id);
      return due;
    });

    const summary = await new DispatchLoop(store, clients, options, clock).tick();

    expect(summary.skipped).toBe(1);
    expect(telegram.forward).not.toHaveBeenCalled();
    expect((await store.get(post.id))?.state).toBe('cancelled');
  });

  it('should abort the pass on storage errors', async () => {
    await store.create(newPost());
    telegram.forward.mockResolvedValue(sent('-1001:59'));
    const transition = store.transition.bind(store);
    jest.spyOn(store, 'transition').mockImplementation(async (id, from, to, results) => {
      if (from === 'dispatching') {
        throw new RepositoryError('Database unavailable');
      }
      return transition(id, from, to, results);
    });

    await expect(new DispatchLoop(store, clients, options, clock).tick()).rejects.toThrow(
      RepositoryError,
    );
  });

  it('should run a pass on trigger', async () => {
    const post = await store.create(newPost());
    telegram.forward.mockResolvedValue(sent('-1001:60'));

    await new DispatchLoop(store, clients, options, clock).trigger();

    expect((await store.get(post.id))?.state).toBe('sent');
  });

  describe('with the Telegram client', () => {
    it('should copy from the private chat when the source channel is out of reach', async () => {
      const api = jest.mocked(new TelegramBot('test-token'));
      api.forwardMessage.mockRejectedValue(
        Object.assign(new Error('ETELEGRAM: 400 Bad Request: chat not found'), {
          code: 'ETELEGRAM',
          response: {
            statusCode: 400,
            body: { error_code: 400, description: 'Bad Request: chat not found' },
          },
        }),
      );
      api.copyMessage.mockResolvedValue({ message_id: 61 });
      const post = await store.create(
        newPost({
          source: {
            chatId: -500,
            messageId: 9,
            text: 'hello',
            fallback: { chatId: 2, messageId: 40 },
          },
        }),
      );

      await new DispatchLoop(
        store,
        { telegram: new TelegramPlatformClient(api) },
        options,
        clock,
      ).tick();

      expect(api.forwardMessage).toHaveBeenCalledWith('-1001', -500, 9);
      expect(api.copyMessage).toHaveBeenCalledWith('-1001', 2, 40);
      expect(await store.get(post.id)).toMatchObject({
        state: 'sent',
        results: [{ status: 'sent', method: 'copy', messageRef: '-1001:61' }],
      });
    });
  });
});
