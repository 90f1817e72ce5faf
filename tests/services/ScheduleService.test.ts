/**
 * ScheduleService unit tests
 */

import { AccessControlService } from '../../src/services/AccessControlService';
import { ChannelRegistryService } from '../../src/services/ChannelRegistryService';
import { PostDraft, ScheduleService } from '../../src/services/ScheduleService';
import { AuthorizationError, ValidationError } from '../../src/utils/errors';
import {
  InMemoryChannelStore,
  InMemoryScheduleStore,
  InMemoryUserStore,
} from '../helpers/fakes';

describe('ScheduleService', () => {
  const now = new Date('2024-05-01T11:55:00Z');
  const draft: PostDraft = {
    source: { chatId: 500, messageId: 7, text: 'hello' },
    targets: [{ platform: 'telegram', externalId: '-1001' }],
  };

  let users: InMemoryUserStore;
  let store: InMemoryScheduleStore;
  let access: AccessControlService;
  let service: ScheduleService;

  beforeEach(() => {
    users = new InMemoryUserStore();
    users.seed(1, 'superadmin', 120);
    users.seed(2, 'approved', 0);
    users.seed(3, 'pending', 0);
    users.seed(4, 'approved', 0);

    const channels = new InMemoryChannelStore();
    channels.seed({ platform: 'telegram', externalId: '-1001', title: 'News', canPost: true });
    channels.seed({ platform: 'vk', externalId: '20', title: 'Group', canPost: true });

    store = new InMemoryScheduleStore();
    access = new AccessControlService(users, {
      registrationQueueCap: 10,
      defaultTzOffsetMinutes: 0,
    });
    const registry = new ChannelRegistryService(channels, {}, access);
    service = new ScheduleService(store, access, registry, { historyLimit: 2 });
  });

  describe('schedule', () => {
    it('should persist a scheduled post with resolved targets', async () => {
      const post = await service.schedule(2, draft, '14:00', now);

      expect(post).toMatchObject({
        id: 1,
        ownerId: 2,
        state: 'scheduled',
        requestedTime: '14:00',
        source: { chatId: 500, messageId: 7, text: 'hello' },
        targets: [{ platform: 'telegram', externalId: '-1001', title: 'News' }],
      });
      expect(post.dispatchAt.toISOString()).toBe('2024-05-01T14:00:00.000Z');
    });

    it("should resolve the time in the owner's offset", async () => {
      const post = await service.schedule(1, draft, '14:00', now);
      expect(post.dispatchAt.toISOString()).toBe('2024-05-01T12:00:00.000Z');
    });

    it('should schedule immediate dispatch without a requested time', async () => {
      const post = await service.schedule(2, draft, null, now);
      expect(post.requestedTime).toBeNull();
      expect(post.dispatchAt).toEqual(now);
    });

    it('should keep several targets in one post', async () => {
      const post = await service.schedule(
        2,
        { ...draft, targets: [...draft.targets, { platform: 'vk', externalId: '20' }] },
        '13:00',
        now,
      );
      expect(post.targets.map((target) => target.title)).toEqual(['News', 'Group']);
    });

    it('should reject times in the past', async () => {
      await expect(service.schedule(2, draft, '01.05.2024 11:00', now)).rejects.toMatchObject({
        reason: 'INVALID_TIME',
        message: 'This time has already passed',
      });
      expect(store.posts.size).toBe(0);
    });

    it('should reject malformed times', async () => {
      await expect(service.schedule(2, draft, 'noon', now)).rejects.toThrow(ValidationError);
    });

    it('should refuse users without access', async () => {
      await expect(service.schedule(3, draft, '14:00', now)).rejects.toMatchObject({
        reason: 'NOT_AUTHORIZED',
      });
    });

    it('should refuse unknown targets', async () => {
      await expect(
        service.schedule(2, { ...draft, targets: [{ platform: 'vk', externalId: '99' }] }, '14:00', now),
      ).rejects.toMatchObject({ reason: 'INVALID_TARGET' });
      expect(store.posts.size).toBe(0);
    });

    it('should not move a post when the owner changes offset later', async () => {
      const post = await service.schedule(2, draft, '14:00', now);
      await access.setTimezone(2, '+05:00');

      const stored = await store.get(post.id);
      expect(stored?.dispatchAt.toISOString()).toBe('2024-05-01T14:00:00.000Z');
    });
  });

  describe('cancel', () => {
    it('should let the owner cancel', async () => {
      const post = await service.schedule(2, draft, '14:00', now);
      const cancelled = await service.cancel(2, post.id);
      expect(cancelled.state).toBe('cancelled');
    });

    it('should let the superadmin cancel any post', async () => {
      const post = await service.schedule(2, draft, '14:00', now);
      await expect(service.cancel(1, post.id)).resolves.toMatchObject({ state: 'cancelled' });
    });

    it("should refuse other users' posts", async () => {
      const post = await service.schedule(2, draft, '14:00', now);
      await expect(service.cancel(4, post.id)).rejects.toThrow(AuthorizationError);
      expect((await store.get(post.id))?.state).toBe('scheduled');
    });

    it('should refuse posts that are no longer scheduled', async () => {
      const post = await service.schedule(2, draft, '14:00', now);
      await service.cancel(2, post.id);
      await expect(service.cancel(2, post.id)).rejects.toThrow(
        'Post 1 cannot be cancelled, it is already cancelled',
      );
    });

    it('should report unknown posts', async () => {
      await expect(service.cancel(2, 77)).rejects.toThrow('Scheduled post 77 not found');
    });
  });

  describe('reschedule', () => {
    it('should create a new post and leave the original untouched', async () => {
      const original = await service.schedule(2, draft, '14:00', now);
      await service.cancel(2, original.id);

      const fresh = await service.reschedule(2, original.id, '16:00', now);

      expect(fresh.id).toBe(2);
      expect(fresh.state).toBe('scheduled');
      expect(fresh.requestedTime).toBe('16:00');
      expect(fresh.dispatchAt.toISOString()).toBe('2024-05-01T16:00:00.000Z');
      expect((await store.get(original.id))?.state).toBe('cancelled');
    });

    it('should retry failed posts', async () => {
      const original = await service.schedule(2, draft, null, now);
      await store.transition(original.id, 'scheduled', 'dispatching');
      await store.transition(original.id, 'dispatching', 'failed', []);

      const fresh = await service.reschedule(2, original.id, '12:30', now);
      expect(fresh.source).toEqual(original.source);
      expect(fresh.targets).toEqual(original.targets);
    });

    it('should only accept failed or cancelled posts', async () => {
      const post = await service.schedule(2, draft, '14:00', now);
      await expect(service.reschedule(2, post.id, '16:00', now)).rejects.toThrow(
        'Post 1 is scheduled, only failed or cancelled posts can be rescheduled',
      );
    });
  });

  describe('listing', () => {
    beforeEach(async () => {
      await service.schedule(2, draft, '15:00', now);
      await service.schedule(4, draft, '13:00', now);
      await service.schedule(2, draft, '14:00', now);
    });

    it('should show users only their own scheduled posts', async () => {
      const posts = await service.listScheduled(2);
      expect(posts.map((post) => post.id)).toEqual([3, 1]);
    });

    it('should show the superadmin every scheduled post', async () => {
      const posts = await service.listScheduled(1);
      expect(posts.map((post) => post.id)).toEqual([2, 3, 1]);
    });

    it('should list history newest first up to the limit', async () => {
      for (const id of [1, 2, 3]) {
        await store.transition(id, 'scheduled', 'dispatching');
        await store.transition(id, 'dispatching', id === 2 ? 'failed' : 'sent', []);
      }

      expect((await service.listHistory(2)).map((post) => post.id)).toEqual([1, 3]);
      expect((await service.listHistory(1)).map((post) => post.id)).toEqual([1, 3]);
      expect((await service.listHistory(1, 10)).map((post) => post.id)).toEqual([1, 3, 2]);
    });
  });
});
