/**
 * AccessControlService unit tests
 */

import { AccessControlService } from '../../src/services/AccessControlService';
import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
} from '../../src/utils/errors';
import { InMemoryUserStore } from '../helpers/fakes';

describe('AccessControlService', () => {
  let users: InMemoryUserStore;
  let access: AccessControlService;

  beforeEach(() => {
    users = new InMemoryUserStore();
    access = new AccessControlService(users, {
      registrationQueueCap: 5,
      defaultTzOffsetMinutes: 180,
    });
  });

  describe('register', () => {
    it('should make the first contact superadmin', async () => {
      const { user, created } = await access.register({ userId: 1, username: 'owner' });

      expect(created).toBe(true);
      expect(user).toMatchObject({
        userId: 1,
        username: 'owner',
        status: 'superadmin',
        tzOffsetMinutes: 180,
      });
    });

    it('should queue later contacts as pending', async () => {
      await access.register({ userId: 1 });
      const { user, created } = await access.register({ userId: 2 });

      expect(created).toBe(true);
      expect(user.status).toBe('pending');
    });

    it('should return the existing record on repeated contact', async () => {
      await access.register({ userId: 1 });
      await access.register({ userId: 2 });

      const again = await access.register({ userId: 2 });
      expect(again).toMatchObject({ created: false, user: { status: 'pending' } });
    });

    it('should refuse the sixth pending user when the cap is five', async () => {
      users.seed(1, 'superadmin');
      for (let id = 10; id < 15; id++) {
        await access.register({ userId: id });
      }

      await expect(access.register({ userId: 15 })).rejects.toMatchObject({
        reason: 'QUEUE_FULL',
      });
      expect(await users.findById(15)).toBeNull();

      await access.approve(1, 10);
      await expect(access.register({ userId: 15 })).resolves.toMatchObject({
        user: { userId: 15, status: 'pending' },
        created: true,
      });
    });

    it('should not let a rejected user back into the queue', async () => {
      users.seed(1, 'superadmin');
      users.seed(2, 'rejected');

      await expect(access.register({ userId: 2 })).rejects.toThrow(AuthorizationError);
      await expect(access.register({ userId: 2 })).rejects.toMatchObject({
        reason: 'ALREADY_REJECTED',
      });
      expect((await users.findById(2))?.status).toBe('rejected');
    });
  });

  describe('approve / reject / remove', () => {
    beforeEach(() => {
      users.seed(1, 'superadmin');
      users.seed(2, 'approved');
      users.seed(3, 'pending');
    });

    it('should let approved users approve pending ones', async () => {
      const user = await access.approve(2, 3);
      expect(user.status).toBe('approved');
      expect(await access.isAuthorized(3)).toBe(true);
    });

    it('should reject pending users', async () => {
      const user = await access.reject(1, 3);
      expect(user.status).toBe('rejected');
      expect(await access.isAuthorized(3)).toBe(false);
    });

    it('should refuse actors without access', async () => {
      users.seed(4, 'pending');
      await expect(access.approve(4, 3)).rejects.toMatchObject({
        reason: 'NOT_AUTHORIZED',
      });
      await expect(access.approve(99, 3)).rejects.toThrow(AuthorizationError);
      expect((await users.findById(3))?.status).toBe('pending');
    });

    it('should report unknown targets', async () => {
      await expect(access.approve(1, 42)).rejects.toThrow(NotFoundError);
      await expect(access.remove(1, 42)).rejects.toThrow('User 42 not found');
    });

    it('should protect the superadmin', async () => {
      await expect(access.reject(2, 1)).rejects.toThrow(ValidationError);
      await expect(access.remove(2, 1)).rejects.toThrow(
        'Superadmin status cannot be changed',
      );
      expect((await users.findById(1))?.status).toBe('superadmin');
    });

    it('should let a removed user register again as pending', async () => {
      await access.remove(1, 2);
      expect(await users.findById(2)).toBeNull();

      const { user } = await access.register({ userId: 2 });
      expect(user.status).toBe('pending');
    });
  });

  describe('listing', () => {
    it('should list pending and approved users separately', async () => {
      users.seed(1, 'superadmin');
      users.seed(2, 'approved');
      users.seed(3, 'pending');
      users.seed(4, 'rejected');

      expect((await access.listPending()).map((user) => user.userId)).toEqual([3]);
      expect((await access.listApproved()).map((user) => user.userId)).toEqual([1, 2]);
    });
  });

  describe('setTimezone', () => {
    it('should store the parsed offset', async () => {
      users.seed(2, 'approved');
      const user = await access.setTimezone(2, '-05:30');
      expect(user.tzOffsetMinutes).toBe(-330);
    });

    it('should validate before writing', async () => {
      users.seed(2, 'approved', 60);
      await expect(access.setTimezone(2, '+25:00')).rejects.toMatchObject({
        reason: 'INVALID_OFFSET',
      });
      expect((await users.findById(2))?.tzOffsetMinutes).toBe(60);
    });

    it('should require access', async () => {
      users.seed(3, 'pending');
      await expect(access.setTimezone(3, '+01:00')).rejects.toThrow(AuthorizationError);
    });
  });
});
