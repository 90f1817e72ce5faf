/**
 * AccessControlService - регистрация пользователей и одобрение доступа
 *
 * pending ──approve──▶ approved
 *    └─────reject───▶ rejected (повторная регистрация невозможна)
 * Первый контакт при отсутствии суперадмина создает суперадмина.
 */

import { Logger } from 'winston';
import {
  UserIdentity,
  UserRecord,
  UserStatus,
  isAuthorizedStatus,
} from '../database/models';
import { UserStore } from '../database/repositories';
import {
  AuthorizationError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import { createLogger } from '../utils/logger';
import { parseOffset } from '../utils/timezone';

export interface AccessControlOptions {
  registrationQueueCap: number;
  defaultTzOffsetMinutes: number;
}

export interface RegistrationResult {
  user: UserRecord;
  /** true when this call created the record */
  created: boolean;
}

export class AccessControlService {
  private logger: Logger;

  constructor(
    private readonly users: UserStore,
    private readonly options: AccessControlOptions,
  ) {
    this.logger = createLogger('AccessControlService');
  }

  /**
   * Первый контакт пользователя с ботом
   */
  async register(identity: UserIdentity): Promise<RegistrationResult> {
    const existing = await this.users.findById(identity.userId);
    if (existing) {
      return { user: this.assertNotRejected(existing), created: false };
    }

    const { defaultTzOffsetMinutes, registrationQueueCap } = this.options;

    const superadmin = await this.users.createSuperadmin(
      identity,
      defaultTzOffsetMinutes,
    );
    if (superadmin) {
      this.logger.info('Первый пользователь стал суперадмином', {
        userId: identity.userId,
      });
      return { user: superadmin, created: true };
    }

    const pending = await this.users.createPending(
      identity,
      defaultTzOffsetMinutes,
      registrationQueueCap,
    );
    if (pending) {
      this.logger.info('Новый пользователь ожидает одобрения', {
        userId: identity.userId,
        username: identity.username,
      });
      return { user: pending, created: true };
    }

    // Параллельный первый контакт того же пользователя мог успеть создать запись
    const raced = await this.users.findById(identity.userId);
    if (raced) {
      return { user: this.assertNotRejected(raced), created: false };
    }

    this.logger.warn('Очередь регистрации заполнена', {
      userId: identity.userId,
      cap: registrationQueueCap,
    });
    throw new AuthorizationError(
      'QUEUE_FULL',
      'Registration queue is full, try again later',
    );
  }

  async approve(adminId: number, targetId: number): Promise<UserRecord> {
    return this.changeStatus(adminId, targetId, 'approved');
  }

  async reject(adminId: number, targetId: number): Promise<UserRecord> {
    return this.changeStatus(adminId, targetId, 'rejected');
  }

  /**
   * Удаляет запись; при следующем контакте пользователь снова попадет в очередь
   */
  async remove(adminId: number, targetId: number): Promise<void> {
    await this.requireAuthorized(adminId);
    const target = await this.getTarget(targetId);
    this.assertNotSuperadmin(target);

    await this.users.delete(targetId);
    this.logger.info('Пользователь удален', { adminId, targetId });
  }

  listPending(): Promise<UserRecord[]> {
    return this.users.listByStatus(['pending']);
  }

  listApproved(): Promise<UserRecord[]> {
    return this.users.listByStatus(['superadmin', 'approved']);
  }

  async isAuthorized(userId: number): Promise<boolean> {
    const user = await this.users.findById(userId);
    return user !== null && isAuthorizedStatus(user.status);
  }

  async requireAuthorized(userId: number): Promise<UserRecord> {
    const user = await this.users.findById(userId);
    if (!user || !isAuthorizedStatus(user.status)) {
      throw new AuthorizationError(
        'NOT_AUTHORIZED',
        'You are not allowed to do this',
      );
    }
    return user;
  }

  /**
   * Меняет смещение пользователя. Уже запланированные посты не пересчитываются.
   */
  async setTimezone(userId: number, offsetText: string): Promise<UserRecord> {
    const offset = parseOffset(offsetText);
    await this.requireAuthorized(userId);

    const updated = await this.users.setTimezone(userId, offset);
    if (!updated) {
      throw new NotFoundError(`User ${userId}`);
    }
    this.logger.info('Часовой пояс обновлен', { userId, offset });
    return updated;
  }

  getUser(userId: number): Promise<UserRecord | null> {
    return this.users.findById(userId);
  }

  private async changeStatus(
    adminId: number,
    targetId: number,
    status: Extract<UserStatus, 'approved' | 'rejected'>,
  ): Promise<UserRecord> {
    await this.requireAuthorized(adminId);
    const target = await this.getTarget(targetId);
    this.assertNotSuperadmin(target);

    const updated = await this.users.setStatus(targetId, status);
    if (!updated) {
      throw new NotFoundError(`User ${targetId}`);
    }
    this.logger.info(`Статус пользователя изменен на ${status}`, {
      adminId,
      targetId,
    });
    return updated;
  }

  private async getTarget(targetId: number): Promise<UserRecord> {
    const target = await this.users.findById(targetId);
    if (!target) {
      throw new NotFoundError(`User ${targetId}`);
    }
    return target;
  }

  private assertNotSuperadmin(target: UserRecord): void {
    if (target.status === 'superadmin') {
      throw new ValidationError(
        'Superadmin status cannot be changed',
        'INVALID_STATE',
      );
    }
  }

  private assertNotRejected(user: UserRecord): UserRecord {
    if (user.status === 'rejected') {
      throw new AuthorizationError(
        'ALREADY_REJECTED',
        'Your access request was rejected',
      );
    }
    return user;
  }
}
