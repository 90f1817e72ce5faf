/**
 * Storage-facing contracts. Services depend on these, never on SQL.
 */

import {
  ChannelTarget,
  DiscoveredTarget,
  NewScheduledPost,
  Platform,
  PostState,
  ScheduledPost,
  TargetResult,
  UserIdentity,
  UserRecord,
  UserStatus,
} from './models';

export interface UserStore {
  findById(userId: number): Promise<UserRecord | null>;
  /** Inserts the user as superadmin; null when a superadmin already exists */
  createSuperadmin(
    identity: UserIdentity,
    tzOffsetMinutes: number,
  ): Promise<UserRecord | null>;
  /** Inserts the user as pending; null when `queueCap` pending users already exist */
  createPending(
    identity: UserIdentity,
    tzOffsetMinutes: number,
    queueCap: number,
  ): Promise<UserRecord | null>;
  setStatus(userId: number, status: UserStatus): Promise<UserRecord | null>;
  setTimezone(
    userId: number,
    tzOffsetMinutes: number,
  ): Promise<UserRecord | null>;
  delete(userId: number): Promise<boolean>;
  listByStatus(statuses: readonly UserStatus[]): Promise<UserRecord[]>;
}

export interface ChannelStore {
  upsert(target: DiscoveredTarget): Promise<ChannelTarget>;
  /** Replaces every target of the platform in one transaction */
  replacePlatform(
    platform: Platform,
    targets: DiscoveredTarget[],
  ): Promise<ChannelTarget[]>;
  find(platform: Platform, externalId: string): Promise<ChannelTarget | null>;
  list(platform?: Platform): Promise<ChannelTarget[]>;
  delete(platform: Platform, externalId: string): Promise<boolean>;
}

export interface ScheduleStore {
  create(post: NewScheduledPost): Promise<ScheduledPost>;
  get(id: number): Promise<ScheduledPost | null>;
  /** `scheduled` posts with dispatchAt <= now, earliest first */
  listDue(now: Date): Promise<ScheduledPost[]>;
  listScheduled(ownerId?: number): Promise<ScheduledPost[]>;
  /** `sent` and `failed` posts, latest dispatchAt first */
  listHistory(ownerId: number | undefined, limit: number): Promise<ScheduledPost[]>;
  /**
   * Compare-and-swap on the stored state.
   * Throws StateConflictError when the stored state is not `from`.
   */
  transition(
    id: number,
    from: PostState,
    to: PostState,
    results?: TargetResult[],
  ): Promise<ScheduledPost>;
  /** Only succeeds from `scheduled` */
  cancel(id: number): Promise<ScheduledPost>;
}
