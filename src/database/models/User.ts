/**
 * User model - a person who talks to the bot and may schedule posts
 */

export type UserStatus = 'pending' | 'approved' | 'rejected' | 'superadmin';

export const AUTHORIZED_STATUSES: readonly UserStatus[] = [
  'approved',
  'superadmin',
];

export interface UserRecord {
  userId: number;
  username?: string;
  status: UserStatus;
  tzOffsetMinutes: number; // signed minutes east of UTC
  createdAt: Date;
  updatedAt: Date;
}

export interface UserIdentity {
  userId: number;
  username?: string;
}

export const isAuthorizedStatus = (status: UserStatus): boolean =>
  AUTHORIZED_STATUSES.includes(status);
