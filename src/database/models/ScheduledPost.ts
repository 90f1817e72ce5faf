/**
 * ScheduledPost model - a source message queued for delivery to one or more targets
 */

import { Platform } from './Channel';

export type PostState =
  | 'scheduled'
  | 'dispatching'
  | 'sent'
  | 'failed'
  | 'cancelled';

export type DeliveryMethod = 'forward' | 'copy' | 'post';

export type DeliveryFailureReason =
  | 'not_member'
  | 'rate_limited'
  | 'transient'
  | 'other';

export interface MessageRef {
  chatId: number;
  messageId: number;
}

/**
 * The message to publish. chatId/messageId point at the origin (the channel a post was
 * forwarded from); fallback is the copy in the user's private chat with the bot, which
 * stays readable when the origin channel does not.
 */
export interface SourceRef extends MessageRef {
  text?: string; // text or caption, used where forwarding is impossible
  photoFileId?: string; // largest size of the attached photo
  fallback?: MessageRef;
}

export interface TargetRef {
  platform: Platform;
  externalId: string;
  title: string;
}

export interface TargetResult {
  platform: Platform;
  externalId: string;
  status: 'sent' | 'failed';
  method?: DeliveryMethod;
  messageRef?: string;
  reason?: DeliveryFailureReason;
  error?: string;
}

export interface ScheduledPost {
  id: number;
  ownerId: number;
  source: SourceRef;
  targets: TargetRef[];
  requestedTime: string | null; // null means "send now"
  dispatchAt: Date;
  state: PostState;
  results: TargetResult[];
  createdAt: Date;
  updatedAt: Date;
}

export interface NewScheduledPost {
  ownerId: number;
  source: SourceRef;
  targets: TargetRef[];
  requestedTime: string | null;
  dispatchAt: Date;
}
