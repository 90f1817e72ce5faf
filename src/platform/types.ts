/**
 * Contracts the dispatch loop and channel registry use to reach Telegram and VK
 */

import {
  ChannelTarget,
  DeliveryFailureReason,
  DiscoveredTarget,
  Platform,
  SourceRef,
  TargetRef,
} from '../database/models';

export type SendResult =
  | { success: true; messageRef: string }
  | { success: false; reason: DeliveryFailureReason; error: string };

export interface PlatformClient {
  readonly platform: Platform;
  /** false for platforms that can only publish text and photos (VK walls) */
  readonly supportsForward: boolean;
  forward(source: SourceRef, target: TargetRef): Promise<SendResult>;
  /** Copies the private-chat fallback when the source has one */
  copy(source: SourceRef, target: TargetRef): Promise<SendResult>;
  postText(text: string, target: TargetRef): Promise<SendResult>;
  /** Publishes the source's text and photo as a new post, through postText when there is no photo */
  publish(source: SourceRef, target: TargetRef): Promise<SendResult>;
}

export interface ChannelDiscovery {
  readonly platform: Platform;
  /** Returns the current view of the platform's targets */
  discover(known: ChannelTarget[]): Promise<DiscoveredTarget[]>;
}

export const sendFailure = (
  reason: DeliveryFailureReason,
  error: string,
): SendResult => ({ success: false, reason, error });
