/**
 * Channel model - a destination the bot can publish to
 */

export type Platform = 'telegram' | 'vk';

export interface ChannelTarget {
  platform: Platform;
  externalId: string; // Telegram chat id or VK group id
  title: string;
  canPost: boolean;
  updatedAt: Date;
}

export interface DiscoveredTarget {
  platform: Platform;
  externalId: string;
  title: string;
  canPost: boolean;
}

/**
 * Telegram my_chat_member update, reduced to what the registry needs
 */
export interface AdminStatusEvent {
  chatId: number;
  title: string;
  status: string; // administrator | creator | member | left | kicked | ...
  canPostMessages?: boolean;
}
