/**
 * VkPlatformClient - posts to VK community walls and lists groups the token can manage.
 * Thin wrapper around undici for calls to the VK API.
 *
 * Photos are downloaded from Telegram, uploaded into a "bot_uploads" album of the group
 * and attached to the wall post.
 */

import { Blob } from 'buffer';
import { FormData, request } from 'undici';
import { z, ZodError } from 'zod';
import {
  DeliveryFailureReason,
  DiscoveredTarget,
  SourceRef,
  TargetRef,
} from '../database/models';
import { createLogger, Logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { ChannelDiscovery, PlatformClient, SendResult, sendFailure } from './types';

const VK_API_URL = 'https://api.vk.com/method/';
const GROUP_AUTH_UNAVAILABLE = 27;
const ALBUM_TITLE = 'bot_uploads';
const ALBUM_CAPACITY = 10000;

export interface VkClientConfig {
  token: string;
  groupId?: string;
  apiVersion: string;
}

/** Resolves a Telegram file id to a download URL (TelegramBot#getFileLink) */
export interface FileLinkSource {
  getFileLink(fileId: string): Promise<string>;
}

export class VkApiError extends Error {
  constructor(
    public readonly method: string,
    public readonly errorCode: number,
    message: string,
  ) {
    super(`VK error ${method}: ${message}`);
    this.name = 'VkApiError';
  }
}

const envelopeSchema = z.object({
  response: z.unknown().optional(),
  error: z
    .object({
      error_code: z.number(),
      error_msg: z.string().optional(),
    })
    .optional(),
});

const groupSchema = z.object({
  id: z.number(),
  name: z.string(),
});

const groupsGetSchema = z.object({
  items: z.array(groupSchema),
});

// 5.199 wraps the list in { groups }, older versions return a bare array
const groupsGetByIdSchema = z.union([
  z.array(groupSchema),
  z.object({ groups: z.array(groupSchema) }).transform((value) => value.groups),
]);

const wallPostSchema = z.object({
  post_id: z.number(),
});

const albumSchema = z.object({
  id: z.number(),
  title: z.string(),
  size: z.number().default(0),
});

const albumsSchema = z.object({
  items: z.array(albumSchema),
});

const uploadServerSchema = z.object({
  upload_url: z.string().url(),
});

const uploadedSchema = z.object({
  server: z.number(),
  photos_list: z.string(),
  hash: z.string(),
});

const savedPhotosSchema = z
  .array(z.object({ id: z.number(), owner_id: z.number() }))
  .nonempty();

/**
 * Maps VK API error codes to the delivery taxonomy
 */
export function classifyVkError(error: unknown): DeliveryFailureReason {
  if (error instanceof ZodError) {
    // Unreadable answer
    return 'other';
  }
  if (!(error instanceof VkApiError)) {
    // Network failures from undici
    return 'transient';
  }
  switch (error.errorCode) {
    case 7: // permission to perform this action is denied
    case 15: // access denied
    case 203: // access to group denied
    case 214: // access to adding post denied
      return 'not_member';
    case 6: // too many requests per second
    case 9: // flood control
    case 29: // rate limit reached
      return 'rate_limited';
    case 1: // unknown error
    case 10: // internal server error
      return 'transient';
    default:
      return 'other';
  }
}

export class VkPlatformClient implements PlatformClient, ChannelDiscovery {
  readonly platform = 'vk' as const;
  readonly supportsForward = false;

  private logger: Logger;

  constructor(
    private readonly config: VkClientConfig,
    private readonly files: FileLinkSource,
  ) {
    this.logger = createLogger('VkPlatformClient');
  }

  async forward(_source: SourceRef, _target: TargetRef): Promise<SendResult> {
    return sendFailure('other', 'VK does not support forwarding');
  }

  async copy(_source: SourceRef, _target: TargetRef): Promise<SendResult> {
    return sendFailure('other', 'VK does not support copying messages');
  }

  async postText(text: string, target: TargetRef): Promise<SendResult> {
    return this.wallPost(target, async () => ({ message: text }));
  }

  async publish(source: SourceRef, target: TargetRef): Promise<SendResult> {
    const { text, photoFileId } = source;
    if (!photoFileId) {
      return text
        ? this.postText(text, target)
        : sendFailure('other', 'Source message has no text or photo to publish');
    }
    return this.wallPost(target, async (): Promise<Record<string, string>> => {
      const attachments = await this.uploadPhoto(photoFileId, target.externalId);
      return text ? { message: text, attachments } : { attachments };
    });
  }

  private async wallPost(
    target: TargetRef,
    content: () => Promise<Record<string, string>>,
  ): Promise<SendResult> {
    try {
      const response = await this.call(
        'wall.post',
        {
          owner_id: `-${target.externalId}`,
          from_group: '1',
          ...(await content()),
        },
        wallPostSchema,
      );
      return {
        success: true,
        messageRef: `wall-${target.externalId}_${response.post_id}`,
      };
    } catch (error) {
      const reason = classifyVkError(error);
      this.logger.warn('VK wall.post failed', {
        groupId: target.externalId,
        reason,
        error: errorMessage(error),
      });
      return sendFailure(reason, errorMessage(error));
    }
  }

  /**
   * Uploads a Telegram photo into the group's album and returns the wall attachment id
   */
  private async uploadPhoto(fileId: string, groupId: string): Promise<string> {
    const photo = await this.download(fileId);
    const albumId = await this.albumFor(groupId);

    const server = await this.call(
      'photos.getUploadServer',
      { group_id: groupId, album_id: String(albumId) },
      uploadServerSchema,
    );

    const form = new FormData();
    form.append('file1', new Blob([photo], { type: 'image/jpeg' }), 'photo.jpg');
    const { statusCode, body } = await request(server.upload_url, {
      method: 'POST',
      body: form,
    });
    if (statusCode >= 400) {
      await body.dump();
      throw new VkApiError('photos.upload', 10, `HTTP ${statusCode}`);
    }
    const uploaded = uploadedSchema.parse(await body.json());

    const [saved] = await this.call(
      'photos.save',
      {
        group_id: groupId,
        album_id: String(albumId),
        server: String(uploaded.server),
        photos_list: uploaded.photos_list,
        hash: uploaded.hash,
      },
      savedPhotosSchema,
    );
    this.logger.debug('Photo uploaded', { groupId, albumId, photoId: saved.id });
    return `photo${saved.owner_id}_${saved.id}`;
  }

  /**
   * The newest bot_uploads album with room left, or a new one with a free title
   */
  private async albumFor(groupId: string): Promise<number> {
    const { items } = await this.call(
      'photos.getAlbums',
      { owner_id: `-${groupId}` },
      albumsSchema,
    );
    const ours = items.filter((album) => album.title.startsWith(ALBUM_TITLE));
    const latest = ours[ours.length - 1];
    if (latest && latest.size < ALBUM_CAPACITY) {
      return latest.id;
    }

    const titles = new Set(items.map((album) => album.title));
    let title = ALBUM_TITLE;
    for (let suffix = 2; titles.has(title); suffix++) {
      title = `${ALBUM_TITLE}_${suffix}`;
    }
    const created = await this.call(
      'photos.createAlbum',
      { title, group_id: groupId, privacy_view: 'nobody' },
      albumSchema,
    );
    this.logger.info('Album created', { groupId, albumId: created.id, title });
    return created.id;
  }

  private async download(fileId: string): Promise<Buffer> {
    const url = await this.files.getFileLink(fileId);
    const { statusCode, body } = await request(url);
    if (statusCode !== 200) {
      await body.dump();
      throw new Error(`Photo download failed with HTTP ${statusCode}`);
    }
    return Buffer.from(await body.arrayBuffer());
  }

  /**
   * Groups administered by the token's owner; a group token only sees its own group
   */
  async discover(): Promise<DiscoveredTarget[]> {
    try {
      const response = await this.call(
        'groups.get',
        { filter: 'admin', extended: '1' },
        groupsGetSchema,
      );
      return response.items.map((group) => this.toTarget(group));
    } catch (error) {
      if (
        error instanceof VkApiError &&
        error.errorCode === GROUP_AUTH_UNAVAILABLE &&
        this.config.groupId
      ) {
        this.logger.info('Group token detected, using groups.getById', {
          groupId: this.config.groupId,
        });
        const groups = await this.call(
          'groups.getById',
          { group_id: this.config.groupId },
          groupsGetByIdSchema,
        );
        return groups.map((group) => this.toTarget(group));
      }
      throw error;
    }
  }

  private toTarget(group: z.infer<typeof groupSchema>): DiscoveredTarget {
    return {
      platform: 'vk',
      externalId: String(group.id),
      title: group.name,
      canPost: true,
    };
  }

  private async call<T>(
    method: string,
    params: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    const form = new URLSearchParams({
      ...params,
      access_token: this.config.token,
      v: this.config.apiVersion,
    });

    const { statusCode, body } = await request(`${VK_API_URL}${method}`, {
      method: 'POST',
      headers: { 'content-type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });

    if (statusCode >= 500) {
      await body.dump();
      throw new VkApiError(method, 10, `HTTP ${statusCode}`);
    }

    const envelope = envelopeSchema.parse(await body.json());
    if (envelope.error) {
      throw new VkApiError(
        method,
        envelope.error.error_code,
        envelope.error.error_msg ?? 'Unknown error',
      );
    }

    return schema.parse(envelope.response);
  }
}
