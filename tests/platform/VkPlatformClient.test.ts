/**
 * VkPlatformClient tests against an in-process undici MockAgent
 */

import {
  Dispatcher,
  MockAgent,
  getGlobalDispatcher,
  setGlobalDispatcher,
} from 'undici';
import { z } from 'zod';
import {
  VkApiError,
  VkPlatformClient,
  classifyVkError,
} from '../../src/platform/VkPlatformClient';

const target = { platform: 'vk' as const, externalId: '20', title: 'Group' };

const formOf = (body: string) => new URLSearchParams(body);

describe('classifyVkError', () => {
  it.each([
    [214, 'not_member'],
    [15, 'not_member'],
    [6, 'rate_limited'],
    [9, 'rate_limited'],
    [10, 'transient'],
    [100, 'other'],
  ] as const)('maps error code %i to %s', (code, reason) => {
    expect(classifyVkError(new VkApiError('wall.post', code, 'test'))).toBe(reason);
  });

  it('should treat network failures as transient', () => {
    expect(classifyVkError(new Error('ECONNRESET'))).toBe('transient');
  });

  it('should not retry answers that fail validation', () => {
    const parsed = z.object({ post_id: z.number() }).safeParse({ post_id: 'x' });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(classifyVkError(parsed.error)).toBe('other');
    }
  });
});

describe('VkPlatformClient', () => {
  let originalDispatcher: Dispatcher;
  let agent: MockAgent;
  let client: VkPlatformClient;
  let getFileLink: jest.Mock<Promise<string>, [string]>;

  beforeEach(() => {
    originalDispatcher = getGlobalDispatcher();
    agent = new MockAgent();
    agent.disableNetConnect();
    setGlobalDispatcher(agent);
    getFileLink = jest
      .fn<Promise<string>, [string]>()
      .mockResolvedValue('https://api.telegram.org/file/bottest-token/photos/file_1.jpg');
    client = new VkPlatformClient(
      { token: 'test-secret', groupId: '20', apiVersion: '5.199' },
      { getFileLink },
    );
  });

  afterEach(async () => {
    setGlobalDispatcher(originalDispatcher);
    await agent.close();
  });

  const vkApi = () => agent.get('https://api.vk.com');

  it('should not forward or copy', async () => {
    expect(client.supportsForward).toBe(false);
    expect(await client.forward({ chatId: 1, messageId: 2 }, target)).toMatchObject({
      success: false,
      reason: 'other',
    });
  });

  it('should post text to the community wall', async () => {
    vkApi()
      .intercept({
        path: '/method/wall.post',
        method: 'POST',
        body: (body) => {
          const form = formOf(body);
          return (
            form.get('owner_id') === '-20' &&
            form.get('from_group') === '1' &&
            form.get('message') === 'hello' &&
            form.get('access_token') === 'test-secret' &&
            form.get('v') === '5.199'
          );
        },
      })
      .reply(200, { response: { post_id: 3 } });

    expect(await client.postText('hello', target)).toEqual({
      success: true,
      messageRef: 'wall-20_3',
    });
  });

  it('should classify API errors', async () => {
    vkApi()
      .intercept({ path: '/method/wall.post', method: 'POST' })
      .reply(200, { error: { error_code: 214, error_msg: 'Access to adding post denied' } });

    expect(await client.publish({ chatId: 1, messageId: 2, text: 'hello' }, target)).toEqual({
      success: false,
      reason: 'not_member',
      error: 'VK error wall.post: Access to adding post denied',
    });
  });

  it('should treat server errors as transient', async () => {
    vkApi()
      .intercept({ path: '/method/wall.post', method: 'POST' })
      .reply(502, 'Bad Gateway');

    expect(await client.publish({ chatId: 1, messageId: 2, text: 'hello' }, target)).toEqual({
      success: false,
      reason: 'transient',
      error: 'VK error wall.post: HTTP 502',
    });
  });

  describe('photos', () => {
    const photoSource = { chatId: 1, messageId: 2, text: 'caption', photoFileId: 'photo-large' };

    const expectUploadFlow = (albumId: string) => {
      agent
        .get('https://api.telegram.org')
        .intercept({ path: '/file/bottest-token/photos/file_1.jpg', method: 'GET' })
        .reply(200, Buffer.from('jpeg-bytes'));
      vkApi()
        .intercept({
          path: '/method/photos.getUploadServer',
          method: 'POST',
          body: (body) => {
            const form = formOf(body);
            return form.get('group_id') === '20' && form.get('album_id') === albumId;
          },
        })
        .reply(200, { response: { upload_url: 'https://pu.vk.com/c1/upload.php' } });
      agent
        .get('https://pu.vk.com')
        .intercept({ path: '/c1/upload.php', method: 'POST' })
        .reply(200, { server: 7, photos_list: '[{"photo":"abc"}]', hash: 'h1' });
      vkApi()
        .intercept({
          path: '/method/photos.save',
          method: 'POST',
          body: (body) => {
            const form = formOf(body);
            return (
              form.get('album_id') === albumId &&
              form.get('server') === '7' &&
              form.get('photos_list') === '[{"photo":"abc"}]' &&
              form.get('hash') === 'h1'
            );
          },
        })
        .reply(200, { response: [{ id: 456, owner_id: -20 }] });
    };

    it('should upload into a new album and attach the photo to the post', async () => {
      vkApi()
        .intercept({
          path: '/method/photos.getAlbums',
          method: 'POST',
          body: (body) => formOf(body).get('owner_id') === '-20',
        })
        .reply(200, {
          response: {
            count: 2,
            items: [
              { id: 5, title: 'Events', size: 3 },
              { id: 8, title: 'bot_uploads', size: 10000 },
            ],
          },
        });
      vkApi()
        .intercept({
          path: '/method/photos.createAlbum',
          method: 'POST',
          body: (body) => {
            const form = formOf(body);
            return form.get('title') === 'bot_uploads_2' && form.get('group_id') === '20';
          },
        })
        .reply(200, { response: { id: 9, title: 'bot_uploads_2' } });
      expectUploadFlow('9');
      vkApi()
        .intercept({
          path: '/method/wall.post',
          method: 'POST',
          body: (body) => {
            const form = formOf(body);
            return (
              form.get('owner_id') === '-20' &&
              form.get('message') === 'caption' &&
              form.get('attachments') === 'photo-20_456'
            );
          },
        })
        .reply(200, { response: { post_id: 4 } });

      expect(await client.publish(photoSource, target)).toEqual({
        success: true,
        messageRef: 'wall-20_4',
      });
      expect(getFileLink).toHaveBeenCalledWith('photo-large');
    });

    it('should reuse the latest album with room left', async () => {
      vkApi()
        .intercept({ path: '/method/photos.getAlbums', method: 'POST' })
        .reply(200, {
          response: {
            count: 2,
            items: [
              { id: 8, title: 'bot_uploads', size: 10000 },
              { id: 9, title: 'bot_uploads_2', size: 12 },
            ],
          },
        });
      expectUploadFlow('9');
      vkApi()
        .intercept({
          path: '/method/wall.post',
          method: 'POST',
          body: (body) => {
            const form = formOf(body);
            return form.get('message') === null && form.get('attachments') === 'photo-20_456';
          },
        })
        .reply(200, { response: { post_id: 5 } });

      expect(
        await client.publish({ chatId: 1, messageId: 2, photoFileId: 'photo-large' }, target),
      ).toEqual({ success: true, messageRef: 'wall-20_5' });
    });

    it('should fail without posting when the photo cannot be downloaded', async () => {
      agent
        .get('https://api.telegram.org')
        .intercept({ path: '/file/bottest-token/photos/file_1.jpg', method: 'GET' })
        .reply(404, 'Not Found');

      expect(await client.publish(photoSource, target)).toEqual({
        success: false,
        reason: 'transient',
        error: 'Photo download failed with HTTP 404',
      });
    });
  });

  it('should report unreadable answers as other failures', async () => {
    vkApi()
      .intercept({ path: '/method/wall.post', method: 'POST' })
      .reply(200, { response: { post_id: 'oops' } });

    expect(
      await client.publish({ chatId: 1, messageId: 2, text: 'hello' }, target),
    ).toMatchObject({ success: false, reason: 'other' });
  });

  it('should list administered groups', async () => {
    vkApi()
      .intercept({ path: '/method/groups.get', method: 'POST' })
      .reply(200, {
        response: {
          count: 2,
          items: [
            { id: 20, name: 'Group' },
            { id: 21, name: 'Second group' },
          ],
        },
      });

    expect(await client.discover()).toEqual([
      { platform: 'vk', externalId: '20', title: 'Group', canPost: true },
      { platform: 'vk', externalId: '21', title: 'Second group', canPost: true },
    ]);
  });

  it('should fall back to the configured group for group tokens', async () => {
    vkApi()
      .intercept({ path: '/method/groups.get', method: 'POST' })
      .reply(200, {
        error: { error_code: 27, error_msg: 'Group authorization failed' },
      });
    vkApi()
      .intercept({
        path: '/method/groups.getById',
        method: 'POST',
        body: (body) => formOf(body).get('group_id') === '20',
      })
      .reply(200, { response: { groups: [{ id: 20, name: 'Group' }] } });

    expect(await client.discover()).toEqual([
      { platform: 'vk', externalId: '20', title: 'Group', canPost: true },
    ]);
  });

  it('should surface other discovery errors', async () => {
    vkApi()
      .intercept({ path: '/method/groups.get', method: 'POST' })
      .reply(200, { error: { error_code: 5, error_msg: 'User authorization failed' } });

    await expect(client.discover()).rejects.toThrow(
      'VK error groups.get: User authorization failed',
    );
  });
});
