/**
 * Tests for LineService
 * Messaging API calls with mocked fetch
 */
import { describe, test, expect, beforeEach } from 'vitest';
import { LineService } from '../../../src/services/line.service';
import { createJsonResponse, getFetchCall, mockFetchWith } from '../../mocks/fetch.mock';

describe('LineService', () => {
  let line: LineService;

  beforeEach(() => {
    line = new LineService({ channelAccessToken: 'test-access-token' });
  });

  describe('replyMessage', () => {
    test('posts the messages with the bearer token', async () => {
      const fetchMock = mockFetchWith(createJsonResponse({}));

      await line.replyMessage('reply-1', [{ type: 'text', text: 'hello' }]);

      const { url, init, json } = getFetchCall(fetchMock);
      expect(url).toBe('https://api.line.me/v2/bot/message/reply');
      expect(init?.method).toBe('POST');
      expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-access-token');
      expect(json).toEqual({ replyToken: 'reply-1', messages: [{ type: 'text', text: 'hello' }] });
    });

    test('sends flex messages unchanged', async () => {
      const fetchMock = mockFetchWith(createJsonResponse({}));

      await line.replyMessage('reply-2', [{ type: 'flex', altText: 'Select amount', contents: { type: 'bubble' } }]);

      expect(getFetchCall(fetchMock).json).toEqual({
        replyToken: 'reply-2',
        messages: [{ type: 'flex', altText: 'Select amount', contents: { type: 'bubble' } }],
      });
    });

    test('throws with status and body on failure', async () => {
      mockFetchWith(createJsonResponse({ message: 'Invalid reply token' }, 400));

      await expect(line.replyMessage('expired', [{ type: 'text', text: 'hello' }])).rejects.toThrow(
        'LINE API error: 400 - {"message":"Invalid reply token"}'
      );
    });
  });

  test('showLoadingAnimation starts the indicator', async () => {
    const fetchMock = mockFetchWith(new Response(null, { status: 202 }));

    await line.showLoadingAnimation('U1');

    const { url, json } = getFetchCall(fetchMock);
    expect(url).toBe('https://api.line.me/v2/bot/chat/loading/start');
    expect(json).toEqual({ chatId: 'U1', loadingSeconds: 20 });
  });

  describe('getMessageContent', () => {
    test('downloads the image bytes from the data host', async () => {
      const fetchMock = mockFetchWith(new Response(new Uint8Array([7, 8, 9])));

      const content = await line.getMessageContent('100001');

      expect(content).toEqual(new Uint8Array([7, 8, 9]));
      expect(getFetchCall(fetchMock).url).toBe('https://api-data.line.me/v2/bot/message/100001/content');
    });

    test('rejects a malformed message id without calling the API', async () => {
      const fetchMock = mockFetchWith(createJsonResponse({}));

      await expect(line.getMessageContent('../etc')).rejects.toThrow('Invalid message id');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    test('throws when the content is gone', async () => {
      mockFetchWith(new Response('Not found', { status: 404 }));

      await expect(line.getMessageContent('100001')).rejects.toThrow('LINE API error: 404');
    });
  });

  describe('webhook setup', () => {
    test('setWebhookEndpoint uses PUT', async () => {
      const fetchMock = mockFetchWith(createJsonResponse({}));

      await line.setWebhookEndpoint('https://example.com/callback');

      const { url, init, json } = getFetchCall(fetchMock);
      expect(url).toBe('https://api.line.me/v2/bot/channel/webhook/endpoint');
      expect(init?.method).toBe('PUT');
      expect(json).toEqual({ endpoint: 'https://example.com/callback' });
    });

    test('testWebhookEndpoint returns the parsed result', async () => {
      mockFetchWith(createJsonResponse({ success: true, statusCode: 200, reason: 'OK', detail: '200' }));

      expect(await line.testWebhookEndpoint()).toEqual({
        success: true,
        statusCode: 200,
        reason: 'OK',
        detail: '200',
      });
    });
  });
});
