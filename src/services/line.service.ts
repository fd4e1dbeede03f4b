import { getEnv } from '../config/env.ts';
import {
  webhookTestResultSchema,
  type LineMessage,
  type ReplyMessageRequest,
  type WebhookTestResult,
} from '../types/line.types.ts';

interface LineConfig {
  channelAccessToken: string;
  apiBaseUrl: string;
  dataBaseUrl: string;
  timeoutMs: number;
}

// LINE message ids are numeric strings
const MESSAGE_ID_PATTERN = /^\d{1,32}$/;

/** What the webhook handlers need from the Messaging API. */
export interface LineMessagingClient {
  replyMessage(replyToken: string, messages: LineMessage[]): Promise<void>;
  getMessageContent(messageId: string): Promise<Uint8Array>;
  showLoadingAnimation(chatId: string, loadingSeconds?: number): Promise<void>;
}

/**
 * LINE Messaging API client.
 */
export class LineService implements LineMessagingClient {
  private config: LineConfig;

  constructor(config: Partial<LineConfig> = {}) {
    this.config = {
      channelAccessToken: config.channelAccessToken ?? getEnv().LINE_CHANNEL_ACCESS_TOKEN,
      apiBaseUrl: 'https://api.line.me',
      dataBaseUrl: 'https://api-data.line.me',
      timeoutMs: 10000,
      ...config,
    };
  }

  async replyMessage(replyToken: string, messages: LineMessage[]): Promise<void> {
    const body: ReplyMessageRequest = { replyToken, messages };
    await this.callApi('POST', '/v2/bot/message/reply', body);
  }

  /**
   * Show the typing indicator in a one-to-one chat while OCR runs.
   */
  async showLoadingAnimation(chatId: string, loadingSeconds: number = 20): Promise<void> {
    await this.callApi('POST', '/v2/bot/chat/loading/start', { chatId, loadingSeconds });
  }

  async getMessageContent(messageId: string): Promise<Uint8Array> {
    if (!MESSAGE_ID_PATTERN.test(messageId)) {
      throw new Error('Invalid message id');
    }

    const response = await fetch(`${this.config.dataBaseUrl}/v2/bot/message/${messageId}/content`, {
      headers: { Authorization: `Bearer ${this.config.channelAccessToken}` },
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`LINE API error: ${response.status} - failed to download content ${messageId}`);
    }

    return new Uint8Array(await response.arrayBuffer());
  }

  async setWebhookEndpoint(endpoint: string): Promise<void> {
    await this.callApi('PUT', '/v2/bot/channel/webhook/endpoint', { endpoint });
  }

  async testWebhookEndpoint(): Promise<WebhookTestResult> {
    const data = await this.callApi('POST', '/v2/bot/channel/webhook/test', {});
    return webhookTestResultSchema.parse(data);
  }

  private async callApi(method: 'POST' | 'PUT', path: string, body: object): Promise<unknown> {
    const response = await fetch(`${this.config.apiBaseUrl}${path}`, {
      method,
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.channelAccessToken}`,
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });

    const text = await response.text();

    if (!response.ok) {
      throw new Error(`LINE API error: ${response.status} - ${text.slice(0, 200)}`);
    }

    return text ? JSON.parse(text) : {};
  }
}
