import type { Context } from 'hono';
import type { LineTextMessageEvent } from '../types/line.types.ts';
import { replyWithIntent } from './reply.helper.ts';

export async function textHandler(c: Context, event: LineTextMessageEvent, userId: string): Promise<void> {
  const intent = c.get('dialogue').handleText(userId, event.message.text);
  await replyWithIntent(c, event.replyToken, intent);
}
