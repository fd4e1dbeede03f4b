import type { Context } from 'hono';
import type { LinePostbackEvent } from '../types/line.types.ts';
import { replyWithIntent } from './reply.helper.ts';

export async function postbackHandler(c: Context, event: LinePostbackEvent, userId: string): Promise<void> {
  const intent = c.get('dialogue').handleAmountSelection(userId, event.postback.data);
  if (!intent) {
    return;
  }

  await replyWithIntent(c, event.replyToken, intent);
}
