import type { Context } from 'hono';
import type { OutboundIntent } from '../types/dialogue.types.ts';
import { renderIntent } from '../formatters/line-message.formatter.ts';
import { Features } from '../config/index.ts';

export async function replyWithIntent(c: Context, replyToken: string, intent: OutboundIntent): Promise<void> {
  const messages = renderIntent(intent, {
    appName: c.get('env').APP_NAME,
    resultCard: Features.resultCard(),
  });
  await c.get('line').replyMessage(replyToken, messages);
}
