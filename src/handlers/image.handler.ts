import type { Context } from 'hono';
import type { LineImageMessageEvent } from '../types/line.types.ts';
import { replyWithIntent } from './reply.helper.ts';

export async function imageHandler(c: Context, event: LineImageMessageEvent, userId: string): Promise<void> {
  const line = c.get('line');
  const dialogue = c.get('dialogue');

  console.log(`[ImageHandler] Receipt image ${event.message.id} from ${userId}`);

  // The loading indicator only exists in one-to-one chats
  if (event.source.type === 'user') {
    try {
      await line.showLoadingAnimation(userId);
    } catch (error) {
      console.warn('[ImageHandler] Could not show loading animation:', error);
    }
  }

  const intent = await dialogue.handleImage(userId, () => line.getMessageContent(event.message.id));
  await replyWithIntent(c, event.replyToken, intent);
}
