import type { Context } from 'hono';
import {
  imageMessageEventSchema,
  postbackEventSchema,
  textMessageEventSchema,
  webhookBodySchema,
} from '../types/line.types.ts';
import { imageHandler } from './image.handler.ts';
import { postbackHandler } from './postback.handler.ts';
import { textHandler } from './text.handler.ts';

/**
 * LINE webhook. Runs after signature verification.
 *
 * Events are processed one by one in delivery order. A failing event is
 * logged and skipped so the rest of the batch still runs, and LINE always
 * gets 200 for a well-formed body.
 */
export async function webhookHandler(c: Context): Promise<Response> {
  let payload: unknown;
  try {
    payload = await c.req.json();
  } catch (error) {
    console.warn('[Webhook] Body is not JSON:', error);
    return c.json({ error: 'Invalid body' }, 400);
  }

  const body = webhookBodySchema.safeParse(payload);
  if (!body.success) {
    console.warn('[Webhook] Unexpected body shape:', body.error.message);
    return c.json({ error: 'Invalid body' }, 400);
  }

  for (const event of body.data.events) {
    try {
      await routeEvent(c, event);
    } catch (error) {
      console.error('[Webhook] Error handling event:', error);
    }
  }

  return c.json({ status: 'ok' });
}

async function routeEvent(c: Context, raw: unknown): Promise<void> {
  const postback = postbackEventSchema.safeParse(raw);
  if (postback.success) {
    const userId = acceptEvent(c, postback.data);
    if (userId) await postbackHandler(c, postback.data, userId);
    return;
  }

  const image = imageMessageEventSchema.safeParse(raw);
  if (image.success) {
    const userId = acceptEvent(c, image.data);
    if (userId) await imageHandler(c, image.data, userId);
    return;
  }

  const text = textMessageEventSchema.safeParse(raw);
  if (text.success) {
    const userId = acceptEvent(c, text.data);
    if (userId) await textHandler(c, text.data, userId);
    return;
  }

  console.log(`[Webhook] Skipping unsupported event: ${describeEvent(raw)}`);
}

interface EventEnvelope {
  source: { userId?: string | undefined };
  webhookEventId?: string | undefined;
}

/**
 * Returns the user id when the event should be processed, null for events
 * without a user or redeliveries already handled.
 */
function acceptEvent(c: Context, event: EventEnvelope): string | null {
  const userId = event.source.userId;
  if (!userId) {
    console.log('[Webhook] Event without userId, skipping');
    return null;
  }

  if (event.webhookEventId && !c.get('idempotency').checkAndRecord(event.webhookEventId)) {
    console.log(`[Webhook] Duplicate event ${event.webhookEventId}, skipping`);
    return null;
  }

  return userId;
}

function describeEvent(raw: unknown): string {
  if (typeof raw !== 'object' || raw === null) {
    return typeof raw;
  }
  const type = Reflect.get(raw, 'type');
  const message = Reflect.get(raw, 'message');
  const messageType = typeof message === 'object' && message !== null ? Reflect.get(message, 'type') : undefined;
  return [type, messageType].filter(part => typeof part === 'string').join('/') || 'unknown';
}
