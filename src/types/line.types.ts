import { z } from 'zod';

// ============================================================
// Webhook (inbound)
// ============================================================

const eventSourceSchema = z.object({
  type: z.enum(['user', 'group', 'room']),
  userId: z.string().optional(),
  groupId: z.string().optional(),
  roomId: z.string().optional(),
});

const eventBase = {
  timestamp: z.number(),
  source: eventSourceSchema,
  webhookEventId: z.string().optional(),
  deliveryContext: z.object({ isRedelivery: z.boolean() }).optional(),
  mode: z.enum(['active', 'standby']).optional(),
  replyToken: z.string(),
};

export const imageMessageEventSchema = z.object({
  ...eventBase,
  type: z.literal('message'),
  message: z.object({
    id: z.string(),
    type: z.literal('image'),
  }),
});

export const textMessageEventSchema = z.object({
  ...eventBase,
  type: z.literal('message'),
  message: z.object({
    id: z.string(),
    type: z.literal('text'),
    text: z.string(),
  }),
});

export const postbackEventSchema = z.object({
  ...eventBase,
  type: z.literal('postback'),
  postback: z.object({
    data: z.string(),
  }),
});

export const webhookBodySchema = z.object({
  destination: z.string().optional(),
  events: z.array(z.unknown()),
});

export type LineImageMessageEvent = z.infer<typeof imageMessageEventSchema>;
export type LineTextMessageEvent = z.infer<typeof textMessageEventSchema>;
export type LinePostbackEvent = z.infer<typeof postbackEventSchema>;

// ============================================================
// Messages (outbound)
// ============================================================

export interface PostbackAction {
  type: 'postback';
  label: string;
  data: string;
  displayText?: string;
}

export interface FlexText {
  type: 'text';
  text: string;
  size?: 'xxs' | 'xs' | 'sm' | 'md' | 'lg' | 'xl' | 'xxl';
  weight?: 'regular' | 'bold';
  color?: string;
  align?: 'start' | 'end' | 'center';
  margin?: string;
  wrap?: boolean;
  flex?: number;
}

export interface FlexButton {
  type: 'button';
  action: PostbackAction;
  style?: 'primary' | 'secondary' | 'link';
  height?: 'sm' | 'md';
  margin?: string;
}

export interface FlexSeparator {
  type: 'separator';
  margin?: string;
  color?: string;
}

export interface FlexBox {
  type: 'box';
  layout: 'vertical' | 'horizontal' | 'baseline';
  contents: FlexComponent[];
  margin?: string;
  spacing?: string;
  paddingAll?: string;
  backgroundColor?: string;
  cornerRadius?: string;
}

export type FlexComponent = FlexBox | FlexText | FlexButton | FlexSeparator;

export interface FlexBubble {
  type: 'bubble';
  size?: 'nano' | 'micro' | 'kilo' | 'mega' | 'giga';
  header?: FlexBox;
  body?: FlexBox;
  footer?: FlexBox;
  styles?: {
    header?: { separator?: boolean };
    footer?: { separator?: boolean };
  };
}

export interface LineTextMessage {
  type: 'text';
  text: string;
}

export interface LineFlexMessage {
  type: 'flex';
  altText: string;
  contents: FlexBubble;
}

export type LineMessage = LineTextMessage | LineFlexMessage;

export interface ReplyMessageRequest {
  replyToken: string;
  messages: LineMessage[];
}

export const webhookTestResultSchema = z.object({
  success: z.boolean(),
  timestamp: z.string().optional(),
  statusCode: z.number().optional(),
  reason: z.string().optional(),
  detail: z.string().optional(),
});

export type WebhookTestResult = z.infer<typeof webhookTestResultSchema>;
