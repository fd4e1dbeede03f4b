import type Decimal from 'decimal.js';

/** Exact decimal amount; never a JS number. */
export type MonetaryAmount = Decimal;

/**
 * Snapshot of a user's conversation. `selectedAmount` only exists once the
 * user has picked a total from the selection card.
 */
export type SessionState =
  | { stage: 'awaiting_amount' }
  | { stage: 'awaiting_people'; selectedAmount: MonetaryAmount };

/**
 * What the dialogue wants to say back. Rendering into platform messages
 * happens in the formatters.
 */
export type OutboundIntent =
  | { type: 'text'; message: string }
  | { type: 'amount_selection'; candidates: MonetaryAmount[]; limit: number }
  | { type: 'result'; total: MonetaryAmount; people: number; perPerson: MonetaryAmount };

export interface OcrProvider {
  /** Full recognized text, or null when the image holds no readable text. */
  recognizeText(image: Uint8Array): Promise<string | null>;
}

export interface UsageLimiter {
  isLimitExceeded(): boolean;
  increment(): number;
}

export type ImageLoader = () => Promise<Uint8Array>;
