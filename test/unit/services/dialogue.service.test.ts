/**
 * Tests for DialogueService
 * Receipt -> amount -> party size flow with mocked OCR and usage
 */
import { describe, test, expect, beforeEach, vi } from 'vitest';
import Decimal from 'decimal.js';
import { DialogueService } from '../../../src/services/dialogue.service';
import { InMemorySessionStore } from '../../../src/services/session.service';
import { ProviderError } from '../../../src/utils/errors';
import type { OutboundIntent } from '../../../src/types/dialogue.types';
import {
  createMockOcrProvider,
  createMockUsageLimiter,
  type MockOcrProvider,
  type MockUsageLimiter,
} from '../../mocks/ocr.mock';

const RECEIPT_TEXT = 'Total 1,234\nTax 56';
const loadImage = () => Promise.resolve(new Uint8Array([1, 2, 3]));

function messageOf(intent: OutboundIntent | null): string | undefined {
  return intent?.type === 'text' ? intent.message : undefined;
}

describe('DialogueService', () => {
  let sessions: InMemorySessionStore;
  let usage: MockUsageLimiter;
  let ocr: MockOcrProvider;
  let dialogue: DialogueService;

  const build = (ocrResult: string | null | Error, limitExceeded = false) => {
    ocr = createMockOcrProvider(ocrResult);
    usage = createMockUsageLimiter(limitExceeded);
    dialogue = new DialogueService({ sessions, usage, ocr });
  };

  beforeEach(() => {
    sessions = new InMemorySessionStore();
    build(RECEIPT_TEXT);
  });

  describe('handleImage', () => {
    test('offers the amounts found on the receipt', async () => {
      const intent = await dialogue.handleImage('U1', loadImage);

      expect(intent.type).toBe('amount_selection');
      if (intent.type !== 'amount_selection') return;
      expect(intent.candidates.map(c => c.toFixed())).toEqual(['1234', '56']);
      expect(intent.limit).toBe(5);
      expect(sessions.getState('U1')).toEqual({ stage: 'awaiting_amount' });
      expect(usage.increment).toHaveBeenCalledTimes(1);
      expect(ocr.recognizeText).toHaveBeenCalledWith(new Uint8Array([1, 2, 3]));
    });

    test('offers at most five candidates', async () => {
      build('10 20 30 40 50 60 70');

      const intent = await dialogue.handleImage('U1', loadImage);

      expect(intent.type === 'amount_selection' && intent.candidates.map(c => c.toFixed()))
        .toEqual(['70', '60', '50', '40', '30']);
    });

    test('honours a custom candidate limit', async () => {
      dialogue = new DialogueService({ sessions, usage, ocr }, { maxCandidates: 1 });

      const intent = await dialogue.handleImage('U1', loadImage);

      expect(intent.type === 'amount_selection' && intent.candidates.map(c => c.toFixed())).toEqual(['1234']);
    });

    test('stops at the usage cap without touching anything', async () => {
      build(RECEIPT_TEXT, true);
      const loader = vi.fn(loadImage);

      const intent = await dialogue.handleImage('U1', loader);

      expect(messageOf(intent)).toBe("Sorry, you've reached the free tier limit. It will reset next month.");
      expect(loader).not.toHaveBeenCalled();
      expect(usage.increment).not.toHaveBeenCalled();
      expect(ocr.recognizeText).not.toHaveBeenCalled();
      expect(sessions.getState('U1')).toBeNull();
    });

    test('reports a failed download without counting it', async () => {
      const intent = await dialogue.handleImage('U1', () => Promise.reject(new Error('LINE API error: 404')));

      expect(messageOf(intent)).toBe('Could not download the image. Please send it again.');
      expect(usage.increment).not.toHaveBeenCalled();
    });

    test('asks for another photo when no text was read', async () => {
      build(null);

      const intent = await dialogue.handleImage('U1', loadImage);

      expect(messageOf(intent)).toBe('Could not read the receipt text. Please take another photo.');
      expect(usage.increment).toHaveBeenCalledTimes(1);
      expect(sessions.getState('U1')).toBeNull();
    });

    test('asks for a clearer photo when no amount was found', async () => {
      build('THANK YOU');

      const intent = await dialogue.handleImage('U1', loadImage);

      expect(messageOf(intent)).toBe('No amounts detected. Please take a clearer photo of the receipt.');
      expect(sessions.getState('U1')).toBeNull();
    });

    test.each([
      [new ProviderError('rate_limited', 'quota'), 'Vision API quota exceeded. Please try again later.'],
      [new ProviderError('permission_denied', 'denied'), 'OCR service permission error. Please contact administrator.'],
      [new ProviderError('unknown', 'boom'), 'Error processing image. Please try again.'],
      [new Error('429 Too Many Requests'), 'Vision API quota exceeded. Please try again later.'],
      [new Error('something broke'), 'Error processing image. Please try again.'],
    ])('maps OCR failure %s to a message', async (error, expected) => {
      build(error);

      const intent = await dialogue.handleImage('U1', loadImage);

      expect(messageOf(intent)).toBe(expected);
      expect(usage.increment).toHaveBeenCalledTimes(1);
    });

    test('keeps the previous session when OCR fails', async () => {
      sessions.setState('U1', { stage: 'awaiting_people', selectedAmount: new Decimal('100') });
      build(new ProviderError('unknown', 'boom'));

      await dialogue.handleImage('U1', loadImage);

      expect(sessions.getState('U1')?.stage).toBe('awaiting_people');
    });

    test('a new receipt replaces a session waiting for the party size', async () => {
      sessions.setState('U1', { stage: 'awaiting_people', selectedAmount: new Decimal('100') });

      await dialogue.handleImage('U1', loadImage);

      expect(sessions.getState('U1')).toEqual({ stage: 'awaiting_amount' });
    });
  });

  describe('handleAmountSelection', () => {
    test('stores the amount and asks for the party size', () => {
      const intent = dialogue.handleAmountSelection('U1', 'amount=1234');

      expect(messageOf(intent)).toBe('Total: 1,234\nHow many people to split? Enter a number.');
      const state = sessions.getState('U1');
      expect(state?.stage === 'awaiting_people' && state.selectedAmount.toFixed()).toBe('1234');
    });

    test('shows cents for a fractional amount', () => {
      const intent = dialogue.handleAmountSelection('U1', 'amount=1234.5');

      expect(messageOf(intent)).toBe('Total: 1,234.50\nHow many people to split? Enter a number.');
    });

    test.each(['amount=abc', 'amount=', 'amount=0.5'])('rejects "%s" without changing state', (data) => {
      sessions.setState('U1', { stage: 'awaiting_amount' });

      const intent = dialogue.handleAmountSelection('U1', data);

      expect(messageOf(intent)).toBe('Failed to process amount.');
      expect(sessions.getState('U1')).toEqual({ stage: 'awaiting_amount' });
    });

    test('ignores other postbacks', () => {
      expect(dialogue.handleAmountSelection('U1', 'action=help')).toBeNull();
      expect(sessions.getState('U1')).toBeNull();
    });
  });

  describe('handleText', () => {
    test('asks for a receipt when there is no session', () => {
      expect(messageOf(dialogue.handleText('U1', '3'))).toBe('Please send a receipt image.');
    });

    test('asks for a receipt while an amount is still to be picked', () => {
      sessions.setState('U1', { stage: 'awaiting_amount' });

      expect(messageOf(dialogue.handleText('U1', '3'))).toBe('Please send a receipt image.');
      expect(sessions.getState('U1')).toEqual({ stage: 'awaiting_amount' });
    });

    test.each(['abc', '0', '-2', '2.5'])('rejects "%s" and keeps the session', (text) => {
      sessions.setState('U1', { stage: 'awaiting_people', selectedAmount: new Decimal('100') });

      expect(messageOf(dialogue.handleText('U1', text))).toBe('Please enter a valid number (e.g. 3)');
      expect(sessions.getState('U1')?.stage).toBe('awaiting_people');
    });

    test('splits the bill and ends the session', () => {
      sessions.setState('U1', { stage: 'awaiting_people', selectedAmount: new Decimal('100') });

      const intent = dialogue.handleText('U1', '3');

      expect(intent.type).toBe('result');
      if (intent.type !== 'result') return;
      expect(intent.total.toFixed()).toBe('100');
      expect(intent.people).toBe(3);
      expect(intent.perPerson.toFixed(2)).toBe('33.33');
      expect(sessions.getState('U1')).toBeNull();
    });

    test('accepts full-width digits', () => {
      sessions.setState('U1', { stage: 'awaiting_people', selectedAmount: new Decimal('10') });

      const intent = dialogue.handleText('U1', ' ４ ');

      expect(intent.type === 'result' && intent.perPerson.toFixed(2)).toBe('2.50');
    });
  });

  test('walks a receipt through to the per-person amount', async () => {
    const selection = await dialogue.handleImage('U1', loadImage);
    if (selection.type !== 'amount_selection') {
      throw new Error(`expected amount_selection, got ${selection.type}`);
    }
    const [first] = selection.candidates;
    expect(first?.toFixed()).toBe('1234');

    dialogue.handleAmountSelection('U1', `amount=${first?.toFixed()}`);
    const result = dialogue.handleText('U1', '3');

    expect(result.type === 'result' && result.perPerson.toFixed(2)).toBe('411.33');
    expect(sessions.getState('U1')).toBeNull();
  });
});
