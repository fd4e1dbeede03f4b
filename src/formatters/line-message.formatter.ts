import type { MonetaryAmount, OutboundIntent } from '../types/dialogue.types.ts';
import type { FlexBox, FlexBubble, FlexButton, FlexText, LineMessage } from '../types/line.types.ts';
import { encodeAmountPostback } from '../parsers/text.parser.ts';
import { formatAmount, getCardTexts, t } from '../i18n/index.ts';

export interface RenderOptions {
  appName: string;
  resultCard: boolean;
}

const COLORS = {
  heading: '#4A5568',
  title: '#2D3748',
  muted: '#718096',
  faint: '#A0AEC0',
  divider: '#E2E8F0',
  panel: '#F7FAFC',
  white: '#FFFFFF',
  success: '#22543D',
  successPanel: '#F0FFF4',
} as const;

// ==================== SHARED PARTS ====================

function brandHeader(appName: string, backgroundColor: string): FlexBox {
  return {
    type: 'box',
    layout: 'vertical',
    contents: [
      { type: 'text', text: appName, weight: 'bold', size: 'lg', color: COLORS.heading, align: 'center' },
    ],
    backgroundColor,
    paddingAll: '16px',
    cornerRadius: '12px',
    margin: 'none',
  };
}

function poweredByFooter(appName: string): FlexBox {
  return {
    type: 'box',
    layout: 'vertical',
    contents: [
      {
        type: 'text',
        text: t('ui.card.poweredBy', { app: appName }),
        size: 'xs',
        color: COLORS.faint,
        align: 'center',
      },
    ],
    backgroundColor: COLORS.panel,
    paddingAll: '12px',
    cornerRadius: '12px',
    margin: 'none',
  };
}

function labelRow(label: string, value: string, margin: string): FlexBox {
  const labelText: FlexText = { type: 'text', text: label, size: 'sm', color: COLORS.muted, flex: 0 };
  const valueText: FlexText = {
    type: 'text',
    text: value,
    size: 'sm',
    color: COLORS.title,
    align: 'end',
    weight: 'bold',
  };
  return { type: 'box', layout: 'horizontal', contents: [labelText, valueText], margin };
}

// ==================== AMOUNT SELECTION ====================

function amountButton(amount: MonetaryAmount): FlexButton {
  const label = formatAmount(amount);
  return {
    type: 'button',
    action: {
      type: 'postback',
      label,
      data: encodeAmountPostback(amount),
      displayText: t('ui.card.selectedDisplay', { amount: label }),
    },
    style: 'primary',
    height: 'md',
    margin: 'sm',
  };
}

/**
 * One button per candidate, in the order given.
 */
export function buildAmountSelectionBubble(candidates: MonetaryAmount[], appName: string): FlexBubble {
  const card = getCardTexts();

  return {
    type: 'bubble',
    size: 'kilo',
    header: brandHeader(appName, COLORS.panel),
    body: {
      type: 'box',
      layout: 'vertical',
      contents: [
        { type: 'text', text: card.selectTitle, weight: 'bold', size: 'md', color: COLORS.title, margin: 'md', align: 'center' },
        { type: 'text', text: card.selectHint, size: 'sm', color: COLORS.muted, margin: 'sm', wrap: true, align: 'center' },
        { type: 'separator', margin: 'lg', color: COLORS.divider },
        {
          type: 'box',
          layout: 'vertical',
          contents: candidates.map(amountButton),
          margin: 'lg',
          spacing: 'sm',
          paddingAll: '8px',
        },
      ],
      paddingAll: '20px',
      backgroundColor: COLORS.white,
      cornerRadius: '12px',
    },
    footer: poweredByFooter(appName),
    styles: {
      header: { separator: false },
      footer: { separator: false },
    },
  };
}

// ==================== RESULT ====================

export function buildResultBubble(
  total: MonetaryAmount,
  people: number,
  perPerson: MonetaryAmount,
  appName: string
): FlexBubble {
  const card = getCardTexts();

  return {
    type: 'bubble',
    size: 'kilo',
    header: brandHeader(appName, COLORS.successPanel),
    body: {
      type: 'box',
      layout: 'vertical',
      contents: [
        { type: 'text', text: card.resultTitle, weight: 'bold', size: 'lg', color: COLORS.success, align: 'center', margin: 'md' },
        { type: 'separator', margin: 'lg', color: COLORS.divider },
        labelRow(card.totalLabel, formatAmount(total), 'lg'),
        labelRow(card.peopleLabel, t('ui.card.peopleValue', { people }), 'md'),
        { type: 'separator', margin: 'lg', color: COLORS.divider },
        {
          type: 'box',
          layout: 'vertical',
          contents: [
            { type: 'text', text: card.perPersonLabel, size: 'md', color: COLORS.muted, align: 'center', margin: 'md' },
            {
              type: 'text',
              text: formatAmount(perPerson, 2),
              size: 'xxl',
              color: COLORS.success,
              align: 'center',
              weight: 'bold',
              margin: 'sm',
            },
          ],
          backgroundColor: COLORS.successPanel,
          cornerRadius: '8px',
          paddingAll: '16px',
          margin: 'lg',
        },
      ],
      paddingAll: '20px',
      backgroundColor: COLORS.white,
      cornerRadius: '12px',
    },
    footer: poweredByFooter(appName),
    styles: {
      header: { separator: false },
      footer: { separator: false },
    },
  };
}

export function formatResultText(total: MonetaryAmount, people: number, perPerson: MonetaryAmount): string {
  return t('ui.result.text', {
    total: formatAmount(total),
    people,
    perPerson: formatAmount(perPerson, 2),
  });
}

// ==================== DISPATCH ====================

/**
 * Turn a dialogue intent into the messages for a single reply.
 */
export function renderIntent(intent: OutboundIntent, options: RenderOptions): LineMessage[] {
  switch (intent.type) {
    case 'text':
      return [{ type: 'text', text: intent.message }];

    case 'amount_selection':
      return [{
        type: 'flex',
        altText: getCardTexts().selectAltText,
        contents: buildAmountSelectionBubble(intent.candidates.slice(0, intent.limit), options.appName),
      }];

    case 'result':
      if (options.resultCard) {
        return [{
          type: 'flex',
          altText: getCardTexts().resultAltText,
          contents: buildResultBubble(intent.total, intent.people, intent.perPerson, options.appName),
        }];
      }
      return [{ type: 'text', text: formatResultText(intent.total, intent.people, intent.perPerson) }];
  }
}
