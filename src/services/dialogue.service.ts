import { extractAmountCandidates } from '../parsers/amount.parser.ts';
import { decodeAmountPostback, isAmountPostback, parsePeopleCount } from '../parsers/text.parser.ts';
import { splitPerPerson } from '../utils/split-calculator.ts';
import { classifyProviderError } from '../utils/error-classifier.ts';
import { StateMismatchError, ValidationError, type ProviderErrorKind } from '../utils/errors.ts';
import { formatAmount, t } from '../i18n/index.ts';
import type { SessionStore } from './session.service.ts';
import type {
  ImageLoader,
  OcrProvider,
  OutboundIntent,
  SessionState,
  UsageLimiter,
} from '../types/dialogue.types.ts';

export interface DialogueDependencies {
  sessions: SessionStore;
  usage: UsageLimiter;
  ocr: OcrProvider;
}

interface DialogueConfig {
  maxCandidates: number;
  scale: number;
}

type AwaitingPeople = Extract<SessionState, { stage: 'awaiting_people' }>;

const PROVIDER_MESSAGES: Record<ProviderErrorKind, string> = {
  rate_limited: 'ui.errors.quotaExceeded',
  permission_denied: 'ui.errors.permissionDenied',
  unknown: 'ui.errors.imageProcessing',
};

function textIntent(message: string): OutboundIntent {
  return { type: 'text', message };
}

/**
 * Receipt → amount → party size → result.
 *
 * No method throws: every failure turns into a corrective text for the user.
 * A new image always starts over, replacing whatever session the user had.
 */
export class DialogueService {
  private deps: DialogueDependencies;
  private config: DialogueConfig;

  constructor(deps: DialogueDependencies, config: Partial<DialogueConfig> = {}) {
    this.deps = deps;
    this.config = {
      maxCandidates: 5,
      scale: 2,
      ...config,
    };
  }

  async handleImage(userId: string, loadImage: ImageLoader): Promise<OutboundIntent> {
    // Over the cap: answer without touching the counter or the session
    if (this.deps.usage.isLimitExceeded()) {
      return textIntent(t('ui.errors.limitReached'));
    }

    let image: Uint8Array;
    try {
      image = await loadImage();
    } catch (error) {
      console.error(`[Dialogue] Image download failed for ${userId}:`, error);
      return textIntent(t('ui.errors.imageDownloadFailed'));
    }

    // Counted before the OCR result is known; failed calls still count
    this.deps.usage.increment();

    let ocrText: string | null;
    try {
      ocrText = await this.deps.ocr.recognizeText(image);
    } catch (error) {
      const providerError = classifyProviderError('OCR', error);
      console.error(`[Dialogue] OCR failed for ${userId} (${providerError.kind}):`, providerError.message);
      return textIntent(t(PROVIDER_MESSAGES[providerError.kind]));
    }

    if (!ocrText) {
      return textIntent(t('ui.errors.ocrNoText'));
    }

    const candidates = extractAmountCandidates(ocrText);
    if (candidates.length === 0) {
      return textIntent(t('ui.errors.noAmounts'));
    }

    this.deps.sessions.setState(userId, { stage: 'awaiting_amount' });
    console.log(`[Dialogue] ${userId}: offering ${Math.min(candidates.length, this.config.maxCandidates)} of ${candidates.length} candidates`);

    return {
      type: 'amount_selection',
      candidates: candidates.slice(0, this.config.maxCandidates),
      limit: this.config.maxCandidates,
    };
  }

  /**
   * Handle a selection button. Returns null for postbacks that are not
   * amount selections.
   */
  handleAmountSelection(userId: string, postbackData: string): OutboundIntent | null {
    if (!isAmountPostback(postbackData)) {
      console.log(`[Dialogue] ${userId}: ignoring postback "${postbackData.slice(0, 50)}"`);
      return null;
    }

    try {
      const amount = decodeAmountPostback(postbackData);
      this.deps.sessions.setState(userId, { stage: 'awaiting_people', selectedAmount: amount });
      console.log(`[Dialogue] ${userId}: selected ${amount.toFixed()}`);
      return textIntent(t('ui.prompts.askPeople', { total: formatAmount(amount) }));
    } catch (error) {
      if (!(error instanceof ValidationError)) {
        console.error(`[Dialogue] Amount selection failed for ${userId}:`, error);
      }
      return textIntent(t('ui.errors.amountFailed'));
    }
  }

  handleText(userId: string, text: string): OutboundIntent {
    try {
      const session = this.requireAwaitingPeople(userId);
      const people = parsePeopleCount(text);
      const perPerson = splitPerPerson(session.selectedAmount, people, this.config.scale);

      this.deps.sessions.clearState(userId);
      console.log(`[Dialogue] ${userId}: split ${session.selectedAmount.toFixed()} by ${people}`);

      return {
        type: 'result',
        total: session.selectedAmount,
        people,
        perPerson,
      };
    } catch (error) {
      if (error instanceof StateMismatchError) {
        return textIntent(t('ui.prompts.sendReceipt'));
      }
      if (error instanceof ValidationError) {
        return textIntent(t('ui.errors.invalidPeople'));
      }
      console.error(`[Dialogue] Text handling failed for ${userId}:`, error);
      return textIntent(t('ui.errors.generic'));
    }
  }

  private requireAwaitingPeople(userId: string): AwaitingPeople {
    const session = this.deps.sessions.getState(userId);
    if (!session) {
      throw new StateMismatchError(`No active session for ${userId}`);
    }
    if (session.stage !== 'awaiting_people') {
      throw new StateMismatchError(`Session for ${userId} is at ${session.stage}`);
    }
    return session;
  }
}
