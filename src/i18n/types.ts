import type { SupportedLanguage } from '../config/types.ts';

export type { SupportedLanguage };

// ============================================================
// Translation Keys Structure
// ============================================================

export interface PromptTranslations {
  sendReceipt: string;
  askPeople: string;
}

export interface ErrorTranslations {
  limitReached: string;
  imageDownloadFailed: string;
  ocrNoText: string;
  noAmounts: string;
  quotaExceeded: string;
  permissionDenied: string;
  imageProcessing: string;
  amountFailed: string;
  invalidPeople: string;
  generic: string;
}

export interface ResultTranslations {
  text: string;
}

export interface CardTranslations {
  selectAltText: string;
  selectTitle: string;
  selectHint: string;
  selectedDisplay: string;
  poweredBy: string;
  resultAltText: string;
  resultTitle: string;
  totalLabel: string;
  peopleLabel: string;
  peopleValue: string;
  perPersonLabel: string;
}

export interface UITranslations {
  prompts: PromptTranslations;
  errors: ErrorTranslations;
  result: ResultTranslations;
  card: CardTranslations;
}

export interface Translations {
  ui: UITranslations;
}
