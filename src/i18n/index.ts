// i18n exports
export {
  initI18n,
  getLanguage,
  t,
  getCardTexts,
  formatAmount,
} from './i18n.service.ts';

export type {
  Translations,
  UITranslations,
  PromptTranslations,
  ErrorTranslations,
  CardTranslations,
  SupportedLanguage,
} from './types.ts';
