import type Decimal from 'decimal.js';
import type { Translations, SupportedLanguage, UITranslations } from './types.ts';
import { getEnv } from '../config/env.ts';

// Import translations
import en from './locales/en.json';
import ja from './locales/ja.json';

// ============================================================
// Translation Registry
// ============================================================

const translations: Record<SupportedLanguage, Translations> = {
  en,
  ja,
};

// ============================================================
// i18n Service
// ============================================================

let currentLanguage: SupportedLanguage = 'en';

/**
 * Initialize i18n with the configured language (or an explicit one).
 * Must be called after initConfig() unless a language is passed.
 */
export function initI18n(language?: SupportedLanguage): void {
  currentLanguage = language ?? getEnv().LANGUAGE;
  console.log(`[i18n] Initialized with language: ${currentLanguage}`);
}

export function getLanguage(): SupportedLanguage {
  return currentLanguage;
}

/**
 * Get translation by dot-notation path.
 * Example: t('ui.errors.amountFailed')
 */
export function t(path: string, params?: Record<string, string | number>): string {
  let value = getNestedValue(translations[currentLanguage], path);

  // Fallback to English if translation not found
  if (value === undefined) {
    value = getNestedValue(translations.en, path);
  }

  if (typeof value !== 'string') {
    console.warn(`[i18n] Missing translation: ${path}`);
    return path;
  }

  return params ? interpolate(value, params) : value;
}

/**
 * Get the card strings for the current language.
 */
export function getCardTexts(): UITranslations['card'] {
  return translations[currentLanguage].ui.card;
}

/**
 * Format an amount with "," thousands grouping, without going through floats.
 * Whole amounts print without decimals unless fractionDigits is given.
 * Example: formatAmount(new Decimal('1234567.5')) -> '1,234,567.50'
 */
export function formatAmount(amount: Decimal, fractionDigits?: number): string {
  const digits = fractionDigits ?? (amount.isInteger() ? 0 : 2);
  const fixed = amount.abs().toFixed(digits);
  const [integerPart = '0', fractionPart] = fixed.split('.');
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  const sign = amount.isNegative() && !amount.isZero() ? '-' : '';
  return fractionPart ? `${sign}${grouped}.${fractionPart}` : `${sign}${grouped}`;
}

// ============================================================
// Helpers
// ============================================================

function getNestedValue(obj: unknown, path: string): unknown {
  const keys = path.split('.');
  let current: unknown = obj;

  for (const key of keys) {
    if (current === null || current === undefined) return undefined;
    if (typeof current !== 'object') return undefined;
    current = Reflect.get(current, key);
  }

  return current;
}

function interpolate(template: string, params: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder: string, key: string) => {
    const param = params[key];
    return param !== undefined ? String(param) : placeholder;
  });
}
