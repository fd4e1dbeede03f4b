import { isFeatureEnabled } from './env.ts';

/**
 * Feature flag helper with descriptive methods.
 */
export const Features = {
  /** Split result rendered as a Flex card instead of plain text */
  resultCard: (): boolean => isFeatureEnabled('FEATURE_RESULT_CARD'),

  /** Debug/test endpoints (/test/*) */
  debugEndpoints: (): boolean => isFeatureEnabled('FEATURE_DEBUG_ENDPOINTS'),
} as const;
