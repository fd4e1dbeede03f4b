import { z } from 'zod';

// ============================================================
// Environment Schema
// ============================================================
// Supported reply languages
export const SUPPORTED_LANGUAGES = ['en', 'ja'] as const;
export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number];

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

export const envSchema = z.object({
  PORT: positiveInt('8080'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  APP_NAME: z.string().min(1).default('splitbills'),

  // Language
  LANGUAGE: z.enum(SUPPORTED_LANGUAGES).default('en'),

  // LINE Messaging API
  LINE_CHANNEL_ACCESS_TOKEN: z.string().min(1),
  LINE_CHANNEL_SECRET: z.string().min(1),

  // Google Cloud Vision
  GOOGLE_VISION_API_KEY: z.string().min(1),

  // Free tier
  PROJECT_TIMEZONE: z.string().default('Asia/Tokyo'),
  MONTHLY_OCR_CAP: positiveInt('1000'),
  FREE_MODE: z.string().default('true').transform(s => s.toLowerCase() === 'true'),

  // Conversation
  SESSION_TTL_MINUTES: positiveInt('30'),
  MAX_CANDIDATES: positiveInt('5'),

  // Security (debug endpoints)
  API_KEYS: z.string().default('').transform(s => s.split(',').filter(Boolean)),
});

export type Env = z.infer<typeof envSchema>;

// ============================================================
// Feature Flags Schema
// ============================================================
export const featureFlagsSchema = z.object({
  // Reply with a Flex card instead of plain text for the split result
  FEATURE_RESULT_CARD: z.string().default('false').transform(s => s === 'true'),

  // Debug/test endpoints (/test/*)
  FEATURE_DEBUG_ENDPOINTS: z.string().default('false').transform(s => s === 'true'),
});

export type FeatureFlags = z.infer<typeof featureFlagsSchema>;

// ============================================================
// Combined App Config
// ============================================================
export interface AppConfig {
  env: Env;
  features: FeatureFlags;
}
