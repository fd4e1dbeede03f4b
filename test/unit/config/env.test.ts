/**
 * Tests for the zod configuration schemas and initConfig
 */
import { describe, test, expect, afterEach } from 'vitest';
import { envSchema, featureFlagsSchema } from '../../../src/config/types';
import { getEnv, initConfig, isFeatureEnabled, resetConfig } from '../../../src/config';
import { reloadConfig } from '../../helpers/setup';

const REQUIRED = {
  LINE_CHANNEL_ACCESS_TOKEN: 'test-access-token',
  LINE_CHANNEL_SECRET: 'test-secret',
  GOOGLE_VISION_API_KEY: 'test-vision-key',
};

describe('envSchema', () => {
  test('applies defaults', () => {
    const result = envSchema.safeParse(REQUIRED);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data).toMatchObject({
      PORT: 8080,
      NODE_ENV: 'development',
      APP_NAME: 'splitbills',
      LANGUAGE: 'en',
      PROJECT_TIMEZONE: 'Asia/Tokyo',
      MONTHLY_OCR_CAP: 1000,
      FREE_MODE: true,
      SESSION_TTL_MINUTES: 30,
      MAX_CANDIDATES: 5,
      API_KEYS: [],
    });
  });

  test('requires the LINE and Vision credentials', () => {
    expect(envSchema.safeParse({ ...REQUIRED, LINE_CHANNEL_SECRET: undefined }).success).toBe(false);
    expect(envSchema.safeParse({ ...REQUIRED, GOOGLE_VISION_API_KEY: '' }).success).toBe(false);
  });

  test.each(['0', '-5', 'abc', '1.5'])('rejects MONTHLY_OCR_CAP=%s', (value) => {
    expect(envSchema.safeParse({ ...REQUIRED, MONTHLY_OCR_CAP: value }).success).toBe(false);
  });

  test('rejects an unsupported language', () => {
    expect(envSchema.safeParse({ ...REQUIRED, LANGUAGE: 'pl' }).success).toBe(false);
  });

  test('reads FREE_MODE case-insensitively', () => {
    const result = envSchema.safeParse({ ...REQUIRED, FREE_MODE: 'FALSE' });
    expect(result.success && result.data.FREE_MODE).toBe(false);
  });

  test('splits API_KEYS on commas', () => {
    const result = envSchema.safeParse({ ...REQUIRED, API_KEYS: 'key-a,,key-b' });
    expect(result.success && result.data.API_KEYS).toEqual(['key-a', 'key-b']);
  });
});

describe('featureFlagsSchema', () => {
  test('everything is off by default', () => {
    expect(featureFlagsSchema.parse({})).toEqual({
      FEATURE_RESULT_CARD: false,
      FEATURE_DEBUG_ENDPOINTS: false,
    });
  });

  test('only "true" enables a flag', () => {
    expect(featureFlagsSchema.parse({ FEATURE_RESULT_CARD: 'true', FEATURE_DEBUG_ENDPOINTS: 'yes' })).toEqual({
      FEATURE_RESULT_CARD: true,
      FEATURE_DEBUG_ENDPOINTS: false,
    });
  });
});

describe('initConfig', () => {
  afterEach(() => {
    reloadConfig();
  });

  test('reads the given source once and caches it', () => {
    resetConfig();
    initConfig({ ...REQUIRED, PORT: '3000', FEATURE_RESULT_CARD: 'true' });

    expect(getEnv().PORT).toBe(3000);
    expect(isFeatureEnabled('FEATURE_RESULT_CARD')).toBe(true);

    initConfig({ ...REQUIRED, PORT: '4000' });
    expect(getEnv().PORT).toBe(3000);
  });

  test('getEnv throws before initialization', () => {
    resetConfig();

    expect(() => getEnv()).toThrow('Config not initialized');
  });
});
