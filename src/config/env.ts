import type { ZodError } from 'zod';
import { envSchema, featureFlagsSchema, type Env, type FeatureFlags, type AppConfig } from './types.ts';

let cachedConfig: AppConfig | null = null;

function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Initialize configuration at startup.
 * MUST be called before any other config access.
 * Exits the process on validation failure (fail-fast).
 */
export function initConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  // Validate environment variables
  const envResult = envSchema.safeParse(source);
  if (!envResult.success) {
    console.error('=== CONFIGURATION ERROR ===');
    console.error('Required environment variables are missing or invalid:');
    for (const line of formatIssues(envResult.error)) {
      console.error(line);
    }
    console.error('===========================');
    process.exit(1);
  }

  // Validate feature flags
  const featuresResult = featureFlagsSchema.safeParse(source);
  if (!featuresResult.success) {
    console.error('=== FEATURE FLAGS ERROR ===');
    for (const line of formatIssues(featuresResult.error)) {
      console.error(line);
    }
    console.error('===========================');
    process.exit(1);
  }

  cachedConfig = {
    env: envResult.data,
    features: featuresResult.data,
  };

  // Log loaded configuration (without secrets)
  console.log('[Config] Loaded successfully');
  console.log(`[Config] Environment: ${cachedConfig.env.NODE_ENV}`);
  console.log(`[Config] Free mode: ${cachedConfig.env.FREE_MODE} (cap ${cachedConfig.env.MONTHLY_OCR_CAP}/month, ${cachedConfig.env.PROJECT_TIMEZONE})`);
  console.log(`[Config] Features enabled: ${Object.entries(cachedConfig.features)
    .filter(([_, v]) => v === true)
    .map(([k]) => k.replace('FEATURE_', ''))
    .join(', ') || 'none'}`);

  return cachedConfig;
}

/**
 * Drop the cached configuration so the next initConfig() re-reads the environment.
 */
export function resetConfig(): void {
  cachedConfig = null;
}

function requireConfig(): AppConfig {
  if (!cachedConfig) {
    throw new Error('Config not initialized. Call initConfig() at app startup.');
  }
  return cachedConfig;
}

/**
 * Get environment configuration.
 * Throws if initConfig() was not called.
 */
export function getEnv(): Env {
  return requireConfig().env;
}

export function isFeatureEnabled(feature: keyof FeatureFlags): boolean {
  return requireConfig().features[feature] === true;
}

export function isDevelopment(): boolean {
  return getEnv().NODE_ENV === 'development';
}
