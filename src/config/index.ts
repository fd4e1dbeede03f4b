// Main config exports
export {
  initConfig,
  resetConfig,
  getEnv,
  isFeatureEnabled,
  isDevelopment,
} from './env.ts';

export { Features } from './features.ts';

export type { Env, FeatureFlags, AppConfig, SupportedLanguage } from './types.ts';
export { SUPPORTED_LANGUAGES } from './types.ts';
