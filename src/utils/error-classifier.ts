/**
 * Maps OCR/transport failures onto ProviderError kinds, which decide the
 * apology the user sees.
 */
import { ProviderError, type ProviderErrorKind } from './errors.ts';

const HTTP_STATUS = {
  FORBIDDEN: 403,
  TOO_MANY_REQUESTS: 429,
} as const;

function kindFromText(text: string): ProviderErrorKind {
  const lower = text.toLowerCase();
  if (lower.includes('429') || lower.includes('quota') || lower.includes('resource_exhausted')) {
    return 'rate_limited';
  }
  if (lower.includes('403') || lower.includes('permission')) {
    return 'permission_denied';
  }
  return 'unknown';
}

/**
 * Classify a non-2xx provider response.
 */
export function classifyHttpFailure(provider: string, status: number, body: string): ProviderError {
  let kind: ProviderErrorKind;
  if (status === HTTP_STATUS.TOO_MANY_REQUESTS) {
    kind = 'rate_limited';
  } else if (status === HTTP_STATUS.FORBIDDEN) {
    kind = 'permission_denied';
  } else {
    kind = kindFromText(body);
  }

  return new ProviderError(kind, `${provider} API error: ${status} - ${body.slice(0, 200)}`, { status });
}

/**
 * Classify anything thrown while talking to a provider. ProviderErrors pass
 * through unchanged.
 */
export function classifyProviderError(provider: string, error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  // fetch() network failure
  if (error instanceof TypeError) {
    return new ProviderError('unknown', `${provider} network error: ${error.message}`, {
      transient: true,
      cause: error,
    });
  }

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return new ProviderError('unknown', `${provider} request timed out`, { transient: true, cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(kindFromText(message), `${provider} error: ${message}`, { cause: error });
}
