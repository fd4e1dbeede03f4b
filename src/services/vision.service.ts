import { CircuitBreaker, type CircuitBreakerState } from '../utils/circuit-breaker.ts';
import { withRetry } from '../utils/retry.ts';
import { classifyHttpFailure, classifyProviderError } from '../utils/error-classifier.ts';
import { ProviderError } from '../utils/errors.ts';
import { getEnv } from '../config/env.ts';
import type { OcrProvider } from '../types/dialogue.types.ts';
import {
  visionAnnotateResponseSchema,
  type VisionAnnotateRequest,
  type VisionFeatureType,
} from '../types/vision.types.ts';

interface VisionConfig {
  apiKey: string;
  baseUrl: string;
  feature: VisionFeatureType;
  languageHints: string[];
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  circuitBreakerThreshold: number;
  circuitBreakerCooldownMs: number;
}

/**
 * Receipt OCR through Google Cloud Vision text detection.
 */
export class VisionService implements OcrProvider {
  private circuitBreaker: CircuitBreaker;
  private config: VisionConfig;

  constructor(config: Partial<VisionConfig> = {}) {
    this.config = {
      apiKey: config.apiKey ?? getEnv().GOOGLE_VISION_API_KEY,
      baseUrl: 'https://vision.googleapis.com',
      feature: 'TEXT_DETECTION',
      languageHints: [],
      timeoutMs: 15000,
      maxRetries: 2,
      retryBaseDelayMs: 500,
      circuitBreakerThreshold: 3,
      circuitBreakerCooldownMs: 60000, // 1 minute
      ...config,
    };

    this.circuitBreaker = new CircuitBreaker({
      name: 'VisionCircuitBreaker',
      threshold: this.config.circuitBreakerThreshold,
      cooldownMs: this.config.circuitBreakerCooldownMs,
    });
  }

  async recognizeText(image: Uint8Array): Promise<string | null> {
    if (!this.circuitBreaker.isAllowed()) {
      throw new ProviderError('unknown', 'Vision circuit is open, skipping OCR call');
    }

    try {
      const text = await withRetry(() => this.annotate(image), {
        maxRetries: this.config.maxRetries,
        baseDelayMs: this.config.retryBaseDelayMs,
        maxDelayMs: this.config.retryBaseDelayMs * 8,
        jitterMs: this.config.retryBaseDelayMs / 5,
        shouldRetry: error => error instanceof ProviderError && error.retryable,
      });
      this.circuitBreaker.recordSuccess();
      return text;
    } catch (error) {
      this.circuitBreaker.recordFailure();
      const providerError = classifyProviderError('Vision', error);
      console.error(`[Vision] OCR failed (${providerError.kind}):`, providerError.message);
      throw providerError;
    }
  }

  getCircuitBreakerState(): CircuitBreakerState {
    return this.circuitBreaker.getState();
  }

  private async annotate(image: Uint8Array): Promise<string | null> {
    const request: VisionAnnotateRequest = {
      requests: [
        {
          image: { content: Buffer.from(image).toString('base64') },
          features: [{ type: this.config.feature }],
          ...(this.config.languageHints.length > 0
            ? { imageContext: { languageHints: this.config.languageHints } }
            : {}),
        },
      ],
    };

    let response: Response;
    try {
      response = await fetch(
        `${this.config.baseUrl}/v1/images:annotate?key=${encodeURIComponent(this.config.apiKey)}`,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify(request),
          signal: AbortSignal.timeout(this.config.timeoutMs),
        }
      );
    } catch (error) {
      throw classifyProviderError('Vision', error);
    }

    if (!response.ok) {
      const body = await response.text();
      throw classifyHttpFailure('Vision', response.status, body);
    }

    const parsed = visionAnnotateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ProviderError('unknown', `Unexpected Vision response: ${parsed.error.message}`);
    }

    const result = parsed.data.responses?.[0];
    if (result?.error?.message) {
      console.error(`[Vision] API error: ${result.error.message}`);
      return null;
    }

    // First annotation holds the full text of the image
    const fullText = result?.textAnnotations?.[0]?.description;
    if (!fullText) {
      console.warn('[Vision] No text found in image');
      return null;
    }

    console.log(`[Vision] OCR extracted ${fullText.length} characters`);
    return fullText;
  }
}
