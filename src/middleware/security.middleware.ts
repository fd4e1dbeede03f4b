import { createHmac, timingSafeEqual } from 'node:crypto';
import type { Context, Next } from 'hono';
import { getEnv, isDevelopment } from '../config/env.ts';

/**
 * Security middleware: LINE signature check, API keys for the debug
 * endpoints, rate limiting and input size limits.
 */

// In-memory rate limit store, swept by the scheduler
const rateLimitStore = new Map<string, { count: number; resetTime: number }>();

/**
 * LINE webhook signature verification.
 * X-Line-Signature must be base64(HMAC-SHA256(channel secret, raw body)).
 */
export function verifyLineSignature(channelSecret?: string) {
  return async (c: Context, next: Next) => {
    const secret = channelSecret ?? getEnv().LINE_CHANNEL_SECRET;
    const signature = c.req.header('X-Line-Signature');
    const body = await c.req.text();

    if (!signature || !isValidLineSignature(secret, body, signature)) {
      console.warn(`[Security] Invalid LINE signature from ${getClientIP(c)}`);
      return c.json({ error: 'Invalid signature' }, 400);
    }

    await next();
  };
}

export function computeLineSignature(secret: string, body: string): string {
  return createHmac('sha256', secret).update(body, 'utf8').digest('base64');
}

export function isValidLineSignature(secret: string, body: string, signature: string): boolean {
  const expected = Buffer.from(computeLineSignature(secret, body), 'utf8');
  const received = Buffer.from(signature, 'utf8');

  // timingSafeEqual throws on length mismatch
  if (expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}

/**
 * API Key Authentication Middleware
 * Validates X-API-Key header against configured API keys
 */
export function apiKeyAuth() {
  return async (c: Context, next: Next) => {
    const env = getEnv();

    // Open in development when no keys are configured
    if (isDevelopment() && env.API_KEYS.length === 0) {
      await next();
      return;
    }

    const apiKey = c.req.header('X-API-Key');

    if (!apiKey) {
      return c.json({
        error: 'Authentication required',
        code: 'MISSING_API_KEY'
      }, 401);
    }

    if (!env.API_KEYS.includes(apiKey)) {
      console.warn(`[Security] Failed authentication attempt from ${getClientIP(c)}`);

      return c.json({
        error: 'Invalid API key',
        code: 'INVALID_API_KEY'
      }, 401);
    }

    await next();
  };
}

/**
 * Rate Limiting Middleware
 * Limits requests per IP/key to prevent abuse
 */
export function rateLimit(options: {
  windowMs?: number;
  maxRequests?: number;
  keyGenerator?: (c: Context) => string;
} = {}) {
  const {
    windowMs = 60 * 1000,
    maxRequests = 60,
    keyGenerator = getClientIP,
  } = options;

  return async (c: Context, next: Next) => {
    const key = keyGenerator(c);
    const now = Date.now();

    let entry = rateLimitStore.get(key);

    if (!entry || now > entry.resetTime) {
      entry = { count: 0, resetTime: now + windowMs };
      rateLimitStore.set(key, entry);
    }

    entry.count++;

    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(Math.ceil(entry.resetTime / 1000)));

    if (entry.count > maxRequests) {
      console.warn(`[Security] Rate limit exceeded for ${key}`);

      return c.json({
        error: 'Too many requests',
        code: 'RATE_LIMIT_EXCEEDED',
        retryAfter: Math.ceil((entry.resetTime - now) / 1000),
      }, 429);
    }

    await next();
  };
}

/**
 * Strict rate limit for the debug endpoints
 */
export function strictRateLimit() {
  return rateLimit({
    windowMs: 60 * 1000,
    maxRequests: 10,
  });
}

/**
 * Input Size Validation Middleware
 */
export function validateInputSize(maxBytes: number = 1024 * 1024) {
  return async (c: Context, next: Next) => {
    const contentLength = c.req.header('content-length');

    if (contentLength && parseInt(contentLength, 10) > maxBytes) {
      return c.json({
        error: 'Request body too large',
        code: 'PAYLOAD_TOO_LARGE',
        maxBytes,
      }, 413);
    }

    await next();
  };
}

/**
 * Security Headers Middleware
 */
export function securityHeaders() {
  return async (c: Context, next: Next) => {
    await next();

    c.header('X-Frame-Options', 'DENY');
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('Referrer-Policy', 'no-referrer');
    c.header('Content-Security-Policy', "default-src 'none'");
    c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  };
}

/**
 * Logs rejected requests (bad signature, auth, rate limit)
 */
export function auditLog() {
  return async (c: Context, next: Next) => {
    const start = Date.now();
    const path = c.req.path;
    const method = c.req.method;
    const ip = getClientIP(c);

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;

    if (status === 400 || status === 401 || status === 403 || status === 429) {
      console.warn(`[Audit] ${method} ${path} - ${status} - ${ip} - ${duration}ms`);
    }
  };
}

function getClientIP(c: Context): string {
  return (
    c.req.header('x-forwarded-for')?.split(',')[0]?.trim() ||
    c.req.header('x-real-ip') ||
    'unknown'
  );
}

/**
 * Error text for debug endpoint responses. Production never sees raw messages.
 */
export function sanitizeError(error: unknown, exposeDetails: boolean): string {
  if (exposeDetails) {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('vision') || message.includes('ocr')) {
      return 'OCR service temporarily unavailable';
    }
    if (message.includes('line')) {
      return 'Messaging service error';
    }
    if (message.includes('timeout') || message.includes('timed out')) {
      return 'Request timed out';
    }
  }

  return 'An unexpected error occurred';
}

export function cleanupRateLimitStore(): number {
  const now = Date.now();
  let deleted = 0;
  for (const [key, entry] of rateLimitStore.entries()) {
    if (now > entry.resetTime) {
      rateLimitStore.delete(key);
      deleted++;
    }
  }
  return deleted;
}
