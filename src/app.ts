import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { timing } from 'hono/timing';
import { z } from 'zod';

import { webhookHandler } from './handlers/webhook.handler.ts';
import { getEnv, isDevelopment, Features, type Env } from './config/index.ts';
import { getLanguage } from './i18n/index.ts';
import { extractAmountCandidates } from './parsers/amount.parser.ts';
import {
  apiKeyAuth,
  strictRateLimit,
  securityHeaders,
  auditLog,
  validateInputSize,
  sanitizeError,
  verifyLineSignature,
} from './middleware/security.middleware.ts';

// Services
import { LineService, type LineMessagingClient } from './services/line.service.ts';
import { VisionService } from './services/vision.service.ts';
import { DialogueService } from './services/dialogue.service.ts';
import { InMemorySessionStore, type SessionStore } from './services/session.service.ts';
import { UsageTracker } from './services/usage.service.ts';
import { IdempotencyService } from './services/idempotency.service.ts';
import type { OcrProvider } from './types/dialogue.types.ts';

// Types for context
declare module 'hono' {
  interface ContextVariableMap {
    line: LineMessagingClient;
    dialogue: DialogueService;
    idempotency: IdempotencyService;
    env: Env;
  }
}

export interface AppDependencies {
  line: LineMessagingClient;
  vision: VisionService;
  ocr: OcrProvider;
  sessions: SessionStore;
  usage: UsageTracker;
  idempotency: IdempotencyService;
}

const extractRequestSchema = z.object({
  text: z.string().min(1).max(20000),
});

export function createApp(deps?: Partial<AppDependencies>) {
  const app = new Hono();
  const env = getEnv();

  // Initialize services (or use provided dependencies)
  const line = deps?.line ?? new LineService();
  const vision = deps?.vision ?? new VisionService();
  const ocr = deps?.ocr ?? vision;
  const sessions = deps?.sessions ?? new InMemorySessionStore({ ttlMs: env.SESSION_TTL_MINUTES * 60 * 1000 });
  const usage = deps?.usage ?? new UsageTracker({
    timezone: env.PROJECT_TIMEZONE,
    monthlyCap: env.MONTHLY_OCR_CAP,
    freeMode: env.FREE_MODE,
  });
  const idempotency = deps?.idempotency ?? new IdempotencyService();
  const dialogue = new DialogueService({ sessions, usage, ocr }, { maxCandidates: env.MAX_CANDIDATES });

  // Inject services into context
  app.use('*', async (c, next) => {
    c.set('line', line);
    c.set('dialogue', dialogue);
    c.set('idempotency', idempotency);
    c.set('env', env);
    await next();
  });

  // Security middleware (applied first)
  app.use('*', securityHeaders());
  app.use('*', auditLog());

  // Logging and timing
  app.use('*', logger());
  app.use('*', timing());

  // Health check
  app.get('/healthz', (c) => {
    const snapshot = usage.getSnapshot();

    return c.json({
      status: 'healthy',
      app: env.APP_NAME,
      language: getLanguage(),
      timestamp: new Date().toISOString(),
      sessions: sessions.size(),
      usage: {
        month: snapshot.month,
        count: snapshot.count,
        remaining: snapshot.remaining,
      },
      ocr_circuit_breaker: vision.getCircuitBreakerState().state,
    });
  });

  // LINE webhook (signature checked against the raw body)
  app.post('/callback', validateInputSize(1024 * 1024), verifyLineSignature(env.LINE_CHANNEL_SECRET), webhookHandler);

  // Debug endpoints (feature-gated or development mode)
  if (Features.debugEndpoints() || isDevelopment()) {
    app.use('/test/*', strictRateLimit());
    app.use('/test/*', apiKeyAuth());
    app.use('/test/*', validateInputSize(1024 * 100));

    // Debug: run amount extraction on raw OCR text
    app.post('/test/extract', async (c) => {
      try {
        const parsed = extractRequestSchema.safeParse(await c.req.json());
        if (!parsed.success) {
          return c.json({ error: 'Invalid or too long text input' }, 400);
        }

        const candidates = extractAmountCandidates(parsed.data.text);
        return c.json({ candidates: candidates.map(amount => amount.toFixed()) });
      } catch (error) {
        return c.json({
          error: sanitizeError(error, isDevelopment()),
        }, 500);
      }
    });
  } else {
    app.all('/test/*', (c) => {
      return c.json({ error: 'Debug endpoints disabled' }, 404);
    });
  }

  return { app, line, vision, sessions, usage, idempotency, dialogue };
}
