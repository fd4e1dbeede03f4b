import { serve } from '@hono/node-server';
import { Cron } from 'croner';

import { createApp } from './app.ts';
import { initConfig } from './config/index.ts';
import { initI18n } from './i18n/index.ts';
import { cleanupRateLimitStore } from './middleware/security.middleware.ts';

const { env } = initConfig();
initI18n(env.LANGUAGE);

const { app, sessions, idempotency } = createApp();

// Scheduled jobs
const sessionCleanup = new Cron('*/5 * * * *', () => {
  const removed = sessions.cleanupExpired();
  if (removed > 0) {
    console.log(`[Scheduler] Cleaned up ${removed} expired sessions`);
  }
});

const idempotencyCleanup = new Cron('*/5 * * * *', () => {
  const deleted = idempotency.cleanup();
  if (deleted > 0) {
    console.log(`[Scheduler] Cleaned up ${deleted} idempotency records`);
  }
});

const rateLimitCleanup = new Cron('*/5 * * * *', () => {
  cleanupRateLimitStore();
});

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  console.log(`
╔═══════════════════════════════════════════╗
║  ${env.APP_NAME.padEnd(41)}║
║  Stack: Hono + Node.js                    ║
╠═══════════════════════════════════════════╣
║  Endpoints:                               ║
║  - POST /callback                         ║
║  - GET  /healthz                          ║
║  - POST /test/extract                     ║
╚═══════════════════════════════════════════╝
Listening on port ${info.port}
`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, shutting down...`);
  sessionCleanup.stop();
  idempotencyCleanup.stop();
  rateLimitCleanup.stop();
  server.close((error) => {
    if (error) {
      console.error('Error while closing server:', error);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
