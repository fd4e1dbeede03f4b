/**
 * Point the LINE channel's webhook at this deployment and ask LINE to test it.
 * Run once after deployment: npm run setup:webhook -- https://example.com
 */

import { initConfig } from '../config/index.ts';
import { LineService } from '../services/line.service.ts';

async function setupWebhook(baseUrl: string | undefined) {
  if (!baseUrl || !/^https:\/\//.test(baseUrl)) {
    throw new Error('Usage: setup-webhook <https://your-service-url>');
  }

  initConfig();
  const line = new LineService();
  const endpoint = `${baseUrl.replace(/\/+$/, '')}/callback`;

  console.log(`Setting webhook endpoint to ${endpoint}...`);
  await line.setWebhookEndpoint(endpoint);

  console.log('Testing webhook endpoint...');
  const result = await line.testWebhookEndpoint();
  if (!result.success) {
    throw new Error(`Webhook test failed: ${result.statusCode ?? '?'} ${result.reason ?? ''} ${result.detail ?? ''}`.trim());
  }

  console.log('\nSetup complete! Make sure "Use webhook" is enabled in the LINE Developers console.');
}

setupWebhook(process.argv[2]).catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
