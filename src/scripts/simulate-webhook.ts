// Post a sample gateway message event to a running relay.
//   node dist/scripts/simulate-webhook.js --text '$BBCA' --chat-id 628111111111@c.us

import { parseArgs } from 'util';
import { computeWebhookHmac } from '../crypto';

export function buildMessageEvent(text: string, chatId: string): Record<string, unknown> {
  return {
    event: 'message',
    session: 'default',
    payload: {
      id: `false_${chatId}_SIMULATED`,
      timestamp: Math.floor(Date.now() / 1000),
      from: chatId,
      fromMe: false,
      body: text,
    },
  };
}

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      url: { type: 'string', default: 'http://localhost:5000/webhook' },
      'chat-id': { type: 'string', default: '628111111111@c.us' },
      text: { type: 'string', default: '$BBCA' },
      'hmac-key': { type: 'string' },
    },
  });

  const url = values.url ?? 'http://localhost:5000/webhook';
  const body = JSON.stringify(buildMessageEvent(values.text ?? '$BBCA', values['chat-id'] ?? '628111111111@c.us'));

  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  const hmacKey = values['hmac-key'] ?? process.env.WAHA_WEBHOOK_HMAC_KEY;
  if (hmacKey) {
    headers['X-Webhook-Hmac'] = computeWebhookHmac(hmacKey, Buffer.from(body, 'utf8'));
    headers['X-Webhook-Hmac-Algorithm'] = 'sha512';
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), 10000);

  try {
    const response = await fetch(url, { method: 'POST', headers, body, signal: controller.signal });
    console.log(response.status);
    console.log(JSON.stringify(await response.json(), null, 2));
  } finally {
    clearTimeout(timeoutId);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(String(error));
    process.exit(1);
  });
}
