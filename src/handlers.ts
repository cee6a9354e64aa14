import { Request, Response } from 'express';
import { BotConfig } from './config';
import { QuoteCache } from './cache';
import { parseCommand } from './commands';
import { generateRequestId, truncateId, verifyWebhookHmac } from './crypto';
import { FetchError, SendError, WebhookParseError } from './errors';
import {
  formatHelp,
  formatIndex,
  formatQuote,
  formatRateLimited,
  withSignature,
  SYMBOL_NOT_FOUND_TEXT,
  UNAVAILABLE_TEXT,
} from './format';
import { GatewayClient, MessageGateway } from './gateway';
import logger from './logger';
import * as metrics from './metrics';
import { getRawBody } from './middleware';
import { QuoteClient, QuoteProvider, toInstrument } from './quote-client';
import { SenderRateLimiter } from './rate-limiter';
import {
  Command,
  HealthResponse,
  InboundMessage,
  Instrument,
  QuoteResult,
  WebhookMessage,
  WebhookResponse,
  WebhookStatus,
  webhookEnvelopeSchema,
  webhookMessageSchema,
} from './types';

// Gateway events that carry a chat message
const MESSAGE_EVENTS = new Set(['message', 'message.any']);

// Application state
export interface AppState {
  config: BotConfig;
  startTime: Date;
  quoteCache: QuoteCache;
  rateLimiter: SenderRateLimiter;
  quoteProvider: QuoteProvider;
  gateway: MessageGateway;
}

export function createAppState(
  config: BotConfig,
  deps: Partial<Pick<AppState, 'quoteProvider' | 'gateway' | 'quoteCache' | 'rateLimiter'>> = {}
): AppState {
  return {
    config,
    startTime: new Date(),
    quoteCache:
      deps.quoteCache ?? new QuoteCache({ ttlMs: config.cacheTtlMs, maxEntries: config.cacheMaxEntries }),
    rateLimiter:
      deps.rateLimiter ?? new SenderRateLimiter(config.rateLimitMaxRequests, config.rateLimitWindowMs),
    quoteProvider:
      deps.quoteProvider ??
      new QuoteClient({
        baseUrl: config.providerUrl,
        timeoutMs: config.providerTimeoutMs,
        marketTag: config.marketTag,
        credentials: config.providerCredentials,
      }),
    gateway:
      deps.gateway ??
      new GatewayClient({
        baseUrl: config.gatewayUrl,
        session: config.gatewaySession,
        apiKey: config.gatewayApiKey,
        timeoutMs: config.gatewayTimeoutMs,
      }),
  };
}

/** Result of extracting a chat message from a webhook body */
export type Extraction =
  | { kind: 'message'; event: string; message: InboundMessage }
  | { kind: 'ignored'; event: string; reason: string };

function firstString(...values: Array<string | null | undefined>): string | undefined {
  return values.find((v): v is string => typeof v === 'string' && v.trim() !== '');
}

/**
 * Pull sender, chat and text out of a gateway webhook body.
 * Accepts the enveloped `{ event, payload }` shape and a flat message object.
 * Throws WebhookParseError when neither shape matches.
 */
export function extractInboundMessage(body: unknown, now: Date = new Date()): Extraction {
  let event = 'message';
  let data: WebhookMessage;

  const envelope = webhookEnvelopeSchema.safeParse(body);
  if (envelope.success) {
    event = envelope.data.event ?? event;
    data = envelope.data.payload;
  } else {
    const enveloped = typeof body === 'object' && body !== null && 'payload' in body;
    const flat = webhookMessageSchema.safeParse(body);
    if (enveloped || !flat.success) {
      const issue = enveloped || flat.success ? envelope.error.errors[0] : flat.error.errors[0];
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      throw new WebhookParseError(`Invalid webhook payload: ${path}${issue.message}`);
    }
    data = flat.data;
  }

  if (!MESSAGE_EVENTS.has(event)) {
    return { kind: 'ignored', event, reason: 'event' };
  }

  if (data.fromMe || data.from_me) {
    return { kind: 'ignored', event, reason: 'own message' };
  }

  const text = firstString(data.body, data.text, data.message, data.content);
  const chatId = firstString(data.chatId, data.chat_id, data.from);
  if (!text || !chatId) {
    return { kind: 'ignored', event, reason: 'no text or chat' };
  }

  return {
    kind: 'message',
    event,
    message: {
      senderId: firstString(data.participant, data.author, data.from) ?? chatId,
      chatId,
      text,
      receivedAt: data.timestamp ? new Date(data.timestamp * 1000) : now,
    },
  };
}

/** Outcome of handling one inbound message */
export interface WebhookOutcome {
  status: WebhookStatus;
  command: Command['type'];
  reply?: string;
  delivered: boolean;
}

/**
 * Send a reply through the gateway. Failures are logged and dropped.
 */
async function deliver(state: AppState, chatId: string, text: string): Promise<boolean> {
  try {
    await state.gateway.sendText(chatId, withSignature(text, state.config.replySignature));
    return true;
  } catch (error) {
    metrics.recordSendFailure();
    logger.error('Gateway send failed, reply dropped', {
      chatId,
      status: error instanceof SendError ? error.status : undefined,
      error: String(error),
    });
    return false;
  }
}

/**
 * Resolve a quote through the cache, mapping any failure to a user-facing message.
 * The returned quote carries the instrument's display ticker, whichever lookup
 * filled the cache entry for its provider symbol.
 */
async function lookupQuote(
  state: AppState,
  instrument: Instrument
): Promise<{ quote: QuoteResult } | { error: string }> {
  const interval = state.config.quoteInterval;

  try {
    const quote = await state.quoteCache.getOrFetch(instrument.providerSymbol, interval, () =>
      state.quoteProvider.fetchQuote(instrument, interval)
    );
    return { quote: { ...quote, symbol: instrument.ticker } };
  } catch (error) {
    if (error instanceof FetchError) {
      logger.warn('Quote unavailable', { symbol: instrument.providerSymbol, reason: error.reason });
      return { error: error.reason === 'symbol-not-found' ? SYMBOL_NOT_FOUND_TEXT : UNAVAILABLE_TEXT };
    }
    logger.error('Unexpected error while fetching quote', {
      symbol: instrument.providerSymbol,
      error: String(error),
    });
    return { error: UNAVAILABLE_TEXT };
  }
}

/** Synchronous verdict on an inbound message: parsed command plus limiter decision */
export type Admission =
  | { status: 'ok' | 'ignored'; command: Command }
  | { status: 'rate_limited'; command: Command; retryAfterMs: number };

/**
 * Parse the command and take a rate-limit slot. Unrecognized text in ignore
 * mode never reaches the limiter.
 */
export function admitMessage(state: AppState, message: InboundMessage): Admission {
  const { config } = state;
  const command = parseCommand(message.text, {
    quotePrefix: config.quotePrefix,
    indexCommand: config.indexCommand,
    helpCommand: config.helpCommand,
    symbolSuffix: config.providerSymbolSuffix,
  });

  if (command.type === 'unrecognized' && config.unrecognizedReply === 'ignore') {
    return { status: 'ignored', command };
  }

  if (!state.rateLimiter.allow(message.senderId)) {
    const retryAfterMs = state.rateLimiter.retryAfterMs(message.senderId);
    metrics.recordRateLimitRejected();
    logger.info('Sender rate limited', { senderId: message.senderId, retryAfterMs });
    return { status: 'rate_limited', command, retryAfterMs };
  }

  return { status: 'ok', command };
}

/**
 * Quote → format → send for an admitted message
 */
export async function replyToMessage(
  state: AppState,
  message: InboundMessage,
  admission: Admission
): Promise<WebhookOutcome> {
  const { config } = state;
  const { command } = admission;

  if (admission.status === 'ignored') {
    return { status: 'ignored', command: command.type, delivered: false };
  }

  if (admission.status === 'rate_limited') {
    const reply = formatRateLimited(admission.retryAfterMs);
    const delivered = await deliver(state, message.chatId, reply);
    return { status: 'rate_limited', command: command.type, reply, delivered };
  }

  const formatOptions = { timeZone: config.timeZone, signature: config.replySignature };
  let status: WebhookStatus = 'ok';
  let reply: string;

  switch (command.type) {
    case 'help':
    case 'unrecognized':
      reply = formatHelp({
        quotePrefix: config.quotePrefix,
        indexCommand: config.indexCommand,
        helpCommand: config.helpCommand,
        indexName: config.indexName,
        interval: config.quoteInterval,
      });
      break;

    case 'index': {
      const result = await lookupQuote(state, { ticker: config.indexName, providerSymbol: config.indexSymbol });
      if ('error' in result) {
        status = 'error';
        reply = result.error;
      } else {
        reply = formatIndex(result.quote, config.indexName, formatOptions);
      }
      break;
    }

    case 'quote': {
      const instrument = toInstrument(command.symbol, config.providerSymbolSuffix);
      const result = await lookupQuote(state, instrument);
      if ('error' in result) {
        status = 'error';
        reply = result.error;
      } else {
        reply = formatQuote(result.quote, formatOptions);
      }
      break;
    }
  }

  metrics.recordCommand(command.type, status);
  const delivered = await deliver(state, message.chatId, reply);

  logger.info('Command handled', {
    command: command.type,
    status,
    chatId: message.chatId,
    delivered,
  });

  return { status, command: command.type, reply, delivered };
}

/**
 * Parse → rate limit → quote → format → send, for one inbound message
 */
export function processMessage(state: AppState, message: InboundMessage): Promise<WebhookOutcome> {
  return replyToMessage(state, message, admitMessage(state, message));
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * POST /webhook - Gateway callback endpoint
 */
export async function handleWebhook(req: Request, res: Response, state: AppState): Promise<void> {
  const requestId = generateRequestId();

  try {
    // Verify HMAC when the gateway is configured to sign webhooks
    const hmacKey = state.config.webhookHmacKey;
    if (hmacKey) {
      const signature = headerValue(req, 'x-webhook-hmac');
      const rawBody = getRawBody(req);
      if (!signature || !rawBody) {
        logger.warn('Webhook missing HMAC signature', { requestId });
        metrics.recordWebhookSignatureFailure('missing');
        res.status(401).json({ error: 'missing signature' });
        return;
      }
      if (!verifyWebhookHmac(hmacKey, rawBody, signature)) {
        logger.warn('Webhook HMAC verification failed', { requestId, signature: truncateId(signature) });
        metrics.recordWebhookSignatureFailure('mismatch');
        res.status(401).json({ error: 'invalid signature' });
        return;
      }
    }

    let extraction: Extraction;
    try {
      extraction = extractInboundMessage(req.body);
    } catch (error) {
      if (error instanceof WebhookParseError) {
        logger.warn('Malformed webhook payload', { requestId, error: error.message });
        metrics.recordWebhookReceived('unknown', 'invalid');
        sendStatus(res, 'invalid');
        return;
      }
      throw error;
    }

    if (extraction.kind === 'ignored') {
      logger.debug('Webhook ignored', { requestId, event: extraction.event, reason: extraction.reason });
      metrics.recordWebhookReceived(extraction.event, 'ignored');
      sendStatus(res, 'ignored');
      return;
    }

    // Acknowledge before the provider call and the send; the reply runs detached
    const { message } = extraction;
    const admission = admitMessage(state, message);
    metrics.recordWebhookReceived(extraction.event, admission.status);
    sendStatus(res, admission.status);

    if (admission.status !== 'ignored') {
      replyToMessage(state, message, admission).catch((error: unknown) => {
        logger.error('Reply flow failed', { requestId, chatId: message.chatId, error: String(error) });
      });
    }
  } catch (error) {
    logger.error('Error in handleWebhook', { requestId, error: String(error) });
    res.status(500).json({ error: 'internal server error' });
  }
}

function sendStatus(res: Response, status: WebhookStatus): void {
  const body: WebhookResponse = { status };
  res.json(body);
}

/**
 * GET /health - Liveness probe
 */
export function handleHealth(_req: Request, res: Response, state: AppState): void {
  const uptime = Date.now() - state.startTime.getTime();

  const response: HealthResponse = {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: `${uptime}ms`,
    cache_entries: state.quoteCache.size(),
    tracked_senders: state.rateLimiter.size(),
  };

  res.json(response);
}

/**
 * Start cleanup task for expired cache entries and idle rate windows
 */
export function startCleanupTask(state: AppState): NodeJS.Timeout {
  return setInterval(() => {
    const expired = state.quoteCache.cleanupExpired();
    const idle = state.rateLimiter.cleanup();

    metrics.setTrackedSenders(state.rateLimiter.size());

    if (expired > 0 || idle > 0) {
      logger.debug('Cleanup completed', {
        expiredQuotes: expired,
        idleSenders: idle,
        cacheEntries: state.quoteCache.size(),
      });
    }

    // Update uptime metric
    const uptime = Math.floor((Date.now() - state.startTime.getTime()) / 1000);
    metrics.setUptimeSeconds(uptime);
  }, state.config.cleanupIntervalMs);
}
