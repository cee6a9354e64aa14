import { Request, Response } from 'express';
import { ServerResponse } from 'http';
import { BotConfig, QuoteInterval, loadConfig } from '../config';
import { FetchError, SendError } from '../errors';
import { SYMBOL_NOT_FOUND_TEXT, UNAVAILABLE_TEXT, formatHelp, formatQuote } from '../format';
import {
  AppState,
  createAppState,
  extractInboundMessage,
  handleHealth,
  handleWebhook,
  processMessage,
} from '../handlers';
import { captureRawBody } from '../middleware';
import { SenderRateLimiter } from '../rate-limiter';
import { InboundMessage, Instrument, QuoteResult } from '../types';
import { makeQuote } from './fixtures';

jest.mock('../logger', () => {
  const mockLogger = { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
  return { __esModule: true, default: mockLogger, logger: mockLogger };
});

const SIGNATURE_LINE = '© Saham Bot';
const HMAC_BODY = Buffer.from('{"event":"message"}', 'utf8');
const HMAC_SIGNATURE =
  '5b70489ae94812b93dfb5668f6dbfa2f3b5eb5cd6168e5670246d967616e650cb143b9ff80023de21aeebf4c5495f6f88879d784a24a24a2ae872d6c25cfe13a';

const createMockConfig = (overrides: Partial<BotConfig> = {}): BotConfig => ({
  ...loadConfig({}),
  timeZone: 'UTC',
  ...overrides,
});

const createMockRequest = (overrides: Partial<Request> = {}): Request => {
  return {
    query: {},
    body: {},
    params: {},
    headers: {},
    ...overrides,
  } as Request;
};

interface MockResponse {
  _status: number;
  _json: unknown;
  status: jest.Mock;
  json: jest.Mock;
}

const createMockResponse = (): MockResponse => {
  const mockRes: MockResponse = {
    _status: 200,
    _json: null,
    status: jest.fn(),
    json: jest.fn(),
  };

  mockRes.status.mockImplementation((code: number) => {
    mockRes._status = code;
    return mockRes;
  });

  mockRes.json.mockImplementation((data: unknown) => {
    mockRes._json = data;
    return mockRes;
  });

  return mockRes;
};

interface TestHarness {
  state: AppState;
  fetchQuote: jest.Mock<Promise<QuoteResult>, [Instrument, QuoteInterval]>;
  sendText: jest.Mock<Promise<void>, [string, string]>;
}

const createHarness = (
  overrides: Partial<BotConfig> = {},
  rateLimiter?: SenderRateLimiter
): TestHarness => {
  const fetchQuote = jest
    .fn<Promise<QuoteResult>, [Instrument, QuoteInterval]>()
    .mockImplementation((instrument) => Promise.resolve(makeQuote({ symbol: instrument.ticker })));
  const sendText = jest.fn<Promise<void>, [string, string]>().mockResolvedValue(undefined);
  const state = createAppState(createMockConfig(overrides), {
    quoteProvider: { fetchQuote },
    gateway: { sendText },
    ...(rateLimiter ? { rateLimiter } : {}),
  });
  return { state, fetchQuote, sendText };
};

const flushPromises = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

const message = (text: string, senderId: string = '628111111111@c.us'): InboundMessage => ({
  senderId,
  chatId: senderId,
  text,
  receivedAt: new Date('2025-01-10T09:00:00Z'),
});

describe('extractInboundMessage', () => {
  const now = new Date('2025-01-10T10:00:00Z');

  it('should read a message event envelope', () => {
    const result = extractInboundMessage(
      {
        event: 'message',
        session: 'default',
        payload: { from: '628111111111@c.us', body: '$BBCA', timestamp: 1736467200, fromMe: false },
      },
      now
    );

    expect(result).toEqual({
      kind: 'message',
      event: 'message',
      message: {
        senderId: '628111111111@c.us',
        chatId: '628111111111@c.us',
        text: '$BBCA',
        receivedAt: new Date('2025-01-10T00:00:00Z'),
      },
    });
  });

  it('should key group messages by participant and reply to the group', () => {
    const result = extractInboundMessage(
      {
        event: 'message.any',
        payload: { from: '120363000000@g.us', participant: '628222222222@c.us', body: '!ihsg' },
      },
      now
    );

    expect(result).toMatchObject({
      kind: 'message',
      message: { senderId: '628222222222@c.us', chatId: '120363000000@g.us', text: '!ihsg', receivedAt: now },
    });
  });

  it('should accept a flat message with alternate field names', () => {
    const result = extractInboundMessage({ chat_id: '628333333333@c.us', text: '$TLKM', from_me: false }, now);

    expect(result).toEqual({
      kind: 'message',
      event: 'message',
      message: { senderId: '628333333333@c.us', chatId: '628333333333@c.us', text: '$TLKM', receivedAt: now },
    });
  });

  it('should ignore non-message events', () => {
    expect(extractInboundMessage({ event: 'session.status', payload: { status: 'WORKING' } }, now)).toEqual({
      kind: 'ignored',
      event: 'session.status',
      reason: 'event',
    });
  });

  it('should ignore the bot\'s own messages', () => {
    expect(
      extractInboundMessage({ event: 'message', payload: { from: '628111111111@c.us', body: '$BBCA', fromMe: true } }, now)
    ).toEqual({ kind: 'ignored', event: 'message', reason: 'own message' });
  });

  it('should ignore messages without text', () => {
    expect(extractInboundMessage({ event: 'message', payload: { from: '628111111111@c.us', body: '   ' } }, now)).toEqual({
      kind: 'ignored',
      event: 'message',
      reason: 'no text or chat',
    });
  });

  it('should reject bodies that match no message shape', () => {
    expect(() => extractInboundMessage({ event: 'message', payload: 'nope' }, now)).toThrow('Invalid webhook payload');
    expect(() => extractInboundMessage('garbage', now)).toThrow('Invalid webhook payload');
    expect(() => extractInboundMessage({ body: 42 }, now)).toThrow('Invalid webhook payload: body');
  });
});

describe('processMessage', () => {
  it('should reply with a formatted quote', async () => {
    const { state, fetchQuote, sendText } = createHarness();

    const outcome = await processMessage(state, message('$bbca'));

    const expected = formatQuote(makeQuote(), { timeZone: 'UTC', signature: SIGNATURE_LINE });
    expect(fetchQuote).toHaveBeenCalledWith({ ticker: 'BBCA', providerSymbol: 'BBCA.JK' }, '1d');
    expect(sendText).toHaveBeenCalledWith('628111111111@c.us', expected);
    expect(outcome).toEqual({ status: 'ok', command: 'quote', reply: expected, delivered: true });
  });

  it('should serve repeat lookups within the TTL from cache', async () => {
    const { state, fetchQuote, sendText } = createHarness();

    await processMessage(state, message('$BBCA', 'a@c.us'));
    await processMessage(state, message('$BBCA.JK', 'b@c.us'));

    expect(fetchQuote).toHaveBeenCalledTimes(1);
    expect(sendText).toHaveBeenCalledTimes(2);
    expect(sendText.mock.calls[1][1]).toBe(sendText.mock.calls[0][1]);
  });

  it('should share one provider call between concurrent lookups', async () => {
    const { state, fetchQuote, sendText } = createHarness();
    let resolveFetch: (quote: QuoteResult) => void = () => undefined;
    fetchQuote.mockImplementation(
      () =>
        new Promise<QuoteResult>((resolve) => {
          resolveFetch = resolve;
        })
    );

    const first = processMessage(state, message('$BBCA', 'a@c.us'));
    const second = processMessage(state, message('$BBCA', 'b@c.us'));
    resolveFetch(makeQuote());
    const outcomes = await Promise.all([first, second]);

    expect(fetchQuote).toHaveBeenCalledTimes(1);
    expect(outcomes.map((o) => o.status)).toEqual(['ok', 'ok']);
    expect(sendText.mock.calls.map((call) => call[0])).toEqual(['a@c.us', 'b@c.us']);
  });

  it('should throttle the request over the limit without fetching', async () => {
    const limiter = new SenderRateLimiter(2, 5000, () => 1_000_000);
    const { state, fetchQuote, sendText } = createHarness({ rateLimitMaxRequests: 2 }, limiter);

    await processMessage(state, message('$BBCA'));
    await processMessage(state, message('$TLKM'));
    const outcome = await processMessage(state, message('$ASII'));

    expect(fetchQuote).toHaveBeenCalledTimes(2);
    expect(outcome.status).toBe('rate_limited');
    expect(outcome.reply).toBe('Mohon tunggu 5 detik sebelum request lagi.');
    expect(sendText).toHaveBeenLastCalledWith(
      '628111111111@c.us',
      `Mohon tunggu 5 detik sebelum request lagi.\n\n${SIGNATURE_LINE}`
    );
  });

  it('should limit senders independently', async () => {
    const { state, fetchQuote } = createHarness();

    await processMessage(state, message('$BBCA', 'a@c.us'));
    const outcome = await processMessage(state, message('$TLKM', 'b@c.us'));

    expect(outcome.status).toBe('ok');
    expect(fetchQuote).toHaveBeenCalledTimes(2);
  });

  it('should reply with the unavailable message on provider timeout', async () => {
    const { state, fetchQuote, sendText } = createHarness();
    fetchQuote.mockRejectedValue(new FetchError('timeout', 'Provider timed out after 15000ms'));

    const outcome = await processMessage(state, message('$BBCA'));

    expect(outcome).toEqual({ status: 'error', command: 'quote', reply: UNAVAILABLE_TEXT, delivered: true });
    expect(sendText).toHaveBeenCalledWith('628111111111@c.us', `${UNAVAILABLE_TEXT}\n\n${SIGNATURE_LINE}`);
  });

  it('should reply with the not-found message for unknown symbols', async () => {
    const { state, fetchQuote } = createHarness();
    fetchQuote.mockRejectedValue(new FetchError('symbol-not-found', 'Unknown symbol ZZZZ.JK'));

    const outcome = await processMessage(state, message('$ZZZZ'));

    expect(outcome.status).toBe('error');
    expect(outcome.reply).toBe(SYMBOL_NOT_FOUND_TEXT);
  });

  it('should treat unexpected failures as unavailable', async () => {
    const { state, fetchQuote } = createHarness();
    fetchQuote.mockRejectedValue(new Error('boom'));

    const outcome = await processMessage(state, message('$BBCA'));

    expect(outcome.reply).toBe(UNAVAILABLE_TEXT);
  });

  it('should not cache failures', async () => {
    const { state, fetchQuote } = createHarness();
    fetchQuote.mockRejectedValueOnce(new FetchError('unavailable', 'Provider returned status 503'));

    await processMessage(state, message('$BBCA', 'a@c.us'));
    const outcome = await processMessage(state, message('$BBCA', 'b@c.us'));

    expect(fetchQuote).toHaveBeenCalledTimes(2);
    expect(outcome.status).toBe('ok');
  });

  it('should reply with the index quote', async () => {
    const { state, fetchQuote } = createHarness();

    const outcome = await processMessage(state, message('!IHSG'));

    expect(fetchQuote).toHaveBeenCalledWith({ ticker: 'IHSG', providerSymbol: '^JKSE' }, '1d');
    expect(outcome.command).toBe('index');
    expect(outcome.reply?.split('\n')[0]).toBe('IHSG (IDX)');
  });

  it('should head replies with the requested ticker when index and equity share a provider symbol', async () => {
    const { state, fetchQuote } = createHarness({ indexSymbol: 'BBCA.JK' });

    const index = await processMessage(state, message('!ihsg', 'a@c.us'));
    const equity = await processMessage(state, message('$BBCA', 'b@c.us'));

    expect(fetchQuote).toHaveBeenCalledTimes(1);
    expect(index.reply?.split('\n')[0]).toBe('IHSG (IDX)');
    expect(equity.reply?.split('\n')[0]).toBe('BBCA (IDX)');
    expect(equity.reply?.split('\n')[7]).toBe('📊 SUPPORT & RESISTANCE — BBCA (1 Day)');
  });

  it('should reply with help', async () => {
    const { state, fetchQuote } = createHarness();

    const outcome = await processMessage(state, message('!help'));

    expect(fetchQuote).not.toHaveBeenCalled();
    expect(outcome.status).toBe('ok');
    expect(outcome.reply).toBe(
      formatHelp({
        quotePrefix: '$',
        indexCommand: '!ihsg',
        helpCommand: '!help',
        indexName: 'IHSG',
        interval: '1d',
      })
    );
  });

  it('should ignore unrecognized text by default without touching the limiter', async () => {
    const { state, sendText } = createHarness();

    const outcome = await processMessage(state, message('selamat pagi'));

    expect(outcome).toEqual({ status: 'ignored', command: 'unrecognized', delivered: false });
    expect(sendText).not.toHaveBeenCalled();
    expect(state.rateLimiter.size()).toBe(0);
  });

  it('should answer unrecognized text with help when configured', async () => {
    const { state, sendText } = createHarness({ unrecognizedReply: 'help' });

    const outcome = await processMessage(state, message('selamat pagi'));

    expect(outcome.status).toBe('ok');
    expect(outcome.command).toBe('unrecognized');
    expect(sendText.mock.calls[0][1].startsWith('Panduan cepat:')).toBe(true);
    expect(sendText.mock.calls[0][1].endsWith(`\n\n${SIGNATURE_LINE}`)).toBe(true);
  });

  it('should report undelivered replies when the gateway fails', async () => {
    const { state, sendText } = createHarness();
    sendText.mockRejectedValue(new SendError('non-success status 500: oops', 500));

    const outcome = await processMessage(state, message('$BBCA'));

    expect(outcome.status).toBe('ok');
    expect(outcome.delivered).toBe(false);
  });
});

describe('handleWebhook', () => {
  it('should process a message event and acknowledge it', async () => {
    const { state, sendText } = createHarness();
    const req = createMockRequest({
      body: { event: 'message', payload: { from: '628111111111@c.us', body: '$BBCA', fromMe: false } },
    });
    const res = createMockResponse();

    await handleWebhook(req, res as unknown as Response, state);

    expect(res._status).toBe(200);
    expect(res._json).toEqual({ status: 'ok' });

    await flushPromises();
    expect(sendText).toHaveBeenCalledTimes(1);
    expect(sendText.mock.calls[0][0]).toBe('628111111111@c.us');
  });

  it('should acknowledge before the provider answers', async () => {
    const { state, fetchQuote, sendText } = createHarness();
    fetchQuote.mockImplementation(() => new Promise<QuoteResult>(() => undefined));
    const req = createMockRequest({
      body: { event: 'message', payload: { from: '628111111111@c.us', body: '$BBCA' } },
    });
    const res = createMockResponse();

    await handleWebhook(req, res as unknown as Response, state);

    expect(res.json).toHaveBeenCalledTimes(1);
    expect(res._json).toEqual({ status: 'ok' });
    expect(fetchQuote).toHaveBeenCalledTimes(1);
    expect(sendText).not.toHaveBeenCalled();
  });

  it('should acknowledge ignored events', async () => {
    const { state, sendText } = createHarness();
    const req = createMockRequest({ body: { event: 'message.ack', payload: { id: 'x' } } });
    const res = createMockResponse();

    await handleWebhook(req, res as unknown as Response, state);

    expect(res._json).toEqual({ status: 'ignored' });
    expect(sendText).not.toHaveBeenCalled();
  });

  it('should answer malformed payloads with invalid', async () => {
    const { state } = createHarness();
    const req = createMockRequest({ body: { event: 'message', payload: [] } });
    const res = createMockResponse();

    await handleWebhook(req, res as unknown as Response, state);

    expect(res._status).toBe(200);
    expect(res._json).toEqual({ status: 'invalid' });
  });

  it('should report rate limited requests and send the throttle reply', async () => {
    const { state, fetchQuote, sendText } = createHarness();
    const body = { event: 'message', payload: { from: '628111111111@c.us', body: '$BBCA' } };

    await handleWebhook(createMockRequest({ body }), createMockResponse() as unknown as Response, state);
    const res = createMockResponse();
    await handleWebhook(createMockRequest({ body }), res as unknown as Response, state);
    await flushPromises();

    expect(res._json).toEqual({ status: 'rate_limited' });
    expect(fetchQuote).toHaveBeenCalledTimes(1);
    expect(sendText).toHaveBeenCalledTimes(2);
    expect(sendText.mock.calls.map((call) => call[1]).filter((text) => text.startsWith('Mohon tunggu'))).toEqual([
      'Mohon tunggu 5 detik sebelum request lagi.\n\n© Saham Bot',
    ]);
  });

  describe('with HMAC verification', () => {
    it('should accept a correctly signed body', async () => {
      const { state } = createHarness({ webhookHmacKey: 'test-secret' });
      const req = createMockRequest({
        body: { event: 'message' },
        headers: { 'x-webhook-hmac': HMAC_SIGNATURE, 'x-webhook-hmac-algorithm': 'sha512' },
      });
      const res = createMockResponse();
      captureRawBody(req, res as unknown as ServerResponse, HMAC_BODY);

      await handleWebhook(req, res as unknown as Response, state);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({ status: 'ignored' });
    });

    it('should reject a wrong signature', async () => {
      const { state } = createHarness({ webhookHmacKey: 'test-secret' });
      const req = createMockRequest({
        body: { event: 'message' },
        headers: { 'x-webhook-hmac': 'ab'.repeat(64) },
      });
      const res = createMockResponse();
      captureRawBody(req, res as unknown as ServerResponse, HMAC_BODY);

      await handleWebhook(req, res as unknown as Response, state);

      expect(res._status).toBe(401);
      expect(res._json).toEqual({ error: 'invalid signature' });
    });

    it('should reject a missing signature', async () => {
      const { state, sendText } = createHarness({ webhookHmacKey: 'test-secret' });
      const req = createMockRequest({
        body: { event: 'message', payload: { from: '628111111111@c.us', body: '$BBCA' } },
      });
      const res = createMockResponse();

      await handleWebhook(req, res as unknown as Response, state);

      expect(res._status).toBe(401);
      expect(res._json).toEqual({ error: 'missing signature' });
      expect(sendText).not.toHaveBeenCalled();
    });
  });
});

describe('handleHealth', () => {
  it('should report cache and limiter sizes', async () => {
    const { state } = createHarness();
    await processMessage(state, message('$BBCA'));
    const res = createMockResponse();

    handleHealth(createMockRequest(), res as unknown as Response, state);

    expect(res._json).toMatchObject({
      status: 'healthy',
      cache_entries: 1,
      tracked_senders: 1,
    });
  });
});
