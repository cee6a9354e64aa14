import { z } from 'zod';

// OHLCV bar as returned by the provider, oldest first
export interface Bar {
  time: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// Floor-pivot levels: s3 < s2 < s1 < pivot < r1 < r2 < r3
export interface SupportResistance {
  s1: number;
  s2: number;
  s3: number;
  r1: number;
  r2: number;
  r3: number;
  basis: Date; // daily bar the levels were derived from
}

export interface QuoteResult {
  symbol: string;
  market: string;
  open: number;
  high: number;
  low: number;
  close: number;
  change: number;
  changePercent: number | null;
  volume: number;
  timestamp: Date;
  levels: SupportResistance | null;
}

// Ticker as typed by users plus the symbol the provider knows it by
export interface Instrument {
  ticker: string;
  providerSymbol: string;
}

// Parsed chat command
export type Command =
  | { type: 'quote'; symbol: string }
  | { type: 'index' }
  | { type: 'help' }
  | { type: 'unrecognized' };

export interface InboundMessage {
  senderId: string;
  chatId: string;
  text: string;
  receivedAt: Date;
}

// SECURITY: Bound free-text fields to keep oversized payloads out of the parser
const MAX_TEXT_LENGTH = 4096;
const MAX_ID_LENGTH = 256;

const idSchema = z.string().max(MAX_ID_LENGTH);
const textSchema = z.string().max(MAX_TEXT_LENGTH);

// Message object as delivered by WAHA-compatible gateways
export const webhookMessageSchema = z
  .object({
    id: z.string().optional(),
    timestamp: z.number().optional(),
    body: textSchema.nullish(),
    text: textSchema.nullish(),
    message: textSchema.nullish(),
    content: textSchema.nullish(),
    chatId: idSchema.nullish(),
    chat_id: idSchema.nullish(),
    from: idSchema.nullish(),
    participant: idSchema.nullish(),
    author: idSchema.nullish(),
    fromMe: z.boolean().nullish(),
    from_me: z.boolean().nullish(),
  })
  .passthrough();

export type WebhookMessage = z.infer<typeof webhookMessageSchema>;

// Envelope wrapping the message; some gateways post the message object flat instead
export const webhookEnvelopeSchema = z
  .object({
    event: z.string().optional(),
    session: z.string().optional(),
    payload: webhookMessageSchema,
  })
  .passthrough();

// Webhook status returned to the gateway
export type WebhookStatus = 'ok' | 'ignored' | 'invalid' | 'rate_limited' | 'error';

export interface WebhookResponse {
  status: WebhookStatus;
}

// Health check response
export interface HealthResponse {
  status: string;
  timestamp: string;
  uptime: string;
  cache_entries: number;
  tracked_senders: number;
}
