import { z } from 'zod';

export const QUOTE_INTERVALS = ['1m', '5m', '15m', '1h', '1d'] as const;

export type QuoteInterval = (typeof QUOTE_INTERVALS)[number];

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const configSchema = z.object({
  port: z.number().int().positive(),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
  // Messaging gateway
  gatewayUrl: z.string().url(),
  gatewaySession: z.string().min(1),
  gatewayApiKey: z.string().optional(),
  webhookHmacKey: z.string().optional(),
  gatewayTimeoutMs: z.number().positive(),
  // Market data provider
  providerUrl: z.string().url(),
  providerCredentials: z
    .object({
      username: z.string().min(1),
      password: z.string().min(1),
    })
    .optional(),
  providerTimeoutMs: z.number().positive(),
  providerSymbolSuffix: z.string(),
  marketTag: z.string().min(1),
  quoteInterval: z.enum(QUOTE_INTERVALS),
  indexSymbol: z.string().min(1),
  indexName: z.string().min(1),
  // Chat commands
  quotePrefix: z.string().min(1),
  indexCommand: z.string().min(1),
  helpCommand: z.string().min(1),
  unrecognizedReply: z.enum(['ignore', 'help']),
  // Cache and rate limiting
  cacheTtlMs: z.number().positive(),
  cacheMaxEntries: z.number().int().positive(),
  rateLimitWindowMs: z.number().positive(),
  rateLimitMaxRequests: z.number().int().positive(),
  // Replies
  replySignature: z.string(),
  timeZone: z.string().min(1).refine(isKnownTimeZone, 'unknown time zone'),
  cleanupIntervalMs: z.number().positive(),
});

export type BotConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

function seconds(env: Env, name: string, fallback: string): number {
  return parseFloat(env[name] || fallback) * 1000;
}

export function loadConfig(env: Env = process.env): BotConfig {
  const gatewayUrl = (env.WAHA_BASE_URL || 'http://localhost:3000').replace(/\/+$/, '');
  const providerUrl = (env.PROVIDER_BASE_URL || 'https://query1.finance.yahoo.com').replace(/\/+$/, '');

  // Credentials only count when both halves are present; otherwise the provider is used anonymously
  const username = optional(env, 'PROVIDER_USERNAME');
  const password = optional(env, 'PROVIDER_PASSWORD');
  const providerCredentials = username && password ? { username, password } : undefined;

  const config = {
    port: parseInt(env.PORT || '5000', 10),
    logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    gatewayUrl,
    gatewaySession: env.WAHA_SESSION || 'default',
    gatewayApiKey: optional(env, 'WAHA_API_KEY'),
    webhookHmacKey: optional(env, 'WAHA_WEBHOOK_HMAC_KEY'),
    gatewayTimeoutMs: seconds(env, 'GATEWAY_TIMEOUT_SECONDS', '15'),
    providerUrl,
    providerCredentials,
    providerTimeoutMs: seconds(env, 'PROVIDER_TIMEOUT_SECONDS', '15'),
    providerSymbolSuffix: (env.PROVIDER_SYMBOL_SUFFIX ?? '.JK').toUpperCase(),
    marketTag: env.MARKET_TAG || 'IDX',
    quoteInterval: env.QUOTE_INTERVAL || '1d',
    indexSymbol: (env.INDEX_SYMBOL || '^JKSE').toUpperCase(),
    indexName: env.INDEX_NAME || 'IHSG',
    quotePrefix: env.QUOTE_PREFIX || '$',
    indexCommand: (env.INDEX_COMMAND || '!ihsg').toLowerCase(),
    helpCommand: (env.HELP_COMMAND || '!help').toLowerCase(),
    unrecognizedReply: env.UNRECOGNIZED_REPLY || 'ignore',
    cacheTtlMs: seconds(env, 'CACHE_TTL_SECONDS', '30'),
    cacheMaxEntries: parseInt(env.CACHE_MAX_ENTRIES || '1000', 10),
    rateLimitWindowMs: seconds(env, 'RATE_LIMIT_WINDOW_SECONDS', '5'),
    rateLimitMaxRequests: parseInt(env.RATE_LIMIT_MAX_REQUESTS || '1', 10),
    replySignature: env.REPLY_SIGNATURE ?? '© Saham Bot',
    timeZone: env.TIMEZONE || 'Asia/Jakarta',
    cleanupIntervalMs: seconds(env, 'CLEANUP_INTERVAL_SECONDS', '60'),
  };

  return configSchema.parse(config);
}
