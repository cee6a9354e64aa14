import client from 'prom-client';

// Create a registry
export const register = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register });

// HTTP request metrics
export const httpRequestsTotal = new client.Counter({
  name: 'quotebot_http_requests_total',
  help: 'Total number of HTTP requests by endpoint and status',
  labelNames: ['endpoint', 'method', 'status'],
  registers: [register],
});

export const httpRequestDuration = new client.Histogram({
  name: 'quotebot_http_request_duration_seconds',
  help: 'HTTP request latency in seconds',
  labelNames: ['endpoint', 'method'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register],
});

// Webhook metrics
export const webhooksReceived = new client.Counter({
  name: 'quotebot_webhooks_received_total',
  help: 'Total number of webhooks received by event and outcome',
  labelNames: ['event', 'status'],
  registers: [register],
});

export const webhookSignatureFailures = new client.Counter({
  name: 'quotebot_webhook_signature_failures_total',
  help: 'Total number of webhook HMAC verification failures',
  labelNames: ['reason'],
  registers: [register],
});

// Command and reply metrics
export const commandsHandled = new client.Counter({
  name: 'quotebot_commands_total',
  help: 'Total number of chat commands handled by command type and status',
  labelNames: ['command', 'status'],
  registers: [register],
});

export const sendFailures = new client.Counter({
  name: 'quotebot_send_failures_total',
  help: 'Total number of outbound messages the gateway did not accept',
  registers: [register],
});

// Cache metrics
export const cacheLookups = new client.Counter({
  name: 'quotebot_cache_lookups_total',
  help: 'Quote cache lookups by result (hit, miss, coalesced)',
  labelNames: ['result'],
  registers: [register],
});

export const cacheEntries = new client.Gauge({
  name: 'quotebot_cache_entries',
  help: 'Current number of cached quotes',
  registers: [register],
});

// Provider metrics
export const providerFetches = new client.Counter({
  name: 'quotebot_provider_fetches_total',
  help: 'Market data provider calls by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export const providerFetchDuration = new client.Histogram({
  name: 'quotebot_provider_fetch_duration_seconds',
  help: 'Market data provider latency in seconds',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 15],
  registers: [register],
});

// Rate limiting metrics
export const rateLimitRejected = new client.Counter({
  name: 'quotebot_rate_limit_rejected_total',
  help: 'Total number of chat requests rejected due to rate limiting',
  registers: [register],
});

export const trackedSenders = new client.Gauge({
  name: 'quotebot_rate_limit_tracked_senders',
  help: 'Current number of senders with a live rate window',
  registers: [register],
});

// Uptime metric
export const uptimeSeconds = new client.Gauge({
  name: 'quotebot_uptime_seconds',
  help: 'Server uptime in seconds',
  registers: [register],
});

// Helper functions for recording metrics
export function recordHttpRequest(endpoint: string, method: string, status: number): void {
  httpRequestsTotal.labels(endpoint, method, status.toString()).inc();
}

export function recordHttpDuration(endpoint: string, method: string, durationSecs: number): void {
  httpRequestDuration.labels(endpoint, method).observe(durationSecs);
}

export function recordWebhookReceived(event: string, status: string): void {
  webhooksReceived.labels(event, status).inc();
}

export function recordWebhookSignatureFailure(reason: string): void {
  webhookSignatureFailures.labels(reason).inc();
}

export function recordCommand(command: string, status: string): void {
  commandsHandled.labels(command, status).inc();
}

export function recordSendFailure(): void {
  sendFailures.inc();
}

export function recordCacheLookup(result: 'hit' | 'miss' | 'coalesced'): void {
  cacheLookups.labels(result).inc();
}

export function setCacheEntries(count: number): void {
  cacheEntries.set(count);
}

export function recordProviderFetch(outcome: string, durationSecs: number): void {
  providerFetches.labels(outcome).inc();
  providerFetchDuration.observe(durationSecs);
}

export function recordRateLimitRejected(): void {
  rateLimitRejected.inc();
}

export function setTrackedSenders(count: number): void {
  trackedSenders.set(count);
}

export function setUptimeSeconds(seconds: number): void {
  uptimeSeconds.set(seconds);
}

// Get all metrics as Prometheus text format
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

// Get content type for Prometheus
export function getContentType(): string {
  return register.contentType;
}
