import { z } from 'zod';
import { QuoteInterval } from './config';
import { FetchError, isAbortError } from './errors';
import { computePivotLevels } from './levels';
import logger from './logger';
import * as metrics from './metrics';
import { Bar, Instrument, QuoteResult } from './types';

/** Source of quotes for the webhook handler */
export interface QuoteProvider {
  fetchQuote(instrument: Instrument, interval: QuoteInterval): Promise<QuoteResult>;
}

export interface QuoteClientOptions {
  baseUrl: string;
  timeoutMs: number;
  marketTag: string;
  credentials?: { username: string; password: string };
}

// Provider interval name and the history range requested for it
const INTERVALS: Record<QuoteInterval, { interval: string; range: string }> = {
  '1m': { interval: '1m', range: '1d' },
  '5m': { interval: '5m', range: '5d' },
  '15m': { interval: '15m', range: '5d' },
  '1h': { interval: '60m', range: '1mo' },
  '1d': { interval: '1d', range: '1mo' },
};

const seriesSchema = z.array(z.number().nullable());

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ symbol: z.string() }).passthrough(),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: seriesSchema,
                high: seriesSchema,
                low: seriesSchema,
                close: seriesSchema,
                volume: seriesSchema,
              })
            ),
          }),
        })
      )
      .nullable(),
    error: z
      .object({
        code: z.string().optional(),
        description: z.string().nullish(),
      })
      .nullable(),
  }),
});

type ChartResponse = z.infer<typeof chartResponseSchema>;

/**
 * Map a user ticker to the provider's symbol for it
 */
export function toInstrument(ticker: string, symbolSuffix: string): Instrument {
  return { ticker, providerSymbol: `${ticker}${symbolSuffix}` };
}

/**
 * Turn a chart response into complete bars, oldest first.
 * Rows with any missing OHLCV value (halted sessions, the provider's
 * placeholder for the current minute) or an unrepresentable timestamp are
 * dropped.
 */
export function toBars(response: ChartResponse, symbol: string): Bar[] {
  const { chart } = response;

  if (chart.error !== null) {
    throw new FetchError('symbol-not-found', chart.error.description || `Unknown symbol ${symbol}`);
  }

  const result = chart.result?.[0];
  if (!result) {
    throw new FetchError('symbol-not-found', `No data for ${symbol}`);
  }

  const timestamps = result.timestamp ?? [];
  const series = result.indicators.quote[0];
  if (!series) {
    throw new FetchError('malformed-response', `Missing quote series for ${symbol}`);
  }

  const bars: Bar[] = [];
  let invalidTimes = 0;
  timestamps.forEach((ts, i) => {
    const open = series.open[i];
    const high = series.high[i];
    const low = series.low[i];
    const close = series.close[i];
    const volume = series.volume[i];

    if (open == null || high == null || low == null || close == null || volume == null) {
      return;
    }

    const time = new Date(ts * 1000);
    if (Number.isNaN(time.getTime())) {
      invalidTimes++;
      return;
    }

    bars.push({ time, open, high, low, close, volume });
  });

  if (bars.length === 0) {
    if (invalidTimes > 0) {
      throw new FetchError('malformed-response', `Timestamps out of range for ${symbol}`);
    }
    throw new FetchError('symbol-not-found', `No complete bars for ${symbol}`);
  }

  return bars;
}

/**
 * HTTP client for a chart-style market data API.
 * Without credentials requests go out anonymously; public access is rate
 * limited more aggressively by the provider but is otherwise identical.
 */
export class QuoteClient implements QuoteProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly marketTag: string;
  private readonly authHeader?: string;

  constructor(options: QuoteClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.marketTag = options.marketTag;

    if (options.credentials) {
      const token = Buffer.from(`${options.credentials.username}:${options.credentials.password}`).toString('base64');
      this.authHeader = `Basic ${token}`;
    }
  }

  async fetchQuote(instrument: Instrument, interval: QuoteInterval): Promise<QuoteResult> {
    const symbol = instrument.providerSymbol;

    // Levels always come from daily bars; reuse the quote series when it already is one
    const [bars, daily] = await Promise.all([
      this.fetchBars(symbol, interval),
      interval === '1d'
        ? Promise.resolve(null)
        : this.fetchBars(symbol, '1d').catch((error: unknown) => {
            logger.warn('Daily bars unavailable, replying without levels', {
              symbol,
              error: String(error),
            });
            return [];
          }),
    ]);

    const last = bars[bars.length - 1];
    const change = last.close - last.open;

    return {
      symbol: instrument.ticker,
      market: this.marketTag,
      open: last.open,
      high: last.high,
      low: last.low,
      close: last.close,
      change,
      changePercent: last.open === 0 ? null : (change / last.open) * 100,
      volume: Math.round(last.volume),
      timestamp: last.time,
      levels: computePivotLevels(daily ?? bars),
    };
  }

  /**
   * Fetch complete OHLCV bars for a provider symbol
   */
  async fetchBars(symbol: string, interval: QuoteInterval): Promise<Bar[]> {
    const { interval: providerInterval, range } = INTERVALS[interval];
    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}?interval=${providerInterval}&range=${range}`;

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': 'Mozilla/5.0',
    };
    if (this.authHeader) {
      headers['Authorization'] = this.authHeader;
    }

    logger.debug('Fetching bars from provider', { symbol, interval });

    const start = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, { headers, signal: controller.signal });
      } catch (error) {
        if (isAbortError(error)) {
          throw new FetchError('timeout', `Provider timed out after ${this.timeoutMs}ms`);
        }
        throw new FetchError('unavailable', `Provider unreachable: ${String(error)}`);
      }

      if (response.status === 401 || response.status === 403) {
        throw new FetchError('auth-failure', `Provider rejected credentials (${response.status})`);
      }
      if (response.status === 404) {
        throw new FetchError('symbol-not-found', `Unknown symbol ${symbol}`);
      }
      if (!response.ok) {
        throw new FetchError('unavailable', `Provider returned status ${response.status}`);
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        if (isAbortError(error)) {
          throw new FetchError('timeout', `Provider timed out after ${this.timeoutMs}ms`);
        }
        throw new FetchError('malformed-response', 'Provider returned invalid JSON');
      }

      const parsed = chartResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new FetchError('malformed-response', `Unexpected provider response: ${parsed.error.errors[0].message}`);
      }

      const bars = toBars(parsed.data, symbol);
      metrics.recordProviderFetch('success', (Date.now() - start) / 1000);
      return bars;
    } catch (error) {
      const outcome = error instanceof FetchError ? error.reason : 'unavailable';
      metrics.recordProviderFetch(outcome, (Date.now() - start) / 1000);
      logger.warn('Provider fetch failed', { symbol, interval, reason: outcome, error: String(error) });
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
