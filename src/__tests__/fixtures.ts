import { QuoteResult } from '../types';

/** Quote matching the documented reply layout */
export function makeQuote(overrides: Partial<QuoteResult> = {}): QuoteResult {
  return {
    symbol: 'BBCA',
    market: 'IDX',
    open: 7550,
    high: 7550,
    low: 7525,
    close: 7525,
    change: -25,
    changePercent: -0.33,
    volume: 146800,
    timestamp: new Date('2025-01-10T09:00:00Z'),
    levels: {
      s1: 7450,
      s2: 7200,
      s3: 6980,
      r1: 7820,
      r2: 8050,
      r3: 8320,
      basis: new Date('2025-01-09T00:00:00Z'),
    },
    ...overrides,
  };
}
