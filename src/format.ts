import { QuoteResult, SupportResistance } from './types';

export interface FormatOptions {
  timeZone: string;
  signature: string;
}

export interface HelpOptions {
  quotePrefix: string;
  indexCommand: string;
  helpCommand: string;
  indexName: string;
  interval: string;
}

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const decimalFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatNumber(value: number | null): string {
  if (value === null || Number.isNaN(value)) {
    return '-';
  }
  return Number.isInteger(value) ? integerFormat.format(value) : decimalFormat.format(value);
}

export function formatChange(change: number | null, pct: number | null): string {
  if (change === null || pct === null) {
    return '-';
  }
  const sign = change >= 0 ? '+' : '';
  return `${sign}${formatNumber(change)} (${sign}${pct.toFixed(2)}%)`;
}

/** `YYYY-MM-DD HH:mm:ss` in the given zone */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '00';

  return `${part('year')}-${part('month')}-${part('day')} ${part('hour')}:${part('minute')}:${part('second')}`;
}

function levelLines(title: string, levels: SupportResistance, options: FormatOptions): string[] {
  return [
    `📊 SUPPORT & RESISTANCE — ${title} (1 Day)`,
    '',
    '🔻 Support',
    `S1: ${formatNumber(levels.s1)}`,
    `S2: ${formatNumber(levels.s2)}`,
    `S3: ${formatNumber(levels.s3)}`,
    '',
    '🔺 Resistance',
    `R1: ${formatNumber(levels.r1)}`,
    `R2: ${formatNumber(levels.r2)}`,
    `R3: ${formatNumber(levels.r3)}`,
    '',
    `⏱ ${formatTimestamp(levels.basis, options.timeZone)}`,
    options.signature,
  ];
}

function renderQuote(header: string, title: string, quote: QuoteResult, options: FormatOptions): string {
  const lines = [
    header,
    `Close: ${formatNumber(quote.close)}`,
    `Change: ${formatChange(quote.change, quote.changePercent)}`,
    `O/H/L: ${formatNumber(quote.open)} / ${formatNumber(quote.high)} / ${formatNumber(quote.low)}`,
    `Volume: ${formatNumber(quote.volume)}`,
    `Time: ${formatTimestamp(quote.timestamp, options.timeZone)}`,
  ];

  if (quote.levels) {
    lines.push('', ...levelLines(title, quote.levels, options));
  }

  return lines.join('\n');
}

export function formatQuote(quote: QuoteResult, options: FormatOptions): string {
  return renderQuote(`${quote.symbol} (${quote.market})`, quote.symbol, quote, options);
}

/** Same layout as a quote, headed by the index's display name instead of the provider symbol */
export function formatIndex(quote: QuoteResult, indexName: string, options: FormatOptions): string {
  return renderQuote(`${indexName} (${quote.market})`, indexName, quote, options);
}

export function formatHelp(options: HelpOptions): string {
  const label = options.interval.toUpperCase();
  return [
    'Panduan cepat:',
    `1) Kirim kode saham dengan format: ${options.quotePrefix}KODE (contoh: ${options.quotePrefix}BBCA)`,
    `2) Lihat ${options.indexName}: ${options.indexCommand}`,
    `3) Lihat bantuan: ${options.helpCommand}`,
    '',
    'Catatan:',
    `- Data timeframe ${label}`,
    '- Output S/R berbasis pivot harian',
  ].join('\n');
}

export function formatRateLimited(retryAfterMs: number): string {
  const seconds = Math.max(1, Math.ceil(retryAfterMs / 1000));
  return `Mohon tunggu ${seconds} detik sebelum request lagi.`;
}

export const SYMBOL_NOT_FOUND_TEXT = 'Data tidak tersedia untuk simbol tersebut.';
export const UNAVAILABLE_TEXT = 'Data tidak tersedia saat ini. Coba lagi nanti.';

/** Append the signature line unless the text already ends with it */
export function withSignature(text: string, signature: string): string {
  const trimmed = text.trimEnd();
  if (!signature || trimmed.endsWith(signature)) {
    return trimmed;
  }
  return `${trimmed}\n\n${signature}`;
}
