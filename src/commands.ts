import { Command } from './types';

export interface CommandOptions {
  quotePrefix: string;
  indexCommand: string;
  helpCommand: string;
  /** Provider suffix users sometimes type after the ticker, e.g. ".JK" */
  symbolSuffix: string;
}

const TICKER_PATTERN = /^[A-Z0-9]+$/;

/**
 * Classify an inbound chat message.
 *
 * Keywords are compared exactly (trimmed, case-insensitive). A quote request
 * is the first word starting with the quote prefix; anything after that word
 * is ignored.
 */
export function parseCommand(text: string, options: CommandOptions): Command {
  const cleaned = text.trim();
  const lower = cleaned.toLowerCase();

  if (lower === options.helpCommand.toLowerCase()) {
    return { type: 'help' };
  }

  if (lower === options.indexCommand.toLowerCase()) {
    return { type: 'index' };
  }

  const [token] = cleaned.split(/\s+/);
  if (!token.startsWith(options.quotePrefix)) {
    return { type: 'unrecognized' };
  }

  let symbol = token.slice(options.quotePrefix.length).toUpperCase();
  const suffix = options.symbolSuffix.toUpperCase();
  if (suffix && symbol.endsWith(suffix)) {
    symbol = symbol.slice(0, -suffix.length);
  }

  if (!TICKER_PATTERN.test(symbol)) {
    return { type: 'unrecognized' };
  }

  return { type: 'quote', symbol };
}
