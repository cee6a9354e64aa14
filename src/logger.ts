import pino from 'pino';

type LogMeta = Record<string, unknown>;

/**
 * Level named by LOG_LEVEL, or `info` when unset or not a pino level.
 * Config validation reports the bad value once the logger exists.
 */
export function resolveLevel(value: string | undefined): string {
  const level = (value || 'info').toLowerCase();
  return level in pino.levels.values ? level : 'info';
}

const base = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  base: { service: 'idx-quote-relay' },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['password', 'apiKey', 'hmacKey', 'authorization', 'credentials'],
    remove: true,
  },
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
  },
});

/**
 * Application logger. Call sites pass the message first and structured
 * fields second: `logger.info('Reply sent', { chatId })`.
 */
export const logger = {
  debug(message: string, meta: LogMeta = {}): void {
    base.debug(meta, message);
  },
  info(message: string, meta: LogMeta = {}): void {
    base.info(meta, message);
  },
  warn(message: string, meta: LogMeta = {}): void {
    base.warn(meta, message);
  },
  error(message: string, meta: LogMeta = {}): void {
    base.error(meta, message);
  },
  setLevel(level: string): void {
    base.level = level;
  },
};

export default logger;
