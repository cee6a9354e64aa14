export type FetchErrorReason =
  | 'symbol-not-found'
  | 'timeout'
  | 'auth-failure'
  | 'malformed-response'
  | 'unavailable';

/** Any failure while talking to the market data provider */
export class FetchError extends Error {
  readonly reason: FetchErrorReason;

  constructor(reason: FetchErrorReason, message: string) {
    super(message);
    this.name = 'FetchError';
    this.reason = reason;
  }
}

/** The gateway was unreachable or rejected an outbound message */
export class SendError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'SendError';
    this.status = status;
  }
}

/** Inbound webhook body did not match any known message shape */
export class WebhookParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WebhookParseError';
  }
}

/** True for the rejection fetch produces when its AbortSignal fires */
export function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}
