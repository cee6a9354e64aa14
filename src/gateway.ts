import { SendError, isAbortError } from './errors';
import logger from './logger';

/** Outbound side of the messaging gateway */
export interface MessageGateway {
  sendText(chatId: string, text: string): Promise<void>;
}

export interface GatewayClientOptions {
  baseUrl: string;
  session: string;
  apiKey?: string;
  timeoutMs: number;
}

/** Client for a WAHA-compatible gateway's send-message API */
export class GatewayClient implements MessageGateway {
  private readonly baseUrl: string;
  private readonly session: string;
  private readonly apiKey?: string;
  private readonly timeoutMs: number;

  constructor(options: GatewayClientOptions) {
    this.baseUrl = options.baseUrl;
    this.session = options.session;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * POST /api/sendText. Throws SendError when the gateway is unreachable or
   * answers with a non-success status; there is no retry.
   */
  async sendText(chatId: string, text: string): Promise<void> {
    const url = `${this.baseUrl}/api/sendText`;
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.apiKey) {
      headers['X-Api-Key'] = this.apiKey;
      headers['Authorization'] = `Bearer ${this.apiKey}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method: 'POST',
          headers,
          body: JSON.stringify({ chatId, text, session: this.session }),
          signal: controller.signal,
        });
      } catch (error) {
        if (isAbortError(error)) {
          throw new SendError(`Gateway timed out after ${this.timeoutMs}ms`);
        }
        throw new SendError(`Gateway unreachable: ${String(error)}`);
      }

      if (!response.ok) {
        const body = await response.text();
        throw new SendError(`non-success status ${response.status}: ${body}`, response.status);
      }

      logger.debug('Message sent', { chatId, length: text.length });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
