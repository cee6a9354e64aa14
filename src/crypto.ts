import { timingSafeEqual } from 'crypto';
import { hmac } from '@noble/hashes/hmac';
import { sha512 } from '@noble/hashes/sha512';
import { bytesToHex, randomBytes, utf8ToBytes } from '@noble/hashes/utils';

/**
 * Generate a cryptographically random 32-character hex request ID
 */
export function generateRequestId(): string {
  return bytesToHex(randomBytes(16));
}

/**
 * Hex HMAC-SHA512 of a webhook body, as sent by the gateway in X-Webhook-Hmac
 */
export function computeWebhookHmac(key: string, body: Uint8Array): string {
  return bytesToHex(hmac(sha512, utf8ToBytes(key), body));
}

/**
 * Constant-time string comparison to prevent timing attacks
 */
export function secureCompare(a: string, b: string): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return timingSafeEqual(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Verify the gateway's HMAC over the raw request body
 */
export function verifyWebhookHmac(key: string, body: Uint8Array, signature: string): boolean {
  const expected = computeWebhookHmac(key, body);
  return secureCompare(expected, signature.trim().toLowerCase());
}

/**
 * Truncate an identifier for logging
 */
export function truncateId(id: string, length: number = 16): string {
  return id.length > length ? `${id.slice(0, length)}…` : id;
}
