/**
 * Webhook signature verification
 * The processor signs the raw request body with HMAC-SHA512 (hex).
 */

import crypto from 'crypto';
import { SignatureInvalidError } from '../common/errors.js';

export function computeWebhookSignature(rawBody: Buffer, secret: string): string {
  return crypto.createHmac('sha512', secret).update(rawBody).digest('hex');
}

/**
 * Throws SignatureInvalidError unless `signature` is the HMAC of exactly these bytes.
 * Runs before the body is parsed; nothing in an unverified payload is trusted.
 */
export function verifyWebhookSignature(rawBody: Buffer, signature: string | undefined, secret: string): void {
  if (!signature) {
    throw new SignatureInvalidError('Missing webhook signature');
  }
  if (!secret) {
    throw new SignatureInvalidError('Webhook secret is not configured');
  }

  const expected = Buffer.from(computeWebhookSignature(rawBody, secret), 'utf8');
  const presented = Buffer.from(signature.trim().toLowerCase(), 'utf8');

  if (expected.length !== presented.length || !crypto.timingSafeEqual(expected, presented)) {
    throw new SignatureInvalidError();
  }
}
