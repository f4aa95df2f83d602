/**
 * Unit Tests: Webhook Signature
 */

import crypto from 'crypto';
import { describe, it, expect } from 'vitest';
import {
  computeWebhookSignature,
  verifyWebhookSignature,
} from '../../application/payments/webhook.signature.js';
import { SignatureInvalidError } from '../../application/common/errors.js';

const SECRET = 'test-webhook-secret';
const body = Buffer.from('{"event":"charge.success","data":{"reference":"txn_1"}}');

describe('Webhook signature', () => {
  it('should compute a hex HMAC-SHA512 of the raw body', () => {
    const expected = crypto.createHmac('sha512', SECRET).update(body).digest('hex');

    expect(computeWebhookSignature(body, SECRET)).toBe(expected);
    expect(expected).toHaveLength(128);
  });

  it('should accept a matching signature', () => {
    expect(() => verifyWebhookSignature(body, computeWebhookSignature(body, SECRET), SECRET)).not.toThrow();
  });

  it('should accept an upper-case signature with surrounding whitespace', () => {
    const signature = ` ${computeWebhookSignature(body, SECRET).toUpperCase()} `;

    expect(() => verifyWebhookSignature(body, signature, SECRET)).not.toThrow();
  });

  it('should reject a missing signature', () => {
    expect(() => verifyWebhookSignature(body, undefined, SECRET)).toThrow('Missing webhook signature');
    expect(() => verifyWebhookSignature(body, '', SECRET)).toThrow('Missing webhook signature');
  });

  it('should reject when no secret is configured', () => {
    expect(() => verifyWebhookSignature(body, 'abc', '')).toThrow('Webhook secret is not configured');
  });

  it('should reject a signature over different bytes', () => {
    const reformatted = Buffer.from('{"event": "charge.success", "data": {"reference": "txn_1"}}');

    expect(() =>
      verifyWebhookSignature(reformatted, computeWebhookSignature(body, SECRET), SECRET)
    ).toThrow(SignatureInvalidError);
  });

  it('should reject a truncated signature', () => {
    const signature = computeWebhookSignature(body, SECRET).slice(0, 64);

    expect(() => verifyWebhookSignature(body, signature, SECRET)).toThrow('Invalid webhook signature');
  });
});
