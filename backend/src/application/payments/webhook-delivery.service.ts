/**
 * Webhook Delivery Log
 * Remembers the digests of deliveries that were already handled so that
 * provider redeliveries are acknowledged without touching PostgreSQL.
 * The transaction row stays the source of truth: a lost or expired entry
 * only costs one extra locked read.
 */

import crypto from 'crypto';
import { RedisKeys, type RedisCommands } from '../../infrastructure/database/redis.client.js';
import { createLogger } from '../../infrastructure/logging/logger.js';

const logger = createLogger('webhook-delivery');

// Deliveries are remembered for a day; providers stop retrying well before that
const DELIVERY_TTL_SECONDS = 24 * 60 * 60;

export interface WebhookDeliveryLog {
  seen(digest: string): Promise<boolean>;
  record(digest: string): Promise<void>;
}

/**
 * Generate a deterministic digest for a raw webhook body
 */
export function deliveryDigest(rawBody: Buffer): string {
  return crypto.createHash('sha256').update(rawBody).digest('hex');
}

export class RedisWebhookDeliveryLog implements WebhookDeliveryLog {
  constructor(private readonly redis: RedisCommands) {}

  async seen(digest: string): Promise<boolean> {
    try {
      return (await this.redis.get(RedisKeys.webhookDelivery(digest))) !== null;
    } catch (error) {
      logger.warn({
        error: error instanceof Error ? error.message : String(error),
        digest: digest.substring(0, 8),
      }, 'Delivery log unavailable, falling back to store');
      return false;
    }
  }

  async record(digest: string): Promise<void> {
    try {
      await this.redis.set(RedisKeys.webhookDelivery(digest), Date.now().toString(), 'EX', DELIVERY_TTL_SECONDS);
    } catch (error) {
      logger.warn({
        error: error instanceof Error ? error.message : String(error),
        digest: digest.substring(0, 8),
      }, 'Failed to record webhook delivery');
    }
  }
}
