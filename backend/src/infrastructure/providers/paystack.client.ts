/**
 * Paystack HTTP client
 * Initializes charges and verifies them by reference.
 * Amounts are sent in minor units (kobo), as Paystack expects.
 */

import { z } from 'zod';
import type { PaystackConfig } from '../../config/index.js';
import { ProviderError } from '../../application/common/errors.js';
import {
  mapProviderStatus,
  type ChargeStatusReport,
  type InitializeChargeInput,
  type InitializedCharge,
  type PaymentProvider,
} from '../../application/payments/payment-provider.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('paystack-client');

const PROVIDER_NAME = 'paystack';

const envelopeSchema = z.object({
  status: z.boolean(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

const initializeDataSchema = z.object({
  authorization_url: z.string().url(),
  access_code: z.string().optional(),
  reference: z.string(),
});

const verifyDataSchema = z.object({
  reference: z.string(),
  status: z.string(),
  amount: z.number().int(),
  paid_at: z.string().nullable().optional(),
});

export class PaystackClient implements PaymentProvider {
  readonly name = PROVIDER_NAME;

  constructor(
    private readonly config: PaystackConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async initialize(input: InitializeChargeInput): Promise<InitializedCharge> {
    const data = await this.request('/transaction/initialize', {
      method: 'POST',
      body: JSON.stringify({
        amount: input.amount,
        email: input.email,
        reference: input.reference,
        currency: this.config.currency,
      }),
    });

    const parsed = initializeDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(PROVIDER_NAME, 'Payment initiation returned an unexpected payload');
    }

    logger.info({ reference: input.reference, amount: input.amount }, 'Charge initialized');
    return { authorizationUrl: parsed.data.authorization_url };
  }

  async query(reference: string): Promise<ChargeStatusReport> {
    const data = await this.request(`/transaction/verify/${encodeURIComponent(reference)}`, { method: 'GET' });

    const parsed = verifyDataSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(PROVIDER_NAME, 'Transaction verification returned an unexpected payload');
    }

    return {
      reference: parsed.data.reference,
      status: mapProviderStatus(parsed.data.status),
      amount: parsed.data.amount,
      paidAt: parsed.data.paid_at ? new Date(parsed.data.paid_at) : null,
    };
  }

  private async request(path: string, init: { method: 'GET' | 'POST'; body?: string }): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}${path}`, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.config.secretKey}`,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ path, error: message }, 'Paystack request failed');
      throw new ProviderError(PROVIDER_NAME, `Payment provider unreachable: ${message}`);
    }

    const text = await response.text();
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      throw new ProviderError(PROVIDER_NAME, `Payment provider returned non-JSON (${response.status}): ${text.slice(0, 200)}`, response.status);
    }

    const envelope = envelopeSchema.safeParse(body);
    if (!response.ok || !envelope.success || !envelope.data.status) {
      const message = envelope.success ? envelope.data.message ?? 'request refused' : 'request refused';
      logger.warn({ path, status: response.status, message }, 'Paystack refused request');
      throw new ProviderError(PROVIDER_NAME, `Payment provider error: ${message}`, response.status);
    }

    return envelope.data.data;
  }
}
