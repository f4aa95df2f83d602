/**
 * JSON Schemas shared by the route plugins (Swagger + response serialization)
 */

export const errorResponseSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean' },
    error: {
      type: 'object',
      properties: {
        code: { type: 'string' },
        message: { type: 'string' },
        details: { type: 'object', additionalProperties: true },
      },
    },
  },
} as const;

/** Wraps a data schema in the `{ success, data }` envelope */
export function envelope<T extends object>(data: T) {
  return {
    type: 'object',
    properties: {
      success: { type: 'boolean' },
      data,
    },
  } as const;
}

export const nullableDateTime = { type: ['string', 'null'], format: 'date-time' } as const;

export const transactionViewSchema = {
  type: 'object',
  properties: {
    reference: { type: 'string' },
    kind: { type: 'string', enum: ['payment', 'deposit', 'transfer'] },
    status: { type: 'string', enum: ['pending', 'success', 'failed'] },
    amount: { type: 'integer', description: 'Amount in minor units' },
    paidAt: nullableDateTime,
    createdAt: { type: 'string', format: 'date-time' },
  },
} as const;

export const apiKeySummarySchema = {
  type: 'object',
  properties: {
    id: { type: 'string' },
    name: { type: 'string' },
    permissions: { type: 'array', items: { type: 'string' } },
    expiresAt: { type: 'string', format: 'date-time' },
    active: { type: 'boolean' },
    createdAt: { type: 'string', format: 'date-time' },
    revokedAt: nullableDateTime,
    lastUsedAt: nullableDateTime,
  },
} as const;

export const issuedKeySchema = {
  type: 'object',
  properties: {
    apiKey: { type: 'string', description: 'The generated API key (save it, shown only once)' },
    keyId: { type: 'string' },
    expiresAt: { type: 'string', format: 'date-time' },
  },
} as const;

export const bearerSecurity = [{ bearerAuth: [] }];
export const bearerOrKeySecurity: Array<Record<string, string[]>> = [{ bearerAuth: [] }, { apiKey: [] }];

export const initiateResponseSchema = {
  type: 'object',
  properties: {
    reference: { type: 'string' },
    authorizationUrl: { type: ['string', 'null'], description: 'Checkout page to send the payer to' },
    amount: { type: 'integer' },
    status: { type: 'string', enum: ['pending', 'success', 'failed'] },
  },
} as const;

export const initiateBodySchema = {
  type: 'object',
  required: ['amount'],
  properties: {
    amount: { description: 'Positive integer amount in minor units (kobo)' },
    reference: { type: 'string', description: 'Optional idempotency reference; resubmitting it returns the original transaction' },
  },
} as const;
