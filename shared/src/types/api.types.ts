/**
 * API request/response types for the WalletGate API.
 */

import type { TransactionStatus, TransactionView } from './transaction.types.js';

/** API error structure */
export interface ApiError {
  readonly code: string;
  readonly message: string;
  readonly details?: unknown;
}

/** Health check response */
export interface HealthCheckResponse {
  readonly status: 'healthy' | 'degraded' | 'unhealthy';
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly services: ServiceHealthMap;
}

/** Individual service health */
export interface ServiceHealth {
  readonly status: 'up' | 'down';
  readonly latencyMs?: number;
}

export interface ServiceHealthMap {
  readonly postgres: ServiceHealth;
  readonly redis: ServiceHealth;
}

export interface SignInResponse {
  readonly userId: string;
  readonly email: string;
  readonly name: string | null;
  readonly accessToken: string;
  readonly tokenType: 'bearer';
  readonly expiresIn: number;
}

export interface IssuedApiKeyResponse {
  readonly apiKey: string;
  readonly keyId: string;
  readonly expiresAt: string;
}

export interface InitiatePaymentResponse {
  readonly reference: string;
  readonly authorizationUrl: string | null;
  readonly amount: number;
  readonly status: TransactionStatus;
}

export type WebhookOutcome = 'applied' | 'already_applied' | 'ignored' | 'unknown_reference';

/** Acknowledgement returned to the payment provider */
export interface WebhookAck {
  readonly received: true;
  readonly outcome: WebhookOutcome;
}

export interface TransferResponse {
  readonly reference: string;
  readonly amount: number;
  readonly balance: number;
}

export interface BalanceResponse {
  readonly balance: number;
}

export interface TransactionListResponse {
  readonly transactions: readonly TransactionView[];
}
