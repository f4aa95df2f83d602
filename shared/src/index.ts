// Shared types and constants for the WalletGate service

export {
  type UserId,
  type User,
  type ExternalIdentity,
  type ApiKey,
  type ApiKeySummary,
  type ApiKeyPermission,
  type ApiKeyExpiry,
  API_KEY_PERMISSIONS,
  API_KEY_EXPIRY_OPTIONS,
} from './types/user.types.js';

export {
  type Transaction,
  type TransactionView,
  type TransactionStatus,
  type TerminalStatus,
  type TransactionKind,
  TRANSACTION_STATUSES,
  TRANSACTION_KINDS,
  isTerminalStatus,
} from './types/transaction.types.js';

export {
  type ApiError,
  type HealthCheckResponse,
  type ServiceHealth,
  type ServiceHealthMap,
  type SignInResponse,
  type IssuedApiKeyResponse,
  type InitiatePaymentResponse,
  type WebhookOutcome,
  type WebhookAck,
  type TransferResponse,
  type BalanceResponse,
  type TransactionListResponse,
} from './types/api.types.js';
