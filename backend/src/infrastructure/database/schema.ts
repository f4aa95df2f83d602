/**
 * Relational layout: users, api_keys, transactions.
 * Applied idempotently at boot; there is no migration history.
 */

export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS users (
    id UUID PRIMARY KEY,
    external_id TEXT UNIQUE,
    email TEXT NOT NULL UNIQUE,
    name TEXT,
    avatar_url TEXT,
    wallet_balance BIGINT NOT NULL DEFAULT 0 CHECK (wallet_balance >= 0),
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS api_keys (
    id UUID PRIMARY KEY,
    user_id UUID NOT NULL REFERENCES users(id),
    name TEXT NOT NULL,
    key_hash CHAR(64) NOT NULL UNIQUE,
    permissions TEXT[] NOT NULL,
    expires_at TIMESTAMPTZ NOT NULL,
    is_active BOOLEAN NOT NULL DEFAULT TRUE,
    created_at TIMESTAMPTZ NOT NULL,
    revoked_at TIMESTAMPTZ,
    last_used_at TIMESTAMPTZ
  )`,
  `CREATE INDEX IF NOT EXISTS api_keys_user_active_idx ON api_keys (user_id, is_active, expires_at)`,
  `CREATE TABLE IF NOT EXISTS transactions (
    id UUID PRIMARY KEY,
    reference TEXT NOT NULL UNIQUE,
    user_id UUID REFERENCES users(id),
    kind TEXT NOT NULL CHECK (kind IN ('payment', 'deposit', 'transfer')),
    amount BIGINT NOT NULL CHECK (amount > 0),
    status TEXT NOT NULL CHECK (status IN ('pending', 'success', 'failed')),
    authorization_url TEXT,
    counterparty_user_id UUID REFERENCES users(id),
    completed_at TIMESTAMPTZ,
    created_at TIMESTAMPTZ NOT NULL,
    updated_at TIMESTAMPTZ NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS transactions_user_idx ON transactions (user_id, created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS transactions_counterparty_idx ON transactions (counterparty_user_id, created_at DESC)`,
];
