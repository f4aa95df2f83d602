/**
 * Unit Tests: Token Service
 */

import crypto from 'crypto';
import { describe, it, expect, beforeEach } from 'vitest';
import { TokenService, extractBearerToken } from '../../application/auth/jwt.service.js';
import { AuthError } from '../../application/common/errors.js';
import { TestClock, TEST_JWT_SECRET } from '../mocks/services.mock.js';

function decodeSegment(segment: string | undefined): unknown {
  return JSON.parse(Buffer.from(segment ?? '', 'base64url').toString('utf-8'));
}

function signWith(secret: string, data: string): string {
  return crypto.createHmac('sha256', secret).update(data).digest('base64url');
}

function captureAuthError(fn: () => unknown): AuthError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AuthError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an AuthError');
}

describe('TokenService', () => {
  let clock: TestClock;
  let tokens: TokenService;

  beforeEach(() => {
    clock = new TestClock('2026-03-01T12:00:00.000Z');
    tokens = new TokenService({ secret: TEST_JWT_SECRET, ttlSeconds: 1800, clock: clock.now });
  });

  it('should issue a three-part token with sub, email, iat and exp claims', () => {
    const { token, expiresAt } = tokens.issue({ userId: 'user-1', email: 'ada@example.com' });
    const [header, payload, signature] = token.split('.');

    const iat = Date.parse('2026-03-01T12:00:00.000Z') / 1000;
    expect(decodeSegment(header)).toEqual({ alg: 'HS256', typ: 'JWT' });
    expect(decodeSegment(payload)).toEqual({ sub: 'user-1', email: 'ada@example.com', iat, exp: iat + 1800 });
    expect(signature).toBe(signWith(TEST_JWT_SECRET, `${header}.${payload}`));
    expect(expiresAt.toISOString()).toBe('2026-03-01T12:30:00.000Z');
  });

  it('should verify its own tokens', () => {
    const { token } = tokens.issue({ userId: 'user-1', email: 'ada@example.com' });

    expect(tokens.verify(token)).toEqual({ userId: 'user-1', email: 'ada@example.com' });
  });

  it('should accept a token one second before expiry', () => {
    const { token } = tokens.issue({ userId: 'user-1', email: 'ada@example.com' });
    clock.advance(1799 * 1000);

    expect(tokens.verify(token).userId).toBe('user-1');
  });

  it('should reject a token at its expiry instant as expired', () => {
    const { token } = tokens.issue({ userId: 'user-1', email: 'ada@example.com' });
    clock.advance(1800 * 1000);

    const error = captureAuthError(() => tokens.verify(token));
    expect(error.reason).toBe('expired');
    expect(error.code).toBe('TOKEN_EXPIRED');
    expect(error.statusCode).toBe(401);
  });

  it('should reject a token whose payload was altered', () => {
    const { token } = tokens.issue({ userId: 'user-1', email: 'ada@example.com' });
    const [header, , signature] = token.split('.');
    const forged = Buffer.from(JSON.stringify({ sub: 'user-2', email: 'eve@example.com', iat: 0, exp: 9999999999 }))
      .toString('base64url');

    const error = captureAuthError(() => tokens.verify(`${header}.${forged}.${signature}`));
    expect(error.reason).toBe('invalid');
    expect(error.code).toBe('TOKEN_INVALID');
  });

  it('should reject a token signed with another secret', () => {
    const other = new TokenService({ secret: 'other-secret', ttlSeconds: 1800, clock: clock.now });
    const { token } = other.issue({ userId: 'user-1', email: 'ada@example.com' });

    const error = captureAuthError(() => tokens.verify(token));
    expect(error.message).toBe('Invalid token signature');
  });

  it('should reject tokens that do not have three segments', () => {
    const error = captureAuthError(() => tokens.verify('not-a-token'));
    expect(error.message).toBe('Malformed token');
  });

  it('should reject a correctly signed token that declares another algorithm', () => {
    const { token } = tokens.issue({ userId: 'user-1', email: 'ada@example.com' });
    const [, payload] = token.split('.');
    const header = Buffer.from(JSON.stringify({ alg: 'none', typ: 'JWT' })).toString('base64url');
    const signature = signWith(TEST_JWT_SECRET, `${header}.${payload}`);

    const error = captureAuthError(() => tokens.verify(`${header}.${payload}.${signature}`));
    expect(error.message).toBe('Unsupported token algorithm');
  });

  it('should reject a correctly signed token with missing claims', () => {
    const header = Buffer.from(JSON.stringify({ alg: 'HS256', typ: 'JWT' })).toString('base64url');
    const payload = Buffer.from(JSON.stringify({ sub: 'user-1' })).toString('base64url');
    const signature = signWith(TEST_JWT_SECRET, `${header}.${payload}`);

    const error = captureAuthError(() => tokens.verify(`${header}.${payload}.${signature}`));
    expect(error.message).toBe('Malformed token payload');
  });

  it('should refuse to start without a secret', () => {
    expect(() => new TokenService({ secret: '', ttlSeconds: 1800 })).toThrow('TokenService requires a signing secret');
  });

  it('should expose the configured lifetime', () => {
    expect(tokens.tokenTtlSeconds).toBe(1800);
  });
});

describe('extractBearerToken', () => {
  it('should return the token from a Bearer header', () => {
    expect(extractBearerToken('Bearer abc.def.ghi')).toBe('abc.def.ghi');
  });

  it('should return null for other schemes and empty values', () => {
    expect(extractBearerToken(undefined)).toBeNull();
    expect(extractBearerToken('Basic dXNlcjpwYXNz')).toBeNull();
    expect(extractBearerToken('Bearer   ')).toBeNull();
  });
});
