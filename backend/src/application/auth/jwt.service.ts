/**
 * JWT Service
 * Issues and verifies HS256 session tokens. Stateless: expiry is the only
 * invalidation, short of rotating the secret.
 */

import crypto from 'crypto';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { AuthError } from '../common/errors.js';
import { systemClock, type Clock } from '../common/clock.js';

const logger = createLogger('jwt-service');

export interface JWTPayload {
  userId: string;
  email: string;
}

interface JWTHeader {
  alg: string;
  typ: string;
}

interface JWTClaims {
  sub: string;
  email: string;
  iat: number;
  exp: number;
}

export interface TokenServiceOptions {
  secret: string;
  ttlSeconds: number;
  clock?: Clock;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

const HEADER: JWTHeader = { alg: 'HS256', typ: 'JWT' };

/**
 * Base64Url encode
 */
function base64UrlEncode(data: string): string {
  return Buffer.from(data).toString('base64url');
}

/**
 * Base64Url decode
 */
function base64UrlDecode(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isClaims(value: unknown): value is JWTClaims {
  return (
    isRecord(value) &&
    typeof value['sub'] === 'string' &&
    typeof value['email'] === 'string' &&
    typeof value['iat'] === 'number' &&
    typeof value['exp'] === 'number'
  );
}

export class TokenService {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly clock: Clock;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('TokenService requires a signing secret');
    }
    this.secret = options.secret;
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? systemClock;
  }

  get tokenTtlSeconds(): number {
    return this.ttlSeconds;
  }

  /**
   * Generate a signed token for the given identity
   */
  issue(identity: JWTPayload): IssuedToken {
    const now = Math.floor(this.clock().getTime() / 1000);
    const claims: JWTClaims = {
      sub: identity.userId,
      email: identity.email,
      iat: now,
      exp: now + this.ttlSeconds,
    };

    const encodedHeader = base64UrlEncode(JSON.stringify(HEADER));
    const encodedPayload = base64UrlEncode(JSON.stringify(claims));
    const signature = this.sign(`${encodedHeader}.${encodedPayload}`);

    return {
      token: `${encodedHeader}.${encodedPayload}.${signature}`,
      expiresAt: new Date(claims.exp * 1000),
    };
  }

  /**
   * Verify and decode a token.
   * Throws AuthError('invalid') for anything malformed or forged, AuthError('expired') past `exp`.
   */
  verify(token: string): JWTPayload {
    const parts = token.split('.');
    if (parts.length !== 3) {
      logger.debug('Invalid JWT format');
      throw new AuthError('invalid', 'Malformed token');
    }

    const [encodedHeader, encodedPayload, signature] = parts;
    if (!encodedHeader || !encodedPayload || !signature) {
      throw new AuthError('invalid', 'Malformed token');
    }

    const expected = Buffer.from(this.sign(`${encodedHeader}.${encodedPayload}`));
    const presented = Buffer.from(signature);
    if (expected.length !== presented.length || !crypto.timingSafeEqual(expected, presented)) {
      logger.debug('Invalid JWT signature');
      throw new AuthError('invalid', 'Invalid token signature');
    }

    let header: unknown;
    let claims: unknown;
    try {
      header = JSON.parse(base64UrlDecode(encodedHeader));
      claims = JSON.parse(base64UrlDecode(encodedPayload));
    } catch (error) {
      logger.debug({ error }, 'JWT payload is not JSON');
      throw new AuthError('invalid', 'Malformed token payload');
    }

    if (!isRecord(header) || header['alg'] !== HEADER.alg) {
      throw new AuthError('invalid', 'Unsupported token algorithm');
    }
    if (!isClaims(claims)) {
      throw new AuthError('invalid', 'Malformed token payload');
    }

    const now = Math.floor(this.clock().getTime() / 1000);
    if (now >= claims.exp) {
      logger.debug({ exp: claims.exp, now }, 'JWT expired');
      throw new AuthError('expired', 'Token has expired');
    }

    return { userId: claims.sub, email: claims.email };
  }

  /**
   * Create HMAC-SHA256 signature
   */
  private sign(data: string): string {
    return crypto.createHmac('sha256', this.secret).update(data).digest('base64url');
  }
}

/**
 * Extract token from Authorization header
 */
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader?.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.slice(7).trim();
  return token.length > 0 ? token : null;
}
