/**
 * Authentication Service
 * Signs users in through the identity provider and mints session tokens.
 */

import type { User } from '@walletgate/shared';
import type { CredentialStore } from '../../infrastructure/database/credential.store.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import { systemClock, type Clock } from '../common/clock.js';
import { NotFoundError, ValidationError } from '../common/errors.js';
import { retryRead } from '../common/retry.utils.js';
import type { IdentityBridge } from './identity-bridge.js';
import type { TokenService } from './jwt.service.js';

const logger = createLogger('auth-service');

export interface SignInResult {
  user: User;
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  expiresAt: Date;
}

export class AuthService {
  constructor(
    private readonly identityBridge: IdentityBridge,
    private readonly store: CredentialStore,
    private readonly tokens: TokenService,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Consent page URL for the identity provider
   */
  authorizationUrl(state?: string): string {
    return this.identityBridge.authorizationUrl(state);
  }

  /**
   * Exchanges the authorization code, creates or refreshes the user and issues a token
   */
  async signIn(code: string): Promise<SignInResult> {
    if (!code.trim()) {
      throw new ValidationError('Missing authorization code');
    }

    const identity = await this.identityBridge.exchange(code);
    const user = await this.store.upsertUserByExternalId(identity, this.clock());
    const issued = this.tokens.issue({ userId: user.id, email: user.email });

    logger.info({ userId: user.id, provider: this.identityBridge.name }, 'User authenticated successfully');

    return {
      user,
      accessToken: issued.token,
      tokenType: 'bearer',
      expiresIn: this.tokens.tokenTtlSeconds,
      expiresAt: issued.expiresAt,
    };
  }

  async getUser(userId: string): Promise<User> {
    const user = await retryRead(() => this.store.findUserById(userId), 'findUserById');
    if (!user) {
      throw new NotFoundError('User', { userId });
    }
    return user;
  }
}
