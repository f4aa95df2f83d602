/**
 * Google OAuth client
 * Builds the consent URL and exchanges authorization codes for the user's profile.
 */

import { z } from 'zod';
import type { ExternalIdentity } from '@walletgate/shared';
import type { GoogleConfig } from '../../config/index.js';
import { AuthError, ProviderError } from '../../application/common/errors.js';
import type { IdentityBridge } from '../../application/auth/identity-bridge.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('google-client');

const GOOGLE_AUTH_URL = 'https://accounts.google.com/o/oauth2/v2/auth';
const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token';
const GOOGLE_USERINFO_URL = 'https://www.googleapis.com/oauth2/v2/userinfo';
const REQUEST_TIMEOUT_MS = 10000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

const userInfoSchema = z.object({
  id: z.string().min(1),
  email: z.string().email(),
  name: z.string().optional(),
  picture: z.string().optional(),
});

export class GoogleIdentityBridge implements IdentityBridge {
  readonly name = 'google';

  constructor(
    private readonly config: GoogleConfig,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  authorizationUrl(state?: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      response_type: 'code',
      scope: 'openid email profile',
      access_type: 'offline',
      prompt: 'consent',
    });
    if (state) {
      params.set('state', state);
    }
    return `${GOOGLE_AUTH_URL}?${params.toString()}`;
  }

  async exchange(code: string): Promise<ExternalIdentity> {
    const tokenResponse = await this.send(GOOGLE_TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({
        code,
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        redirect_uri: this.config.redirectUri,
        grant_type: 'authorization_code',
      }).toString(),
    });

    if (!tokenResponse.ok) {
      logger.warn({ status: tokenResponse.status }, 'Authorization code refused');
      throw new AuthError('invalid', 'Invalid authorization code');
    }

    const token = tokenResponseSchema.safeParse(await tokenResponse.json());
    if (!token.success) {
      throw new AuthError('invalid', 'Failed to obtain access token');
    }

    const userInfoResponse = await this.send(GOOGLE_USERINFO_URL, {
      method: 'GET',
      headers: { Authorization: `Bearer ${token.data.access_token}` },
    });

    if (!userInfoResponse.ok) {
      throw new ProviderError(this.name, 'Failed to fetch user info from Google', userInfoResponse.status);
    }

    const userInfo = userInfoSchema.safeParse(await userInfoResponse.json());
    if (!userInfo.success) {
      throw new ProviderError(this.name, 'Incomplete user info from Google');
    }

    return {
      externalId: userInfo.data.id,
      email: userInfo.data.email.toLowerCase(),
      name: userInfo.data.name ?? null,
      avatarUrl: userInfo.data.picture ?? null,
    };
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ url, error: message }, 'Google request failed');
      throw new ProviderError(this.name, `Identity provider unreachable: ${message}`);
    }
  }
}
