import type { ExternalIdentity } from '@walletgate/shared';

/**
 * Identity Bridge contract
 * Exchanges an OAuth authorization code for a verified identity.
 */
export interface IdentityBridge {
  readonly name: string;
  /** Consent page the client should be sent to */
  authorizationUrl(state?: string): string;
  /** Throws AuthError('invalid') for a refused code, ProviderError for upstream failures */
  exchange(code: string): Promise<ExternalIdentity>;
}
