import { API_KEY_PERMISSIONS, type ApiKeyPermission } from '@walletgate/shared';

/** The caller behind a request, however it authenticated */
export interface Principal {
  readonly userId: string;
  readonly email: string;
  readonly credential: 'token' | 'api_key';
  readonly keyId: string | null;
  readonly permissions: readonly ApiKeyPermission[];
}

/** Session tokens act for the user directly and carry every permission */
export function tokenPrincipal(userId: string, email: string): Principal {
  return {
    userId,
    email,
    credential: 'token',
    keyId: null,
    permissions: API_KEY_PERMISSIONS,
  };
}
