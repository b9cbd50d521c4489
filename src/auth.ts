import { VaultApi } from './client';
import { VaultAuthConfig, VaultToken } from './types';

/** Exchanges credential material for a session token. */
export interface VaultAuthenticator {
  readonly method: VaultAuthConfig['method'];
  login(client: VaultApi, previous?: VaultToken): Promise<VaultToken>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expiryFrom(ttlSeconds: unknown, now: number): number | undefined {
  if (typeof ttlSeconds !== 'number' || ttlSeconds <= 0) {
    return undefined;
  }
  return now + ttlSeconds * 1000;
}

/** Reads the `auth` block returned by login and renew endpoints. */
export function tokenFromAuthResponse(
  response: unknown,
  now: number,
): VaultToken {
  const auth = isRecord(response) ? response.auth : undefined;
  if (!isRecord(auth) || typeof auth.client_token !== 'string') {
    throw new Error('Vault login response carried no client token');
  }
  return {
    value: auth.client_token,
    expiresAt: expiryFrom(auth.lease_duration, now),
    renewable: auth.renewable === true,
  };
}

class StaticTokenAuthenticator implements VaultAuthenticator {
  readonly method = 'token' as const;

  constructor(
    private readonly token: string,
    private readonly now: () => number,
  ) {}

  async login(client: VaultApi, previous?: VaultToken): Promise<VaultToken> {
    if (previous?.renewable) {
      const response: unknown = await client.tokenRenewSelf();
      return tokenFromAuthResponse(response, this.now());
    }
    // A static token cannot be re-issued, only checked.
    const response: unknown = await client.tokenLookupSelf();
    const data = isRecord(response) ? response.data : undefined;
    if (!isRecord(data)) {
      throw new Error('Vault token lookup returned no data');
    }
    return {
      value: this.token,
      expiresAt: expiryFrom(data.ttl, this.now()),
      renewable: data.renewable === true,
    };
  }
}

class CertAuthenticator implements VaultAuthenticator {
  readonly method = 'cert' as const;

  constructor(
    private readonly mount: string,
    private readonly role: string | undefined,
    private readonly now: () => number,
  ) {}

  async login(client: VaultApi): Promise<VaultToken> {
    // The client certificate itself travels in the TLS handshake.
    const response: unknown = await client.write(
      `auth/${this.mount}/login`,
      this.role ? { name: this.role } : {},
    );
    return tokenFromAuthResponse(response, this.now());
  }
}

class AppRoleAuthenticator implements VaultAuthenticator {
  readonly method = 'approle' as const;

  constructor(
    private readonly mount: string,
    private readonly roleId: string,
    private readonly secretId: string,
    private readonly now: () => number,
  ) {}

  async login(client: VaultApi): Promise<VaultToken> {
    // Not approleLogin(): client.token is only ever set by the session
    const response: unknown = await client.write(`auth/${this.mount}/login`, {
      role_id: this.roleId,
      secret_id: this.secretId,
    });
    return tokenFromAuthResponse(response, this.now());
  }
}

export function createAuthenticator(
  auth: VaultAuthConfig,
  now: () => number = Date.now,
): VaultAuthenticator {
  switch (auth.method) {
    case 'token':
      return new StaticTokenAuthenticator(auth.token, now);
    case 'cert':
      return new CertAuthenticator(auth.mount, auth.role, now);
    case 'approle':
      return new AppRoleAuthenticator(
        auth.mount,
        auth.roleId,
        auth.secretId,
        now,
      );
    default:
      throw new Error('Unsupported Vault auth method');
  }
}
