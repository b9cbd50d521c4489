import { ConfigReader } from '@backstage/config';
import { JsonObject } from '@backstage/types';
import type { VaultOptions } from 'node-vault';
import { VaultApi, VaultApiFactory } from '../client';

export type FakeOperation =
  | 'read'
  | 'write'
  | 'health'
  | 'login'
  | 'lookup'
  | 'renew';

interface StoredVersion {
  data: Record<string, unknown>;
  createdTime: string;
}

interface IssuedToken {
  expiresAt?: number;
  ttlSeconds: number;
  renewable: boolean;
}

export const TEST_ROLE_ID = 'test-role';
export const TEST_SECRET_ID = 'test-secret';

/** An error shaped like the ones node-vault rejects with. */
export function vaultResponseError(statusCode: number, errors: string[] = []) {
  return Object.assign(
    new Error(errors.length > 0 ? errors.join(', ') : `Status ${statusCode}`),
    { response: { statusCode, body: { errors } } },
  );
}

export function networkError(code: string) {
  return Object.assign(new Error(`request failed: ${code}`), { code });
}

/**
 * In-process stand-in for a Vault server with a KV v2 mount, a KV v1 mount,
 * token, cert and AppRole auth. Its clock only moves when a test moves it.
 */
export class FakeVault {
  now = 1_700_000_000_000;
  tokenTtlSeconds = 3600;
  renewableTokens = false;
  certLoginAllowed = true;
  health: JsonObject = {
    initialized: true,
    sealed: false,
    standby: false,
    version: '1.15.0',
    cluster_name: 'test-cluster',
  };

  readonly kv = new Map<string, StoredVersion[]>();
  readonly legacy = new Map<string, Record<string, unknown>>();
  readonly factoryCalls: VaultOptions[] = [];
  readonly loginPaths: string[] = [];
  readonly callCounts: Record<FakeOperation, number> = {
    read: 0,
    write: 0,
    health: 0,
    login: 0,
    lookup: 0,
    renew: 0,
  };

  private readonly tokens = new Map<string, IssuedToken>();
  private readonly failures: Array<{
    operation: FakeOperation;
    error?: unknown;
  }> = [];
  private tokenCounter = 0;

  constructor(
    readonly kvMount = 'secret',
    readonly legacyMount = 'kv',
  ) {}

  readonly clientFactory: VaultApiFactory = options => {
    this.factoryCalls.push(options);
    return new FakeVaultClient(this);
  };

  readonly clock = () => this.now;

  advance(ms: number): void {
    this.now += ms;
  }

  issueToken(value?: string): string {
    this.tokenCounter += 1;
    const token = value ?? `s.test-token-${this.tokenCounter}`;
    this.tokens.set(token, {
      ttlSeconds: this.tokenTtlSeconds,
      expiresAt:
        this.tokenTtlSeconds > 0
          ? this.now + this.tokenTtlSeconds * 1000
          : undefined,
      renewable: this.renewableTokens,
    });
    return token;
  }

  revokeAll(): void {
    this.tokens.clear();
  }

  /** The next call of this kind rejects with `error`, or never settles. */
  failNext(operation: FakeOperation, error: unknown): void {
    this.failures.push({ operation, error });
  }

  hangNext(operation: FakeOperation): void {
    this.failures.push({ operation });
  }

  seed(path: string, data: Record<string, unknown>): void {
    const versions = this.kv.get(path) ?? [];
    versions.push({ data, createdTime: new Date(this.now).toISOString() });
    this.kv.set(path, versions);
  }

  /** @internal */
  async enter(operation: FakeOperation): Promise<void> {
    this.callCounts[operation] += 1;
    // let concurrent callers interleave
    await Promise.resolve();
    const index = this.failures.findIndex(f => f.operation === operation);
    if (index === -1) {
      return;
    }
    const [failure] = this.failures.splice(index, 1);
    if (!('error' in failure)) {
      await new Promise<never>(() => {});
    }
    throw failure.error;
  }

  /** @internal */
  authorize(token: string): IssuedToken {
    const issued = this.tokens.get(token);
    const expired =
      issued?.expiresAt !== undefined && issued.expiresAt <= this.now;
    if (!issued || expired) {
      throw vaultResponseError(403, ['permission denied']);
    }
    return issued;
  }

  /** @internal */
  authResponse(token: string) {
    const issued = this.authorize(token);
    return {
      auth: {
        client_token: token,
        lease_duration: issued.ttlSeconds,
        renewable: issued.renewable,
      },
    };
  }

  /** @internal AppRole when the payload carries a role id, cert otherwise. */
  login(payload: unknown) {
    const credentials: object =
      typeof payload === 'object' && payload !== null ? payload : {};
    if ('role_id' in credentials) {
      const secretId =
        'secret_id' in credentials ? credentials.secret_id : undefined;
      if (credentials.role_id !== TEST_ROLE_ID || secretId !== TEST_SECRET_ID) {
        throw vaultResponseError(400, ['invalid role or secret ID']);
      }
    } else if (!this.certLoginAllowed) {
      throw vaultResponseError(400, [
        'invalid certificate or no client certificate supplied',
      ]);
    }
    return this.authResponse(this.issueToken());
  }

  private kvPath(route: string): string {
    return decodeURIComponent(route.slice(`${this.kvMount}/data/`.length));
  }

  /** @internal */
  readKv(route: string, query: string | undefined) {
    const path = this.kvPath(route);
    const versions = this.kv.get(path);
    if (!versions || versions.length === 0) {
      throw vaultResponseError(404);
    }
    const match = query?.match(/^version=(\d+)$/);
    const version = match ? Number(match[1]) : versions.length;
    const stored = versions[version - 1];
    if (!stored) {
      throw vaultResponseError(404);
    }
    return {
      request_id: 'test-request',
      lease_id: '',
      renewable: false,
      lease_duration: 0,
      data: {
        data: stored.data,
        metadata: {
          created_time: stored.createdTime,
          custom_metadata: null,
          deletion_time: '',
          destroyed: false,
          version,
        },
      },
    };
  }

  /** @internal */
  writeKv(route: string, payload: unknown) {
    const path = this.kvPath(route);
    const data =
      typeof payload === 'object' && payload !== null && 'data' in payload
        ? payload.data
        : undefined;
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
      throw vaultResponseError(400, ['no data provided']);
    }
    this.seed(path, { ...data });
    const version = this.kv.get(path)?.length ?? 0;
    return {
      data: {
        created_time: new Date(this.now).toISOString(),
        custom_metadata: null,
        deletion_time: '',
        destroyed: false,
        version,
      },
    };
  }
}

class FakeVaultClient implements VaultApi {
  token = '';

  constructor(private readonly server: FakeVault) {}

  async read(path: string) {
    await this.server.enter('read');
    this.server.authorize(this.token);
    const [route, query] = path.split('?');
    if (route.startsWith(`${this.server.kvMount}/data/`)) {
      return this.server.readKv(route, query);
    }
    const legacyPrefix = `${this.server.legacyMount}/`;
    const stored = route.startsWith(legacyPrefix)
      ? this.server.legacy.get(
          decodeURIComponent(route.slice(legacyPrefix.length)),
        )
      : undefined;
    if (!stored) {
      throw vaultResponseError(404);
    }
    return { lease_duration: 2764800, data: stored };
  }

  async write(path: string, data: unknown) {
    if (path.startsWith('auth/') && path.endsWith('/login')) {
      await this.server.enter('login');
      this.server.loginPaths.push(path);
      return this.server.login(data);
    }
    await this.server.enter('write');
    this.server.authorize(this.token);
    if (!path.startsWith(`${this.server.kvMount}/data/`)) {
      throw vaultResponseError(405);
    }
    return this.server.writeKv(path, data);
  }

  async health() {
    await this.server.enter('health');
    return { ...this.server.health };
  }

  async tokenLookupSelf() {
    await this.server.enter('lookup');
    const issued = this.server.authorize(this.token);
    const remaining =
      issued.expiresAt !== undefined
        ? Math.floor((issued.expiresAt - this.server.now) / 1000)
        : 0;
    return { data: { ttl: remaining, renewable: issued.renewable } };
  }

  async tokenRenewSelf() {
    await this.server.enter('renew');
    const issued = this.server.authorize(this.token);
    issued.expiresAt = this.server.now + issued.ttlSeconds * 1000;
    return this.server.authResponse(this.token);
  }

}

/** Backstage config for a plugin pointed at a {@link FakeVault}. */
export function fakeVaultConfig(vault: JsonObject = {}): ConfigReader {
  return new ConfigReader({
    vault: {
      baseUrl: 'http://vault.test:8200',
      kvMount: 'secret',
      legacyMount: 'kv',
      auth: {
        method: 'approle',
        roleId: TEST_ROLE_ID,
        secretId: TEST_SECRET_ID,
      },
      ...vault,
    },
  });
}
