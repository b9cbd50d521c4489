import { LoggerService } from '@backstage/backend-plugin-api';
import { Config } from '@backstage/config';
import { InputError } from '@backstage/errors';
import { JsonObject } from '@backstage/types';
import { VaultApiFactory } from './client';
import { readVaultConfig } from './config';
import {
  FieldNotFoundError,
  SecretNotFoundError,
  VaultTransportError,
} from './errors';
import { VaultTransport } from './transport';
import {
  ReadOptions,
  SecretData,
  SecretEntry,
  SecretField,
  SecretMetadata,
  VaultHealthStatus,
  VaultServiceConfig,
} from './types';

export interface VaultServiceOptions {
  clientFactory?: VaultApiFactory;
  now?: () => number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value);
}

export function isSecretData(value: unknown): value is SecretData {
  if (!isRecord(value)) {
    return false;
  }
  return Object.values(value).every(
    v =>
      v === null ||
      typeof v === 'string' ||
      typeof v === 'boolean' ||
      (typeof v === 'number' && Number.isFinite(v)),
  );
}

/** Trims slashes and rejects paths Vault would misinterpret. */
export function normalizeSecretPath(path: string): string {
  const trimmed = path.replace(/^\/+|\/+$/g, '');
  const segments = trimmed.split('/');
  if (
    trimmed === '' ||
    segments.some(
      segment => segment === '' || segment === '.' || segment === '..',
    )
  ) {
    throw new InputError(`Invalid secret path '${path}'`);
  }
  return trimmed;
}

/** URL form of a normalized path; `?`, `#` and `%` stay part of the name. */
function toVaultPath(secretPath: string): string {
  return secretPath.split('/').map(encodeURIComponent).join('/');
}

function parseMetadata(value: unknown): SecretMetadata | undefined {
  if (!isRecord(value) || typeof value.version !== 'number') {
    return undefined;
  }
  return {
    version: value.version,
    createdTime:
      typeof value.created_time === 'string' ? value.created_time : '',
    deletionTime:
      typeof value.deletion_time === 'string' && value.deletion_time !== ''
        ? value.deletion_time
        : undefined,
    destroyed: value.destroyed === true,
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof VaultTransportError && error.statusCode === 404;
}

/**
 * Typed access to a KV secrets engine. Secrets are read from the server on
 * every call; nothing is cached here.
 */
class VaultService {
  private readonly logger: LoggerService;
  private readonly config: Readonly<VaultServiceConfig>;
  private readonly transport: VaultTransport;

  constructor(
    config: Config,
    logger: LoggerService,
    options: VaultServiceOptions = {},
  ) {
    this.logger = logger;
    this.config = readVaultConfig(config);
    this.transport = new VaultTransport({
      config: this.config,
      logger,
      clientFactory: options.clientFactory,
      now: options.now,
    });
  }

  /** Latest (or the requested) version of a KV v2 secret, or undefined. */
  async read(
    path: string,
    options: ReadOptions = {},
  ): Promise<SecretEntry | undefined> {
    const secretPath = normalizeSecretPath(path);
    const query =
      options.version !== undefined ? `?version=${options.version}` : '';
    const vaultPath = this.dataPath(secretPath);
    let response: unknown;
    try {
      response = await this.transport.execute('Secret read', client =>
        client.read(`${vaultPath}${query}`),
      );
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug('Secret not found', { path: secretPath });
        return undefined;
      }
      this.logFailure('Failed to read secret', secretPath, error);
      throw error;
    }

    const body = isRecord(response) ? response.data : undefined;
    if (!isRecord(body) || !isJsonObject(body.data)) {
      // Soft-deleted versions come back without data
      this.logger.debug('Secret has no current data', { path: secretPath });
      return undefined;
    }
    return {
      path: secretPath,
      data: body.data,
      metadata: parseMetadata(body.metadata),
    };
  }

  /** Stores `data` as a new version of the secret. */
  async write(
    path: string,
    data: SecretData,
  ): Promise<SecretMetadata | undefined> {
    const secretPath = normalizeSecretPath(path);
    if (!isSecretData(data)) {
      throw new InputError(
        'Secret data must be a JSON object with string, number, boolean ' +
          'or null values',
      );
    }
    const vaultPath = this.dataPath(secretPath);
    try {
      const response: unknown = await this.transport.execute(
        'Secret write',
        client => client.write(vaultPath, { data }),
      );
      this.logger.info('Secret written', { path: secretPath });
      return parseMetadata(isRecord(response) ? response.data : undefined);
    } catch (error) {
      this.logFailure('Failed to write secret', secretPath, error);
      throw error;
    }
  }

  /**
   * One field of a secret. A missing secret and a missing field fail with
   * different errors; a field holding `""` or `null` is returned as is.
   */
  async readField(path: string, key: string): Promise<SecretField> {
    const secret = await this.read(path);
    if (!secret) {
      throw new SecretNotFoundError(normalizeSecretPath(path));
    }
    const value = secret.data[key];
    const present = Object.prototype.hasOwnProperty.call(secret.data, key);
    if (!present || value === undefined) {
      this.logger.debug('Secret field not found', { path: secret.path, key });
      throw new FieldNotFoundError(secret.path, key);
    }
    return { path: secret.path, key, value };
  }

  /** Reads from the unversioned (KV v1) mount. */
  async legacyRead(path: string): Promise<SecretEntry | undefined> {
    const secretPath = normalizeSecretPath(path);
    let response: unknown;
    try {
      response = await this.transport.execute('Legacy secret read', client =>
        client.read(`${this.config.legacyMount}/${toVaultPath(secretPath)}`),
      );
    } catch (error) {
      if (isNotFound(error)) {
        this.logger.debug('Legacy secret not found', { path: secretPath });
        return undefined;
      }
      this.logFailure('Failed to read legacy secret', secretPath, error);
      throw error;
    }

    const data = isRecord(response) ? response.data : undefined;
    if (!isJsonObject(data)) {
      return undefined;
    }
    return { path: secretPath, data };
  }

  async getHealth(): Promise<VaultHealthStatus> {
    try {
      this.logger.debug('Checking Vault health status');
      const healthResponse: unknown = await this.transport.probe(
        'Health check',
        client => client.health(),
      );
      const health = isRecord(healthResponse) ? healthResponse : {};
      return {
        initialized: health.initialized === true,
        sealed: health.sealed !== false,
        standby: health.standby === true,
        serverTimeUtc: new Date().toISOString(),
        version:
          typeof health.version === 'string' ? health.version : 'unknown',
        clusterName:
          typeof health.cluster_name === 'string'
            ? health.cluster_name
            : undefined,
        connected: true,
      };
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      this.logger.error('Failed to check Vault health status', {
        error: errorMessage,
      });
      return {
        initialized: false,
        sealed: true,
        standby: false,
        version: 'unknown',
        connected: false,
        serverTimeUtc: new Date().toISOString(),
      };
    }
  }

  async isHealthy(): Promise<boolean> {
    const health = await this.getHealth();
    return health.initialized && !health.sealed && !health.standby;
  }

  /** Starts the configured background token renewal, if any. */
  start(): void {
    if (this.config.renewalIntervalMs !== undefined) {
      this.transport.startRenewal(this.config.renewalIntervalMs);
    }
  }

  close(): void {
    this.transport.close();
  }

  private dataPath(secretPath: string): string {
    return `${this.config.kvMount}/data/${toVaultPath(secretPath)}`;
  }

  private logFailure(message: string, path: string, error: unknown): void {
    this.logger.error(message, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

export { VaultService };
