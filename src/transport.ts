import { LoggerService } from '@backstage/backend-plugin-api';
import { createAuthenticator, VaultAuthenticator } from './auth';
import {
  buildVaultOptions,
  createVaultApi,
  VaultApi,
  VaultApiFactory,
} from './client';
import {
  classifyVaultError,
  VaultAuthError,
  VaultTimeoutError,
  VaultTransportError,
} from './errors';
import { TokenSession } from './session';
import { VaultServiceConfig, VaultToken } from './types';

export interface VaultTransportOptions {
  config: Readonly<VaultServiceConfig>;
  logger: LoggerService;
  clientFactory?: VaultApiFactory;
  now?: () => number;
}

/**
 * Owns the connection to the Vault server and the session token. Every
 * authenticated call goes through {@link VaultTransport.execute}.
 */
export class VaultTransport {
  private readonly config: Readonly<VaultServiceConfig>;
  private readonly logger: LoggerService;
  private readonly client: VaultApi;
  private readonly authenticator: VaultAuthenticator;
  private readonly session: TokenSession;
  private renewalTimer: ReturnType<typeof setInterval> | undefined;

  constructor(options: VaultTransportOptions) {
    const now = options.now ?? Date.now;
    this.config = options.config;
    this.logger = options.logger;

    const vaultOptions = buildVaultOptions(this.config);
    this.logger.debug('Initializing Vault client', {
      endpoint: this.config.baseUrl,
      authMethod: this.config.auth.method,
    });
    this.client = (options.clientFactory ?? createVaultApi)(vaultOptions);
    if (this.config.auth.method === 'token') {
      // lookup-self needs the configured token on the wire
      this.client.token = this.config.auth.token;
    }

    this.authenticator = createAuthenticator(this.config.auth, now);
    this.session = new TokenSession({
      issue: previous => this.authenticate(previous),
      apply: token => {
        this.client.token = token;
      },
      renewBeforeMs: this.config.renewBeforeMs,
      logger: this.logger,
      now,
    });
  }

  get timeoutMs(): number {
    return this.config.timeoutMs;
  }

  /** Token generation, bumped on every successful (re-)authentication. */
  get sessionGeneration(): number {
    return this.session.generation;
  }

  /**
   * Exchanges the configured credentials for a session token. Login failures
   * surface as {@link VaultAuthError}; TLS and network failures keep their
   * own kind.
   */
  async authenticate(previous?: VaultToken): Promise<VaultToken> {
    const operation = `Vault ${this.authenticator.method} login`;
    try {
      const token = await this.withDeadline(
        operation,
        this.authenticator.login(this.client, previous),
      );
      this.logger.info('Authenticated with Vault', {
        method: this.authenticator.method,
      });
      return token;
    } catch (error) {
      const classified = classifyVaultError(error, operation, this.timeoutMs);
      if (
        classified instanceof VaultTransportError &&
        classified.statusCode === 400
      ) {
        throw new VaultAuthError(`${operation} was rejected`, error);
      }
      throw classified;
    }
  }

  renewIfNeeded(): Promise<void> {
    return this.session.renewIfNeeded();
  }

  /**
   * Runs an authenticated call. An authorization failure triggers exactly
   * one re-authentication and one retry; every other failure propagates.
   */
  async execute<T>(
    operation: string,
    call: (client: VaultApi) => Promise<T>,
  ): Promise<T> {
    await this.session.renewIfNeeded();
    const generation = this.session.generation;
    try {
      return await this.attempt(operation, call);
    } catch (error) {
      if (!(error instanceof VaultAuthError)) {
        throw error;
      }
      this.logger.info('Vault rejected the session token, re-authenticating', {
        operation,
      });
      await this.session.refresh(generation);
      return await this.attempt(operation, call);
    }
  }

  /** Runs a call that needs no token, such as the health probe. */
  async probe<T>(
    operation: string,
    call: (client: VaultApi) => Promise<T>,
  ): Promise<T> {
    return this.attempt(operation, call);
  }

  startRenewal(intervalMs: number): void {
    if (this.renewalTimer) {
      return;
    }
    this.renewalTimer = setInterval(() => {
      this.session.renewIfNeeded().catch(error => {
        this.logger.warn('Background Vault token renewal failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, intervalMs);
    this.renewalTimer.unref();
  }

  /** Stops background renewal and drops the session token. */
  close(): void {
    if (this.renewalTimer) {
      clearInterval(this.renewalTimer);
      this.renewalTimer = undefined;
    }
    this.session.clear();
  }

  private async attempt<T>(
    operation: string,
    call: (client: VaultApi) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.withDeadline(operation, call(this.client));
    } catch (error) {
      throw classifyVaultError(error, operation, this.timeoutMs);
    }
  }

  private withDeadline<T>(operation: string, pending: Promise<T>): Promise<T> {
    const timeoutMs = this.timeoutMs;
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(
        () => reject(new VaultTimeoutError(operation, timeoutMs)),
        timeoutMs,
      );
      pending.then(
        value => {
          clearTimeout(timer);
          resolve(value);
        },
        error => {
          clearTimeout(timer);
          reject(error);
        },
      );
    });
  }
}
