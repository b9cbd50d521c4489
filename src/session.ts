import { LoggerService } from '@backstage/backend-plugin-api';
import { VaultToken } from './types';

export type TokenIssuer = (previous?: VaultToken) => Promise<VaultToken>;

export interface TokenSessionOptions {
  issue: TokenIssuer;
  /** Called with the new token value whenever the slot changes. */
  apply: (token: string) => void;
  renewBeforeMs: number;
  logger: LoggerService;
  now?: () => number;
}

/**
 * The single token slot shared by every request on one transport. All token
 * mutation happens in {@link TokenSession.refresh}, and at most one refresh
 * is in flight at a time.
 */
export class TokenSession {
  private readonly options: TokenSessionOptions;
  private readonly now: () => number;
  private token: VaultToken | undefined;
  private currentGeneration = 0;
  private inflight: Promise<void> | undefined;

  constructor(options: TokenSessionOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /** Bumped every time a new token lands in the slot. */
  get generation(): number {
    return this.currentGeneration;
  }

  get expiresAt(): number | undefined {
    return this.token?.expiresAt;
  }

  hasToken(): boolean {
    return this.token !== undefined;
  }

  needsRenewal(): boolean {
    if (!this.token) {
      return true;
    }
    if (this.token.expiresAt === undefined) {
      return false;
    }
    return this.token.expiresAt - this.now() < this.options.renewBeforeMs;
  }

  async renewIfNeeded(): Promise<void> {
    if (this.needsRenewal()) {
      await this.refresh(this.currentGeneration);
    }
  }

  /**
   * Replaces the token that was current at `staleGeneration`. If another
   * caller already replaced it, this resolves without issuing a new one.
   */
  async refresh(staleGeneration: number): Promise<void> {
    if (this.inflight) {
      return this.inflight;
    }
    if (staleGeneration < this.currentGeneration) {
      return;
    }

    this.inflight = this.options
      .issue(this.token)
      .then(token => {
        this.token = token;
        this.currentGeneration += 1;
        this.options.apply(token.value);
        this.options.logger.debug('Vault token refreshed', {
          generation: this.currentGeneration,
          renewable: token.renewable,
        });
      })
      .finally(() => {
        this.inflight = undefined;
      });
    return this.inflight;
  }

  clear(): void {
    this.token = undefined;
    this.currentGeneration += 1;
    this.options.apply('');
  }
}
