import { JsonObject, JsonPrimitive, JsonValue } from '@backstage/types';

export interface VaultHealthStatus {
  initialized: boolean;
  sealed: boolean;
  standby: boolean;
  serverTimeUtc?: string;
  version: string;
  clusterName?: string;
  connected: boolean;
}

export type VaultAuthConfig =
  | { method: 'token'; token: string }
  | { method: 'cert'; mount: string; role?: string }
  | { method: 'approle'; mount: string; roleId: string; secretId: string };

export type VaultAuthMethod = VaultAuthConfig['method'];

export interface VaultTlsConfig {
  ca?: Buffer;
  cert?: Buffer;
  key?: Buffer;
}

export interface VaultServiceConfig {
  baseUrl: string;
  namespace?: string;
  kvMount: string;
  legacyMount: string;
  auth: VaultAuthConfig;
  tls: VaultTlsConfig;
  timeoutMs: number;
  renewBeforeMs: number;
  renewalIntervalMs?: number;
}

/** Values accepted on write. */
export type SecretValue = JsonPrimitive;

export type SecretData = Record<string, SecretValue>;

export interface SecretMetadata {
  version: number;
  createdTime: string;
  deletionTime?: string;
  destroyed: boolean;
}

/**
 * A secret as read back from the server. Data written by other clients may
 * hold nested values, so reads are typed wider than writes.
 */
export interface SecretEntry {
  path: string;
  data: JsonObject;
  metadata?: SecretMetadata;
}

export interface ReadOptions {
  version?: number;
}

export interface SecretField {
  path: string;
  key: string;
  value: JsonValue;
}

export interface VaultToken {
  value: string;
  /** Epoch millis; undefined for tokens that never expire. */
  expiresAt?: number;
  renewable: boolean;
}
