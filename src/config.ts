import { readFileSync } from 'fs';
import { Config, readDurationFromConfig } from '@backstage/config';
import { durationToMilliseconds } from '@backstage/types';
import { VaultAuthConfig, VaultServiceConfig, VaultTlsConfig } from './types';

const DEFAULT_KV_MOUNT = 'secret';
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_RENEW_BEFORE_MS = 5 * 60_000;

function readOptionalDuration(
  config: Config | undefined,
  key: string,
): number | undefined {
  if (!config?.has(key)) {
    return undefined;
  }
  return durationToMilliseconds(readDurationFromConfig(config, { key }));
}

function readAuth(vaultConfig: Config): VaultAuthConfig {
  const authConfig = vaultConfig.getOptionalConfig('auth');
  if (!authConfig) {
    // `vault.token` on its own is the short form of token auth
    return { method: 'token', token: vaultConfig.getString('token') };
  }

  const method = authConfig.getOptionalString('method') ?? 'token';
  switch (method) {
    case 'token':
      return {
        method,
        token:
          authConfig.getOptionalString('token') ??
          vaultConfig.getString('token'),
      };
    case 'cert':
      return {
        method,
        mount: authConfig.getOptionalString('mount') ?? 'cert',
        role: authConfig.getOptionalString('role'),
      };
    case 'approle':
      return {
        method,
        mount: authConfig.getOptionalString('mount') ?? 'approle',
        roleId: authConfig.getString('roleId'),
        secretId: authConfig.getString('secretId'),
      };
    default:
      throw new Error(
        `Unsupported value at 'vault.auth.method': '${method}', ` +
          'expected one of token, cert, approle',
      );
  }
}

function readTls(vaultConfig: Config): VaultTlsConfig {
  const tlsConfig = vaultConfig.getOptionalConfig('tls');
  if (!tlsConfig) {
    return {};
  }
  const readPem = (key: string) => {
    const file = tlsConfig.getOptionalString(key);
    return file ? readFileSync(file) : undefined;
  };
  return {
    ca: readPem('caFile'),
    cert: readPem('certFile'),
    key: readPem('keyFile'),
  };
}

/**
 * Reads the `vault` config block. The returned object is frozen; nothing
 * downstream may change connection settings after construction.
 */
export function readVaultConfig(config: Config): Readonly<VaultServiceConfig> {
  const vaultConfig = config.getConfig('vault');
  const baseUrl = vaultConfig.getString('baseUrl').replace(/\/+$/, '');
  const kvMount = vaultConfig.getOptionalString('kvMount') ?? DEFAULT_KV_MOUNT;
  const auth = readAuth(vaultConfig);
  const tls = readTls(vaultConfig);

  const secure = baseUrl.startsWith('https://');
  if (!secure && vaultConfig.has('tls')) {
    throw new Error(
      "Config at 'vault.tls' requires an https URL at 'vault.baseUrl'",
    );
  }
  if (auth.method === 'cert') {
    if (!secure) {
      throw new Error(
        "Certificate auth requires an https URL at 'vault.baseUrl'",
      );
    }
    if (!tls.cert || !tls.key) {
      throw new Error(
        "Certificate auth requires 'vault.tls.certFile' and " +
          "'vault.tls.keyFile'",
      );
    }
  }
  if (auth.method === 'token' && !auth.token) {
    throw new Error("Missing required config value at 'vault.token'");
  }

  return Object.freeze({
    baseUrl,
    namespace: vaultConfig.getOptionalString('namespace'),
    kvMount,
    legacyMount: vaultConfig.getOptionalString('legacyMount') ?? kvMount,
    auth: Object.freeze(auth),
    tls: Object.freeze(tls),
    timeoutMs:
      readOptionalDuration(vaultConfig, 'timeout') ?? DEFAULT_TIMEOUT_MS,
    renewBeforeMs:
      readOptionalDuration(vaultConfig, 'renewBefore') ??
      DEFAULT_RENEW_BEFORE_MS,
    renewalIntervalMs: readOptionalDuration(
      vaultConfig.getOptionalConfig('renewal'),
      'interval',
    ),
  });
}
