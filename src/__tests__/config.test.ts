import { ConfigReader } from '@backstage/config';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { readVaultConfig } from '../config';

describe('readVaultConfig', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'kv-secrets-config-'));
    writeFileSync(join(dir, 'ca.pem'), 'test-ca');
    writeFileSync(join(dir, 'client.pem'), 'test-cert');
    writeFileSync(join(dir, 'client-key.pem'), 'test-key');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should apply defaults to a token-only config', () => {
    const config = readVaultConfig(
      new ConfigReader({
        vault: { baseUrl: 'http://localhost:8200/', token: 'test-token' },
      }),
    );

    expect(config).toEqual({
      baseUrl: 'http://localhost:8200',
      namespace: undefined,
      kvMount: 'secret',
      legacyMount: 'secret',
      auth: { method: 'token', token: 'test-token' },
      tls: {},
      timeoutMs: 10_000,
      renewBeforeMs: 300_000,
      renewalIntervalMs: undefined,
    });
  });

  it('should be frozen', () => {
    const config = readVaultConfig(
      new ConfigReader({
        vault: { baseUrl: 'http://localhost:8200', token: 'test-token' },
      }),
    );

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.auth)).toBe(true);
  });

  it('should read durations', () => {
    const config = readVaultConfig(
      new ConfigReader({
        vault: {
          baseUrl: 'http://localhost:8200',
          token: 'test-token',
          timeout: { seconds: 3 },
          renewBefore: { minutes: 1 },
          renewal: { interval: { seconds: 30 } },
        },
      }),
    );

    expect(config.timeoutMs).toBe(3000);
    expect(config.renewBeforeMs).toBe(60_000);
    expect(config.renewalIntervalMs).toBe(30_000);
  });

  it('should read AppRole credentials', () => {
    const config = readVaultConfig(
      new ConfigReader({
        vault: {
          baseUrl: 'http://localhost:8200',
          auth: {
            method: 'approle',
            roleId: 'test-role',
            secretId: 'test-secret',
          },
        },
      }),
    );

    expect(config.auth).toEqual({
      method: 'approle',
      mount: 'approle',
      roleId: 'test-role',
      secretId: 'test-secret',
    });
  });

  it('should load TLS material for certificate auth', () => {
    const config = readVaultConfig(
      new ConfigReader({
        vault: {
          baseUrl: 'https://vault.test:8200',
          auth: { method: 'cert', role: 'web' },
          tls: {
            caFile: join(dir, 'ca.pem'),
            certFile: join(dir, 'client.pem'),
            keyFile: join(dir, 'client-key.pem'),
          },
        },
      }),
    );

    expect(config.auth).toEqual({ method: 'cert', mount: 'cert', role: 'web' });
    expect(config.tls.ca?.toString()).toBe('test-ca');
    expect(config.tls.cert?.toString()).toBe('test-cert');
    expect(config.tls.key?.toString()).toBe('test-key');
  });

  it('should refuse certificate auth over plain http', () => {
    expect(() =>
      readVaultConfig(
        new ConfigReader({
          vault: {
            baseUrl: 'http://vault.test:8200',
            auth: { method: 'cert' },
          },
        }),
      ),
    ).toThrow("Certificate auth requires an https URL at 'vault.baseUrl'");
  });

  it('should refuse certificate auth without a client certificate', () => {
    expect(() =>
      readVaultConfig(
        new ConfigReader({
          vault: {
            baseUrl: 'https://vault.test:8200',
            auth: { method: 'cert' },
            tls: { caFile: join(dir, 'ca.pem') },
          },
        }),
      ),
    ).toThrow(
      "Certificate auth requires 'vault.tls.certFile' and 'vault.tls.keyFile'",
    );
  });

  it('should refuse a TLS block with a plain http URL', () => {
    expect(() =>
      readVaultConfig(
        new ConfigReader({
          vault: {
            baseUrl: 'http://vault.test:8200',
            token: 'test-token',
            tls: { caFile: join(dir, 'ca.pem') },
          },
        }),
      ),
    ).toThrow("Config at 'vault.tls' requires an https URL at 'vault.baseUrl'");
  });

  it('should reject unknown auth methods', () => {
    expect(() =>
      readVaultConfig(
        new ConfigReader({
          vault: { baseUrl: 'http://localhost:8200', auth: { method: 'ldap' } },
        }),
      ),
    ).toThrow("Unsupported value at 'vault.auth.method': 'ldap'");
  });

  it('should require a token for token auth', () => {
    expect(() =>
      readVaultConfig(
        new ConfigReader({ vault: { baseUrl: 'http://localhost:8200' } }),
      ),
    ).toThrow("Missing required config value at 'vault.token'");
  });
});
