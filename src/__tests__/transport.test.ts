import { mockServices } from '@backstage/backend-test-utils';
import { readVaultConfig } from '../config';
import {
  VaultAuthError,
  VaultTimeoutError,
  VaultTransportError,
} from '../errors';
import { VaultTransport } from '../transport';
import { VaultService } from '../vault';
import {
  FakeVault,
  fakeVaultConfig,
  networkError,
  vaultResponseError,
} from '../__testUtils__/fakeVault';

describe('VaultTransport', () => {
  const logger = mockServices.logger.mock();
  let fake: FakeVault;

  const createTransport = (config = fakeVaultConfig()) =>
    new VaultTransport({
      config: readVaultConfig(config),
      logger,
      clientFactory: fake.clientFactory,
      now: fake.clock,
    });

  const createService = (config = fakeVaultConfig()) =>
    new VaultService(config, logger, {
      clientFactory: fake.clientFactory,
      now: fake.clock,
    });

  beforeEach(() => {
    jest.clearAllMocks();
    fake = new FakeVault();
    fake.seed('app/config', { name: 'demo' });
  });

  describe('authentication', () => {
    it('should log in lazily on the first request', async () => {
      const service = createService();
      expect(fake.callCounts.login).toBe(0);

      await service.read('app/config');

      expect(fake.callCounts.login).toBe(1);
    });

    it('should surface a rejected login as an auth error', async () => {
      const service = createService(
        fakeVaultConfig({
          auth: { method: 'approle', roleId: 'test-role', secretId: 'wrong' },
        }),
      );

      const error = await service.read('app/config').catch(e => e);

      expect(error).toBeInstanceOf(VaultAuthError);
      expect(error.message).not.toContain('wrong');
      expect(fake.callCounts.read).toBe(0);
    });

    it('should log in to the configured AppRole mount', async () => {
      const service = createService(
        fakeVaultConfig({
          auth: {
            method: 'approle',
            mount: 'team-approle',
            roleId: 'test-role',
            secretId: 'test-secret',
          },
        }),
      );

      await service.read('app/config');

      expect(fake.loginPaths).toEqual(['auth/team-approle/login']);
    });

    it('should validate a static token with lookup-self', async () => {
      fake.issueToken('test-token');
      const service = createService(
        fakeVaultConfig({ auth: { method: 'token', token: 'test-token' } }),
      );

      await expect(service.read('app/config')).resolves.toBeDefined();
      expect(fake.callCounts.lookup).toBe(1);
    });

    it('should fail with an auth error for an unknown token', async () => {
      const service = createService(
        fakeVaultConfig({ auth: { method: 'token', token: 'not-issued' } }),
      );

      await expect(service.read('app/config')).rejects.toBeInstanceOf(
        VaultAuthError,
      );
    });

    it('should log in with a client certificate over https', async () => {
      const transport = new VaultTransport({
        config: {
          ...readVaultConfig(fakeVaultConfig()),
          baseUrl: 'https://vault.test:8200',
          auth: { method: 'cert', mount: 'cert', role: 'web' },
        },
        logger,
        clientFactory: fake.clientFactory,
        now: fake.clock,
      });

      const token = await transport.authenticate();

      expect(token.value).toMatch(/^s\.test-token-/);
      expect(token.expiresAt).toBe(fake.now + 3600 * 1000);
      expect(fake.callCounts.login).toBe(1);
    });

    it('should surface a TLS failure during login', async () => {
      fake.failNext('login', networkError('UNABLE_TO_VERIFY_LEAF_SIGNATURE'));
      const transport = createTransport();

      const error = await transport.authenticate().catch(e => e);

      expect(error).toBeInstanceOf(VaultTransportError);
      expect(error.reason).toBe('tls');
      expect(fake.callCounts.login).toBe(1);
    });
  });

  describe('re-authentication', () => {
    it('should re-authenticate once when the token is revoked', async () => {
      const service = createService();
      await service.read('app/config');
      fake.revokeAll();

      const secret = await service.read('app/config');

      expect(secret?.data).toEqual({ name: 'demo' });
      expect(fake.callCounts.login).toBe(2);
      expect(fake.callCounts.read).toBe(3);
    });

    it('should surface the auth error when the retry fails', async () => {
      const service = createService();
      await service.read('app/config');
      fake.failNext('read', vaultResponseError(403, ['permission denied']));
      fake.failNext('read', vaultResponseError(403, ['permission denied']));

      await expect(service.read('app/config')).rejects.toBeInstanceOf(
        VaultAuthError,
      );
      expect(fake.callCounts.login).toBe(2);
      expect(fake.callCounts.read).toBe(3);
    });

    it('should not retry other failures', async () => {
      const service = createService();
      await service.read('app/config');
      fake.failNext('read', networkError('ECONNRESET'));

      await expect(service.read('app/config')).rejects.toBeInstanceOf(
        VaultTransportError,
      );
      expect(fake.callCounts.login).toBe(1);
      expect(fake.callCounts.read).toBe(2);
    });

    it('should share one re-authentication between requests', async () => {
      const service = createService();
      await service.read('app/config');
      fake.revokeAll();

      const results = await Promise.all([
        service.read('app/config'),
        service.read('app/config'),
        service.write('app/other', { key: 'value' }),
      ]);

      expect(results[0]?.data).toEqual({ name: 'demo' });
      expect(results[1]?.data).toEqual({ name: 'demo' });
      expect(results[2]?.version).toBe(1);
      expect(fake.callCounts.login).toBe(2);
    });
  });

  describe('renewal', () => {
    it('should log in again before the token expires', async () => {
      fake.tokenTtlSeconds = 600;
      const service = createService();
      await service.read('app/config');

      fake.advance(4 * 60_000);
      await service.read('app/config');
      expect(fake.callCounts.login).toBe(1);

      fake.advance(2 * 60_000);
      await service.read('app/config');
      expect(fake.callCounts.login).toBe(2);
    });

    it('should renew a renewable static token instead of failing', async () => {
      fake.tokenTtlSeconds = 600;
      fake.renewableTokens = true;
      fake.issueToken('test-token');
      const service = createService(
        fakeVaultConfig({ auth: { method: 'token', token: 'test-token' } }),
      );
      await service.read('app/config');

      fake.advance(8 * 60_000);
      await service.read('app/config');
      fake.advance(8 * 60_000);
      await service.read('app/config');

      expect(fake.callCounts.lookup).toBe(1);
      expect(fake.callCounts.renew).toBe(2);
    });

    it('should renew on the background timer until closed', async () => {
      fake.tokenTtlSeconds = 600;
      const transport = createTransport();
      await transport.renewIfNeeded();
      expect(transport.sessionGeneration).toBe(1);

      transport.startRenewal(5);
      fake.advance(6 * 60_000);
      await new Promise(resolve => setTimeout(resolve, 50));
      expect(transport.sessionGeneration).toBe(2);
      expect(fake.callCounts.login).toBe(2);

      transport.close();
      await new Promise(resolve => setTimeout(resolve, 50));
      expect(fake.callCounts.login).toBe(2);
    });
  });

  describe('deadlines', () => {
    it('should fail with a timeout instead of hanging', async () => {
      const service = createService(
        fakeVaultConfig({ timeout: { milliseconds: 20 } }),
      );
      await service.read('app/config');
      fake.hangNext('read');

      const error = await service.read('app/config').catch(e => e);

      expect(error).toBeInstanceOf(VaultTimeoutError);
      expect(error.message).toBe('Secret read timed out after 20ms');
    });

    it('should classify client socket timeouts as timeouts', async () => {
      const service = createService();
      await service.read('app/config');
      fake.failNext('write', networkError('ESOCKETTIMEDOUT'));

      await expect(
        service.write('app/config', { name: 'late' }),
      ).rejects.toBeInstanceOf(VaultTimeoutError);
    });

    it('should bound the login as well', async () => {
      fake.hangNext('login');
      const transport = createTransport(
        fakeVaultConfig({ timeout: { milliseconds: 20 } }),
      );

      await expect(transport.authenticate()).rejects.toBeInstanceOf(
        VaultTimeoutError,
      );
    });
  });
});
