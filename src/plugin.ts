import {
  coreServices,
  createBackendPlugin,
} from '@backstage/backend-plugin-api';
import { createRouter } from './router';
import { VaultService } from './vault';

/**
 * kvSecretsPlugin backend plugin
 *
 * Serves `/health`, `/secret/*` and `/legacy/secret/*` over a Vault KV mount.
 *
 * @public
 */
export const kvSecretsPlugin = createBackendPlugin({
  pluginId: 'kv-secrets',
  register(env) {
    env.registerInit({
      deps: {
        logger: coreServices.logger,
        rootConfig: coreServices.rootConfig,
        http: coreServices.httpRouter,
        lifecycle: coreServices.lifecycle,
      },
      async init({ logger, rootConfig, http, lifecycle }) {
        const vaultService = new VaultService(rootConfig, logger);
        vaultService.start();
        lifecycle.addShutdownHook(() => vaultService.close());

        http.use(await createRouter({ logger, vaultService }));
        http.addAuthPolicy({ path: '/health', allow: 'unauthenticated' });
      },
    });
  },
});
