import vault from 'node-vault';
import type { VaultOptions, client as VaultClient } from 'node-vault';
import { VaultServiceConfig } from './types';

/** The part of the node-vault client this plugin calls. */
export type VaultApi = Pick<
  VaultClient,
  | 'token'
  | 'read'
  | 'write'
  | 'health'
  | 'tokenLookupSelf'
  | 'tokenRenewSelf'
>;

export type VaultApiFactory = (options: VaultOptions) => VaultApi;

export const createVaultApi: VaultApiFactory = options => vault(options);

export function buildVaultOptions(
  config: Readonly<VaultServiceConfig>,
): VaultOptions {
  const options: VaultOptions = {
    apiVersion: 'v1',
    endpoint: config.baseUrl,
    requestOptions: {
      strictSSL: true,
      timeout: config.timeoutMs,
      ...(config.tls.ca && { ca: config.tls.ca }),
      ...(config.tls.cert && { cert: config.tls.cert }),
      ...(config.tls.key && { key: config.tls.key }),
    },
  };
  if (config.namespace) {
    options.namespace = config.namespace;
  }
  return options;
}
