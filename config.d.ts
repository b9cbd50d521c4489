import { HumanDuration } from '@backstage/types';

export interface Config {
  vault?: {
    /**
     * Address of the Vault server, e.g. https://vault.example.internal:8200
     */
    baseUrl: string;
    /**
     * Vault Enterprise namespace sent with every request.
     */
    namespace?: string;
    /**
     * Mount of the KV version 2 engine. Defaults to "secret".
     */
    kvMount?: string;
    /**
     * Mount of the unversioned KV engine. Defaults to kvMount.
     */
    legacyMount?: string;
    /**
     * Short form of `auth: { method: token }`.
     * @visibility secret
     */
    token?: string;
    auth?: {
      method?: 'token' | 'cert' | 'approle';
      /** @visibility secret */
      token?: string;
      /** Auth mount; defaults to the method name. */
      mount?: string;
      /** Certificate role name for cert auth. */
      role?: string;
      roleId?: string;
      /** @visibility secret */
      secretId?: string;
    };
    tls?: {
      /** CA bundle the server certificate must chain to. */
      caFile?: string;
      certFile?: string;
      keyFile?: string;
    };
    /** Deadline for every call to Vault. Defaults to 10 seconds. */
    timeout?: HumanDuration | string;
    /**
     * Renew the session token when less than this remains. Defaults to 5
     * minutes.
     */
    renewBefore?: HumanDuration | string;
    renewal?: {
      /** Check the token on this interval in the background. */
      interval: HumanDuration | string;
    };
  };
}
