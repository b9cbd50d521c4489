import { CustomErrorBase, isError } from '@backstage/errors';

/** The secret at the given path does not exist. */
export class SecretNotFoundError extends CustomErrorBase {
  name = 'SecretNotFoundError' as const;
  readonly kind = 'NotFound' as const;
  readonly target = 'secret' as const;

  constructor(readonly path: string) {
    super(`No secret at '${path}'`);
  }
}

/** The secret exists but carries no field with the given key. */
export class FieldNotFoundError extends CustomErrorBase {
  name = 'FieldNotFoundError' as const;
  readonly kind = 'NotFound' as const;
  readonly target = 'field' as const;

  constructor(readonly path: string, readonly key: string) {
    super(`Secret at '${path}' has no field '${key}'`);
  }
}

export class VaultAuthError extends CustomErrorBase {
  name = 'VaultAuthError' as const;
  readonly kind = 'Auth' as const;
}

export type TransportFailureReason = 'tls' | 'network' | 'server';

export class VaultTransportError extends CustomErrorBase {
  name = 'VaultTransportError' as const;
  readonly kind = 'Transport' as const;

  constructor(
    message: string,
    readonly reason: TransportFailureReason,
    readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class VaultTimeoutError extends CustomErrorBase {
  name = 'VaultTimeoutError' as const;
  readonly kind = 'Timeout' as const;

  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export type SecretsAccessError =
  | SecretNotFoundError
  | FieldNotFoundError
  | VaultAuthError
  | VaultTransportError
  | VaultTimeoutError;

export type SecretsAccessErrorKind = SecretsAccessError['kind'];

export function isSecretsAccessError(
  error: unknown,
): error is SecretsAccessError {
  return (
    error instanceof SecretNotFoundError ||
    error instanceof FieldNotFoundError ||
    error instanceof VaultAuthError ||
    error instanceof VaultTransportError ||
    error instanceof VaultTimeoutError
  );
}

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

const TLS_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'EPROTO',
]);

/** HTTP status of a failed node-vault call, if the server answered at all. */
export function vaultStatusCode(error: unknown): number | undefined {
  if (!isError(error)) {
    return undefined;
  }
  const response = error.response;
  if (typeof response !== 'object' || response === null) {
    return undefined;
  }
  if ('statusCode' in response && typeof response.statusCode === 'number') {
    return response.statusCode;
  }
  return undefined;
}

function errorCode(error: unknown): string | undefined {
  if (!isError(error)) {
    return undefined;
  }
  if (typeof error.code === 'string') {
    return error.code;
  }
  // request wrappers keep the socket error as `cause`
  const cause = error.cause;
  return isError(cause) && typeof cause.code === 'string'
    ? cause.code
    : undefined;
}

/**
 * Maps a raw failure of a node-vault call onto the error taxonomy. Errors that
 * are already classified pass through unchanged.
 */
export function classifyVaultError(
  error: unknown,
  operation: string,
  timeoutMs: number,
): SecretsAccessError {
  if (isSecretsAccessError(error)) {
    return error;
  }

  const status = vaultStatusCode(error);
  if (status === 401 || status === 403) {
    return new VaultAuthError(`${operation} was not authorized`, error);
  }
  if (status !== undefined) {
    return new VaultTransportError(
      `${operation} failed with status ${status}`,
      'server',
      status,
      error,
    );
  }

  const code = errorCode(error);
  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return new VaultTimeoutError(operation, timeoutMs);
  }
  if (code !== undefined && TLS_CODES.has(code)) {
    return new VaultTransportError(
      `${operation} failed TLS verification (${code})`,
      'tls',
      undefined,
      error,
    );
  }
  return new VaultTransportError(
    `${operation} failed`,
    'network',
    undefined,
    error,
  );
}
