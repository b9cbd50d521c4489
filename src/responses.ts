import { InputError, isError } from '@backstage/errors';
import {
  FieldNotFoundError,
  SecretNotFoundError,
  VaultAuthError,
  VaultTimeoutError,
  VaultTransportError,
} from './errors';

export interface ErrorResponse {
  status: number;
  body: {
    error: string;
    message: string;
    path?: string;
    key?: string;
  };
}

/**
 * Turns a failure into a status and body. Messages are fixed per error kind
 * so nothing from the underlying call, such as a token or a secret value,
 * reaches the caller.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof SecretNotFoundError) {
    return {
      status: 404,
      body: {
        error: 'Secret not found',
        message: 'No secret exists at the requested path',
        path: error.path,
      },
    };
  }
  if (error instanceof FieldNotFoundError) {
    return {
      status: 404,
      body: {
        error: 'Field not found',
        message: 'The secret exists but has no such field',
        path: error.path,
        key: error.key,
      },
    };
  }
  if (error instanceof InputError) {
    return {
      status: 400,
      body: { error: 'Invalid request', message: error.message },
    };
  }
  if (isError(error) && error.type === 'entity.parse.failed') {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        message: 'Request body is not valid JSON',
      },
    };
  }
  if (error instanceof VaultTimeoutError) {
    return {
      status: 504,
      body: {
        error: 'Secrets server timed out',
        message: 'The secrets server did not answer in time',
      },
    };
  }
  if (error instanceof VaultAuthError) {
    return {
      status: 500,
      body: {
        error: 'Failed to access secret',
        message: 'Authentication with the secrets server failed',
      },
    };
  }
  if (error instanceof VaultTransportError) {
    return {
      status: 500,
      body: {
        error: 'Failed to access secret',
        message:
          error.reason === 'tls'
            ? 'The secrets server failed TLS verification'
            : 'The secrets server request failed',
      },
    };
  }
  return {
    status: 500,
    body: {
      error: 'Failed to access secret',
      message: 'Unexpected error',
    },
  };
}
