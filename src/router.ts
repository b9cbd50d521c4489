import { LoggerService } from '@backstage/backend-plugin-api';
import { InputError } from '@backstage/errors';
import express, { ErrorRequestHandler } from 'express';
import Router from 'express-promise-router';
import { SecretNotFoundError } from './errors';
import { toErrorResponse } from './responses';
import { isSecretData, VaultService } from './vault';

export interface RouterOptions {
  logger: LoggerService;
  vaultService: VaultService;
}

const SECRET_FIELD_ROUTE = /^\/secret\/(.+)\/key\/([^/]+)\/?$/;
const SECRET_ROUTE = /^\/secret\/(.+?)\/?$/;
const LEGACY_SECRET_ROUTE = /^\/legacy\/secret\/(.+?)\/?$/;

function parseVersion(raw: unknown): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  if (typeof raw !== 'string' || !/^[1-9]\d*$/.test(raw)) {
    throw new InputError('Query parameter version must be a positive integer');
  }
  return Number(raw);
}

export async function createRouter(
  options: RouterOptions,
): Promise<express.Router> {
  const { logger, vaultService } = options;
  const router = Router();
  router.use(express.json());

  router.get('/health', async (_req, res) => {
    const healthy = await vaultService.isHealthy();
    res.json({ healthy, status: healthy ? 'UP' : 'DOWN' });
  });

  // Registered before the plain secret route, which would also match it
  router.get(SECRET_FIELD_ROUTE, async (req, res) => {
    const field = await vaultService.readField(req.params[0], req.params[1]);
    res.json(field);
  });

  router.get(SECRET_ROUTE, async (req, res) => {
    const path = req.params[0];
    const secret = await vaultService.read(path, {
      version: parseVersion(req.query.version),
    });
    if (!secret) {
      throw new SecretNotFoundError(path);
    }
    res.json({ path: secret.path, data: secret.data });
  });

  router.post(SECRET_ROUTE, async (req, res) => {
    const path = req.params[0];
    const body: unknown = req.body;
    if (!isSecretData(body)) {
      throw new InputError(
        'Request body must be a JSON object with string, number, boolean ' +
          'or null values',
      );
    }
    const metadata = await vaultService.write(path, body);
    res.json({
      message: 'Secret written successfully',
      path,
      version: metadata?.version,
    });
  });

  router.get(LEGACY_SECRET_ROUTE, async (req, res) => {
    const path = req.params[0];
    const secret = await vaultService.legacyRead(path);
    if (!secret) {
      throw new SecretNotFoundError(path);
    }
    res.json({ path: secret.path, data: secret.data });
  });

  const errorHandler: ErrorRequestHandler = (error, req, res, _next) => {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
      logger.error('Secrets request failed', {
        method: req.method,
        status,
        error: error instanceof Error ? error.name : 'unknown',
      });
    } else {
      logger.debug('Secrets request rejected', { method: req.method, status });
    }
    res.status(status).json(body);
  };
  router.use(errorHandler);

  return router;
}
