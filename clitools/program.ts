import { LoggerService } from '@backstage/backend-plugin-api';
import { Config, ConfigReader } from '@backstage/config';
import { InputError } from '@backstage/errors';
import { JsonObject } from '@backstage/types';
import chalk from 'chalk';
import { Command } from 'commander';
import express from 'express';
import { createRouter } from '../src/router';
import { FieldNotFoundError, SecretNotFoundError } from '../src/errors';
import { toErrorResponse } from '../src/responses';
import { SecretData } from '../src/types';
import { isSecretData, VaultService } from '../src/vault';

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
  setExitCode(code: number): void;
}

export interface CliDependencies {
  io?: CliIo;
  env?: Record<string, string | undefined>;
  createService?: (config: Config, logger: LoggerService) => VaultService;
}

type ConnectionOptions = {
  url?: string;
  token?: string;
  namespace?: string;
  mount?: string;
  authMethod?: string;
  roleId?: string;
  secretId?: string;
  caCert?: string;
  clientCert?: string;
  clientKey?: string;
  verbose?: boolean;
};

const EXIT_FAILURE = 1;
const EXIT_NOT_FOUND = 2;

const defaultIo: CliIo = {
  out: text => console.log(text),
  err: text => console.error(text),
  setExitCode: code => {
    process.exitCode = code;
  },
};

/** Logs to stderr so command output on stdout stays parseable. */
export function createCliLogger(verbose: boolean): LoggerService {
  const write =
    (level: string, enabled: boolean) =>
    (message: string, meta?: Error | JsonObject) => {
      if (!enabled) {
        return;
      }
      const detail =
        meta instanceof Error ? meta.message : JSON.stringify(meta ?? {});
      console.error(chalk.gray(`[${level}] ${message} ${detail}`));
    };
  const logger: LoggerService = {
    debug: write('debug', verbose),
    info: write('info', verbose),
    warn: write('warn', true),
    error: write('error', true),
    child: () => logger,
  };
  return logger;
}

/** Copies the entries that carry a value. */
function definedEntries(
  entries: Record<string, string | undefined>,
): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value) {
      result[key] = value;
    }
  }
  return result;
}

/** The config the plugin would read from app-config, from flags and env. */
export function connectionConfig(
  options: ConnectionOptions,
  env: Record<string, string | undefined>,
): ConfigReader {
  const method = options.authMethod ?? 'token';
  let credentials: JsonObject = {};
  if (method === 'token') {
    credentials = definedEntries({ token: options.token ?? env.VAULT_TOKEN });
  } else if (method === 'approle') {
    credentials = definedEntries({
      roleId: options.roleId ?? env.VAULT_ROLE_ID,
      secretId: options.secretId ?? env.VAULT_SECRET_ID,
    });
  }

  const vault: JsonObject = {
    baseUrl: options.url ?? env.VAULT_ADDR ?? 'http://localhost:8200',
    auth: { method, ...credentials },
    ...definedEntries({
      namespace: options.namespace ?? env.VAULT_NAMESPACE,
      kvMount: options.mount ?? env.VAULT_KV_MOUNT,
    }),
  };
  const tls = definedEntries({
    caFile: options.caCert ?? env.VAULT_CACERT,
    certFile: options.clientCert ?? env.VAULT_CLIENT_CERT,
    keyFile: options.clientKey ?? env.VAULT_CLIENT_KEY,
  });
  if (Object.keys(tls).length > 0) {
    vault.tls = tls;
  }

  return new ConfigReader({ vault }, 'kvsecrets-cli');
}

function parsePairs(pairs: string[]): SecretData {
  const data: SecretData = {};
  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new InputError(`Expected key=value, got '${pair}'`);
    }
    data[pair.slice(0, separator)] = pair.slice(separator + 1);
  }
  return data;
}

function parseJsonData(json: string): SecretData {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new InputError('--json must be valid JSON');
  }
  if (!isSecretData(parsed)) {
    throw new InputError(
      '--json must be an object with string, number, boolean or null values',
    );
  }
  return parsed;
}

export function buildProgram(deps: CliDependencies = {}): Command {
  const io = deps.io ?? defaultIo;
  const env = deps.env ?? process.env;
  const createService =
    deps.createService ??
    ((config: Config, logger: LoggerService) =>
      new VaultService(config, logger));

  const program = new Command();

  program
    .name('kvsecrets')
    .description('Read and write secrets in a Vault KV store')
    .version('0.1.0')
    .option('-u, --url <url>', 'Vault server URL (VAULT_ADDR)')
    .option('-t, --token <token>', 'Vault token (VAULT_TOKEN)')
    .option('-n, --namespace <namespace>', 'Vault namespace (VAULT_NAMESPACE)')
    .option('-m, --mount <mount>', 'KV v2 mount (VAULT_KV_MOUNT)')
    .option('--auth-method <method>', 'token, cert or approle', 'token')
    .option('--role-id <id>', 'AppRole role id (VAULT_ROLE_ID)')
    .option('--secret-id <id>', 'AppRole secret id (VAULT_SECRET_ID)')
    .option('--ca-cert <file>', 'CA bundle for the server (VAULT_CACERT)')
    .option('--client-cert <file>', 'client certificate (VAULT_CLIENT_CERT)')
    .option('--client-key <file>', 'client certificate key (VAULT_CLIENT_KEY)')
    .option('-v, --verbose', 'log requests to stderr');

  const withService = async (
    command: Command,
    run: (service: VaultService) => Promise<void>,
  ) => {
    const options = command.optsWithGlobals<ConnectionOptions>();
    let service: VaultService | undefined;
    try {
      service = createService(
        connectionConfig(options, env),
        createCliLogger(options.verbose === true),
      );
      await run(service);
    } catch (error) {
      const { status, body } = toErrorResponse(error);
      const unexpected = status === 500 && body.message === 'Unexpected error';
      const message =
        unexpected && error instanceof Error ? error.message : body.message;
      io.err(chalk.red(`✗ ${body.error}: ${message}`));
      const notFound =
        error instanceof SecretNotFoundError ||
        error instanceof FieldNotFoundError;
      io.setExitCode(notFound ? EXIT_NOT_FOUND : EXIT_FAILURE);
    } finally {
      service?.close();
    }
  };

  program
    .command('health')
    .description('Check Vault server health status')
    .action(async (_options, command: Command) => {
      await withService(command, async service => {
        const health = await service.getHealth();
        const healthy = health.initialized && !health.sealed && !health.standby;
        if (healthy) {
          io.out(chalk.green('✓ Vault is healthy'));
        } else {
          io.out(chalk.red('✗ Vault is not healthy'));
          io.setExitCode(EXIT_FAILURE);
        }
        io.out(`  Connected: ${health.connected}`);
        io.out(`  Version: ${health.version}`);
        io.out(`  Initialized: ${health.initialized}`);
        io.out(`  Sealed: ${health.sealed}`);
        io.out(`  Standby: ${health.standby}`);
      });
    });

  program
    .command('read')
    .description('Print the latest version of a secret as JSON')
    .argument('<path>', 'secret path')
    .option('--secret-version <version>', 'read a specific version')
    .action(
      async (
        path: string,
        options: { secretVersion?: string },
        command: Command,
      ) => {
        await withService(command, async service => {
          const version =
            options.secretVersion !== undefined
              ? Number(options.secretVersion)
              : undefined;
          if (
            version !== undefined &&
            (!Number.isInteger(version) || version < 1)
          ) {
            throw new InputError(
              '--secret-version must be a positive integer',
            );
          }
          const secret = await service.read(path, { version });
          if (!secret) {
            throw new SecretNotFoundError(path);
          }
          io.out(JSON.stringify(secret.data, null, 2));
        });
      },
    );

  program
    .command('write')
    .description('Write a new version of a secret')
    .argument('<path>', 'secret path')
    .argument('[pairs...]', 'key=value pairs')
    .option('--json <json>', 'secret data as a JSON object')
    .action(
      async (
        path: string,
        pairs: string[],
        options: { json?: string },
        command: Command,
      ) => {
        await withService(command, async service => {
          const data =
            options.json !== undefined
              ? parseJsonData(options.json)
              : parsePairs(pairs);
          if (Object.keys(data).length === 0) {
            throw new InputError(
              'Nothing to write; pass key=value pairs or --json',
            );
          }
          const metadata = await service.write(path, data);
          const suffix = metadata ? ` (version ${metadata.version})` : '';
          io.out(chalk.green(`✓ Secret written to ${path}${suffix}`));
        });
      },
    );

  program
    .command('read-field')
    .description('Print one field of a secret')
    .argument('<path>', 'secret path')
    .argument('<key>', 'field name')
    .action(async (path: string, key: string, _options, command: Command) => {
      await withService(command, async service => {
        const field = await service.readField(path, key);
        const { value } = field;
        io.out(typeof value === 'string' ? value : JSON.stringify(value));
      });
    });

  program
    .command('legacy-read')
    .description('Print a secret from the unversioned KV mount as JSON')
    .argument('<path>', 'secret path')
    .action(async (path: string, _options, command: Command) => {
      await withService(command, async service => {
        const secret = await service.legacyRead(path);
        if (!secret) {
          throw new SecretNotFoundError(path);
        }
        io.out(JSON.stringify(secret.data, null, 2));
      });
    });

  program
    .command('serve')
    .description('Serve the secrets HTTP API without a Backstage backend')
    .option('-p, --port <port>', 'port to listen on', '7007')
    .action(async (options: { port: string }, command: Command) => {
      const connection = command.optsWithGlobals<ConnectionOptions>();
      const logger = createCliLogger(connection.verbose === true);
      const vaultService = createService(
        connectionConfig(connection, env),
        logger,
      );
      vaultService.start();

      const app = express();
      app.use(await createRouter({ logger, vaultService }));
      const server = app.listen(Number(options.port), () => {
        io.out(chalk.blue(`Serving secrets API on port ${options.port}`));
      });

      const shutdown = () => {
        vaultService.close();
        server.close();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

  return program;
}
