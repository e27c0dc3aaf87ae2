import pg from 'pg';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { createLogger, type Logger } from './logger.js';
import { Provider, type SqlExecutor } from './store/provider.js';

export const DEFAULT_PG_SOCKET_DIR = '/var/run/postgresql';

/**
 * Connection settings, read from the libpq environment variables.
 */
export const ConnectionConfigSchema = Type.Object({
  host: Type.String({ minLength: 1 }),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
  user: Type.Optional(Type.String({ minLength: 1 })),
  password: Type.Optional(Type.String()),
  database: Type.Optional(Type.String({ minLength: 1 })),
  applicationName: Type.Optional(Type.String()),
  logLevel: Type.Union([
    Type.Literal('fatal'),
    Type.Literal('error'),
    Type.Literal('warn'),
    Type.Literal('info'),
    Type.Literal('debug'),
    Type.Literal('trace'),
    Type.Literal('silent'),
  ]),
});

export type ConnectionConfig = Static<typeof ConnectionConfigSchema>;

const nonEmpty = (value: string | undefined): string | undefined =>
  value !== undefined && value.trim() !== '' ? value.trim() : undefined;

export const parseConnectionConfig = (env: NodeJS.ProcessEnv): ConnectionConfig => {
  const port = nonEmpty(env['PGPORT']);
  const raw: Record<string, unknown> = {
    host: nonEmpty(env['PGHOST']) ?? DEFAULT_PG_SOCKET_DIR,
    port: port !== undefined ? Number(port) : 5432,
    logLevel: nonEmpty(env['QUERYBOOK_LOG_LEVEL']) ?? 'silent',
  };
  const optional: Array<[keyof ConnectionConfig, string | undefined]> = [
    ['user', nonEmpty(env['PGUSER'])],
    ['password', env['PGPASSWORD']],
    ['database', nonEmpty(env['PGDATABASE'])],
    ['applicationName', nonEmpty(env['PGAPPNAME'])],
  ];
  for (const [key, value] of optional) {
    if (value !== undefined) raw[key] = value;
  }

  if (!Value.Check(ConnectionConfigSchema, raw)) {
    const errors = [...Value.Errors(ConnectionConfigSchema, raw)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid connection configuration: ${errorMessages}`);
  }

  return raw;
};

export const toPoolConfig = (config: ConnectionConfig): pg.PoolConfig => {
  const poolConfig: pg.PoolConfig = { host: config.host, port: config.port };
  if (config.user !== undefined) poolConfig.user = config.user;
  if (config.password !== undefined) poolConfig.password = config.password;
  if (config.database !== undefined) poolConfig.database = config.database;
  if (config.applicationName !== undefined) poolConfig.application_name = config.applicationName;
  return poolConfig;
};

export const createPool = (config: ConnectionConfig): pg.Pool => new pg.Pool(toPoolConfig(config));

/** Logger at the configured `QUERYBOOK_LOG_LEVEL`. */
export const createConfiguredLogger = (config: ConnectionConfig): Logger =>
  createLogger({ level: config.logLevel });

/**
 * Provider over a new pool, or over `executor` when given (a client inside a
 * transaction, for instance), logging at the configured level.
 */
export const createProvider = (
  config: ConnectionConfig,
  executor: SqlExecutor = createPool(config),
): Provider => new Provider({ executor, logger: createConfiguredLogger(config) });
