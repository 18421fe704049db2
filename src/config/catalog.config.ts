import { LogLevel } from '@nestjs/common';

export type CatalogStorage = 'memory' | 'database';

export type DatabaseConfig =
  | {
      type: 'postgres';
      host: string;
      port: number;
      username: string;
      password: string;
      database: string;
      synchronize: boolean;
    }
  | {
      type: 'better-sqlite3';
      database: string;
      synchronize: boolean;
    };

export interface CatalogConfig {
  port: number;
  storage: CatalogStorage;
  /** Minimum level; unset lets each entry point pick its own default. */
  logLevel?: LogLevel;
  database: DatabaseConfig;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// most verbose first
const LOG_LEVELS: readonly LogLevel[] = [
  'verbose',
  'debug',
  'log',
  'warn',
  'error',
  'fatal',
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Expands a minimum level into the list of levels Nest should print.
 */
export function logLevelsFrom(minimum: LogLevel): LogLevel[] {
  return LOG_LEVELS.slice(LOG_LEVELS.indexOf(minimum));
}

function readPort(
  name: string,
  value: string | undefined,
  fallback: number,
): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(
      `${name} must be a port number, got "${value}"`,
    );
  }
  return port;
}

function readBoolean(
  name: string,
  value: string | undefined,
  fallback: boolean,
): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw new ConfigurationError(`${name} must be true or false, got "${value}"`);
}

function readDatabase(env: NodeJS.ProcessEnv): DatabaseConfig {
  const synchronize = readBoolean('DB_SYNCHRONIZE', env.DB_SYNCHRONIZE, true);
  const type = env.DB_TYPE || 'postgres';

  switch (type) {
    case 'postgres':
      return {
        type: 'postgres',
        host: env.DB_HOST || 'localhost',
        port: readPort('DB_PORT', env.DB_PORT, 5432),
        username: env.DB_USERNAME || 'postgres',
        password: env.DB_PASSWORD || 'postgres',
        database: env.DB_NAME || 'movie_catalog',
        synchronize,
      };
    case 'better-sqlite3':
      return {
        type: 'better-sqlite3',
        database: env.DB_PATH || 'movie-catalog.sqlite',
        synchronize,
      };
    default:
      throw new ConfigurationError(
        `DB_TYPE must be "postgres" or "better-sqlite3", got "${type}"`,
      );
  }
}

export function loadCatalogConfig(
  env: NodeJS.ProcessEnv = process.env,
): CatalogConfig {
  const storage = env.CATALOG_STORAGE || 'memory';
  if (storage !== 'memory' && storage !== 'database') {
    throw new ConfigurationError(
      `CATALOG_STORAGE must be "memory" or "database", got "${storage}"`,
    );
  }

  const logLevel = env.LOG_LEVEL || undefined;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`,
    );
  }

  return {
    port: readPort('PORT', env.PORT, 3000),
    storage,
    logLevel,
    database: readDatabase(env),
  };
}
