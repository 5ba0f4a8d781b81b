import { ValidationError } from './errors';

export const DEFAULT_LOCATION = 'users.db';
export const DEFAULT_MYSQL_PORT = 3306;

type Env = Record<string, string | undefined>;

function readPort(value: string | undefined): number {
  if (!value) {
    return DEFAULT_MYSQL_PORT;
  }
  const port = /^\d+$/.test(value) ? Number(value) : NaN;
  if (!(port >= 1 && port <= 65535)) {
    throw new ValidationError('DB_PORT', `DB_PORT must be a port number, got '${value}'`);
  }
  return port;
}

/**
 * Where the demo keeps its users: the first CLI argument, else a MySQL
 * server described by the DB_* variables, else a local SQLite file.
 */
export function resolveDemoLocation(args: readonly string[], env: Env): string {
  const explicit = args[0];
  if (explicit) {
    return explicit;
  }

  if (!env.DB_HOST) {
    return DEFAULT_LOCATION;
  }

  const url = new URL('mysql://localhost');
  url.hostname = env.DB_HOST;
  url.port = String(readPort(env.DB_PORT));
  url.username = env.DB_USER || '';
  url.password = env.DB_PASSWORD || '';
  url.pathname = `/${env.DB_NAME || ''}`;
  return url.toString();
}
