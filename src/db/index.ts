import type { Database, Dialect } from './database';
import { openMysqlDatabase } from './mysql';
import { openSqliteDatabase } from './sqlite';

export type { Database, Dialect, ExecuteResult, Row, SqlValue } from './database';

/** `mysql://` URIs go to the MySQL driver; anything else is a SQLite file path or `:memory:`. */
export function dialectFor(location: string): Dialect {
  return /^mysql:\/\//i.test(location) ? 'mysql' : 'sqlite';
}

export async function openDatabase(location: string): Promise<Database> {
  if (dialectFor(location) === 'mysql') {
    return openMysqlDatabase(location);
  }
  return openSqliteDatabase(location);
}
