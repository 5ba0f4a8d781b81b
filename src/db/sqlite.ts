import { readFile, writeFile } from 'node:fs/promises';
import initSqlJs from 'sql.js';
import { StorageError, UniqueConstraintError, errorCode } from '../errors';
import { isRow } from './database';
import type { Database, ExecuteResult, Row, SqlValue } from './database';

type SqlJs = Awaited<ReturnType<typeof initSqlJs>>;
type SqlJsDatabase = InstanceType<SqlJs['Database']>;

const IN_MEMORY = ':memory:';

let engine: Promise<SqlJs> | undefined;

function loadEngine(): Promise<SqlJs> {
  engine ??= initSqlJs();
  return engine;
}

// SQLite has no boolean type.
function bindable(params: readonly SqlValue[]): Array<string | number | null> {
  return params.map((value) => (typeof value === 'boolean' ? Number(value) : value));
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// sql.js reports constraint failures by message only.
function translate(error: unknown, sql: string): StorageError {
  const reason = messageOf(error);
  if (reason.startsWith('UNIQUE constraint failed')) {
    return new UniqueConstraintError('Unique constraint violated', { cause: error });
  }
  return new StorageError(`SQLite statement failed (${sql.trim().split(/\s+/)[0]}): ${reason}`, {
    cause: error
  });
}

/**
 * sql.js keeps the database in memory. A file-backed store loads the file
 * once when opened and writes the whole image back after every write; if
 * that fails, the in-memory copy is reset to the last image on disk.
 */
class SqliteDatabase implements Database {
  readonly dialect = 'sqlite';

  constructor(
    private sql: SqlJs,
    private db: SqlJsDatabase,
    private path: string | null,
    private image: Uint8Array
  ) {}

  async query(sql: string, params: readonly SqlValue[] = []): Promise<Row[]> {
    const rows: Row[] = [];
    try {
      const statement = this.db.prepare(sql);
      try {
        statement.bind(bindable(params));
        while (statement.step()) {
          const row: unknown = statement.getAsObject();
          if (isRow(row)) rows.push(row);
        }
      } finally {
        statement.free();
      }
    } catch (error) {
      throw translate(error, sql);
    }
    return rows;
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<ExecuteResult> {
    let result: ExecuteResult;
    try {
      this.db.run(sql, bindable(params));
      const affectedRows = this.db.getRowsModified();
      const [lastId] = this.db.exec('SELECT last_insert_rowid() AS id');
      result = { insertId: Number(lastId?.values[0]?.[0] ?? 0), affectedRows };
    } catch (error) {
      throw translate(error, sql);
    }

    await this.persist();
    return result;
  }

  async close(): Promise<void> {
    try {
      this.db.close();
    } catch (error) {
      throw new StorageError('Failed to close SQLite database', { cause: error });
    }
  }

  private async persist(): Promise<void> {
    if (this.path === null) {
      return;
    }

    const image = this.db.export();
    try {
      await writeFile(this.path, image);
      this.image = image;
    } catch (error) {
      this.db.close();
      this.db = new this.sql.Database(this.image);
      throw new StorageError(`Cannot write SQLite database to '${this.path}': ${messageOf(error)}`, {
        cause: error
      });
    }
  }
}

async function readImage(path: string): Promise<Uint8Array | undefined> {
  try {
    return await readFile(path);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export async function openSqliteDatabase(location: string): Promise<Database> {
  try {
    const sql = await loadEngine();
    if (location === IN_MEMORY) {
      const db = new sql.Database();
      return new SqliteDatabase(sql, db, null, new Uint8Array(0));
    }

    const db = new sql.Database(await readImage(location));
    try {
      const image = db.export();
      // Creates the file now, so an unwritable location fails here.
      await writeFile(location, image);
      return new SqliteDatabase(sql, db, location, image);
    } catch (error) {
      db.close();
      throw error;
    }
  } catch (error) {
    throw new StorageError(`Cannot open SQLite database at '${location}': ${messageOf(error)}`, { cause: error });
  }
}
