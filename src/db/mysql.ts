import { createConnection } from 'mysql2/promise';
import type { Connection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { StorageError, UniqueConstraintError, errorCode } from '../errors';
import { isRow } from './database';
import type { Database, ExecuteResult, Row, SqlValue } from './database';

const DUPLICATE_ENTRY = 'ER_DUP_ENTRY';

function translate(error: unknown): StorageError {
  if (errorCode(error) === DUPLICATE_ENTRY) {
    return new UniqueConstraintError('Unique constraint violated', { cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new StorageError(`MySQL statement failed: ${reason}`, { cause: error });
}

class MysqlDatabase implements Database {
  readonly dialect = 'mysql';

  constructor(private connection: Connection) {}

  async query(sql: string, params: readonly SqlValue[] = []): Promise<Row[]> {
    try {
      const [rows] = await this.connection.execute<RowDataPacket[]>(sql, [...params]);
      return rows.filter(isRow);
    } catch (error) {
      throw translate(error);
    }
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<ExecuteResult> {
    try {
      const [result] = await this.connection.execute<ResultSetHeader>(sql, [...params]);
      return { insertId: result.insertId, affectedRows: result.affectedRows };
    } catch (error) {
      throw translate(error);
    }
  }

  async close(): Promise<void> {
    try {
      await this.connection.end();
    } catch (error) {
      throw new StorageError('Failed to close MySQL connection', { cause: error });
    }
  }
}

// A single connection, never a pool: the store owns exactly one handle.
export async function openMysqlDatabase(uri: string): Promise<Database> {
  try {
    const connection = await createConnection(uri);
    return new MysqlDatabase(connection);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Cannot connect to MySQL: ${reason}`, { cause: error });
  }
}
