import { openDatabase } from './db';
import type { Database, SqlValue } from './db';
import { MAX_USERNAME_LENGTH, createUsersTableSql } from './data/schema';
import { readAdminFlag, readUsername, toPublicUser, toUserRecord } from './data/users';
import type { PublicUser } from './data/users';
import { NotFoundError, StorageError, UniqueConstraintError, ValidationError } from './errors';
import { hashPassword } from './password';
import { prefixBounds } from './prefix';

export type Logger = Pick<Console, 'log' | 'error'>;

export interface AccountStoreOptions {
  /** Defaults to `console`. */
  logger?: Logger;
}

export interface Statement {
  sql: string;
  params: SqlValue[];
}

// A lone surrogate has no UTF-8 encoding; the driver would store U+FFFD.
const LONE_SURROGATE = /\p{Surrogate}/u;

function isWellFormed(value: string): boolean {
  return !LONE_SURROGATE.test(value);
}

function checkUsername(username: string): void {
  if (!username) {
    throw new ValidationError('username', 'Username is required');
  }
  if (!isWellFormed(username)) {
    throw new ValidationError('username', 'Username is not valid Unicode text');
  }
  if (Array.from(username).length > MAX_USERNAME_LENGTH) {
    throw new ValidationError('username', `Username is longer than ${MAX_USERNAME_LENGTH} characters`);
  }
}

export function prefixStatement(prefix: string): Statement {
  const bounds = prefixBounds(prefix);
  if (bounds === null) {
    return { sql: 'SELECT username FROM users ORDER BY id', params: [] };
  }
  if (bounds.upper === null) {
    return {
      sql: 'SELECT username FROM users WHERE username >= ? AND substr(username, 1, ?) = ? ORDER BY id',
      params: [bounds.lower, bounds.length, bounds.lower]
    };
  }
  return {
    sql: 'SELECT username FROM users WHERE username >= ? AND username < ? ORDER BY id',
    params: [bounds.lower, bounds.upper]
  };
}

/**
 * User accounts in a single `users` table. Each instance owns one
 * connection from `initialize` until `close`; calls on one instance are
 * not meant to overlap.
 */
export class AccountStore {
  private closed = false;

  private constructor(
    private db: Database,
    private logger: Logger
  ) {}

  /**
   * Opens (or creates) the store at `location` and makes sure the users
   * table exists. Safe to call again on an initialized location.
   *
   * @param location SQLite file path, `:memory:`, or a `mysql://` URI
   * @throws StorageError when the location cannot be opened
   */
  static async initialize(location: string, options: AccountStoreOptions = {}): Promise<AccountStore> {
    const logger = options.logger ?? console;

    let db: Database;
    try {
      db = await openDatabase(location);
    } catch (error) {
      logger.error('Database initialization failed:', error);
      throw error;
    }

    try {
      await db.execute(createUsersTableSql(db.dialect));
    } catch (error) {
      logger.error('Database initialization failed:', error);
      try {
        await db.close();
      } catch (closeError) {
        logger.error('Close after failed initialization error:', closeError);
      }
      throw error;
    }

    logger.log(` Users table ready (${db.dialect})`);
    return new AccountStore(db, logger);
  }

  /**
   * Resolves false when the username is taken; any other storage fault rejects.
   */
  async createUser(username: string, password: string, email: string, isAdmin = false): Promise<boolean> {
    checkUsername(username);

    return this.run('Create user', async (db) => {
      try {
        await db.execute(
          'INSERT INTO users (username, password_hash, email, is_admin) VALUES (?, ?, ?, ?)',
          [username, hashPassword(password), email, isAdmin]
        );
        return true;
      } catch (error) {
        if (error instanceof UniqueConstraintError) {
          return false;
        }
        throw error;
      }
    });
  }

  /** Unknown user and wrong password both resolve false. */
  async authenticate(username: string, password: string): Promise<boolean> {
    if (typeof username !== 'string' || typeof password !== 'string' || !isWellFormed(username)) {
      return false;
    }

    return this.run('Authenticate', async (db) => {
      const rows = await db.query(
        'SELECT id FROM users WHERE username = ? AND password_hash = ?',
        [username, hashPassword(password)]
      );
      return rows.length === 1;
    });
  }

  /** @throws NotFoundError when no user has this username */
  async getPermissions(username: string): Promise<boolean> {
    const rows = await this.run('Get permissions', (db) =>
      db.query('SELECT is_admin FROM users WHERE username = ?', [username])
    );

    const row = rows[0];
    if (row === undefined) {
      throw new NotFoundError(username);
    }
    return readAdminFlag(row);
  }

  async getUser(username: string): Promise<PublicUser | null> {
    const rows = await this.run('Get user', (db) =>
      db.query('SELECT id, username, password_hash, email, is_admin FROM users WHERE username = ?', [username])
    );

    const row = rows[0];
    return row === undefined ? null : toPublicUser(toUserRecord(row));
  }

  /**
   * Usernames starting with `prefix`, in insertion order. The match is a
   * range over the username index, so `%` and `_` are plain characters.
   */
  async findByPrefix(prefix: string): Promise<string[]> {
    const { sql, params } = prefixStatement(prefix);
    const rows = await this.run('Find by prefix', (db) => db.query(sql, params));
    return rows.map(readUsername);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.db.close();
    this.logger.log(' Account store closed');
  }

  private async run<T>(operation: string, work: (db: Database) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new StorageError('account store is closed');
    }

    try {
      return await work(this.db);
    } catch (error) {
      if (error instanceof StorageError) {
        this.logger.error(`${operation} error:`, error);
      }
      throw error;
    }
  }
}
