import type { Dialect } from '../db';

/** Code points; MySQL needs a bounded VARCHAR for the unique index. */
export const MAX_USERNAME_LENGTH = 255;

const CREATE_USERS_TABLE: Record<Dialect, string> = {
  sqlite: `
    CREATE TABLE IF NOT EXISTS users (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      username TEXT NOT NULL UNIQUE,
      password_hash TEXT NOT NULL,
      email TEXT,
      is_admin BOOLEAN NOT NULL DEFAULT 0
    )
  `,
  // Binary, no-pad collation: case-sensitive equality and code point ordering
  // for the username range scans.
  mysql: `
    CREATE TABLE IF NOT EXISTS users (
      id INT AUTO_INCREMENT PRIMARY KEY,
      username VARCHAR(${MAX_USERNAME_LENGTH}) CHARACTER SET utf8mb4 COLLATE utf8mb4_0900_bin NOT NULL UNIQUE,
      password_hash CHAR(64) NOT NULL,
      email TEXT,
      is_admin BOOLEAN NOT NULL DEFAULT FALSE
    ) DEFAULT CHARSET=utf8mb4
  `
};

export function createUsersTableSql(dialect: Dialect): string {
  return CREATE_USERS_TABLE[dialect];
}
