import type { Row } from '../db';
import { StorageError } from '../errors';

export interface UserRecord {
  id: number;
  username: string;
  passwordHash: string; // sha-256 hex, never the plaintext
  email: string | null;
  isAdmin: boolean;
}

/** What leaves the store: the record without its hash. */
export type PublicUser = Omit<UserRecord, 'passwordHash'>;

function column(row: Row, name: string): unknown {
  if (!(name in row)) {
    throw new StorageError(`Malformed users row: missing column '${name}'`);
  }
  return row[name];
}

function readInteger(row: Row, name: string): number {
  const value = column(row, name);
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  if (typeof value === 'bigint') return Number(value);
  throw new StorageError(`Malformed users row: '${name}' is not an integer`);
}

function readString(row: Row, name: string): string {
  const value = column(row, name);
  if (typeof value !== 'string') {
    throw new StorageError(`Malformed users row: '${name}' is not a string`);
  }
  return value;
}

function readOptionalString(row: Row, name: string): string | null {
  const value = column(row, name);
  return value === null ? null : readString(row, name);
}

// BOOLEAN columns come back as 0/1 from both SQLite and MySQL.
export function readAdminFlag(row: Row): boolean {
  const value = column(row, 'is_admin');
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return Number(value) !== 0;
  throw new StorageError("Malformed users row: 'is_admin' is not a boolean");
}

export function toUserRecord(row: Row): UserRecord {
  return {
    id: readInteger(row, 'id'),
    username: readString(row, 'username'),
    passwordHash: readString(row, 'password_hash'),
    email: readOptionalString(row, 'email'),
    isAdmin: readAdminFlag(row)
  };
}

export function toPublicUser(record: UserRecord): PublicUser {
  const { passwordHash, ...publicUser } = record;
  return publicUser;
}

export function readUsername(row: Row): string {
  return readString(row, 'username');
}
