export { AccountStore } from './account-store';
export type { AccountStoreOptions, Logger } from './account-store';
export type { PublicUser, UserRecord } from './data/users';
export { NotFoundError, StorageError, UniqueConstraintError, ValidationError } from './errors';
export { hashPassword } from './password';
export { prefixBounds } from './prefix';
export type { PrefixBounds } from './prefix';
