/**
 * @hltvsync/db: Postgres schema, queries and the SyncStore implementations
 */

export * from './schema';
export { getDb, closeDb, type Db, type Executor } from './client';
export * from './store';
export {
  isDatabaseConnectionError,
  DATABASE_ERROR_MESSAGE,
  PersistenceError,
  ConstraintViolationError,
  toPersistenceError,
} from './db-error';
export { createPostgresSyncStore } from './postgres-store';
export { MemorySyncStore } from './memory-store';
export * from './entities';
export * from './associations';
export * from './sync-runs';
