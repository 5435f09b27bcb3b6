/**
 * Database module - SQLite persistence layer.
 */

export { getDb, openDb, closeDb, MEMORY_DB } from './connection';
export { migrate, getCurrentVersion, migrations } from './migrations';
export type { Migration } from './migrations';
export { HostRepository } from './repository';
