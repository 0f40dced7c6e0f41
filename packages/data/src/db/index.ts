export { ConnectionManager, createConnectionManager } from './connection-manager'
export type { SQLiteConfig } from './connection-manager'
export { createDatabase, Database } from './database'
export type { DatabaseOptions } from './database'
export { MigrationRunner, MIGRATIONS } from './migrations'
export type { Migration } from './migrations'
export { CURRENT_SCHEMA_VERSION, getAllSchemaStatements } from './schema'
