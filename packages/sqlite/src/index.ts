export { closeSqliteDatabase, createSqliteDatabase, type CreateSqliteDatabaseOptions } from './database.js';
export { runMigrations } from './migrations.js';
export { BooleanParameterPlugin, toSqliteParameter } from './plugins/boolean-parameter-plugin.js';

// Re-export the Kysely surface consumers need so they don't depend on kysely directly
export {
  Kysely,
  sql,
  type ControlledTransaction,
  type KyselyPlugin,
  type Migration,
  type QueryResult,
  type RawBuilder,
} from 'kysely';
