import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@zentity/core';
import { getLogger } from '@zentity/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect, type KyselyPlugin } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

import { BooleanParameterPlugin } from './plugins/boolean-parameter-plugin.js';

const logger = getLogger('SqliteDatabase');

export interface CreateSqliteDatabaseOptions {
  /** Additional Kysely plugins, applied after the boolean parameter plugin */
  plugins?: KyselyPlugin[] | undefined;
  /** Enforce FOREIGN KEY constraints (default true) */
  foreignKeys?: boolean | undefined;
}

/**
 * Open a SQLite file (or ':memory:') and wrap it in a Kysely instance.
 * Creates the parent directory of a file path when missing.
 */
export function createSqliteDatabase<T>(
  dbPath: string,
  options?: CreateSqliteDatabaseOptions
): Result<Kysely<T>, Error> {
  try {
    const dataDir = path.dirname(dbPath);
    if (dbPath !== ':memory:' && !fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    sqliteDb.pragma(`foreign_keys = ${options?.foreignKeys === false ? 'OFF' : 'ON'}`);
    if (dbPath !== ':memory:') {
      sqliteDb.pragma('journal_mode = WAL');
      sqliteDb.pragma('synchronous = NORMAL');
    }

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    let kysely = new Kysely<T>({
      dialect: new SqliteDialect({ database: sqliteDb }),
    });

    for (const plugin of [new BooleanParameterPlugin(), ...(options?.plugins ?? [])]) {
      kysely = kysely.withPlugin(plugin);
    }

    return ok(kysely);
  } catch (error) {
    logger.error({ error }, `Error creating SQLite database: ${dbPath}`);
    return wrapError(error, `Failed to create SQLite database: ${dbPath}`);
  }
}

/**
 * Destroy a Kysely instance created by `createSqliteDatabase`, closing the
 * SQLite handle beneath it. Pending queries finish first.
 */
export async function closeSqliteDatabase<T>(db: Kysely<T>): Promise<Result<void, Error>> {
  try {
    await db.destroy();
  } catch (error) {
    logger.error({ error }, 'Error closing SQLite database');
    return wrapError(error, 'Failed to close SQLite database');
  }
  logger.debug('Closed SQLite database');
  return ok(undefined);
}
