import { getErrorMessage, wrapError } from '@zentity/core';
import { getLogger } from '@zentity/logger';
import { Migrator, type Kysely, type Migration } from 'kysely';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

const logger = getLogger('SqliteMigrations');

/**
 * Run every pending migration from a record keyed by migration name
 * (e.g. '001_orders'); names sort lexically.
 *
 * Migrations are passed in programmatically rather than discovered on disk,
 * so the runner works the same under Vitest and under a compiled build.
 *
 * @returns names of the migrations executed by this call
 */
export async function runMigrations<T>(
  db: Kysely<T>,
  migrations: Record<string, Migration>
): Promise<Result<string[], Error>> {
  try {
    logger.debug(`Running migrations (${Object.keys(migrations).length} registered)`);

    const migrator = new Migrator({
      db,
      provider: { getMigrations: () => Promise.resolve(migrations) },
    });

    const { error, results } = await migrator.migrateToLatest();
    const executed: string[] = [];

    for (const result of results ?? []) {
      if (result.status === 'Success') {
        executed.push(result.migrationName);
        logger.debug(`Migration "${result.migrationName}" executed successfully`);
      } else if (result.status === 'Error') {
        logger.error(`Migration "${result.migrationName}" failed`);
      }
    }

    if (error) {
      logger.error({ error }, 'Migration failed');
      return err(new Error(`Migration failed: ${getErrorMessage(error, 'unknown migration error')}`, { cause: error }));
    }

    return ok(executed);
  } catch (error) {
    logger.error({ error }, 'Error running migrations');
    return wrapError(error, 'Failed to run migrations');
  }
}
