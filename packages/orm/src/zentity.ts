import { wrapError } from '@zentity/core';
import { getDatabasePath, getNodeEnv } from '@zentity/env';
import { getLogger } from '@zentity/logger';
import {
  closeSqliteDatabase,
  createSqliteDatabase,
  runMigrations,
  type Kysely,
  type Migration,
} from '@zentity/sqlite';
import { err, ok, type Result } from 'neverthrow';

import type { EntityRegistry } from './descriptor/entity-registry.js';
import type { Driver } from './driver/driver.js';
import { KyselyDriver } from './driver/kysely-driver.js';
import type { DescriptorError } from './errors.js';
import { UnitOfWork, type CommitFailure, type CommitOptions } from './unit-of-work/unit-of-work.js';

const logger = getLogger('Zentity');

/** Tables are addressed by name at run time, so the schema is left open. */
export type DynamicSchema = Record<string, Record<string, unknown>>;

export interface ZentityOptions {
  registry: EntityRegistry;
  /** SQLite file or ':memory:'; defaults to ZENTITY_DATABASE_PATH */
  databasePath?: string | undefined;
  /** Keyed by migration name, applied in name order */
  migrations?: Record<string, Migration> | undefined;
  foreignKeys?: boolean | undefined;
}

/**
 * Entry point: owns the storage connection and hands out units of work.
 */
export class Zentity {
  private constructor(
    readonly registry: EntityRegistry,
    readonly driver: Driver,
    private readonly db?: Kysely<DynamicSchema>
  ) {}

  /**
   * Validate the registry, open the SQLite database and bring its schema up
   * to date.
   */
  static async initialize(options: ZentityOptions): Promise<Result<Zentity, DescriptorError | Error>> {
    if (!options.registry.sealed) {
      const validated = options.registry.validate();
      if (validated.isErr()) return err(validated.error);
    }

    const databasePath = options.databasePath ?? getDatabasePath();
    const opened = createSqliteDatabase<DynamicSchema>(databasePath, { foreignKeys: options.foreignKeys });
    if (opened.isErr()) return err(opened.error);
    const db = opened.value;

    const migrated = await runMigrations(db, options.migrations ?? {});
    if (migrated.isErr()) {
      const closed = await closeSqliteDatabase(db);
      if (closed.isErr()) logger.warn({ error: closed.error }, 'Failed to close database after migration failure');
      return err(migrated.error);
    }

    logger.info(
      {
        databasePath,
        nodeEnv: getNodeEnv(),
        entities: options.registry.types().length,
        migrations: migrated.value.length,
      },
      'Zentity initialized'
    );
    return ok(new Zentity(options.registry, new KyselyDriver(db), db));
  }

  /**
   * Run on an existing driver; `close()` then leaves the connection alone.
   */
  static withDriver(registry: EntityRegistry, driver: Driver): Result<Zentity, DescriptorError> {
    if (!registry.sealed) {
      const validated = registry.validate();
      if (validated.isErr()) return err(validated.error);
    }
    return ok(new Zentity(registry, driver));
  }

  createUnitOfWork(): UnitOfWork {
    return new UnitOfWork({ driver: this.driver, registry: this.registry });
  }

  /**
   * Run `work` in a fresh unit of work: commit when it returns ok, roll back
   * when it returns an error or throws. The unit of work is closed afterwards.
   */
  async transaction<T, E>(
    work: (unitOfWork: UnitOfWork) => Promise<Result<T, E>>,
    options?: CommitOptions
  ): Promise<Result<T, E | CommitFailure | Error>> {
    const unitOfWork = this.createUnitOfWork();
    try {
      const outcome = await work(unitOfWork);
      if (outcome.isErr()) {
        unitOfWork.rollback();
        return err(outcome.error);
      }

      const committed = await unitOfWork.commit(options);
      if (committed.isErr()) return err(committed.error);
      return ok(outcome.value);
    } catch (error) {
      unitOfWork.rollback();
      logger.error({ error, scope: unitOfWork.id }, 'Transaction callback threw');
      return wrapError(error, 'Transaction failed');
    } finally {
      unitOfWork.close();
    }
  }

  async close(): Promise<Result<void, Error>> {
    if (!this.db) return ok(undefined);
    return closeSqliteDatabase(this.db);
  }
}
