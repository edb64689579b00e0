import { getErrorMessage } from '@zentity/core';
import { getLogger } from '@zentity/logger';
import { sql, type ControlledTransaction, type Kysely, type RawBuilder } from '@zentity/sqlite';
import { err, ok, type Result } from 'neverthrow';

import { DriverError } from '../errors.js';

import { describeStatement, type Condition, type Driver, type DriverTransaction, type Row, type RowSet, type Statement } from './driver.js';
import { encodeValue } from './value-codec.js';

const logger = getLogger('KyselyDriver');

function whereClause(where: readonly Condition[]): RawBuilder<unknown> {
  if (where.length === 0) return sql`1 = 1`;

  return sql.join(
    where.map((condition) => {
      const column = sql.ref(condition.column);
      switch (condition.op) {
        case 'eq':
          return condition.value === null
            ? sql`${column} is null`
            : sql`${column} = ${encodeValue(condition.type, condition.value)}`;
        case 'in':
          if (condition.values.length === 0) return sql`1 = 0`;
          return sql`${column} in (${sql.join(condition.values.map((value) => encodeValue(condition.type, value)))})`;
        case 'is-null':
          return sql`${column} is null`;
      }
    }),
    sql` and `
  );
}

/**
 * Translate a statement into a parameterized query. Identifiers go through
 * `sql.table` / `sql.ref`, so quoting follows the connection's dialect.
 */
export function compileStatement(statement: Statement): RawBuilder<Row> {
  const table = sql.table(statement.table);

  switch (statement.kind) {
    case 'insert': {
      const returning =
        statement.generated.length > 0
          ? sql` returning ${sql.join(statement.generated.map((column) => sql.ref(column)))}`
          : sql``;
      if (statement.values.length === 0) {
        return sql<Row>`insert into ${table} default values${returning}`;
      }
      const columns = sql.join(statement.values.map(({ column }) => sql.ref(column)));
      const values = sql.join(statement.values.map(({ type, value }) => encodeValue(type, value)));
      return sql<Row>`insert into ${table} (${columns}) values (${values})${returning}`;
    }
    case 'update': {
      const assignments = sql.join(
        statement.values.map(({ column, type, value }) => sql`${sql.ref(column)} = ${encodeValue(type, value)}`)
      );
      return sql<Row>`update ${table} set ${assignments} where ${whereClause(statement.where)}`;
    }
    case 'delete':
      return sql<Row>`delete from ${table} where ${whereClause(statement.where)}`;
    case 'select': {
      const order =
        statement.orderBy && statement.orderBy.length > 0
          ? sql` order by ${sql.join(statement.orderBy.map((column) => sql.ref(column)))}`
          : sql``;
      return sql<Row>`select * from ${table} where ${whereClause(statement.where)}${order}`;
    }
  }
}

async function executeOn<DB>(executor: Kysely<DB>, statement: Statement): Promise<Result<RowSet, DriverError>> {
  try {
    const result = await compileStatement(statement).execute(executor);
    const affected =
      statement.kind === 'select' || result.numAffectedRows === undefined
        ? result.rows.length
        : Number(result.numAffectedRows);
    return ok({ rows: result.rows, affected });
  } catch (error) {
    logger.debug({ error, table: statement.table, kind: statement.kind }, 'Statement failed');
    return err(
      new DriverError(`Failed to ${describeStatement(statement)}: ${getErrorMessage(error)}`, {
        cause: error,
        context: { table: statement.table, kind: statement.kind, entity: statement.entity },
      })
    );
  }
}

class KyselyTransaction<DB> implements DriverTransaction {
  private finished = false;

  constructor(private readonly trx: ControlledTransaction<DB>) {}

  execute(statement: Statement): Promise<Result<RowSet, DriverError>> {
    if (this.finished) return Promise.resolve(err(new DriverError('Transaction already ended')));
    return executeOn(this.trx, statement);
  }

  async commit(): Promise<Result<void, DriverError>> {
    if (this.finished) return err(new DriverError('Transaction already ended'));
    this.finished = true;
    try {
      await this.trx.commit().execute();
      return ok(undefined);
    } catch (error) {
      return err(new DriverError(`Failed to commit transaction: ${getErrorMessage(error)}`, { cause: error }));
    }
  }

  async rollback(): Promise<Result<void, DriverError>> {
    if (this.finished) return err(new DriverError('Transaction already ended'));
    this.finished = true;
    try {
      await this.trx.rollback().execute();
      return ok(undefined);
    } catch (error) {
      return err(new DriverError(`Failed to roll back transaction: ${getErrorMessage(error)}`, { cause: error }));
    }
  }
}

/**
 * Driver running statements on a Kysely connection. Each transaction is a
 * Kysely controlled transaction owned by the caller that began it; on a
 * single-connection dialect such as SQLite, other callers wait for the
 * connection until it ends.
 */
export class KyselyDriver<DB> implements Driver {
  constructor(private readonly db: Kysely<DB>) {}

  execute(statement: Statement): Promise<Result<RowSet, DriverError>> {
    return executeOn(this.db, statement);
  }

  async beginTransaction(): Promise<Result<DriverTransaction, DriverError>> {
    try {
      return ok(new KyselyTransaction(await this.db.startTransaction().execute()));
    } catch (error) {
      return err(new DriverError(`Failed to begin transaction: ${getErrorMessage(error)}`, { cause: error }));
    }
  }
}
