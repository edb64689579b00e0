import { err, ok, type Result } from 'neverthrow';

import type { FieldValue } from '../descriptor/field.js';
import { cloneFieldValue, fieldValuesEqual } from '../entity/field-values.js';
import { DriverError } from '../errors.js';

import type { Condition, Driver, DriverTransaction, RowSet, Statement } from './driver.js';

type StoredRow = Record<string, FieldValue>;

export type FailurePredicate = (statement: Statement, index: number) => DriverError | undefined;

export interface MemoryDriverOptions {
  /** Called before each statement; returning an error makes the statement fail */
  failWhen?: FailurePredicate | undefined;
}

function copyRow(row: StoredRow): StoredRow {
  return Object.fromEntries(Object.entries(row).map(([column, value]) => [column, cloneFieldValue(value) ?? null]));
}

function copyTables(tables: Map<string, StoredRow[]>): Map<string, StoredRow[]> {
  return new Map([...tables].map(([table, rows]) => [table, rows.map(copyRow)]));
}

function matches(row: StoredRow, where: readonly Condition[]): boolean {
  return where.every((condition) => {
    const value = row[condition.column];
    switch (condition.op) {
      case 'eq':
        return fieldValuesEqual(condition.type, value, condition.value);
      case 'in':
        return condition.values.some((candidate) => fieldValuesEqual(condition.type, value, candidate));
      case 'is-null':
        return value === null || value === undefined;
    }
  });
}

function compareBy(columns: readonly string[]): (a: StoredRow, b: StoredRow) => number {
  return (a, b) => {
    for (const column of columns) {
      const left = a[column];
      const right = b[column];
      if (typeof left === 'number' && typeof right === 'number' && left !== right) return left - right;
      if (typeof left === 'string' && typeof right === 'string' && left !== right) return left < right ? -1 : 1;
    }
    return 0;
  };
}

function runStatement(tables: Map<string, StoredRow[]>, statement: Statement): RowSet {
  const rows = tables.get(statement.table) ?? [];
  tables.set(statement.table, rows);

  switch (statement.kind) {
    case 'insert': {
      const row: StoredRow = {};
      for (const { column, value } of statement.values) row[column] = cloneFieldValue(value) ?? null;
      for (const column of statement.generated) {
        if (row[column] === undefined || row[column] === null) row[column] = nextValue(rows, column);
      }
      rows.push(row);
      return { rows: [copyRow(row)], affected: 1 };
    }
    case 'update': {
      const targets = rows.filter((row) => matches(row, statement.where));
      for (const row of targets) {
        for (const { column, value } of statement.values) row[column] = cloneFieldValue(value) ?? null;
      }
      return { rows: [], affected: targets.length };
    }
    case 'delete': {
      const kept = rows.filter((row) => !matches(row, statement.where));
      tables.set(statement.table, kept);
      return { rows: [], affected: rows.length - kept.length };
    }
    case 'select': {
      const selected = rows.filter((row) => matches(row, statement.where)).map(copyRow);
      if (statement.orderBy) selected.sort(compareBy(statement.orderBy));
      return { rows: selected, affected: selected.length };
    }
  }
}

function nextValue(rows: StoredRow[], column: string): number {
  let max = 0;
  for (const row of rows) {
    const value = row[column];
    if (typeof value === 'number' && value > max) max = value;
  }
  return max + 1;
}

/**
 * Transaction over a private copy of the tables; the copy replaces the
 * committed tables on commit.
 */
class MemoryTransaction implements DriverTransaction {
  private finished = false;

  constructor(
    private readonly tables: Map<string, StoredRow[]>,
    private readonly run: (tables: Map<string, StoredRow[]>, statement: Statement) => Result<RowSet, DriverError>,
    private readonly finish: (tables: Map<string, StoredRow[]> | undefined) => void
  ) {}

  execute(statement: Statement): Promise<Result<RowSet, DriverError>> {
    if (this.finished) return Promise.resolve(err(new DriverError('Transaction already ended')));
    return Promise.resolve(this.run(this.tables, statement));
  }

  commit(): Promise<Result<void, DriverError>> {
    if (this.finished) return Promise.resolve(err(new DriverError('Transaction already ended')));
    this.finished = true;
    this.finish(this.tables);
    return Promise.resolve(ok(undefined));
  }

  rollback(): Promise<Result<void, DriverError>> {
    if (this.finished) return Promise.resolve(err(new DriverError('Transaction already ended')));
    this.finished = true;
    this.finish(undefined);
    return Promise.resolve(ok(undefined));
  }
}

/**
 * In-process driver keeping tables as arrays of rows. Generated columns get
 * the next integer above the column's current maximum. Every executed
 * statement is appended to `log`, including failed ones.
 *
 * Transactions run one at a time: a second begin waits for the first to end.
 * Selects outside a transaction see committed rows only; writes outside a
 * transaction wait like a begin does.
 */
export class MemoryDriver implements Driver {
  readonly log: Statement[] = [];
  private tables = new Map<string, StoredRow[]>();
  private lock: Promise<void> = Promise.resolve();
  private holders = 0;
  private failure: FailurePredicate | undefined;

  constructor(options?: MemoryDriverOptions) {
    this.failure = options?.failWhen;
  }

  get inTransaction(): boolean {
    return this.holders > 0;
  }

  failWhen(predicate: FailurePredicate | undefined): void {
    this.failure = predicate;
  }

  /** Insert rows directly, outside any statement log. */
  seed(table: string, rows: readonly Record<string, FieldValue>[]): void {
    const stored = this.tables.get(table) ?? [];
    stored.push(...rows.map(copyRow));
    this.tables.set(table, stored);
  }

  /** Committed rows of a table */
  rows(table: string): Record<string, FieldValue>[] {
    return (this.tables.get(table) ?? []).map(copyRow);
  }

  clearLog(): void {
    this.log.length = 0;
  }

  async execute(statement: Statement): Promise<Result<RowSet, DriverError>> {
    if (statement.kind === 'select') return this.apply(this.tables, statement);

    const release = await this.acquire();
    try {
      return this.apply(this.tables, statement);
    } finally {
      release();
    }
  }

  async beginTransaction(): Promise<Result<DriverTransaction, DriverError>> {
    const release = await this.acquire();
    return ok(
      new MemoryTransaction(
        copyTables(this.tables),
        (tables, statement) => this.apply(tables, statement),
        (tables) => {
          if (tables) this.tables = tables;
          release();
        }
      )
    );
  }

  private async acquire(): Promise<() => void> {
    const previous = this.lock;
    let release: () => void = () => undefined;
    this.lock = new Promise<void>((resolve) => {
      release = () => {
        this.holders--;
        resolve();
      };
    });
    this.holders++;
    await previous;
    return release;
  }

  private apply(tables: Map<string, StoredRow[]>, statement: Statement): Result<RowSet, DriverError> {
    const index = this.log.length;
    this.log.push(statement);

    const failure = this.failure?.(statement, index);
    if (failure) return err(failure);
    return ok(runStatement(tables, statement));
  }
}
