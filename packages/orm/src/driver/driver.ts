import type { Result } from 'neverthrow';

import type { FieldType, FieldValue } from '../descriptor/field.js';
import type { DriverError } from '../errors.js';

export type StatementKind = 'insert' | 'update' | 'delete' | 'select';

export interface ColumnValue {
  readonly column: string;
  readonly type: FieldType;
  readonly value: FieldValue;
}

export type Condition =
  | { readonly op: 'eq'; readonly column: string; readonly type: FieldType; readonly value: FieldValue }
  | { readonly op: 'in'; readonly column: string; readonly type: FieldType; readonly values: readonly FieldValue[] }
  | { readonly op: 'is-null'; readonly column: string };

interface StatementTarget {
  readonly table: string;
  /** Entity type name, absent for join tables */
  readonly entity?: string | undefined;
}

export interface InsertStatement extends StatementTarget {
  readonly kind: 'insert';
  readonly values: readonly ColumnValue[];
  /** Columns whose storage-assigned values must come back in `RowSet.rows[0]` */
  readonly generated: readonly string[];
}

export interface UpdateStatement extends StatementTarget {
  readonly kind: 'update';
  readonly values: readonly ColumnValue[];
  readonly where: readonly Condition[];
}

export interface DeleteStatement extends StatementTarget {
  readonly kind: 'delete';
  readonly where: readonly Condition[];
}

export interface SelectStatement extends StatementTarget {
  readonly kind: 'select';
  readonly where: readonly Condition[];
  readonly orderBy?: readonly string[] | undefined;
}

/**
 * Dialect-free description of one storage operation. Translating it into a
 * query language is the driver's job.
 */
export type Statement = InsertStatement | UpdateStatement | DeleteStatement | SelectStatement;

export type Row = Readonly<Record<string, unknown>>;

export interface RowSet {
  readonly rows: readonly Row[];
  /** Rows inserted, updated or deleted; for selects, rows returned */
  readonly affected: number;
}

/**
 * One open storage transaction. Statements executed through it are visible
 * to nobody else until `commit()`.
 */
export interface DriverTransaction {
  execute(statement: Statement): Promise<Result<RowSet, DriverError>>;
  commit(): Promise<Result<void, DriverError>>;
  rollback(): Promise<Result<void, DriverError>>;
}

/**
 * What the core needs from storage. `execute` runs outside any transaction
 * and sees committed data only. A second `beginTransaction` waits until the
 * open one ends.
 */
export interface Driver {
  execute(statement: Statement): Promise<Result<RowSet, DriverError>>;
  beginTransaction(): Promise<Result<DriverTransaction, DriverError>>;
}

export function describeStatement(statement: Statement): string {
  return `${statement.kind} ${statement.table}`;
}
