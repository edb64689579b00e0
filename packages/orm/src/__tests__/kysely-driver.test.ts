import { closeSqliteDatabase, createSqliteDatabase, runMigrations, type Kysely } from '@zentity/sqlite';
import { Decimal } from 'decimal.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { Statement } from '../driver/driver.js';
import { compileStatement, KyselyDriver } from '../driver/kysely-driver.js';
import { DriverError } from '../errors.js';
import type { DynamicSchema } from '../zentity.js';

import { shopMigrations } from './test-utils.js';

describe('compileStatement', () => {
  let db: Kysely<DynamicSchema>;

  beforeEach(() => {
    db = createSqliteDatabase<DynamicSchema>(':memory:')._unsafeUnwrap();
  });

  afterEach(async () => {
    await closeSqliteDatabase(db);
  });

  it('compiles a select with conditions and ordering', () => {
    const compiled = compileStatement({
      kind: 'select',
      table: 'orders',
      where: [
        { op: 'eq', column: 'customer_id', type: 'integer', value: 7 },
        { op: 'is-null', column: 'placed_at' },
      ],
      orderBy: ['id'],
    }).compile(db);

    expect(compiled.sql).toBe('select * from "orders" where "customer_id" = ? and "placed_at" is null order by "id"');
    expect(compiled.parameters).toEqual([7]);
  });

  it('compiles an insert returning generated columns', () => {
    const compiled = compileStatement({
      kind: 'insert',
      table: 'orders',
      values: [
        { column: 'total', type: 'decimal', value: new Decimal('10.50') },
        { column: 'placed_at', type: 'date', value: new Date('2024-05-01T10:00:00.000Z') },
      ],
      generated: ['id'],
    }).compile(db);

    expect(compiled.sql).toBe('insert into "orders" ("total", "placed_at") values (?, ?) returning "id"');
    expect(compiled.parameters).toEqual(['10.5', '2024-05-01T10:00:00.000Z']);
  });

  it('compiles an empty in-list to a false condition', () => {
    const compiled = compileStatement({
      kind: 'delete',
      table: 'tag',
      where: [{ op: 'in', column: 'id', type: 'integer', values: [] }],
    }).compile(db);

    expect(compiled.sql).toBe('delete from "tag" where 1 = 0');
  });

  it('encodes json values as text', () => {
    const compiled = compileStatement({
      kind: 'update',
      table: 'tag',
      values: [{ column: 'meta', type: 'json', value: { rush: true } }],
      where: [{ op: 'eq', column: 'id', type: 'integer', value: 1 }],
    }).compile(db);

    expect(compiled.sql).toBe('update "tag" set "meta" = ? where "id" = ?');
    expect(compiled.parameters).toEqual(['{"rush":true}', 1]);
  });

  it('binds booleans as sqlite integers', () => {
    const compiled = compileStatement({
      kind: 'update',
      table: 'orders',
      values: [{ column: 'paid', type: 'boolean', value: false }],
      where: [{ op: 'eq', column: 'rush', type: 'boolean', value: true }],
    }).compile(db);

    expect(compiled.sql).toBe('update "orders" set "paid" = ? where "rush" = ?');
    expect(compiled.parameters).toEqual([0, 1]);
  });
});

describe('KyselyDriver', () => {
  let db: Kysely<DynamicSchema>;
  let driver: KyselyDriver<DynamicSchema>;

  const insertCustomer = (name: string): Statement => ({
    kind: 'insert',
    table: 'customer',
    values: [{ column: 'name', type: 'string', value: name }],
    generated: ['id'],
  });

  beforeEach(async () => {
    db = createSqliteDatabase<DynamicSchema>(':memory:')._unsafeUnwrap();
    (await runMigrations(db, shopMigrations))._unsafeUnwrap();
    driver = new KyselyDriver(db);
  });

  afterEach(async () => {
    await closeSqliteDatabase(db);
  });

  it('returns generated keys from inserts', async () => {
    const first = (await driver.execute(insertCustomer('Ada')))._unsafeUnwrap();
    const second = (await driver.execute(insertCustomer('Grace')))._unsafeUnwrap();

    expect(first).toEqual({ rows: [{ id: 1 }], affected: 1 });
    expect(second.rows).toEqual([{ id: 2 }]);
  });

  it('reports affected rows for updates and deletes', async () => {
    await driver.execute(insertCustomer('Ada'));
    await driver.execute(insertCustomer('Grace'));

    const updated = await driver.execute({
      kind: 'update',
      table: 'customer',
      values: [{ column: 'name', type: 'string', value: 'Ada L.' }],
      where: [{ op: 'eq', column: 'id', type: 'integer', value: 1 }],
    });
    const missing = await driver.execute({
      kind: 'delete',
      table: 'customer',
      where: [{ op: 'eq', column: 'id', type: 'integer', value: 42 }],
    });
    const selected = await driver.execute({ kind: 'select', table: 'customer', where: [], orderBy: ['id'] });

    expect(updated._unsafeUnwrap().affected).toBe(1);
    expect(missing._unsafeUnwrap().affected).toBe(0);
    expect(selected._unsafeUnwrap()).toEqual({
      rows: [
        { id: 1, name: 'Ada L.' },
        { id: 2, name: 'Grace' },
      ],
      affected: 2,
    });
  });

  it('discards statements of a rolled back transaction', async () => {
    const transaction = (await driver.beginTransaction())._unsafeUnwrap();
    (await transaction.execute(insertCustomer('Ada')))._unsafeUnwrap();
    (await transaction.rollback())._unsafeUnwrap();

    const selected = await driver.execute({ kind: 'select', table: 'customer', where: [] });
    expect(selected._unsafeUnwrap().rows).toEqual([]);
  });

  it('keeps statements of a committed transaction', async () => {
    const transaction = (await driver.beginTransaction())._unsafeUnwrap();
    (await transaction.execute(insertCustomer('Ada')))._unsafeUnwrap();
    (await transaction.commit())._unsafeUnwrap();

    const selected = await driver.execute({ kind: 'select', table: 'customer', where: [] });
    expect(selected._unsafeUnwrap().rows).toEqual([{ id: 1, name: 'Ada' }]);
  });

  it('does not run other statements inside an open transaction', async () => {
    const transaction = (await driver.beginTransaction())._unsafeUnwrap();
    (await transaction.execute(insertCustomer('Ghost')))._unsafeUnwrap();

    const outside = driver.execute({ kind: 'select', table: 'customer', where: [] });
    (await transaction.rollback())._unsafeUnwrap();

    expect((await outside)._unsafeUnwrap().rows).toEqual([]);
  });

  it('wraps database errors in DriverError', async () => {
    const result = await driver.execute({
      kind: 'insert',
      table: 'order_line',
      values: [{ column: 'order_id', type: 'integer', value: 999 }],
      generated: [],
    });

    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(DriverError);
    expect(error.message).toContain('Failed to insert order_line: NOT NULL constraint failed');
  });

  it('rejects statements on an ended transaction', async () => {
    const transaction = (await driver.beginTransaction())._unsafeUnwrap();
    (await transaction.commit())._unsafeUnwrap();

    const result = await transaction.execute(insertCustomer('Ada'));
    expect(result._unsafeUnwrapErr().message).toBe('Transaction already ended');
  });
});
