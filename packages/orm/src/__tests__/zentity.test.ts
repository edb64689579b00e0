import { sql, type Kysely, type Migration } from '@zentity/sqlite';
import { Decimal } from 'decimal.js';
import { err, type Result } from 'neverthrow';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { EntityRegistry } from '../descriptor/entity-registry.js';
import { defineEntity } from '../descriptor/entity-type.js';
import { MemoryDriver } from '../driver/memory-driver.js';
import { Entity } from '../entity/entity.js';
import { CommitError, DescriptorError } from '../errors.js';
import type { RegisterError } from '../unit-of-work/unit-of-work.js';
import { Zentity } from '../zentity.js';

import { createShopRegistry, Customer, loadEntity, Order, OrderLine, shopMigrations, Tag } from './test-utils.js';

describe('Zentity', () => {
  let zentity: Zentity;

  beforeEach(async () => {
    zentity = (
      await Zentity.initialize({ registry: createShopRegistry(), databasePath: ':memory:', migrations: shopMigrations })
    )._unsafeUnwrap();
  });

  afterEach(async () => {
    (await zentity.close())._unsafeUnwrap();
  });

  it('persists an object graph and loads it back', async () => {
    const result = await zentity.transaction(async (unitOfWork): Promise<Result<Entity, RegisterError>> => {
      const customer = unitOfWork.repository(Customer).create({ name: 'Ada' });
      if (customer.isErr()) return err(customer.error);

      const order = new Entity(Order, {
        total: new Decimal('99.90'),
        placedAt: new Date('2024-05-01T10:00:00.000Z'),
      });
      unitOfWork.assign(order, 'customer', customer.value);
      unitOfWork.many(order, 'lines').add(new Entity(OrderLine, { sku: 'A', quantity: 2 }));
      return unitOfWork.registerNew(order);
    });

    const saved = result._unsafeUnwrap();
    expect(saved.get('id')).toBe(1);
    expect(saved.get('customerId')).toBe(1);
    expect(saved.state).toBe('detached');

    const unitOfWork = zentity.createUnitOfWork();
    const order = await loadEntity(unitOfWork, Order, 1);
    expect(String(order.get('total'))).toBe('99.9');
    expect(order.get('placedAt')).toEqual(new Date('2024-05-01T10:00:00.000Z'));

    const customer = (await unitOfWork.one(order, 'customer'))._unsafeUnwrap();
    expect(customer?.get('name')).toBe('Ada');

    const lines = (await unitOfWork.many(order, 'lines').load())._unsafeUnwrap();
    expect(lines.map((line) => [line.get('sku'), line.get('orderId')])).toEqual([['A', 1]]);
  });

  it('links and unlinks many-to-many rows through the join table', async () => {
    const unitOfWork = zentity.createUnitOfWork();
    const order = new Entity(Order, { total: new Decimal(5) });
    const rush = new Entity(Tag, { label: 'rush' });
    const gift = new Entity(Tag, { label: 'gift', meta: { wrap: true } });
    unitOfWork.registerNew(order)._unsafeUnwrap();
    unitOfWork.many(order, 'tags').add(rush);
    unitOfWork.many(order, 'tags').add(gift);
    unitOfWork.registerNew(rush)._unsafeUnwrap();
    unitOfWork.registerNew(gift)._unsafeUnwrap();

    const summary = (await unitOfWork.commit())._unsafeUnwrap();
    expect(summary.linked).toBe(2);

    unitOfWork.many(order, 'tags').remove(rush);
    expect((await unitOfWork.commit())._unsafeUnwrap().unlinked).toBe(1);

    const reader = zentity.createUnitOfWork();
    const reloaded = await loadEntity(reader, Order, 1);
    const tags = (await reader.many(reloaded, 'tags').load())._unsafeUnwrap();
    expect(tags.map((tag) => [tag.get('label'), tag.get('meta')])).toEqual([['gift', { wrap: true }]]);
  });

  it('runs transactions of independent scopes side by side', async () => {
    const labels = ['rush', 'gift', 'fragile'];

    const results = await Promise.all(
      labels.map((label) =>
        zentity.transaction(async (unitOfWork): Promise<Result<Entity, Error>> => {
          const existing = await unitOfWork.findAll(Tag);
          if (existing.isErr()) return err(existing.error);
          return unitOfWork.repository(Tag).create({ label });
        })
      )
    );

    expect(results.map((result) => result.isOk())).toEqual([true, true, true]);
    const stored = (await zentity.createUnitOfWork().findAll(Tag))._unsafeUnwrap();
    expect(stored.map((tag) => tag.get('label')).sort()).toEqual(['fragile', 'gift', 'rush']);
  });

  it('rolls back every statement when a constraint fails', async () => {
    const unitOfWork = zentity.createUnitOfWork();
    unitOfWork.repository(Tag).create({ label: 'rush' })._unsafeUnwrap();
    unitOfWork.repository(OrderLine).create({ orderId: 999, sku: 'X', quantity: 1 })._unsafeUnwrap();

    const error = (await unitOfWork.commit())._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(CommitError);
    expect(error.message).toContain('FOREIGN KEY constraint failed');

    const reader = zentity.createUnitOfWork();
    expect((await reader.findAll(Tag))._unsafeUnwrap()).toEqual([]);
  });

  it('reports rows deleted by another scope as stale', async () => {
    const writer = zentity.createUnitOfWork();
    writer.repository(Tag).create({ label: 'rush' })._unsafeUnwrap();
    (await writer.commit())._unsafeUnwrap();

    const first = zentity.createUnitOfWork();
    const second = zentity.createUnitOfWork();
    const tag = await loadEntity(first, Tag, 1);
    second.registerDeleted(await loadEntity(second, Tag, 1))._unsafeUnwrap();
    (await second.commit())._unsafeUnwrap();

    tag.set('label', 'urgent');
    const error = (await first.commit())._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(CommitError);
    expect(error instanceof CommitError ? error.reason : undefined).toBe('stale');
  });

  it('rolls back when the callback returns an error', async () => {
    const result = await zentity.transaction((unitOfWork) => {
      unitOfWork.repository(Tag).create({ label: 'rush' })._unsafeUnwrap();
      return Promise.resolve(err(new Error('not today')));
    });

    expect(result._unsafeUnwrapErr().message).toBe('not today');
    expect((await zentity.createUnitOfWork().findAll(Tag))._unsafeUnwrap()).toEqual([]);
  });

  it('wraps errors thrown by the callback', async () => {
    const result = await zentity.transaction<void, Error>(() => Promise.reject(new Error('boom')));

    expect(result._unsafeUnwrapErr().message).toBe('Transaction failed: boom');
  });
});

describe('Zentity setup', () => {
  it('fails initialization when a migration fails', async () => {
    const broken: Record<string, Migration> = {
      '001_broken': {
        async up(db: Kysely<unknown>): Promise<void> {
          await sql`create table`.execute(db);
        },
      },
    };

    const result = await Zentity.initialize({ registry: createShopRegistry(), databasePath: ':memory:', migrations: broken });

    expect(result._unsafeUnwrapErr().message).toMatch(/^Migration failed: /);
  });

  it('rejects a registry with unresolved relation targets', () => {
    const Invoice = defineEntity({
      name: 'Invoice',
      fields: { id: { type: 'integer', generated: true }, orderId: { type: 'integer' } },
      primaryKey: 'id',
      relations: { order: { kind: 'to-one', target: 'Order', foreignKey: 'orderId' } },
    });

    const result = Zentity.withDriver(new EntityRegistry([Invoice]), new MemoryDriver());

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(DescriptorError);
  });

  it('leaves a driver it did not open alone on close', async () => {
    const zentity = Zentity.withDriver(createShopRegistry(), new MemoryDriver())._unsafeUnwrap();

    expect((await zentity.close()).isOk()).toBe(true);
  });
});
