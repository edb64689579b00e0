import type { Kysely, Migration } from '@zentity/sqlite';
import { sql } from '@zentity/sqlite';

import { EntityRegistry } from '../descriptor/entity-registry.js';
import { defineEntity, type EntityType } from '../descriptor/entity-type.js';
import { MemoryDriver, type MemoryDriverOptions } from '../driver/memory-driver.js';
import type { Entity } from '../entity/entity.js';
import { UnitOfWork } from '../unit-of-work/unit-of-work.js';

export const Customer = defineEntity({
  name: 'Customer',
  fields: {
    id: { type: 'integer', generated: true },
    name: { type: 'string' },
  },
  primaryKey: 'id',
  relations: {
    orders: { kind: 'to-many', target: 'Order', mappedBy: 'customer' },
  },
});

export const Order = defineEntity({
  name: 'Order',
  table: 'orders',
  fields: {
    id: { type: 'integer', generated: true },
    customerId: { type: 'integer', nullable: true },
    total: { type: 'decimal' },
    placedAt: { type: 'date', nullable: true },
  },
  primaryKey: 'id',
  relations: {
    customer: { kind: 'to-one', target: 'Customer', foreignKey: 'customerId' },
    lines: { kind: 'to-many', target: 'OrderLine', mappedBy: 'order', cascade: true, orphan: 'delete' },
    tags: {
      kind: 'many-to-many',
      target: 'Tag',
      through: { table: 'order_tag', ownerColumn: 'order_id', targetColumn: 'tag_id' },
    },
  },
});

export const OrderLine = defineEntity({
  name: 'OrderLine',
  fields: {
    id: { type: 'integer', generated: true },
    orderId: { type: 'integer' },
    sku: { type: 'string' },
    quantity: { type: 'integer' },
  },
  primaryKey: 'id',
  relations: {
    order: { kind: 'to-one', target: 'Order', foreignKey: 'orderId' },
  },
});

export const Tag = defineEntity({
  name: 'Tag',
  fields: {
    id: { type: 'integer', generated: true },
    label: { type: 'string' },
    meta: { type: 'json', nullable: true },
  },
  primaryKey: 'id',
});

export function createShopRegistry(): EntityRegistry {
  const registry = new EntityRegistry([Customer, Order, OrderLine, Tag]);
  registry.validate()._unsafeUnwrap();
  return registry;
}

export interface TestScope {
  driver: MemoryDriver;
  registry: EntityRegistry;
  unitOfWork: UnitOfWork;
}

/**
 * Unit of work over a fresh MemoryDriver. Pass a driver to open a second
 * scope on the same storage.
 */
export function createTestScope(options?: { driver?: MemoryDriver; registry?: EntityRegistry } & MemoryDriverOptions): TestScope {
  const driver = options?.driver ?? new MemoryDriver({ failWhen: options?.failWhen });
  const registry = options?.registry ?? createShopRegistry();
  return { driver, registry, unitOfWork: new UnitOfWork({ driver, registry }) };
}

/**
 * Find by key and fail the test when the row is missing.
 */
export async function loadEntity(unitOfWork: UnitOfWork, type: EntityType, id: number): Promise<Entity> {
  const entity = (await unitOfWork.find(type, id))._unsafeUnwrap();
  if (!entity) throw new Error(`${type.name}#${id} is not stored`);
  return entity;
}

export const shopMigrations: Record<string, Migration> = {
  '001_shop': {
    async up(db: Kysely<unknown>): Promise<void> {
      await sql`create table customer (id integer primary key autoincrement, name text not null)`.execute(db);
      await sql`create table orders (
        id integer primary key autoincrement,
        customer_id integer references customer (id),
        total text not null,
        placed_at text
      )`.execute(db);
      await sql`create table order_line (
        id integer primary key autoincrement,
        order_id integer not null references orders (id),
        sku text not null,
        quantity integer not null
      )`.execute(db);
      await sql`create table tag (id integer primary key autoincrement, label text not null unique, meta text)`.execute(db);
      await sql`create table order_tag (
        order_id integer not null references orders (id),
        tag_id integer not null references tag (id),
        primary key (order_id, tag_id)
      )`.execute(db);
    },
  },
};
