import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { Entity } from '../entity/entity.js';
import { ChangeTracker } from '../tracking/change-tracker.js';

import { Order, Tag } from './test-utils.js';

function trackedOrder() {
  const tracker = new ChangeTracker();
  const order = new Entity(Order, {
    id: 1,
    customerId: 4,
    total: new Decimal('100'),
    placedAt: new Date('2024-05-01T10:00:00Z'),
  });
  tracker.snapshot(order);
  return { tracker, order };
}

describe('ChangeTracker', () => {
  it('reports nothing right after a snapshot', () => {
    const { tracker, order } = trackedOrder();
    expect(tracker.diff(order)).toEqual([]);
    expect(tracker.isDirty(order)).toBe(false);
  });

  it('reports changed fields with their column and both values', () => {
    const { tracker, order } = trackedOrder();
    order.set('customerId', 9);

    expect(tracker.diff(order)).toEqual([{ field: 'customerId', column: 'customer_id', previous: 4, current: 9 }]);
  });

  it('compares dates and decimals by value', () => {
    const { tracker, order } = trackedOrder();
    order.set('placedAt', new Date(Date.UTC(2024, 4, 1, 10)));
    order.set('total', new Decimal('100.000'));

    expect(tracker.isDirty(order)).toBe(false);
  });

  it('sees in-place mutation of a date', () => {
    const { tracker, order } = trackedOrder();
    const placedAt = order.get('placedAt');
    if (!(placedAt instanceof Date)) throw new Error('expected a date');
    placedAt.setUTCFullYear(2030);

    expect(tracker.diff(order).map((delta) => delta.field)).toEqual(['placedAt']);
  });

  it('compares json by structure and keeps the snapshot frozen', () => {
    const tracker = new ChangeTracker();
    const tag = new Entity(Tag, { id: 1, label: 'rush', meta: { priority: 1 } });
    const snapshot = tracker.snapshot(tag);

    tag.set('meta', { priority: 1 });
    expect(tracker.isDirty(tag)).toBe(false);
    expect(Object.isFrozen(snapshot.meta)).toBe(true);

    tag.set('meta', { priority: 2 });
    expect(tracker.diff(tag)).toEqual([{ field: 'meta', column: 'meta', previous: { priority: 1 }, current: { priority: 2 } }]);
  });

  it('has no tolerance for floating point drift', () => {
    const tracker = new ChangeTracker();
    const tag = new Entity(Tag, { id: 1, label: 'rush', meta: 0.3 });
    tracker.snapshot(tag);
    tag.set('meta', 0.1 + 0.2);

    expect(tracker.isDirty(tag)).toBe(true);
  });

  it('reports every assigned field when there is no snapshot', () => {
    const tracker = new ChangeTracker();
    const tag = new Entity(Tag, { label: 'rush' });

    expect(tracker.diff(tag)).toEqual([{ field: 'label', column: 'label', previous: undefined, current: 'rush' }]);
  });

  it('restores snapshot values', () => {
    const { tracker, order } = trackedOrder();
    order.set('total', new Decimal(5));
    order.set('placedAt', null);

    expect(tracker.restore(order)).toBe(true);
    expect(order.get('total')).toEqual(new Decimal('100'));
    expect(order.get('placedAt')).toEqual(new Date('2024-05-01T10:00:00Z'));
    expect(tracker.isDirty(order)).toBe(false);
  });

  it('forgets snapshots', () => {
    const { tracker, order } = trackedOrder();
    tracker.forget(order);

    expect(tracker.has(order)).toBe(false);
    expect(tracker.restore(order)).toBe(false);
  });
});
