import { err, ok, type Result } from 'neverthrow';

import type { EntityType } from '../descriptor/entity-type.js';
import type { Entity } from '../entity/entity.js';
import { DuplicateIdentityError, EntityStateError } from '../errors.js';
import type { ChangeTracker } from '../tracking/change-tracker.js';

import { identityKey, type KeyTuple } from './identity-key.js';

/**
 * Scope-owned registry holding at most one instance per (entity type, key).
 * Registering an instance also takes its initial snapshot.
 */
export class IdentityMap {
  private readonly buckets = new Map<string, Map<string, Entity>>();

  constructor(private readonly tracker: ChangeTracker) {}

  get(type: EntityType, key: KeyTuple): Entity | undefined {
    return this.buckets.get(type.name)?.get(identityKey(type, key));
  }

  register(entity: Entity): Result<void, DuplicateIdentityError | EntityStateError> {
    const key = entity.key();
    if (!key) {
      return err(
        new EntityStateError(`Cannot register ${entity.toString()}: primary key is incomplete`, {
          context: { entity: entity.type.name },
        })
      );
    }

    const bucket = this.buckets.get(entity.type.name) ?? new Map<string, Entity>();
    const id = identityKey(entity.type, key);
    const existing = bucket.get(id);

    if (existing === entity) return ok(undefined);
    if (existing) return err(new DuplicateIdentityError(entity.type.name, key));

    bucket.set(id, entity);
    this.buckets.set(entity.type.name, bucket);
    this.tracker.snapshot(entity);
    return ok(undefined);
  }

  /**
   * @returns whether an instance was registered under the key
   */
  forget(type: EntityType, key: KeyTuple): boolean {
    return this.buckets.get(type.name)?.delete(identityKey(type, key)) ?? false;
  }

  has(type: EntityType, key: KeyTuple): boolean {
    return this.get(type, key) !== undefined;
  }

  contains(entity: Entity): boolean {
    const key = entity.key();
    return key !== undefined && this.get(entity.type, key) === entity;
  }

  entries(): Entity[] {
    return [...this.buckets.values()].flatMap((bucket) => [...bucket.values()]);
  }

  get size(): number {
    let size = 0;
    for (const bucket of this.buckets.values()) size += bucket.size;
    return size;
  }

  clear(): void {
    this.buckets.clear();
  }
}
