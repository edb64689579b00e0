import type { Logger } from '@zentity/logger';
import { err, ok, type Result } from 'neverthrow';

import type { EntityRegistry } from '../descriptor/entity-registry.js';
import type { CollectionRelation, EntityType, ToOneRelation } from '../descriptor/entity-type.js';
import type { FieldDescriptor } from '../descriptor/field.js';
import type { Entity } from '../entity/entity.js';
import { DescriptorError, EntityStateError, LoadError } from '../errors.js';
import type { IdentityMap } from '../identity/identity-map.js';
import type { EntityLoader } from '../unit-of-work/entity-loader.js';

import {
  RelatedCollection,
  type CollectionHost,
  type RelatedCollectionOptions,
  type RelationChange,
} from './related-collection.js';

export type ResolvedRelation =
  | { readonly kind: 'to-one'; readonly entity: Entity | null }
  | { readonly kind: 'to-many'; readonly collection: RelatedCollection };

/**
 * @throws DescriptorError when the type does not have exactly one key field
 */
export function singleKeyField(type: EntityType): FieldDescriptor {
  const [field, ...rest] = type.keyFields();
  if (!field || rest.length > 0) {
    throw new DescriptorError(`${type.name} must have a single-field primary key to take part in relations`, {
      context: { entity: type.name },
    });
  }
  return field;
}

function isReference(value: unknown): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

/**
 * Resolves relation members for one scope. To-one targets are loaded on
 * first access and cached on the owner; collections stay lazy and record
 * membership changes for the next commit.
 */
export class RelationshipResolver implements CollectionHost {
  private changes: RelationChange[] = [];
  private readonly collections = new Map<Entity, Map<string, RelatedCollection>>();

  constructor(
    private readonly registry: EntityRegistry,
    private readonly loader: EntityLoader,
    private readonly identityMap: IdentityMap,
    private readonly logger: Logger
  ) {}

  async resolve(owner: Entity, name: string): Promise<Result<ResolvedRelation, LoadError>> {
    const relation = owner.type.requireRelation(name);
    if (relation.kind === 'to-one') {
      const target = await this.loadOne(owner, relation);
      return target.map((entity): ResolvedRelation => ({ kind: 'to-one', entity }));
    }
    const resolved: ResolvedRelation = { kind: 'to-many', collection: this.many(owner, name) };
    return ok(resolved);
  }

  /**
   * Target of a to-one relation; null when the foreign key is null or dangling.
   * @throws DescriptorError when the relation is a collection
   */
  one(owner: Entity, name: string): Promise<Result<Entity | null, LoadError>> {
    const relation = owner.type.requireRelation(name);
    if (relation.kind !== 'to-one') {
      throw new DescriptorError(`${owner.type.name}.${name} is a collection relation`);
    }
    return this.loadOne(owner, relation);
  }

  /**
   * Collection view of a to-many or many-to-many relation. Options take
   * effect when the view is first created for the owner.
   * @throws DescriptorError when the relation is to-one
   */
  many(owner: Entity, name: string, options?: RelatedCollectionOptions): RelatedCollection {
    const relation = owner.type.requireRelation(name);
    if (relation.kind === 'to-one') {
      throw new DescriptorError(`${owner.type.name}.${name} is a to-one relation`);
    }

    const views = this.collections.get(owner) ?? new Map<string, RelatedCollection>();
    let collection = views.get(name);
    if (!collection) {
      collection = new RelatedCollection(owner, relation, this, options);
      views.set(name, collection);
      this.collections.set(owner, views);
    }
    return collection;
  }

  /**
   * Point a to-one relation at `target`. The foreign key follows immediately
   * when the target has a key, otherwise at commit once the target is inserted.
   *
   * @throws DescriptorError when target has the wrong type
   * @throws EntityStateError when owner is deleted or detached
   */
  assign(owner: Entity, name: string, target: Entity | null): void {
    const relation = owner.type.requireRelation(name);
    if (relation.kind !== 'to-one') {
      throw new DescriptorError(`${owner.type.name}.${name} is a collection relation; use many() to change it`);
    }
    if (target && target.type.name !== relation.target) {
      throw new DescriptorError(`${owner.type.name}.${name} references ${relation.target}, not ${target.type.name}`);
    }
    if (owner.state === 'deleted' || owner.state === 'detached') {
      throw new EntityStateError(`Cannot change ${name} of ${owner.toString()}: entity is ${owner.state}`, {
        context: { entity: owner.type.name, relation: name },
      });
    }

    owner.setSlot(name, { status: 'loaded', value: target });
    if (!target) {
      owner.writeField(relation.foreignKey, null);
      return;
    }
    const key = target.key();
    if (key) owner.writeField(relation.foreignKey, key[0]);
  }

  async fetchRelated(owner: Entity, relation: CollectionRelation): Promise<Result<Entity[], LoadError>> {
    const ownerKey = owner.key()?.[0];
    // nothing in storage can point at an owner that has no key yet
    if (ownerKey === undefined) return ok([]);

    const targetType = this.registry.target(relation);

    if (relation.kind === 'to-many') {
      const back = targetType.requireRelation(relation.mappedBy);
      if (back.kind !== 'to-one') {
        throw new DescriptorError(`${targetType.name}.${relation.mappedBy} is not a to-one relation`);
      }
      const foreignKey = targetType.requireField(back.foreignKey);
      return this.loader.select(targetType, [
        { op: 'eq', column: foreignKey.column, type: foreignKey.type, value: ownerKey },
      ]);
    }

    const ownerField = singleKeyField(owner.type);
    const targetField = singleKeyField(targetType);
    const links = await this.loader.query({
      kind: 'select',
      table: relation.through.table,
      where: [{ op: 'eq', column: relation.through.ownerColumn, type: ownerField.type, value: ownerKey }],
      orderBy: [relation.through.targetColumn],
    });
    if (links.isErr()) return err(links.error);

    const keys = links.value.map((row) => row[relation.through.targetColumn]).filter(isReference);
    if (keys.length === 0) return ok([]);

    return this.loader.select(targetType, [{ op: 'in', column: targetField.column, type: targetField.type, values: keys }]);
  }

  applyPending(owner: Entity, relation: CollectionRelation, stored: readonly Entity[]): Entity[] {
    const pending = this.pending(owner, relation);
    const removed = new Set(pending.filter((change) => change.kind === 'remove').map((change) => change.target));
    const related = stored.filter((entity) => !removed.has(entity) && entity.state !== 'deleted');

    for (const change of pending) {
      if (change.kind === 'add' && !related.includes(change.target)) related.push(change.target);
    }
    return related;
  }

  /**
   * Record a membership change. An add followed by a remove of the same
   * target cancels out, and so does the reverse.
   */
  record(change: RelationChange): void {
    const sameMember = (other: RelationChange) =>
      other.owner === change.owner && other.relation === change.relation && other.target === change.target;

    const opposite = this.changes.findIndex((other) => sameMember(other) && other.kind !== change.kind);
    if (opposite >= 0) {
      this.changes.splice(opposite, 1);
      return;
    }
    if (this.changes.some((other) => sameMember(other) && other.kind === change.kind)) return;

    this.logger.trace({ owner: change.owner.toString(), relation: change.relation.name, target: change.target.toString() }, `Recorded collection ${change.kind}`);
    this.changes.push(change);
  }

  pending(owner?: Entity, relation?: CollectionRelation): RelationChange[] {
    return this.changes.filter(
      (change) => (!owner || change.owner === owner) && (!relation || change.relation === relation)
    );
  }

  clearChanges(): void {
    this.changes = [];
  }

  invalidateCollections(): void {
    for (const views of this.collections.values()) {
      for (const collection of views.values()) collection.invalidate();
    }
  }

  forget(owner: Entity): void {
    this.collections.delete(owner);
  }

  private async loadOne(owner: Entity, relation: ToOneRelation): Promise<Result<Entity | null, LoadError>> {
    const slot = owner.slot(relation.name);
    if (slot.status === 'loaded') return ok(slot.value);

    const reference = owner.get(relation.foreignKey);
    if (reference === null || reference === undefined) {
      owner.setSlot(relation.name, { status: 'loaded', value: null });
      return ok(null);
    }
    if (!isReference(reference)) {
      return err(
        new LoadError(`${owner.toString()}.${relation.foreignKey} does not hold a key value`, {
          context: { entity: owner.type.name, relation: relation.name },
        })
      );
    }

    const targetType = this.registry.target(relation);
    let target = this.identityMap.get(targetType, [reference]);
    if (!target) {
      const keyField = singleKeyField(targetType);
      const loaded = await this.loader.select(targetType, [
        { op: 'eq', column: keyField.column, type: keyField.type, value: reference },
      ]);
      if (loaded.isErr()) return err(loaded.error);
      target = loaded.value[0];
    }

    if (!target) {
      this.logger.warn(
        { entity: owner.toString(), relation: relation.name, reference },
        `Dangling reference from ${owner.toString()}.${relation.name}`
      );
    }
    owner.setSlot(relation.name, { status: 'loaded', value: target ?? null });
    return ok(target ?? null);
  }
}
