import { err, ok, type Result } from 'neverthrow';

import type { EntityRegistry } from '../descriptor/entity-registry.js';
import type { CollectionRelation, ToOneRelation } from '../descriptor/entity-type.js';
import type { Entity } from '../entity/entity.js';
import { fieldValuesEqual } from '../entity/field-values.js';
import { validateEntity } from '../entity/validate-entity.js';
import { ValidationError, type CyclicDependencyError } from '../errors.js';
import { DependencyGraph } from '../graph/dependency-graph.js';
import type { IdentityMap } from '../identity/identity-map.js';
import type { RelationChange } from '../relations/related-collection.js';
import type { ChangeTracker } from '../tracking/change-tracker.js';

import type { LinkChange } from './statements.js';
import type { UndoLog } from './undo-log.js';

export interface CommitPlanInput {
  readonly registry: EntityRegistry;
  readonly tracker: ChangeTracker;
  readonly identityMap: IdentityMap;
  readonly undo: UndoLog;
  /** Every managed entity of the scope, pending inserts included */
  readonly tracked: ReadonlySet<Entity>;
  readonly newEntities: readonly Entity[];
  readonly deleted: readonly Entity[];
  readonly changes: readonly RelationChange[];
}

export interface WriteStep {
  readonly kind: 'insert' | 'update';
  readonly entity: Entity;
}

export interface CommitPlan {
  /** Inserts and updates in dependency order */
  readonly writes: readonly WriteStep[];
  /** Join-row removals first, then additions */
  readonly links: readonly LinkChange[];
  /** Deletes, dependants before the rows they reference */
  readonly deletes: readonly Entity[];
  readonly inserted: ReadonlySet<Entity>;
  /** Pending inserts dropped because they were orphaned before reaching storage */
  readonly cancelled: ReadonlySet<Entity>;
  /** To-one relations whose foreign key is only known once the target is inserted */
  readonly deferredKeys: ReadonlyMap<Entity, readonly ToOneRelation[]>;
}

/**
 * Turn the scope's pending work into an ordered statement plan. Every
 * in-memory write made while planning goes through the undo log.
 */
export function planCommit(input: CommitPlanInput): Result<CommitPlan, ValidationError | CyclicDependencyError> {
  const { tracker, identityMap, undo, tracked } = input;
  const inserted = new Set(input.newEntities);
  const deletes = new Set(input.deleted);
  const cancelled = new Set<Entity>();
  const links: LinkChange[] = [];
  const violations: string[] = [];

  const isScheduled = (entity: Entity) => inserted.has(entity) || (tracked.has(entity) && !deletes.has(entity));

  const admit = (owner: Entity, relation: CollectionRelation, target: Entity): boolean => {
    if (isScheduled(target)) return true;
    const where = `${owner.toString()}.${relation.name}`;

    if (target.state === 'transient' && relation.cascade) {
      inserted.add(target);
      return true;
    }
    if (target.state === 'transient') violations.push(`${target.toString()} was added to ${where} but is not registered`);
    else if (target.state === 'managed') violations.push(`${target.toString()} was added to ${where} but belongs to another unit of work`);
    else violations.push(`${target.toString()} was added to ${where} but is ${target.state}`);
    return false;
  };

  // 1a. collection changes
  for (const change of input.changes) {
    const { owner, relation, target } = change;
    if (deletes.has(owner)) continue;
    if (!isScheduled(owner)) {
      violations.push(`${owner.toString()} changed ${relation.name} but is not managed by this unit of work`);
      continue;
    }

    if (relation.kind === 'many-to-many') {
      if (change.kind === 'add' && !admit(owner, relation, target)) continue;
      if (change.kind === 'remove' && !tracked.has(target)) continue;
      links.push({ kind: change.kind === 'add' ? 'link' : 'unlink', owner, relation, target });
      continue;
    }

    if (change.kind === 'add') {
      if (admit(owner, relation, target)) undo.setSlot(target, relation.mappedBy, { status: 'loaded', value: owner });
      continue;
    }

    if (!pointsAt(target, relation.mappedBy, owner)) continue;
    if (relation.orphan === 'delete') {
      if (inserted.delete(target)) cancelled.add(target);
      else if (tracked.has(target)) deletes.add(target);
    } else {
      undo.setSlot(target, relation.mappedBy, { status: 'loaded', value: null });
    }
  }
  links.sort((a, b) => (a.kind === b.kind ? 0 : a.kind === 'unlink' ? -1 : 1));

  // 1b. foreign keys from loaded to-one slots
  const updates = [...tracked].filter((entity) => !inserted.has(entity) && !deletes.has(entity) && !cancelled.has(entity));
  const deferredKeys = new Map<Entity, ToOneRelation[]>();

  // cascaded targets join the list while it is walked
  const referencing = [...inserted, ...updates];
  for (let index = 0; index < referencing.length; index++) {
    const entity = referencing[index];
    if (!entity) continue;
    for (const relation of entity.type.toOneRelations()) {
      const slot = entity.slot(relation.name);
      if (slot.status === 'unloaded') continue;

      const target = slot.value;
      const foreignKey = entity.type.requireField(relation.foreignKey);
      if (!target) {
        if (entity.get(foreignKey.name) !== null) undo.write(entity, foreignKey.name, null);
        continue;
      }
      if (deletes.has(target) || cancelled.has(target)) {
        violations.push(`${entity.toString()}.${relation.name} references ${target.toString()}, which is being deleted`);
        continue;
      }
      if (!isScheduled(target)) {
        if (target.state !== 'transient' || !relation.cascade) {
          violations.push(`${entity.toString()}.${relation.name} references ${target.toString()}, which is not managed by this unit of work`);
          continue;
        }
        inserted.add(target);
        referencing.push(target);
      }

      const reference = target.key()?.[0];
      if (reference === undefined) {
        deferredKeys.set(entity, [...(deferredKeys.get(entity) ?? []), relation]);
      } else if (!fieldValuesEqual(foreignKey.type, entity.get(foreignKey.name), reference)) {
        undo.write(entity, foreignKey.name, reference);
      }
    }
  }

  // 2-3. validation, dirty updates
  const dirty = updates.filter((entity) => deferredKeys.has(entity) || tracker.isDirty(entity));
  const skipFor = (entity: Entity) =>
    new Set((deferredKeys.get(entity) ?? []).map((relation) => relation.foreignKey));

  for (const entity of inserted) {
    violations.push(...validateEntity(entity, { skip: skipFor(entity) }));
    const key = entity.key();
    const holder = key ? identityMap.get(entity.type, key) : undefined;
    if (holder && holder !== entity) violations.push(`${entity.toString()} is already managed by a different instance`);
  }
  for (const entity of dirty) {
    const fields = tracker.diff(entity).map((delta) => delta.field);
    violations.push(...validateEntity(entity, { fields, skip: skipFor(entity) }));

    const key = entity.key();
    const holder = key ? identityMap.get(entity.type, key) : undefined;
    if (holder && holder !== entity) violations.push(`${entity.toString()} is already managed by a different instance`);
  }

  if (violations.length > 0) {
    return err(
      new ValidationError(`Cannot commit: ${violations.length} violation(s)`, violations, {
        context: { violations },
      })
    );
  }

  // 4-5. ordering
  const writeGraph = new DependencyGraph<Entity>();
  const kinds = new Map<Entity, WriteStep['kind']>();
  for (const entity of inserted) {
    writeGraph.addNode(entity);
    kinds.set(entity, 'insert');
  }
  for (const entity of dirty) {
    writeGraph.addNode(entity);
    kinds.set(entity, 'update');
  }
  for (const entity of kinds.keys()) {
    for (const relation of entity.type.toOneRelations()) {
      const target = referencedEntity(input, entity, relation, entity.get(relation.foreignKey));
      if (target && inserted.has(target)) writeGraph.addDependency(entity, target);
    }
  }

  const deleteGraph = new DependencyGraph<Entity>();
  for (const entity of deletes) deleteGraph.addNode(entity);
  for (const entity of deletes) {
    for (const relation of entity.type.toOneRelations()) {
      const target = referencedEntity(input, entity, relation, tracker.get(entity)?.[relation.foreignKey]);
      // the referencing row goes first
      if (target && deletes.has(target)) deleteGraph.addDependency(target, entity);
    }
  }

  const describe = (entity: Entity) => entity.toString();
  const writeOrder = writeGraph.sort(describe);
  if (writeOrder.isErr()) return err(writeOrder.error);
  const deleteOrder = deleteGraph.sort(describe);
  if (deleteOrder.isErr()) return err(deleteOrder.error);

  return ok({
    writes: writeOrder.value.map((entity) => ({ kind: kinds.get(entity) ?? 'update', entity })),
    links,
    deletes: deleteOrder.value,
    inserted,
    cancelled,
    deferredKeys,
  });
}

/**
 * Tracked target of a to-one relation: the loaded slot, else the instance
 * the identity map holds for `reference`.
 */
function referencedEntity(
  lookup: Pick<CommitPlanInput, 'registry' | 'identityMap'>,
  entity: Entity,
  relation: ToOneRelation,
  reference: unknown
): Entity | undefined {
  const slot = entity.slot(relation.name);
  if (slot.status === 'loaded') return slot.value ?? undefined;
  if (typeof reference !== 'string' && typeof reference !== 'number') return undefined;
  return lookup.identityMap.get(lookup.registry.target(relation), [reference]);
}

/**
 * Whether `child`'s to-one relation currently points at `owner`, by slot or
 * by foreign key.
 */
function pointsAt(child: Entity, relationName: string, owner: Entity): boolean {
  const slot = child.slot(relationName);
  if (slot.status === 'loaded') return slot.value === owner;

  const relation = child.type.requireRelation(relationName);
  if (relation.kind !== 'to-one') return false;
  const ownerKey = owner.key()?.[0];
  return ownerKey !== undefined && child.get(relation.foreignKey) === ownerKey;
}
