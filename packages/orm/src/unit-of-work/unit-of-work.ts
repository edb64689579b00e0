import { getErrorMessage } from '@zentity/core';
import { getLogger, type Logger } from '@zentity/logger';
import { err, ok, type Result } from 'neverthrow';

import type { EntityRegistry } from '../descriptor/entity-registry.js';
import type { EntityType } from '../descriptor/entity-type.js';
import type { FieldInput, FieldSpecs, FieldValue } from '../descriptor/field.js';
import type { Condition, Driver, DriverTransaction, RowSet, Statement } from '../driver/driver.js';
import { describeStatement } from '../driver/driver.js';
import type { Entity } from '../entity/entity.js';
import { cloneFieldValue, decodeFieldValue } from '../entity/field-values.js';
import {
  CommitError,
  DescriptorError,
  DriverError,
  EntityStateError,
  LoadError,
  ScopeClosedError,
  type CommitFailureReason,
  type CyclicDependencyError,
  type DuplicateIdentityError,
  type ValidationError,
} from '../errors.js';
import { sameKey, type KeyTuple, type PrimaryKeyValue } from '../identity/identity-key.js';
import { IdentityMap } from '../identity/identity-map.js';
import type { RelatedCollection, RelatedCollectionOptions } from '../relations/related-collection.js';
import { RelationshipResolver, type ResolvedRelation } from '../relations/relationship-resolver.js';
import { EntityRepository, type GetOrCreateResult } from '../repository/entity-repository.js';
import { ChangeTracker } from '../tracking/change-tracker.js';

import { planCommit, type CommitPlan } from './commit-planner.js';
import { EntityLoader } from './entity-loader.js';
import {
  deleteStatement,
  insertStatement,
  keyConditions,
  linkStatement,
  storedKey,
  updateStatement,
} from './statements.js';
import { UndoLog } from './undo-log.js';

export interface UnitOfWorkOptions {
  driver: Driver;
  /** Validated on first use when not sealed yet */
  registry: EntityRegistry;
  logger?: Logger | undefined;
}

export interface CommitOptions {
  signal?: AbortSignal | undefined;
}

export interface CommitSummary {
  inserted: number;
  updated: number;
  deleted: number;
  linked: number;
  unlinked: number;
  statements: number;
}

export type CommitFailure = CommitError | CyclicDependencyError | ValidationError | ScopeClosedError;
export type RegisterError = EntityStateError | DuplicateIdentityError | ScopeClosedError;

let nextScope = 1;

function emptySummary(): CommitSummary {
  return { inserted: 0, updated: 0, deleted: 0, linked: 0, unlinked: 0, statements: 0 };
}

/**
 * One business transaction: owns an identity map, a change tracker and the
 * pending relation changes, and turns them into a single atomic commit.
 *
 * A unit of work is confined to one logical flow. It does not share
 * identity with other scopes.
 */
export class UnitOfWork {
  readonly id = `uow-${nextScope++}`;
  readonly tracker = new ChangeTracker();
  readonly identityMap = new IdentityMap(this.tracker);
  readonly relations: RelationshipResolver;

  private readonly driver: Driver;
  private readonly registry: EntityRegistry;
  private readonly logger: Logger;
  private readonly loader: EntityLoader;

  /** managed entities, pending inserts included */
  private readonly tracked = new Set<Entity>();
  private readonly newEntities = new Set<Entity>();
  private readonly deleted = new Set<Entity>();
  private committing = false;
  private _closed = false;

  /**
   * @throws DescriptorError when the registry does not validate
   */
  constructor(options: UnitOfWorkOptions) {
    this.driver = options.driver;
    this.registry = options.registry;
    this.logger = (options.logger ?? getLogger('UnitOfWork')).child({ scope: this.id });

    if (!this.registry.sealed) {
      const validated = this.registry.validate();
      if (validated.isErr()) throw validated.error;
    }

    this.loader = new EntityLoader(this.driver, this.identityMap, this.logger);
    this.relations = new RelationshipResolver(this.registry, this.loader, this.identityMap, this.logger);
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Entities scheduled for insert, in registration order */
  get pendingInserts(): readonly Entity[] {
    return [...this.newEntities];
  }

  /** Entities scheduled for delete, in registration order */
  get pendingDeletes(): readonly Entity[] {
    return [...this.deleted];
  }

  isTracked(entity: Entity): boolean {
    return this.tracked.has(entity);
  }

  repository<TFields extends FieldSpecs>(type: EntityType<TFields>): EntityRepository<TFields> {
    this.assertRegistered(type);
    return new EntityRepository(type, this);
  }

  /**
   * Schedule a transient entity for insert.
   */
  registerNew(entity: Entity): Result<Entity, RegisterError> {
    if (this._closed) return err(new ScopeClosedError(this.id));
    this.assertRegistered(entity.type);
    if (entity.state !== 'transient') {
      return err(
        new EntityStateError(`Cannot register ${entity.toString()} as new: entity is ${entity.state}`, {
          context: { entity: entity.type.name, key: entity.key(), state: entity.state },
        })
      );
    }

    if (entity.key()) {
      const registered = this.identityMap.register(entity);
      if (registered.isErr()) return err(registered.error);
    }

    entity.transition('managed');
    this.tracked.add(entity);
    this.newEntities.add(entity);
    this.logger.trace(`Scheduled insert of ${entity.toString()}`);
    return ok(entity);
  }

  /**
   * Schedule a managed entity for delete. An entity that was only pending
   * insert goes back to transient instead.
   */
  registerDeleted(entity: Entity): Result<Entity, EntityStateError | ScopeClosedError> {
    if (this._closed) return err(new ScopeClosedError(this.id));
    if (entity.state !== 'managed' || !this.tracked.has(entity)) {
      const reason = entity.state === 'managed' ? 'managed by another unit of work' : entity.state;
      return err(
        new EntityStateError(`Cannot delete ${entity.toString()}: entity is ${reason}`, {
          context: { entity: entity.type.name, key: entity.key(), state: entity.state },
        })
      );
    }

    if (this.newEntities.delete(entity)) {
      this.untrack(entity);
      entity.transition('transient');
      this.logger.trace(`Cancelled insert of ${entity.toString()}`);
      return ok(entity);
    }

    entity.transition('deleted');
    this.deleted.add(entity);
    this.logger.trace(`Scheduled delete of ${entity.toString()}`);
    return ok(entity);
  }

  /**
   * Return the stored row matching every value set on `entity`, or schedule
   * `entity` for insert when none matches. Transient to-one targets are
   * resolved the same way first. On a match the stored values fill the unset
   * fields of `entity` and the managed instance is returned.
   */
  getOrSave(entity: Entity): Promise<Result<GetOrCreateResult, LoadError | RegisterError>> {
    return this.resolveOrSave(entity, new Set());
  }

  /**
   * Load by primary key. A tracked instance is returned without I/O.
   */
  async find(type: EntityType, key: PrimaryKeyValue | KeyTuple): Promise<Result<Entity | undefined, LoadError | ScopeClosedError>> {
    if (this._closed) return err(new ScopeClosedError(this.id));
    this.assertRegistered(type);

    const tuple: KeyTuple = typeof key === 'string' || typeof key === 'number' ? [key] : key;
    if (tuple.length !== type.primaryKey.length) {
      return err(
        new LoadError(`${type.name} key has ${type.primaryKey.length} field(s), got ${tuple.length}`, {
          context: { entity: type.name, key: tuple },
        })
      );
    }

    const tracked = this.identityMap.get(type, tuple);
    if (tracked) return ok(tracked);

    const loaded = await this.loader.select(
      type,
      type.keyFields().map((field, index): Condition => ({ op: 'eq', column: field.column, type: field.type, value: tuple[index] ?? null }))
    );
    return loaded.map((entities) => entities[0]);
  }

  /**
   * Load every row matching all criteria; a null criterion matches NULL.
   * @throws UnknownFieldError for a criterion naming no field
   */
  async findBy(type: EntityType, criteria: FieldInput): Promise<Result<Entity[], LoadError | ScopeClosedError>> {
    if (this._closed) return err(new ScopeClosedError(this.id));
    this.assertRegistered(type);

    const where: Condition[] = [];
    for (const [name, value] of Object.entries(criteria)) {
      if (value === undefined) continue;
      const field = type.requireField(name);
      where.push(value === null ? { op: 'is-null', column: field.column } : { op: 'eq', column: field.column, type: field.type, value });
    }
    return this.loader.select(type, where);
  }

  findAll(type: EntityType): Promise<Result<Entity[], LoadError | ScopeClosedError>> {
    return this.findBy(type, {});
  }

  resolve(entity: Entity, relation: string): Promise<Result<ResolvedRelation, LoadError | ScopeClosedError>> {
    if (this._closed) return Promise.resolve(err(new ScopeClosedError(this.id)));
    return this.relations.resolve(entity, relation);
  }

  one(entity: Entity, relation: string): Promise<Result<Entity | null, LoadError | ScopeClosedError>> {
    if (this._closed) return Promise.resolve(err(new ScopeClosedError(this.id)));
    return this.relations.one(entity, relation);
  }

  /**
   * @throws ScopeClosedError after close()
   */
  many(entity: Entity, relation: string, options?: RelatedCollectionOptions): RelatedCollection {
    this.assertOpen();
    return this.relations.many(entity, relation, options);
  }

  /**
   * @throws ScopeClosedError after close()
   */
  assign(entity: Entity, relation: string, target: Entity | null): void {
    this.assertOpen();
    this.relations.assign(entity, relation, target);
  }

  /**
   * Write every pending change in one transaction. On failure storage and
   * every tracked instance are left as they were before the call.
   */
  async commit(options: CommitOptions = {}): Promise<Result<CommitSummary, CommitFailure>> {
    if (this._closed) return err(new ScopeClosedError(this.id));
    if (this.committing) {
      return err(new CommitError('concurrent-commit', `Unit of work ${this.id} is already committing`, { context: { scope: this.id } }));
    }

    this.committing = true;
    const undo = new UndoLog();
    try {
      const planned = planCommit({
        registry: this.registry,
        tracker: this.tracker,
        identityMap: this.identityMap,
        undo,
        tracked: this.tracked,
        newEntities: [...this.newEntities],
        deleted: [...this.deleted],
        changes: this.relations.pending(),
      });
      if (planned.isErr()) {
        undo.replay();
        this.logger.warn({ error: planned.error }, `Commit rejected: ${planned.error.message}`);
        return err(planned.error);
      }

      const plan = planned.value;
      if (plan.writes.length === 0 && plan.links.length === 0 && plan.deletes.length === 0) {
        this.finalize(plan);
        return ok(emptySummary());
      }

      if (options.signal?.aborted) {
        undo.replay();
        return err(new CommitError('aborted', 'Commit aborted before the transaction started'));
      }

      const begun = await this.call(() => this.driver.beginTransaction());
      if (begun.isErr()) {
        undo.replay();
        this.logger.error({ error: begun.error }, 'Failed to begin transaction');
        return err(new CommitError('driver', `Failed to begin transaction: ${begun.error.message}`, { cause: begun.error }));
      }
      const transaction = begun.value;

      let executed: Result<CommitSummary, CommitError>;
      try {
        executed = await this.execute(plan, undo, transaction, options.signal);
      } catch (error) {
        executed = err(new CommitError('driver', `Commit failed: ${getErrorMessage(error)}`, { cause: error }));
      }
      if (executed.isErr()) {
        await this.rollbackTransaction(transaction);
        undo.replay();
        this.logger.warn({ error: executed.error, reason: executed.error.reason }, `Commit rolled back: ${executed.error.message}`);
        return err(executed.error);
      }

      this.finalize(plan);
      this.logger.debug({ ...executed.value }, 'Committed unit of work');
      return ok(executed.value);
    } finally {
      this.committing = false;
    }
  }

  /**
   * Discard pending work without touching storage.
   */
  rollback(): Result<void, ScopeClosedError> {
    if (this._closed) return err(new ScopeClosedError(this.id));

    const discarded = { inserts: this.newEntities.size, deletes: this.deleted.size, relationChanges: this.relations.pending().length };
    for (const entity of this.newEntities) {
      this.untrack(entity);
      entity.transition('transient');
      entity.resetSlots();
    }
    for (const entity of this.deleted) entity.transition('managed');
    for (const entity of this.tracked) {
      this.tracker.restore(entity);
      entity.resetSlots();
    }

    this.newEntities.clear();
    this.deleted.clear();
    this.relations.clearChanges();
    this.relations.invalidateCollections();
    this.logger.warn(discarded, 'Rolled back unit of work');
    return ok(undefined);
  }

  /**
   * End the scope. Every tracked entity becomes detached.
   */
  close(): void {
    if (this._closed) return;
    for (const entity of this.tracked) entity.transition('detached');
    this.tracked.clear();
    this.newEntities.clear();
    this.deleted.clear();
    this.identityMap.clear();
    this.tracker.clear();
    this.relations.clearChanges();
    this._closed = true;
    this.logger.debug('Closed unit of work');
  }

  private async resolveOrSave(
    entity: Entity,
    visiting: Set<Entity>
  ): Promise<Result<GetOrCreateResult, LoadError | RegisterError>> {
    if (this._closed) return err(new ScopeClosedError(this.id));
    this.assertRegistered(entity.type);
    if (entity.state === 'managed' && this.tracked.has(entity)) return ok({ entity, created: false });
    if (entity.state !== 'transient') {
      return err(
        new EntityStateError(`Cannot get or save ${entity.toString()}: entity is ${entity.state}`, {
          context: { entity: entity.type.name, key: entity.key(), state: entity.state },
        })
      );
    }
    visiting.add(entity);

    let referencesPending = false;
    for (const relation of entity.type.toOneRelations()) {
      const slot = entity.slot(relation.name);
      if (slot.status !== 'loaded' || !slot.value) continue;

      let target = slot.value;
      if (target.state === 'transient' && !visiting.has(target)) {
        const saved = await this.resolveOrSave(target, visiting);
        if (saved.isErr()) return err(saved.error);
        target = saved.value.entity;
        entity.setSlot(relation.name, { status: 'loaded', value: target });
      }

      const reference = target.key()?.[0];
      if (reference === undefined) referencesPending = true;
      else entity.writeField(relation.foreignKey, reference);
    }

    const criteria: Record<string, FieldValue> = {};
    for (const field of entity.type.fields) {
      const value = entity.get(field.name);
      if (value !== undefined && value !== null) criteria[field.name] = value;
    }

    // a row referencing a pending insert cannot be stored yet
    if (!referencesPending && Object.keys(criteria).length > 0) {
      const found = await this.findBy(entity.type, criteria);
      if (found.isErr()) return err(found.error);

      const [stored] = found.value;
      if (stored) {
        for (const field of entity.type.fields) {
          if (entity.get(field.name) === undefined) entity.writeField(field.name, cloneFieldValue(stored.get(field.name)));
        }
        this.logger.trace(`Matched ${entity.type.name} to stored ${stored.toString()}`);
        return ok({ entity: stored, created: false });
      }
    }

    return this.registerNew(entity).map((saved) => ({ entity: saved, created: true }));
  }

  private async execute(
    plan: CommitPlan,
    undo: UndoLog,
    transaction: DriverTransaction,
    signal: AbortSignal | undefined
  ): Promise<Result<CommitSummary, CommitError>> {
    const summary = emptySummary();

    const fail = (reason: CommitFailureReason, message: string, entity?: Entity, cause?: unknown) =>
      err(
        new CommitError(reason, message, {
          entity: entity?.type.name,
          key: entity ? (storedKey(entity, this.tracker.get(entity)) ?? entity.key()) : undefined,
          cause,
        })
      );

    const run = async (statement: Statement, entity?: Entity): Promise<Result<RowSet, CommitError>> => {
      if (signal?.aborted) {
        return fail('aborted', `Commit aborted before ${describeStatement(statement)}`, entity, signal.reason);
      }
      summary.statements++;
      const result = await this.call(() => transaction.execute(statement));
      if (result.isErr()) {
        this.logger.error({ error: result.error, statement: describeStatement(statement) }, 'Statement failed');
        const target = entity ? entity.toString() : statement.table;
        return fail('driver', `Failed to ${statement.kind} ${target}: ${result.error.message}`, entity, result.error);
      }
      return ok(result.value);
    };

    for (const step of plan.writes) {
      const { entity } = step;
      for (const relation of plan.deferredKeys.get(entity) ?? []) {
        const slot = entity.slot(relation.name);
        const reference = slot.status === 'loaded' ? slot.value?.key()?.[0] : undefined;
        if (reference === undefined) return fail('driver', `${entity.toString()}.${relation.name} target has no key`, entity);
        undo.write(entity, relation.foreignKey, reference);
      }

      if (step.kind === 'insert') {
        const statement = insertStatement(entity);
        const result = await run(statement, entity);
        if (result.isErr()) return err(result.error);

        const row = result.value.rows[0];
        for (const field of entity.type.fields) {
          if (!statement.generated.includes(field.column)) continue;
          const decoded = decodeFieldValue(field, row?.[field.column]);
          if (decoded.isErr()) return fail('driver', `Insert of ${entity.toString()} returned ${decoded.error}`, entity);
          undo.write(entity, field.name, decoded.value);
        }
        if (!entity.key()) return fail('driver', `Insert of ${entity.type.name} did not produce a primary key`, entity);
        summary.inserted++;
        continue;
      }

      const deltas = this.tracker.diff(entity);
      const key = storedKey(entity, this.tracker.get(entity));
      if (deltas.length === 0 || !key) continue;

      const result = await run(updateStatement(entity, deltas, key), entity);
      if (result.isErr()) return err(result.error);
      if (result.value.affected === 0) return fail('stale', `${entity.toString()} no longer exists in storage`, entity);
      summary.updated++;
    }

    for (const link of plan.links) {
      const ownerKey = link.owner.key()?.[0];
      const targetKey = link.target.key()?.[0];
      if (ownerKey === undefined || targetKey === undefined) {
        return fail('driver', `Cannot ${link.kind} ${link.owner.toString()} and ${link.target.toString()} without keys`, link.owner);
      }
      const result = await run(linkStatement(link, ownerKey, targetKey), link.owner);
      if (result.isErr()) return err(result.error);
      if (link.kind === 'link') summary.linked++;
      else summary.unlinked++;
    }

    for (const entity of plan.deletes) {
      const key = storedKey(entity, this.tracker.get(entity));
      if (!key) return fail('driver', `Cannot delete ${entity.toString()} without a key`, entity);

      const result = await run(deleteStatement(entity, key), entity);
      if (result.isErr()) return err(result.error);
      if (result.value.affected === 0) return fail('stale', `${entity.toString()} no longer exists in storage`, entity);
      summary.deleted++;
    }

    if (signal?.aborted) return fail('aborted', 'Commit aborted before the transaction was committed', undefined, signal.reason);

    const committed = await this.call(() => transaction.commit());
    if (committed.isErr()) {
      this.logger.error({ error: committed.error }, 'Failed to commit transaction');
      return fail('driver', `Failed to commit transaction: ${committed.error.message}`, undefined, committed.error);
    }
    return ok(summary);
  }

  /**
   * Adopt the committed state: new entities enter the identity map, deleted
   * ones leave it, and every managed entity gets a fresh snapshot.
   */
  private finalize(plan: CommitPlan): void {
    for (const entity of plan.cancelled) {
      this.untrack(entity);
      entity.transition('transient');
    }

    for (const entity of plan.deletes) {
      this.untrack(entity);
      entity.transition('detached');
      entity.resetSlots();
      this.relations.forget(entity);
    }

    for (const entity of this.tracked) {
      const previous = storedKey(entity, this.tracker.get(entity));
      const current = entity.key();
      if (previous && current && !sameKey(entity.type, previous, current)) {
        this.identityMap.forget(entity.type, previous);
      }
    }

    for (const entity of plan.inserted) {
      entity.transition('managed');
      this.tracked.add(entity);
    }

    for (const entity of this.tracked) {
      const registered = this.identityMap.register(entity);
      if (registered.isErr()) {
        this.logger.warn({ error: registered.error }, `Committed ${entity.toString()} but could not track it`);
      }
      this.tracker.snapshot(entity);
    }

    this.newEntities.clear();
    this.deleted.clear();
    this.relations.clearChanges();
    this.relations.invalidateCollections();
  }

  private untrack(entity: Entity): void {
    const key = storedKey(entity, this.tracker.get(entity));
    if (key && this.identityMap.get(entity.type, key) === entity) this.identityMap.forget(entity.type, key);
    this.tracker.forget(entity);
    this.tracked.delete(entity);
    this.newEntities.delete(entity);
    this.deleted.delete(entity);
  }

  private async rollbackTransaction(transaction: DriverTransaction): Promise<void> {
    const rolledBack = await this.call(() => transaction.rollback());
    if (rolledBack.isErr()) {
      this.logger.error({ error: rolledBack.error }, 'Failed to roll back transaction');
    }
  }

  /**
   * Driver calls may reject instead of returning an error result.
   */
  private async call<T>(operation: () => Promise<Result<T, DriverError>>): Promise<Result<T, DriverError>> {
    try {
      return await operation();
    } catch (error) {
      return err(new DriverError(getErrorMessage(error), { cause: error }));
    }
  }

  private assertOpen(): void {
    if (this._closed) throw new ScopeClosedError(this.id);
  }

  private assertRegistered(type: EntityType): void {
    if (this.registry.find(type.name) !== type) {
      throw new DescriptorError(`Entity type ${type.name} is not part of this registry`, { context: { entity: type.name } });
    }
  }
}
