import { ok, type Result } from 'neverthrow';

import type { CollectionRelation } from '../descriptor/entity-type.js';
import type { Entity } from '../entity/entity.js';
import { DescriptorError, EntityStateError, type LoadError } from '../errors.js';

export interface RelationChange {
  readonly kind: 'add' | 'remove';
  readonly owner: Entity;
  readonly relation: CollectionRelation;
  readonly target: Entity;
}

export interface CollectionHost {
  /** Entities currently related in storage */
  fetchRelated(owner: Entity, relation: CollectionRelation): Promise<Result<Entity[], LoadError>>;
  /** Overlay pending adds and removes on a stored result */
  applyPending(owner: Entity, relation: CollectionRelation, stored: readonly Entity[]): Entity[];
  record(change: RelationChange): void;
}

export interface RelatedCollectionOptions {
  /** Reuse the first stored result until `invalidate()` */
  cache?: boolean | undefined;
}

/**
 * Lazy, restartable view of a to-many or many-to-many relation. Every
 * `load()` queries storage again unless the collection caches.
 */
export class RelatedCollection implements AsyncIterable<Entity> {
  private stored: Entity[] | undefined;

  constructor(
    readonly owner: Entity,
    readonly relation: CollectionRelation,
    private readonly host: CollectionHost,
    private readonly options: RelatedCollectionOptions = {}
  ) {}

  get caching(): boolean {
    return this.options.cache ?? false;
  }

  async load(): Promise<Result<Entity[], LoadError>> {
    let stored = this.caching ? this.stored : undefined;
    if (!stored) {
      const fetched = await this.host.fetchRelated(this.owner, this.relation);
      if (fetched.isErr()) return fetched;
      stored = fetched.value;
      if (this.caching) this.stored = stored;
    }
    return ok(this.host.applyPending(this.owner, this.relation, stored));
  }

  add(entity: Entity): void {
    this.record('add', entity);
  }

  remove(entity: Entity): void {
    this.record('remove', entity);
  }

  invalidate(): void {
    this.stored = undefined;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Entity> {
    const loaded = await this.load();
    if (loaded.isErr()) throw loaded.error;
    yield* loaded.value;
  }

  private record(kind: RelationChange['kind'], target: Entity): void {
    if (target.type.name !== this.relation.target) {
      throw new DescriptorError(
        `${this.owner.type.name}.${this.relation.name} holds ${this.relation.target}, not ${target.type.name}`
      );
    }
    if (this.owner.state === 'deleted' || this.owner.state === 'detached') {
      throw new EntityStateError(`Cannot change ${this.relation.name} of ${this.owner.toString()}: owner is ${this.owner.state}`, {
        context: { entity: this.owner.type.name, relation: this.relation.name },
      });
    }
    this.host.record({ kind, owner: this.owner, relation: this.relation, target });
  }
}
