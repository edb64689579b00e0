import { err, ok, Result } from 'neverthrow';

import type { EntityType } from '../descriptor/entity-type.js';
import type { EntityCriteria, FieldInput, FieldSpecs, NewEntityValues } from '../descriptor/field.js';
import { Entity } from '../entity/entity.js';
import { EntityStateError, type LoadError, type ScopeClosedError } from '../errors.js';
import type { KeyTuple, PrimaryKeyValue } from '../identity/identity-key.js';
import type { RegisterError, UnitOfWork } from '../unit-of-work/unit-of-work.js';

export interface GetOrCreateResult {
  entity: Entity;
  created: boolean;
}

/**
 * Typed access to one entity type within a unit of work.
 */
export class EntityRepository<TFields extends FieldSpecs> {
  constructor(
    readonly type: EntityType<TFields>,
    private readonly unitOfWork: UnitOfWork
  ) {}

  find(key: PrimaryKeyValue | KeyTuple): Promise<Result<Entity | undefined, LoadError | ScopeClosedError>> {
    return this.unitOfWork.find(this.type, key);
  }

  findBy(criteria: EntityCriteria<TFields> & FieldInput): Promise<Result<Entity[], LoadError | ScopeClosedError>> {
    return this.unitOfWork.findBy(this.type, criteria);
  }

  async findOneBy(criteria: EntityCriteria<TFields> & FieldInput): Promise<Result<Entity | undefined, LoadError | ScopeClosedError>> {
    const found = await this.findBy(criteria);
    return found.map((entities) => entities[0]);
  }

  findAll(): Promise<Result<Entity[], LoadError | ScopeClosedError>> {
    return this.unitOfWork.findAll(this.type);
  }

  /**
   * Build an entity and schedule it for insert.
   */
  create(values: NewEntityValues<TFields> & FieldInput): Result<Entity, RegisterError> {
    return this.unitOfWork.registerNew(new Entity(this.type, values));
  }

  /**
   * First stored entity matching every given value, or a new pending insert
   * built from them.
   */
  async getOrCreate(values: NewEntityValues<TFields> & FieldInput): Promise<Result<GetOrCreateResult, LoadError | RegisterError>> {
    const criteria: Record<string, FieldInput[string]> = {};
    for (const [name, value] of Object.entries(values)) {
      if (value !== undefined) criteria[name] = value;
    }

    const found = await this.unitOfWork.findBy(this.type, criteria);
    if (found.isErr()) return err(found.error);

    const [existing] = found.value;
    if (existing) return ok({ entity: existing, created: false });
    return this.create(values).map((entity) => ({ entity, created: true }));
  }

  /**
   * Stored entity matching the values set on `entity`, or `entity` itself
   * scheduled for insert.
   */
  getOrSave(entity: Entity): Promise<Result<GetOrCreateResult, LoadError | RegisterError>> {
    const wrongType = this.checkType(entity);
    if (wrongType) return Promise.resolve(err(wrongType));
    return this.unitOfWork.getOrSave(entity);
  }

  /**
   * Schedule a transient entity for insert; a managed entity of this unit of
   * work is already saved by the next commit.
   */
  save(entity: Entity): Result<Entity, RegisterError> {
    const wrongType = this.checkType(entity);
    if (wrongType) return err(wrongType);
    if (entity.state === 'transient') return this.unitOfWork.registerNew(entity);
    if (entity.state === 'managed' && this.unitOfWork.isTracked(entity)) return ok(entity);

    return err(
      new EntityStateError(`Cannot save ${entity.toString()}: entity is ${entity.state}`, {
        context: { entity: entity.type.name, key: entity.key(), state: entity.state },
      })
    );
  }

  saveAll(entities: readonly Entity[]): Result<Entity[], RegisterError> {
    return Result.combine(entities.map((entity) => this.save(entity)));
  }

  remove(entity: Entity): Result<Entity, EntityStateError | ScopeClosedError> {
    return this.unitOfWork.registerDeleted(entity);
  }

  private checkType(entity: Entity): EntityStateError | undefined {
    if (entity.type === this.type) return undefined;
    return new EntityStateError(`Cannot save ${entity.toString()} through the ${this.type.name} repository`, {
      context: { entity: entity.type.name, repository: this.type.name },
    });
  }
}
