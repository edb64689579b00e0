import { err, ok, type Result } from 'neverthrow';

import { DescriptorError } from '../errors.js';

import type { EntityType, RelationDescriptor } from './entity-type.js';

/**
 * Registry of entity types by name. Relations refer to their targets by
 * name, so mutually referencing types can be registered in any order;
 * `validate()` checks that every reference resolves.
 */
export class EntityRegistry {
  private readonly byName = new Map<string, EntityType>();
  private _sealed = false;

  constructor(types: readonly EntityType[] = []) {
    for (const type of types) this.register(type);
  }

  /**
   * @throws DescriptorError on a duplicate name or after validate() sealed the registry
   */
  register(type: EntityType): this {
    if (this._sealed) {
      throw new DescriptorError(`Cannot register ${type.name}: registry is sealed`);
    }
    if (this.byName.has(type.name)) {
      throw new DescriptorError(`Entity type ${type.name} is already registered`, { context: { entity: type.name } });
    }
    this.byName.set(type.name, type);
    return this;
  }

  find(name: string): EntityType | undefined {
    return this.byName.get(name);
  }

  /**
   * @throws DescriptorError when no type of that name is registered
   */
  get(name: string): EntityType {
    const type = this.byName.get(name);
    if (!type) throw new DescriptorError(`Unknown entity type ${name}`, { context: { entity: name } });
    return type;
  }

  types(): EntityType[] {
    return [...this.byName.values()];
  }

  target(relation: RelationDescriptor): EntityType {
    return this.get(relation.target);
  }

  /**
   * @throws UnknownFieldError when the type has no such relation
   * @throws DescriptorError when the target is not registered
   */
  relationTarget(type: EntityType, relation: string): EntityType {
    return this.target(type.requireRelation(relation));
  }

  get sealed(): boolean {
    return this._sealed;
  }

  /**
   * Check every relation against the registered types and seal the registry.
   */
  validate(): Result<void, DescriptorError> {
    const problems: string[] = [];

    for (const type of this.byName.values()) {
      for (const relation of type.relations) {
        const where = `${type.name}.${relation.name}`;
        const target = this.byName.get(relation.target);
        if (!target) {
          problems.push(`${where} targets unknown entity type ${relation.target}`);
          continue;
        }
        if (target.primaryKey.length !== 1) {
          problems.push(`${where} targets ${target.name}, which has a composite primary key`);
        }

        if (relation.kind === 'to-many') {
          const back = target.relation(relation.mappedBy);
          if (back?.kind !== 'to-one' || back.target !== type.name) {
            problems.push(`${where} is mapped by ${target.name}.${relation.mappedBy}, which is not a to-one relation to ${type.name}`);
          }
        }

        if (relation.kind !== 'to-one' && type.primaryKey.length !== 1) {
          problems.push(`${where} is a collection on ${type.name}, which has a composite primary key`);
        }
      }
    }

    if (problems.length > 0) {
      return err(new DescriptorError(`Invalid entity registry: ${problems.join('; ')}`, { context: { issues: problems } }));
    }

    this._sealed = true;
    return ok(undefined);
  }
}
