import type { EntityType } from '../descriptor/entity-type.js';
import type { FieldInput, FieldValue } from '../descriptor/field.js';
import { EntityStateError } from '../errors.js';
import { formatKey, type KeyTuple, type PrimaryKeyValue } from '../identity/identity-key.js';

export type EntityState = 'transient' | 'managed' | 'deleted' | 'detached';

/**
 * Cached target of a to-one relation. `unloaded` means the target has not
 * been resolved since the foreign key last changed.
 */
export type RelationSlot = { readonly status: 'unloaded' } | { readonly status: 'loaded'; readonly value: Entity | null };

const UNLOADED: RelationSlot = Object.freeze({ status: 'unloaded' });

function isKeyValue(value: FieldValue | undefined): value is PrimaryKeyValue {
  return typeof value === 'string' || typeof value === 'number';
}

/**
 * One row's worth of state for an entity type, plus its lifecycle state and
 * the cached targets of its to-one relations.
 *
 * Members marked internal are driven by the unit of work and bypass the
 * lifecycle checks applied to `set`.
 */
export class Entity {
  readonly type: EntityType;
  private _state: EntityState = 'transient';
  private readonly fieldValues = new Map<string, FieldValue>();
  private readonly slots = new Map<string, RelationSlot>();

  constructor(type: EntityType, values: FieldInput = {}) {
    this.type = type;
    for (const [name, value] of Object.entries(values)) {
      type.requireField(name);
      if (value !== undefined) this.fieldValues.set(name, value);
    }
  }

  get state(): EntityState {
    return this._state;
  }

  /**
   * @throws UnknownFieldError
   */
  get(field: string): FieldValue | undefined {
    this.type.requireField(field);
    return this.fieldValues.get(field);
  }

  /**
   * Assign a field. Type and nullability are checked at commit. Assigning a
   * foreign key drops the cached target of the relations that use it.
   *
   * @throws UnknownFieldError
   * @throws EntityStateError when the entity is deleted or detached
   */
  set(field: string, value: FieldValue | undefined): void {
    this.type.requireField(field);
    if (this._state === 'deleted' || this._state === 'detached') {
      throw new EntityStateError(`Cannot modify ${this.toString()}: entity is ${this._state}`, {
        context: { entity: this.type.name, field, state: this._state },
      });
    }
    this.writeField(field, value);
    for (const relation of this.type.toOneRelations()) {
      if (relation.foreignKey === field) this.slots.delete(relation.name);
    }
  }

  /**
   * Current values of every declared field; unset fields are `undefined`.
   */
  values(): Record<string, FieldValue | undefined> {
    return Object.fromEntries(this.type.fields.map((field) => [field.name, this.fieldValues.get(field.name)]));
  }

  /**
   * Primary-key tuple, or undefined while any key field is unset.
   */
  key(): KeyTuple | undefined {
    const key: PrimaryKeyValue[] = [];
    for (const name of this.type.primaryKey) {
      const value = this.fieldValues.get(name);
      if (!isKeyValue(value)) return undefined;
      key.push(value);
    }
    return key;
  }

  slot(relation: string): RelationSlot {
    this.type.requireRelation(relation);
    return this.slots.get(relation) ?? UNLOADED;
  }

  toString(): string {
    return formatKey(this.type, this.key());
  }

  /** @internal */
  writeField(field: string, value: FieldValue | undefined): void {
    if (value === undefined) this.fieldValues.delete(field);
    else this.fieldValues.set(field, value);
  }

  /** @internal */
  setSlot(relation: string, slot: RelationSlot): void {
    if (slot.status === 'unloaded') this.slots.delete(relation);
    else this.slots.set(relation, slot);
  }

  /** @internal */
  resetSlots(): void {
    this.slots.clear();
  }

  /** @internal */
  transition(state: EntityState): void {
    this._state = state;
  }
}
