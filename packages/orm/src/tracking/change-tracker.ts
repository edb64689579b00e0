import type { FieldValue } from '../descriptor/field.js';
import type { Entity } from '../entity/entity.js';
import { cloneFieldValue, fieldValuesEqual, frozenCopy } from '../entity/field-values.js';

/** Field values of an entity at load time or at its last commit. */
export type Snapshot = Readonly<Record<string, FieldValue | undefined>>;

export interface FieldDelta {
  readonly field: string;
  readonly column: string;
  readonly previous: FieldValue | undefined;
  readonly current: FieldValue | undefined;
}

/**
 * Keeps one snapshot per tracked entity and compares current values
 * against it field by field.
 */
export class ChangeTracker {
  private readonly snapshots = new Map<Entity, Snapshot>();

  snapshot(entity: Entity): Snapshot {
    const values = entity.values();
    const snapshot: Snapshot = Object.freeze(
      Object.fromEntries(entity.type.fields.map((field) => [field.name, frozenCopy(values[field.name])]))
    );
    this.snapshots.set(entity, snapshot);
    return snapshot;
  }

  get(entity: Entity): Snapshot | undefined {
    return this.snapshots.get(entity);
  }

  has(entity: Entity): boolean {
    return this.snapshots.has(entity);
  }

  /**
   * Fields whose current value differs from the snapshot. Without a
   * snapshot every assigned field is reported.
   */
  diff(entity: Entity): FieldDelta[] {
    const snapshot = this.snapshots.get(entity);
    const deltas: FieldDelta[] = [];

    for (const field of entity.type.fields) {
      const current = entity.get(field.name);
      const previous = snapshot?.[field.name];
      if (!snapshot && current === undefined) continue;
      if (snapshot && fieldValuesEqual(field.type, previous, current)) continue;
      deltas.push({ field: field.name, column: field.column, previous, current });
    }

    return deltas;
  }

  isDirty(entity: Entity): boolean {
    return this.diff(entity).length > 0;
  }

  /**
   * Write the snapshot back into the entity.
   * @returns false when the entity has no snapshot
   */
  restore(entity: Entity): boolean {
    const snapshot = this.snapshots.get(entity);
    if (!snapshot) return false;

    for (const field of entity.type.fields) {
      entity.writeField(field.name, cloneFieldValue(snapshot[field.name]));
    }
    return true;
  }

  forget(entity: Entity): void {
    this.snapshots.delete(entity);
  }

  clear(): void {
    this.snapshots.clear();
  }
}
