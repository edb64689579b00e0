import type { FieldValue } from '../descriptor/field.js';
import type { Entity, RelationSlot } from '../entity/entity.js';

type UndoEntry =
  | { readonly kind: 'field'; readonly entity: Entity; readonly field: string; readonly previous: FieldValue | undefined }
  | { readonly kind: 'slot'; readonly entity: Entity; readonly relation: string; readonly previous: RelationSlot };

/**
 * Records every in-memory write a commit makes to tracked entities so a
 * failed commit can put them back.
 */
export class UndoLog {
  private entries: UndoEntry[] = [];

  write(entity: Entity, field: string, value: FieldValue | undefined): void {
    this.entries.push({ kind: 'field', entity, field, previous: entity.get(field) });
    entity.writeField(field, value);
  }

  setSlot(entity: Entity, relation: string, slot: RelationSlot): void {
    this.entries.push({ kind: 'slot', entity, relation, previous: entity.slot(relation) });
    entity.setSlot(relation, slot);
  }

  /**
   * Undo every recorded write, newest first.
   */
  replay(): void {
    for (const entry of this.entries.reverse()) {
      if (entry.kind === 'field') entry.entity.writeField(entry.field, entry.previous);
      else entry.entity.setSlot(entry.relation, entry.previous);
    }
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}
