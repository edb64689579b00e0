import type { ManyToManyRelation } from '../descriptor/entity-type.js';
import type {
  ColumnValue,
  Condition,
  DeleteStatement,
  InsertStatement,
  UpdateStatement,
} from '../driver/driver.js';
import type { Entity } from '../entity/entity.js';
import type { KeyTuple, PrimaryKeyValue } from '../identity/identity-key.js';
import { singleKeyField } from '../relations/relationship-resolver.js';
import type { FieldDelta, Snapshot } from '../tracking/change-tracker.js';

export interface LinkChange {
  readonly kind: 'link' | 'unlink';
  readonly owner: Entity;
  readonly relation: ManyToManyRelation;
  readonly target: Entity;
}

export function keyConditions(entity: Entity, key: KeyTuple): Condition[] {
  return entity.type.keyFields().map((field, index): Condition => ({
    op: 'eq',
    column: field.column,
    type: field.type,
    value: key[index] ?? null,
  }));
}

/**
 * Key the row was stored under: the snapshot key when there is one, so
 * an entity whose key fields were reassigned still targets its own row.
 */
export function storedKey(entity: Entity, snapshot: Snapshot | undefined): KeyTuple | undefined {
  if (!snapshot) return entity.key();

  const key: PrimaryKeyValue[] = [];
  for (const name of entity.type.primaryKey) {
    const value = snapshot[name];
    if (typeof value !== 'string' && typeof value !== 'number') return undefined;
    key.push(value);
  }
  return key;
}

export function insertStatement(entity: Entity): InsertStatement {
  const values: ColumnValue[] = [];
  const generated: string[] = [];

  for (const field of entity.type.fields) {
    const value = entity.get(field.name);
    if (value !== undefined) values.push({ column: field.column, type: field.type, value });
    else if (field.generated) generated.push(field.column);
    else values.push({ column: field.column, type: field.type, value: null });
  }

  return { kind: 'insert', table: entity.type.table, entity: entity.type.name, values, generated };
}

export function updateStatement(entity: Entity, deltas: readonly FieldDelta[], key: KeyTuple): UpdateStatement {
  const values = deltas.map((delta) => ({
    column: delta.column,
    type: entity.type.requireField(delta.field).type,
    value: delta.current ?? null,
  }));
  return { kind: 'update', table: entity.type.table, entity: entity.type.name, values, where: keyConditions(entity, key) };
}

export function deleteStatement(entity: Entity, key: KeyTuple): DeleteStatement {
  return { kind: 'delete', table: entity.type.table, entity: entity.type.name, where: keyConditions(entity, key) };
}

export function linkStatement(
  link: LinkChange,
  ownerKey: PrimaryKeyValue,
  targetKey: PrimaryKeyValue
): InsertStatement | DeleteStatement {
  const { through } = link.relation;
  const ownerType = singleKeyField(link.owner.type).type;
  const targetType = singleKeyField(link.target.type).type;

  if (link.kind === 'link') {
    return {
      kind: 'insert',
      table: through.table,
      values: [
        { column: through.ownerColumn, type: ownerType, value: ownerKey },
        { column: through.targetColumn, type: targetType, value: targetKey },
      ],
      generated: [],
    };
  }
  return {
    kind: 'delete',
    table: through.table,
    where: [
      { op: 'eq', column: through.ownerColumn, type: ownerType, value: ownerKey },
      { op: 'eq', column: through.targetColumn, type: targetType, value: targetKey },
    ],
  };
}
