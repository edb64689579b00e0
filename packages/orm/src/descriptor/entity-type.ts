import { DescriptorError, UnknownFieldError } from '../errors.js';

import { entityDefinitionSchema } from './definition-schema.js';
import {
  describeField,
  KEY_FIELD_TYPES,
  toSnakeCase,
  type FieldDescriptor,
  type FieldSpecs,
  type FieldType,
  type FieldValueOf,
} from './field.js';

function isKeyType(type: FieldType | undefined): boolean {
  return type !== undefined && KEY_FIELD_TYPES.has(type);
}

export interface ToOneRelationSpec {
  kind: 'to-one';
  /** Name of the referenced entity type */
  target: string;
  /** Field of the owner holding the referenced primary key */
  foreignKey: string;
  /** Insert a transient target along with the owner */
  cascade?: boolean | undefined;
}

export interface ToManyRelationSpec {
  kind: 'to-many';
  target: string;
  /** Name of the target's to-one relation that points back at the owner */
  mappedBy: string;
  /** Register transient entities added to the collection automatically */
  cascade?: boolean | undefined;
  /** What happens to an entity removed from the collection */
  orphan?: 'nullify' | 'delete' | undefined;
}

export interface ManyToManyRelationSpec {
  kind: 'many-to-many';
  target: string;
  through: { table: string; ownerColumn: string; targetColumn: string };
  cascade?: boolean | undefined;
}

export type RelationSpec = ToOneRelationSpec | ToManyRelationSpec | ManyToManyRelationSpec;

export interface ToOneRelation {
  readonly kind: 'to-one';
  readonly name: string;
  readonly target: string;
  readonly foreignKey: string;
  readonly cascade: boolean;
}

export interface ToManyRelation {
  readonly kind: 'to-many';
  readonly name: string;
  readonly target: string;
  readonly mappedBy: string;
  readonly cascade: boolean;
  readonly orphan: 'nullify' | 'delete';
}

export interface ManyToManyRelation {
  readonly kind: 'many-to-many';
  readonly name: string;
  readonly target: string;
  readonly through: Readonly<{ table: string; ownerColumn: string; targetColumn: string }>;
  readonly cascade: boolean;
}

export type CollectionRelation = ToManyRelation | ManyToManyRelation;
export type RelationDescriptor = ToOneRelation | CollectionRelation;

export interface EntityDefinition<TFields extends FieldSpecs> {
  name: string;
  /** Table name; defaults to the snake_case entity name */
  table?: string | undefined;
  fields: TFields;
  primaryKey: (keyof TFields & string) | readonly (keyof TFields & string)[];
  relations?: Record<string, RelationSpec> | undefined;
}

function describeRelation(name: string, spec: RelationSpec): RelationDescriptor {
  switch (spec.kind) {
    case 'to-one': {
      const relation: ToOneRelation = {
        kind: 'to-one',
        name,
        target: spec.target,
        foreignKey: spec.foreignKey,
        cascade: spec.cascade ?? false,
      };
      return Object.freeze(relation);
    }
    case 'to-many': {
      const relation: ToManyRelation = {
        kind: 'to-many',
        name,
        target: spec.target,
        mappedBy: spec.mappedBy,
        cascade: spec.cascade ?? false,
        orphan: spec.orphan ?? 'nullify',
      };
      return Object.freeze(relation);
    }
    case 'many-to-many': {
      const relation: ManyToManyRelation = {
        kind: 'many-to-many',
        name,
        target: spec.target,
        through: Object.freeze({ ...spec.through }),
        cascade: spec.cascade ?? false,
      };
      return Object.freeze(relation);
    }
  }
}

/**
 * Static metadata of one entity type. Immutable once constructed.
 */
export class EntityType<TFields extends FieldSpecs = FieldSpecs> {
  readonly name: string;
  readonly table: string;
  readonly specs: Readonly<TFields>;
  readonly fields: readonly FieldDescriptor[];
  readonly primaryKey: readonly string[];
  readonly relations: readonly RelationDescriptor[];

  private readonly fieldsByName: ReadonlyMap<string, FieldDescriptor>;
  private readonly relationsByName: ReadonlyMap<string, RelationDescriptor>;

  constructor(definition: EntityDefinition<TFields>) {
    this.name = definition.name;
    this.table = definition.table ?? toSnakeCase(definition.name);
    this.specs = Object.freeze({ ...definition.fields });
    this.fields = Object.freeze(Object.entries(definition.fields).map(([name, spec]) => describeField(name, spec)));
    this.primaryKey = Object.freeze(
      typeof definition.primaryKey === 'string' ? [definition.primaryKey] : [...definition.primaryKey]
    );
    this.relations = Object.freeze(
      Object.entries(definition.relations ?? {}).map(([name, spec]) => describeRelation(name, spec))
    );
    this.fieldsByName = new Map(this.fields.map((field) => [field.name, field]));
    this.relationsByName = new Map(this.relations.map((relation) => [relation.name, relation]));
    Object.freeze(this);
  }

  field(name: string): FieldDescriptor | undefined {
    return this.fieldsByName.get(name);
  }

  /**
   * @throws UnknownFieldError
   */
  requireField(name: string): FieldDescriptor {
    const field = this.fieldsByName.get(name);
    if (!field) throw new UnknownFieldError(this.name, name);
    return field;
  }

  relation(name: string): RelationDescriptor | undefined {
    return this.relationsByName.get(name);
  }

  /**
   * @throws UnknownFieldError
   */
  requireRelation(name: string): RelationDescriptor {
    const relation = this.relationsByName.get(name);
    if (!relation) throw new UnknownFieldError(this.name, name, 'relation');
    return relation;
  }

  keyFields(): FieldDescriptor[] {
    return this.primaryKey.map((name) => this.requireField(name));
  }

  toOneRelations(): ToOneRelation[] {
    return this.relations.filter((relation): relation is ToOneRelation => relation.kind === 'to-one');
  }
}

/** Field values of a fully loaded entity of type `T`, e.g. `EntityValues<typeof Order>`. */
export type EntityValues<T> = T extends EntityType<infer F> ? { [K in keyof F]: FieldValueOf<F[K]> } : never;

/**
 * Validate a definition and build its EntityType. Field value types are
 * inferred from the definition, so `defineEntity({... fields: { total:
 * { type: 'decimal' } } })` types repository input as `{ total: Decimal }`.
 *
 * @throws DescriptorError when the definition is malformed or inconsistent
 */
export function defineEntity<TFields extends FieldSpecs>(definition: EntityDefinition<TFields>): EntityType<TFields> {
  const parsed = entityDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new DescriptorError(`Invalid entity definition "${String(definition.name)}": ${issues.join('; ')}`, {
      context: { entity: definition.name, issues },
    });
  }

  const problems: string[] = [];
  const fieldNames = new Set(Object.keys(definition.fields));
  const keyNames = typeof definition.primaryKey === 'string' ? [definition.primaryKey] : definition.primaryKey;

  for (const key of keyNames) {
    if (!fieldNames.has(key)) problems.push(`primary key "${key}" is not a field`);
    else if (definition.fields[key]?.nullable) problems.push(`primary key "${key}" cannot be nullable`);
    else if (!isKeyType(definition.fields[key]?.type)) {
      problems.push(`primary key "${key}" has type ${String(definition.fields[key]?.type)}; keys must be string, integer or number`);
    }
  }
  if (new Set(keyNames).size !== keyNames.length) problems.push('primary key lists a field twice');

  const columns = new Map<string, string>();
  for (const [name, spec] of Object.entries(definition.fields)) {
    const column = spec.column ?? toSnakeCase(name);
    const previous = columns.get(column);
    if (previous) problems.push(`fields "${previous}" and "${name}" share column "${column}"`);
    columns.set(column, name);
  }

  for (const [name, spec] of Object.entries(definition.relations ?? {})) {
    if (fieldNames.has(name)) problems.push(`relation "${name}" clashes with a field of the same name`);
    if (spec.kind === 'to-one' && !fieldNames.has(spec.foreignKey)) {
      problems.push(`relation "${name}" uses unknown foreign key field "${spec.foreignKey}"`);
    }
  }

  if (problems.length > 0) {
    throw new DescriptorError(`Invalid entity definition "${definition.name}": ${problems.join('; ')}`, {
      context: { entity: definition.name, issues: problems },
    });
  }

  return new EntityType(definition);
}
