import type { Decimal } from 'decimal.js';

export const FIELD_TYPES = ['string', 'integer', 'number', 'decimal', 'boolean', 'date', 'json'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/** Field types a primary key may use; keys are compared as strings or numbers */
export const KEY_FIELD_TYPES: ReadonlySet<FieldType> = new Set<FieldType>(['string', 'integer', 'number']);

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface FieldTypeMap {
  string: string;
  integer: number;
  number: number;
  decimal: Decimal;
  boolean: boolean;
  date: Date;
  json: JsonValue;
}

export type FieldValue = FieldTypeMap[FieldType] | null;

export interface FieldSpec {
  type: FieldType;
  nullable?: boolean | undefined;
  /** Column name; defaults to the snake_case field name */
  column?: string | undefined;
  /** Value assigned by storage on insert (auto-increment keys, defaults) */
  generated?: boolean | undefined;
}

export type FieldSpecs = Record<string, FieldSpec>;

export interface FieldDescriptor {
  readonly name: string;
  readonly column: string;
  readonly type: FieldType;
  readonly nullable: boolean;
  readonly generated: boolean;
}

export type FieldValueOf<S extends FieldSpec> = S extends { nullable: true }
  ? FieldTypeMap[S['type']] | null
  : FieldTypeMap[S['type']];

type RequiredFieldNames<F extends FieldSpecs> = {
  [K in keyof F]: F[K] extends { generated: true } ? never : F[K] extends { nullable: true } ? never : K;
}[keyof F];

type OptionalFieldNames<F extends FieldSpecs> = Exclude<keyof F, RequiredFieldNames<F>>;

/** Values accepted when creating an entity: generated and nullable fields may be omitted. */
export type NewEntityValues<F extends FieldSpecs> = { [K in RequiredFieldNames<F>]: FieldValueOf<F[K]> } & {
  [K in OptionalFieldNames<F>]?: FieldValueOf<F[K]> | undefined;
};

/** Equality criteria on any subset of fields. */
export type EntityCriteria<F extends FieldSpecs> = { [K in keyof F]?: FieldValueOf<F[K]> };

/** Untyped field input; every typed input is also checked against this shape. */
export type FieldInput = Readonly<Record<string, FieldValue | undefined>>;

/**
 * `OrderLine` → `order_line`, `customerId` → `customer_id`, `HTTPRequest` → `http_request`.
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
}

export function describeField(name: string, spec: FieldSpec): FieldDescriptor {
  return Object.freeze({
    name,
    column: spec.column ?? toSnakeCase(name),
    type: spec.type,
    nullable: spec.nullable ?? false,
    generated: spec.generated ?? false,
  });
}
