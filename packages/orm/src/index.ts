export {
  defineEntity,
  EntityType,
  type CollectionRelation,
  type EntityDefinition,
  type EntityValues,
  type ManyToManyRelation,
  type ManyToManyRelationSpec,
  type RelationDescriptor,
  type RelationSpec,
  type ToManyRelation,
  type ToManyRelationSpec,
  type ToOneRelation,
  type ToOneRelationSpec,
} from './descriptor/entity-type.js';
export { EntityRegistry } from './descriptor/entity-registry.js';
export {
  FIELD_TYPES,
  toSnakeCase,
  type EntityCriteria,
  type FieldDescriptor,
  type FieldInput,
  type FieldSpec,
  type FieldSpecs,
  type FieldType,
  type FieldValue,
  type FieldValueOf,
  type JsonValue,
  type NewEntityValues,
} from './descriptor/field.js';

export { Entity, type EntityState, type RelationSlot } from './entity/entity.js';
export { fieldValuesEqual, validateFieldValue } from './entity/field-values.js';
export { validateEntity, type ValidateEntityOptions } from './entity/validate-entity.js';

export { IdentityMap } from './identity/identity-map.js';
export { formatKey, identityKey, sameKey, type KeyTuple, type PrimaryKeyValue } from './identity/identity-key.js';
export { ChangeTracker, type FieldDelta, type Snapshot } from './tracking/change-tracker.js';
export { DependencyGraph } from './graph/dependency-graph.js';

export {
  RelatedCollection,
  type RelatedCollectionOptions,
  type RelationChange,
} from './relations/related-collection.js';
export { RelationshipResolver, type ResolvedRelation } from './relations/relationship-resolver.js';

export {
  UnitOfWork,
  type CommitFailure,
  type CommitOptions,
  type CommitSummary,
  type RegisterError,
  type UnitOfWorkOptions,
} from './unit-of-work/unit-of-work.js';

export {
  describeStatement,
  type ColumnValue,
  type Condition,
  type DeleteStatement,
  type Driver,
  type DriverTransaction,
  type InsertStatement,
  type Row,
  type RowSet,
  type SelectStatement,
  type Statement,
  type StatementKind,
  type UpdateStatement,
} from './driver/driver.js';
export { compileStatement, KyselyDriver } from './driver/kysely-driver.js';
export { MemoryDriver, type FailurePredicate, type MemoryDriverOptions } from './driver/memory-driver.js';

export { EntityRepository, type GetOrCreateResult } from './repository/entity-repository.js';
export { Zentity, type DynamicSchema, type ZentityOptions } from './zentity.js';

export {
  CommitError,
  CyclicDependencyError,
  DescriptorError,
  DriverError,
  DuplicateIdentityError,
  EntityStateError,
  LoadError,
  ScopeClosedError,
  UnknownFieldError,
  ValidationError,
  type CommitFailureReason,
} from './errors.js';
