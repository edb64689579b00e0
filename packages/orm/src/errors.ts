import { DomainError, type DomainErrorOptions } from '@zentity/core';

export { ValidationError } from '@zentity/core';

/**
 * An entity definition or registry is inconsistent (unknown primary-key
 * field, dangling relation target...).
 */
export class DescriptorError extends DomainError {
  readonly code = 'DESCRIPTOR_ERROR';
}

export class UnknownFieldError extends DomainError {
  readonly code = 'UNKNOWN_FIELD';

  constructor(
    readonly entityName: string,
    readonly member: string,
    readonly memberKind: 'field' | 'relation' = 'field'
  ) {
    super(`${entityName} has no ${memberKind} named "${member}"`, { context: { entity: entityName, [memberKind]: member } });
  }
}

/**
 * An operation is not allowed in the entity's current lifecycle state.
 */
export class EntityStateError extends DomainError {
  readonly code = 'ENTITY_STATE';
}

/**
 * Two distinct instances claim the same identity within one scope.
 */
export class DuplicateIdentityError extends DomainError {
  readonly code = 'DUPLICATE_IDENTITY';

  constructor(
    readonly entityName: string,
    readonly key: readonly (string | number)[]
  ) {
    super(`${entityName}#${key.join(',')} is already managed by a different instance`, {
      context: { entity: entityName, key },
    });
  }
}

/**
 * The write set references itself in a loop, so no valid statement order exists.
 */
export class CyclicDependencyError extends DomainError {
  readonly code = 'CYCLIC_DEPENDENCY';

  constructor(readonly cycle: readonly string[]) {
    super(`Cyclic dependency between ${cycle.join(' -> ')}`, { context: { cycle } });
  }
}

export class DriverError extends DomainError {
  readonly code = 'DRIVER_ERROR';
}

export type CommitFailureReason = 'driver' | 'stale' | 'aborted' | 'concurrent-commit';

export interface CommitErrorOptions extends DomainErrorOptions {
  entity?: string | undefined;
  key?: readonly (string | number)[] | undefined;
}

/**
 * A commit failed and was rolled back. Storage and every tracked instance are
 * left exactly as they were before `commit()` was called.
 */
export class CommitError extends DomainError {
  readonly code = 'COMMIT_ERROR';
  readonly entity?: string | undefined;
  readonly key?: readonly (string | number)[] | undefined;

  constructor(
    readonly reason: CommitFailureReason,
    message: string,
    options?: CommitErrorOptions
  ) {
    super(message, {
      cause: options?.cause,
      context: { reason, entity: options?.entity, key: options?.key, ...options?.context },
    });
    this.entity = options?.entity;
    this.key = options?.key;
  }
}

export class LoadError extends DomainError {
  readonly code = 'LOAD_ERROR';
}

export class ScopeClosedError extends DomainError {
  readonly code = 'SCOPE_CLOSED';

  constructor(scopeId: string) {
    super(`Unit of work ${scopeId} is closed`, { context: { scope: scopeId } });
  }
}
