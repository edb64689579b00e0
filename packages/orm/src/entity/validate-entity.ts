import { validateFieldValue } from './field-values.js';
import type { Entity } from './entity.js';

export interface ValidateEntityOptions {
  /** Only check these fields */
  fields?: Iterable<string> | undefined;
  /** Fields filled in later in the commit (foreign keys of pending inserts) */
  skip?: ReadonlySet<string> | undefined;
}

/**
 * Check current values against the descriptor.
 * @returns one message per violation, prefixed with the entity
 */
export function validateEntity(entity: Entity, options: ValidateEntityOptions = {}): string[] {
  const names = options.fields ? new Set(options.fields) : undefined;
  const violations: string[] = [];

  for (const field of entity.type.fields) {
    if (names && !names.has(field.name)) continue;
    if (options.skip?.has(field.name)) continue;
    const problem = validateFieldValue(field, entity.get(field.name));
    if (problem) violations.push(`${entity.toString()}: ${problem}`);
  }
  return violations;
}
