import type { EntityType } from '../descriptor/entity-type.js';

export type PrimaryKeyValue = string | number;
export type KeyTuple = readonly PrimaryKeyValue[];

/**
 * Identity of a row within one scope. JSON encoding keeps `1` and `"1"` apart.
 */
export function identityKey(type: EntityType, key: KeyTuple): string {
  return `${type.name}:${JSON.stringify(key)}`;
}

export function sameKey(type: EntityType, a: KeyTuple, b: KeyTuple): boolean {
  return identityKey(type, a) === identityKey(type, b);
}

export function formatKey(type: EntityType, key: KeyTuple | undefined): string {
  return `${type.name}#${key ? key.join(',') : '(new)'}`;
}
