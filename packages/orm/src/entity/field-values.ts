import { isDeepStrictEqual } from 'node:util';

import { isPlainObject } from '@zentity/core';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { FieldDescriptor, FieldType, FieldValue, JsonValue } from '../descriptor/field.js';

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isPlainObject(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function cloneJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(cloneJson);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, val]) => [key, cloneJson(val)]));
  }
  return value;
}

function freezeJson(value: JsonValue): JsonValue {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) freezeJson(nested);
    Object.freeze(value);
  }
  return value;
}

/**
 * Independent copy of a value: dates and json structures are copied,
 * decimals and primitives are immutable and shared.
 */
export function cloneFieldValue(value: FieldValue | undefined): FieldValue | undefined {
  if (value instanceof Date) return new Date(value.getTime());
  if (value === null || value === undefined || Decimal.isDecimal(value)) return value;
  return cloneJson(value);
}

/**
 * Copy used for snapshots. Json structures are frozen; dates are private copies.
 */
export function frozenCopy(value: FieldValue | undefined): FieldValue | undefined {
  const copy = cloneFieldValue(value);
  if (copy === null || copy === undefined || copy instanceof Date || Decimal.isDecimal(copy)) return copy;
  return freezeJson(copy);
}

/**
 * Semantic equality: dates by instant, decimals by value, json by structure,
 * everything else strictly (numbers have no tolerance).
 */
export function fieldValuesEqual(type: FieldType, a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (a === b) return true;
  if (a === null || b === null || a === undefined || b === undefined) return false;

  switch (type) {
    case 'date':
      return a instanceof Date && b instanceof Date && a.getTime() === b.getTime();
    case 'decimal':
      return Decimal.isDecimal(a) && Decimal.isDecimal(b) && a.equals(b);
    case 'json':
      return isDeepStrictEqual(a, b);
    default:
      return false;
  }
}

function hasFieldType(type: FieldType, value: Exclude<FieldValue, null>): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return Number.isSafeInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'decimal':
      return Decimal.isDecimal(value) && value.isFinite();
    case 'boolean':
      return typeof value === 'boolean';
    case 'date':
      return value instanceof Date && !Number.isNaN(value.getTime());
    case 'json':
      return isJsonValue(value);
  }
}

/**
 * Check a value against its descriptor.
 * @returns a violation message, or undefined when the value is acceptable
 */
export function validateFieldValue(field: FieldDescriptor, value: FieldValue | undefined): string | undefined {
  if (value === undefined) {
    return field.generated || field.nullable ? undefined : `${field.name} is required`;
  }
  if (value === null) {
    return field.nullable ? undefined : `${field.name} must not be null`;
  }

  const valid = hasFieldType(field.type, value);

  return valid ? undefined : `${field.name} must be a valid ${field.type}`;
}

/**
 * Convert a raw column value from a driver row into the field's semantic
 * value. Accepts storage encodings (ISO text dates, decimal strings, 0/1
 * booleans, json text) as well as already-decoded values.
 */
export function decodeFieldValue(field: FieldDescriptor, raw: unknown): Result<FieldValue, string> {
  if (raw === null || raw === undefined) {
    return field.nullable ? ok(null) : err(`${field.name} is null in storage`);
  }

  const invalid = () => err(`${field.name}: cannot read ${typeof raw} as ${field.type}`);

  switch (field.type) {
    case 'string':
      return typeof raw === 'string' ? ok(raw) : invalid();
    case 'integer': {
      const value = typeof raw === 'bigint' ? Number(raw) : raw;
      return typeof value === 'number' && Number.isSafeInteger(value) ? ok(value) : invalid();
    }
    case 'number':
      if (typeof raw === 'number') return ok(raw);
      if (typeof raw === 'bigint') return ok(Number(raw));
      return invalid();
    case 'decimal':
      if (Decimal.isDecimal(raw)) return ok(raw);
      if (typeof raw === 'string' || typeof raw === 'number') {
        try {
          return ok(new Decimal(raw));
        } catch {
          return invalid();
        }
      }
      return invalid();
    case 'boolean':
      if (typeof raw === 'boolean') return ok(raw);
      if (raw === 0 || raw === 1) return ok(raw === 1);
      return invalid();
    case 'date': {
      const date = raw instanceof Date ? new Date(raw.getTime()) : typeof raw === 'string' || typeof raw === 'number' ? new Date(raw) : undefined;
      return date && !Number.isNaN(date.getTime()) ? ok(date) : invalid();
    }
    case 'json': {
      if (typeof raw !== 'string') return isJsonValue(raw) ? ok(cloneJson(raw)) : invalid();
      try {
        const parsed: unknown = JSON.parse(raw);
        return isJsonValue(parsed) ? ok(parsed) : invalid();
      } catch {
        return invalid();
      }
    }
  }
}
