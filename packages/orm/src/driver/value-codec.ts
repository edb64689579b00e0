import { Decimal } from 'decimal.js';

import type { FieldType, FieldValue } from '../descriptor/field.js';

/**
 * Storage encoding for SQL drivers. Dates become ISO-8601 text, decimals
 * their exact string form, json values JSON text. Booleans are left to the
 * connection's value plugin.
 */
export function encodeValue(type: FieldType, value: FieldValue): unknown {
  if (value === null) return null;

  switch (type) {
    case 'date':
      return value instanceof Date ? value.toISOString() : value;
    case 'decimal':
      return Decimal.isDecimal(value) ? value.toString() : value;
    case 'json':
      return JSON.stringify(value);
    default:
      return value;
  }
}
