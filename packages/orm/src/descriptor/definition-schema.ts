import { z } from 'zod';

import { FIELD_TYPES } from './field.js';

const identifier = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'must be an identifier' });

const fieldSpecSchema = z
  .object({
    type: z.enum(FIELD_TYPES),
    nullable: z.boolean().optional(),
    column: identifier.optional(),
    generated: z.boolean().optional(),
  })
  .strict();

const relationSpecSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('to-one'),
      target: identifier,
      foreignKey: identifier,
      cascade: z.boolean().optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('to-many'),
      target: identifier,
      mappedBy: identifier,
      cascade: z.boolean().optional(),
      orphan: z.enum(['nullify', 'delete']).optional(),
    })
    .strict(),
  z
    .object({
      kind: z.literal('many-to-many'),
      target: identifier,
      through: z
        .object({
          table: identifier,
          ownerColumn: identifier,
          targetColumn: identifier,
        })
        .strict(),
      cascade: z.boolean().optional(),
    })
    .strict(),
]);

export const entityDefinitionSchema = z
  .object({
    name: identifier,
    table: identifier.optional(),
    fields: z.record(fieldSpecSchema).refine((fields) => Object.keys(fields).length > 0, {
      message: 'must declare at least one field',
    }),
    primaryKey: z.union([identifier, z.array(identifier).nonempty()]),
    relations: z.record(relationSpecSchema).optional(),
  })
  .strict();
