import { getErrorMessage } from '@zentity/core';
import type { Logger } from '@zentity/logger';
import { err, ok, type Result } from 'neverthrow';

import type { EntityType } from '../descriptor/entity-type.js';
import type { FieldValue } from '../descriptor/field.js';
import type { Condition, Driver, Row, SelectStatement } from '../driver/driver.js';
import { Entity } from '../entity/entity.js';
import { decodeFieldValue } from '../entity/field-values.js';
import { LoadError } from '../errors.js';
import type { IdentityMap } from '../identity/identity-map.js';

/**
 * Turns driver rows into managed entities, going through the identity map
 * so a row that is already tracked yields the tracked instance unchanged.
 */
export class EntityLoader {
  constructor(
    private readonly driver: Driver,
    private readonly identityMap: IdentityMap,
    private readonly logger: Logger
  ) {}

  async select(type: EntityType, where: readonly Condition[]): Promise<Result<Entity[], LoadError>> {
    const rowsResult = await this.query({
      kind: 'select',
      table: type.table,
      entity: type.name,
      where,
      orderBy: type.keyFields().map((field) => field.column),
    });
    if (rowsResult.isErr()) return err(rowsResult.error);

    // decode everything first: a malformed row must not leave half the result registered
    const decoded: Record<string, FieldValue>[] = [];
    for (const row of rowsResult.value) {
      const values = this.decodeRow(type, row);
      if (values.isErr()) return err(values.error);
      decoded.push(values.value);
    }

    const entities: Entity[] = [];
    for (const values of decoded) {
      const adopted = this.adopt(type, values);
      if (adopted.isErr()) return err(adopted.error);
      entities.push(adopted.value);
    }
    return ok(entities);
  }

  /**
   * Run a select and return raw rows (join tables have no entity type).
   */
  async query(statement: SelectStatement): Promise<Result<readonly Row[], LoadError>> {
    const target = statement.entity ?? statement.table;
    try {
      const result = await this.driver.execute(statement);
      if (result.isErr()) {
        this.logger.error({ error: result.error, table: statement.table }, `Failed to load ${target}`);
        return err(
          new LoadError(`Failed to load ${target}: ${result.error.message}`, {
            cause: result.error,
            context: { entity: statement.entity, table: statement.table },
          })
        );
      }
      return ok(result.value.rows);
    } catch (error) {
      this.logger.error({ error, table: statement.table }, `Driver threw while loading ${target}`);
      return err(
        new LoadError(`Failed to load ${target}: ${getErrorMessage(error)}`, {
          cause: error,
          context: { entity: statement.entity, table: statement.table },
        })
      );
    }
  }

  decodeRow(type: EntityType, row: Row): Result<Record<string, FieldValue>, LoadError> {
    const values: Record<string, FieldValue> = {};
    const problems: string[] = [];

    for (const field of type.fields) {
      if (!(field.column in row)) {
        problems.push(`column ${field.column} is missing`);
        continue;
      }
      const decoded = decodeFieldValue(field, row[field.column]);
      if (decoded.isErr()) problems.push(decoded.error);
      else values[field.name] = decoded.value;
    }

    if (problems.length > 0) {
      return err(
        new LoadError(`Malformed ${type.name} row: ${problems.join('; ')}`, {
          context: { entity: type.name, table: type.table, problems },
        })
      );
    }
    return ok(values);
  }

  private adopt(type: EntityType, values: Record<string, FieldValue>): Result<Entity, LoadError> {
    const candidate = new Entity(type, values);
    const key = candidate.key();
    if (!key) {
      return err(new LoadError(`${type.name} row has an incomplete primary key`, { context: { entity: type.name } }));
    }

    const existing = this.identityMap.get(type, key);
    if (existing) return ok(existing);

    candidate.transition('managed');
    const registered = this.identityMap.register(candidate);
    if (registered.isErr()) {
      return err(new LoadError(registered.error.message, { cause: registered.error, context: { entity: type.name, key } }));
    }
    return ok(candidate);
  }
}
