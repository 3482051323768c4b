import type { QueryConfig } from 'pg';
import { validate as isUUID } from 'uuid';

import { ID_ARRAY_BINDINGS, ID_BINDINGS, LIMIT, OFFSET } from './bindings.js';
import { InvalidUUIDError, ValidationError } from './errors.js';
import type { SqlQueryContext } from './query-builder.js';
import types, { parameterType } from './type.js';

export interface PrepareOptions {
  /** Name for a pg prepared statement. */
  name?: string;
}

// Placeholders cast to an array type, as in `UNNEST($3::uuid[])`.
function isArrayPlaceholder(context: SqlQueryContext, position: number): boolean {
  return new RegExp(`\\$${position}::[a-z ]+\\[\\]`).test(context.sql);
}

function assertUUID(value: unknown, binding: string): void {
  if (!isUUID(value)) {
    throw new InvalidUUIDError(`Invalid UUID for binding "${binding}"`);
  }
}

function assertUUIDArray(value: unknown, binding: string): void {
  if (!Array.isArray(value)) {
    throw new ValidationError(`Binding "${binding}" must be an array of UUIDs`, binding);
  }
  for (const item of value) {
    assertUUID(item, binding);
  }
}

/**
 * Turn a generated query and a map of binding values into a pg query
 * config, with values ordered to match the placeholders.
 *
 * @param context - Finished query
 * @param values - Value for every binding name of the query
 * @param options - Optional prepared statement name
 * @throws {ValidationError} When a value is missing or has the wrong type
 * @throws {InvalidUUIDError} When an id binding is not a UUID
 */
export function toQueryConfig(
  context: SqlQueryContext,
  values: Readonly<Record<string, unknown>>,
  options: PrepareOptions = {}
): QueryConfig {
  const fieldsByBinding = new Map(context.fieldBindings.map(entry => [entry.binding, entry]));

  const ordered = context.bindings.map((binding, index) => {
    const position = index + 1;
    if (!Object.prototype.hasOwnProperty.call(values, binding) || values[binding] === undefined) {
      throw new ValidationError(`Missing value for binding "${binding}"`, binding);
    }
    const value = values[binding];
    const asArray = isArrayPlaceholder(context, position);

    if (ID_ARRAY_BINDINGS.has(binding) || (asArray && ID_BINDINGS.has(binding))) {
      assertUUIDArray(value, binding);
      return value;
    }

    if (ID_BINDINGS.has(binding)) {
      assertUUID(value, binding);
      return value;
    }

    if (binding === LIMIT || binding === OFFSET) {
      return types.number().integer().min(0).expect(value, binding);
    }

    const fieldBinding = fieldsByBinding.get(binding);
    if (!fieldBinding) {
      return value;
    }

    const { field } = fieldBinding;
    const validator = parameterType(field.type);
    const check = (item: unknown, name: string) => {
      if (item === null && !field.nullable) {
        throw new ValidationError(`${name} cannot be null`, name);
      }
      return validator.validate(item, name);
    };

    if (asArray) {
      if (!Array.isArray(value)) {
        throw new ValidationError(`Binding "${binding}" must be an array`, binding);
      }
      return value.map((item: unknown, itemIndex) => check(item, `${binding}[${itemIndex}]`));
    }

    return check(value, binding);
  });

  const config: QueryConfig = { text: context.sql, values: ordered };
  if (options.name) {
    config.name = options.name;
  }
  return config;
}
