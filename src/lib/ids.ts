import { ID, JOIN_ID_0, JOIN_ID_1 } from './bindings.js';
import type { ModelSchema } from './model.js';
import type QueryBuilder from './query-builder.js';

/** Column name paired with the binding that carries its value. */
export type IdField = readonly [column: string, binding: string];

/**
 * Return the id field for the model, or the two parent id fields for a join
 * model, along with the binding names to use for them.
 */
export function idFields(model: ModelSchema): IdField[] {
  if (model.join) {
    return [
      [model.join.modelIds[0], JOIN_ID_0],
      [model.join.modelIds[1], JOIN_ID_1],
    ];
  }

  return [['id', ID]];
}

/**
 * Append an AND-joined equality over the model's id fields, optionally
 * qualified with a table alias.
 */
export function pushIdWhereClause(model: ModelSchema, q: QueryBuilder, alias?: string): void {
  const whereSep = q.separated(' AND ');
  for (const [column, binding] of idFields(model)) {
    whereSep.push(alias ? `${alias}.${column}` : column);
    whereSep.pushUnseparated(' = ');
    whereSep.pushBindingUnseparated(binding);
  }
}

/**
 * Allocate the id bindings up front so they take the first placeholders.
 */
export function createIdBindings(model: ModelSchema, q: QueryBuilder): void {
  for (const [, binding] of idFields(model)) {
    q.createBinding(binding);
  }
}

/**
 * Given one id field of a join model, return the other one. Models that are
 * not join models always answer `id`.
 */
export function otherIdField(model: ModelSchema, idField: string): string {
  if (!model.join) {
    return 'id';
  }

  const [first, second] = model.join.modelIds;
  return idField === first ? second : first;
}
