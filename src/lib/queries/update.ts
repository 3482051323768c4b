import { ORGANIZATION, PARENT_ID } from '../bindings.js';
import { createIdBindings, pushIdWhereClause } from '../ids.js';
import type { BelongsToRelation, ModelField, ModelSchema } from '../model.js';
import { qualifiedTable } from '../model.js';
import QueryBuilder, { type SqlQueryContext } from '../query-builder.js';

function writableFields(model: ModelSchema): ModelField[] {
  return model.fields.filter(field => field.writable);
}

function updateQuery(
  model: ModelSchema,
  fields: readonly ModelField[],
  parentColumn: string | null
): QueryBuilder {
  const q = new QueryBuilder();
  createIdBindings(model, q);

  q.push(`UPDATE ${qualifiedTable(model)} SET `);
  for (const field of fields) {
    q.push(`${field.sqlName} = `);
    q.pushBinding(field.name);
    q.push(', ');
  }
  q.push('updated_at = NOW() WHERE ');

  pushIdWhereClause(model, q);

  if (parentColumn) {
    q.push(` AND ${parentColumn} = `);
    q.pushBinding(PARENT_ID);
  }

  if (!model.global) {
    q.push(' AND organization_id = ');
    q.pushBinding(ORGANIZATION);
  }

  return q;
}

/**
 * Update every writable field of one row.
 */
export function update(model: ModelSchema): SqlQueryContext {
  const fields = writableFields(model);
  return updateQuery(model, fields, null).finishWithFieldBindings('update', fields);
}

/**
 * One variant of {@link update} per parent relation that also requires the
 * row to belong to the given parent. Join models are fully identified by
 * their two ids and get no variants.
 */
export function updateOneWithParent(model: ModelSchema): SqlQueryContext[] {
  if (model.join) {
    return [];
  }

  const fields = writableFields(model);
  return model.belongsTo.map((belongsTo: BelongsToRelation) =>
    updateQuery(model, fields, belongsTo.sqlName).finishWithFieldBindings(
      `update_one_with_parent_of_${belongsTo.modelSnakeName}`,
      fields
    )
  );
}
