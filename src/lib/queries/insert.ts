import { ORGANIZATION } from '../bindings.js';
import { idFields } from '../ids.js';
import type { ModelSchema } from '../model.js';
import { qualifiedTable } from '../model.js';
import QueryBuilder, { type SqlQueryContext } from '../query-builder.js';

/**
 * `INSERT` of one row. Values are bound in column order: the id binding(s),
 * the organization when the model is tenant-scoped, then every owner-writable
 * field in declaration order. Callers supply values positionally in that
 * order, so the column list and the VALUES list must always be built from the
 * same field list.
 */
export function insert(model: ModelSchema): SqlQueryContext {
  const q = new QueryBuilder();
  const ids = idFields(model);
  const dataFields = model.fields.filter(field => field.ownerWrite);

  q.push(`INSERT INTO ${qualifiedTable(model)} (`);

  const columns = q.separated(', ');
  for (const [column] of ids) {
    columns.push(column);
  }
  if (!model.global) {
    columns.push('organization_id');
  }
  for (const field of dataFields) {
    columns.push(field.sqlName);
  }

  q.push(') VALUES (');

  const values = q.separated(', ');
  for (const [, binding] of ids) {
    values.pushBinding(binding);
  }
  if (!model.global) {
    values.pushBinding(ORGANIZATION);
  }
  for (const field of dataFields) {
    values.pushBinding(field.name);
  }

  q.push(') RETURNING ');
  q.push(
    model.fields
      .filter(field => !field.neverRead)
      .map(field => field.sqlFullName)
      .join(', ')
  );

  return q.finishWithFieldBindings('insert', dataFields);
}
