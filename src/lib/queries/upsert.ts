import { IDS, ID, ORGANIZATION, PARENT_ID } from '../bindings.js';
import { idFields } from '../ids.js';
import type { BelongsToRelation, ModelField, ModelSchema } from '../model.js';
import { qualifiedTable, sqlTypeName } from '../model.js';
import QueryBuilder, { type SqlQueryContext } from '../query-builder.js';

type RowSource = 'single' | 'many';

/**
 * Fields that an upsert may overwrite. When a join model row is the only
 * child allowed per parent, the other side of the join may change too.
 */
function upsertFields(
  model: ModelSchema,
  belongsTo: BelongsToRelation,
  source: RowSource
): ModelField[] {
  return model.fields.filter(field => {
    if (field.writable) {
      return true;
    }

    const joinMatch = model.join?.modelIds.includes(field.sqlName) ?? false;
    return (
      source === 'single' &&
      belongsTo.globallyUnique &&
      joinMatch &&
      field.sqlName !== belongsTo.sqlName
    );
  });
}

function upsert(
  model: ModelSchema,
  fields: readonly ModelField[],
  belongsTo: BelongsToRelation,
  source: RowSource
): QueryBuilder {
  const q = new QueryBuilder();
  const ids = idFields(model);
  const idColumns = ids.map(([column]) => column);
  const dataFields = fields.filter(field => !idColumns.includes(field.sqlName));

  q.push(`INSERT INTO ${qualifiedTable(model)} (`);
  const columns = q.separated(', ');
  for (const column of idColumns) {
    columns.push(column);
  }
  if (!model.global) {
    columns.push('organization_id');
  }
  for (const field of dataFields) {
    columns.push(field.sqlName);
  }
  q.push(')');

  if (source === 'single') {
    q.push(' VALUES (');
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
    q.push(')');
  } else {
    // One array binding per column; the id array is bound as `$ids`.
    const arrays: Array<{ column: string; binding: string; type: string }> = [
      ...ids.map(([column, binding]) => ({
        column,
        binding: binding === ID ? IDS : binding,
        type: 'uuid',
      })),
      ...dataFields.map(field => ({
        column: field.sqlName,
        binding: field.name,
        type: sqlTypeName(field.type).toLowerCase(),
      })),
    ];

    q.push(' SELECT ');
    const selectSep = q.separated(', ');
    for (const [index, entry] of arrays.entries()) {
      selectSep.push(`u.${entry.column}`);
      if (index === idColumns.length - 1 && !model.global) {
        selectSep.push(q.createBinding(ORGANIZATION));
      }
    }

    q.push(' FROM UNNEST(');
    const unnestSep = q.separated(', ');
    for (const entry of arrays) {
      unnestSep.pushBinding(entry.binding);
      unnestSep.pushUnseparated(`::${entry.type}[]`);
    }
    q.push(`) AS u(${arrays.map(entry => entry.column).join(', ')})`);
  }

  const conflictTarget = belongsTo.globallyUnique ? belongsTo.sqlName : idColumns.join(', ');

  if (fields.length === 0) {
    q.push(` ON CONFLICT (${conflictTarget}) DO NOTHING`);
  } else {
    q.push(` ON CONFLICT (${conflictTarget}) DO UPDATE SET `);
    for (const field of fields) {
      q.push(`${field.sqlName} = EXCLUDED.${field.sqlName}, `);
    }
    q.push('updated_at = NOW() WHERE ');

    if (!model.global) {
      q.push(`${model.table}.organization_id = `);
      q.pushBinding(ORGANIZATION);
      q.push(' AND ');
    }

    q.push(`${model.table}.${belongsTo.sqlName} = `);
    q.pushBinding(PARENT_ID);
  }

  q.push(' RETURNING ');
  q.push(
    model.fields
      .filter(field => !field.neverRead)
      .map(field => field.sqlFullName)
      .join(', ')
  );

  return q;
}

/**
 * Insert or update the single child of a parent.
 */
export function upsertSingleChild(
  model: ModelSchema,
  belongsTo: BelongsToRelation
): SqlQueryContext {
  const fields = upsertFields(model, belongsTo, 'single');
  return upsert(model, fields, belongsTo, 'single').finishWithFieldBindings(
    `upsert_single_child_of_${belongsTo.modelSnakeName}`,
    fields
  );
}

/**
 * Insert or update many children of a parent at once. Each column's values
 * are bound as one array and expanded with `UNNEST`.
 */
export function upsertChildren(model: ModelSchema, belongsTo: BelongsToRelation): SqlQueryContext {
  const fields = upsertFields(model, belongsTo, 'many');
  return upsert(model, fields, belongsTo, 'many').finishWithFieldBindings(
    `upsert_children_of_${belongsTo.modelSnakeName}`,
    fields
  );
}

/**
 * Both upsert variants for every parent relation of the model.
 */
export function upsertQueries(model: ModelSchema): SqlQueryContext[] {
  return model.belongsTo.flatMap(belongsTo => [
    upsertSingleChild(model, belongsTo),
    upsertChildren(model, belongsTo),
  ]);
}
