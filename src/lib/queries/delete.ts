import { ID, IDS, ORGANIZATION, PARENT_ID } from '../bindings.js';
import { pushIdWhereClause } from '../ids.js';
import type { BelongsToRelation, ModelSchema } from '../model.js';
import { qualifiedTable } from '../model.js';
import { permissionsCheckWhereClause } from '../permissions.js';
import QueryBuilder, { type Separated, type SqlQueryContext } from '../query-builder.js';

/**
 * Delete one row by id, within the organization for tenant-scoped models.
 */
export function deleteOne(model: ModelSchema): SqlQueryContext {
  const q = new QueryBuilder();
  q.push(`DELETE FROM ${qualifiedTable(model)} WHERE `);
  pushIdWhereClause(model, q);

  if (!model.global) {
    q.push(' AND organization_id = ');
    q.pushBinding(ORGANIZATION);
  }

  if (model.authCheckInQuery) {
    q.push(' AND ');
    permissionsCheckWhereClause(model, q, [model.ownerPermission]);
  }

  return q.finish('delete');
}

function childDelete(
  model: ModelSchema,
  belongsTo: BelongsToRelation,
  extra: (whereSep: Separated) => void
): QueryBuilder {
  const q = new QueryBuilder();
  q.push(`DELETE FROM ${qualifiedTable(model)} WHERE `);

  const whereSep = q.separated(' AND ');
  if (!model.global) {
    whereSep.push('organization_id = ');
    whereSep.pushBindingUnseparated(ORGANIZATION);
  }

  whereSep.push(`${belongsTo.sqlName} = `);
  whereSep.pushBindingUnseparated(PARENT_ID);
  extra(whereSep);

  return q;
}

/**
 * Delete every child of one parent.
 */
export function deleteAllChildren(
  model: ModelSchema,
  belongsTo: BelongsToRelation
): SqlQueryContext {
  return childDelete(model, belongsTo, () => undefined).finish(
    `delete_all_children_of_${belongsTo.modelSnakeName}`
  );
}

/**
 * Delete the children of one parent whose ids are not in the `$ids` array.
 */
export function deleteRemovedChildren(
  model: ModelSchema,
  belongsTo: BelongsToRelation
): SqlQueryContext {
  return childDelete(model, belongsTo, whereSep => {
    whereSep.push('id <> ALL(');
    whereSep.pushBindingUnseparated(IDS);
    whereSep.pushUnseparated(')');
  }).finish(`delete_removed_children_of_${belongsTo.modelSnakeName}`);
}

/**
 * Delete one child, checking that it belongs to the given parent.
 */
export function deleteWithParent(
  model: ModelSchema,
  belongsTo: BelongsToRelation
): SqlQueryContext {
  return childDelete(model, belongsTo, whereSep => {
    whereSep.push('id = ');
    whereSep.pushBindingUnseparated(ID);
  }).finish(`delete_with_parent_of_${belongsTo.modelSnakeName}`);
}

/**
 * Per-parent delete variants for every belongs-to relation. Join models have
 * no single `id`, so only the delete-all variant applies to them.
 */
export function deleteChildrenQueries(model: ModelSchema): SqlQueryContext[] {
  return model.belongsTo.flatMap(belongsTo =>
    model.join
      ? [deleteAllChildren(model, belongsTo)]
      : [
          deleteAllChildren(model, belongsTo),
          deleteRemovedChildren(model, belongsTo),
          deleteWithParent(model, belongsTo),
        ]
  );
}
