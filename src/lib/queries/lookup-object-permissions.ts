import type { ModelSchema } from '../model.js';
import { objectPermissionsValueQuery } from '../permissions.js';
import QueryBuilder, { type SqlQueryContext } from '../query-builder.js';

/**
 * Look up the highest permission tier the actors hold on one object. Join
 * models have no object id and get no lookup.
 */
export function lookupObjectPermissions(model: ModelSchema): SqlQueryContext | null {
  if (model.join) {
    return null;
  }

  const q = new QueryBuilder();
  objectPermissionsValueQuery(model, q);
  return q.finish('lookup_object_permissions');
}
