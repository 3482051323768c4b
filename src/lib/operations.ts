import { UnimplementedGeneratorError } from './errors.js';
import type { ModelSchema } from './model.js';
import {
  deleteChildrenQueries,
  deleteOne,
  insert,
  list,
  lookupObjectPermissions,
  selectOne,
  update,
  updateOneWithParent,
  upsertQueries,
} from './queries/index.js';
import type { SqlQueryContext } from './query-builder.js';

/**
 * Every query a model can be asked for. The set is closed; each kind maps to
 * exactly one generator.
 */
export type QueryRequest =
  | { kind: 'insert' }
  | { kind: 'update' }
  | { kind: 'update_one_with_parent' }
  | { kind: 'select_one'; populateChildren: boolean }
  | { kind: 'delete' }
  | { kind: 'delete_children' }
  | { kind: 'list'; populateChildren: boolean; orderBy?: string | null; filterIds?: boolean }
  | { kind: 'upsert' }
  | { kind: 'lookup_object_permissions' };

export type QueryKind = QueryRequest['kind'];

const optional = (context: SqlQueryContext | null): SqlQueryContext[] =>
  context ? [context] : [];

/**
 * Generate the queries for one request. Requests with nothing to generate,
 * such as populating a model without children, produce an empty array.
 */
export function generateQueries(model: ModelSchema, request: QueryRequest): SqlQueryContext[] {
  switch (request.kind) {
    case 'insert':
      return [insert(model)];
    case 'update':
      return [update(model)];
    case 'update_one_with_parent':
      return updateOneWithParent(model);
    case 'select_one':
      return optional(selectOne(model, request.populateChildren));
    case 'delete':
      return [deleteOne(model)];
    case 'delete_children':
      return deleteChildrenQueries(model);
    case 'list':
      return optional(
        list(model, {
          populateChildren: request.populateChildren,
          orderBy: request.orderBy,
          filterIds: request.filterIds,
        })
      );
    case 'upsert':
      return upsertQueries(model);
    case 'lookup_object_permissions':
      return optional(lookupObjectPermissions(model));
    default: {
      const unknownRequest: never = request;
      throw new UnimplementedGeneratorError(JSON.stringify(unknownRequest));
    }
  }
}

/**
 * The requests rendered for every model by the generator.
 */
export function modelQueryRequests(): QueryRequest[] {
  return [
    { kind: 'delete' },
    { kind: 'insert' },
    { kind: 'update' },
    { kind: 'list', populateChildren: false },
    { kind: 'list', populateChildren: true },
    { kind: 'select_one', populateChildren: false },
    { kind: 'select_one', populateChildren: true },
    { kind: 'update_one_with_parent' },
    { kind: 'upsert' },
    { kind: 'delete_children' },
    { kind: 'lookup_object_permissions' },
  ];
}

/**
 * Generate every query for a model.
 */
export function generateModelQueries(model: ModelSchema): SqlQueryContext[] {
  return modelQueryRequests().flatMap(request => generateQueries(model, request));
}
