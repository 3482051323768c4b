import { ACTOR_IDS, ID, ORGANIZATION } from './bindings.js';
import type { ModelSchema } from './model.js';
import { sqlString } from './model.js';
import type QueryBuilder from './query-builder.js';

/** Organization-wide permission that implies ownership of every object. */
export const ORG_ADMIN_PERMISSION = 'org_admin';

/**
 * Append an `EXISTS` subquery that passes when any of the actors holds one of
 * the given permissions in the organization.
 */
export function permissionsCheckWhereClause(
  model: ModelSchema,
  q: QueryBuilder,
  permissions: readonly string[]
): void {
  const organization = q.createBinding(ORGANIZATION);
  const actorIds = q.createBinding(ACTOR_IDS);
  const perms = permissions.map(sqlString).join(', ');

  q.push(
    `EXISTS (SELECT 1 FROM ${model.authSchema}.permissions` +
      ` WHERE organization_id = ${organization}` +
      ` AND actor_id = ANY(${actorIds})` +
      ` AND permission IN (${perms}))`
  );
}

/**
 * Append a query that reports the highest permission tier (`owner`, `write`
 * or `read`) any of the actors holds on one object, or NULL.
 */
export function objectPermissionsValueQuery(model: ModelSchema, q: QueryBuilder): void {
  const organization = q.createBinding(ORGANIZATION);
  const actorIds = q.createBinding(ACTOR_IDS);
  const objectId = q.createBinding(ID);

  const orgAdmin = sqlString(ORG_ADMIN_PERMISSION);
  const owner = sqlString(model.ownerPermission);
  const write = sqlString(model.writePermission);
  const read = sqlString(model.readPermission);

  q.push(
    'SELECT CASE' +
      ` WHEN bool_or(permission IN (${orgAdmin}, ${owner})) THEN 'owner'` +
      ` WHEN bool_or(permission = ${write}) THEN 'write'` +
      ` WHEN bool_or(permission = ${read}) THEN 'read'` +
      ' ELSE NULL END AS _permission' +
      ` FROM ${model.authSchema}.object_permissions` +
      ` WHERE organization_id = ${organization}` +
      ` AND actor_id = ANY(${actorIds})` +
      ` AND object_id = ${objectId}` +
      ` AND permission IN (${orgAdmin}, ${owner}, ${write}, ${read})`
  );
}
