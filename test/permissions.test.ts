import assert from 'node:assert/strict';
import test from 'node:test';

import { permissionsCheckWhereClause } from '../src/lib/permissions.js';
import { lookupObjectPermissions } from '../src/lib/queries/lookup-object-permissions.js';
import QueryBuilder from '../src/lib/query-builder.js';
import { buildBlogModels } from './helpers/model-fixtures.js';

const { comment, postTag } = buildBlogModels();

test('permission check reuses the organization binding', () => {
  const q = new QueryBuilder('SELECT 1 FROM app.comments WHERE organization_id = ');
  q.pushBinding('organization_id');
  q.push(' AND ');
  permissionsCheckWhereClause(comment, q, ['Comment::owner', "it's"]);

  const ctx = q.finish('check');
  assert.strictEqual(
    ctx.sql,
    'SELECT 1 FROM app.comments WHERE organization_id = $1 AND EXISTS' +
      ' (SELECT 1 FROM public.permissions WHERE organization_id = $1' +
      " AND actor_id = ANY($2) AND permission IN ('Comment::owner', 'it''s'))"
  );
  assert.deepStrictEqual(ctx.bindings, ['organization_id', '$actor_ids']);
});

test('lookup_object_permissions reports the highest tier', () => {
  const ctx = lookupObjectPermissions(comment);
  assert.ok(ctx);
  assert.strictEqual(ctx.operationName, 'lookup_object_permissions');
  assert.strictEqual(
    ctx.sql,
    "SELECT CASE WHEN bool_or(permission IN ('org_admin', 'Comment::owner')) THEN 'owner'" +
      " WHEN bool_or(permission = 'Comment::write') THEN 'write'" +
      " WHEN bool_or(permission = 'Comment::read') THEN 'read'" +
      ' ELSE NULL END AS _permission FROM public.object_permissions' +
      ' WHERE organization_id = $1 AND actor_id = ANY($2) AND object_id = $3' +
      " AND permission IN ('org_admin', 'Comment::owner', 'Comment::write', 'Comment::read')"
  );
  assert.deepStrictEqual(ctx.bindings, ['organization_id', '$actor_ids', 'id']);
});

test('join models have no object permission lookup', () => {
  assert.strictEqual(lookupObjectPermissions(postTag), null);
});
