import assert from 'node:assert/strict';
import test from 'node:test';

import {
  deleteAllChildren,
  deleteChildrenQueries,
  deleteOne,
  deleteRemovedChildren,
  deleteWithParent,
} from '../src/lib/queries/delete.js';
import { buildBlogModels } from './helpers/model-fixtures.js';

const { comment, postTag, tag, team } = buildBlogModels();

test('delete filters by id and organization', () => {
  const ctx = deleteOne(comment);
  assert.strictEqual(ctx.operationName, 'delete');
  assert.strictEqual(ctx.sql, 'DELETE FROM app.comments WHERE id = $1 AND organization_id = $2');
  assert.deepStrictEqual(ctx.bindings, ['id', 'organization_id']);
});

test('delete of a global model filters by id only', () => {
  assert.strictEqual(deleteOne(team).sql, 'DELETE FROM app.teams WHERE id = $1');
});

test('delete of a join model uses both parent ids', () => {
  assert.strictEqual(
    deleteOne(postTag).sql,
    'DELETE FROM app.post_tags WHERE post_id = $1 AND tag_id = $2 AND organization_id = $3'
  );
});

test('delete checks owner permission in the query when configured', () => {
  const ctx = deleteOne(tag);
  assert.strictEqual(
    ctx.sql,
    'DELETE FROM app.tags WHERE id = $1 AND organization_id = $2 AND EXISTS' +
      ' (SELECT 1 FROM public.permissions WHERE organization_id = $2' +
      " AND actor_id = ANY($3) AND permission IN ('Tag::owner'))"
  );
  assert.deepStrictEqual(ctx.bindings, ['id', 'organization_id', '$actor_ids']);
});

test('child delete variants filter by organization and parent', () => {
  const [relation] = comment.belongsTo;

  const all = deleteAllChildren(comment, relation);
  assert.strictEqual(all.operationName, 'delete_all_children_of_post');
  assert.strictEqual(
    all.sql,
    'DELETE FROM app.comments WHERE organization_id = $1 AND post_id = $2'
  );
  assert.deepStrictEqual(all.bindings, ['organization_id', '$parent_id']);

  const removed = deleteRemovedChildren(comment, relation);
  assert.strictEqual(removed.operationName, 'delete_removed_children_of_post');
  assert.strictEqual(
    removed.sql,
    'DELETE FROM app.comments WHERE organization_id = $1 AND post_id = $2 AND id <> ALL($3)'
  );
  assert.deepStrictEqual(removed.bindings, ['organization_id', '$parent_id', '$ids']);

  const single = deleteWithParent(comment, relation);
  assert.strictEqual(single.operationName, 'delete_with_parent_of_post');
  assert.strictEqual(
    single.sql,
    'DELETE FROM app.comments WHERE organization_id = $1 AND post_id = $2 AND id = $3'
  );
});

test('join models only get the delete-all child variant', () => {
  const queries = deleteChildrenQueries(postTag);
  assert.deepStrictEqual(
    queries.map(ctx => ctx.operationName),
    ['delete_all_children_of_post']
  );
  assert.strictEqual(
    queries[0].sql,
    'DELETE FROM app.post_tags WHERE organization_id = $1 AND post_id = $2'
  );
  assert.strictEqual(deleteChildrenQueries(comment).length, 3);
  assert.deepStrictEqual(deleteChildrenQueries(team), []);
});
