import assert from 'node:assert/strict';
import test from 'node:test';

import { InvalidUUIDError, ValidationError } from '../src/lib/errors.js';
import { buildModelSchema } from '../src/lib/model-initializer.js';
import { toQueryConfig } from '../src/lib/prepare.js';
import { insert } from '../src/lib/queries/insert.js';
import { list } from '../src/lib/queries/list.js';
import { upsertChildren } from '../src/lib/queries/upsert.js';
import { buildBlogModels, testContext, testIds } from './helpers/model-fixtures.js';

const { comment } = buildBlogModels();
const { commentId, organizationId, postId, otherCommentId, v7Id } = testIds;

test('toQueryConfig orders values by binding', () => {
  const config = toQueryConfig(
    insert(comment),
    { post_id: postId, body: 'hello', organization_id: organizationId, id: commentId },
    { name: 'comment_insert' }
  );
  assert.strictEqual(config.text, insert(comment).sql);
  assert.deepStrictEqual(config.values, [commentId, organizationId, 'hello', postId]);
  assert.strictEqual(config.name, 'comment_insert');
});

test('toQueryConfig leaves out the statement name by default', () => {
  const config = toQueryConfig(list(comment) ?? assert.fail('list query missing'), {
    organization_id: organizationId,
    '$limit': 50,
    '$offset': 0,
  });
  assert.deepStrictEqual(config.values, [organizationId, 50, 0]);
  assert.strictEqual(config.name, undefined);
});

test('missing values are rejected', () => {
  assert.throws(
    () => toQueryConfig(insert(comment), { id: commentId, organization_id: organizationId }),
    (error: unknown) =>
      error instanceof ValidationError &&
      error.field === 'body' &&
      error.message === 'Missing value for binding "body"'
  );
});

test('id bindings must be UUIDs', () => {
  assert.throws(
    () =>
      toQueryConfig(insert(comment), {
        id: 'not-a-uuid',
        organization_id: organizationId,
        body: 'hello',
        post_id: postId,
      }),
    (error: unknown) =>
      error instanceof InvalidUUIDError && error.message === 'Invalid UUID for binding "id"'
  );
});

test('ids of any UUID version are accepted', () => {
  const config = toQueryConfig(insert(comment), {
    id: v7Id,
    organization_id: organizationId,
    body: 'hello',
    post_id: postId,
  });
  assert.deepStrictEqual(config.values, [v7Id, organizationId, 'hello', postId]);
});

test('bigint values are bound without losing precision', () => {
  const counter = buildModelSchema(
    { name: 'Counter', global: true, fields: [{ name: 'total', type: 'bigint' }] },
    testContext
  );
  const ctx = insert(counter);
  assert.deepStrictEqual(ctx.bindings, ['id', 'total']);
  assert.deepStrictEqual(toQueryConfig(ctx, { id: commentId, total: '9007199254740993' }).values, [
    commentId,
    '9007199254740993',
  ]);
  assert.throws(() => toQueryConfig(ctx, { id: commentId, total: 9007199254740993 }), {
    name: 'ValidationError',
    message: 'total is outside the safe integer range; pass it as a string or bigint',
  });
});

test('field values are checked against the column type', () => {
  assert.throws(
    () =>
      toQueryConfig(insert(comment), {
        id: commentId,
        organization_id: organizationId,
        body: 42,
        post_id: postId,
      }),
    { name: 'ValidationError', message: 'body must be a string' }
  );
  assert.throws(
    () =>
      toQueryConfig(insert(comment), {
        id: commentId,
        organization_id: organizationId,
        body: null,
        post_id: postId,
      }),
    { name: 'ValidationError', message: 'body cannot be null' }
  );
});

test('pagination values must be non-negative integers', () => {
  const ctx = list(comment) ?? assert.fail('list query missing');
  assert.throws(
    () => toQueryConfig(ctx, { organization_id: organizationId, limit: 10, offset: -1 }),
    { name: 'ValidationError', message: '$offset must be greater than or equal to 0' }
  );
});

test('array placeholders take arrays of values', () => {
  const [parent] = comment.belongsTo;
  const ctx = upsertChildren(comment, parent);
  const config = toQueryConfig(ctx, {
    organization_id: organizationId,
    '$ids': [commentId, otherCommentId],
    body: ['first', 'second'],
    post_id: [postId, postId],
    '$parent_id': postId,
  });
  assert.deepStrictEqual(config.values, [
    organizationId,
    [commentId, otherCommentId],
    ['first', 'second'],
    [postId, postId],
    postId,
  ]);

  assert.throws(
    () =>
      toQueryConfig(ctx, {
        organization_id: organizationId,
        '$ids': [commentId, 'nope'],
        body: ['first', 'second'],
        post_id: [postId, postId],
        '$parent_id': postId,
      }),
    InvalidUUIDError
  );
  assert.throws(
    () =>
      toQueryConfig(ctx, {
        organization_id: organizationId,
        '$ids': [commentId],
        body: 'first',
        post_id: [postId],
        '$parent_id': postId,
      }),
    { name: 'ValidationError', message: 'Binding "body" must be an array' }
  );
});
