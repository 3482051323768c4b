import assert from 'node:assert/strict';
import test from 'node:test';

import { idFields } from '../src/lib/ids.js';
import { generateModelQueries } from '../src/lib/operations.js';
import type { ModelField } from '../src/lib/model.js';
import { insert } from '../src/lib/queries/insert.js';
import { buildBlogModels } from './helpers/model-fixtures.js';

/**
 * Properties that hold for every query of every fixture model.
 */

const models = Object.values(buildBlogModels());

test('every query of a tenant-scoped model binds the organization', () => {
  for (const model of models.filter(candidate => !candidate.global)) {
    for (const ctx of generateModelQueries(model)) {
      assert.ok(
        ctx.bindings.includes('organization_id'),
        `${model.name}.${ctx.operationName} does not bind organization_id`
      );
    }
  }
});

test('queries of a global model never filter by organization', () => {
  for (const model of models.filter(candidate => candidate.global)) {
    for (const ctx of generateModelQueries(model)) {
      if (ctx.operationName === 'lookup_object_permissions') {
        continue;
      }
      assert.ok(!ctx.sql.includes('organization_id'), `${model.name}.${ctx.operationName}`);
      assert.ok(!ctx.bindings.includes('organization_id'), `${model.name}.${ctx.operationName}`);
    }
  }
});

test('join model queries never bind a single id', () => {
  for (const model of models.filter(candidate => candidate.join)) {
    for (const ctx of generateModelQueries(model)) {
      assert.ok(!ctx.bindings.includes('id'), `${model.name}.${ctx.operationName}`);
    }
  }
});

test('insert binds ids, then organization, then owner-writable fields', () => {
  for (const model of models) {
    const expected = [
      ...idFields(model).map(([, binding]) => binding),
      ...(model.global ? [] : ['organization_id']),
      ...model.fields.filter((field: ModelField) => field.ownerWrite).map((field: ModelField) => field.name),
    ];
    assert.deepStrictEqual(insert(model).bindings, expected, model.name);
  }
});

test('no placeholder number is skipped or exceeds the binding count', () => {
  for (const model of models) {
    for (const ctx of generateModelQueries(model)) {
      const used = new Set([...ctx.sql.matchAll(/\$(\d+)/g)].map(match => Number(match[1])));
      const expected = ctx.bindings.map((_, index) => index + 1);
      assert.deepStrictEqual([...used].sort((a, b) => a - b), expected, `${model.name}.${ctx.operationName}`);
    }
  }
});
