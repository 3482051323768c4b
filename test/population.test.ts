import assert from 'node:assert/strict';
import test from 'node:test';

import {
  childPopulation,
  jsonbBuildObjectContents,
  referenceJoin,
  referenceListPopulation,
} from '../src/lib/population.js';
import { buildBlogModels } from './helpers/model-fixtures.js';

const { post, team } = buildBlogModels();
const [comments, tags] = post.children;
const [teamReference] = post.referencePopulations;

test('jsonbBuildObjectContents pairs names with readable columns', () => {
  assert.strictEqual(
    jsonbBuildObjectContents(team.fields, ''),
    "'id', id, 'updated_at', updated_at, 'created_at', created_at, 'name', name," +
      " 'displayName', display_name"
  );
});

test('childPopulation returns null when population is disabled', () => {
  assert.strictEqual(childPopulation(post, comments, 'none', '$2', '$1'), null);
});

test('childPopulation of a single child selects one id', () => {
  assert.strictEqual(
    childPopulation(post, { ...comments, many: false }, 'id', '$2', '$1'),
    '(SELECT ct.id FROM app.comments ct WHERE ct.post_id = $1 AND ct.organization_id = $2 LIMIT 1)'
  );
});

test('childPopulation reads data through a join table', () => {
  assert.strictEqual(
    childPopulation(post, tags, 'data', '$1', 'tb.id'),
    "(SELECT COALESCE(ARRAY_AGG(JSONB_BUILD_OBJECT('id', t.id, 'organization_id', t.organization_id," +
      " 'updated_at', t.updated_at, 'created_at', t.created_at, 'name', t.name)), ARRAY[]::jsonb[])" +
      ' FROM app.post_tags tt JOIN app.tags t ON tt.tag_id = t.id' +
      ' WHERE tt.post_id = tb.id AND tt.organization_id = $1)'
  );
});

test('childPopulation under a global parent has no organization filter', () => {
  assert.strictEqual(
    childPopulation({ ...post, global: true }, comments, 'id', '', 'tb.id'),
    '(SELECT COALESCE(ARRAY_AGG(ct.id), ARRAY[]::uuid[]) FROM app.comments ct WHERE ct.post_id = tb.id)'
  );
});

test('referenceListPopulation resolves a reference as a subquery', () => {
  assert.strictEqual(
    referenceListPopulation(teamReference),
    "(SELECT JSONB_BUILD_OBJECT('id', ref_team.id, 'updated_at', ref_team.updated_at," +
      " 'created_at', ref_team.created_at, 'name', ref_team.name," +
      " 'displayName', ref_team.display_name) FROM app.teams ref_team" +
      ' WHERE tb.team_id IS NOT NULL AND ref_team.id = tb.team_id) AS "team"'
  );
});

test('references to tenant-scoped models also match the organization', () => {
  assert.strictEqual(
    referenceJoin({ ...teamReference, global: false }),
    ' LEFT JOIN app.teams ref_team ON ref_team.id = tb.team_id' +
      ' AND ref_team.organization_id = tb.organization_id'
  );
});
