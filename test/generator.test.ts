import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';

import createQueryGenerator, { QueryGenerator } from '../src/index.js';
import { FormatterError, GeneratorError, WriteFileError } from '../src/lib/errors.js';
import { createCommandFormatter } from '../src/lib/formatter.js';
import { getDebugLogger, setDebugLogger } from '../src/lib/runtime.js';
import { modelsDir, readFixtureManifests } from './helpers/model-fixtures.js';

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'query-generator-'));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test('QueryGenerator merges configuration defaults', () => {
  const generator = new QueryGenerator({ schema: 'app' });
  assert.deepStrictEqual(generator.config, {
    outputPath: 'generated',
    schema: 'app',
    authSchema: 'public',
    dialect: 'postgresql',
    formatter: null,
  });
  assert.deepStrictEqual(generator.context, { schema: 'app', authSchema: 'public' });
});

test('createQueryGenerator exposes the helper namespaces', () => {
  const generator = createQueryGenerator();
  assert.ok(generator instanceof createQueryGenerator.QueryGenerator);
  assert.strictEqual(createQueryGenerator.bindings.ORGANIZATION, 'organization_id');
  assert.strictEqual(createQueryGenerator.Errors.GeneratorError, GeneratorError);
});

test('loadModels registers every model by name and table', async () => {
  const generator = new QueryGenerator({ schema: 'app' });
  const models = await generator.loadModels(modelsDir);
  assert.strictEqual(models.length, 5);
  assert.strictEqual(generator.modelRegistry.get('Comment')?.table, 'comments');
  assert.strictEqual(generator.modelRegistry.get('app.post_tags')?.name, 'PostTag');
  assert.strictEqual(generator.modelRegistry.get('teams')?.name, 'Team');
  assert.strictEqual(generator.modelRegistry.has('Widget'), false);
});

test('registering the same models twice is an error', () => {
  const generator = new QueryGenerator({ schema: 'app' });
  generator.addManifests(readFixtureManifests());
  assert.throws(() => generator.addManifests(readFixtureManifests()), {
    code: 'DUPLICATE_MODEL',
  });
});

test('renderModel lays files out per model and operation', () => {
  const generator = new QueryGenerator({ schema: 'app' });
  const [comment] = generator.addManifests(readFixtureManifests());
  const files = generator.renderModel(comment);

  assert.deepStrictEqual(
    files.map(file => file.path),
    [
      'comment/delete.sql',
      'comment/insert.sql',
      'comment/update.sql',
      'comment/list.sql',
      'comment/select_one.sql',
      'comment/update_one_with_parent_of_post.sql',
      'comment/upsert_single_child_of_post.sql',
      'comment/upsert_children_of_post.sql',
      'comment/delete_all_children_of_post.sql',
      'comment/delete_removed_children_of_post.sql',
      'comment/delete_with_parent_of_post.sql',
      'comment/lookup_object_permissions.sql',
      'migrations/comment.up.sql',
      'migrations/comment.down.sql',
    ]
  );
  assert.strictEqual(
    files[0].contents,
    'DELETE FROM app.comments WHERE id = $1 AND organization_id = $2\n'
  );
});

test('writeAll writes formatted files under the output directory', async () => {
  await withTempDir(async dir => {
    const messages: string[] = [];
    const previous = getDebugLogger();
    setDebugLogger({
      generate: (...args: unknown[]) => {
        messages.push(args.map(String).join(' '));
      },
      error: () => undefined,
    });

    try {
      const generator = new QueryGenerator({
        outputPath: dir,
        schema: 'app',
        formatter: async (file, contents) => `-- ${file}\n${contents}`,
      });
      generator.addManifests(readFixtureManifests());
      const written = await generator.writeAll();

      assert.ok(written.includes(path.join(dir, 'post_tag', 'insert.sql')));
      const down = await readFile(path.join(dir, 'migrations', 'team.down.sql'), 'utf8');
      assert.strictEqual(down, '-- migrations/team.down.sql\nDROP TABLE IF EXISTS app.teams;\n');
      assert.ok(messages.includes(`Wrote ${path.join(dir, 'comment', 'delete.sql')}`));
    } finally {
      setDebugLogger(previous);
    }
  });
});

test('a formatter failure names the file it failed on', async () => {
  const generator = new QueryGenerator({
    schema: 'app',
    formatter: async (file, contents) => {
      if (file === 'tag/insert.sql') {
        throw new FormatterError(file, 'syntax error at line 1');
      }
      return contents;
    },
  });
  generator.addManifests(readFixtureManifests());

  await assert.rejects(
    generator.render(),
    (error: unknown) =>
      error instanceof FormatterError &&
      error.file === 'tag/insert.sql' &&
      error.message === 'Formatter failed on tag/insert.sql:\nsyntax error at line 1'
  );
});

test('formatter errors of other types are wrapped', async () => {
  const generator = new QueryGenerator({
    schema: 'app',
    formatter: async () => {
      throw new Error('formatter crashed');
    },
  });
  generator.addManifests(readFixtureManifests());

  await assert.rejects(generator.render(), {
    name: 'FormatterError',
    output: 'formatter crashed',
  });
});

test('a command formatter that cannot start reports a formatter error', async () => {
  const formatter = createCommandFormatter('query-generator-missing-formatter-command');
  await assert.rejects(formatter('comment/insert.sql', 'SELECT 1'), {
    name: 'FormatterError',
    file: 'comment/insert.sql',
  });
});

test('write failures are reported as WriteFileError', async () => {
  await withTempDir(async dir => {
    const blocker = path.join(dir, 'not-a-directory');
    await writeFile(blocker, 'occupied', 'utf8');

    const generator = new QueryGenerator({ outputPath: blocker, schema: 'app' });
    generator.addManifests(readFixtureManifests());

    await assert.rejects(generator.writeAll(), WriteFileError);
  });
});
