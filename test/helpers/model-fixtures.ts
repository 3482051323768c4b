import { readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { parseModelManifest } from '../../src/lib/config.js';
import type { ModelSchema } from '../../src/lib/model.js';
import type { GenerationContext } from '../../src/lib/model-initializer.js';
import { buildModelSchemas } from '../../src/lib/model-initializer.js';
import type { LoadedManifest } from '../../src/lib/model-manifest.js';

const fixturesDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'fixtures');

export const modelsDir = path.join(fixturesDir, 'models');
export const invalidModelsDir = path.join(fixturesDir, 'invalid-models');

export const testContext: GenerationContext = { schema: 'app', authSchema: 'public' };

export function readFixtureManifests(): LoadedManifest[] {
  return readdirSync(modelsDir)
    .filter(file => file.endsWith('.json'))
    .sort()
    .map(file => {
      const sourcePath = path.join(modelsDir, file);
      const decoded: unknown = JSON.parse(readFileSync(sourcePath, 'utf8'));
      return { manifest: parseModelManifest(decoded, sourcePath), sourcePath };
    });
}

export interface BlogModels {
  post: ModelSchema;
  comment: ModelSchema;
  tag: ModelSchema;
  postTag: ModelSchema;
  team: ModelSchema;
}

/**
 * Schemas for the blog fixture models: tenant-scoped Post, Comment and Tag,
 * the PostTag join model and the global Team model.
 */
export function buildBlogModels(): BlogModels {
  const schemas = buildModelSchemas(readFixtureManifests(), testContext);
  const byName = (name: string): ModelSchema => {
    const found = schemas.find(schema => schema.name === name);
    if (!found) {
      throw new Error(`Fixture model ${name} is missing`);
    }
    return found;
  };

  return {
    post: byName('Post'),
    comment: byName('Comment'),
    tag: byName('Tag'),
    postTag: byName('PostTag'),
    team: byName('Team'),
  };
}

export const testIds = {
  organizationId: '11111111-1111-4111-8111-111111111111',
  postId: '22222222-2222-4222-8222-222222222222',
  commentId: '33333333-3333-4333-8333-333333333333',
  otherCommentId: '44444444-4444-4444-8444-444444444444',
  v7Id: '01890a5d-ac96-774b-bcce-b302099a8057',
} as const;
