import bindings from './lib/bindings.js';
import { loadModelManifests, parseModelManifest } from './lib/config.js';
import Errors from './lib/errors.js';
import type { SqlFormatter } from './lib/formatter.js';
import { createCommandFormatter } from './lib/formatter.js';
import type { GeneratorConfig, RenderedFile } from './lib/generator.js';
import QueryGenerator from './lib/generator.js';
import { generateDownMigration, generateUpMigration } from './lib/migrations.js';
import type {
  Access,
  BelongsToRelation,
  ChildRelation,
  ModelField,
  ModelSchema,
  PopulationPolicy,
  ReferencePopulation,
  SortDirectionPolicy,
  SqlDialect,
  SqlType,
} from './lib/model.js';
import type { GenerationContext } from './lib/model-initializer.js';
import { buildModelSchema, buildModelSchemas } from './lib/model-initializer.js';
import type { LoadedManifest, ModelManifest } from './lib/model-manifest.js';
import ModelRegistry from './lib/model-registry.js';
import type { QueryKind, QueryRequest } from './lib/operations.js';
import { generateModelQueries, generateQueries, modelQueryRequests } from './lib/operations.js';
import { parseOrderBy } from './lib/order-by.js';
import type { PrepareOptions } from './lib/prepare.js';
import { toQueryConfig } from './lib/prepare.js';
import type { FieldBinding, SqlQueryContext } from './lib/query-builder.js';
import QueryBuilder from './lib/query-builder.js';
import type { GeneratorDebugLogger } from './lib/runtime.js';
import { setDebugLogger } from './lib/runtime.js';
import types from './lib/type.js';

/**
 * Model-to-SQL query compiler
 *
 * This module is the entry point for turning declarative model definitions
 * into parameterized, tenant-aware PostgreSQL queries and migrations.
 */

type CreateQueryGenerator = ((config?: Partial<GeneratorConfig>) => QueryGenerator) & {
  QueryGenerator: typeof QueryGenerator;
  QueryBuilder: typeof QueryBuilder;
  ModelRegistry: typeof ModelRegistry;
  types: typeof types;
  bindings: typeof bindings;
  Errors: typeof Errors;
};

/**
 * Create a query generator.
 *
 * @param config Optional overrides for the output directory, schemas, dialect and formatter.
 * @returns A generator with an empty model registry.
 */
const createQueryGenerator: CreateQueryGenerator = Object.assign(
  (config?: Partial<GeneratorConfig>) => new QueryGenerator(config),
  { QueryGenerator, QueryBuilder, ModelRegistry, types, bindings, Errors }
);

export {
  QueryGenerator,
  QueryBuilder,
  ModelRegistry,
  types,
  bindings,
  Errors,
  buildModelSchema,
  buildModelSchemas,
  createCommandFormatter,
  createQueryGenerator,
  generateDownMigration,
  generateModelQueries,
  generateQueries,
  generateUpMigration,
  loadModelManifests,
  modelQueryRequests,
  parseModelManifest,
  parseOrderBy,
  setDebugLogger,
  toQueryConfig,
};

export type {
  Access,
  BelongsToRelation,
  ChildRelation,
  FieldBinding,
  GenerationContext,
  GeneratorConfig,
  GeneratorDebugLogger,
  LoadedManifest,
  ModelField,
  ModelManifest,
  ModelSchema,
  PopulationPolicy,
  PrepareOptions,
  QueryKind,
  QueryRequest,
  ReferencePopulation,
  RenderedFile,
  SortDirectionPolicy,
  SqlDialect,
  SqlFormatter,
  SqlQueryContext,
  SqlType,
};

export default createQueryGenerator;
