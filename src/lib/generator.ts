import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { loadModelManifests } from './config.js';
import { FormatterError, WriteFileError } from './errors.js';
import type { SqlFormatter } from './formatter.js';
import { generateDownMigration, generateUpMigration } from './migrations.js';
import type { ModelSchema, SqlDialect } from './model.js';
import type { GenerationContext } from './model-initializer.js';
import { buildModelSchemas } from './model-initializer.js';
import type { LoadedManifest } from './model-manifest.js';
import ModelRegistry from './model-registry.js';
import { generateModelQueries } from './operations.js';
import { debug } from './runtime.js';

export interface GeneratorConfig {
  /** Directory the rendered files are written under. */
  outputPath: string;
  /** Database schema for models that do not name one. */
  schema: string;
  /** Schema holding the organizations and permission tables. */
  authSchema: string;
  dialect: SqlDialect;
  formatter: SqlFormatter | null;
}

/**
 * One output file, with a path relative to the output directory.
 */
export interface RenderedFile {
  path: string;
  contents: string;
}

/**
 * Drives generation for a set of models: renders every query and both
 * migrations of each model, formats them and writes them out.
 */
export class QueryGenerator {
  config: GeneratorConfig;
  modelRegistry: ModelRegistry;

  constructor(config: Partial<GeneratorConfig> = {}) {
    const defaultConfig: GeneratorConfig = {
      outputPath: 'generated',
      schema: 'public',
      authSchema: 'public',
      dialect: 'postgresql',
      formatter: null,
    };

    this.config = {
      ...defaultConfig,
      ...config,
    };

    this.modelRegistry = new ModelRegistry();
  }

  get context(): GenerationContext {
    return { schema: this.config.schema, authSchema: this.config.authSchema };
  }

  /**
   * Build and register the schemas for a batch of related manifests.
   * @returns The registered schemas
   */
  addManifests(loaded: readonly LoadedManifest[]): ModelSchema[] {
    return buildModelSchemas(loaded, this.context).map(model => this.modelRegistry.register(model));
  }

  /**
   * Load every model definition from a directory and register it.
   */
  async loadModels(directory: string): Promise<ModelSchema[]> {
    const loaded = await loadModelManifests(directory);
    return this.addManifests(loaded);
  }

  /**
   * Render the query files and migrations of one model, unformatted.
   */
  renderModel(model: ModelSchema): RenderedFile[] {
    const queries = generateModelQueries(model).map(query => ({
      path: path.posix.join(model.snakeName, `${query.operationName}.sql`),
      contents: `${query.sql}\n`,
    }));

    return [
      ...queries,
      {
        path: path.posix.join('migrations', `${model.snakeName}.up.sql`),
        contents: generateUpMigration(model, this.config.dialect),
      },
      {
        path: path.posix.join('migrations', `${model.snakeName}.down.sql`),
        contents: generateDownMigration(model, this.config.dialect),
      },
    ];
  }

  private async formatFile(file: RenderedFile): Promise<RenderedFile> {
    const { formatter } = this.config;
    if (!formatter) {
      return file;
    }

    try {
      return { path: file.path, contents: await formatter(file.path, file.contents) };
    } catch (error) {
      debug.error(`Formatting ${file.path} failed`, error);
      if (error instanceof FormatterError) {
        throw error;
      }
      throw new FormatterError(file.path, error instanceof Error ? error.message : String(error));
    }
  }

  /**
   * Render and format the files of every registered model.
   */
  async render(): Promise<RenderedFile[]> {
    const perModel = await Promise.all(
      this.modelRegistry.list().map(async model => {
        const files = this.renderModel(model);
        debug.generate(`Rendered ${files.length} files for model ${model.name}`);
        return Promise.all(files.map(file => this.formatFile(file)));
      })
    );
    return perModel.flat();
  }

  /**
   * Render every model and write the files under the output directory.
   * @returns Paths of the written files
   * @throws {FormatterError} When the formatter fails on a file
   * @throws {WriteFileError} When a file cannot be written
   */
  async writeAll(): Promise<string[]> {
    const files = await this.render();

    return Promise.all(
      files.map(async file => {
        const target = path.join(this.config.outputPath, file.path);
        try {
          await mkdir(path.dirname(target), { recursive: true });
          await writeFile(target, file.contents, 'utf8');
        } catch (error) {
          debug.error(`Writing ${target} failed`, error);
          throw new WriteFileError(target, error);
        }
        debug.generate(`Wrote ${target}`);
        return target;
      })
    );
  }
}

export default QueryGenerator;
