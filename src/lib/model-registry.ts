import { GeneratorError } from './errors.js';
import type { ModelSchema } from './model.js';

/**
 * Track the model schemas belonging to one generation run. The registry
 * maintains lookups by both model name and table name so relations can be
 * resolved either way.
 */
export class ModelRegistry {
  private modelsByName: Map<string, ModelSchema>;
  private modelsByTable: Map<string, ModelSchema>;

  constructor() {
    this.modelsByName = new Map();
    this.modelsByTable = new Map();
  }

  /**
   * Register a schema under its name and its qualified table name.
   * @returns The registered schema.
   */
  register(model: ModelSchema): ModelSchema {
    const tableKey = `${model.schema}.${model.table}`;

    const existingByName = this.modelsByName.get(model.name);
    if (existingByName && existingByName !== model) {
      throw new GeneratorError(
        `Model '${model.name}' already registered in this generator.`,
        'DUPLICATE_MODEL'
      );
    }

    const existingByTable = this.modelsByTable.get(tableKey);
    if (existingByTable && existingByTable !== model) {
      throw new GeneratorError(
        `Table '${tableKey}' already registered by model '${existingByTable.name}'.`,
        'DUPLICATE_MODEL'
      );
    }

    this.modelsByName.set(model.name, model);
    this.modelsByTable.set(tableKey, model);
    return model;
  }

  /**
   * Retrieve a schema by model name, table name or `schema.table`.
   * @returns The schema when present, otherwise null.
   */
  get(identifier: string): ModelSchema | null {
    if (!identifier) {
      return null;
    }

    const byKey = this.modelsByName.get(identifier) ?? this.modelsByTable.get(identifier);
    if (byKey) {
      return byKey;
    }

    for (const model of this.modelsByTable.values()) {
      if (model.table === identifier) {
        return model;
      }
    }
    return null;
  }

  has(identifier: string): boolean {
    return this.get(identifier) !== null;
  }

  /**
   * Registered schemas in registration order.
   */
  list(): ModelSchema[] {
    return [...this.modelsByName.values()];
  }

  clear(): void {
    this.modelsByName.clear();
    this.modelsByTable.clear();
  }
}

export default ModelRegistry;
