import { GeneratorError } from './errors.js';
import type { ModelField } from './model.js';

/**
 * A field whose value is supplied through one of the query's placeholders.
 */
export interface FieldBinding {
  readonly binding: string;
  readonly field: ModelField;
  /** 1-based placeholder index. */
  readonly position: number;
}

/**
 * Frozen output of a {@link QueryBuilder}.
 */
export interface SqlQueryContext {
  /** Drives the output file name. */
  readonly operationName: string;
  readonly sql: string;
  /** Binding names, positionally matching `$1..$n` in `sql`. */
  readonly bindings: readonly string[];
  readonly fieldBindings: readonly FieldBinding[];
}

/**
 * Query Builder for generated SQL
 *
 * Assembles query text while tracking named bindings. Each distinct binding
 * name is allocated the next positional placeholder; asking for the same
 * name again reuses it. A builder belongs to a single generation call and
 * cannot be used once finished.
 */
class QueryBuilder {
  private _sql: string;
  private _bindings: string[];
  private _finished: boolean;

  constructor(initialSql = '', initialBindings: string[] = []) {
    this._sql = initialSql;
    this._bindings = [...initialBindings];
    this._finished = false;
  }

  get sql(): string {
    return this._sql;
  }

  get bindings(): readonly string[] {
    return this._bindings;
  }

  /**
   * Append raw text to the query
   * @param sql - Text to append
   * @returns {QueryBuilder} This instance for chaining
   */
  push(sql: string): this {
    this._assertOpen();
    this._sql += sql;
    return this;
  }

  /**
   * Allocate or reuse a binding without writing anything to the query.
   * @param name - Binding name
   * @returns {number} 1-based placeholder index
   */
  createBindingIndex(name: string): number {
    this._assertOpen();
    const existing = this._bindings.indexOf(name);
    if (existing !== -1) {
      return existing + 1;
    }

    this._bindings.push(name);
    return this._bindings.length;
  }

  /**
   * Allocate or reuse a binding and return its placeholder text.
   * @param name - Binding name
   * @returns {string} Placeholder such as `$2`
   */
  createBinding(name: string): string {
    return `$${this.createBindingIndex(name)}`;
  }

  /**
   * Allocate or reuse a binding and append its placeholder to the query.
   * @param name - Binding name
   * @returns {QueryBuilder} This instance for chaining
   */
  pushBinding(name: string): this {
    return this.push(this.createBinding(name));
  }

  /**
   * Start a run of pushes joined by `separator`.
   */
  separated(separator: string): Separated {
    this._assertOpen();
    return new Separated(this, separator);
  }

  /**
   * Freeze the builder into a query context.
   * @param operationName - Name of the generated operation
   * @returns {SqlQueryContext} The finished query
   */
  finish(operationName: string): SqlQueryContext {
    return this.finishWithFieldBindings(operationName, []);
  }

  /**
   * Freeze the builder, also reporting which of `fields` ended up bound and
   * at which placeholder, in placeholder order.
   * @param operationName - Name of the generated operation
   * @param fields - Fields whose values may be bound under their logical name
   * @returns {SqlQueryContext} The finished query
   */
  finishWithFieldBindings(
    operationName: string,
    fields: readonly ModelField[]
  ): SqlQueryContext {
    this._assertOpen();
    if (this._sql.trim().length === 0) {
      throw new GeneratorError(`Query "${operationName}" was finished without any content`);
    }

    this._finished = true;

    const fieldsByName = new Map(fields.map(field => [field.name, field]));
    const fieldBindings: FieldBinding[] = [];
    this._bindings.forEach((binding, index) => {
      const field = fieldsByName.get(binding);
      if (field) {
        fieldBindings.push(Object.freeze({ binding, field, position: index + 1 }));
      }
    });

    return Object.freeze({
      operationName,
      sql: this._sql,
      bindings: Object.freeze([...this._bindings]),
      fieldBindings: Object.freeze(fieldBindings),
    });
  }

  _assertOpen(): void {
    if (this._finished) {
      throw new GeneratorError('QueryBuilder cannot be used after finish()');
    }
  }
}

/**
 * Part of a query whose pushes are joined by a separator, such as a column
 * list or an AND-joined predicate.
 */
export class Separated {
  private builder: QueryBuilder;
  private separator: string;
  private first: boolean;
  private prefix: string;

  constructor(builder: QueryBuilder, separator: string) {
    this.builder = builder;
    this.separator = separator;
    this.first = true;
    this.prefix = '';
  }

  /**
   * Text written just before the first separated push, e.g. `" WHERE "`, so
   * that it only appears when something follows it.
   */
  onFirst(prefix: string): this {
    this.prefix = prefix;
    return this;
  }

  push(sql: string): this {
    this._pushSeparator();
    this.builder.push(sql);
    return this;
  }

  pushUnseparated(sql: string): this {
    this.builder.push(sql);
    return this;
  }

  pushBinding(name: string): this {
    this._pushSeparator();
    this.builder.pushBinding(name);
    return this;
  }

  pushBindingUnseparated(name: string): this {
    this.builder.pushBinding(name);
    return this;
  }

  private _pushSeparator(): void {
    if (this.first) {
      this.first = false;
      if (this.prefix) {
        this.builder.push(this.prefix);
      }
    } else {
      this.builder.push(this.separator);
    }
  }
}

export { QueryBuilder };
export default QueryBuilder;
