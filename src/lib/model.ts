/**
 * Column types a model field may declare.
 */
export type SqlType = 'text' | 'int' | 'bigint' | 'uuid' | 'float' | 'boolean' | 'json' | 'timestamp';

export type SqlDialect = 'postgresql' | 'sqlite';

/**
 * Access level granted to API callers (or owners) on a field.
 */
export type Access = 'none' | 'read' | 'write' | 'read_write';

export type SortDirectionPolicy = 'none' | 'ascending_only' | 'descending_only' | 'both';

/**
 * How a related model is populated on read: not at all, as ids, or as
 * nested JSON objects.
 */
export type PopulationPolicy = 'none' | 'id' | 'data';

export type DeleteBehavior = 'ignore' | 'restrict' | 'cascade' | 'set_null' | 'set_default';

export interface FieldReference {
  readonly schema: string;
  readonly table: string;
  readonly field: string;
  readonly onDelete: DeleteBehavior;
}

/**
 * A single column of a model after normalisation.
 */
export interface ModelField {
  /** Logical name, used for binding names and output keys. */
  readonly name: string;
  /** Column name. */
  readonly sqlName: string;
  /** Column name aliased to the logical name when the two differ. */
  readonly sqlFullName: string;
  readonly type: SqlType;
  /** Standard or key column that callers never write directly. */
  readonly fixed: boolean;
  readonly ownerWrite: boolean;
  readonly writable: boolean;
  readonly neverRead: boolean;
  readonly unique: boolean;
  readonly nullable: boolean;
  readonly indexed: boolean;
  readonly omitInList: boolean;
  readonly sortable: SortDirectionPolicy;
  /** SQL expression used as the column default, or empty. */
  readonly default: string;
  readonly extraSqlModifiers: string;
  readonly references: FieldReference | null;
}

/**
 * Join (junction) models are keyed by two parent ids instead of an `id`.
 */
export interface JoinDescriptor {
  readonly modelIds: readonly [string, string];
}

export interface BelongsToRelation {
  readonly model: string;
  readonly modelSnakeName: string;
  /** Logical name of the foreign key field. */
  readonly field: string;
  readonly sqlName: string;
  /** Only one child may exist per parent. */
  readonly globallyUnique: boolean;
}

export interface ThroughTable {
  readonly schema: string;
  readonly table: string;
  /** Column in the through table that points at the child model. */
  readonly toIdField: string;
}

export interface ChildRelation {
  readonly model: string;
  readonly schema: string;
  readonly table: string;
  /** Column (in the child table, or the through table) holding the parent id. */
  readonly parentField: string;
  readonly many: boolean;
  readonly fields: readonly ModelField[];
  readonly through: ThroughTable | null;
  readonly populateOnGet: PopulationPolicy;
  readonly populateOnList: PopulationPolicy;
  readonly getFieldName: string;
  readonly listFieldName: string;
}

export interface ReferencePopulation {
  readonly name: string;
  readonly fullName: string;
  readonly model: string;
  readonly schema: string;
  readonly table: string;
  /** Column on this model holding the referenced id. */
  readonly idField: string;
  readonly fields: readonly ModelField[];
  /** Referenced model is not tenant-scoped. */
  readonly global: boolean;
  readonly onGet: boolean;
  readonly onList: boolean;
}

export interface PaginationOptions {
  readonly disable: boolean;
  readonly defaultPerPage: number;
  readonly maxPerPage: number;
}

/**
 * Immutable, validated representation of one declared model. Built once by
 * the model initializer and read-only for the rest of a generation run.
 */
export interface ModelSchema {
  readonly name: string;
  readonly snakeName: string;
  readonly schema: string;
  readonly table: string;
  readonly global: boolean;
  readonly fields: readonly ModelField[];
  readonly join: JoinDescriptor | null;
  readonly belongsTo: readonly BelongsToRelation[];
  readonly children: readonly ChildRelation[];
  readonly referencePopulations: readonly ReferencePopulation[];
  readonly pagination: PaginationOptions;
  readonly defaultSort: string;
  readonly authCheckInQuery: boolean;
  readonly authSchema: string;
  readonly ownerPermission: string;
  readonly writePermission: string;
  readonly readPermission: string;
  readonly indexes: readonly string[];
}

const SQL_TYPE_NAMES: Record<SqlDialect, Record<SqlType, string>> = {
  postgresql: {
    text: 'TEXT',
    int: 'INTEGER',
    bigint: 'BIGINT',
    uuid: 'UUID',
    float: 'DOUBLE PRECISION',
    boolean: 'BOOLEAN',
    json: 'JSONB',
    timestamp: 'TIMESTAMPTZ',
  },
  sqlite: {
    text: 'TEXT',
    int: 'INTEGER',
    bigint: 'INTEGER',
    uuid: 'BLOB',
    float: 'DOUBLE PRECISION',
    boolean: 'INTEGER',
    json: 'JSON',
    timestamp: 'INTEGER',
  },
};

/**
 * Column type name for a field type in the given dialect.
 */
export function sqlTypeName(type: SqlType, dialect: SqlDialect = 'postgresql'): string {
  return SQL_TYPE_NAMES[dialect][type];
}

/**
 * Schema-qualified table name, e.g. `app.comments`.
 */
export function qualifiedTable(target: { schema: string; table: string }): string {
  return target.schema ? `${target.schema}.${target.table}` : target.table;
}

/**
 * Quote a value as a SQL string literal.
 */
export function sqlString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Convert a camelCase or PascalCase identifier to snake_case.
 */
export function toSnakeCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .replace(/[\s-]+/g, '_')
    .toLowerCase();
}
