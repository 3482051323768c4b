import type {
  Access,
  DeleteBehavior,
  PopulationPolicy,
  SortDirectionPolicy,
  SqlType,
} from './model.js';

/**
 * Declarative field configuration as written in a model file.
 */
export interface FieldManifest {
  name: string;
  type: SqlType;
  /** Column name; defaults to the snake_case form of `name`. */
  column?: string;
  nullable?: boolean;
  unique?: boolean;
  indexed?: boolean;
  /** How API callers may access the field. Defaults to `read_write`. */
  access?: Access;
  /** How owners may access the field, on top of `access`. Defaults to `none`. */
  ownerAccess?: Access;
  /** Never return this field from any query. */
  neverRead?: boolean;
  omitInList?: boolean;
  sortable?: SortDirectionPolicy;
  /** SQL expression used as the column default. */
  default?: string;
  extraSqlModifiers?: string;
  references?: {
    model: string;
    field?: string;
    onDelete?: DeleteBehavior;
  };
}

export interface BelongsToManifest {
  model: string;
  /** Only one child may exist per parent. */
  globallyUnique?: boolean;
}

/**
 * One-to-many (or one-to-one) relation to a child model.
 */
export interface HasManifest {
  model: string;
  many?: boolean;
  /** Join model linking this model to the child. */
  through?: string;
  populateOnGet?: PopulationPolicy;
  populateOnList?: PopulationPolicy;
  /** Output name; defaults to the child's snake_case name, pluralised when `many`. */
  fieldName?: string;
}

/**
 * Foreign reference resolved into nested JSON on read.
 */
export interface ReferenceManifest {
  /** Field on this model holding the referenced id. */
  field: string;
  model: string;
  name?: string;
  onGet?: boolean;
  onList?: boolean;
}

/**
 * Model manifest definition - declarative model configuration.
 * Loaded from JSON and turned into a {@link ModelSchema} by the initializer.
 */
export interface ModelManifest {
  name: string;
  schema?: string;
  table?: string;
  /** True for models that are not scoped to an organization. */
  global?: boolean;
  fields: FieldManifest[];
  /** Two models joined by this one; makes it a join model. */
  joins?: [string, string];
  belongsTo?: string | BelongsToManifest | Array<string | BelongsToManifest>;
  has?: HasManifest[];
  references?: ReferenceManifest[];
  pagination?: {
    disable?: boolean;
    defaultPerPage?: number;
    maxPerPage?: number;
  };
  defaultSort?: string;
  authCheckInQuery?: boolean;
  /** Extra index statements appended to the up migration. */
  indexes?: string[];
}

/**
 * A manifest together with the file it was read from.
 */
export interface LoadedManifest {
  manifest: ModelManifest;
  sourcePath: string | null;
}
