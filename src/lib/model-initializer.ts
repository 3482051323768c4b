import { ConfigurationError, OrderByError } from './errors.js';
import type {
  Access,
  BelongsToRelation,
  ChildRelation,
  DeleteBehavior,
  FieldReference,
  ModelField,
  ModelSchema,
  PopulationPolicy,
  ReferencePopulation,
  SortDirectionPolicy,
  SqlType,
} from './model.js';
import { toSnakeCase } from './model.js';
import type {
  BelongsToManifest,
  FieldManifest,
  LoadedManifest,
  ModelManifest,
} from './model-manifest.js';
import { parseOrderBy } from './order-by.js';
import { debug } from './runtime.js';

/**
 * Settings shared by every model of one generation run.
 */
export interface GenerationContext {
  /** Database schema for models that do not name one. */
  schema: string;
  /** Schema holding the organizations and permission tables. */
  authSchema: string;
}

export const DEFAULT_PER_PAGE = 50;
export const MAX_PER_PAGE = 200;
export const DEFAULT_SORT = '-updated_at';

const STANDARD_FIELD_NAMES = new Set(['id', 'organization_id', 'updated_at', 'created_at']);

interface FieldInput {
  name: string;
  sqlName?: string;
  type: SqlType;
  fixed?: boolean;
  access?: Access;
  ownerAccess?: Access;
  neverRead?: boolean;
  nullable?: boolean;
  unique?: boolean;
  indexed?: boolean;
  omitInList?: boolean;
  sortable?: SortDirectionPolicy;
  default?: string;
  extraSqlModifiers?: string;
  references?: FieldReference | null;
}

const canRead = (access: Access) => access === 'read' || access === 'read_write';
const canWrite = (access: Access) => access === 'write' || access === 'read_write';

function makeField(input: FieldInput): ModelField {
  const sqlName = input.sqlName ?? toSnakeCase(input.name);
  const fixed = input.fixed ?? false;
  const access = input.access ?? 'read_write';
  const ownerAccess = input.ownerAccess ?? 'none';

  return {
    name: input.name,
    sqlName,
    sqlFullName: sqlName === input.name ? sqlName : `${sqlName} AS "${input.name}"`,
    type: input.type,
    fixed,
    writable: !fixed && canWrite(access),
    ownerWrite: !fixed && (canWrite(ownerAccess) || canWrite(access)),
    neverRead: (input.neverRead ?? false) || (!canRead(ownerAccess) && !canRead(access)),
    unique: input.unique ?? false,
    nullable: input.nullable ?? false,
    indexed: input.indexed ?? false,
    omitInList: input.omitInList ?? false,
    sortable: input.sortable ?? 'none',
    default: input.default ?? '',
    extraSqlModifiers: input.extraSqlModifiers ?? '',
    references: input.references ?? null,
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

function belongsToList(manifest: ModelManifest): BelongsToManifest[] {
  const { belongsTo } = manifest;
  if (belongsTo === undefined) {
    return [];
  }
  const entries = Array.isArray(belongsTo) ? belongsTo : [belongsTo];
  return entries.map(entry => (typeof entry === 'string' ? { model: entry } : entry));
}

/** Everything about a model that does not depend on its relations. */
interface ModelShape {
  manifest: ModelManifest;
  sourcePath: string | null;
  snakeName: string;
  schema: string;
  table: string;
  global: boolean;
  fields: ModelField[];
  belongsTo: BelongsToRelation[];
}

type ShapeMap = Map<string, ModelShape>;

function lookup(
  shapes: ShapeMap,
  name: string,
  from: ModelShape,
  relation: string
): ModelShape {
  const shape = shapes.get(name);
  if (!shape) {
    throw new ConfigurationError(
      `Model ${from.manifest.name} references unknown model ${name} in ${relation}`,
      from.sourcePath
    );
  }
  return shape;
}

interface ShapeSeed {
  manifest: ModelManifest;
  sourcePath: string | null;
  snakeName: string;
  schema: string;
  table: string;
  global: boolean;
}

function buildShape(seed: ShapeSeed, seeds: Map<string, ShapeSeed>, context: GenerationContext): ModelShape {
  const { manifest, sourcePath } = seed;
  const seedFor = (name: string, relation: string): ShapeSeed => {
    const found = seeds.get(name);
    if (!found) {
      throw new ConfigurationError(
        `Model ${manifest.name} references unknown model ${name} in ${relation}`,
        sourcePath
      );
    }
    return found;
  };

  const fields: ModelField[] = [];

  if (manifest.joins) {
    for (const parentName of manifest.joins) {
      const parent = seedFor(parentName, 'joins');
      fields.push(
        makeField({
          name: `${parent.snakeName}_id`,
          type: 'uuid',
          fixed: true,
          sortable: 'none',
          references: { schema: parent.schema, table: parent.table, field: 'id', onDelete: 'cascade' },
        })
      );
    }
  } else {
    fields.push(makeField({ name: 'id', type: 'uuid', fixed: true }));
  }

  if (!seed.global) {
    fields.push(
      makeField({
        name: 'organization_id',
        type: 'uuid',
        fixed: true,
        indexed: true,
        references: {
          schema: context.authSchema,
          table: 'organizations',
          field: 'id',
          onDelete: 'cascade',
        },
      })
    );
  }

  fields.push(
    makeField({ name: 'updated_at', type: 'timestamp', fixed: true, default: 'now()', sortable: 'both' }),
    makeField({ name: 'created_at', type: 'timestamp', fixed: true, default: 'now()', sortable: 'both' })
  );

  const names = new Set(fields.map(field => field.name));
  const columns = new Set(fields.map(field => field.sqlName));

  for (const declared of manifest.fields) {
    const field = declaredField(declared, seedFor);
    if (
      STANDARD_FIELD_NAMES.has(field.name) ||
      STANDARD_FIELD_NAMES.has(field.sqlName) ||
      names.has(field.name) ||
      columns.has(field.sqlName)
    ) {
      throw new ConfigurationError(
        `Field ${declared.name} of model ${manifest.name} is declared more than once or conflicts with a standard field`,
        sourcePath
      );
    }
    names.add(field.name);
    columns.add(field.sqlName);
    fields.push(field);
  }

  const belongsTo: BelongsToRelation[] = [];
  for (const relation of belongsToList(manifest)) {
    const parent = seedFor(relation.model, 'belongsTo');
    const column = `${parent.snakeName}_id`;
    let field = fields.find(candidate => candidate.sqlName === column);
    if (!field) {
      field = makeField({
        name: column,
        type: 'uuid',
        indexed: true,
        unique: relation.globallyUnique ?? false,
        references: { schema: parent.schema, table: parent.table, field: 'id', onDelete: 'cascade' },
      });
      fields.push(field);
    }

    belongsTo.push({
      model: parent.manifest.name,
      modelSnakeName: parent.snakeName,
      field: field.name,
      sqlName: field.sqlName,
      globallyUnique: relation.globallyUnique ?? false,
    });
  }

  return { ...seed, fields, belongsTo };
}

function declaredField(
  declared: FieldManifest,
  seedFor: (name: string, relation: string) => ShapeSeed
): ModelField {
  let references: FieldReference | null = null;
  if (declared.references) {
    const target = seedFor(declared.references.model, `field ${declared.name}`);
    const onDelete: DeleteBehavior = declared.references.onDelete ?? 'restrict';
    references = {
      schema: target.schema,
      table: target.table,
      field: declared.references.field ?? 'id',
      onDelete,
    };
  }

  return makeField({
    name: declared.name,
    sqlName: declared.column,
    type: declared.type,
    access: declared.access,
    ownerAccess: declared.ownerAccess,
    neverRead: declared.neverRead,
    nullable: declared.nullable,
    unique: declared.unique,
    indexed: declared.indexed,
    omitInList: declared.omitInList,
    sortable: declared.sortable,
    default: declared.default,
    extraSqlModifiers: declared.extraSqlModifiers,
    references,
  });
}

function populatedFieldName(
  base: string,
  explicit: boolean,
  many: boolean,
  policy: PopulationPolicy
): string {
  if (explicit) {
    return base;
  }
  if (policy === 'id') {
    return many ? `${base}_ids` : `${base}_id`;
  }
  return many ? `${base}s` : base;
}

function buildChildren(shape: ModelShape, shapes: ShapeMap): ChildRelation[] {
  const { manifest } = shape;
  const has = manifest.has ?? [];
  if (manifest.joins && has.length > 0) {
    throw new ConfigurationError(
      `Join model ${manifest.name} cannot declare has relations`,
      shape.sourcePath
    );
  }

  return has.map(entry => {
    const child = lookup(shapes, entry.model, shape, 'has');
    const many = entry.many ?? false;
    const populateOnGet = entry.populateOnGet ?? 'data';
    const populateOnList = entry.populateOnList ?? 'none';
    let parentField: string;
    let through: ChildRelation['through'] = null;

    if (entry.through) {
      const throughShape = lookup(shapes, entry.through, shape, 'through');
      const joins = throughShape.manifest.joins;
      if (!joins) {
        throw new ConfigurationError(
          `Model ${manifest.name} uses ${entry.through} as a through model, but it is not a join model`,
          shape.sourcePath
        );
      }
      for (const side of [manifest.name, entry.model]) {
        if (!joins.includes(side)) {
          throw new ConfigurationError(
            `Through model ${entry.through} for ${manifest.name} has ${entry.model} does not join ${side}`,
            shape.sourcePath
          );
        }
      }

      parentField = `${shape.snakeName}_id`;
      through = {
        schema: throughShape.schema,
        table: throughShape.table,
        toIdField: `${child.snakeName}_id`,
      };
    } else {
      const backReference = child.belongsTo.find(relation => relation.model === manifest.name);
      if (!backReference) {
        const declared = child.belongsTo.map(relation => relation.model).join(', ');
        throw new ConfigurationError(
          declared
            ? `Model ${manifest.name} has child ${entry.model}, but ${entry.model} belongs to ${declared}`
            : `Model ${manifest.name} has child ${entry.model}, which does not declare belongsTo ${manifest.name}`,
          shape.sourcePath
        );
      }
      parentField = backReference.sqlName;
    }

    const base = entry.fieldName ?? child.snakeName;
    const explicit = entry.fieldName !== undefined;

    return {
      model: child.manifest.name,
      schema: child.schema,
      table: child.table,
      parentField,
      many,
      fields: child.fields,
      through,
      populateOnGet,
      populateOnList,
      getFieldName: populatedFieldName(base, explicit, many, populateOnGet),
      listFieldName: populatedFieldName(base, explicit, many, populateOnList),
    };
  });
}

function buildReferences(shape: ModelShape, shapes: ShapeMap): ReferencePopulation[] {
  return (shape.manifest.references ?? []).map(entry => {
    const target = lookup(shapes, entry.model, shape, 'references');
    const field = shape.fields.find(candidate => candidate.name === entry.field);
    if (!field) {
      throw new ConfigurationError(
        `Reference on model ${shape.manifest.name} uses unknown field ${entry.field}`,
        shape.sourcePath
      );
    }

    const name = entry.name ?? target.snakeName;
    return {
      name,
      fullName: name,
      model: target.manifest.name,
      schema: target.schema,
      table: target.table,
      idField: field.sqlName,
      fields: target.fields,
      global: target.global,
      onGet: entry.onGet ?? true,
      onList: entry.onList ?? false,
    };
  });
}

/**
 * Turn validated manifests into immutable model schemas, resolving relations
 * across models.
 *
 * @param loaded - Manifests with the files they came from
 * @param context - Run-wide schema settings
 * @returns Schemas in the order the manifests were given
 * @throws {ConfigurationError} When models are inconsistent with each other
 */
export function buildModelSchemas(
  loaded: readonly LoadedManifest[],
  context: GenerationContext
): ModelSchema[] {
  const seeds = new Map<string, ShapeSeed>();
  for (const { manifest, sourcePath } of loaded) {
    if (seeds.has(manifest.name)) {
      throw new ConfigurationError(`Model ${manifest.name} is defined more than once`, sourcePath);
    }
    const snakeName = toSnakeCase(manifest.name);
    seeds.set(manifest.name, {
      manifest,
      sourcePath,
      snakeName,
      schema: manifest.schema ?? context.schema,
      table: manifest.table ?? `${snakeName}s`,
      global: manifest.global ?? false,
    });
  }

  const shapes: ShapeMap = new Map();
  for (const seed of seeds.values()) {
    shapes.set(seed.manifest.name, buildShape(seed, seeds, context));
  }

  return [...shapes.values()].map(shape => {
    const { manifest } = shape;
    const schema: ModelSchema = {
      name: manifest.name,
      snakeName: shape.snakeName,
      schema: shape.schema,
      table: shape.table,
      global: shape.global,
      fields: shape.fields,
      join: manifest.joins
        ? {
            modelIds: [
              `${lookup(shapes, manifest.joins[0], shape, 'joins').snakeName}_id`,
              `${lookup(shapes, manifest.joins[1], shape, 'joins').snakeName}_id`,
            ],
          }
        : null,
      belongsTo: shape.belongsTo,
      children: buildChildren(shape, shapes),
      referencePopulations: buildReferences(shape, shapes),
      pagination: {
        disable: manifest.pagination?.disable ?? false,
        defaultPerPage: manifest.pagination?.defaultPerPage ?? DEFAULT_PER_PAGE,
        maxPerPage: manifest.pagination?.maxPerPage ?? MAX_PER_PAGE,
      },
      defaultSort: manifest.defaultSort ?? DEFAULT_SORT,
      authCheckInQuery: manifest.authCheckInQuery ?? false,
      authSchema: context.authSchema,
      ownerPermission: `${manifest.name}::owner`,
      writePermission: `${manifest.name}::write`,
      readPermission: `${manifest.name}::read`,
      indexes: manifest.indexes ?? [],
    };

    try {
      parseOrderBy(schema, schema.defaultSort);
    } catch (error) {
      if (error instanceof OrderByError) {
        throw new ConfigurationError(
          `Default sort of model ${manifest.name} is invalid: ${error.message}`,
          shape.sourcePath
        );
      }
      throw error;
    }

    debug.generate(`Built schema for model ${schema.name} (${schema.fields.length} fields)`);
    return deepFreeze(schema);
  });
}

/**
 * Build a single schema from one manifest, for models without relations to
 * other models.
 */
export function buildModelSchema(manifest: ModelManifest, context: GenerationContext): ModelSchema {
  const [schema] = buildModelSchemas([{ manifest, sourcePath: null }], context);
  return schema;
}
