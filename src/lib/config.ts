import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { ConfigurationError, ValidationError } from './errors.js';
import type { Access, DeleteBehavior, PopulationPolicy, SortDirectionPolicy, SqlType } from './model.js';
import type {
  BelongsToManifest,
  FieldManifest,
  HasManifest,
  LoadedManifest,
  ModelManifest,
  ReferenceManifest,
} from './model-manifest.js';
import { debug } from './runtime.js';
import types from './type.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const SQL_TYPES: readonly SqlType[] = [
  'text',
  'int',
  'bigint',
  'uuid',
  'float',
  'boolean',
  'json',
  'timestamp',
];
const ACCESS_LEVELS: readonly Access[] = ['none', 'read', 'write', 'read_write'];
const SORT_POLICIES: readonly SortDirectionPolicy[] = [
  'none',
  'ascending_only',
  'descending_only',
  'both',
];
const POPULATION_POLICIES: readonly PopulationPolicy[] = ['none', 'id', 'data'];
const DELETE_BEHAVIORS: readonly DeleteBehavior[] = [
  'ignore',
  'restrict',
  'cascade',
  'set_null',
  'set_default',
];

const identifier = () => types.string().matches(IDENTIFIER);
const flag = (value: unknown, name: string) => types.boolean().validate(value, name) ?? undefined;
const optionalString = (value: unknown, name: string) =>
  types.string().validate(value, name) ?? undefined;

function parseField(raw: unknown, at: string): FieldManifest {
  const record = types.object().expect(raw, at);
  const field: FieldManifest = {
    name: identifier().expect(record.name, `${at}.name`),
    type: types.enum(SQL_TYPES).expect(record.type, `${at}.type`),
  };

  const column = identifier().validate(record.column, `${at}.column`);
  if (column) field.column = column;
  field.nullable = flag(record.nullable, `${at}.nullable`);
  field.unique = flag(record.unique, `${at}.unique`);
  field.indexed = flag(record.indexed, `${at}.indexed`);
  field.neverRead = flag(record.neverRead, `${at}.neverRead`);
  field.omitInList = flag(record.omitInList, `${at}.omitInList`);
  field.access = types.enum(ACCESS_LEVELS).validate(record.access, `${at}.access`) ?? undefined;
  field.ownerAccess =
    types.enum(ACCESS_LEVELS).validate(record.ownerAccess, `${at}.ownerAccess`) ?? undefined;
  field.sortable =
    types.enum(SORT_POLICIES).validate(record.sortable, `${at}.sortable`) ?? undefined;
  field.default = optionalString(record.default, `${at}.default`);
  field.extraSqlModifiers = optionalString(record.extraSqlModifiers, `${at}.extraSqlModifiers`);

  const references = types.object().validate(record.references, `${at}.references`);
  if (references) {
    field.references = {
      model: identifier().expect(references.model, `${at}.references.model`),
      field: identifier().validate(references.field, `${at}.references.field`) ?? undefined,
      onDelete:
        types
          .enum(DELETE_BEHAVIORS)
          .validate(references.onDelete, `${at}.references.onDelete`) ?? undefined,
    };
  }

  return field;
}

function parseBelongsTo(raw: unknown, at: string): BelongsToManifest {
  if (typeof raw === 'string') {
    return { model: identifier().expect(raw, at) };
  }
  const record = types.object().expect(raw, at);
  return {
    model: identifier().expect(record.model, `${at}.model`),
    globallyUnique: flag(record.globallyUnique, `${at}.globallyUnique`),
  };
}

function parseHas(raw: unknown, at: string): HasManifest {
  const record = types.object().expect(raw, at);
  const policy = types.enum(POPULATION_POLICIES);
  return {
    model: identifier().expect(record.model, `${at}.model`),
    many: flag(record.many, `${at}.many`),
    through: identifier().validate(record.through, `${at}.through`) ?? undefined,
    populateOnGet: policy.validate(record.populateOnGet, `${at}.populateOnGet`) ?? undefined,
    populateOnList: policy.validate(record.populateOnList, `${at}.populateOnList`) ?? undefined,
    fieldName: identifier().validate(record.fieldName, `${at}.fieldName`) ?? undefined,
  };
}

function parseReference(raw: unknown, at: string): ReferenceManifest {
  const record = types.object().expect(raw, at);
  return {
    field: identifier().expect(record.field, `${at}.field`),
    model: identifier().expect(record.model, `${at}.model`),
    name: identifier().validate(record.name, `${at}.name`) ?? undefined,
    onGet: flag(record.onGet, `${at}.onGet`),
    onList: flag(record.onList, `${at}.onList`),
  };
}

/**
 * Validate a decoded model definition.
 *
 * @param raw - Decoded JSON value
 * @param sourcePath - File the value came from, used in error messages
 * @throws {ConfigurationError} When the definition is malformed
 */
export function parseModelManifest(raw: unknown, sourcePath: string | null = null): ModelManifest {
  try {
    const record = types.object().expect(raw, 'model');
    const fields = types.array(types.any()).expect(record.fields, 'fields');

    const manifest: ModelManifest = {
      name: identifier().expect(record.name, 'name'),
      fields: fields.map((field, index) => parseField(field, `fields[${index}]`)),
    };

    manifest.schema = identifier().validate(record.schema, 'schema') ?? undefined;
    manifest.table = identifier().validate(record.table, 'table') ?? undefined;
    manifest.global = flag(record.global, 'global');
    manifest.authCheckInQuery = flag(record.authCheckInQuery, 'authCheckInQuery');
    manifest.defaultSort = optionalString(record.defaultSort, 'defaultSort');

    const joins = types.array(identifier()).validate(record.joins, 'joins');
    if (joins) {
      if (joins.length !== 2) {
        throw new ValidationError('joins must name exactly two models', 'joins');
      }
      manifest.joins = [joins[0], joins[1]];
    }

    if (record.belongsTo !== undefined && record.belongsTo !== null) {
      manifest.belongsTo = Array.isArray(record.belongsTo)
        ? record.belongsTo.map((entry: unknown, index) =>
            parseBelongsTo(entry, `belongsTo[${index}]`)
          )
        : parseBelongsTo(record.belongsTo, 'belongsTo');
    }

    const has = types.array(types.any()).validate(record.has, 'has');
    if (has) {
      manifest.has = has.map((entry, index) => parseHas(entry, `has[${index}]`));
    }

    const references = types.array(types.any()).validate(record.references, 'references');
    if (references) {
      manifest.references = references.map((entry, index) =>
        parseReference(entry, `references[${index}]`)
      );
    }

    const pagination = types.object().validate(record.pagination, 'pagination');
    if (pagination) {
      const perPage = () => types.number().integer().min(1);
      manifest.pagination = {
        disable: flag(pagination.disable, 'pagination.disable'),
        defaultPerPage:
          perPage().validate(pagination.defaultPerPage, 'pagination.defaultPerPage') ?? undefined,
        maxPerPage: perPage().validate(pagination.maxPerPage, 'pagination.maxPerPage') ?? undefined,
      };
    }

    const indexes = types.array(types.string()).validate(record.indexes, 'indexes');
    if (indexes) {
      manifest.indexes = indexes;
    }

    return manifest;
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(error.message, sourcePath);
    }
    throw error;
  }
}

/**
 * Read every `*.json` model definition in a directory, in file name order.
 *
 * @param directory - Directory holding one model per file
 * @throws {ConfigurationError} When a file cannot be read or is malformed
 */
export async function loadModelManifests(directory: string): Promise<LoadedManifest[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Unable to read model directory: ${reason}`, directory);
  }

  const files = entries.filter(entry => entry.endsWith('.json')).sort();
  debug.generate(`Loading ${files.length} model definitions from ${directory}`);

  return Promise.all(
    files.map(async file => {
      const sourcePath = path.join(directory, file);
      let text: string;
      try {
        text = await readFile(sourcePath, 'utf8');
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Unable to read model file: ${reason}`, sourcePath);
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(text);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigurationError(`Invalid JSON: ${reason}`, sourcePath);
      }

      return { manifest: parseModelManifest(decoded, sourcePath), sourcePath };
    })
  );
}
