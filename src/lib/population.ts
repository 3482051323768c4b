import type {
  ChildRelation,
  ModelField,
  ModelSchema,
  PopulationPolicy,
  ReferencePopulation,
} from './model.js';
import { qualifiedTable, sqlString } from './model.js';

/**
 * Build the argument list for `JSONB_BUILD_OBJECT`: alternating key literal
 * and column, for every readable field.
 * @param fields - Fields to include
 * @param tableAlias - Alias the columns are qualified with, or empty
 */
export function jsonbBuildObjectContents(
  fields: readonly ModelField[],
  tableAlias: string
): string {
  return fields
    .filter(field => !field.neverRead)
    .flatMap(field => [
      sqlString(field.name),
      tableAlias ? `${tableAlias}.${field.sqlName}` : field.sqlName,
    ])
    .join(', ');
}

/**
 * Correlated subquery that fetches a model's children, either as ids or as
 * JSON objects. Returns null when the policy disables population.
 *
 * @param model - Parent model
 * @param child - Relation being populated
 * @param policy - Population policy for this read path
 * @param orgBinding - Placeholder carrying the organization id
 * @param parentMatch - Expression the child's parent column is compared to
 */
export function childPopulation(
  model: ModelSchema,
  child: ChildRelation,
  policy: PopulationPolicy,
  orgBinding: string,
  parentMatch: string
): string | null {
  if (policy === 'none') {
    return null;
  }

  let output = '(SELECT ';
  let alias: string;

  if (policy === 'id') {
    const target = child.through ?? child;
    const idColumn = child.through ? child.through.toIdField : 'id';
    alias = 'ct';
    output += child.many ? `COALESCE(ARRAY_AGG(ct.${idColumn}), ARRAY[]::uuid[])` : `ct.${idColumn}`;
    output += ` FROM ${qualifiedTable(target)} ct WHERE ct.${child.parentField} = ${parentMatch}`;
  } else {
    const object = `JSONB_BUILD_OBJECT(${jsonbBuildObjectContents(child.fields, 't')})`;
    output += child.many ? `COALESCE(ARRAY_AGG(${object}), ARRAY[]::jsonb[])` : object;

    if (child.through) {
      alias = 'tt';
      output +=
        ` FROM ${qualifiedTable(child.through)} tt` +
        ` JOIN ${qualifiedTable(child)} t ON tt.${child.through.toIdField} = t.id` +
        ` WHERE tt.${child.parentField} = ${parentMatch}`;
    } else {
      alias = 't';
      output += ` FROM ${qualifiedTable(child)} t WHERE t.${child.parentField} = ${parentMatch}`;
    }
  }

  if (!model.global) {
    output += ` AND ${alias}.organization_id = ${orgBinding}`;
  }

  if (!child.many) {
    output += ' LIMIT 1';
  }

  return `${output})`;
}

/**
 * Subquery used by list queries to resolve a reference into a JSON object.
 */
export function referenceListPopulation(reference: ReferencePopulation): string {
  const alias = `ref_${reference.name}`;
  let output =
    `(SELECT JSONB_BUILD_OBJECT(${jsonbBuildObjectContents(reference.fields, alias)})` +
    ` FROM ${qualifiedTable(reference)} ${alias}` +
    ` WHERE tb.${reference.idField} IS NOT NULL AND ${alias}.id = tb.${reference.idField}`;

  if (!reference.global) {
    output += ` AND ${alias}.organization_id = tb.organization_id`;
  }

  return `${output}) AS "${reference.fullName}"`;
}

/**
 * Expression used by select-one queries to resolve a joined reference.
 */
export function referenceGetPopulation(reference: ReferencePopulation): string {
  const alias = `ref_${reference.name}`;
  return (
    `CASE WHEN ${alias}.id IS NOT NULL` +
    ` THEN JSONB_BUILD_OBJECT(${jsonbBuildObjectContents(reference.fields, alias)})` +
    ` ELSE NULL END AS "${reference.fullName}"`
  );
}

/**
 * LEFT JOIN that makes a reference's row available under `ref_<name>`.
 */
export function referenceJoin(reference: ReferencePopulation): string {
  const alias = `ref_${reference.name}`;
  let output = ` LEFT JOIN ${qualifiedTable(reference)} ${alias} ON ${alias}.id = tb.${reference.idField}`;
  if (!reference.global) {
    output += ` AND ${alias}.organization_id = tb.organization_id`;
  }
  return output;
}
