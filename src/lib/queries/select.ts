import { ID, ORGANIZATION } from '../bindings.js';
import { createIdBindings, pushIdWhereClause } from '../ids.js';
import type { ModelField, ModelSchema } from '../model.js';
import { qualifiedTable } from '../model.js';
import { childPopulation, referenceGetPopulation, referenceJoin } from '../population.js';
import QueryBuilder, { type SqlQueryContext } from '../query-builder.js';

/**
 * Column expression for a field read through the `tb` alias.
 */
export function selectExpression(field: ModelField, alias = 'tb'): string {
  const column = `${alias}.${field.sqlName}`;
  return field.name === field.sqlName ? column : `${column} AS "${field.name}"`;
}

/**
 * Fetch one row by id. When `populateChildren` is set, children relations
 * that allow population on get are added as correlated subqueries and
 * references flagged for get are resolved into JSON objects. Asking to
 * populate a model that has no children relations yields no query.
 */
export function selectOne(model: ModelSchema, populateChildren: boolean): SqlQueryContext | null {
  if (populateChildren && model.children.length === 0) {
    return null;
  }

  const q = new QueryBuilder();
  createIdBindings(model, q);
  const organization = model.global ? '' : q.createBinding(ORGANIZATION);

  q.push('SELECT ');
  const selectSep = q.separated(', ');
  for (const field of model.fields) {
    if (!field.neverRead) {
      selectSep.push(selectExpression(field));
    }
  }

  const references = populateChildren
    ? model.referencePopulations.filter(reference => reference.onGet)
    : [];

  if (populateChildren) {
    const id = q.createBinding(ID);
    for (const child of model.children) {
      const clause = childPopulation(model, child, child.populateOnGet, organization, id);
      if (clause) {
        selectSep.push(clause);
        selectSep.pushUnseparated(` AS "${child.getFieldName}"`);
      }
    }

    for (const reference of references) {
      selectSep.push(referenceGetPopulation(reference));
    }
  }

  q.push(` FROM ${qualifiedTable(model)} tb`);
  for (const reference of references) {
    q.push(referenceJoin(reference));
  }

  q.push(' WHERE ');
  pushIdWhereClause(model, q, 'tb');
  if (!model.global) {
    q.push(' AND tb.organization_id = ');
    q.pushBinding(ORGANIZATION);
  }

  return q.finish(populateChildren ? 'select_one_populated' : 'select_one');
}
