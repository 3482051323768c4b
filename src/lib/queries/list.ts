import { IDS, LIMIT, OFFSET, ORGANIZATION } from '../bindings.js';
import { GeneratorError } from '../errors.js';
import type { ModelSchema } from '../model.js';
import { qualifiedTable } from '../model.js';
import { parseOrderBy } from '../order-by.js';
import { childPopulation, referenceListPopulation } from '../population.js';
import QueryBuilder, { type SqlQueryContext } from '../query-builder.js';
import { selectExpression } from './select.js';

export interface ListOptions {
  populateChildren?: boolean;
  /** Sort such as `-updated_at`; the model's default sort when omitted. */
  orderBy?: string | null;
  /** Restrict the listing to the ids in the `$ids` array binding. */
  filterIds?: boolean;
}

/**
 * List rows visible to the organization with ordering and pagination. The
 * requested sort is validated before any query text is built.
 * @throws {OrderByError} When the sort is not on the model's whitelist
 */
export function list(model: ModelSchema, options: ListOptions = {}): SqlQueryContext | null {
  const { populateChildren = false, orderBy = null, filterIds = false } = options;
  const order = parseOrderBy(model, orderBy);
  if (filterIds && model.join) {
    throw new GeneratorError(`Join model ${model.name} has no id column to filter on`);
  }

  if (populateChildren && model.children.length === 0) {
    return null;
  }

  const q = new QueryBuilder();
  const organization = model.global ? '' : q.createBinding(ORGANIZATION);

  q.push('SELECT ');
  const selectSep = q.separated(', ');
  for (const field of model.fields) {
    if (!field.neverRead && !field.omitInList) {
      selectSep.push(selectExpression(field));
    }
  }

  if (populateChildren) {
    for (const child of model.children) {
      const clause = childPopulation(model, child, child.populateOnList, organization, 'tb.id');
      if (clause) {
        selectSep.push(clause);
        selectSep.pushUnseparated(` AS "${child.listFieldName}"`);
      }
    }

    for (const reference of model.referencePopulations) {
      if (reference.onList) {
        selectSep.push(referenceListPopulation(reference));
      }
    }
  }

  q.push(` FROM ${qualifiedTable(model)} tb`);

  const whereSep = q.separated(' AND ').onFirst(' WHERE ');
  if (!model.global) {
    whereSep.push('tb.organization_id = ');
    whereSep.pushBindingUnseparated(ORGANIZATION);
  }
  if (filterIds) {
    whereSep.push('tb.id = ANY(');
    whereSep.pushBindingUnseparated(IDS);
    whereSep.pushUnseparated(')');
  }

  q.push(` ORDER BY tb.${order.field.sqlName} ${order.direction}`);

  if (!model.pagination.disable) {
    q.push(' LIMIT ');
    q.pushBinding(LIMIT);
    q.push(' OFFSET ');
    q.pushBinding(OFFSET);
  }

  return q.finish(populateChildren ? 'list_populated' : 'list');
}
