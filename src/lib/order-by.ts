import { OrderByError } from './errors.js';
import type { ModelField, ModelSchema } from './model.js';

export type SortDirection = 'ASC' | 'DESC';

export interface OrderBy {
  field: ModelField;
  direction: SortDirection;
}

/**
 * Fields of the model that may appear in `ORDER BY`.
 */
export function sortableFields(model: ModelSchema): ModelField[] {
  return model.fields.filter(field => field.sortable !== 'none' && !field.neverRead);
}

/**
 * Parse a sort request such as `-updated_at` (descending) or `name`
 * (ascending) against the model's whitelist of sortable fields.
 * @param model - Model being listed
 * @param value - Requested sort; defaults to the model's default sort
 * @returns {OrderBy} The resolved field and direction
 * @throws {OrderByError} When the field is not sortable or the direction is not allowed
 */
export function parseOrderBy(model: ModelSchema, value?: string | null): OrderBy {
  const requested = value && value.length > 0 ? value : model.defaultSort;
  const descending = requested.startsWith('-');
  const name = descending ? requested.slice(1) : requested;

  const field = sortableFields(model).find(
    candidate => candidate.name === name || candidate.sqlName === name
  );
  if (!field) {
    throw new OrderByError('invalid_field', name);
  }

  if (
    (descending && field.sortable === 'ascending_only') ||
    (!descending && field.sortable === 'descending_only')
  ) {
    throw new OrderByError('invalid_direction', name);
  }

  return { field, direction: descending ? 'DESC' : 'ASC' };
}
