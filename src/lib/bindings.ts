/**
 * Canonical binding names shared by every generated query. Field values are
 * bound under the field's logical name.
 *
 * `id` and `organization_id` are standard fields and carry the value of that
 * field. Every other canonical name starts with `$`, which no field name can,
 * so a field value never shares a placeholder with one of them.
 */
export const ACTOR_IDS = '$actor_ids';
export const ID = 'id';
export const JOIN_ID_0 = '$join_id_0';
export const JOIN_ID_1 = '$join_id_1';
export const IDS = '$ids';
export const PARENT_ID = '$parent_id';
export const ORGANIZATION = 'organization_id';
export const LIMIT = '$limit';
export const OFFSET = '$offset';

/** Bindings whose values must be UUIDs. */
export const ID_BINDINGS: ReadonlySet<string> = new Set([
  ID,
  JOIN_ID_0,
  JOIN_ID_1,
  PARENT_ID,
  ORGANIZATION,
]);

/** Bindings whose values must be arrays of UUIDs. */
export const ID_ARRAY_BINDINGS: ReadonlySet<string> = new Set([ACTOR_IDS, IDS]);

const bindings = {
  ACTOR_IDS,
  ID,
  JOIN_ID_0,
  JOIN_ID_1,
  IDS,
  PARENT_ID,
  ORGANIZATION,
  LIMIT,
  OFFSET,
} as const;

export default bindings;
