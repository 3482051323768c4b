export { deleteAllChildren, deleteChildrenQueries, deleteOne, deleteRemovedChildren, deleteWithParent } from './delete.js';
export { insert } from './insert.js';
export { type ListOptions, list } from './list.js';
export { lookupObjectPermissions } from './lookup-object-permissions.js';
export { selectExpression, selectOne } from './select.js';
export { update, updateOneWithParent } from './update.js';
export { upsertChildren, upsertQueries, upsertSingleChild } from './upsert.js';
