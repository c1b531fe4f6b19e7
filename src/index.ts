/**
 * relnode core exports.
 * Schema descriptors, relation nodes and joins, dialects, and Criteria.
 */
export * from './schema/table.js';
export * from './schema/column-types.js';
export * from './schema/association.js';
export * from './schema/registry.js';
export * from './core/errors.js';
export * from './core/sql/sql.js';
export * from './core/ast/projection.js';
export * from './core/ast/relation-node.js';
export * from './core/ast/expression.js';
export * from './core/ast/expression-builders.js';
export * from './core/ast/query.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/mysql/index.js';
export * from './core/dialect/mssql/index.js';
export * from './core/dialect/sqlite/index.js';
export * from './core/dialect/postgres/index.js';
export * from './query-builder/alias-scope.js';
export * from './query-builder/relation-tree.js';
export * from './query-builder/table-alias-utils.js';
export * from './query-builder/criteria.js';
export * from './query-builder/query-logger.js';
