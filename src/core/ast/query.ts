import type { AliasScope } from '../../query-builder/alias-scope.js';
import type { OrderDirection } from '../sql/sql.js';
import type { ExpressionNode } from './expression.js';
import type { ColumnRef, Projection } from './projection.js';
import type { RelationNode } from './relation-node.js';

/**
 * AST node representing an ORDER BY term
 */
export interface OrderByNode {
  type: 'OrderBy';
  /** Column to order by */
  column: ColumnRef;
  /** Order direction (ASC or DESC) */
  direction: OrderDirection;
}

/**
 * AST node representing a complete SELECT query over a relation tree
 */
export interface SelectQueryNode {
  type: 'SelectQuery';
  /** Root of the FROM clause (a leaf or a join tree) */
  from: RelationNode;
  /** Correlation names for every node of `from`, fixed for this render pass */
  aliases: AliasScope;
  /** SELECT clause projections */
  projections: Projection[];
  /** Optional WHERE clause */
  where?: ExpressionNode;
  /** Optional ORDER BY clause */
  orderBy?: OrderByNode[];
  /** Optional LIMIT clause */
  limit?: number;
  /** Optional OFFSET clause */
  offset?: number;
}
