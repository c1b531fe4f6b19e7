import { SQL_OPERATORS, type ComparisonOperator } from '../sql/sql.js';
import {
  toOperand,
  type BinaryExpressionNode,
  type ExpressionNode,
  type InExpressionNode,
  type LogicalExpressionNode,
  type NotExpressionNode,
  type NullExpressionNode,
  type RawExpressionNode
} from './expression.js';
import type { ColumnRef } from './projection.js';

const createBinaryExpression = (
  operator: ComparisonOperator,
  left: ColumnRef,
  right: unknown
): BinaryExpressionNode => ({
  type: 'BinaryExpression',
  left,
  operator,
  right: toOperand(right)
});

/**
 * Creates an equality expression (left = right)
 * @param left - Column reference
 * @param right - Value or column reference to compare with
 */
export const eq = (left: ColumnRef, right: unknown): BinaryExpressionNode =>
  createBinaryExpression(SQL_OPERATORS.EQUALS, left, right);

export const neq = (left: ColumnRef, right: unknown): BinaryExpressionNode =>
  createBinaryExpression(SQL_OPERATORS.NOT_EQUALS, left, right);

export const gt = (left: ColumnRef, right: unknown): BinaryExpressionNode =>
  createBinaryExpression(SQL_OPERATORS.GREATER_THAN, left, right);

export const gte = (left: ColumnRef, right: unknown): BinaryExpressionNode =>
  createBinaryExpression(SQL_OPERATORS.GREATER_OR_EQUAL, left, right);

export const lt = (left: ColumnRef, right: unknown): BinaryExpressionNode =>
  createBinaryExpression(SQL_OPERATORS.LESS_THAN, left, right);

export const lte = (left: ColumnRef, right: unknown): BinaryExpressionNode =>
  createBinaryExpression(SQL_OPERATORS.LESS_OR_EQUAL, left, right);

/**
 * Creates a LIKE pattern matching expression
 */
export const like = (left: ColumnRef, pattern: string): BinaryExpressionNode =>
  createBinaryExpression(SQL_OPERATORS.LIKE, left, pattern);

export const isNull = (left: ColumnRef): NullExpressionNode => ({
  type: 'NullExpression',
  left,
  operator: SQL_OPERATORS.IS_NULL
});

export const isNotNull = (left: ColumnRef): NullExpressionNode => ({
  type: 'NullExpression',
  left,
  operator: SQL_OPERATORS.IS_NOT_NULL
});

/**
 * Creates an IN expression (column IN (values...))
 */
export const inList = (left: ColumnRef, values: unknown[]): InExpressionNode => ({
  type: 'InExpression',
  left,
  right: values.map(toOperand)
});

/**
 * Creates a logical AND expression
 */
export const and = (...operands: ExpressionNode[]): LogicalExpressionNode => ({
  type: 'LogicalExpression',
  operator: 'AND',
  operands
});

/**
 * Creates a logical OR expression
 */
export const or = (...operands: ExpressionNode[]): LogicalExpressionNode => ({
  type: 'LogicalExpression',
  operator: 'OR',
  operands
});

export const not = (operand: ExpressionNode): NotExpressionNode => ({
  type: 'NotExpression',
  operand
});

/**
 * Raw SQL predicate with positional `?` parameters.
 *
 * @example
 * ```typescript
 * sql('lower(b.title) = ?', 'dune')
 * ```
 */
export const sql = (text: string, ...params: unknown[]): RawExpressionNode => ({
  type: 'RawExpression',
  sql: text,
  params
});
