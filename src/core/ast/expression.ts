import type { ComparisonOperator } from '../sql/sql.js';
import type { ColumnRef } from './projection.js';

/**
 * AST node representing a bound literal value
 */
export interface LiteralNode {
  type: 'Literal';
  /** Value sent as a query parameter */
  value: unknown;
}

/**
 * Union type representing any operand that can be used in expressions
 */
export type OperandNode = ColumnRef | LiteralNode;

/**
 * AST node representing a binary comparison (e.g., column = value)
 */
export interface BinaryExpressionNode {
  type: 'BinaryExpression';
  left: ColumnRef;
  operator: ComparisonOperator;
  right: OperandNode;
}

/**
 * AST node representing a null check
 */
export interface NullExpressionNode {
  type: 'NullExpression';
  left: ColumnRef;
  operator: 'IS NULL' | 'IS NOT NULL';
}

/**
 * AST node representing an IN list
 */
export interface InExpressionNode {
  type: 'InExpression';
  left: ColumnRef;
  right: OperandNode[];
}

/**
 * AST node combining expressions with AND/OR
 */
export interface LogicalExpressionNode {
  type: 'LogicalExpression';
  operator: 'AND' | 'OR';
  operands: ExpressionNode[];
}

export interface NotExpressionNode {
  type: 'NotExpression';
  operand: ExpressionNode;
}

/**
 * Raw SQL fragment. Each `?` in `sql` is bound to the next entry of `params`.
 */
export interface RawExpressionNode {
  type: 'RawExpression';
  sql: string;
  params: unknown[];
}

/**
 * Union type representing any supported boolean expression
 */
export type ExpressionNode =
  | BinaryExpressionNode
  | NullExpressionNode
  | InExpressionNode
  | LogicalExpressionNode
  | NotExpressionNode
  | RawExpressionNode;

export const isColumnRef = (value: unknown): value is ColumnRef =>
  typeof value === 'object' && value !== null && 'type' in value && value.type === 'ColumnRef';

/**
 * Wraps a value as an operand: column references pass through, anything else becomes a literal.
 */
export const toOperand = (value: unknown): OperandNode =>
  isColumnRef(value) ? value : { type: 'Literal', value };

/**
 * Column references an expression reads, in the order they appear.
 */
export const collectColumnRefs = (node: ExpressionNode): ColumnRef[] => {
  switch (node.type) {
    case 'BinaryExpression':
      return isColumnRef(node.right) ? [node.left, node.right] : [node.left];
    case 'NullExpression':
      return [node.left];
    case 'InExpression':
      return [node.left, ...node.right.filter(isColumnRef)];
    case 'LogicalExpression':
      return node.operands.flatMap(collectColumnRefs);
    case 'NotExpression':
      return collectColumnRefs(node.operand);
    case 'RawExpression':
      return [];
  }
};
