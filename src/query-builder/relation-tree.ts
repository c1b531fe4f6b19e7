import type { ColumnRef } from '../core/ast/projection.js';
import { isJoinNode, isLeafNode, type LeafNode, type RelationNode } from '../core/ast/relation-node.js';
import { listColumns } from '../schema/table.js';

/**
 * Visits every node of a tree in pre-order (join, left subtree, right subtree).
 */
export const walkRelationTree = (root: RelationNode, visit: (node: RelationNode, depth: number) => void): void => {
  const step = (node: RelationNode, depth: number): void => {
    visit(node, depth);
    if (isJoinNode(node)) {
      step(node.left, depth + 1);
      step(node.right, depth + 1);
    }
  };
  step(root, 0);
};

/**
 * Leaves of a tree in FROM-clause order.
 */
export const collectLeaves = (root: RelationNode): LeafNode[] => {
  const leaves: LeafNode[] = [];
  walkRelationTree(root, node => {
    if (isLeafNode(node)) leaves.push(node);
  });
  return leaves;
};

/**
 * Every column of every leaf, as references usable in restrictions.
 */
export const collectColumns = (root: RelationNode): ColumnRef[] =>
  collectLeaves(root).flatMap(node =>
    listColumns(node.relation).map((column): ColumnRef => ({ type: 'ColumnRef', node, column }))
  );

export const findNodeByAlias = (root: RelationNode, alias: string): LeafNode | undefined =>
  collectLeaves(root).find(node => node.alias === alias);

/**
 * Alias-fixup pass: when one node object sits at more than one position of
 * the tree, every position after the first gets its own clone, so that
 * re-aliasing one occurrence cannot change another. Rewrites in place.
 */
export const detachSharedNodes = <N extends RelationNode>(root: N): N => {
  const seen = new Set<RelationNode>();
  const visit = (node: RelationNode): void => {
    seen.add(node);
    if (!isJoinNode(node)) return;
    if (seen.has(node.left)) node.replaceLeft(node.left.clone());
    visit(node.left);
    if (seen.has(node.right)) node.replaceRight(node.right.clone());
    visit(node.right);
  };
  visit(root);
  return root;
};
