import type { AliasResolver } from '../core/ast/projection.js';
import { DEFAULT_ALIAS, isJoinNode, type RelationNode } from '../core/ast/relation-node.js';
import { InvalidQueryError } from '../core/errors.js';
import { collectLeaves } from './relation-tree.js';
import { shortName } from '../schema/table.js';
import { makeUniqueAlias } from './table-alias-utils.js';

/**
 * Correlation names for one render pass.
 *
 * Explicit aliases are kept as they are. Nodes still carrying the `'this'`
 * sentinel get a name derived from their relation, suffixed with a counter
 * when it is already taken (`book`, `book_2`, ...). The counter lives in the
 * scope, so two queries compiled side by side never share it.
 */
export class AliasScope {
  private readonly used = new Set<string>();
  private readonly assigned = new Map<RelationNode, string>();
  private readonly members = new Set<RelationNode>();

  /**
   * Builds the scope of a tree: reserves explicit aliases, then names the
   * remaining leaves in FROM order.
   * @throws InvalidQueryError when two leaves carry the same explicit alias,
   * or when one leaf object sits at more than one position
   */
  static forTree(root: RelationNode): AliasScope {
    const scope = new AliasScope();
    const leaves = collectLeaves(root);
    for (const leaf of leaves) {
      if (scope.members.has(leaf)) {
        throw new InvalidQueryError(
          `Node ${leaf.relationName} occurs more than once in the tree; clone it for each position`,
          { relation: leaf.relationName }
        );
      }
      scope.members.add(leaf);
      if (leaf.alias === DEFAULT_ALIAS) continue;
      if (scope.used.has(leaf.alias)) {
        throw new InvalidQueryError(`Alias '${leaf.alias}' is used by more than one relation node`, {
          alias: leaf.alias
        });
      }
      scope.used.add(leaf.alias);
    }
    for (const leaf of leaves) scope.resolve(leaf);
    return scope;
  }

  /**
   * Correlation name of `node`; joins resolve to their left child.
   * @throws InvalidQueryError for an unaliased node that is not part of the tree
   */
  resolve(node: RelationNode): string {
    if (isJoinNode(node)) return this.resolve(node.left);
    if (node.alias !== DEFAULT_ALIAS) return node.alias;

    const existing = this.assigned.get(node);
    if (existing) return existing;
    if (!this.members.has(node)) {
      throw new InvalidQueryError(`Node ${node.relationName} is not part of the rendered tree`, {
        relation: node.relationName
      });
    }

    const alias = makeUniqueAlias(shortName(node.relation), this.used);
    this.used.add(alias);
    this.assigned.set(node, alias);
    return alias;
  }

  /**
   * `resolve` bound to this scope, for APIs taking an AliasResolver.
   */
  readonly resolver: AliasResolver = node => this.resolve(node);

  /**
   * Snapshot of every name handed out or reserved so far.
   */
  names(): string[] {
    return [...this.used];
  }
}
