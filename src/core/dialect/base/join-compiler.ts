import type { JoinCondition, JoinNode, RelationNode } from '../../ast/relation-node.js';
import { isJoinNode } from '../../ast/relation-node.js';
import type { JoinKind } from '../../sql/sql.js';
import type { AliasScope } from '../../../query-builder/alias-scope.js';

/**
 * Compiler for join trees in FROM clauses.
 * The left side is emitted as is, so left-deep chains read flat
 * (`a LEFT JOIN b ON (...) LEFT JOIN c ON (...)`); a right side that is
 * itself a join is parenthesized.
 */
export class JoinCompiler {
  static compileJoin(
    node: JoinNode,
    aliases: AliasScope,
    keyword: (kind: JoinKind) => string,
    compileFrom: (node: RelationNode, aliases: AliasScope) => string,
    compileCondition: (condition: JoinCondition) => string
  ): string {
    const joinKeyword = keyword(node.joinType);
    const left = compileFrom(node.left, aliases);
    const rightSql = compileFrom(node.right, aliases);
    const right = isJoinNode(node.right) ? `(${rightSql})` : rightSql;
    const condition = compileCondition(node.condition(aliases.resolver));
    return `${left} ${joinKeyword} ${right} ON (${condition})`;
  }
}
