import type { OrderByNode, SelectQueryNode } from '../../ast/query.js';

type TermRenderer = (column: OrderByNode['column']) => string;

/**
 * Compiler for ORDER BY clauses in SELECT statements.
 */
export class OrderByCompiler {
  /**
   * @returns SQL ORDER BY clause (e.g., " ORDER BY "b"."title" ASC") or empty string if no ordering.
   */
  static compileOrderBy(ast: SelectQueryNode, renderTerm: TermRenderer): string {
    if (!ast.orderBy || ast.orderBy.length === 0) return '';
    const parts = ast.orderBy.map(o => `${renderTerm(o.column)} ${o.direction}`).join(', ');
    return ` ORDER BY ${parts}`;
  }
}
