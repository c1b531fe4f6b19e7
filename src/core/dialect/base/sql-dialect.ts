import { Dialect, type CompilerContext } from '../abstract.js';
import type { SelectQueryNode } from '../../ast/query.js';
import type { ExpressionNode } from '../../ast/expression.js';
import { toSelectItems } from '../../ast/projection.js';
import { DialectError } from '../../errors.js';
import { OrderByCompiler } from './orderby-compiler.js';
import { StandardLimitOffsetPagination, type PaginationStrategy } from './pagination-strategy.js';

/**
 * Shared SQL compiler for the built-in dialects.
 * Concrete dialects override only the minimal hooks (identifier quoting,
 * placeholders, supported join kinds, pagination) instead of
 * re-implementing the compile pipeline.
 */
export abstract class SqlDialectBase extends Dialect {
  protected constructor(protected readonly pagination: PaginationStrategy = new StandardLimitOffsetPagination()) {
    super();
  }

  /**
   * Compiles SELECT query AST to SQL using common rules.
   */
  protected compileSelectAst(ast: SelectQueryNode, ctx: CompilerContext): string {
    const columns = this.compileSelectColumns(ast, ctx);
    const from = this.compileFrom(ast.from, ctx.aliases);
    const whereClause = this.compileWhere(ast.where, ctx);
    const orderBy = this.compileOrderBy(ast, ctx);
    const pagination = this.pagination.compilePagination(ast.limit, ast.offset, orderBy);
    return `SELECT ${columns} FROM ${from}${whereClause}${orderBy}${pagination}`;
  }

  protected compileSelectColumns(ast: SelectQueryNode, ctx: CompilerContext): string {
    const items = ast.projections.flatMap(p => toSelectItems(p, ctx.aliases.resolver));
    if (items.length === 0) {
      throw new DialectError('Cannot compile a SELECT without projections', {});
    }
    return items
      .map(item =>
        `${this.quoteIdentifier(item.table)}.${this.quoteIdentifier(item.column)} AS ${this.quoteIdentifier(item.alias)}`
      )
      .join(', ');
  }

  protected compileWhere(where: ExpressionNode | undefined, ctx: CompilerContext): string {
    if (!where) return '';
    const compiled = this.compileExpression(where, ctx);
    return compiled ? ` WHERE ${compiled}` : '';
  }

  protected compileOrderBy(ast: SelectQueryNode, ctx: CompilerContext): string {
    return OrderByCompiler.compileOrderBy(ast, column => this.compileColumn(column, ctx));
  }
}
