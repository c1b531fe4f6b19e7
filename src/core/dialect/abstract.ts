import type {
  BinaryExpressionNode,
  ExpressionNode,
  InExpressionNode,
  LiteralNode,
  LogicalExpressionNode,
  NotExpressionNode,
  NullExpressionNode,
  OperandNode,
  RawExpressionNode
} from '../ast/expression.js';
import type { ColumnRef } from '../ast/projection.js';
import type { SelectQueryNode } from '../ast/query.js';
import {
  isJoinNode,
  TableNode,
  ViewNode,
  type JoinCondition,
  type JoinNode,
  type RelationNode
} from '../ast/relation-node.js';
import { DialectError, UnsupportedJoinError } from '../errors.js';
import type { DialectName, JoinKind } from '../sql/sql.js';
import { AliasScope } from '../../query-builder/alias-scope.js';
import type { TableDef, ViewDef } from '../../schema/table.js';
import { JoinCompiler } from './base/join-compiler.js';

/**
 * Context for SQL compilation with parameter management
 */
export interface CompilerContext {
  /** Array of parameters */
  params: unknown[];
  /** Correlation names of the tree being rendered */
  aliases: AliasScope;
  /** Function to add a parameter and get its placeholder */
  addParameter(value: unknown): string;
}

/**
 * Result of SQL compilation
 */
export interface CompiledQuery {
  /** Generated SQL string */
  sql: string;
  /** Parameters for the query */
  params: unknown[];
}

export interface SelectCompiler {
  compileSelect(ast: SelectQueryNode): CompiledQuery;
}

/**
 * Abstract base class for SQL dialect implementations.
 *
 * A dialect owns every piece of text the library produces: identifier
 * quoting, FROM fragments for leaves, join clauses and their keywords,
 * predicates and placeholders.
 */
export abstract class Dialect implements SelectCompiler {
  /** Dialect identifier */
  protected abstract readonly dialect: DialectName;

  private readonly expressionCompilers: Map<string, (node: ExpressionNode, ctx: CompilerContext) => string>;

  protected constructor() {
    this.expressionCompilers = new Map();
    this.registerDefaultExpressionCompilers();
  }

  get name(): DialectName {
    return this.dialect;
  }

  /**
   * Compiles a SELECT query AST to SQL
   * @param ast - Query AST to compile
   * @returns Compiled query with SQL and parameters
   */
  compileSelect(ast: SelectQueryNode): CompiledQuery {
    const ctx = this.createCompilerContext(ast.aliases);
    const rawSql = this.compileSelectAst(ast, ctx).trim();
    const sql = rawSql.endsWith(';') ? rawSql : `${rawSql};`;
    return {
      sql,
      params: [...ctx.params]
    };
  }

  protected abstract compileSelectAst(ast: SelectQueryNode, ctx: CompilerContext): string;

  /**
   * Quotes an SQL identifier (to be implemented by concrete dialects)
   */
  abstract quoteIdentifier(id: string): string;

  /**
   * Whether this dialect can render the given join kind.
   */
  supportsJoinKind(_kind: JoinKind): boolean {
    return true;
  }

  /**
   * SQL keyword introducing a join of the given kind (e.g. `LEFT JOIN`).
   * @throws UnsupportedJoinError when the dialect has no such join
   */
  joinKeyword(kind: JoinKind): string {
    if (!this.supportsJoinKind(kind)) {
      throw new UnsupportedJoinError(this.dialect, kind);
    }
    return `${kind} JOIN`;
  }

  /**
   * Quoted, schema-qualified name of a relation.
   */
  compileRelationName(relation: { name: string; schema?: string }): string {
    if (relation.schema) {
      return `${this.quoteIdentifier(relation.schema)}.${this.quoteIdentifier(relation.name)}`;
    }
    return this.quoteIdentifier(relation.name);
  }

  /**
   * FROM-clause fragment for a table leaf (e.g. `"public"."book" AS "b"`).
   */
  tableAlias(table: TableDef, alias: string): string {
    return `${this.compileRelationName(table)} AS ${this.quoteIdentifier(alias)}`;
  }

  /**
   * FROM-clause fragment for a view leaf.
   */
  viewAlias(view: ViewDef, alias: string): string {
    return `${this.compileRelationName(view)} AS ${this.quoteIdentifier(alias)}`;
  }

  /**
   * FROM-clause fragment for any node. Without a scope, one is built for
   * `node` alone.
   */
  compileFrom(node: RelationNode, aliases: AliasScope = AliasScope.forTree(node)): string {
    if (isJoinNode(node)) return this.join(node, aliases);
    if (node instanceof TableNode) return this.tableAlias(node.table, aliases.resolve(node));
    if (node instanceof ViewNode) return this.viewAlias(node.view, aliases.resolve(node));
    throw new DialectError(`Cannot render node of type ${node.type}`, { type: node.type });
  }

  /**
   * Full join fragment: both sides, the join keyword and the ON condition.
   */
  join(node: JoinNode, aliases: AliasScope = AliasScope.forTree(node)): string {
    return JoinCompiler.compileJoin(
      node,
      aliases,
      kind => this.joinKeyword(kind),
      (child, scope) => this.compileFrom(child, scope),
      condition => this.compileJoinCondition(condition)
    );
  }

  /**
   * Association conditions get quoted identifiers; explicit conditions are
   * emitted verbatim.
   */
  protected compileJoinCondition(condition: JoinCondition): string {
    if (condition.type === 'Raw') return condition.sql;
    const left = `${this.quoteIdentifier(condition.left.table)}.${this.quoteIdentifier(condition.left.column)}`;
    const right = `${this.quoteIdentifier(condition.right.table)}.${this.quoteIdentifier(condition.right.column)}`;
    return `${left} = ${right}`;
  }

  /**
   * Creates a new compiler context
   * @returns Compiler context with parameter management
   */
  protected createCompilerContext(aliases: AliasScope): CompilerContext {
    const params: unknown[] = [];
    let counter = 0;
    return {
      params,
      aliases,
      addParameter: (value: unknown) => {
        counter += 1;
        params.push(value);
        return this.formatPlaceholder(counter);
      }
    };
  }

  /**
   * Formats a parameter placeholder
   * @param index - Parameter index (1-based)
   */
  protected formatPlaceholder(_index: number): string {
    return '?';
  }

  /**
   * Registers an expression compiler for a specific node type
   */
  protected registerExpressionCompiler<T extends ExpressionNode>(
    type: T['type'],
    compiler: (node: T, ctx: CompilerContext) => string
  ): void {
    this.expressionCompilers.set(type, compiler as (node: ExpressionNode, ctx: CompilerContext) => string);
  }

  /**
   * Compiles an expression node
   */
  protected compileExpression(node: ExpressionNode, ctx: CompilerContext): string {
    const compiler = this.expressionCompilers.get(node.type);
    if (!compiler) {
      throw new DialectError(`Unsupported expression node type "${node.type}" for ${this.constructor.name}`, {
        type: node.type
      });
    }
    return compiler(node, ctx);
  }

  protected compileColumn(column: ColumnRef, ctx: CompilerContext): string {
    return `${this.quoteIdentifier(ctx.aliases.resolve(column.node))}.${this.quoteIdentifier(column.column.name)}`;
  }

  protected compileOperand(node: OperandNode, ctx: CompilerContext): string {
    if (node.type === 'ColumnRef') return this.compileColumn(node, ctx);
    return this.compileLiteral(node, ctx);
  }

  protected compileLiteral(literal: LiteralNode, ctx: CompilerContext): string {
    return ctx.addParameter(literal.value);
  }

  private registerDefaultExpressionCompilers(): void {
    this.registerExpressionCompiler('BinaryExpression', (binary: BinaryExpressionNode, ctx) => {
      const left = this.compileOperand(binary.left, ctx);
      const right = this.compileOperand(binary.right, ctx);
      return `${left} ${binary.operator} ${right}`;
    });

    this.registerExpressionCompiler('LogicalExpression', (logical: LogicalExpressionNode, ctx) => {
      if (logical.operands.length === 0) return '';
      const parts = logical.operands.map(op => {
        const compiled = this.compileExpression(op, ctx);
        return op.type === 'LogicalExpression' ? `(${compiled})` : compiled;
      });
      return parts.join(` ${logical.operator} `);
    });

    this.registerExpressionCompiler('NullExpression', (nullExpr: NullExpressionNode, ctx) => {
      const left = this.compileOperand(nullExpr.left, ctx);
      return `${left} ${nullExpr.operator}`;
    });

    this.registerExpressionCompiler('InExpression', (inExpr: InExpressionNode, ctx) => {
      const left = this.compileOperand(inExpr.left, ctx);
      if (inExpr.right.length === 0) return '1 = 0';
      const values = inExpr.right.map(v => this.compileOperand(v, ctx)).join(', ');
      return `${left} IN (${values})`;
    });

    this.registerExpressionCompiler('NotExpression', (notExpr: NotExpressionNode, ctx) =>
      `NOT (${this.compileExpression(notExpr.operand, ctx)})`
    );

    this.registerExpressionCompiler('RawExpression', (raw: RawExpressionNode, ctx) => {
      const pieces = raw.sql.split('?');
      if (pieces.length - 1 !== raw.params.length) {
        throw new DialectError(
          `Raw expression has ${pieces.length - 1} placeholder(s) but ${raw.params.length} parameter(s)`,
          { sql: raw.sql }
        );
      }
      return pieces.reduce((acc, piece, i) => `${acc}${ctx.addParameter(raw.params[i - 1])}${piece}`);
    });
  }
}
