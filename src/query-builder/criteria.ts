import type { Association } from '../schema/association.js';
import type { RelationDef } from '../schema/table.js';
import { collectColumnRefs, type ExpressionNode } from '../core/ast/expression.js';
import { and } from '../core/ast/expression-builders.js';
import type { OrderByNode, SelectQueryNode } from '../core/ast/query.js';
import type { ColumnRef, Projection } from '../core/ast/projection.js';
import type { RelationNode } from '../core/ast/relation-node.js';
import type { CompiledQuery, Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import { InvalidQueryError } from '../core/errors.js';
import { ORDER_DIRECTIONS, type JoinKind, type OrderDirection } from '../core/sql/sql.js';
import { AliasScope } from './alias-scope.js';
import type { QueryLogger } from './query-logger.js';
import { collectColumns, detachSharedNodes, walkRelationTree } from './relation-tree.js';

type CriteriaDialectInput = Dialect | DialectKey;

export interface CriteriaOptions {
  /** Called with every statement `compile` produces */
  logger?: QueryLogger;
}

export interface CriteriaState {
  selection?: Projection[];
  where?: ExpressionNode;
  orderBy: OrderByNode[];
  limit?: number;
  offset?: number;
}

/**
 * A SELECT over a relation tree.
 *
 * Every builder method returns a new Criteria; the relation tree itself is
 * shared by reference, so re-aliasing a node is visible to every Criteria
 * rooted on it.
 *
 * @example
 * ```typescript
 * const book = tableNode(Book).as('b');
 * const { sql, params } = new Criteria(book.join(tableNode(Author).as('a')))
 *   .add(eq(book.field('title'), 'Dune'))
 *   .compile('postgres');
 * ```
 */
export class Criteria<R extends RelationDef = RelationDef> {
  private readonly state: CriteriaState;

  constructor(
    private readonly root: RelationNode<R>,
    private readonly options: CriteriaOptions = {},
    state: CriteriaState = { orderBy: [] }
  ) {
    detachSharedNodes(root);
    this.state = state;
  }

  private clone(root: RelationNode<R>, state: Partial<CriteriaState>): Criteria<R> {
    return new Criteria(root, this.options, { ...this.state, ...state });
  }

  get relation(): R {
    return this.root.relation;
  }

  /**
   * Root of the FROM clause.
   */
  get tree(): RelationNode<R> {
    return this.root;
  }

  /**
   * Joins `node` to the current tree; the tree becomes the left side.
   */
  join<J extends RelationDef>(node: RelationNode<J>, joinType?: JoinKind): Criteria<R>;
  join<J extends RelationDef>(node: RelationNode<J>, on: string | Association, joinType?: JoinKind): Criteria<R>;
  join<J extends RelationDef>(
    node: RelationNode<J>,
    onOrType?: string | Association | JoinKind,
    joinType?: JoinKind
  ): Criteria<R> {
    let joined: RelationNode<R>;
    if (onOrType === undefined) {
      joined = this.root.join(node);
    } else if (typeof onOrType === 'string') {
      joined = this.root.join(node, onOrType, joinType);
    } else {
      joined = this.root.join(node, onOrType, joinType);
    }
    return this.clone(joined, {});
  }

  /**
   * Replaces the SELECT list. Without a call, the tree's own projections are used.
   */
  select(...projections: Projection[]): Criteria<R> {
    return this.clone(this.root, { selection: projections });
  }

  /**
   * Adds restrictions, AND-ed with the ones already present.
   */
  add(...restrictions: ExpressionNode[]): Criteria<R> {
    const all = this.state.where ? [this.state.where, ...restrictions] : restrictions;
    if (all.length === 0) return this;
    return this.clone(this.root, { where: all.length === 1 ? all[0] : and(...all) });
  }

  orderBy(column: ColumnRef, direction: OrderDirection = ORDER_DIRECTIONS.ASC): Criteria<R> {
    return this.clone(this.root, {
      orderBy: [...this.state.orderBy, { type: 'OrderBy', column, direction }]
    });
  }

  limit(n: number): Criteria<R> {
    assertNonNegativeInteger('limit', n);
    return this.clone(this.root, { limit: n });
  }

  offset(n: number): Criteria<R> {
    assertNonNegativeInteger('offset', n);
    return this.clone(this.root, { offset: n });
  }

  projections(): Projection[] {
    return this.state.selection ? [...this.state.selection] : this.root.projections();
  }

  /**
   * Every column of every node, as references usable in restrictions.
   */
  columns(): ColumnRef[] {
    return collectColumns(this.root);
  }

  /**
   * Every node of the tree in pre-order, joins included.
   */
  relationNodes(): RelationNode[] {
    const nodes: RelationNode[] = [];
    walkRelationTree(this.root, node => nodes.push(node));
    return nodes;
  }

  toAst(): SelectQueryNode {
    const aliases = AliasScope.forTree(this.root);
    const members = new Set(this.relationNodes());
    for (const ref of this.referencedNodes()) {
      if (!members.has(ref)) {
        throw new InvalidQueryError(`Node ${ref.toString()} is not part of this criteria`, {
          relation: ref.relationName
        });
      }
    }
    return {
      type: 'SelectQuery',
      from: this.root,
      aliases,
      projections: this.projections(),
      where: this.state.where,
      orderBy: this.state.orderBy.length ? [...this.state.orderBy] : undefined,
      limit: this.state.limit,
      offset: this.state.offset
    };
  }

  /**
   * Compiles the query for a dialect and reports it to the configured logger.
   */
  compile(dialect: CriteriaDialectInput): CompiledQuery {
    const compiled = resolveDialectInput(dialect).compileSelect(this.toAst());
    this.options.logger?.({ sql: compiled.sql, params: compiled.params, relation: this.root.relationName });
    return compiled;
  }

  toSql(dialect: CriteriaDialectInput): string {
    return this.compile(dialect).sql;
  }

  private referencedNodes(): RelationNode[] {
    return [
      ...this.projections().map(p => p.node),
      ...(this.state.where ? collectColumnRefs(this.state.where).map(ref => ref.node) : []),
      ...this.state.orderBy.map(o => o.column.node)
    ];
  }
}

const assertNonNegativeInteger = (name: string, n: number): void => {
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidQueryError(`${name} must be a non-negative integer, got ${n}`, { [name]: n });
  }
};

/**
 * Shorthand for `new Criteria(root, options)`.
 */
export const criteria = <R extends RelationDef>(root: RelationNode<R>, options?: CriteriaOptions): Criteria<R> =>
  new Criteria(root, options);
