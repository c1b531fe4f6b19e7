import {
  connects,
  describeAssociation,
  findAssociations,
  getAssociations,
  type Association
} from '../../schema/association.js';
import type { ColumnDef } from '../../schema/column-types.js';
import {
  getColumn,
  getPrimaryKeyColumn,
  qualifiedName,
  sameRelation,
  shortName,
  type RelationDef,
  type TableDef,
  type ViewDef
} from '../../schema/table.js';
import {
  InvalidAssociationError,
  MultipleAssociationsFoundError,
  NoAssociationError
} from '../errors.js';
import { DEFAULT_JOIN_KIND, isJoinKind, JOIN_KINDS, type JoinKind } from '../sql/sql.js';
import type {
  AliasResolver,
  ColumnProjection,
  ColumnRef,
  Projection,
  RecordProjection
} from './projection.js';

/**
 * Alias every node starts with. The render pass replaces it with a
 * query-unique correlation name, so the same relation can appear twice.
 */
export const DEFAULT_ALIAS = 'this';

/**
 * Structured join condition handed to dialects.
 */
export type JoinCondition =
  | {
      type: 'ColumnEquality';
      left: { table: string; column: string };
      right: { table: string; column: string };
    }
  | { type: 'Raw'; sql: string };

export type RelationNodeType = 'Table' | 'View' | 'Join';

/**
 * Correlation name used when no render pass is involved: the node's alias,
 * or the relation's short name while the alias is still the sentinel.
 */
export const defaultAliasResolver: AliasResolver = node =>
  node.alias === DEFAULT_ALIAS ? shortName(node.relation) : node.alias;

/**
 * A relation (or a join sub-tree) tagged with a query-scoped alias, usable
 * in a FROM clause.
 *
 * Equality is defined over the underlying relation only: two nodes wrapping
 * the same relation are equal whatever their aliases.
 */
export abstract class RelationNode<R extends RelationDef = RelationDef> {
  abstract readonly type: RelationNodeType;

  protected currentAlias: string = DEFAULT_ALIAS;

  /**
   * Alias used in SQL statements. `'this'` means "not chosen yet".
   */
  get alias(): string {
    return this.currentAlias;
  }

  /**
   * Reassigns the alias of this node in place.
   */
  as(alias: string): this {
    this.currentAlias = alias;
    return this;
  }

  /**
   * Innermost relation this node stands for.
   */
  abstract get relation(): R;

  get relationName(): string {
    return qualifiedName(this.relation);
  }

  get columns(): R['columns'] {
    return this.relation.columns;
  }

  get primaryKey(): ColumnDef | undefined {
    return getPrimaryKeyColumn(this.relation);
  }

  get associations(): readonly Association[] {
    return getAssociations(this.relation);
  }

  /**
   * Projections this node contributes to a SELECT list, in order.
   */
  abstract projections(): Projection[];

  /**
   * Record projection covering every column of this node.
   */
  all(): RecordProjection {
    return { type: 'RecordProjection', node: this };
  }

  projection<K extends keyof R['columns'] & string>(columnName: K, alias?: string): ColumnProjection {
    return { type: 'ColumnProjection', node: this, column: getColumn(this.relation, columnName), alias };
  }

  field<K extends keyof R['columns'] & string>(columnName: K): ColumnRef {
    return { type: 'ColumnRef', node: this, column: getColumn(this.relation, columnName) };
  }

  /**
   * Association declared by this node's relation towards `target`'s relation
   * (this node is the child).
   * @throws MultipleAssociationsFoundError when more than one foreign key qualifies
   */
  getParentAssociation(target: RelationNode | RelationDef): Association | undefined {
    return single(findAssociations(this.relation, unwrapRelation(target)));
  }

  /**
   * Association declared by `target`'s relation towards this node's relation
   * (this node is the parent).
   * @throws MultipleAssociationsFoundError when more than one foreign key qualifies
   */
  getChildAssociation(target: RelationNode | RelationDef): Association | undefined {
    return single(findAssociations(unwrapRelation(target), this.relation));
  }

  equals(other: RelationNode | RelationDef): boolean {
    return sameRelation(this.relation, unwrapRelation(other));
  }

  hashKey(): string {
    return this.relationName;
  }

  /**
   * Copy of this node. Leaves are copied shallowly (the relation is shared);
   * joins are copied deeply.
   */
  abstract clone(): RelationNode<R>;

  /* JOINS */

  /**
   * Joins `node` to this one. Without a condition the association is
   * inferred: a foreign key on this relation first, then one on `node`'s.
   * Defaults to a LEFT join.
   */
  join<J extends RelationDef>(node: RelationNode<J>, joinType?: JoinKind): JoinNode<R, J>;
  join<J extends RelationDef>(node: RelationNode<J>, on: string, joinType?: JoinKind): ExplicitJoin<R, J>;
  join<J extends RelationDef>(
    node: RelationNode<J>,
    association: Association,
    joinType?: JoinKind
  ): ChildToParentJoin<R, J> | ParentToChildJoin<R, J>;
  join<J extends RelationDef>(
    node: RelationNode<J>,
    onOrType?: string | Association,
    joinType?: JoinKind
  ): JoinNode<R, J> {
    if (onOrType === undefined || (joinType === undefined && isJoinKind(onOrType))) {
      return this.buildJoin(node, onOrType ?? DEFAULT_JOIN_KIND);
    }
    return this.buildJoin(node, joinType ?? DEFAULT_JOIN_KIND, onOrType);
  }

  leftJoin<J extends RelationDef>(node: RelationNode<J>): JoinNode<R, J>;
  leftJoin<J extends RelationDef>(node: RelationNode<J>, on: string): ExplicitJoin<R, J>;
  leftJoin<J extends RelationDef>(node: RelationNode<J>, association: Association): ChildToParentJoin<R, J> | ParentToChildJoin<R, J>;
  leftJoin<J extends RelationDef>(node: RelationNode<J>, on?: string | Association): JoinNode<R, J> {
    return this.buildJoin(node, JOIN_KINDS.LEFT, on);
  }

  rightJoin<J extends RelationDef>(node: RelationNode<J>): JoinNode<R, J>;
  rightJoin<J extends RelationDef>(node: RelationNode<J>, on: string): ExplicitJoin<R, J>;
  rightJoin<J extends RelationDef>(node: RelationNode<J>, association: Association): ChildToParentJoin<R, J> | ParentToChildJoin<R, J>;
  rightJoin<J extends RelationDef>(node: RelationNode<J>, on?: string | Association): JoinNode<R, J> {
    return this.buildJoin(node, JOIN_KINDS.RIGHT, on);
  }

  innerJoin<J extends RelationDef>(node: RelationNode<J>): JoinNode<R, J>;
  innerJoin<J extends RelationDef>(node: RelationNode<J>, on: string): ExplicitJoin<R, J>;
  innerJoin<J extends RelationDef>(node: RelationNode<J>, association: Association): ChildToParentJoin<R, J> | ParentToChildJoin<R, J>;
  innerJoin<J extends RelationDef>(node: RelationNode<J>, on?: string | Association): JoinNode<R, J> {
    return this.buildJoin(node, JOIN_KINDS.INNER, on);
  }

  fullJoin<J extends RelationDef>(node: RelationNode<J>): JoinNode<R, J>;
  fullJoin<J extends RelationDef>(node: RelationNode<J>, on: string): ExplicitJoin<R, J>;
  fullJoin<J extends RelationDef>(node: RelationNode<J>, association: Association): ChildToParentJoin<R, J> | ParentToChildJoin<R, J>;
  fullJoin<J extends RelationDef>(node: RelationNode<J>, on?: string | Association): JoinNode<R, J> {
    return this.buildJoin(node, JOIN_KINDS.FULL, on);
  }

  private buildJoin<J extends RelationDef>(
    node: RelationNode<J>,
    joinType: JoinKind,
    on?: string | Association
  ): JoinNode<R, J> {
    if (on === undefined) return this.inferJoin(node, joinType);
    if (typeof on === 'string') return new ExplicitJoin<R, J>(this, node, joinType, on);
    return this.associationJoin(node, on, joinType);
  }

  private inferJoin<J extends RelationDef>(node: RelationNode<J>, joinType: JoinKind): JoinNode<R, J> {
    const parentAssociation = this.getParentAssociation(node);
    if (parentAssociation) {
      return new ChildToParentJoin<R, J>(this, node, parentAssociation, joinType);
    }
    const childAssociation = this.getChildAssociation(node);
    if (childAssociation) {
      return new ParentToChildJoin<R, J>(this, node, childAssociation, joinType);
    }
    throw new NoAssociationError(this.toString(), node.toString());
  }

  private associationJoin<J extends RelationDef>(
    node: RelationNode<J>,
    association: Association,
    joinType: JoinKind
  ): ChildToParentJoin<R, J> | ParentToChildJoin<R, J> {
    if (connects(association, this.relation, node.relation)) {
      return new ChildToParentJoin<R, J>(this, node, association, joinType);
    }
    if (connects(association, node.relation, this.relation)) {
      return new ParentToChildJoin<R, J>(this, node, association, joinType);
    }
    throw new InvalidAssociationError(
      `Association ${describeAssociation(association)} does not connect ${this.relationName} and ${node.relationName}`,
      { association: describeAssociation(association), left: this.relationName, right: node.relationName }
    );
  }

  toString(): string {
    return `${this.relationName} AS ${this.alias}`;
  }
}

const single = (candidates: Association[]): Association | undefined => {
  if (candidates.length > 1) {
    const [first] = candidates;
    throw new MultipleAssociationsFoundError(
      qualifiedName(first.child),
      qualifiedName(first.parent),
      candidates.map(a => a.childColumn.name)
    );
  }
  return candidates[0];
};

/**
 * Node wrapping a relation descriptor directly.
 */
export abstract class LeafNode<R extends RelationDef = RelationDef> extends RelationNode<R> {
  abstract readonly type: 'Table' | 'View';

  private projectionOverride?: Projection[];

  constructor(readonly source: R) {
    super();
  }

  get relation(): R {
    return this.source;
  }

  projections(): Projection[] {
    return this.projectionOverride ? [...this.projectionOverride] : [this.all()];
  }

  /**
   * Replaces the default record projection of this node.
   */
  withProjections(...projections: Projection[]): this {
    this.projectionOverride = projections;
    return this;
  }

  protected copyStateTo<T extends LeafNode<R>>(target: T): T {
    target.as(this.alias);
    if (this.projectionOverride) {
      target.withProjections(...this.projectionOverride.map(p => (p.node === this ? { ...p, node: target } : p)));
    }
    return target;
  }
}

export class TableNode<T extends TableDef = TableDef> extends LeafNode<T> {
  readonly type = 'Table';

  get table(): T {
    return this.source;
  }

  clone(): TableNode<T> {
    return this.copyStateTo(new TableNode(this.source));
  }
}

export class ViewNode<V extends ViewDef = ViewDef> extends LeafNode<V> {
  readonly type = 'View';

  get view(): V {
    return this.source;
  }

  clone(): ViewNode<V> {
    return this.copyStateTo(new ViewNode(this.source));
  }
}

/**
 * Binary combinator over two nodes. A join "is" its left side for further
 * chaining: alias and relation both come from `left`.
 */
export abstract class JoinNode<L extends RelationDef = RelationDef, R extends RelationDef = RelationDef> extends RelationNode<L> {
  readonly type = 'Join';

  constructor(
    protected leftNode: RelationNode<L>,
    protected rightNode: RelationNode<R>,
    readonly joinType: JoinKind
  ) {
    super();
  }

  get left(): RelationNode<L> {
    return this.leftNode;
  }

  get right(): RelationNode<R> {
    return this.rightNode;
  }

  get relation(): L {
    return this.leftNode.relation;
  }

  get alias(): string {
    return this.leftNode.alias;
  }

  /**
   * Re-aliases the left child, since a join carries no alias of its own.
   */
  as(alias: string): this {
    this.leftNode.as(alias);
    return this;
  }

  /**
   * Left projections followed by right projections, whatever the join type.
   */
  projections(): Projection[] {
    return [...this.leftNode.projections(), ...this.rightNode.projections()];
  }

  /**
   * Condition in structured form, using the aliases given by `resolveAlias`.
   */
  abstract condition(resolveAlias?: AliasResolver): JoinCondition;

  /**
   * Condition as SQL text, built from the children's current aliases.
   */
  conditionsExpression(resolveAlias: AliasResolver = defaultAliasResolver): string {
    const condition = this.condition(resolveAlias);
    if (condition.type === 'Raw') return condition.sql;
    return `${condition.left.table}.${condition.left.column} = ${condition.right.table}.${condition.right.column}`;
  }

  /**
   * Returns the ON subclause for this join, or a copy of this join with the given condition.
   */
  on(): string;
  on(condition: string): ExplicitJoin<L, R>;
  on(condition?: string): string | ExplicitJoin<L, R> {
    if (condition === undefined) return `on (${this.conditionsExpression()})`;
    return new ExplicitJoin(this.leftNode, this.rightNode, this.joinType, condition);
  }

  replaceLeft(node: RelationNode<L>): this {
    this.leftNode = node;
    return this;
  }

  replaceRight(node: RelationNode<R>): this {
    this.rightNode = node;
    return this;
  }

  /**
   * Deep copy: both children are cloned recursively, relations are shared.
   */
  abstract clone(): JoinNode<L, R>;

  toString(): string {
    return `${this.leftNode.toString()} ${this.joinType} JOIN ${this.rightNode.toString()} ON ${this.conditionsExpression()}`;
  }
}

/**
 * Join with a caller-supplied SQL boolean expression.
 */
export class ExplicitJoin<L extends RelationDef = RelationDef, R extends RelationDef = RelationDef> extends JoinNode<L, R> {
  constructor(left: RelationNode<L>, right: RelationNode<R>, joinType: JoinKind, readonly expression: string) {
    super(left, right, joinType);
  }

  condition(): JoinCondition {
    return { type: 'Raw', sql: this.expression };
  }

  clone(): ExplicitJoin<L, R> {
    return new ExplicitJoin(this.leftNode.clone(), this.rightNode.clone(), this.joinType, this.expression);
  }
}

/**
 * Join whose condition is synthesized from a foreign-key association.
 * The condition reads the children's aliases when it is generated, so
 * re-aliasing a child after joining is reflected in the rendered SQL.
 */
export abstract class AssociationJoin<L extends RelationDef = RelationDef, R extends RelationDef = RelationDef> extends JoinNode<L, R> {
  constructor(left: RelationNode<L>, right: RelationNode<R>, readonly association: Association, joinType: JoinKind) {
    super(left, right, joinType);
  }

  abstract get childNode(): RelationNode;
  abstract get parentNode(): RelationNode;

  condition(resolveAlias: AliasResolver = defaultAliasResolver): JoinCondition {
    return {
      type: 'ColumnEquality',
      left: { table: resolveAlias(this.childNode), column: this.association.childColumn.name },
      right: { table: resolveAlias(this.parentNode), column: this.association.parentColumn.name }
    };
  }
}

/**
 * Join in ascending direction: the left node is the child, the right node the parent.
 */
export class ChildToParentJoin<L extends RelationDef = RelationDef, R extends RelationDef = RelationDef> extends AssociationJoin<L, R> {
  get childNode(): RelationNode<L> {
    return this.leftNode;
  }

  get parentNode(): RelationNode<R> {
    return this.rightNode;
  }

  clone(): ChildToParentJoin<L, R> {
    return new ChildToParentJoin(this.leftNode.clone(), this.rightNode.clone(), this.association, this.joinType);
  }
}

/**
 * Join in descending direction: the left node is the parent, the right node the child.
 */
export class ParentToChildJoin<L extends RelationDef = RelationDef, R extends RelationDef = RelationDef> extends AssociationJoin<L, R> {
  get childNode(): RelationNode<R> {
    return this.rightNode;
  }

  get parentNode(): RelationNode<L> {
    return this.leftNode;
  }

  clone(): ParentToChildJoin<L, R> {
    return new ParentToChildJoin(this.leftNode.clone(), this.rightNode.clone(), this.association, this.joinType);
  }
}

export const isJoinNode = (node: RelationNode): node is JoinNode => node.type === 'Join';

export const isLeafNode = (node: RelationNode): node is LeafNode => node.type !== 'Join';

/**
 * Innermost relation of a node: joins delegate to their left child until a
 * leaf is reached. Plain relation descriptors are returned as they are.
 */
export const unwrapRelation = (target: RelationNode | RelationDef): RelationDef => {
  if (!(target instanceof RelationNode)) return target;
  if (isJoinNode(target)) return unwrapRelation(target.left);
  if (isLeafNode(target)) return target.source;
  return target.relation;
};

export const tableNode = <T extends TableDef>(table: T): TableNode<T> => new TableNode(table);

export const viewNode = <V extends ViewDef>(view: V): ViewNode<V> => new ViewNode(view);

/**
 * Leaf node for any relation, picked by its kind.
 */
export function leaf<T extends TableDef>(relation: T): TableNode<T>;
export function leaf<V extends ViewDef>(relation: V): ViewNode<V>;
export function leaf(relation: RelationDef): TableNode | ViewNode;
export function leaf(relation: RelationDef): TableNode | ViewNode {
  return relation.kind === 'table' ? new TableNode(relation) : new ViewNode(relation);
}
