import { SchemaError } from '../core/errors.js';
import {
  areComparableTypes,
  columnDomain,
  type ColumnDef,
  type ForeignKeyReference,
  type ReferentialAction,
  type RelationTarget
} from './column-types.js';
import { getPrimaryKeyColumn, listColumns, qualifiedName, sameRelation, type RelationDef } from './table.js';

/**
 * Directed foreign-key edge from a child relation to a parent relation.
 * Identity is the (child, parent, child column) triple.
 */
export interface Association<C extends RelationDef = RelationDef, P extends RelationDef = RelationDef> {
  readonly child: C;
  readonly parent: P;
  readonly childColumn: ColumnDef;
  readonly parentColumn: ColumnDef;
  readonly onDelete: ReferentialAction;
  readonly onUpdate: ReferentialAction;
  /** Constraint name, when declared */
  readonly name?: string;
}

const ASSOCIATION_CACHE: WeakMap<RelationDef, readonly Association[]> = new WeakMap();

const resolveTarget = (target: RelationTarget): RelationDef =>
  typeof target === 'function' ? target() : target;

const resolveParentColumn = (child: RelationDef, column: ColumnDef, parent: RelationDef, ref: ForeignKeyReference): ColumnDef => {
  const parentColumn = ref.column !== undefined ? parent.columns[ref.column] : getPrimaryKeyColumn(parent);
  if (!parentColumn) {
    throw new SchemaError(
      ref.column !== undefined
        ? `Column '${qualifiedName(child)}.${column.name}' references missing column '${qualifiedName(parent)}.${ref.column}'`
        : `Column '${qualifiedName(child)}.${column.name}' references '${qualifiedName(parent)}', which has no primary key`,
      { child: qualifiedName(child), parent: qualifiedName(parent), column: column.name }
    );
  }
  return parentColumn;
};

const buildAssociation = (child: RelationDef, column: ColumnDef, ref: ForeignKeyReference): Association => {
  const parent = resolveTarget(ref.target);
  const parentColumn = resolveParentColumn(child, column, parent, ref);
  if (!areComparableTypes(column.type, parentColumn.type)) {
    throw new SchemaError(
      `Column '${qualifiedName(child)}.${column.name}' (${column.type}) cannot reference ` +
        `'${qualifiedName(parent)}.${parentColumn.name}' (${parentColumn.type})`,
      {
        child: qualifiedName(child),
        parent: qualifiedName(parent),
        childDomain: columnDomain(column.type),
        parentDomain: columnDomain(parentColumn.type)
      }
    );
  }
  return Object.freeze({
    child,
    parent,
    childColumn: column,
    parentColumn,
    onDelete: ref.onDelete ?? 'NO ACTION',
    onUpdate: ref.onUpdate ?? 'NO ACTION',
    name: ref.name
  });
};

/**
 * Outgoing associations of a relation (the relation is the child), in column order.
 * Resolved on first access and cached for the lifetime of the descriptor.
 */
export const getAssociations = (relation: RelationDef): readonly Association[] => {
  const cached = ASSOCIATION_CACHE.get(relation);
  if (cached) return cached;

  const resolved = Object.freeze(
    listColumns(relation).flatMap(column =>
      column.references ? [buildAssociation(relation, column, column.references)] : []
    )
  );
  ASSOCIATION_CACHE.set(relation, resolved);
  return resolved;
};

/**
 * Every association leading from `child` to `parent`.
 */
export const findAssociations = (child: RelationDef, parent: RelationDef): Association[] =>
  getAssociations(child).filter(a => sameRelation(a.parent, parent));

export const connects = (association: Association, child: RelationDef, parent: RelationDef): boolean =>
  sameRelation(association.child, child) && sameRelation(association.parent, parent);

export const describeAssociation = (association: Association): string =>
  `${qualifiedName(association.child)}.${association.childColumn.name} -> ` +
  `${qualifiedName(association.parent)}.${association.parentColumn.name}`;
