import { SchemaError } from '../core/errors.js';
import type { ColumnDef } from './column-types.js';
import { toAliasBase } from '../query-builder/table-alias-utils.js';

export type ColumnsRecord = Record<string, ColumnDef>;

export interface TableOptions {
  schema?: string;
  /** Name of the primary key column (falls back to column.primary flags) */
  primaryKey?: string;
  comment?: string;
}

export interface ViewOptions {
  schema?: string;
  primaryKey?: string;
  comment?: string;
  /** Defining query, kept for DDL tooling */
  query?: string;
}

interface RelationBase<T extends ColumnsRecord> {
  /** Name of the relation */
  readonly name: string;
  /** Optional schema/catalog name */
  readonly schema?: string;
  /** Column definitions keyed by column name, in declaration order */
  readonly columns: Readonly<T>;
  /** Primary key column name, when the relation has one */
  readonly primaryKey?: string;
  readonly comment?: string;
}

/**
 * Definition of a database table
 * @typeParam T - Type of the columns record
 */
export interface TableDef<T extends ColumnsRecord = ColumnsRecord> extends RelationBase<T> {
  readonly kind: 'table';
}

/**
 * Definition of a database view
 * @typeParam T - Type of the columns record
 */
export interface ViewDef<T extends ColumnsRecord = ColumnsRecord> extends RelationBase<T> {
  readonly kind: 'view';
  readonly query?: string;
}

/**
 * Any named source of rows.
 */
export type RelationDef<T extends ColumnsRecord = ColumnsRecord> = TableDef<T> | ViewDef<T>;

const nameColumns = <T extends ColumnsRecord>(relationName: string, columns: T): Readonly<T> => {
  // Runtime mutability to assign names to column definitions for convenience
  const named = Object.entries(columns).reduce((acc, [key, def]) => {
    (acc as Record<string, ColumnDef>)[key] = Object.freeze({ ...def, name: key, table: relationName });
    return acc;
  }, {} as T);
  return Object.freeze(named);
};

const resolvePrimaryKey = (
  relationName: string,
  columns: ColumnsRecord,
  explicit?: string
): string | undefined => {
  if (explicit !== undefined) {
    if (!(explicit in columns)) {
      throw new SchemaError(
        `Primary key column '${explicit}' does not exist on '${relationName}'`,
        { relation: relationName, column: explicit }
      );
    }
    return explicit;
  }
  return Object.values(columns).find(c => c.primary)?.name;
};

/**
 * Creates a table definition.
 * The returned descriptor is frozen: its name and column set never change.
 *
 * @example
 * ```typescript
 * const categories = defineTable('category', {
 *   id: col.primaryKey(col.bigint()),
 *   name: col.unique(col.notNull(col.varchar(255)))
 * });
 * const books = defineTable('book', {
 *   title: col.notNull(col.text()),
 *   category_id: col.references(col.bigint(), categories, { onDelete: 'SET NULL' })
 * });
 * ```
 */
export const defineTable = <T extends ColumnsRecord>(
  name: string,
  columns: T,
  options: TableOptions = {}
): TableDef<T> => {
  if (!name) {
    throw new SchemaError('Relation name must not be empty');
  }
  const named = nameColumns(name, columns);
  const table: TableDef<T> = {
    kind: 'table',
    name,
    schema: options.schema,
    columns: named,
    primaryKey: resolvePrimaryKey(name, named, options.primaryKey),
    comment: options.comment
  };
  return Object.freeze(table);
};

/**
 * Creates a view definition.
 */
export const defineView = <T extends ColumnsRecord>(
  name: string,
  columns: T,
  options: ViewOptions = {}
): ViewDef<T> => {
  if (!name) {
    throw new SchemaError('Relation name must not be empty');
  }
  const named = nameColumns(name, columns);
  const view: ViewDef<T> = {
    kind: 'view',
    name,
    schema: options.schema,
    columns: named,
    primaryKey: resolvePrimaryKey(name, named, options.primaryKey),
    comment: options.comment,
    query: options.query
  };
  return Object.freeze(view);
};

/**
 * Stable identity of a relation: `schema.name`, or `name` without a schema.
 */
export const qualifiedName = (relation: RelationDef): string =>
  relation.schema ? `${relation.schema}.${relation.name}` : relation.name;

/**
 * Unqualified, identifier-safe name used as the default correlation name
 * (`Daily Sales` → `daily_sales`).
 */
export const shortName = (relation: RelationDef): string => toAliasBase(relation.name);

export const sameRelation = (a: RelationDef, b: RelationDef): boolean =>
  a === b || qualifiedName(a) === qualifiedName(b);

export const isTableDef = (relation: RelationDef): relation is TableDef => relation.kind === 'table';

export const isViewDef = (relation: RelationDef): relation is ViewDef => relation.kind === 'view';

/**
 * Ordered list of a relation's columns.
 */
export const listColumns = (relation: RelationDef): ColumnDef[] => Object.values(relation.columns);

/**
 * Dynamic column lookup by string key.
 */
export function getColumn<T extends RelationDef, K extends keyof T['columns'] & string>(relation: T, key: K): T['columns'][K];
export function getColumn(relation: RelationDef, key: string): ColumnDef;
export function getColumn(relation: RelationDef, key: string): ColumnDef {
  const column = relation.columns[key];
  if (!column) {
    throw new SchemaError(`Column '${key}' does not exist on relation '${qualifiedName(relation)}'`, {
      relation: qualifiedName(relation),
      column: key
    });
  }
  return column;
}

/**
 * Primary key column of a relation, if it has one.
 */
export const getPrimaryKeyColumn = (relation: RelationDef): ColumnDef | undefined =>
  relation.primaryKey !== undefined ? relation.columns[relation.primaryKey] : undefined;
