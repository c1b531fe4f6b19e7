import type { ColumnDef } from '../../schema/column-types.js';
import { listColumns } from '../../schema/table.js';
import type { RelationNode } from './relation-node.js';

/**
 * Resolves the correlation name a node is rendered under.
 */
export type AliasResolver = (node: RelationNode) => string;

/**
 * Reference to one column of one node, used by restrictions and ordering.
 */
export interface ColumnRef {
  type: 'ColumnRef';
  node: RelationNode;
  column: ColumnDef;
}

/**
 * Projection contributing every column of a node's relation.
 */
export interface RecordProjection {
  type: 'RecordProjection';
  node: RelationNode;
}

/**
 * Projection contributing a single column.
 */
export interface ColumnProjection {
  type: 'ColumnProjection';
  node: RelationNode;
  column: ColumnDef;
  /** Explicit result alias (defaults to `<nodeAlias>__<column>`) */
  alias?: string;
}

export type Projection = RecordProjection | ColumnProjection;

/**
 * One entry of a SELECT list.
 */
export interface SelectItem {
  table: string;
  column: string;
  alias: string;
}

export const projectionColumns = (projection: Projection): ColumnDef[] => {
  switch (projection.type) {
    case 'RecordProjection':
      return listColumns(projection.node.relation);
    case 'ColumnProjection':
      return [projection.column];
  }
};

/**
 * Result alias of a projected column, `<correlation>__<column>`. Keeps
 * same-named columns of different nodes apart in one SELECT list.
 */
export const projectionAlias = (correlation: string, column: string): string => `${correlation}__${column}`;

/**
 * Expands a projection into SELECT items using the aliases of the current render pass.
 */
export const toSelectItems = (projection: Projection, resolveAlias: AliasResolver): SelectItem[] => {
  const table = resolveAlias(projection.node);
  if (projection.type === 'ColumnProjection') {
    return [{
      table,
      column: projection.column.name,
      alias: projection.alias ?? projectionAlias(table, projection.column.name)
    }];
  }
  return projectionColumns(projection).map(column => ({
    table,
    column: column.name,
    alias: projectionAlias(table, column.name)
  }));
};
