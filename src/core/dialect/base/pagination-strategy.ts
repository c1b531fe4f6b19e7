/**
 * Strategy interface for compiling pagination clauses.
 * Allows dialects to customize how pagination (LIMIT/OFFSET, ROWS FETCH, etc.) is generated.
 */
export interface PaginationStrategy {
  /**
   * @param orderByClause - The compiled ORDER BY clause, empty when the query has none.
   * @returns SQL pagination clause or empty string if no pagination.
   */
  compilePagination(limit: number | undefined, offset: number | undefined, orderByClause: string): string;
}

/**
 * LIMIT/OFFSET pagination, shared by PostgreSQL, MySQL and SQLite.
 *
 * Engines that only accept OFFSET after a LIMIT pass `unboundedLimit`, the
 * LIMIT value meaning "all rows", emitted when an offset comes without a limit.
 */
export class StandardLimitOffsetPagination implements PaginationStrategy {
  constructor(private readonly unboundedLimit?: string) {}

  compilePagination(limit?: number, offset?: number): string {
    const parts: string[] = [];
    if (limit !== undefined) {
      parts.push(`LIMIT ${limit}`);
    } else if (offset !== undefined && this.unboundedLimit !== undefined) {
      parts.push(`LIMIT ${this.unboundedLimit}`);
    }
    if (offset !== undefined) parts.push(`OFFSET ${offset}`);
    return parts.length ? ` ${parts.join(' ')}` : '';
  }
}

/**
 * OFFSET ... FETCH pagination. SQL Server only accepts it after an ORDER BY,
 * so a neutral ordering is supplied when the query has none.
 */
export class OffsetFetchPagination implements PaginationStrategy {
  compilePagination(limit: number | undefined, offset: number | undefined, orderByClause: string): string {
    if (limit === undefined && offset === undefined) return '';
    const order = orderByClause ? '' : ' ORDER BY (SELECT NULL)';
    const fetch = limit !== undefined ? ` FETCH NEXT ${limit} ROWS ONLY` : '';
    return `${order} OFFSET ${offset ?? 0} ROWS${fetch}`;
  }
}
