import { OffsetFetchPagination } from '../base/pagination-strategy.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

/**
 * Microsoft SQL Server dialect implementation
 */
export class SqlServerDialect extends SqlDialectBase {
  protected readonly dialect = 'mssql';

  public constructor() {
    super(new OffsetFetchPagination());
  }

  /**
   * Quotes an identifier using SQL Server bracket syntax
   */
  quoteIdentifier(id: string): string {
    return `[${id.replace(/]/g, ']]')}]`;
  }

  /**
   * Formats parameter placeholders using SQL Server named parameter syntax
   */
  protected formatPlaceholder(index: number): string {
    return `@p${index}`;
  }
}
