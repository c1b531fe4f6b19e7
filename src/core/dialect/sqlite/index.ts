import { StandardLimitOffsetPagination } from '../base/pagination-strategy.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

/**
 * SQLite dialect implementation.
 * RIGHT and FULL joins need SQLite 3.39 or newer.
 */
export class SqliteDialect extends SqlDialectBase {
  protected readonly dialect = 'sqlite';

  public constructor() {
    // A negative LIMIT means no limit; OFFSET is only accepted after a LIMIT.
    super(new StandardLimitOffsetPagination('-1'));
  }

  /**
   * Quotes an identifier using SQLite double-quote syntax
   */
  quoteIdentifier(id: string): string {
    return `"${id.replace(/"/g, '""')}"`;
  }
}
