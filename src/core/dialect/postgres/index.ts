import { SqlDialectBase } from '../base/sql-dialect.js';

/**
 * PostgreSQL dialect implementation
 */
export class PostgresDialect extends SqlDialectBase {
  protected readonly dialect = 'postgres';

  public constructor() {
    super();
  }

  /**
   * Quotes an identifier using PostgreSQL double-quote syntax
   */
  quoteIdentifier(id: string): string {
    return `"${id.replace(/"/g, '""')}"`;
  }

  /**
   * Formats parameter placeholders using PostgreSQL positional syntax ($1, $2, ...)
   */
  protected formatPlaceholder(index: number): string {
    return `$${index}`;
  }
}
