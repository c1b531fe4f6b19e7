import type { JoinKind } from '../../sql/sql.js';
import { JOIN_KINDS } from '../../sql/sql.js';
import { StandardLimitOffsetPagination } from '../base/pagination-strategy.js';
import { SqlDialectBase } from '../base/sql-dialect.js';

/**
 * MySQL dialect implementation
 */
export class MySqlDialect extends SqlDialectBase {
  protected readonly dialect = 'mysql';

  public constructor() {
    // MySQL documents the largest BIGINT UNSIGNED as "all rows"; OFFSET is only accepted after a LIMIT.
    super(new StandardLimitOffsetPagination('18446744073709551615'));
  }

  /**
   * Quotes an identifier using MySQL backtick syntax
   */
  quoteIdentifier(id: string): string {
    return `\`${id.replace(/`/g, '``')}\``;
  }

  /**
   * MySQL has no FULL OUTER JOIN.
   */
  supportsJoinKind(kind: JoinKind): boolean {
    return kind !== JOIN_KINDS.FULL;
  }
}
