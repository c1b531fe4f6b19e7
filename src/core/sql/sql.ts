/**
 * SQL operators used in restrictions
 */
export const SQL_OPERATORS = {
  /** Equality operator */
  EQUALS: '=',
  /** Not equals operator */
  NOT_EQUALS: '<>',
  /** Greater than operator */
  GREATER_THAN: '>',
  /** Greater than or equal operator */
  GREATER_OR_EQUAL: '>=',
  /** Less than operator */
  LESS_THAN: '<',
  /** Less than or equal operator */
  LESS_OR_EQUAL: '<=',
  /** LIKE pattern matching operator */
  LIKE: 'LIKE',
  /** IN membership operator */
  IN: 'IN',
  /** IS NULL null check operator */
  IS_NULL: 'IS NULL',
  /** IS NOT NULL null check operator */
  IS_NOT_NULL: 'IS NOT NULL',
  /** Logical AND operator */
  AND: 'AND',
  /** Logical OR operator */
  OR: 'OR'
} as const;

/**
 * Type representing any supported comparison operator
 */
export type ComparisonOperator =
  | typeof SQL_OPERATORS.EQUALS
  | typeof SQL_OPERATORS.NOT_EQUALS
  | typeof SQL_OPERATORS.GREATER_THAN
  | typeof SQL_OPERATORS.GREATER_OR_EQUAL
  | typeof SQL_OPERATORS.LESS_THAN
  | typeof SQL_OPERATORS.LESS_OR_EQUAL
  | typeof SQL_OPERATORS.LIKE;

/**
 * Types of SQL joins supported
 */
export const JOIN_KINDS = {
  /** INNER JOIN type */
  INNER: 'INNER',
  /** LEFT JOIN type */
  LEFT: 'LEFT',
  /** RIGHT JOIN type */
  RIGHT: 'RIGHT',
  /** FULL OUTER JOIN type */
  FULL: 'FULL'
} as const;

/**
 * Type representing any supported join kind
 */
export type JoinKind = (typeof JOIN_KINDS)[keyof typeof JOIN_KINDS];

/**
 * Join kind used when a builder is called without one.
 * Outer rows of the left relation are kept unless the caller asks otherwise.
 */
export const DEFAULT_JOIN_KIND: JoinKind = JOIN_KINDS.LEFT;

export const isJoinKind = (value: unknown): value is JoinKind =>
  Object.values(JOIN_KINDS).some(kind => kind === value);

/**
 * Ordering directions for result sorting
 */
export const ORDER_DIRECTIONS = {
  /** Ascending order */
  ASC: 'ASC',
  /** Descending order */
  DESC: 'DESC'
} as const;

/**
 * Type representing any supported order direction
 */
export type OrderDirection = (typeof ORDER_DIRECTIONS)[keyof typeof ORDER_DIRECTIONS];

/**
 * Supported database dialects
 */
export const SUPPORTED_DIALECTS = {
  /** MySQL database dialect */
  MYSQL: 'mysql',
  /** SQLite database dialect */
  SQLITE: 'sqlite',
  /** Microsoft SQL Server dialect */
  MSSQL: 'mssql',
  /** PostgreSQL database dialect */
  POSTGRES: 'postgres'
} as const;

/**
 * Type representing any supported database dialect
 */
export type DialectName = (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS];
