import type { Dialect } from './abstract.js';
import { DialectError } from '../errors.js';
import type { DialectName } from '../sql/sql.js';
import { PostgresDialect } from './postgres/index.js';
import { MySqlDialect } from './mysql/index.js';
import { SqliteDialect } from './sqlite/index.js';
import { SqlServerDialect } from './mssql/index.js';

/**
 * Name a Criteria can be compiled for: a built-in dialect or one added with
 * `registerDialect`.
 */
export type DialectKey = DialectName | (string & {});

const builtInDialects: Record<DialectName, () => Dialect> = {
  postgres: () => new PostgresDialect(),
  mysql: () => new MySqlDialect(),
  sqlite: () => new SqliteDialect(),
  mssql: () => new SqlServerDialect()
};

// Consulted before the built-ins, so a registration can shadow one.
const registeredDialects = new Map<string, () => Dialect>();

const isDialectName = (key: string): key is DialectName => Object.hasOwn(builtInDialects, key);

export const registerDialect = (key: DialectKey, factory: () => Dialect): void => {
  registeredDialects.set(key, factory);
};

/**
 * Drops a registration; a shadowed built-in becomes visible again.
 */
export const unregisterDialect = (key: DialectKey): boolean => registeredDialects.delete(key);

export const knownDialects = (): string[] => [
  ...new Set([...Object.keys(builtInDialects), ...registeredDialects.keys()])
];

/**
 * Dialect instance for a `Criteria.compile` target; instances pass through.
 * @throws DialectError for a key that is neither built in nor registered
 */
export const resolveDialectInput = (dialect: Dialect | DialectKey): Dialect => {
  if (typeof dialect !== 'string') return dialect;
  const factory = registeredDialects.get(dialect) ?? (isDialectName(dialect) ? builtInDialects[dialect] : undefined);
  if (!factory) {
    throw new DialectError(`Unknown dialect "${dialect}" (known: ${knownDialects().join(', ')})`, { key: dialect });
  }
  return factory();
};
