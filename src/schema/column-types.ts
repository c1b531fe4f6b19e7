import type { RelationDef } from './table.js';

/**
 * Canonical, dialect-agnostic column data types.
 * Dialect-specific names are still accepted as plain strings.
 */
export const STANDARD_COLUMN_TYPES = [
  'INT',
  'INTEGER',
  'SMALLINT',
  'BIGINT',
  'VARCHAR',
  'CHAR',
  'TEXT',
  'JSON',
  'DECIMAL',
  'FLOAT',
  'DOUBLE',
  'UUID',
  'BINARY',
  'VARBINARY',
  'BLOB',
  'BYTEA',
  'DATE',
  'DATETIME',
  'TIMESTAMP',
  'TIMESTAMPTZ',
  'BOOLEAN'
] as const;

/** Known logical types. */
export type StandardColumnType = (typeof STANDARD_COLUMN_TYPES)[number];

/**
 * Column type value.
 * Arbitrary strings are allowed so new/dialect-specific types don't require touching this module.
 */
export type ColumnType = StandardColumnType | (string & {});

/**
 * Scalar domain a column type belongs to. Two columns can take part in the
 * same association only when their domains match.
 */
export type ColumnDomain =
  | 'integer'
  | 'numeric'
  | 'text'
  | 'uuid'
  | 'boolean'
  | 'temporal'
  | 'binary'
  | 'json'
  | (string & {});

const DOMAINS: Record<string, ColumnDomain> = {
  int: 'integer',
  integer: 'integer',
  smallint: 'integer',
  bigint: 'integer',
  serial: 'integer',
  bigserial: 'integer',
  decimal: 'numeric',
  numeric: 'numeric',
  float: 'numeric',
  double: 'numeric',
  real: 'numeric',
  varchar: 'text',
  char: 'text',
  text: 'text',
  uuid: 'uuid',
  boolean: 'boolean',
  date: 'temporal',
  datetime: 'temporal',
  timestamp: 'temporal',
  timestamptz: 'temporal',
  binary: 'binary',
  varbinary: 'binary',
  blob: 'binary',
  bytea: 'binary',
  json: 'json',
  jsonb: 'json'
};

/**
 * Resolves the scalar domain of a column type (case-insensitive).
 * Unknown types form a domain of their own.
 */
export const columnDomain = (type: ColumnType): ColumnDomain => {
  const lower = type.toLowerCase();
  return DOMAINS[lower] ?? lower;
};

export const areComparableTypes = (a: ColumnType, b: ColumnType): boolean =>
  columnDomain(a) === columnDomain(b);

export type ReferentialAction =
  | 'NO ACTION'
  | 'RESTRICT'
  | 'CASCADE'
  | 'SET NULL'
  | 'SET DEFAULT';

export interface RawDefaultValue {
  raw: string;
}

export type DefaultValue = string | number | boolean | null | RawDefaultValue;

/**
 * Parent relation of a foreign key, or a thunk returning it.
 * Thunks are needed for self-references and for relations declared later in a module.
 */
export type RelationTarget = RelationDef | (() => RelationDef);

export interface ForeignKeyReference {
  /** Parent relation */
  target: RelationTarget;
  /** Parent column name (defaults to the parent's primary key) */
  column?: string;
  /** Optional constraint name */
  name?: string;
  /** ON DELETE action */
  onDelete?: ReferentialAction;
  /** ON UPDATE action */
  onUpdate?: ReferentialAction;
}

/**
 * Definition of a database column
 */
export interface ColumnDef<T extends ColumnType = ColumnType> {
  /** Column name (filled at runtime by defineTable/defineView) */
  name: string;
  /** Data type of the column */
  type: T;
  /** Whether this column is a primary key */
  primary?: boolean;
  /** Whether this column cannot be null */
  notNull?: boolean;
  /** Whether this column must be unique (or name of the unique constraint) */
  unique?: boolean | string;
  /** Default value for the column */
  default?: DefaultValue;
  /** Foreign key reference */
  references?: ForeignKeyReference;
  /** Column comment/description */
  comment?: string;
  /** Additional arguments for the column type (e.g., VARCHAR length) */
  args?: (string | number)[];
  /** Relation name this column belongs to (filled at runtime) */
  table?: string;
}

/**
 * Factory for creating column definitions with common data types
 */
export const col = {
  /**
   * Creates an integer column definition
   * @returns ColumnDef with INT type
   */
  int: (): ColumnDef<'INT'> => ({ name: '', type: 'INT' }),

  /**
   * Creates a big integer column definition
   */
  bigint: (): ColumnDef<'BIGINT'> => ({ name: '', type: 'BIGINT' }),

  /**
   * Creates a variable character column definition
   * @param length - Maximum length of the string
   */
  varchar: (length: number): ColumnDef<'VARCHAR'> => ({ name: '', type: 'VARCHAR', args: [length] }),

  text: (): ColumnDef<'TEXT'> => ({ name: '', type: 'TEXT' }),

  /**
   * Creates a fixed precision decimal column definition
   */
  decimal: (precision: number, scale = 0): ColumnDef<'DECIMAL'> => ({
    name: '',
    type: 'DECIMAL',
    args: [precision, scale]
  }),

  uuid: (): ColumnDef<'UUID'> => ({ name: '', type: 'UUID' }),

  boolean: (): ColumnDef<'BOOLEAN'> => ({ name: '', type: 'BOOLEAN' }),

  date: (): ColumnDef<'DATE'> => ({ name: '', type: 'DATE' }),

  timestamp: (): ColumnDef<'TIMESTAMP'> => ({ name: '', type: 'TIMESTAMP' }),

  json: (): ColumnDef<'JSON'> => ({ name: '', type: 'JSON' }),

  /**
   * Creates a column definition with a custom SQL type.
   */
  custom: (type: string, args?: (string | number)[]): ColumnDef => ({ name: '', type, args }),

  /**
   * Marks a column definition as a primary key
   */
  primaryKey: <T extends ColumnType>(def: ColumnDef<T>): ColumnDef<T> =>
    ({ ...def, primary: true, notNull: true }),

  /**
   * Marks a column as NOT NULL
   */
  notNull: <T extends ColumnType>(def: ColumnDef<T>): ColumnDef<T> =>
    ({ ...def, notNull: true }),

  /**
   * Marks a column as UNIQUE
   */
  unique: <T extends ColumnType>(def: ColumnDef<T>, name?: string): ColumnDef<T> =>
  ({
    ...def,
    unique: name ?? true
  }),

  /**
   * Sets a default value for the column
   */
  default: <T extends ColumnType>(def: ColumnDef<T>, value: DefaultValue): ColumnDef<T> =>
  ({
    ...def,
    default: value
  }),

  /**
   * Declares a foreign key from this column to `target`.
   * The parent column defaults to the target's primary key.
   *
   * @example
   * ```typescript
   * category_id: col.references(col.bigint(), () => categories, { onDelete: 'SET NULL' })
   * ```
   */
  references: <T extends ColumnType>(
    def: ColumnDef<T>,
    target: RelationTarget,
    options: Omit<ForeignKeyReference, 'target'> = {}
  ): ColumnDef<T> =>
  ({
    ...def,
    references: { ...options, target }
  })
};
