/**
 * Error hierarchy for relation-tree construction and rendering.
 *
 * Every failure raised here happens while a query is being built: nothing is
 * half-rendered and nothing is retried, so callers either fix the input or
 * disambiguate the join.
 *
 * @example
 * ```typescript
 * try {
 *   tableNode(books).join(tableNode(authors));
 * } catch (error) {
 *   if (isRelnodeError(error) && error.code === 'NO_ASSOCIATION') {
 *     // supply an explicit condition instead
 *   }
 * }
 * ```
 */

export type RelnodeErrorCode =
  | 'SCHEMA_ERROR'
  | 'NO_ASSOCIATION'
  | 'MULTIPLE_ASSOCIATIONS'
  | 'INVALID_ASSOCIATION'
  | 'UNSUPPORTED_JOIN'
  | 'INVALID_QUERY'
  | 'DIALECT_ERROR';

export class RelnodeError extends Error {
  /** Machine-readable error code */
  readonly code: RelnodeErrorCode;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  constructor(message: string, code: RelnodeErrorCode, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'RelnodeError';
    this.code = code;
    this.details = Object.freeze({ ...details });
  }
}

/**
 * Invalid relation or column definition, or a failed schema lookup.
 */
export class SchemaError extends RelnodeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'SCHEMA_ERROR', details);
    this.name = 'SchemaError';
  }
}

/**
 * Raised when a join is requested without a condition and neither relation
 * declares a foreign key pointing at the other.
 */
export class NoAssociationError extends RelnodeError {
  constructor(left: string, right: string) {
    super(
      `Failed to join ${left} with ${right}: no associations found.`,
      'NO_ASSOCIATION',
      { left, right }
    );
    this.name = 'NoAssociationError';
  }
}

export class MultipleAssociationsFoundError extends RelnodeError {
  constructor(child: string, parent: string, columns: string[]) {
    super(
      `Failed to infer association from ${child} to ${parent}: ` +
        `${columns.length} candidates (${columns.join(', ')}). Pass the association explicitly.`,
      'MULTIPLE_ASSOCIATIONS',
      { child, parent, columns }
    );
    this.name = 'MultipleAssociationsFoundError';
  }
}

/**
 * The association handed to a join builder does not connect the two nodes.
 */
export class InvalidAssociationError extends RelnodeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INVALID_ASSOCIATION', details);
    this.name = 'InvalidAssociationError';
  }
}

export class UnsupportedJoinError extends RelnodeError {
  constructor(dialect: string, kind: string) {
    super(`${kind} JOIN is not supported by the ${dialect} dialect.`, 'UNSUPPORTED_JOIN', {
      dialect,
      kind
    });
    this.name = 'UnsupportedJoinError';
  }
}

/**
 * The tree handed to a render pass cannot be rendered as one query:
 * two leaves share an explicit alias, or a projection or restriction refers
 * to a node outside the tree.
 */
export class InvalidQueryError extends RelnodeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'INVALID_QUERY', details);
    this.name = 'InvalidQueryError';
  }
}

export class DialectError extends RelnodeError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 'DIALECT_ERROR', details);
    this.name = 'DialectError';
  }
}

export const isRelnodeError = (error: unknown): error is RelnodeError =>
  error instanceof RelnodeError;
