/**
 * Represents a single compiled query log entry
 */
export interface QueryLogEntry {
  /** The SQL text that was produced */
  sql: string;
  /** Parameters bound to the query */
  params: unknown[];
  /** Qualified name of the root relation of the compiled tree */
  relation: string;
}

/**
 * Function type for query logging callbacks
 * @param entry - The query log entry to process
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Logger writing every entry through `console.debug`.
 * @param prefix - Text printed before each statement
 */
export const createConsoleQueryLogger = (prefix = '[relnode]'): QueryLogger =>
  entry => {
    console.debug(`${prefix} ${entry.relation}: ${entry.sql}`, entry.params);
  };
