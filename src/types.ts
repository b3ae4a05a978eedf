import type { CellValue, CollectionSummary, ResultColumn, Row } from './catalog/types.js';
import type { BoundStatement, RestrictionSet } from './query/types.js';

/** A row as the executor returns it: column name to driver value. */
export type RawRow = Readonly<Record<string, unknown>>;

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/**
 * Runs a bound statement and returns its rows. Connection handling, timeouts
 * and cancellation belong to the implementation.
 */
export interface StatementExecutor {
  execute(statement: BoundStatement, options?: ExecuteOptions): Promise<readonly RawRow[]>;
}

export interface ResultSet {
  readonly collection: string;
  readonly columns: readonly ResultColumn[];
  readonly rows: readonly Row[];
}

export interface FetchOptions extends ExecuteOptions {
  /** Overrides the reader's strict setting for this call. */
  strict?: boolean;
}

export interface MetadataSource {
  listCollections(): CollectionSummary[];
  fetch(name: string, restrictions?: RestrictionSet, options?: FetchOptions): Promise<ResultSet>;
}

export type { CellValue, CollectionSummary, ResultColumn, Row };
