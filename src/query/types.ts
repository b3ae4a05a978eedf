/**
 * Restriction values aligned by index with a collection's restriction
 * columns. `null`, `undefined` and `''` mean "no restriction at this
 * position"; later positions keep their alignment.
 */
export type RestrictionSet = readonly (string | null | undefined)[];

export interface BoundParameter {
  readonly name: string;
  readonly value: string;
}

/**
 * Statement text with `:name` placeholders and the values bound to them,
 * in the order the placeholders appear.
 */
export interface BoundStatement {
  readonly text: string;
  readonly parameters: readonly BoundParameter[];
}

export interface BuildOptions {
  /**
   * The template already ends in a WHERE clause, so the first restriction
   * is joined with AND.
   */
  continuesWhere?: boolean;
  /** Reject restriction sets longer than the restriction column list. */
  strict?: boolean;
  /** Collection name reported by MalformedRestrictionError. */
  collection?: string;
}
