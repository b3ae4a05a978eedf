export class MetadataCatalogError extends Error {
  override readonly name: string = 'MetadataCatalogError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownCollectionError extends MetadataCatalogError {
  override readonly name = 'UnknownCollectionError';

  constructor(readonly collection: string) {
    super(`The requested collection "${collection}" is not defined`);
  }
}

/**
 * Raised only when restrictions are checked strictly: more restriction
 * values were supplied than the collection has restriction columns.
 */
export class MalformedRestrictionError extends MetadataCatalogError {
  override readonly name = 'MalformedRestrictionError';

  constructor(
    readonly collection: string | undefined,
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      `${collection === undefined ? 'Statement' : `Collection "${collection}"`} accepts at most ${expected} restriction${expected === 1 ? '' : 's'}, got ${actual}`,
    );
  }
}

export class ExecutionFailedError extends MetadataCatalogError {
  override readonly name = 'ExecutionFailedError';

  constructor(
    readonly collection: string,
    readonly statement: string,
    cause: unknown,
  ) {
    super(`Failed to fetch collection "${collection}": ${cause instanceof Error ? cause.message : String(cause)}`, cause);
  }
}

export class RowProjectionError extends MetadataCatalogError {
  override readonly name = 'RowProjectionError';

  constructor(
    readonly collection: string,
    readonly column: string,
    readonly value: unknown,
    readonly expectedType: string,
  ) {
    super(`Collection "${collection}" column "${column}" expected ${expectedType}, got ${typeof value === 'string' ? `"${value}"` : String(value)}`);
  }
}

export class CatalogDefinitionError extends MetadataCatalogError {
  override readonly name = 'CatalogDefinitionError';
}
