export type ColumnType = 'string' | 'integer' | 'boolean';

export interface ResultColumn {
  readonly name: string;
  readonly type: ColumnType;
}

export type CellValue = string | number | boolean | null;

export type Row = Readonly<Record<string, CellValue>>;

export interface QuerySource {
  readonly kind: 'query';
  /** SELECT text that restriction predicates are appended to. */
  readonly template: string;
  /** Column names filtered by restriction position 0, 1, 2… */
  readonly restrictionColumns: readonly string[];
  /** The template ends in its own WHERE clause. */
  readonly continuesWhere?: boolean;
}

/** Rows held in memory; restrictions do not apply. */
export interface StaticSource {
  readonly kind: 'static';
  readonly rows: () => readonly Row[];
}

export type RowSource = QuerySource | StaticSource;

export interface CollectionDescriptor {
  readonly name: string;
  readonly resultColumns: readonly ResultColumn[];
  readonly source: RowSource;
  /** Number of parts in a fully qualified name of an item in this collection. */
  readonly identifierParts?: number;
}

export interface CollectionSummary {
  readonly name: string;
  readonly restrictionColumns: readonly string[];
}

export function restrictionColumnsOf(descriptor: CollectionDescriptor): readonly string[] {
  return descriptor.source.kind === 'query' ? descriptor.source.restrictionColumns : [];
}
