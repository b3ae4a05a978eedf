export { MetadataReader } from './reader/metadata-reader.js';
export type { MetadataReaderConfig } from './reader/metadata-reader.js';
export { CollectionCatalog } from './catalog/catalog.js';
export { postgresCatalog, postgresCollections } from './catalog/postgres.js';
export type {
  CellValue,
  CollectionDescriptor,
  CollectionSummary,
  ColumnType,
  QuerySource,
  ResultColumn,
  Row,
  RowSource,
  StaticSource,
} from './catalog/types.js';
export { buildStatement } from './query/builder.js';
export type { BoundParameter, BoundStatement, BuildOptions, RestrictionSet } from './query/types.js';
export { PostgresStatementExecutor } from './store/executor.js';
export type { PostgresExecutorConfig } from './store/executor.js';
export type { ExecuteOptions, FetchOptions, MetadataSource, RawRow, ResultSet, StatementExecutor } from './types.js';
export {
  CatalogDefinitionError,
  ExecutionFailedError,
  MalformedRestrictionError,
  MetadataCatalogError,
  RowProjectionError,
  UnknownCollectionError,
} from './errors.js';
