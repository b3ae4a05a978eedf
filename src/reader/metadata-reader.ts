import type { CollectionCatalog } from '../catalog/catalog.js';
import { postgresCatalog } from '../catalog/postgres.js';
import type { CollectionDescriptor, CollectionSummary } from '../catalog/types.js';
import { ExecutionFailedError } from '../errors.js';
import { buildStatement } from '../query/builder.js';
import type { BoundStatement, RestrictionSet } from '../query/types.js';
import type { FetchOptions, MetadataSource, RawRow, ResultSet, StatementExecutor } from '../types.js';
import { projectRow } from './row-mapper.js';

export interface MetadataReaderConfig {
  executor: StatementExecutor;
  /** Defaults to the built-in PostgreSQL collections. */
  catalog?: CollectionCatalog;
  /** Reject restriction sets longer than a collection's restriction columns. */
  strict?: boolean;
}

export class MetadataReader implements MetadataSource {
  private readonly executor: StatementExecutor;
  private readonly catalog: CollectionCatalog;
  private readonly strict: boolean;

  constructor(config: MetadataReaderConfig) {
    this.executor = config.executor;
    this.catalog = config.catalog ?? postgresCatalog;
    this.strict = config.strict ?? false;
  }

  listCollections(): CollectionSummary[] {
    return this.catalog.list();
  }

  async fetch(name: string, restrictions: RestrictionSet = [], options: FetchOptions = {}): Promise<ResultSet> {
    const descriptor = this.catalog.resolve(name);
    const { source } = descriptor;

    if (source.kind === 'static') {
      return this.toResultSet(descriptor, source.rows());
    }

    const statement = buildStatement(source.template, source.restrictionColumns, restrictions, {
      continuesWhere: source.continuesWhere ?? false,
      strict: options.strict ?? this.strict,
      collection: descriptor.name,
    });
    const rows = await this.run(descriptor, statement, options.signal);
    return this.toResultSet(descriptor, rows);
  }

  private async run(
    descriptor: CollectionDescriptor,
    statement: BoundStatement,
    signal: AbortSignal | undefined,
  ): Promise<readonly RawRow[]> {
    try {
      return await this.executor.execute(statement, signal === undefined ? {} : { signal });
    } catch (err) {
      if (err instanceof ExecutionFailedError) throw err;
      throw new ExecutionFailedError(descriptor.name, statement.text, err);
    }
  }

  private toResultSet(descriptor: CollectionDescriptor, rows: readonly RawRow[]): ResultSet {
    return {
      collection: descriptor.name,
      columns: descriptor.resultColumns,
      rows: rows.map((row) => projectRow(descriptor.name, descriptor.resultColumns, row)),
    };
  }
}
