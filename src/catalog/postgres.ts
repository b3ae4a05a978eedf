import reservedWords from './reserved-words.json' with { type: 'json' };
import { CollectionCatalog } from './catalog.js';
import type { CollectionDescriptor, ResultColumn, Row } from './types.js';
import { restrictionColumnsOf } from './types.js';

const text = (name: string): ResultColumn => ({ name, type: 'string' });
const int = (name: string): ResultColumn => ({ name, type: 'integer' });
const bool = (name: string): ResultColumn => ({ name, type: 'boolean' });

// Keywords reserved in PostgreSQL (SQL Key Words appendix, "reserved" column).
const reservedWordRows: readonly Row[] = Object.freeze(
  reservedWords.map((word) => Object.freeze({ ReservedWord: word })),
);

export const reservedWordsCollection: CollectionDescriptor = {
  name: 'ReservedWords',
  resultColumns: [text('ReservedWord')],
  source: { kind: 'static', rows: () => reservedWordRows },
  identifierParts: 0,
};

const dataSourceInformation: CollectionDescriptor = {
  name: 'DataSourceInformation',
  resultColumns: [
    text('CompositeIdentifierSeparatorPattern'),
    text('DataSourceProductName'),
    text('DataSourceProductVersion'),
    text('DataSourceProductVersionNormalized'),
    int('GroupByBehavior'),
    text('IdentifierPattern'),
    int('IdentifierCase'),
    bool('OrderByColumnsInSelect'),
    text('ParameterMarkerFormat'),
    text('ParameterMarkerPattern'),
    int('ParameterNameMaxLength'),
    text('ParameterNamePattern'),
    text('QuotedIdentifierPattern'),
    int('QuotedIdentifierCase'),
    text('StatementSeparatorPattern'),
    text('StringLiteralPattern'),
    int('SupportedJoinOperators'),
  ],
  source: {
    kind: 'query',
    template: [
      'SELECT',
      `'\\.' AS "CompositeIdentifierSeparatorPattern",`,
      `'PostgreSQL' AS "DataSourceProductName",`,
      `current_setting('server_version') AS "DataSourceProductVersion",`,
      `current_setting('server_version_num') AS "DataSourceProductVersionNormalized",`,
      `3 AS "GroupByBehavior",`,
      `'(^[a-zA-Z_][a-zA-Z0-9_$]*$)|(^"([^"]|"")+"$)' AS "IdentifierPattern",`,
      `1 AS "IdentifierCase",`,
      `false AS "OrderByColumnsInSelect",`,
      `':{0}' AS "ParameterMarkerFormat",`,
      `':([a-zA-Z_][a-zA-Z0-9_]*)' AS "ParameterMarkerPattern",`,
      `63 AS "ParameterNameMaxLength",`,
      `'^[a-zA-Z_][a-zA-Z0-9_]*$' AS "ParameterNamePattern",`,
      `'"(([^"]|"")*)"' AS "QuotedIdentifierPattern",`,
      `2 AS "QuotedIdentifierCase",`,
      `';' AS "StatementSeparatorPattern",`,
      `'''(([^'']|'''')*)''' AS "StringLiteralPattern",`,
      `15 AS "SupportedJoinOperators"`,
    ].join('\n'),
    restrictionColumns: [],
  },
  identifierParts: 0,
};

const databases: CollectionDescriptor = {
  name: 'Databases',
  resultColumns: [text('database_name'), text('owner'), text('encoding')],
  source: {
    kind: 'query',
    template:
      'SELECT d.datname AS database_name, u.usename AS owner, pg_catalog.pg_encoding_to_char(d.encoding) AS encoding ' +
      'FROM pg_catalog.pg_database d LEFT JOIN pg_catalog.pg_user u ON d.datdba = u.usesysid',
    restrictionColumns: ['datname'],
  },
  identifierParts: 1,
};

const tables: CollectionDescriptor = {
  name: 'Tables',
  resultColumns: [text('table_catalog'), text('table_schema'), text('table_name'), text('table_type')],
  source: {
    kind: 'query',
    template: 'SELECT table_catalog, table_schema, table_name, table_type FROM information_schema.tables',
    restrictionColumns: ['table_catalog', 'table_schema', 'table_name', 'table_type'],
  },
  identifierParts: 3,
};

const columns: CollectionDescriptor = {
  name: 'Columns',
  resultColumns: [
    text('table_catalog'),
    text('table_schema'),
    text('table_name'),
    text('column_name'),
    int('ordinal_position'),
    text('column_default'),
    text('is_nullable'),
    text('data_type'),
    int('character_maximum_length'),
    int('character_octet_length'),
    int('numeric_precision'),
    int('numeric_precision_radix'),
    int('numeric_scale'),
    int('datetime_precision'),
    text('character_set_catalog'),
    text('character_set_schema'),
    text('character_set_name'),
    text('collation_catalog'),
  ],
  source: {
    kind: 'query',
    template:
      'SELECT table_catalog, table_schema, table_name, column_name, ordinal_position, column_default, is_nullable, ' +
      'udt_name AS data_type, character_maximum_length, character_octet_length, numeric_precision, ' +
      'numeric_precision_radix, numeric_scale, datetime_precision, character_set_catalog, character_set_schema, ' +
      'character_set_name, collation_catalog FROM information_schema.columns',
    restrictionColumns: ['table_catalog', 'table_schema', 'table_name', 'column_name'],
  },
  identifierParts: 4,
};

const views: CollectionDescriptor = {
  name: 'Views',
  resultColumns: [
    text('table_catalog'),
    text('table_schema'),
    text('table_name'),
    text('check_option'),
    text('is_updatable'),
  ],
  source: {
    kind: 'query',
    template: 'SELECT table_catalog, table_schema, table_name, check_option, is_updatable FROM information_schema.views',
    restrictionColumns: ['table_catalog', 'table_schema', 'table_name'],
  },
  identifierParts: 3,
};

const users: CollectionDescriptor = {
  name: 'Users',
  resultColumns: [text('user_name'), int('user_sysid')],
  source: {
    kind: 'query',
    template: 'SELECT usename AS user_name, usesysid AS user_sysid FROM pg_catalog.pg_user',
    restrictionColumns: ['usename'],
  },
  identifierParts: 1,
};

// The index queries filter on their output names, so the catalog join sits in
// a derived table and the outer WHERE is already open for AND.
const indexes: CollectionDescriptor = {
  name: 'Indexes',
  resultColumns: [text('table_catalog'), text('table_schema'), text('table_name'), text('index_name')],
  source: {
    kind: 'query',
    template: [
      'SELECT table_catalog, table_schema, table_name, index_name FROM (',
      '  SELECT current_database()::text AS table_catalog, n.nspname::text AS table_schema,',
      '    t.relname::text AS table_name, i.relname::text AS index_name',
      '  FROM pg_catalog.pg_class i',
      '  JOIN pg_catalog.pg_index ix ON ix.indexrelid = i.oid',
      '  JOIN pg_catalog.pg_class t ON ix.indrelid = t.oid',
      '  LEFT JOIN pg_catalog.pg_namespace n ON n.oid = i.relnamespace',
      `  WHERE i.relkind = 'i' AND t.relkind = 'r' AND pg_catalog.pg_table_is_visible(i.oid)`,
      ') AS indexes',
      `WHERE table_schema NOT IN ('pg_catalog', 'pg_toast')`,
    ].join('\n'),
    restrictionColumns: ['table_catalog', 'table_schema', 'table_name', 'index_name'],
    continuesWhere: true,
  },
  identifierParts: 4,
};

const indexColumns: CollectionDescriptor = {
  name: 'IndexColumns',
  resultColumns: [
    text('table_catalog'),
    text('table_schema'),
    text('table_name'),
    text('index_name'),
    text('column_name'),
  ],
  source: {
    kind: 'query',
    template: [
      'SELECT table_catalog, table_schema, table_name, index_name, column_name FROM (',
      '  SELECT current_database()::text AS table_catalog, n.nspname::text AS table_schema,',
      '    t.relname::text AS table_name, i.relname::text AS index_name, a.attname::text AS column_name',
      '  FROM pg_catalog.pg_class t',
      '  JOIN pg_catalog.pg_index ix ON t.oid = ix.indrelid',
      '  JOIN pg_catalog.pg_class i ON ix.indexrelid = i.oid',
      '  JOIN pg_catalog.pg_attribute a ON t.oid = a.attrelid AND a.attnum = ANY(ix.indkey)',
      '  LEFT JOIN pg_catalog.pg_namespace n ON i.relnamespace = n.oid',
      `  WHERE i.relkind = 'i' AND t.relkind = 'r' AND pg_catalog.pg_table_is_visible(i.oid)`,
      ') AS index_columns',
      `WHERE table_schema NOT IN ('pg_catalog', 'pg_toast')`,
    ].join('\n'),
    restrictionColumns: ['table_catalog', 'table_schema', 'table_name', 'index_name', 'column_name'],
    continuesWhere: true,
  },
  identifierParts: 5,
};

/**
 * Prepends the two collections that describe the catalog itself:
 * MetaDataCollections (one row per collection) and Restrictions (one row per
 * restriction column, numbered from 1).
 */
export function withCatalogCollections(descriptors: readonly CollectionDescriptor[]): CollectionDescriptor[] {
  const metaDataCollections: CollectionDescriptor = {
    name: 'MetaDataCollections',
    resultColumns: [text('CollectionName'), int('NumberOfRestrictions'), int('NumberOfIdentifierParts')],
    source: {
      kind: 'static',
      rows: () =>
        all.map((descriptor) => ({
          CollectionName: descriptor.name,
          NumberOfRestrictions: restrictionColumnsOf(descriptor).length,
          NumberOfIdentifierParts: descriptor.identifierParts ?? 0,
        })),
    },
    identifierParts: 0,
  };

  const restrictions: CollectionDescriptor = {
    name: 'Restrictions',
    resultColumns: [
      text('CollectionName'),
      text('RestrictionName'),
      text('RestrictionDefault'),
      int('RestrictionNumber'),
    ],
    source: {
      kind: 'static',
      rows: () =>
        all.flatMap((descriptor) =>
          restrictionColumnsOf(descriptor).map((column, index) => ({
            CollectionName: descriptor.name,
            RestrictionName: column,
            RestrictionDefault: column,
            RestrictionNumber: index + 1,
          })),
        ),
    },
    identifierParts: 0,
  };

  const all: CollectionDescriptor[] = [metaDataCollections, restrictions, ...descriptors];
  return all;
}

export const postgresCollections: readonly CollectionDescriptor[] = Object.freeze(
  withCatalogCollections([
    dataSourceInformation,
    reservedWordsCollection,
    databases,
    tables,
    columns,
    views,
    users,
    indexes,
    indexColumns,
  ]),
);

export const postgresCatalog = new CollectionCatalog(postgresCollections);
