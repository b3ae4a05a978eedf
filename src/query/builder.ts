import { MalformedRestrictionError } from '../errors.js';
import type { BoundParameter, BoundStatement, BuildOptions, RestrictionSet } from './types.js';

export function isPresent(value: string | null | undefined): value is string {
  return value !== null && value !== undefined && value.length !== 0;
}

/**
 * Appends one `column = :column` predicate per present restriction to the
 * template. Restrictions and columns are paired by index; positions past the
 * shorter of the two lists are ignored. Values are only ever bound as
 * parameters, never written into the text.
 *
 * @example
 * buildStatement('SELECT * FROM information_schema.tables',
 *   ['table_catalog', 'table_schema'], ['', 'public'])
 * // text:       'SELECT * FROM information_schema.tables WHERE table_schema = :table_schema'
 * // parameters: [{ name: 'table_schema', value: 'public' }]
 */
export function buildStatement(
  template: string,
  restrictionColumns: readonly string[],
  restrictions: RestrictionSet = [],
  options: BuildOptions = {},
): BoundStatement {
  if (options.strict === true && restrictions.length > restrictionColumns.length) {
    throw new MalformedRestrictionError(options.collection, restrictionColumns.length, restrictions.length);
  }

  const predicates: string[] = [];
  const parameters: BoundParameter[] = [];
  const limit = Math.min(restrictions.length, restrictionColumns.length);

  for (let i = 0; i < limit; i++) {
    const value = restrictions[i];
    const column = restrictionColumns[i];
    if (column === undefined || !isPresent(value)) continue;
    predicates.push(`${column} = :${column}`);
    parameters.push(Object.freeze({ name: column, value }));
  }

  let text = template;
  predicates.forEach((predicate, index) => {
    const joiner = index === 0 && options.continuesWhere !== true ? ' WHERE ' : ' AND ';
    text += joiner + predicate;
  });

  return Object.freeze({ text, parameters: Object.freeze(parameters) });
}
