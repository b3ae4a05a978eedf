import type { BoundStatement } from '../query/types.js';

export interface PositionalStatement {
  text: string;
  values: string[];
}

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_]/;

/**
 * Rewrites `:name` placeholders as pg's `$1`, `$2`… markers. Text inside
 * single-quoted literals and double-quoted identifiers is copied as-is, as
 * are `::type` casts. A name used twice reuses its first marker. Placeholders
 * with no bound parameter are left untouched.
 */
export function toPositional(statement: BoundStatement): PositionalStatement {
  const bound = new Map<string, string>();
  for (const parameter of statement.parameters) {
    if (!bound.has(parameter.name)) bound.set(parameter.name, parameter.value);
  }

  const markers = new Map<string, number>();
  const values: string[] = [];
  const source = statement.text;
  let out = '';
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (ch === "'" || ch === '"') {
      // Doubled quotes inside the literal are two adjacent quoted runs, so a
      // plain scan to the next quote copies them correctly.
      const close = source.indexOf(ch, i + 1);
      const end = close === -1 ? source.length : close + 1;
      out += source.slice(i, end);
      i = end;
      continue;
    }

    if (ch === ':' && source.charAt(i + 1) === ':') {
      out += '::';
      i += 2;
      continue;
    }

    if (ch === ':' && IDENTIFIER_START.test(source.charAt(i + 1))) {
      let end = i + 2;
      while (end < source.length && IDENTIFIER_PART.test(source.charAt(end))) end++;
      const name = source.slice(i + 1, end);
      const value = bound.get(name);
      if (value === undefined) {
        out += source.slice(i, end);
      } else {
        let marker = markers.get(name);
        if (marker === undefined) {
          values.push(value);
          marker = values.length;
          markers.set(name, marker);
        }
        out += `$${marker}`;
      }
      i = end;
      continue;
    }

    out += ch;
    i++;
  }

  return { text: out, values };
}
