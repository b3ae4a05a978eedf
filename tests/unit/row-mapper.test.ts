import { describe, it, expect } from 'vitest';
import { projectRow } from '../../src/reader/row-mapper.js';
import type { ResultColumn } from '../../src/catalog/types.js';
import { RowProjectionError } from '../../src/errors.js';

const columns: ResultColumn[] = [
  { name: 'name', type: 'string' },
  { name: 'position', type: 'integer' },
  { name: 'nullable', type: 'boolean' },
];

describe('projectRow', () => {
  describe('shape', () => {
    it('keeps exactly the declared columns, in declared order', () => {
      const row = projectRow('C', columns, { nullable: true, extra: 'dropped', position: 1, name: 'id' });
      expect(row).toEqual({ name: 'id', position: 1, nullable: true });
      expect(Object.keys(row)).toEqual(['name', 'position', 'nullable']);
    });

    it('fills columns missing from the raw row with null', () => {
      expect(projectRow('C', columns, {})).toEqual({ name: null, position: null, nullable: null });
    });

    it('keeps null values as null', () => {
      expect(projectRow('C', columns, { name: null, position: null, nullable: null }))
        .toEqual({ name: null, position: null, nullable: null });
    });

    it('returns a frozen row', () => {
      expect(Object.isFrozen(projectRow('C', columns, { name: 'id' }))).toBe(true);
    });
  });

  describe('integer columns', () => {
    it('parses numeric strings as pg returns int8 and oid', () => {
      expect(projectRow('C', columns, { position: '42' })['position']).toBe(42);
      expect(projectRow('C', columns, { position: '-7' })['position']).toBe(-7);
    });

    it('converts bigint values', () => {
      expect(projectRow('C', columns, { position: 10n })['position']).toBe(10);
    });

    it('rejects integers beyond the safe range', () => {
      expect(() => projectRow('C', columns, { position: '9007199254740993' })).toThrow(RowProjectionError);
      expect(() => projectRow('C', columns, { position: 9007199254740993n })).toThrow(RowProjectionError);
      expect(() => projectRow('C', columns, { position: 2 ** 53 })).toThrow(RowProjectionError);
    });

    it('accepts the largest safe integer', () => {
      expect(projectRow('C', columns, { position: '9007199254740991' })['position']).toBe(Number.MAX_SAFE_INTEGER);
    });

    it('rejects non-numeric strings', () => {
      expect(() => projectRow('C', columns, { position: 'abc' })).toThrow(RowProjectionError);
    });

    it('rejects fractional numbers', () => {
      expect(() => projectRow('C', columns, { position: 1.5 })).toThrow(RowProjectionError);
    });

    it('describes the offending value', () => {
      try {
        projectRow('Columns', columns, { position: 'abc' });
        expect.fail('Expected RowProjectionError');
      } catch (err) {
        expect(err).toBeInstanceOf(RowProjectionError);
        if (err instanceof RowProjectionError) {
          expect(err.collection).toBe('Columns');
          expect(err.column).toBe('position');
          expect(err.value).toBe('abc');
          expect(err.message).toBe('Collection "Columns" column "position" expected integer, got "abc"');
        }
      }
    });
  });

  describe('string columns', () => {
    it('renders numbers and booleans as text', () => {
      expect(projectRow('C', columns, { name: 5 })['name']).toBe('5');
      expect(projectRow('C', columns, { name: false })['name']).toBe('false');
    });

    it('rejects objects', () => {
      expect(() => projectRow('C', columns, { name: { a: 1 } })).toThrow(RowProjectionError);
    });
  });

  describe('boolean columns', () => {
    it('accepts booleans and their pg text forms', () => {
      expect(projectRow('C', columns, { nullable: false })['nullable']).toBe(false);
      expect(projectRow('C', columns, { nullable: 't' })['nullable']).toBe(true);
      expect(projectRow('C', columns, { nullable: 'false' })['nullable']).toBe(false);
    });

    it('rejects other strings', () => {
      expect(() => projectRow('C', columns, { nullable: 'YES' })).toThrow(RowProjectionError);
    });
  });
});
