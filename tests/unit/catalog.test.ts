import { describe, it, expect } from 'vitest';
import { CollectionCatalog } from '../../src/catalog/catalog.js';
import type { CollectionDescriptor } from '../../src/catalog/types.js';
import { CatalogDefinitionError, UnknownCollectionError } from '../../src/errors.js';

const widgets: CollectionDescriptor = {
  name: 'Widgets',
  resultColumns: [{ name: 'widget_name', type: 'string' }],
  source: { kind: 'query', template: 'SELECT widget_name FROM widgets', restrictionColumns: ['widget_name'] },
};

const colours: CollectionDescriptor = {
  name: 'Colours',
  resultColumns: [{ name: 'colour', type: 'string' }],
  source: { kind: 'static', rows: () => [{ colour: 'red' }] },
};

describe('CollectionCatalog', () => {
  it('resolves a registered collection', () => {
    const catalog = new CollectionCatalog([widgets, colours]);
    expect(catalog.resolve('Widgets')).toBe(widgets);
  });

  it('resolves names regardless of case', () => {
    const catalog = new CollectionCatalog([widgets]);
    expect(catalog.resolve('widgets')).toBe(widgets);
    expect(catalog.resolve('WIDGETS')).toBe(widgets);
  });

  it('throws UnknownCollectionError for an unregistered name', () => {
    const catalog = new CollectionCatalog([widgets]);
    expect(() => catalog.resolve('Gadgets')).toThrow(UnknownCollectionError);
    try {
      catalog.resolve('Gadgets');
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownCollectionError);
      if (err instanceof UnknownCollectionError) {
        expect(err.collection).toBe('Gadgets');
      }
    }
  });

  it('reports membership with has()', () => {
    const catalog = new CollectionCatalog([widgets]);
    expect(catalog.has('Widgets')).toBe(true);
    expect(catalog.has('widgets')).toBe(true);
    expect(catalog.has('Colours')).toBe(false);
  });

  it('rejects two collections whose names differ only by case', () => {
    expect(() => new CollectionCatalog([widgets, { ...colours, name: 'WIDGETS' }])).toThrow(CatalogDefinitionError);
  });

  it('lists collections in declaration order with their restriction columns', () => {
    const catalog = new CollectionCatalog([widgets, colours]);
    expect(catalog.list()).toEqual([
      { name: 'Widgets', restrictionColumns: ['widget_name'] },
      { name: 'Colours', restrictionColumns: [] },
    ]);
  });

  it('lists the same collections on every call', () => {
    const catalog = new CollectionCatalog([colours, widgets]);
    expect(catalog.list()).toEqual(catalog.list());
    expect(catalog.descriptors()).toBe(catalog.descriptors());
  });

  it('is not affected by later changes to the input array', () => {
    const input = [widgets];
    const catalog = new CollectionCatalog(input);
    input.push(colours);
    expect(catalog.descriptors()).toEqual([widgets]);
  });

  it('freezes each descriptor with its columns and source', () => {
    const descriptor: CollectionDescriptor = {
      name: 'Gadgets',
      resultColumns: [{ name: 'gadget_name', type: 'string' }],
      source: { kind: 'query', template: 'SELECT gadget_name FROM gadgets', restrictionColumns: ['gadget_name'] },
    };
    new CollectionCatalog([descriptor]);
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.resultColumns)).toBe(true);
    expect(Object.isFrozen(descriptor.resultColumns[0])).toBe(true);
    expect(Object.isFrozen(descriptor.source)).toBe(true);
    if (descriptor.source.kind === 'query') {
      expect(Object.isFrozen(descriptor.source.restrictionColumns)).toBe(true);
    }
  });

  it('rejects changes to the restriction columns it lists', () => {
    const catalog = new CollectionCatalog([widgets]);
    const [summary] = catalog.list();
    expect(() => (summary!.restrictionColumns as string[]).push('widget_colour')).toThrow(TypeError);
    expect(catalog.list()).toEqual([{ name: 'Widgets', restrictionColumns: ['widget_name'] }]);
  });
});
