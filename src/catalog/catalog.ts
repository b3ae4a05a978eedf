import { CatalogDefinitionError, UnknownCollectionError } from '../errors.js';
import type { CollectionDescriptor, CollectionSummary } from './types.js';
import { restrictionColumnsOf } from './types.js';

// Freezes a descriptor together with its columns and source.
function freezeDescriptor(descriptor: CollectionDescriptor): CollectionDescriptor {
  for (const column of descriptor.resultColumns) Object.freeze(column);
  Object.freeze(descriptor.resultColumns);
  if (descriptor.source.kind === 'query') Object.freeze(descriptor.source.restrictionColumns);
  Object.freeze(descriptor.source);
  return Object.freeze(descriptor);
}

/**
 * Read-only lookup of collection descriptors. Names are matched without
 * regard to case; listing keeps declaration order.
 */
export class CollectionCatalog {
  private readonly byName: ReadonlyMap<string, CollectionDescriptor>;
  private readonly ordered: readonly CollectionDescriptor[];

  constructor(descriptors: readonly CollectionDescriptor[]) {
    const byName = new Map<string, CollectionDescriptor>();
    for (const descriptor of descriptors) {
      const key = descriptor.name.toLowerCase();
      if (byName.has(key)) {
        throw new CatalogDefinitionError(`Collection "${descriptor.name}" is defined more than once`);
      }
      byName.set(key, freezeDescriptor(descriptor));
    }
    this.byName = byName;
    this.ordered = Object.freeze([...byName.values()]);
  }

  has(name: string): boolean {
    return this.byName.has(name.toLowerCase());
  }

  resolve(name: string): CollectionDescriptor {
    const descriptor = this.byName.get(name.toLowerCase());
    if (descriptor === undefined) {
      throw new UnknownCollectionError(name);
    }
    return descriptor;
  }

  descriptors(): readonly CollectionDescriptor[] {
    return this.ordered;
  }

  list(): CollectionSummary[] {
    return this.ordered.map((descriptor) => ({
      name: descriptor.name,
      restrictionColumns: restrictionColumnsOf(descriptor),
    }));
  }
}
