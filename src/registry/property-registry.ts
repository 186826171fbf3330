/**
 * Property Registry
 *
 * Immutable lookup from a user-facing property name to its get/set
 * command strings and help text. Built once at startup and passed by
 * reference to everything that resolves property names.
 */

import { ConfigError } from '../errors';
import { PropertyDescriptor } from './types';

export class PropertyRegistry {
  private readonly byName: ReadonlyMap<string, PropertyDescriptor>;
  private readonly ordered: readonly PropertyDescriptor[];

  constructor(descriptors: readonly PropertyDescriptor[]) {
    const byName = new Map<string, PropertyDescriptor>();
    for (const descriptor of descriptors) {
      const key = descriptor.name.toLowerCase();
      if (byName.has(key)) {
        throw new ConfigError(`Duplicate property name: ${descriptor.name}`);
      }
      byName.set(key, Object.freeze({ ...descriptor }));
    }
    this.byName = byName;
    this.ordered = Object.freeze(Array.from(byName.values()));
  }

  /** Case-insensitive; undefined when no property has that name */
  lookup(name: string): PropertyDescriptor | undefined {
    return this.byName.get(name.toLowerCase());
  }

  /** Every property, in profile order */
  forGet(): readonly PropertyDescriptor[] {
    return this.ordered;
  }

  /** Only properties that accept a value */
  forSet(): readonly PropertyDescriptor[] {
    return this.ordered.filter((d) => d.setCommand !== undefined);
  }

  get size(): number {
    return this.ordered.length;
  }
}
