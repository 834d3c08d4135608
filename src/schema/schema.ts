import { SchemaShapeError } from '../core/exceptions.js';
import type { Field } from './fields.js';

/** Kind of callable member merged into an entity by a patch. */
export type BehaviorKind = 'method' | 'property' | 'staticMethod' | 'classMethod';

export interface SchemaParts {
  localFields: readonly Field[];
  localManyToMany: readonly Field[];
  behaviors?: ReadonlyMap<string, BehaviorKind>;
}

function byDeclarationOrder(a: Field, b: Field): number {
  return a.declarationOrder - b.declarationOrder;
}

/**
 * Field and behavior metadata of one entity type.
 *
 * Plain and to-one descriptors are kept in `localFields`, to-many descriptors
 * in `localManyToMany`; both are ordered by declaration order. No two
 * descriptors share a name across the two lists.
 */
export class EntitySchema {
  readonly name: string;
  readonly localFields: readonly Field[];
  readonly localManyToMany: readonly Field[];
  readonly behaviors: ReadonlyMap<string, BehaviorKind>;

  constructor(name: string, parts: SchemaParts) {
    this.name = name;
    this.localFields = [...parts.localFields].sort(byDeclarationOrder);
    this.localManyToMany = [...parts.localManyToMany].sort(byDeclarationOrder);
    this.behaviors = new Map(parts.behaviors ?? []);

    const seen = new Set<string>();
    for (const descriptor of [...this.localFields, ...this.localManyToMany]) {
      if (seen.has(descriptor.name)) {
        throw new SchemaShapeError(`Duplicate field '${descriptor.name}' in schema '${name}'`);
      }
      seen.add(descriptor.name);
    }
  }

  /** All descriptors, ordered by declaration order. */
  get fields(): Field[] {
    return [...this.localFields, ...this.localManyToMany].sort(byDeclarationOrder);
  }

  get fieldNames(): string[] {
    return this.fields.map((descriptor) => descriptor.name);
  }

  /** Name of the primary key field, `id` when none is flagged. */
  get primaryKey(): string {
    return this.localFields.find((descriptor) => descriptor.primaryKey)?.name ?? 'id';
  }

  getField(name: string): Field | undefined {
    return (
      this.localFields.find((descriptor) => descriptor.name === name) ??
      this.localManyToMany.find((descriptor) => descriptor.name === name)
    );
  }

  hasField(name: string): boolean {
    return this.getField(name) !== undefined;
  }
}

/**
 * Build a schema from a name → descriptor record. Each descriptor is attached
 * as a copy carrying its attribute name.
 *
 * @example
 * ```ts
 * const schema = defineSchema('Book', {
 *   id: field({ primaryKey: true }),
 *   title: field({ verboseName: 'Title' }),
 *   author: toOne(() => Author, { verboseName: 'Author' }),
 * });
 * ```
 */
export function defineSchema(name: string, fields: Record<string, Field>): EntitySchema {
  const localFields: Field[] = [];
  const localManyToMany: Field[] = [];

  for (const [fieldName, descriptor] of Object.entries(fields)) {
    const attached = descriptor.clone({ name: fieldName });
    if (attached.isManyToMany) {
      localManyToMany.push(attached);
    } else {
      localFields.push(attached);
    }
  }

  return new EntitySchema(name, { localFields, localManyToMany });
}
