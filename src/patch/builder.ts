import type { Field } from '../schema/fields.js';
import { EntitySchema, type BehaviorKind } from '../schema/schema.js';

/**
 * Builds a patched copy of an entity schema. The base schema is left as is.
 *
 * @example
 * ```ts
 * const next = new SchemaPatchBuilder(User.schema)
 *   .field('email', field({ verboseName: 'E-mail address' }))
 *   .behavior('save', 'method')
 *   .build();
 * ```
 */
export class SchemaPatchBuilder {
  private readonly localFields: Field[];
  private readonly localManyToMany: Field[];
  private readonly behaviors: Map<string, BehaviorKind>;

  constructor(private readonly base: EntitySchema) {
    this.localFields = [...base.localFields];
    this.localManyToMany = [...base.localManyToMany];
    this.behaviors = new Map(base.behaviors);
  }

  /**
   * Attach a descriptor under `name`. An existing descriptor with that name
   * is removed and its declaration order carried over. Plain fields are
   * searched before many-to-many fields; the search ends at the first list
   * holding a match.
   */
  field(name: string, incoming: Field): this {
    let declarationOrder = incoming.declarationOrder;

    for (const list of [this.localFields, this.localManyToMany]) {
      const index = list.findIndex((descriptor) => descriptor.name === name);
      if (index === -1) continue;
      declarationOrder = list[index].declarationOrder;
      list.splice(index, 1);
      break;
    }

    const attached = incoming.clone({ name, declarationOrder });
    if (attached.isManyToMany) {
      this.localManyToMany.push(attached);
    } else {
      this.localFields.push(attached);
    }
    return this;
  }

  behavior(name: string, kind: BehaviorKind): this {
    this.behaviors.set(name, kind);
    return this;
  }

  build(): EntitySchema {
    return new EntitySchema(this.base.name, {
      localFields: this.localFields,
      localManyToMany: this.localManyToMany,
      behaviors: this.behaviors,
    });
  }
}
