/**
 * Field descriptors: one declared attribute of an entity.
 *
 * Every descriptor takes a declaration order from a process-wide counter when
 * it is constructed, the way column order follows declaration order in the
 * entity class. Patching a field over an existing one keeps the old order.
 */

/** Relation variant of a field, fixed when the field is declared. */
export type FieldKind = 'plain' | 'toOne' | 'toMany';

/** Constructor of a related entity, used to hydrate nested plain records. */
export type EntityFactory = new (data?: Record<string, unknown>) => object;

export interface FieldOptions {
  /** Human readable label, reported in comment mode. */
  verboseName?: string;
  /** Marks the primary key field. */
  primaryKey?: boolean;
  /** Value used when an instance is created without this field. Functions are called per instance. */
  default?: unknown;
}

export interface FieldInit extends FieldOptions {
  kind?: FieldKind;
  target?: () => EntityFactory;
  name?: string;
  declarationOrder?: number;
}

let creationCounter = 0;

function nextDeclarationOrder(): number {
  creationCounter += 1;
  return creationCounter;
}

export class Field {
  readonly name: string;
  readonly declarationOrder: number;
  readonly kind: FieldKind;
  readonly verboseName: string | undefined;
  readonly primaryKey: boolean;
  private readonly init: FieldInit;

  constructor(init: FieldInit = {}) {
    this.init = init;
    this.name = init.name ?? '';
    this.declarationOrder = init.declarationOrder ?? nextDeclarationOrder();
    this.kind = init.kind ?? 'plain';
    this.verboseName = init.verboseName;
    this.primaryKey = init.primaryKey ?? false;
  }

  get isRelation(): boolean {
    return this.kind !== 'plain';
  }

  /** To-many descriptors live in the schema's many-to-many list. */
  get isManyToMany(): boolean {
    return this.kind === 'toMany';
  }

  get hasDefault(): boolean {
    return this.init.default !== undefined;
  }

  getDefault(): unknown {
    const value = this.init.default;
    return typeof value === 'function' ? value() : value;
  }

  /** Entity class on the other side of a relation, if one was declared. */
  relatedEntity(): EntityFactory | undefined {
    return this.init.target?.();
  }

  /** Copy declared anew: same settings, next declaration order. */
  redeclare(): Field {
    return new Field({ ...this.init, name: this.name, declarationOrder: nextDeclarationOrder() });
  }

  /**
   * Copy of this descriptor. Attached descriptors are never mutated; the
   * schema holds copies carrying the attribute name and final order.
   */
  clone(overrides: { name?: string; declarationOrder?: number } = {}): Field {
    return new Field({
      ...this.init,
      name: overrides.name ?? this.name,
      declarationOrder: overrides.declarationOrder ?? this.declarationOrder,
    });
  }
}

/** A stored, non-relational field. */
export function field(options: FieldOptions = {}): Field {
  return new Field({ ...options, kind: 'plain' });
}

/** A foreign-key style relation to a single entity. */
export function toOne(target: () => EntityFactory, options: Omit<FieldOptions, 'primaryKey'> = {}): Field {
  return new Field({ ...options, kind: 'toOne', target });
}

/** A relation to a collection of entities. */
export function toMany(target: () => EntityFactory, options: Omit<FieldOptions, 'primaryKey'> = {}): Field {
  return new Field({ ...options, kind: 'toMany', target });
}
