/**
 * Callable members that can be merged into an entity by a patch, and the
 * display metadata computed fields carry into projections.
 */

export type AnyFunction = (...args: never[]) => unknown;

const BEHAVIOR = Symbol('entity-kit.behavior');

export type Behavior =
  | {
      readonly [BEHAVIOR]: true;
      readonly kind: 'property';
      readonly get: (this: never) => unknown;
      readonly set?: (this: never, value: never) => void;
    }
  | {
      readonly [BEHAVIOR]: true;
      readonly kind: 'staticMethod' | 'classMethod';
      readonly fn: AnyFunction;
    };

export function isBehavior(value: unknown): value is Behavior {
  return typeof value === 'object' && value !== null && BEHAVIOR in value;
}

/** An accessor installed on the entity prototype. */
export function property<T, V>(
  get: (this: T) => V,
  set?: (this: T, value: V) => void
): Behavior {
  return set ? { [BEHAVIOR]: true, kind: 'property', get, set } : { [BEHAVIOR]: true, kind: 'property', get };
}

/** A function installed on the entity class itself. */
export function staticMethod(fn: AnyFunction): Behavior {
  return { [BEHAVIOR]: true, kind: 'staticMethod', fn };
}

/** A function installed on the entity class, always called with the class as `this`. */
export function classMethod(fn: AnyFunction): Behavior {
  return { [BEHAVIOR]: true, kind: 'classMethod', fn };
}

export interface ComputedDescription {
  /** Output key used instead of the requested field name. */
  name?: string;
  /** Label reported in comment mode. */
  shortDescription?: string;
}

const descriptions = new WeakMap<object, ComputedDescription>();

/**
 * Attach display metadata to a method used as a projected field.
 *
 * @example
 * ```ts
 * patchEntity(Author, {
 *   displayName: computed(function (this: Author) {
 *     return this.name.toUpperCase();
 *   }, { name: 'display', shortDescription: 'Display name' }),
 * });
 * ```
 */
export function computed<F extends AnyFunction>(fn: F, description: ComputedDescription): F {
  descriptions.set(fn, description);
  return fn;
}

export function getComputedDescription(fn: object): ComputedDescription | undefined {
  return descriptions.get(fn);
}
