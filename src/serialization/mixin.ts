import type { Entity } from '../schema/entity.js';
import { autoInfo, fullInfo, simpleInfo } from './project.js';
import type { InfoRecord, ProjectOptions, ViewMode } from './types.js';
import { getViewMode, setFull, setSimple } from './view-state.js';

/**
 * Constructor type for entity classes. Mixins require a rest parameter of
 * type any[].
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type EntityConstructor = abstract new (...args: any[]) => Entity;

/**
 * Interface for the projection methods added by the withInfo mixin.
 */
export interface InfoMethods {
  readonly viewMode: ViewMode;
  fullInfo(options?: ProjectOptions): InfoRecord;
  simpleInfo(options?: ProjectOptions): InfoRecord;
  autoInfo(options?: ProjectOptions): InfoRecord;
  setSimple(): this;
  setFull(): this;
}

/**
 * Mixin that adds the projection methods to an entity class.
 *
 * @example
 * ```ts
 * class Book extends withInfo(Entity) {
 *   static schema = defineSchema('Book', { title: field(), author: toOne(() => Author) });
 *   static fullInfoFields: FieldSetSpec = ['title', 'author'];
 *   declare title: string;
 *   declare author: Author | null;
 * }
 *
 * new Book({ title: 'Dune' }).setFull().autoInfo();
 * ```
 */
export function withInfo<TBase extends EntityConstructor>(Base: TBase) {
  abstract class InfoEntity extends Base implements InfoMethods {
    get viewMode(): ViewMode {
      return getViewMode(this);
    }

    fullInfo(options?: ProjectOptions): InfoRecord {
      return fullInfo(this, options);
    }

    simpleInfo(options?: ProjectOptions): InfoRecord {
      return simpleInfo(this, options);
    }

    autoInfo(options?: ProjectOptions): InfoRecord {
      return autoInfo(this, options);
    }

    setSimple(): this {
      return setSimple(this);
    }

    setFull(): this {
      return setFull(this);
    }
  }

  return InfoEntity;
}
