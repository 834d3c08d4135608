export { project, fullInfo, simpleInfo, autoInfo, fieldSetFor } from './project.js';
export { getViewMode, setViewMode, setSimple, setFull } from './view-state.js';
export { withInfo } from './mixin.js';
export type { InfoMethods } from './mixin.js';
export { classify, relatedItems } from './relations.js';
export type { Relation } from './relations.js';
export { accessorFor, isEmptyValue, readPath, StoredFieldAccessor, AttributeAccessor } from './accessors.js';
export { FieldSetSchema, assertFieldSet, parseFieldRef } from './field-set.js';
export type {
  FieldSetEntry,
  FieldSetSpec,
  ViewMode,
  InfoRecord,
  ProjectOptions,
  FieldRef,
  FieldAccessor,
  FieldResolution,
  ResolveContext,
} from './types.js';
