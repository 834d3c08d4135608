// Core exports
export {
  ApiException,
  InputValidationException,
  NotFoundException,
  ConfigurationException,
  SchemaShapeError,
  PatchSpecError,
} from './core/exceptions.js';
export type { ApiStatusCode } from './core/exceptions.js';
export { createErrorHandler, zodErrorMapper } from './core/error-handler.js';
export type { ErrorMapper, ErrorHook, ErrorHandlerConfig } from './core/error-handler.js';
export { setLogger, getLogger, resetLogger } from './core/logger.js';
export type { Logger } from './core/logger.js';

// Configuration
export { configure, getConfig, resetConfig, EntityKitConfigSchema, ViewModeSchema } from './config/index.js';
export type { EntityKitConfig } from './config/index.js';

// Entity model
export { Field, field, toOne, toMany } from './schema/fields.js';
export type { FieldKind, FieldOptions, FieldInit, EntityFactory } from './schema/fields.js';
export { EntitySchema, defineSchema } from './schema/schema.js';
export type { BehaviorKind, SchemaParts } from './schema/schema.js';
export {
  Entity,
  isEntity,
  isEntityClass,
  ownSchema,
  entityClassOf,
  readAttribute,
} from './schema/entity.js';
export type { EntityClass } from './schema/entity.js';
export { RelatedCollection } from './schema/related.js';
export {
  property,
  staticMethod,
  classMethod,
  computed,
  getComputedDescription,
  isBehavior,
} from './schema/behaviors.js';
export type { Behavior, AnyFunction, ComputedDescription } from './schema/behaviors.js';

// Patching
export { patchEntity, callOverridden } from './patch/patch.js';
export type { PatchSpec, PatchEntry, PatchMember, PatchTarget, Method } from './patch/patch.js';
export { SchemaPatchBuilder } from './patch/builder.js';

// Serialization
export * from './serialization/index.js';

// Stores
export { MemoryEntityStore } from './adapters/memory/index.js';

// HTTP
export {
  ViewQuerySchema,
  parseViewQuery,
  renderInfo,
  jsonSuccess,
  jsonFail,
  createInfoHandler,
  createInfoListHandler,
} from './http/index.js';
export type { ViewQuery, InfoHandlerOptions } from './http/index.js';
