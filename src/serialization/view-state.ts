import { getConfig } from '../config/index.js';
import type { ViewMode } from './types.js';

/**
 * Preferred view mode per instance. It only seeds a traversal that starts on
 * the instance; nested projections receive their mode as a parameter and never
 * write here.
 */
const viewModes = new WeakMap<object, ViewMode>();

export function getViewMode(instance: object): ViewMode {
  return viewModes.get(instance) ?? getConfig().defaultViewMode;
}

export function setViewMode<T extends object>(instance: T, mode: ViewMode): T {
  viewModes.set(instance, mode);
  return instance;
}

export function setSimple<T extends object>(instance: T): T {
  return setViewMode(instance, 'simple');
}

export function setFull<T extends object>(instance: T): T {
  return setViewMode(instance, 'full');
}
