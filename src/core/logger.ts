/**
 * Logger for problems found while projecting and serving entities.
 *
 * A projection does not fail because of one field. It reports through this
 * logger and carries on:
 * - `warn('Relation cycle detected, emitting null', { entity })` when a
 *   related entity is already being projected higher up the traversal;
 * - `error('Failed to resolve field', { entity, field, error })` when reading
 *   a field throws, the field then being left out;
 * - `error('Unmapped error', { error, name })` from `createErrorHandler`.
 *
 * @example
 * ```ts
 * import { setLogger } from 'entity-kit';
 *
 * setLogger({
 *   warn(msg, ctx) { pino.warn(ctx, msg); },
 *   error(msg, ctx) { pino.error(ctx, msg); },
 * });
 * ```
 */

export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const PREFIX = '[entity-kit]';

function write(
  sink: (...data: unknown[]) => void,
  message: string,
  context: Record<string, unknown> | undefined
): void {
  const line = `${PREFIX} ${message}`;
  if (context && Object.keys(context).length > 0) {
    sink(line, context);
  } else {
    sink(line);
  }
}

const consoleLogger: Logger = {
  warn: (message, context) => write(console.warn, message, context),
  error: (message, context) => write(console.error, message, context),
};

let currentLogger: Logger = consoleLogger;

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function getLogger(): Logger {
  return currentLogger;
}

/** Back to the console logger. */
export function resetLogger(): void {
  currentLogger = consoleLogger;
}
