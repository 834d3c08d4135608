import type { Context, Env, ErrorHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ApiException, InputValidationException } from './exceptions.js';
import { getLogger } from './logger.js';

/**
 * Error mapper: transforms unknown errors to ApiException.
 * Return undefined to skip this mapper and try the next one.
 */
export type ErrorMapper<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>
) => ApiException | undefined | Promise<ApiException | undefined>;

/**
 * Hook: called after mapping, before response (for logging/Sentry).
 * Hooks are fire-and-forget; a failing hook is reported through `onHookError`.
 */
export type ErrorHook<E extends Env = Env> = (
  error: Error,
  ctx: Context<E>,
  apiException: ApiException
) => void | Promise<void>;

export interface ErrorHandlerConfig<E extends Env = Env> {
  /** Custom error mappers - tried in order, first non-undefined wins */
  mappers?: ErrorMapper<E>[];
  /** Error reporting hooks */
  hooks?: ErrorHook<E>[];
  /** Include stack trace in error response (default: false) */
  includeStackTrace?: boolean;
  /** Default error code for unmapped errors (default: 'INTERNAL_ERROR') */
  defaultErrorCode?: string;
  /** Default error message for unmapped errors (default: 'An internal error occurred') */
  defaultErrorMessage?: string;
  /** Log unmapped errors through the logger (default: true) */
  logUnmappedErrors?: boolean;
  /** Called when a hook throws an error */
  onHookError?: (hookError: unknown, originalError: Error, ctx: Context<E>) => void;
}

/**
 * Built-in mapper for ZodError to InputValidationException.
 */
export function zodErrorMapper<E extends Env = Env>(error: Error, _ctx?: Context<E>): ApiException | undefined {
  if (error instanceof ZodError) {
    return InputValidationException.fromZodError(error);
  }
  return undefined;
}

/**
 * Creates a global error handler for Hono apps serving projections.
 *
 * Errors are converted to the `{ success: false, error }` envelope.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler({
 *   hooks: [
 *     (error, ctx, apiException) => {
 *       if (apiException.status >= 500) reportError(error);
 *     },
 *   ],
 * }));
 * ```
 */
export function createErrorHandler<E extends Env = Env>(
  config: ErrorHandlerConfig<E> = {}
): ErrorHandler<E> {
  const {
    mappers = [],
    hooks = [],
    includeStackTrace = false,
    defaultErrorCode = 'INTERNAL_ERROR',
    defaultErrorMessage = 'An internal error occurred',
    logUnmappedErrors = true,
    onHookError,
  } = config;

  const allMappers: ErrorMapper<E>[] = [...mappers, zodErrorMapper];

  async function mapError(err: Error, ctx: Context<E>): Promise<ApiException> {
    if (err instanceof ApiException) {
      return err;
    }
    if (err instanceof HTTPException) {
      return new ApiException(err.message, err.status, 'HTTP_ERROR');
    }

    for (const mapper of allMappers) {
      try {
        const mapped = await mapper(err, ctx);
        if (mapped) {
          return mapped;
        }
      } catch (mapperError) {
        getLogger().warn('Error mapper failed', { error: String(mapperError) });
      }
    }

    if (logUnmappedErrors) {
      getLogger().error('Unmapped error', { error: err.message, name: err.name });
    }
    return new ApiException(defaultErrorMessage, 500, defaultErrorCode);
  }

  return async (err: Error, ctx: Context<E>): Promise<Response> => {
    const apiException = await mapError(err, ctx);

    for (const hook of hooks) {
      try {
        const result = hook(err, ctx, apiException);
        if (result instanceof Promise) {
          result.catch((hookErr: unknown) => {
            onHookError?.(hookErr, err, ctx);
          });
        }
      } catch (hookErr) {
        onHookError?.(hookErr, err, ctx);
      }
    }

    const responseBody = apiException.toJSON();
    const errorBody: Record<string, unknown> = { ...responseBody.error };

    if (includeStackTrace && err.stack) {
      errorBody.stack = err.stack;
    }

    return ctx.json({ success: false as const, error: errorBody }, apiException.status);
  };
}
