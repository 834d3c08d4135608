/**
 * Hono helpers for serving projections as JSON.
 *
 * @example
 * ```ts
 * const app = new Hono();
 * app.onError(createErrorHandler());
 * app.get('/books/:id', createInfoHandler((c) => books.getOrNone(c.req.param('id')), { resource: 'Book' }));
 *
 * // GET /books/1?view=full&comments=true
 * ```
 */

import type { Context, Env, Handler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import { ApiException, InputValidationException, NotFoundException } from '../core/exceptions.js';
import type { Entity } from '../schema/entity.js';
import { autoInfo, fullInfo, simpleInfo } from '../serialization/project.js';
import type { InfoRecord, ProjectOptions } from '../serialization/types.js';

export const ViewQuerySchema = z.object({
  view: z.enum(['simple', 'full', 'auto']).default('auto'),
  comments: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? undefined : value === 'true' || value === '1')),
});

export type ViewQuery = z.infer<typeof ViewQuerySchema>;

/**
 * Read `?view=` and `?comments=` from the request.
 *
 * @throws InputValidationException on unknown values
 */
export function parseViewQuery<E extends Env>(c: Context<E>): ViewQuery {
  const result = ViewQuerySchema.safeParse({
    view: c.req.query('view'),
    comments: c.req.query('comments'),
  });
  if (!result.success) {
    throw InputValidationException.fromZodError(result.error);
  }
  return result.data;
}

export function renderInfo(instance: Entity, query: ViewQuery): InfoRecord {
  const options: ProjectOptions = query.comments === undefined ? {} : { comments: query.comments };
  switch (query.view) {
    case 'full':
      return fullInfo(instance, options);
    case 'simple':
      return simpleInfo(instance, options);
    default:
      return autoInfo(instance, options);
  }
}

export function jsonSuccess<E extends Env>(c: Context<E>, result: unknown, status: ContentfulStatusCode = 200): Response {
  return c.json({ success: true as const, result }, status);
}

export function jsonFail<E extends Env>(
  c: Context<E>,
  message: string,
  status: ContentfulStatusCode = 400,
  code: string = 'BAD_REQUEST'
): Response {
  return c.json(new ApiException(message, status, code).toJSON(), status);
}

type Loaded<T> = T | Promise<T>;

export interface InfoHandlerOptions {
  /** Resource name used in the 404 message. */
  resource?: string;
}

/**
 * Handler responding with the projection of one entity.
 *
 * @throws NotFoundException when the loader finds nothing
 */
export function createInfoHandler<E extends Env = Env>(
  loader: (c: Context<E>) => Loaded<Entity | null | undefined>,
  options: InfoHandlerOptions = {}
): Handler<E> {
  return async (c) => {
    const query = parseViewQuery(c);
    const instance = await loader(c);
    if (!instance) {
      throw new NotFoundException(options.resource ?? 'Entity');
    }
    return jsonSuccess(c, renderInfo(instance, query));
  };
}

/** Handler responding with the projections of a list of entities. */
export function createInfoListHandler<E extends Env = Env>(
  loader: (c: Context<E>) => Loaded<readonly Entity[]>
): Handler<E> {
  return async (c) => {
    const query = parseViewQuery(c);
    const instances = await loader(c);
    return jsonSuccess(c, instances.map((instance) => renderInfo(instance, query)));
  };
}
