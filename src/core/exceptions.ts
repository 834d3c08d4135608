import { HTTPException } from 'hono/http-exception';
import type { ZodError } from 'zod';
import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Valid HTTP status codes for API exceptions.
 * Uses Hono's ContentfulStatusCode which excludes informational codes (1xx).
 */
export type ApiStatusCode = ContentfulStatusCode;

/**
 * Base exception for entity-kit. Extends Hono's HTTPException so that errors
 * raised while patching or projecting can be surfaced directly by a Hono app.
 *
 * @example
 * ```ts
 * throw new ApiException('Something went wrong', 500, 'INTERNAL_ERROR');
 * throw new ApiException('Invalid input', 400, 'VALIDATION_ERROR', { field: 'view' });
 * ```
 */
export class ApiException extends HTTPException {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(
    message: string,
    status: ApiStatusCode = 500,
    code: string = 'INTERNAL_ERROR',
    details?: unknown
  ) {
    super(status, { message });
    this.name = 'ApiException';
    this.code = code;
    this.details = details;
  }

  toJSON() {
    const errorObj: { code: string; message: string; details?: unknown } = {
      code: this.code,
      message: this.message,
    };
    if (this.details) {
      errorObj.details = this.details;
    }
    return {
      success: false as const,
      error: errorObj,
    };
  }

  get statusCode(): ApiStatusCode {
    return this.status;
  }
}

export class InputValidationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'InputValidationException';
  }

  static fromZodError(error: ZodError): InputValidationException {
    const issues = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));

    return new InputValidationException('Validation failed', issues);
  }
}

export class NotFoundException extends ApiException {
  constructor(resource: string = 'Resource') {
    super(`${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundException';
  }
}

export class ConfigurationException extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationException';
  }
}

/**
 * The target of a patch does not own an entity schema with the expected
 * field lists.
 */
export class SchemaShapeError extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'SCHEMA_SHAPE_ERROR', details);
    this.name = 'SchemaShapeError';
  }
}

/**
 * A patch specification member is neither a field descriptor nor a callable.
 */
export class PatchSpecError extends ApiException {
  constructor(message: string, details?: unknown) {
    super(message, 500, 'PATCH_SPEC_ERROR', details);
    this.name = 'PatchSpecError';
  }
}
