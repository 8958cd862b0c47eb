/**
 * Standardized error classes for dnspresence
 * All errors return consistent ApiError format from @dnspresence/shared
 */

import type { FastifyInstance, FastifyError } from 'fastify';
import type { ZodError } from 'zod';
import type { ApiError } from '@dnspresence/shared';

// Error codes for client identification
export const ErrorCodes = {
  // Authentication (1xxx)
  UNAUTHORIZED: 'AUTH_001',
  SESSION_EXPIRED: 'AUTH_003',

  // Validation (2xxx)
  VALIDATION_ERROR: 'VAL_001',

  // Resource (3xxx)
  NOT_FOUND: 'RES_001',

  // Server (4xxx)
  SERVICE_UNAVAILABLE: 'SRV_002',

  // External services (6xxx)
  MALFORMED_RESPONSE: 'EXT_002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = true;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace(this, this.constructor);
    Object.setPrototypeOf(this, AppError.prototype);
  }

  toJSON(): ApiError & { code: ErrorCode; details?: Record<string, unknown> } {
    return {
      statusCode: this.statusCode,
      error: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Validation error - 400 Bad Request
 * Also raised for invalid startup configuration.
 */
export class ValidationError extends AppError {
  public readonly fields?: Array<{ field: string; message: string }>;

  constructor(
    message: string,
    fields?: Array<{ field: string; message: string }>
  ) {
    super(message, 400, ErrorCodes.VALIDATION_ERROR, fields ? { fields } : undefined);
    this.name = 'ValidationError';
    this.fields = fields;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }

  static fromZodError(error: ZodError, message = 'Validation failed'): ValidationError {
    const fields = error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError(message, fields);
  }
}

/**
 * Appliance rejected the credentials - 401 Unauthorized
 */
export class AuthenticationError extends AppError {
  constructor(message = 'Appliance rejected the credentials') {
    super(message, 401, ErrorCodes.UNAUTHORIZED);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

/**
 * Appliance reported the held session as expired or unknown.
 * Handled inside the session manager, callers rarely see it.
 */
export class SessionExpiredError extends AppError {
  constructor(message = 'Appliance session expired') {
    super(message, 401, ErrorCodes.SESSION_EXPIRED);
    this.name = 'SessionExpiredError';
    Object.setPrototypeOf(this, SessionExpiredError.prototype);
  }
}

/**
 * Appliance could not be reached (connection failure, timeout, 5xx)
 */
export class UnreachableError extends AppError {
  constructor(message = 'Appliance is unreachable', details?: Record<string, unknown>) {
    super(message, 503, ErrorCodes.SERVICE_UNAVAILABLE, details);
    this.name = 'UnreachableError';
    Object.setPrototypeOf(this, UnreachableError.prototype);
  }
}

/**
 * Appliance answered with a payload we cannot interpret
 */
export class MalformedResponseError extends AppError {
  constructor(message = 'Unexpected appliance response', details?: Record<string, unknown>) {
    super(message, 502, ErrorCodes.MALFORMED_RESPONSE, details);
    this.name = 'MalformedResponseError';
    Object.setPrototypeOf(this, MalformedResponseError.prototype);
  }
}

/**
 * Not found error - 404 Not Found
 */
export class NotFoundError extends AppError {
  constructor(resource = 'Resource', id?: string) {
    const message = id ? `${resource} with ID '${id}' not found` : `${resource} not found`;
    super(message, 404, ErrorCodes.NOT_FOUND);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/**
 * Register global error handler for Fastify
 */
export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((error: FastifyError | AppError | Error, request, reply) => {
    request.log.error(
      {
        err: error,
        requestId: request.id,
        url: request.url,
        method: request.method,
      },
      'Request error'
    );

    // Handle our custom AppError
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send(error.toJSON());
    }

    // Handle Fastify validation errors
    if ('validation' in error && error.validation) {
      const validationError = new ValidationError(
        'Validation failed',
        error.validation.map((v) => ({
          field: v.instancePath || 'unknown',
          message: v.message ?? 'Invalid value',
        }))
      );
      return reply.status(400).send(validationError.toJSON());
    }

    // Handle Fastify sensible errors (notFound, badRequest, etc.)
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      const response: ApiError = {
        statusCode: error.statusCode,
        error: error.name || 'Error',
        message: error.message,
      };
      return reply.status(error.statusCode).send(response);
    }

    const isProduction = process.env.NODE_ENV === 'production';
    const response: ApiError = {
      statusCode: 500,
      error: 'InternalServerError',
      message: isProduction ? 'An unexpected error occurred' : error.message,
    };

    return reply.status(500).send(response);
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiError = {
      statusCode: 404,
      error: 'NotFound',
      message: `Route ${request.method} ${request.url} not found`,
    };
    return reply.status(404).send(response);
  });
}
