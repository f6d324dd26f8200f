/**
 * Error classification and structured error responses for the planner.
 *
 * Pipeline stages mostly recover locally (a generator that fails returns no
 * tasks). What escapes to the tool layer is normalized here into a
 * `PlannerError` and serialized for the MCP response.
 */

import { ZodError } from 'zod';

/**
 * Error codes for programmatic error handling.
 */
export const ErrorCode = {
  // Client errors (4xx equivalent)
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  BUDGET_EXCEEDED: 'BUDGET_EXCEEDED',

  // Server errors (5xx equivalent)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  TEMPLATE_RENDER_ERROR: 'TEMPLATE_RENDER_ERROR',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  EXTERNAL_SERVICE_ERROR: 'EXTERNAL_SERVICE_ERROR',

  // Tool-specific errors
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
  TOOL_EXECUTION_ERROR: 'TOOL_EXECUTION_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * HTTP-like status codes for error responses
 */
export const HttpStatus = {
  BAD_REQUEST: 400,
  PAYMENT_REQUIRED: 402,
  NOT_FOUND: 404,
  CONFLICT: 409,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
  SERVICE_UNAVAILABLE: 503,
} as const;

export interface PlannerErrorOptions {
  httpStatus?: number;
  details?: Record<string, unknown> | undefined;
  isRetryable?: boolean;
  cause?: unknown;
}

/**
 * Base error for everything the planner throws on purpose
 */
export class PlannerError extends Error {
  public readonly code: ErrorCodeType;
  public readonly httpStatus: number;
  public readonly details: Record<string, unknown> | undefined;
  public readonly isRetryable: boolean;

  constructor(message: string, code: ErrorCodeType, options?: PlannerErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = 'PlannerError';
    this.code = code;
    this.httpStatus = options?.httpStatus ?? defaultHttpStatus(code);
    this.details = options?.details;
    this.isRetryable = options?.isRetryable ?? defaultRetryable(code);
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      ...(this.details && { details: this.details }),
    };
  }
}

function defaultHttpStatus(code: ErrorCodeType): number {
  switch (code) {
    case ErrorCode.VALIDATION_ERROR:
    case ErrorCode.INVALID_ARGUMENTS:
      return HttpStatus.UNPROCESSABLE_ENTITY;
    case ErrorCode.UNKNOWN_TOOL:
      return HttpStatus.BAD_REQUEST;
    case ErrorCode.NOT_FOUND:
      return HttpStatus.NOT_FOUND;
    case ErrorCode.CONFLICT:
      return HttpStatus.CONFLICT;
    case ErrorCode.BUDGET_EXCEEDED:
      return HttpStatus.PAYMENT_REQUIRED;
    case ErrorCode.SERVICE_UNAVAILABLE:
    case ErrorCode.EXTERNAL_SERVICE_ERROR:
      return HttpStatus.SERVICE_UNAVAILABLE;
    default:
      return HttpStatus.INTERNAL_SERVER_ERROR;
  }
}

function defaultRetryable(code: ErrorCodeType): boolean {
  return code === ErrorCode.SERVICE_UNAVAILABLE || code === ErrorCode.EXTERNAL_SERVICE_ERROR;
}

/**
 * Requested resource does not exist
 */
export class NotFoundError extends PlannerError {
  constructor(resourceType: string, resourceId: string, details?: Record<string, unknown>) {
    super(`${resourceType} not found: ${resourceId}`, ErrorCode.NOT_FOUND, {
      details: { resourceType, resourceId, ...details },
    });
    this.name = 'NotFoundError';
  }
}

/**
 * Input failed validation
 */
export class ValidationError extends PlannerError {
  constructor(message: string, validationErrors?: Array<{ path: string; message: string }>) {
    const details = validationErrors ? { errors: validationErrors } : undefined;
    super(message, ErrorCode.VALIDATION_ERROR, { details });
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError): ValidationError {
    const validationErrors = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError(
      `Validation failed: ${validationErrors.map((e) => e.message).join(', ')}`,
      validationErrors
    );
  }
}

/**
 * A template referenced a variable the profile context does not provide.
 */
export class TemplateRenderError extends PlannerError {
  public readonly templateId: string;
  public readonly missing: string[];

  constructor(templateId: string, missing: string[]) {
    super(
      `Template ${templateId} is missing variables: ${missing.join(', ')}`,
      ErrorCode.TEMPLATE_RENDER_ERROR,
      { details: { templateId, missing } }
    );
    this.name = 'TemplateRenderError';
    this.templateId = templateId;
    this.missing = missing;
  }
}

/**
 * The user's recorded LLM spend has reached its limit
 */
export class BudgetExceededError extends PlannerError {
  constructor(userId: string, spentUsd: number, limitUsd: number) {
    super(
      `LLM budget exhausted for ${userId}: $${spentUsd.toFixed(2)} of $${limitUsd.toFixed(2)}`,
      ErrorCode.BUDGET_EXCEEDED,
      { details: { userId, spentUsd, limitUsd } }
    );
    this.name = 'BudgetExceededError';
  }
}

/**
 * An external collaborator (LLM, search) failed
 */
export class ExternalServiceError extends PlannerError {
  constructor(serviceName: string, message: string, details?: Record<string, unknown>) {
    super(`External service error (${serviceName}): ${message}`, ErrorCode.EXTERNAL_SERVICE_ERROR, {
      isRetryable: true,
      details: { serviceName, ...details },
    });
    this.name = 'ExternalServiceError';
  }
}

/**
 * Normalize anything thrown into a PlannerError.
 */
export function classifyError(error: unknown): PlannerError {
  if (error instanceof PlannerError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes('not found')) {
      return new PlannerError(error.message, ErrorCode.NOT_FOUND, { cause: error });
    }

    if (message.includes('invalid') || message.includes('required') || message.includes('must be')) {
      return new PlannerError(error.message, ErrorCode.VALIDATION_ERROR, { cause: error });
    }

    if (message.includes('unique constraint') || message.includes('already exists')) {
      return new PlannerError(error.message, ErrorCode.CONFLICT, { cause: error });
    }

    return new PlannerError(error.message, ErrorCode.INTERNAL_ERROR, { cause: error });
  }

  return new PlannerError('An unexpected error occurred', ErrorCode.INTERNAL_ERROR, {
    details: { originalError: String(error) },
  });
}

/**
 * Structured error payload for MCP tool responses.
 */
export function createErrorResponse(error: unknown, requestId?: string): Record<string, unknown> {
  const classified = classifyError(error);
  return {
    ...classified.toJSON(),
    ...(requestId && { requestId }),
  };
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof PlannerError && error.isRetryable;
}
