import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';

/**
 * 🧱 Base class for application-specific errors.
 * All operational errors should extend this.
 */
export class ApiError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(statusCode: number, message: string, isOperational = true) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, ApiError.prototype);
  }
}

/**
 * 🧾 Malformed request (400). Carries the offending fields, if any.
 */
export class ValidationError extends ApiError {
  public readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(400, message, true);
    this.name = 'ValidationError';
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * 🚧 Store or queue could not be reached after internal retries (503).
 */
export class ServiceUnavailableError extends ApiError {
  constructor(message = 'Service temporarily unavailable') {
    super(503, message, true);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}

export const formatZodIssues = (error: ZodError): string[] =>
  error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message));

const isBodyParserError = (error: unknown): error is SyntaxError & { status: number } =>
  error instanceof SyntaxError && 'status' in error && error.status === 400;

/**
 * 🌐 Centralized error-handling middleware
 * Handles both operational and programming errors.
 */
export const errorHandler: ErrorRequestHandler = (
  error: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
) => {
  const err = error instanceof Error ? error : new Error(String(error));

  const level = err instanceof ApiError && err.statusCode < 500 ? 'warn' : 'error';
  logger.log(level, `❌ ${err.name}: ${err.message}`, {
    stack: level === 'error' ? err.stack : undefined,
    path: req.originalUrl,
    method: req.method,
  });

  /** 1️⃣ Schema validation */
  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      message: 'Validation error',
      kind: 'ValidationError',
      errors: formatZodIssues(err),
    });
    return;
  }

  if (err instanceof ValidationError) {
    res.status(400).json({
      success: false,
      message: err.message,
      kind: 'ValidationError',
      errors: err.errors,
    });
    return;
  }

  /** 2️⃣ Malformed JSON body */
  if (isBodyParserError(err)) {
    res.status(400).json({
      success: false,
      message: 'Malformed JSON body',
      kind: 'ValidationError',
    });
    return;
  }

  /** 3️⃣ Custom API Errors (Operational) */
  if (err instanceof ApiError) {
    const kind = 'kind' in err && typeof err.kind === 'string' ? err.kind : undefined;
    res.status(err.statusCode).json({
      success: false,
      message: err.message,
      ...(kind && { kind }),
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    });
    return;
  }

  /** 4️⃣ Fallback: Unhandled Errors */
  res.status(500).json({
    success: false,
    message: 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && {
      error: err.message,
      stack: err.stack,
    }),
  });
};
