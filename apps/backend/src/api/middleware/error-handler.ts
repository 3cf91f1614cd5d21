import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ZodError } from 'zod';
import { logger } from '../../lib/logger.js';
import { AppError, type ErrorKind } from '../../lib/errors.js';

const KIND_STATUS: Record<ErrorKind, number> = {
  NotFound: StatusCodes.NOT_FOUND,
  ValidationError: StatusCodes.BAD_REQUEST,
  InvalidOperation: StatusCodes.UNPROCESSABLE_ENTITY,
  CycleDetected: StatusCodes.CONFLICT,
  SlugConflict: StatusCodes.CONFLICT,
  Internal: StatusCodes.INTERNAL_SERVER_ERROR
};

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  let status: number = StatusCodes.INTERNAL_SERVER_ERROR;
  let code = 'INTERNAL_ERROR';
  let message = 'Internal server error';
  let details: unknown;

  if (error instanceof AppError) {
    status = KIND_STATUS[error.kind];
    code = error.code;
    message = error.message;
    details = error.details;
  } else if (error instanceof ZodError) {
    status = StatusCodes.BAD_REQUEST;
    code = 'VALIDATION_ERROR';
    message = 'Invalid request payload';
    details = error.flatten();
  }

  if (status >= 500) {
    logger.error({ error, requestId: req.id }, 'Unhandled error');
  } else {
    logger.warn({ error, requestId: req.id }, 'Handled error');
  }

  res.status(status).json({ success: false, error: message, code, details });
}

export function notFoundHandler(req: Request, res: Response) {
  res.status(StatusCodes.NOT_FOUND).json({
    success: false,
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND'
  });
}
