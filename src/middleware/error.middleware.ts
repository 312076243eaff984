import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, ErrorCode } from '../types/error.types';
import { createAppErrorResponse, createErrorResponse } from '../utils/response-factory';
import { logger } from '../config/logger';

/**
 * Global error handling middleware
 */
export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof AppError && err.statusCode < 500) {
    logger.warn('Request rejected', {
      code: err.code,
      error: err.message,
      path: req.path,
      method: req.method,
    });
  } else {
    logger.error('Error occurred', {
      error: err.message,
      stack: err.stack,
      path: req.path,
      method: req.method,
      query: req.query,
    });
  }

  if (err instanceof AppError) {
    return res.status(err.statusCode).json(createAppErrorResponse(err));
  }

  if (err instanceof ZodError) {
    return res.status(400).json(
      createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Validation failed', {
        errors: err.errors,
      })
    );
  }

  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    return res
      .status(400)
      .json(createErrorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON'));
  }

  // Unknown errors - don't expose internals
  return res
    .status(500)
    .json(createErrorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred'));
};

export const notFoundHandler = (req: Request, res: Response) => {
  res
    .status(404)
    .json(createErrorResponse('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};
