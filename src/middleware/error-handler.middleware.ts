import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { AppError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';
import { logger } from '../lib/logger';
import { config } from '../config';

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    code?: string;
    details?: unknown;
    stack?: string;
  };
}

const handleMulterError = (error: multer.MulterError): AppError => {
  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      return AppError.payloadTooLarge('Uploaded file is too large', ErrorCodes.FILE_TOO_LARGE);
    case 'LIMIT_UNEXPECTED_FILE':
      return AppError.badRequest(`Unexpected file field "${error.field}"`, ErrorCodes.FILE_INVALID_TYPE);
    default:
      return AppError.badRequest(error.message, ErrorCodes.VALIDATION_ERROR);
  }
};

const formatZodIssues = (error: ZodError) =>
  error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));

interface ErrorWithStatus extends Error {
  statusCode?: number;
  status?: number;
  code?: string;
}

export const errorHandler = (
  err: ErrorWithStatus,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {

  let error: AppError;

  if (err instanceof AppError) {
    error = err;
  } else if (err instanceof multer.MulterError) {
    error = handleMulterError(err);
  } else if (err instanceof ZodError) {
    error = AppError.badRequest('Request validation failed', ErrorCodes.VALIDATION_ERROR, formatZodIssues(err));
  } else if (err.statusCode || err.status) {
    const statusCode = err.statusCode || err.status || 500;
    error = new AppError(err.message, statusCode, err.code);
  } else {
    error = AppError.internal(
      config.nodeEnv === 'production' ? 'An unexpected error occurred' : err.message,
      ErrorCodes.INTERNAL_ERROR
    );
  }

  if (error.statusCode >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed: ${err.message}`, err);
  }

  const response: ErrorResponse = {
    success: false,
    error: {
      message: error.message,
      code: error.code,
      ...(error.details !== undefined && { details: error.details }),
      ...(config.nodeEnv === 'development' && { stack: err.stack }),
    },
  };

  res.status(error.statusCode).json(response);
};
