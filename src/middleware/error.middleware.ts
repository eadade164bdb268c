// src/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { ResponseBuilder } from '../utils/response-builder';
import { ErrorCode } from '../types/error-dtos';
import { logger } from '../utils/logger';

/** 404 for anything no router claimed. */
export const notFoundHandler = (req: Request, res: Response): void => {
  ResponseBuilder.error(res, ErrorCode.NOT_FOUND, `Route not found: ${req.method} ${req.path}`, 404);
};

/**
 * Last-resort handler: upload limit violations, malformed JSON bodies and
 * anything a controller did not map itself.
 */
export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
  if (err instanceof multer.MulterError) {
    if (err.code === 'LIMIT_FILE_SIZE') {
      return ResponseBuilder.error(res, ErrorCode.PAYLOAD_TOO_LARGE, 'Uploaded file exceeds the size limit', 413);
    }
    return ResponseBuilder.error(res, ErrorCode.VALIDATION_ERROR, err.message, 422, [
      { field: err.field, reason: err.code },
    ]);
  }
  if (err instanceof SyntaxError) {
    return ResponseBuilder.error(res, ErrorCode.VALIDATION_ERROR, 'Malformed JSON body', 400);
  }

  logger.error('Unhandled request error', { error: err });
  return ResponseBuilder.error(res, ErrorCode.INTERNAL_SERVER_ERROR, 'An unexpected error occurred', 500);
};
