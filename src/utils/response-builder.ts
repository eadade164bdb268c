import { Response } from 'express';
import { Result, ValidationError } from 'express-validator';
import { APIErrorResponse, ErrorCode, ErrorDetail } from '../types/error-dtos';

export class ResponseBuilder {
  /**
   * Sends a success response. Bodies are already wire-shaped by the mappers.
   */
  static success<T>(res: Response, data: T, statusCode: number = 200): void {
    res.status(statusCode).json(data);
  }

  /**
   * Sends an error response
   */
  static error(
    res: Response,
    code: ErrorCode,
    message: string,
    statusCode: number,
    details?: ErrorDetail[]
  ): void {
    const errorResponse: APIErrorResponse = {
      error: {
        code,
        message,
        details,
        timestamp: new Date().toISOString(),
      },
    };

    res.status(statusCode).json(errorResponse);
  }

  /**
   * 422 Validation Error
   */
  static validationError(res: Response, details: ErrorDetail[]): void {
    this.error(res, ErrorCode.VALIDATION_ERROR, 'Input validation failed', 422, details);
  }

  /** Converts express-validator results into the error detail list. */
  static fromValidationResult(res: Response, result: Result<ValidationError>): void {
    this.validationError(
      res,
      result.array().map(err => ({
        field: err.type === 'field' ? err.path : undefined,
        reason: String(err.msg),
        value: err.type === 'field' ? err.value : undefined,
      }))
    );
  }
}
