
export interface APIErrorResponse {
  error: {
    code: string;
    message: string;
    details?: ErrorDetail[];
    timestamp: string;
  };
}

export interface ErrorDetail {
  field?: string;
  reason: string;
  value?: unknown;
}

export enum ErrorCode {
  // Validation errors
  VALIDATION_ERROR = 'validation_error',
  UNSUPPORTED_FILE = 'unsupported_file',
  PAYLOAD_TOO_LARGE = 'payload_too_large',

  // Resource errors
  NOT_FOUND = 'not_found',
  CONFLICT = 'conflict',

  // Job state errors
  INVALID_TRANSITION = 'invalid_transition',

  // System errors
  INTERNAL_SERVER_ERROR = 'internal_server_error',
}
