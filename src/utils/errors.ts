// src/utils/errors.ts

export type JobQueueErrorCode =
  | 'JobNotFound'
  | 'InvalidTransition'
  | 'DuplicateKey'
  | 'UnknownJobType'
  | 'PayloadValidationFailed';

/** Domain error raised by the job store, service and registry. */
export class JobQueueError extends Error {
  public readonly code: JobQueueErrorCode;

  constructor(code: JobQueueErrorCode, message: string) {
    super(message);
    this.name = 'JobQueueError';
    this.code = code;
  }
}

/**
 * Thrown from a progress checkpoint when the job is no longer `running`
 * (cancelled, or reset by an operator). The processing routine stops and
 * leaves the job's state to whoever changed it.
 */
export class JobInterruptedError extends Error {
  constructor(public readonly jobId: string) {
    super(`Job ${jobId} is no longer running`);
    this.name = 'JobInterruptedError';
  }
}

export type FileUploadErrorCode = 'UnsupportedFileType' | 'WorkbookUnreadable' | 'FileNotFound';

export class FileUploadError extends Error {
  public readonly code: FileUploadErrorCode;

  constructor(code: FileUploadErrorCode, message: string) {
    super(message);
    this.name = 'FileUploadError';
    this.code = code;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
