// src/controllers/job.controller.ts
import { Request, Response } from 'express';
import { body, param, query, validationResult } from 'express-validator';
import { ParseMethod } from '../config/env';
import { IFileUpload } from '../models/fileUpload.model';
import { JOB_STATUSES } from '../models/job.model';
import { ICreateJobResult, JobService, RecoveryAction } from '../services/job.service';
import { UploadedFile } from '../services/fileUpload.service';
import { getJobPolicy } from '../jobs/jobRegistry';
import { ResponseBuilder } from '../utils/response-builder';
import { FileUploadError, JobQueueError, errorMessage } from '../utils/errors';
import { toJobResultResponseDTO, toJobStatusDTO, toJobSummaryDTO } from '../utils/jobMapper';
import { logger } from '../utils/logger';
import { ErrorCode } from '../types/error-dtos';
import { JobCreatedDTO } from '../types/job-dtos';

/** Storage side of the upload endpoint. */
export interface IWorkbookIntake {
    saveWorkbook(file: UploadedFile): Promise<IFileUpload>;
    splitWorkbook(parent: IFileUpload): Promise<IFileUpload[]>;
    /** Drops an upload that will never be processed. */
    discardUpload(parent: IFileUpload, reason: string): Promise<void>;
}

export interface JobControllerDeps {
    jobService: JobService;
    uploads: IWorkbookIntake;
    defaultParseMethod: ParseMethod;
    now?: () => Date;
}

const PARSE_METHODS: readonly ParseMethod[] = ['manual', 'together'];
const RECOVERY_ACTIONS: readonly RecoveryAction[] = ['reset', 'fail'];

// --- Request field helpers ---

function bodyField(req: Request, key: string): unknown {
    const payload: unknown = req.body;
    if (typeof payload !== 'object' || payload === null) return undefined;
    return Object.entries(payload).find(([name]) => name === key)?.[1];
}

function stringField(source: unknown): string | undefined {
    return typeof source === 'string' && source.trim() !== '' ? source.trim() : undefined;
}

/** Parses the `callback_headers` form field: a JSON object of string values. */
export function parseCallbackHeaders(raw: unknown): Record<string, string> | null {
    if (typeof raw !== 'string') return null;

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error: unknown) {
        logger.debug('callback_headers is not valid JSON', { error });
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(parsed)) {
        if (typeof value !== 'string') return null;
        headers[name] = value;
    }
    return headers;
}

function isTrue(value: unknown): boolean {
    return value === true || value === 'true';
}

// --- Validation Middleware ---

export const uploadValidation = [
    body('parse_method').optional().isIn(PARSE_METHODS).withMessage('parse_method must be one of: manual, together.'),
    body('callback_url').optional().isString().withMessage('callback_url must be a string.'),
    body('callback_headers').optional()
        .custom(value => parseCallbackHeaders(value) !== null)
        .withMessage('callback_headers must be a JSON object of string values.'),
    body('user_id').optional().isString().isLength({ max: 128 }).withMessage('user_id must be a string of at most 128 characters.'),
    body('priority').optional().isInt({ min: 1, max: 10 }).withMessage('priority must be an integer between 1 and 10.'),
];

export const jobIdParamValidation = [
    param('jobId').isString().isLength({ min: 1, max: 128 }).withMessage('Job ID is required.'),
];

export const listJobsValidation = [
    query('status').optional().isIn(JOB_STATUSES).withMessage(`status must be one of: ${JOB_STATUSES.join(', ')}.`),
    query('user_id').optional().isString().withMessage('user_id must be a string.'),
    query('limit').optional().isInt({ min: 1, max: 500 }).withMessage('limit must be an integer between 1 and 500.'),
];

export const fixStuckJobValidation = [
    ...jobIdParamValidation,
    body('action').optional().isIn(RECOVERY_ACTIONS).withMessage('action must be one of: reset, fail.'),
];

export const recoverStuckJobsValidation = [
    body('action').optional().isIn(RECOVERY_ACTIONS).withMessage('action must be one of: reset, fail.'),
    body('include_pending').optional().isBoolean().withMessage('include_pending must be a boolean.'),
    body('pending_older_than_minutes').optional().isInt({ min: 1 }).withMessage('pending_older_than_minutes must be a positive integer.'),
];

// --- Error Mapping ---

function sendError(res: Response, error: unknown, context: string): void {
    if (error instanceof JobQueueError) {
        switch (error.code) {
            case 'JobNotFound':
                return ResponseBuilder.error(res, ErrorCode.NOT_FOUND, error.message, 404);
            case 'InvalidTransition':
                return ResponseBuilder.error(res, ErrorCode.INVALID_TRANSITION, error.message, 400);
            case 'DuplicateKey':
                return ResponseBuilder.error(res, ErrorCode.CONFLICT, error.message, 409);
            case 'UnknownJobType':
            case 'PayloadValidationFailed':
                return ResponseBuilder.error(res, ErrorCode.VALIDATION_ERROR, error.message, 422);
        }
    }
    if (error instanceof FileUploadError) {
        if (error.code === 'FileNotFound') {
            return ResponseBuilder.error(res, ErrorCode.NOT_FOUND, error.message, 404);
        }
        return ResponseBuilder.error(res, ErrorCode.UNSUPPORTED_FILE, error.message, 422);
    }

    logger.error(`Error ${context}`, { error });
    return ResponseBuilder.error(res, ErrorCode.INTERNAL_SERVER_ERROR, `Failed ${context}: ${errorMessage(error)}`, 500);
}

// --- Job Controllers ---

export function createJobController(deps: JobControllerDeps) {
    const { jobService, uploads, defaultParseMethod } = deps;
    const now = deps.now ?? (() => new Date());

    const discardUpload = async (parent: IFileUpload, cause: unknown): Promise<void> => {
        try {
            await uploads.discardUpload(parent, `Upload was not queued: ${errorMessage(cause)}`);
        } catch (error: unknown) {
            logger.error('Could not discard upload', { fileId: parent.fileId, error });
        }
    };

    /** Saves and splits a workbook, then queues it. POST /jobs/upload-excel-async */
    const uploadExcelAsync = async (req: Request, res: Response): Promise<void> => {
        // 1. Input Validation
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }
        if (!req.file) {
            return ResponseBuilder.validationError(res, [{ field: 'file', reason: 'An Excel file is required.' }]);
        }

        try {
            const parseMethod = PARSE_METHODS.find(method => method === bodyField(req, 'parse_method')) ?? defaultParseMethod;
            const callbackUrl = stringField(bodyField(req, 'callback_url'));
            const priority = stringField(bodyField(req, 'priority'));

            // 2. Store the workbook
            const parent = await uploads.saveWorkbook({ originalname: req.file.originalname, buffer: req.file.buffer });

            // 3. Split and queue (fast; parsing happens in the background). On failure nothing will process the files
            let queued: ICreateJobResult;
            let sheets: IFileUpload[];
            try {
                sheets = await uploads.splitWorkbook(parent);
                queued = await jobService.createJob({
                    jobType: 'excel_processing',
                    inputData: {
                        fileId: parent.fileId,
                        filePath: parent.filePath,
                        sheetCount: sheets.length,
                        parseMethod,
                    },
                    callbackUrl,
                    callbackHeaders: parseCallbackHeaders(bodyField(req, 'callback_headers')),
                    userId: stringField(bodyField(req, 'user_id')),
                    priority: priority === undefined ? undefined : parseInt(priority, 10),
                });
            } catch (error: unknown) {
                await discardUpload(parent, error);
                throw error;
            }
            const { job, note } = queued;

            const estimatedMinutes = sheets.length * getJobPolicy(job.jobType).estimatedMinutesPerItem;
            const response: JobCreatedDTO = {
                job_id: job.jobId,
                status: 'pending',
                message: `Excel file uploaded successfully. Processing ${sheets.length} sheets in background.`,
                estimated_completion_time: new Date(now().getTime() + estimatedMinutes * 60_000).toISOString(),
                status_url: `/jobs/${job.jobId}/status`,
                webhook_url: job.callbackUrl,
            };
            if (note) response.note = note;

            return ResponseBuilder.success(res, response, 200);
        } catch (error: unknown) {
            return sendError(res, error, 'to upload file');
        }
    };

    /** GET /jobs/:jobId/status */
    const getJobStatus = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const job = await jobService.getJob(req.params.jobId);
            return ResponseBuilder.success(res, toJobStatusDTO(job));
        } catch (error: unknown) {
            return sendError(res, error, 'to read job status');
        }
    };

    /** GET /jobs/:jobId/result */
    const getJobResult = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const job = await jobService.getJob(req.params.jobId);
            return ResponseBuilder.success(res, toJobResultResponseDTO(job));
        } catch (error: unknown) {
            return sendError(res, error, 'to read job result');
        }
    };

    /** DELETE /jobs/:jobId */
    const cancelJob = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const job = await jobService.cancelJob(req.params.jobId);
            return ResponseBuilder.success(res, {
                job_id: job.jobId,
                status: job.status,
                message: 'Job cancelled successfully',
            });
        } catch (error: unknown) {
            return sendError(res, error, 'to cancel job');
        }
    };

    /** GET /jobs/?status&user_id&limit */
    const listJobs = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const status = JOB_STATUSES.find(candidate => candidate === req.query.status);
            const userId = stringField(req.query.user_id);
            const rawLimit = stringField(req.query.limit);
            const limit = rawLimit === undefined ? 50 : parseInt(rawLimit, 10);

            const jobs = await jobService.listJobs({ status, userId, limit });
            return ResponseBuilder.success(res, {
                jobs: jobs.map(toJobSummaryDTO),
                total_count: jobs.length,
                filter: { status: status ?? null, user_id: userId ?? null, limit },
            });
        } catch (error: unknown) {
            return sendError(res, error, 'to list jobs');
        }
    };

    /** Operator override for one stuck job. POST /jobs/admin/fix-stuck-job/:jobId */
    const fixStuckJob = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const action = RECOVERY_ACTIONS.find(candidate => candidate === bodyField(req, 'action')) ?? 'fail';
            const outcome = await jobService.fixStuckJob(req.params.jobId, action);
            return ResponseBuilder.success(res, {
                job_id: outcome.jobId,
                previous_status: outcome.previousStatus,
                status: outcome.status,
                message: `Job moved from ${outcome.previousStatus} to ${outcome.status}`,
            });
        } catch (error: unknown) {
            return sendError(res, error, 'to fix stuck job');
        }
    };

    /** Bulk recovery of jobs orphaned by a previous process. POST /jobs/admin/recover-stuck-jobs */
    const recoverStuckJobs = async (req: Request, res: Response): Promise<void> => {
        const errors = validationResult(req);
        if (!errors.isEmpty()) {
            return ResponseBuilder.fromValidationResult(res, errors);
        }

        try {
            const action = RECOVERY_ACTIONS.find(candidate => candidate === bodyField(req, 'action')) ?? 'reset';
            const olderThan = Number(bodyField(req, 'pending_older_than_minutes'));

            const recovered = await jobService.recoverStuckJobs({
                action,
                includePending: isTrue(bodyField(req, 'include_pending')),
                pendingOlderThanMinutes: Number.isInteger(olderThan) && olderThan > 0 ? olderThan : undefined,
            });
            return ResponseBuilder.success(res, {
                action,
                recovered_count: recovered.length,
                jobs: recovered.map(outcome => ({
                    job_id: outcome.jobId,
                    previous_status: outcome.previousStatus,
                    status: outcome.status,
                })),
            });
        } catch (error: unknown) {
            return sendError(res, error, 'to recover stuck jobs');
        }
    };

    return { uploadExcelAsync, getJobStatus, getJobResult, cancelJob, listJobs, fixStuckJob, recoverStuckJobs };
}

export type JobController = ReturnType<typeof createJobController>;
