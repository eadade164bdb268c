// src/jobs/jobRegistry.ts
import { JobType } from '../models/job.model';
import { JobQueueError } from '../utils/errors';

type FieldType = 'string' | 'number' | 'boolean' | 'object';

interface IJobSchema {
    type: JobType;
    required: string[];
    properties: Record<string, FieldType | readonly string[]>; // string list = allowed values
}

export interface IJobPolicy {
    type: JobType;
    estimatedMinutesPerItem: number; // Used for completion/remaining-time estimates
}

// --- Schemas ---
const EXCEL_PROCESSING_SCHEMA: IJobSchema = {
    type: 'excel_processing',
    required: ['fileId', 'filePath', 'sheetCount', 'parseMethod'],
    properties: {
        fileId: 'string',
        filePath: 'string',
        sheetCount: 'number',
        parseMethod: ['manual', 'together'],
    },
};

// --- Policies ---
const EXCEL_PROCESSING_POLICY: IJobPolicy = {
    type: EXCEL_PROCESSING_SCHEMA.type,
    estimatedMinutesPerItem: 1.5, // LLM extraction averages ~90s per sheet
};

// --- Registry Setup ---

const JOB_REGISTRY: { [T in JobType]: { schema: IJobSchema; policy: IJobPolicy } } = {
    excel_processing: { schema: EXCEL_PROCESSING_SCHEMA, policy: EXCEL_PROCESSING_POLICY },
};

export function isRegisteredJobType(jobType: string): jobType is JobType {
    return Object.prototype.hasOwnProperty.call(JOB_REGISTRY, jobType);
}

function describe(value: unknown): string {
    if (Array.isArray(value)) return 'array';
    if (value === null) return 'null';
    return typeof value;
}

/**
 * Validates a job payload against its registered schema.
 * @throws {JobQueueError} - 'UnknownJobType' or 'PayloadValidationFailed'.
 */
export function validateJobPayload(jobType: string, payload: unknown): void {
    if (!isRegisteredJobType(jobType)) {
        throw new JobQueueError('UnknownJobType', `Unknown job type: ${jobType}`);
    }
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
        throw new JobQueueError('PayloadValidationFailed', 'Job input must be an object');
    }

    const { schema } = JOB_REGISTRY[jobType];
    const record: Record<string, unknown> = { ...payload };
    const errors: string[] = [];

    // 1. Check Required Fields
    schema.required.forEach(field => {
        if (record[field] === undefined) {
            errors.push(`Missing required field: ${field}`);
        }
    });

    // 2. Check Types / Allowed Values
    for (const [field, expected] of Object.entries(schema.properties)) {
        const value = record[field];
        if (value === undefined) continue;

        if (typeof expected !== 'string') {
            if (typeof value !== 'string' || !expected.includes(value)) {
                errors.push(`Invalid value for field ${field}: expected one of ${expected.join(', ')}`);
            }
        } else if (describe(value) !== expected) {
            errors.push(`Invalid type for field ${field}: expected ${expected}, got ${describe(value)}`);
        }
    }

    if (errors.length > 0) {
        throw new JobQueueError('PayloadValidationFailed', errors.join('; '));
    }
}

/** Retrieves the execution policy for a job type. */
export function getJobPolicy(jobType: JobType): IJobPolicy {
    return JOB_REGISTRY[jobType].policy;
}
