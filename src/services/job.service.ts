// src/services/job.service.ts
import { randomUUID } from 'crypto';
import {
    IJob,
    IJobProgress,
    JobResult,
    JobStatus,
    emptyProgress,
} from '../models/job.model';
import { EventType } from '../models/processingEvent.model';
import { validateJobPayload } from '../jobs/jobRegistry';
import { IJobStore, JobPatch } from './jobStore';
import { IEventLogger } from './eventLogger.service';
import { IWebhookNotifier } from './webhookNotifier.service';
import { sanitizeCallbackUrl } from '../utils/callbackUrl';
import { JobInterruptedError, JobQueueError } from '../utils/errors';
import { logger } from '../utils/logger';

const DEFAULT_PRIORITY = 5;
const DEFAULT_LIST_LIMIT = 50;
const MAX_LIST_LIMIT = 500;
const MAX_CLAIM_ATTEMPTS = 5;
const DEFAULT_PENDING_AGE_MINUTES = 60;
export const RESTART_ERROR_MESSAGE = 'Job interrupted by service restart';

export type RecoveryAction = 'reset' | 'fail';

// Distributes over the job union so jobType and inputData stay paired
type JobVariantFields<J> = J extends IJob ? Pick<J, 'jobType' | 'inputData'> : never;

export type ICreateJobRequest = JobVariantFields<IJob> & {
    callbackUrl?: string | null;
    callbackHeaders?: Record<string, string> | null;
    userId?: string | null;
    priority?: number;
};

export interface ICreateJobResult {
    job: IJob;
    note?: string; // Advisory, e.g. a dropped callback URL
}

export interface IRecoverOptions {
    action: RecoveryAction;
    includePending?: boolean;
    pendingOlderThanMinutes?: number;
}

export interface IRecoveredJob {
    jobId: string;
    previousStatus: JobStatus;
    status: JobStatus;
}

export interface JobServiceOptions {
    /** Jobs started before this instant have no live owner. Defaults to construction time. */
    processStartedAt?: Date;
    now?: () => Date;
    generateId?: () => string;
}

export class JobService {
    public readonly processStartedAt: Date;
    private readonly now: () => Date;
    private readonly generateId: () => string;

    constructor(
        private readonly store: IJobStore,
        private readonly events: IEventLogger,
        private readonly notifier: IWebhookNotifier,
        options: JobServiceOptions = {},
    ) {
        this.now = options.now ?? (() => new Date());
        this.processStartedAt = options.processStartedAt ?? this.now();
        this.generateId = options.generateId ?? randomUUID;
    }

    /** Persists a new pending job. Returns immediately; processing happens in the scheduler. */
    public async createJob(request: ICreateJobRequest): Promise<ICreateJobResult> {
        const { jobType, inputData, callbackHeaders, userId, priority = DEFAULT_PRIORITY } = request;

        // 1. VALIDATION: job type and payload schema
        validateJobPayload(jobType, inputData);
        if (!Number.isInteger(priority) || priority < 1 || priority > 10) {
            throw new JobQueueError('PayloadValidationFailed', 'Priority must be an integer between 1 and 10');
        }

        // 2. Callback URL problems are advisory, never fatal
        const callback = sanitizeCallbackUrl(request.callbackUrl);

        // 3. Create Job Record
        const job: IJob = {
            jobId: this.generateId(),
            jobType,
            status: 'pending',
            inputData,
            progress: emptyProgress(),
            result: null,
            errorMessage: null,
            createdAt: this.now(),
            startedAt: null,
            completedAt: null,
            callbackUrl: callback.url,
            callbackHeaders: callback.url && callbackHeaders ? callbackHeaders : null,
            userId: userId ?? null,
            priority,
        };
        const saved = await this.store.create(job);

        logger.info('Job created', { jobId: saved.jobId, jobType, priority });
        await this.events.emit(EventType.JOB_CREATED, 'success', {
            jobId: saved.jobId,
            message: `Background job created (${jobType})`,
            metadata: { input: { ...inputData }, userId: saved.userId },
        });

        return callback.note ? { job: saved, note: callback.note } : { job: saved };
    }

    public async getJob(jobId: string): Promise<IJob> {
        const job = await this.store.get(jobId);
        if (!job) {
            throw new JobQueueError('JobNotFound', `Job not found: ${jobId}`);
        }
        return job;
    }

    public async listJobs(filter: { status?: JobStatus; userId?: string; limit?: number }): Promise<IJob[]> {
        const limit = Math.min(Math.max(filter.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);
        return this.store.list({ status: filter.status, userId: filter.userId, limit });
    }

    /**
     * Cancels a pending or running job. A running job stops cooperatively at its
     * next progress checkpoint.
     */
    public async cancelJob(jobId: string): Promise<IJob> {
        const cancelled = await this.transition(jobId, ['pending', 'running'], {
            status: 'cancelled',
            completedAt: this.now(),
        });
        if (!cancelled) {
            const current = await this.getJob(jobId);
            throw new JobQueueError('InvalidTransition', `Cannot cancel job in status: ${current.status}`);
        }
        return cancelled;
    }

    // --- Transitions driven by the scheduler and job handlers ---

    /** Claims the best pending job (pending -> running). Null when the queue is empty. */
    public async claimNextPending(): Promise<IJob | null> {
        for (let attempt = 0; attempt < MAX_CLAIM_ATTEMPTS; attempt++) {
            const candidate = await this.store.nextPending();
            if (!candidate) return null;

            const claimed = await this.transition(candidate.jobId, ['pending'], {
                status: 'running',
                startedAt: this.now(),
            });
            if (claimed) return claimed;
            // Lost a race (cancelled between read and claim); try the next candidate
        }
        return null;
    }

    /**
     * Persists progress for a running job.
     * @throws {JobInterruptedError} - the job was cancelled or reset meanwhile.
     */
    public async checkpoint(jobId: string, progress: IJobProgress): Promise<IJob> {
        if (progress.completedItems + progress.failedItems > progress.totalItems) {
            throw new Error(`Progress for job ${jobId} exceeds its total items`);
        }
        const updated = await this.store.update(jobId, { progress: { ...progress } }, { expectedStatus: ['running'] });
        if (!updated) {
            throw new JobInterruptedError(jobId);
        }
        return updated;
    }

    public async completeJob(jobId: string, result: JobResult): Promise<IJob | null> {
        const completed = await this.transition(jobId, ['running'], {
            status: 'completed',
            result,
            completedAt: this.now(),
        });
        if (!completed) {
            logger.info('Job left running state before completion; result discarded', { jobId });
            return null;
        }
        logger.info('Job completed', { jobId });
        await this.notifier.notify(completed);
        return completed;
    }

    public async failJob(jobId: string, message: string): Promise<IJob | null> {
        const failed = await this.transition(jobId, ['running'], {
            status: 'failed',
            errorMessage: message,
            completedAt: this.now(),
        });
        if (!failed) {
            logger.info('Job left running state before failure was recorded', { jobId, error: message });
            return null;
        }
        logger.warn('Job failed', { jobId, error: message });
        await this.notifier.notify(failed);
        return failed;
    }

    // --- Crash recovery ---

    /**
     * Recovers jobs stranded in `running` by a previous process. `reset` re-queues
     * them from the first item, `fail` closes them with a synthetic error.
     */
    public async recoverStuckJobs(options: IRecoverOptions): Promise<IRecoveredJob[]> {
        const stuck = await this.store.list({ status: 'running', startedBefore: this.processStartedAt });

        if (options.includePending && options.action === 'fail') {
            const ageMinutes = options.pendingOlderThanMinutes ?? DEFAULT_PENDING_AGE_MINUTES;
            const createdBefore = new Date(this.now().getTime() - ageMinutes * 60_000);
            stuck.push(...await this.store.list({ status: 'pending', createdBefore }));
        }

        const recovered: IRecoveredJob[] = [];
        for (const job of stuck) {
            const outcome = await this.recoverJob(job, options.action);
            if (outcome) recovered.push(outcome);
        }

        logger.info('Stuck job recovery finished', { action: options.action, scanned: stuck.length, recovered: recovered.length });
        return recovered;
    }

    /**
     * Operator override for a single pending/running job. A job this process is
     * still running can be failed but not reset: re-queueing it would let the
     * scheduler start a second routine for it.
     */
    public async fixStuckJob(jobId: string, action: RecoveryAction): Promise<IRecoveredJob> {
        const job = await this.getJob(jobId);
        if (job.status !== 'pending' && job.status !== 'running') {
            throw new JobQueueError('InvalidTransition', `Cannot recover job in status: ${job.status}`);
        }
        if (action === 'reset' && this.isOwnedByThisProcess(job)) {
            throw new JobQueueError(
                'InvalidTransition',
                `Cannot reset job ${jobId}: it is running in this process; use action 'fail' instead`,
            );
        }

        const outcome = await this.recoverJob(job, action);
        if (!outcome) {
            const current = await this.getJob(jobId);
            throw new JobQueueError('InvalidTransition', `Cannot recover job in status: ${current.status}`);
        }
        return outcome;
    }

    private isOwnedByThisProcess(job: IJob): boolean {
        return job.status === 'running'
            && job.startedAt !== null
            && job.startedAt.getTime() >= this.processStartedAt.getTime();
    }

    private async recoverJob(job: IJob, action: RecoveryAction): Promise<IRecoveredJob | null> {
        const patch: JobPatch = action === 'reset'
            ? { status: 'pending', progress: emptyProgress(), result: null, errorMessage: null, startedAt: null, completedAt: null }
            : { status: 'failed', errorMessage: RESTART_ERROR_MESSAGE, completedAt: this.now() };

        const updated = await this.transition(job.jobId, [job.status], patch);
        if (!updated) return null;

        await this.events.emit(EventType.JOB_RECOVERED, 'info', {
            jobId: job.jobId,
            message: `Recovered stuck job (${action})`,
            metadata: { previousStatus: job.status, status: updated.status },
        });
        if (updated.status === 'failed') {
            await this.notifier.notify(updated);
        }
        return { jobId: job.jobId, previousStatus: job.status, status: updated.status };
    }

    /** Guarded status change plus its lifecycle event. */
    private async transition(jobId: string, from: readonly JobStatus[], patch: JobPatch): Promise<IJob | null> {
        const updated = await this.store.update(jobId, patch, { expectedStatus: from });
        if (updated && patch.status) {
            await this.events.emit(EventType.JOB_STATUS_CHANGED, updated.status, {
                jobId,
                metadata: { progress: { ...updated.progress }, error: updated.errorMessage },
            });
        }
        return updated;
    }
}
