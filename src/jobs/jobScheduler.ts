// src/jobs/jobScheduler.ts
import { setTimeout as sleep } from 'timers/promises';
import { IExcelProcessingJob, IJob, IJobProgress, JobResult } from '../models/job.model';
import { JobService } from '../services/job.service';
import { JobInterruptedError, JobQueueError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { IJobHandler, JobContext } from './jobContext';

/** One processing routine per job type. */
export interface JobHandlers {
    excelProcessing: IJobHandler<IExcelProcessingJob>;
}

export interface SchedulerOptions {
    maxConcurrentJobs?: number;
    pollIntervalMs?: number;
    errorBackoffMs?: number;
}

interface RunningTask {
    promise: Promise<void>;
    settled: boolean;
}

/**
 * Single-process scheduler: polls the queue, keeps at most `maxConcurrentJobs`
 * jobs in flight and drives each one to a terminal state.
 */
export class JobScheduler {
    private readonly maxConcurrentJobs: number;
    private readonly pollIntervalMs: number;
    private readonly errorBackoffMs: number;
    private readonly running = new Map<string, RunningTask>();
    private controller: AbortController | null = null;
    private loop: Promise<void> | null = null;

    constructor(
        private readonly jobService: JobService,
        private readonly handlers: JobHandlers,
        options: SchedulerOptions = {},
    ) {
        this.maxConcurrentJobs = options.maxConcurrentJobs ?? 5;
        this.pollIntervalMs = options.pollIntervalMs ?? 5000;
        this.errorBackoffMs = options.errorBackoffMs ?? 10000;
    }

    public get activeJobCount(): number {
        this.reap();
        return this.running.size;
    }

    public isRunning(): boolean {
        return this.loop !== null;
    }

    /** Starts the polling loop. A second call is a no-op. */
    public start(): void {
        if (this.loop) return;

        const controller = new AbortController();
        this.controller = controller;
        this.loop = this.runLoop(controller.signal);
        logger.info('Job scheduler started', {
            maxConcurrentJobs: this.maxConcurrentJobs,
            pollIntervalMs: this.pollIntervalMs,
        });
    }

    /** Stops polling and waits for in-flight jobs to settle. */
    public async stop(): Promise<void> {
        if (!this.controller || !this.loop) return;

        this.controller.abort();
        await this.loop;
        this.controller = null;
        this.loop = null;
        await this.drain();
        logger.info('Job scheduler stopped');
    }

    /**
     * One scheduling pass: claims pending jobs until the concurrency cap is hit
     * or the queue is empty. Returns how many jobs were started.
     */
    public async tick(): Promise<number> {
        this.reap();
        let started = 0;

        while (this.running.size < this.maxConcurrentJobs) {
            const job = await this.jobService.claimNextPending();
            if (!job) break;

            const inFlight = this.running.get(job.jobId);
            if (inFlight && !inFlight.settled) {
                // Re-queued behind our back; the routine already in flight keeps ownership
                logger.warn('Claimed a job whose routine is still in flight; not starting another', { jobId: job.jobId });
                continue;
            }

            const task: RunningTask = { promise: Promise.resolve(), settled: false };
            task.promise = this.execute(job).finally(() => {
                task.settled = true;
            });
            this.running.set(job.jobId, task);
            started++;
        }
        return started;
    }

    /** Resolves once every in-flight job has settled. */
    public async drain(): Promise<void> {
        while (this.running.size > 0) {
            await Promise.all([...this.running.values()].map(task => task.promise));
            this.reap();
        }
    }

    private async runLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            let delay = this.pollIntervalMs;
            try {
                await this.tick();
            } catch (error: unknown) {
                logger.error('Scheduler pass failed', { error });
                delay = this.errorBackoffMs;
            }
            await this.pause(delay, signal);
        }
    }

    private async pause(ms: number, signal: AbortSignal): Promise<void> {
        try {
            await sleep(ms, undefined, { signal });
        } catch (error: unknown) {
            if (!signal.aborted) throw error;
        }
    }

    private reap(): void {
        for (const [jobId, task] of this.running) {
            if (task.settled) this.running.delete(jobId);
        }
    }

    /** Runs one claimed job. Never rejects. */
    private async execute(job: IJob): Promise<void> {
        logger.info('Job started', { jobId: job.jobId, jobType: job.jobType });
        try {
            const result = await this.dispatch(job);
            await this.jobService.completeJob(job.jobId, result);
        } catch (error: unknown) {
            if (error instanceof JobInterruptedError) {
                logger.info('Job interrupted; leaving state to the actor that changed it', { jobId: job.jobId });
                return;
            }
            logger.error('Job processing failed', { jobId: job.jobId, error });
            await this.recordFailure(job.jobId, errorMessage(error));
        }
    }

    private async recordFailure(jobId: string, message: string): Promise<void> {
        try {
            await this.jobService.failJob(jobId, message);
        } catch (error: unknown) {
            // Left running; crash recovery picks it up
            logger.error('Could not record job failure', { jobId, error });
        }
    }

    private async dispatch(job: IJob): Promise<JobResult> {
        const context = this.createContext(job);
        const jobType: string = job.jobType;

        switch (jobType) {
            case 'excel_processing':
                return this.handlers.excelProcessing.run(context);
            default:
                throw new JobQueueError('UnknownJobType', `Unknown job type: ${jobType}`);
        }
    }

    private createContext(job: IExcelProcessingJob): JobContext<IExcelProcessingJob> {
        return {
            job,
            checkpoint: async (progress: IJobProgress) => {
                await this.jobService.checkpoint(job.jobId, progress);
            },
        };
    }
}
