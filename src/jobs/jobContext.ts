// src/jobs/jobContext.ts
import { IJob, IJobProgress, JobResult } from '../models/job.model';

/** What a processing routine gets from the scheduler for one claimed job. */
export interface JobContext<J extends IJob = IJob> {
    job: J;
    /** Persists progress. Throws JobInterruptedError once the job has left `running`. */
    checkpoint(progress: IJobProgress): Promise<void>;
}

/** Processing routine for one job type. Its return value becomes the job result. */
export interface IJobHandler<J extends IJob = IJob> {
    run(context: JobContext<J>): Promise<JobResult<J['jobType']>>;
}
