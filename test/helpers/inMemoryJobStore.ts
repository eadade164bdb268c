import { IJob, JobStatus } from '../../src/models/job.model';
import { IJobStore, JobListFilter, JobPatch, JobUpdateOptions } from '../../src/services/jobStore';
import { JobQueueError } from '../../src/utils/errors';

/** IJobStore backed by a Map. Every read and write is a deep copy, as it would be through Mongo. */
export class InMemoryJobStore implements IJobStore {
  private readonly jobs = new Map<string, IJob>();

  public async create(job: IJob): Promise<IJob> {
    if (this.jobs.has(job.jobId)) {
      throw new JobQueueError('DuplicateKey', `Job ${job.jobId} already exists`);
    }
    this.jobs.set(job.jobId, structuredClone(job));
    return structuredClone(job);
  }

  public async get(jobId: string): Promise<IJob | null> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : null;
  }

  public async update(jobId: string, patch: JobPatch, options: JobUpdateOptions = {}): Promise<IJob | null> {
    const current = this.jobs.get(jobId);
    if (!current) return null;
    if (options.expectedStatus && !options.expectedStatus.includes(current.status)) return null;

    const updated: IJob = { ...current, ...structuredClone(patch) };
    this.jobs.set(jobId, updated);
    return structuredClone(updated);
  }

  public async nextPending(): Promise<IJob | null> {
    const [best] = [...this.jobs.values()]
      .filter(job => job.status === 'pending')
      .sort((a, b) => a.priority - b.priority || a.createdAt.getTime() - b.createdAt.getTime());
    return best ? structuredClone(best) : null;
  }

  public async list(filter: JobListFilter): Promise<IJob[]> {
    const statuses: readonly JobStatus[] | null =
      filter.status === undefined ? null : typeof filter.status === 'string' ? [filter.status] : filter.status;
    const matches = [...this.jobs.values()]
      .filter(job => !statuses || statuses.includes(job.status))
      .filter(job => !filter.userId || job.userId === filter.userId)
      .filter(job => !filter.startedBefore || (job.startedAt !== null && job.startedAt < filter.startedBefore))
      .filter(job => !filter.createdBefore || job.createdAt < filter.createdBefore)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return (filter.limit ? matches.slice(0, filter.limit) : matches).map(job => structuredClone(job));
  }

  /** Test hook: overwrite a stored job directly. */
  public seed(job: IJob): void {
    this.jobs.set(job.jobId, structuredClone(job));
  }
}
