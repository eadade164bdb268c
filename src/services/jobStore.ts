// src/services/jobStore.ts
import { FilterQuery, UpdateQuery } from 'mongoose';
import { IJob, JobModel, JobStatus } from '../models/job.model';
import { JobQueueError } from '../utils/errors';

/** Fields the queue mutates after creation. `inputData` and `jobId` never change. */
export type JobPatch = Partial<
  Pick<IJob, 'status' | 'progress' | 'result' | 'errorMessage' | 'startedAt' | 'completedAt'>
>;

export interface JobUpdateOptions {
  /** Apply the patch only if the job is currently in one of these states. */
  expectedStatus?: readonly JobStatus[];
}

export interface JobListFilter {
  status?: JobStatus | readonly JobStatus[];
  userId?: string;
  startedBefore?: Date;
  createdBefore?: Date;
  limit?: number;
}

/**
 * Durable CRUD for job documents. Writes are field merges keyed on jobId;
 * a guarded update (expectedStatus) is the only concurrency primitive.
 */
export interface IJobStore {
  create(job: IJob): Promise<IJob>;
  get(jobId: string): Promise<IJob | null>;
  update(jobId: string, patch: JobPatch, options?: JobUpdateOptions): Promise<IJob | null>;
  /** Best pending candidate: lowest priority number, then earliest createdAt. */
  nextPending(): Promise<IJob | null>;
  /** Newest first. */
  list(filter: JobListFilter): Promise<IJob[]>;
}

const DUPLICATE_KEY_CODE = 11000;

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY_CODE;
}

function toJob(doc: IJob): IJob {
  // Drop Mongo's _id so callers only ever see the domain shape
  const { jobId, jobType, status, inputData, progress, result, errorMessage, createdAt, startedAt,
    completedAt, callbackUrl, callbackHeaders, userId, priority } = doc;
  return {
    jobId, jobType, status, inputData, progress, result, errorMessage, createdAt, startedAt,
    completedAt, callbackUrl, callbackHeaders, userId, priority,
  };
}

export class MongoJobStore implements IJobStore {

  public async create(job: IJob): Promise<IJob> {
    try {
      const created = await JobModel.create(job);
      return toJob(created.toObject());
    } catch (error: unknown) {
      if (isDuplicateKeyError(error)) {
        throw new JobQueueError('DuplicateKey', `Job ${job.jobId} already exists`);
      }
      throw error;
    }
  }

  public async get(jobId: string): Promise<IJob | null> {
    const doc = await JobModel.findOne({ jobId }).lean<IJob>();
    return doc ? toJob(doc) : null;
  }

  public async update(jobId: string, patch: JobPatch, options: JobUpdateOptions = {}): Promise<IJob | null> {
    const query: FilterQuery<IJob> = { jobId };
    if (options.expectedStatus) {
      query.status = { $in: [...options.expectedStatus] };
    }

    const update: UpdateQuery<IJob> = { $set: patch };
    const doc = await JobModel.findOneAndUpdate(query, update, { new: true }).lean<IJob>();
    return doc ? toJob(doc) : null;
  }

  public async nextPending(): Promise<IJob | null> {
    const doc = await JobModel.findOne({ status: 'pending' })
      .sort({ priority: 1, createdAt: 1 })
      .lean<IJob>();
    return doc ? toJob(doc) : null;
  }

  public async list(filter: JobListFilter): Promise<IJob[]> {
    const query: FilterQuery<IJob> = {};
    if (filter.status) {
      query.status = typeof filter.status === 'string' ? filter.status : { $in: [...filter.status] };
    }
    if (filter.userId) query.userId = filter.userId;
    if (filter.startedBefore) query.startedAt = { $lt: filter.startedBefore };
    if (filter.createdBefore) query.createdAt = { $lt: filter.createdBefore };

    let cursor = JobModel.find(query).sort({ createdAt: -1 });
    if (filter.limit) cursor = cursor.limit(filter.limit);

    const docs = await cursor.lean<IJob[]>();
    return docs.map(toJob);
  }
}
