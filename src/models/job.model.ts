// src/models/job.model.ts
import { Schema, model } from 'mongoose';
import { ParseMethod } from '../config/env';

export const JOB_STATUSES = ['pending', 'running', 'completed', 'failed', 'cancelled'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export interface IJobProgress {
  totalItems: number;
  completedItems: number;
  failedItems: number;
  currentItem: string | null;
}

// --- excel_processing payloads ---

export interface ExcelProcessingInput {
  fileId: string;
  filePath: string;
  sheetCount: number;
  parseMethod: ParseMethod;
}

export interface SheetOutcome {
  sheetId: string;
  sheetName: string;
  status: 'success' | 'failed';
  portfolioId?: string;
  error?: string;
}

export interface ExcelProcessingResult {
  totalSheets: number;
  successfulSheets: number;
  failedSheets: number;
  results: SheetOutcome[];
  mainFileId: string;
  parentDeleted?: { disk: boolean; db: boolean };
}

interface IJobBase {
  jobId: string;
  status: JobStatus;
  progress: IJobProgress;
  errorMessage: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  callbackUrl: string | null;
  callbackHeaders: Record<string, string> | null;
  userId: string | null;
  priority: number; // 1 = served first
}

export interface IExcelProcessingJob extends IJobBase {
  jobType: 'excel_processing';
  inputData: ExcelProcessingInput;
  result: ExcelProcessingResult | null;
}

/** Every job variant, discriminated by `jobType`. */
export type IJob = IExcelProcessingJob;
export type JobType = IJob['jobType'];
export type JobResult<T extends JobType = JobType> = NonNullable<Extract<IJob, { jobType: T }>['result']>;

export function emptyProgress(totalItems: number = 0): IJobProgress {
  return { totalItems, completedItems: 0, failedItems: 0, currentItem: null };
}

export function progressPercentage(progress: IJobProgress): number {
  if (progress.totalItems === 0) return 0;
  return (progress.completedItems / progress.totalItems) * 100;
}

const JobProgressSchema = new Schema<IJobProgress>({
  totalItems: { type: Number, default: 0 },
  completedItems: { type: Number, default: 0 },
  failedItems: { type: Number, default: 0 },
  currentItem: { type: String, default: null },
}, { _id: false });

const JobSchema = new Schema<IJob>({
  jobId: { type: String, required: true, unique: true },
  jobType: { type: String, required: true, enum: ['excel_processing'], index: true },
  status: { type: String, enum: JOB_STATUSES, default: 'pending', index: true },
  inputData: { type: Schema.Types.Mixed, required: true },
  progress: { type: JobProgressSchema, default: () => emptyProgress() },
  result: { type: Schema.Types.Mixed, default: null },
  errorMessage: { type: String, default: null },
  createdAt: { type: Date, default: Date.now },
  startedAt: { type: Date, default: null },
  completedAt: { type: Date, default: null },
  callbackUrl: { type: String, default: null },
  callbackHeaders: { type: Schema.Types.Mixed, default: null },
  userId: { type: String, default: null },
  priority: { type: Number, default: 5, min: 1, max: 10 },
}, { collection: 'jobs', minimize: false, versionKey: false });

// Dequeue order: lowest priority number, then oldest
JobSchema.index({ status: 1, priority: 1, createdAt: 1 });
JobSchema.index({ userId: 1, createdAt: -1 });

export const JobModel = model<IJob>('Job', JobSchema);
