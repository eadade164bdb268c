// src/utils/jobMapper.ts
import { ExcelProcessingResult, IJob, IJobProgress, progressPercentage } from '../models/job.model';
import { getJobPolicy } from '../jobs/jobRegistry';
import {
  ExcelProcessingResultDTO,
  JobProgressDTO,
  JobResultResponseDTO,
  JobStatusDTO,
  JobSummaryDTO,
  WebhookPayloadDTO,
} from '../types/job-dtos';

const toIso = (value: Date | null): string | null => (value ? value.toISOString() : null);

export function toProgressDTO(progress: IJobProgress): JobProgressDTO {
  return {
    total_items: progress.totalItems,
    completed_items: progress.completedItems,
    failed_items: progress.failedItems,
    current_item: progress.currentItem,
    percentage: progressPercentage(progress),
  };
}

export function toResultDTO(result: ExcelProcessingResult | null): ExcelProcessingResultDTO | null {
  if (!result) return null;

  const dto: ExcelProcessingResultDTO = {
    total_sheets: result.totalSheets,
    successful_sheets: result.successfulSheets,
    failed_sheets: result.failedSheets,
    results: result.results.map(outcome => ({
      sheet_id: outcome.sheetId,
      sheet_name: outcome.sheetName,
      status: outcome.status,
      ...(outcome.portfolioId !== undefined ? { portfolio_id: outcome.portfolioId } : {}),
      ...(outcome.error !== undefined ? { error: outcome.error } : {}),
    })),
    main_file_id: result.mainFileId,
  };
  if (result.parentDeleted) dto.parent_deleted = result.parentDeleted;
  return dto;
}

/**
 * Minutes left for a running job, based on the job type's per-item estimate.
 * Null unless the job is running with unprocessed items.
 */
export function estimateRemainingTime(job: IJob): string | null {
  if (job.status !== 'running' || job.progress.totalItems === 0) return null;

  const { totalItems, completedItems, failedItems } = job.progress;
  const remaining = totalItems - completedItems - failedItems;
  if (remaining <= 0) return null;

  const minutes = remaining * getJobPolicy(job.jobType).estimatedMinutesPerItem;
  return `${minutes.toFixed(1)} minutes`;
}

export function toJobStatusDTO(job: IJob): JobStatusDTO {
  return {
    job_id: job.jobId,
    job_type: job.jobType,
    status: job.status,
    progress: toProgressDTO(job.progress),
    result: toResultDTO(job.result),
    error_message: job.errorMessage,
    created_at: job.createdAt.toISOString(),
    started_at: toIso(job.startedAt),
    completed_at: toIso(job.completedAt),
    estimated_remaining_time: estimateRemainingTime(job),
  };
}

export function toJobResultResponseDTO(job: IJob): JobResultResponseDTO {
  switch (job.status) {
    case 'completed':
      return { job_id: job.jobId, status: 'completed', result: toResultDTO(job.result), completed_at: toIso(job.completedAt) };
    case 'failed':
      return { job_id: job.jobId, status: 'failed', error_message: job.errorMessage, completed_at: toIso(job.completedAt) };
    default:
      return { job_id: job.jobId, status: job.status, message: 'Job not yet completed', progress: toProgressDTO(job.progress) };
  }
}

export function toJobSummaryDTO(job: IJob): JobSummaryDTO {
  return {
    job_id: job.jobId,
    job_type: job.jobType,
    status: job.status,
    progress: toProgressDTO(job.progress),
    created_at: job.createdAt.toISOString(),
    started_at: toIso(job.startedAt),
    completed_at: toIso(job.completedAt),
  };
}

export function toWebhookPayload(job: IJob): WebhookPayloadDTO {
  return {
    job_id: job.jobId,
    status: job.status,
    progress: toProgressDTO(job.progress),
    result: toResultDTO(job.result),
    error_message: job.errorMessage,
    completed_at: toIso(job.completedAt),
  };
}
