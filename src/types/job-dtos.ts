// Wire shapes for the /jobs API and webhook payloads (snake_case contract)
import { JobStatus, JobType } from '../models/job.model';

export interface JobProgressDTO {
  total_items: number;
  completed_items: number;
  failed_items: number;
  current_item: string | null;
  percentage: number;
}

export interface SheetOutcomeDTO {
  sheet_id: string;
  sheet_name: string;
  status: 'success' | 'failed';
  portfolio_id?: string;
  error?: string;
}

export interface ExcelProcessingResultDTO {
  total_sheets: number;
  successful_sheets: number;
  failed_sheets: number;
  results: SheetOutcomeDTO[];
  main_file_id: string;
  parent_deleted?: { disk: boolean; db: boolean };
}

export type JobResultDTO = ExcelProcessingResultDTO;

export interface JobCreatedDTO {
  job_id: string;
  status: 'pending';
  message: string;
  estimated_completion_time: string;
  status_url: string;
  webhook_url: string | null;
  note?: string;
}

export interface JobStatusDTO {
  job_id: string;
  job_type: JobType;
  status: JobStatus;
  progress: JobProgressDTO;
  result: JobResultDTO | null;
  error_message: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  estimated_remaining_time: string | null;
}

export type JobResultResponseDTO =
  | { job_id: string; status: 'completed'; result: JobResultDTO | null; completed_at: string | null }
  | { job_id: string; status: 'failed'; error_message: string | null; completed_at: string | null }
  | { job_id: string; status: JobStatus; message: string; progress: JobProgressDTO };

export interface JobSummaryDTO {
  job_id: string;
  job_type: JobType;
  status: JobStatus;
  progress: JobProgressDTO;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

export interface WebhookPayloadDTO {
  job_id: string;
  status: JobStatus;
  progress: JobProgressDTO;
  result: JobResultDTO | null;
  error_message: string | null;
  completed_at: string | null;
}
