// src/models/processingEvent.model.ts
import { Schema, model } from 'mongoose';

export enum EventType {
  JOB_CREATED = 'job_created',
  JOB_STATUS_CHANGED = 'job_status_changed',
  JOB_RECOVERED = 'job_recovered',
  UPLOAD_RECEIVED = 'upload_received',
  EXCEL_SPLIT = 'excel_split',
  SHEET_PARSE_STARTED = 'sheet_parse_started',
  SHEET_PARSE_COMPLETED = 'sheet_parse_completed',
  PORTFOLIO_SAVED = 'portfolio_saved',
  SHEET_DELETED_DISK = 'sheet_deleted_from_disk',
  WEBHOOK_SENT = 'webhook_sent',
  WEBHOOK_SKIPPED = 'webhook_skipped',
  WEBHOOK_FAILED = 'webhook_failed',
}

export type EventStatus = 'success' | 'failed' | 'info' | 'pending' | 'running' | 'completed' | 'cancelled';

export interface IProcessingEvent {
  eventType: EventType;
  status: EventStatus;
  timestamp: Date;
  // Correlation identifiers
  jobId?: string;
  fileId?: string; // parent workbook
  sheetId?: string;
  portfolioId?: string;
  message?: string;
  metadata?: Record<string, unknown>;
}

const ProcessingEventSchema = new Schema<IProcessingEvent>({
  eventType: { type: String, enum: Object.values(EventType), required: true, index: true },
  status: { type: String, required: true },
  timestamp: { type: Date, default: Date.now, index: true },
  jobId: { type: String, index: true },
  fileId: { type: String },
  sheetId: { type: String },
  portfolioId: { type: String },
  message: { type: String },
  metadata: { type: Schema.Types.Mixed },
}, { collection: 'processing_events', versionKey: false });

export const ProcessingEventModel = model<IProcessingEvent>('ProcessingEvent', ProcessingEventSchema);
