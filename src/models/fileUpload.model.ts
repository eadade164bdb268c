import { Schema, model } from 'mongoose';

export const FILE_TYPES = ['excel', 'sheet'] as const;
export type FileType = (typeof FILE_TYPES)[number];

export const FILE_STATUSES = ['uploaded', 'splitting', 'processing', 'parsed', 'completed', 'failed'] as const;
export type FileStatus = (typeof FILE_STATUSES)[number];

export interface IFileUpload {
  fileId: string;
  originalFilename: string;
  storedFilename: string;
  fileType: FileType;
  filePath: string; // Location on local disk
  parentId: string | null; // Workbook a sheet was split from
  sheetName: string | null;
  sheetIndex: number | null; // Position within the parent workbook
  status: FileStatus;
  fileSize: number;
  errorMessage: string | null;
  processingMetadata: Record<string, unknown>;
  createdAt?: Date;
  updatedAt?: Date;
}

const FileUploadSchema = new Schema<IFileUpload>(
  {
    fileId: { type: String, required: true, unique: true },
    originalFilename: { type: String, required: true, maxlength: 1024 },
    storedFilename: { type: String, required: true },
    fileType: { type: String, enum: FILE_TYPES, required: true },
    filePath: { type: String, required: true },
    parentId: { type: String, default: null, index: true },
    sheetName: { type: String, default: null },
    sheetIndex: { type: Number, default: null },
    status: { type: String, enum: FILE_STATUSES, default: 'uploaded' },
    fileSize: { type: Number, default: 0 },
    errorMessage: { type: String, default: null },
    processingMetadata: { type: Schema.Types.Mixed, default: () => ({}) },
  },
  { collection: 'file_uploads', timestamps: true, minimize: false, versionKey: false }
);

export const FileUploadModel = model<IFileUpload>('FileUpload', FileUploadSchema);
