// src/services/fileUpload.service.ts
import { randomUUID } from 'crypto';
import { mkdir, stat, unlink, writeFile } from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import { FileType, IFileUpload } from '../models/fileUpload.model';
import { EventType } from '../models/processingEvent.model';
import { IFileUploadRepository } from './fileUploadRepository';
import { IEventLogger } from './eventLogger.service';
import { FileUploadError, errorMessage } from '../utils/errors';
import { sanitizeSheetName, writeSingleSheet } from '../utils/workbook';
import { logger } from '../utils/logger';

const WORKBOOK_EXTENSIONS: ReadonlySet<string> = new Set(['.xlsx', '.xlsm']);

/** Raw upload as received from the HTTP layer. */
export interface UploadedFile {
  originalname: string;
  buffer: Buffer;
}

/** What the processing routine needs from file storage. */
export interface ISheetFileSource {
  getFile(fileId: string): Promise<IFileUpload | null>;
  /** Sheets split from the workbook, ordered by sheetIndex. */
  getSheets(parentId: string): Promise<IFileUpload[]>;
  /** Removes the stored file. False when it was already gone. */
  deleteFromDisk(file: IFileUpload): Promise<boolean>;
}

export interface FileUploadServiceOptions {
  uploadDir: string;
  sheetsDir: string;
  generateId?: () => string;
}

export function resolveFileType(filename: string): FileType {
  const extension = path.extname(filename).toLowerCase();
  if (!WORKBOOK_EXTENSIONS.has(extension)) {
    throw new FileUploadError('UnsupportedFileType', `Unsupported file type: ${extension || filename}`);
  }
  return 'excel';
}

const safeFilename = (name: string): string => name.replace(/[^\w.-]+/g, '_');

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileUploadService implements ISheetFileSource {
  private readonly uploadDir: string;
  private readonly sheetsDir: string;
  private readonly generateId: () => string;

  constructor(
    private readonly repository: IFileUploadRepository,
    private readonly events: IEventLogger,
    options: FileUploadServiceOptions,
  ) {
    this.uploadDir = options.uploadDir;
    this.sheetsDir = options.sheetsDir;
    this.generateId = options.generateId ?? randomUUID;
  }

  /** Stores an uploaded workbook on disk and records it. Only Excel workbooks are accepted. */
  public async saveWorkbook(file: UploadedFile): Promise<IFileUpload> {
    const fileType = resolveFileType(file.originalname);

    const fileId = this.generateId();
    const storedFilename = `${fileId}_${safeFilename(file.originalname)}`;
    const filePath = path.join(this.uploadDir, storedFilename);

    await mkdir(this.uploadDir, { recursive: true });
    await writeFile(filePath, file.buffer);

    const saved = await this.repository.create({
      fileId,
      originalFilename: file.originalname,
      storedFilename,
      fileType,
      filePath,
      parentId: null,
      sheetName: null,
      sheetIndex: null,
      status: 'uploaded',
      fileSize: file.buffer.length,
      errorMessage: null,
      processingMetadata: {},
    });

    await this.events.emit(EventType.UPLOAD_RECEIVED, 'success', {
      fileId,
      message: `Received ${file.originalname}`,
      metadata: { fileSize: saved.fileSize },
    });
    return saved;
  }

  /**
   * Writes every worksheet of the workbook to its own file under the sheets
   * directory and records each as a `sheet` child of the parent.
   * @throws {FileUploadError} - 'WorkbookUnreadable' when exceljs cannot open the file.
   */
  public async splitWorkbook(parent: IFileUpload): Promise<IFileUpload[]> {
    await this.repository.update(parent.fileId, { status: 'splitting' });

    const workbook = new ExcelJS.Workbook();
    try {
      await workbook.xlsx.readFile(parent.filePath);
    } catch (error: unknown) {
      const message = `Could not read workbook ${parent.originalFilename}: ${errorMessage(error)}`;
      await this.repository.update(parent.fileId, { status: 'failed', errorMessage: message });
      throw new FileUploadError('WorkbookUnreadable', message);
    }

    await mkdir(this.sheetsDir, { recursive: true });
    const baseName = safeFilename(path.parse(parent.originalFilename).name);
    const sheets: IFileUpload[] = [];

    for (const [sheetIndex, worksheet] of workbook.worksheets.entries()) {
      const sheetId = this.generateId();
      const originalFilename = `${baseName}_${safeFilename(sanitizeSheetName(worksheet.name))}.xlsx`;
      const storedFilename = `${sheetId}_${originalFilename}`;
      const filePath = path.join(this.sheetsDir, storedFilename);

      await writeSingleSheet(worksheet, filePath);
      const { size } = await stat(filePath);

      sheets.push(await this.repository.create({
        fileId: sheetId,
        originalFilename,
        storedFilename,
        fileType: 'sheet',
        filePath,
        parentId: parent.fileId,
        sheetName: worksheet.name,
        sheetIndex,
        status: 'uploaded',
        fileSize: size,
        errorMessage: null,
        processingMetadata: {},
      }));
    }

    await this.repository.update(parent.fileId, {
      status: 'completed',
      processingMetadata: {
        sheetsCreated: sheets.length,
        sheetNames: sheets.map(sheet => sheet.sheetName),
        sheetIds: sheets.map(sheet => sheet.fileId),
      },
    });

    logger.info('Workbook split into sheets', { fileId: parent.fileId, sheetCount: sheets.length });
    await this.events.emit(EventType.EXCEL_SPLIT, 'success', {
      fileId: parent.fileId,
      message: `Split into ${sheets.length} sheets`,
      metadata: { sheetIds: sheets.map(sheet => sheet.fileId) },
    });
    return sheets;
  }

  /**
   * Removes the files of an upload that will never be processed and marks the
   * parent and its sheets failed.
   */
  public async discardUpload(parent: IFileUpload, reason: string): Promise<void> {
    const sheets = await this.repository.findByParent(parent.fileId);
    for (const file of [...sheets, parent]) {
      await this.deleteFromDisk(file);
      await this.repository.update(file.fileId, { status: 'failed', errorMessage: reason });
    }
    logger.warn('Upload discarded', { fileId: parent.fileId, sheetCount: sheets.length, reason });
  }

  public async getFile(fileId: string): Promise<IFileUpload | null> {
    return this.repository.findById(fileId);
  }

  public async getSheets(parentId: string): Promise<IFileUpload[]> {
    return this.repository.findByParent(parentId);
  }

  public async deleteFromDisk(file: IFileUpload): Promise<boolean> {
    try {
      await unlink(file.filePath);
      return true;
    } catch (error: unknown) {
      if (isMissingFileError(error)) return false;
      throw error;
    }
  }
}
