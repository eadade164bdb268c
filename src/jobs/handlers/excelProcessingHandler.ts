// src/jobs/handlers/excelProcessingHandler.ts
import { ExcelProcessingResult, IExcelProcessingJob, SheetOutcome, emptyProgress } from '../../models/job.model';
import { IFileUpload } from '../../models/fileUpload.model';
import { EventType } from '../../models/processingEvent.model';
import { IEventLogger } from '../../services/eventLogger.service';
import { ISheetFileSource } from '../../services/fileUpload.service';
import { ISheetProcessor } from '../../services/sheetProcessing.service';
import { ParseMethod } from '../../config/env';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { IJobHandler, JobContext } from '../jobContext';

export interface ExcelProcessingDeps {
    files: ISheetFileSource;
    sheetProcessor: ISheetProcessor;
    events: IEventLogger;
}

const sheetLabel = (sheet: IFileUpload): string => sheet.sheetName ?? sheet.originalFilename;

/**
 * Worker Logic Handler for the 'excel_processing' job type.
 * Parses every sheet split from the uploaded workbook, one at a time, and
 * checkpoints before and after each so cancellation is observed between sheets.
 */
export class ExcelProcessingHandler implements IJobHandler<IExcelProcessingJob> {
    constructor(private readonly deps: ExcelProcessingDeps) {}

    public async run(context: JobContext<IExcelProcessingJob>): Promise<ExcelProcessingResult> {
        const { job } = context;
        const { fileId, parseMethod } = job.inputData;
        const { files, events } = this.deps;

        // 1. Load the parent workbook and its sheets
        const parent = await files.getFile(fileId);
        if (!parent) {
            throw new Error(`File not found: ${fileId}`);
        }
        const sheets = await files.getSheets(fileId);
        const progress = emptyProgress(sheets.length);
        const results: SheetOutcome[] = [];

        // 2. Process sheets sequentially
        for (const sheet of sheets) {
            const sheetName = sheetLabel(sheet);
            progress.currentItem = `Processing ${sheetName}`;
            await context.checkpoint({ ...progress });

            await events.emit(EventType.SHEET_PARSE_STARTED, 'running', {
                jobId: job.jobId,
                fileId,
                sheetId: sheet.fileId,
                message: `Parsing sheet ${sheetName}`,
            });

            const outcome = await this.processSheet(job.jobId, fileId, sheet, parseMethod);
            results.push(outcome);
            if (outcome.status === 'success') {
                progress.completedItems++;
            } else {
                progress.failedItems++;
            }
            await context.checkpoint({ ...progress });
        }

        // 3. All-failed policy: nothing usable came out of the workbook
        const firstFailure = results.find(outcome => outcome.status === 'failed');
        if (sheets.length > 0 && progress.failedItems === sheets.length) {
            throw new Error(`All ${sheets.length} sheets failed to process: ${firstFailure?.error ?? 'unknown error'}`);
        }

        const result: ExcelProcessingResult = {
            totalSheets: sheets.length,
            successfulSheets: progress.completedItems,
            failedSheets: progress.failedItems,
            results,
            mainFileId: fileId,
        };

        // 4. Fully parsed workbooks no longer need the upload on disk (the record stays)
        if (progress.failedItems === 0) {
            result.parentDeleted = { disk: await this.deleteParent(job.jobId, parent), db: false };
        }

        return result;
    }

    private async processSheet(
        jobId: string,
        fileId: string,
        sheet: IFileUpload,
        parseMethod: ParseMethod,
    ): Promise<SheetOutcome> {
        const base = { sheetId: sheet.fileId, sheetName: sheetLabel(sheet) };
        const { sheetProcessor, events } = this.deps;

        let outcome: SheetOutcome;
        try {
            const processed = await sheetProcessor.processSheet(sheet, parseMethod);
            outcome = processed
                ? { ...base, status: 'success', portfolioId: processed.portfolioId }
                : { ...base, status: 'failed', error: 'Sheet processor returned no result' };
        } catch (error: unknown) {
            logger.warn('Sheet processing failed', { jobId, sheetId: sheet.fileId, error });
            outcome = { ...base, status: 'failed', error: errorMessage(error) };
        }

        await events.emit(EventType.SHEET_PARSE_COMPLETED, outcome.status, {
            jobId,
            fileId,
            sheetId: sheet.fileId,
            portfolioId: outcome.portfolioId,
            message: outcome.error,
        });
        return outcome;
    }

    private async deleteParent(jobId: string, parent: IFileUpload): Promise<boolean> {
        try {
            const deleted = await this.deps.files.deleteFromDisk(parent);
            if (deleted) {
                await this.deps.events.emit(EventType.SHEET_DELETED_DISK, 'success', {
                    jobId,
                    fileId: parent.fileId,
                    message: 'Deleted parent workbook from disk',
                });
            }
            return deleted;
        } catch (error: unknown) {
            logger.warn('Could not delete parent workbook from disk', { jobId, fileId: parent.fileId, error });
            return false;
        }
    }
}
