// src/services/sheetProcessing.service.ts
import { ParseMethod } from '../config/env';
import { IFileUpload } from '../models/fileUpload.model';
import { IPortfolioData } from '../models/portfolio.model';
import { EventType } from '../models/processingEvent.model';
import { IParserFactory } from '../parserAdapters/adapter.factory';
import { SheetInput } from '../parserAdapters/parser.interface';
import { IFileUploadRepository } from './fileUploadRepository';
import { IPortfolioStore } from './portfolioStore';
import { IEventLogger } from './eventLogger.service';
import { SheetRows, readSheetRows } from '../utils/workbook';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ProcessedSheet {
  portfolioId: string;
  portfolio: IPortfolioData;
}

export interface ISheetProcessor {
  /**
   * Parses one sheet and persists its portfolio.
   * Returns null when the sheet holds no holdings; throws on any other failure.
   */
  processSheet(sheet: IFileUpload, parseMethod: ParseMethod): Promise<ProcessedSheet | null>;
}

export interface SheetProcessingDeps {
  files: IFileUploadRepository;
  portfolios: IPortfolioStore;
  parsers: IParserFactory;
  events: IEventLogger;
  readRows?: (filePath: string) => Promise<SheetRows>;
}

export class SheetProcessingService implements ISheetProcessor {
  private readonly readRows: (filePath: string) => Promise<SheetRows>;

  constructor(private readonly deps: SheetProcessingDeps) {
    this.readRows = deps.readRows ?? readSheetRows;
  }

  public async processSheet(sheet: IFileUpload, parseMethod: ParseMethod): Promise<ProcessedSheet | null> {
    const { files, portfolios, events } = this.deps;
    await files.update(sheet.fileId, { status: 'processing' });

    try {
      // 1. Read and parse
      const input: SheetInput = {
        sheetName: sheet.sheetName ?? sheet.originalFilename,
        rows: await this.readRows(sheet.filePath),
      };
      const { portfolio, method } = await this.parse(input, parseMethod, sheet.fileId);

      if (portfolio.holdings.length === 0) {
        await files.update(sheet.fileId, { status: 'failed', errorMessage: 'No holdings found in sheet' });
        return null;
      }

      // 2. Persist under the sheet's id so a re-run overwrites the same portfolio
      const portfolioId = await portfolios.upsert({
        _id: sheet.fileId,
        sheetId: sheet.fileId,
        sourceFileId: sheet.parentId ?? sheet.fileId,
        parseMethod: method,
        ...portfolio,
      });

      const metadata = {
        portfolioId,
        parsingMethod: method,
        holdingsCount: portfolio.totalHoldings,
        mutualFundName: portfolio.mutualFundName,
      };
      await files.update(sheet.fileId, { status: 'parsed', processingMetadata: metadata });
      await events.emit(EventType.PORTFOLIO_SAVED, 'success', {
        fileId: sheet.parentId ?? undefined,
        sheetId: sheet.fileId,
        portfolioId,
        metadata,
      });

      return { portfolioId, portfolio };
    } catch (error: unknown) {
      await files.update(sheet.fileId, { status: 'failed', errorMessage: errorMessage(error) });
      throw error;
    }
  }

  /** Runs the requested parser; anything other than manual falls back to manual on failure. */
  private async parse(
    input: SheetInput,
    parseMethod: ParseMethod,
    sheetId: string,
  ): Promise<{ portfolio: IPortfolioData; method: ParseMethod }> {
    const { parsers } = this.deps;
    if (parseMethod === 'manual') {
      return { portfolio: await parsers.getParser('manual').parse(input), method: 'manual' };
    }

    try {
      return { portfolio: await parsers.getParser(parseMethod).parse(input), method: parseMethod };
    } catch (error: unknown) {
      logger.warn('Parser failed; falling back to manual parsing', { sheetId, parseMethod, error });
    }
    return { portfolio: await parsers.getParser('manual').parse(input), method: 'manual' };
  }
}
