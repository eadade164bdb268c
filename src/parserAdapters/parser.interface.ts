// src/parserAdapters/parser.interface.ts
import { ParseMethod } from '../config/env';
import { IPortfolioData } from '../models/portfolio.model';
import { SheetRows } from '../utils/workbook';

export interface SheetInput {
  sheetName: string;
  rows: SheetRows;
}

/**
 * The Standard Interface for all sheet parsers.
 * A parser turns one sheet's rows into holdings; it never persists anything.
 */
export interface IPortfolioParser {
  readonly method: ParseMethod;

  /** @throws {Error} - when the sheet cannot be turned into a portfolio. */
  parse(input: SheetInput): Promise<IPortfolioData>;
}
