// src/parserAdapters/manual.adapter.ts
import { IHolding, IPortfolioData } from '../models/portfolio.model';
import { CellPrimitive } from '../utils/workbook';
import { IPortfolioParser, SheetInput } from './parser.interface';
import headerAliases from './headerAliases.json';

type Column = keyof typeof headerAliases;
type ColumnMap = Partial<Record<Column, number>>;

const COLUMNS: readonly Column[] = ['name', 'isin', 'quantity', 'marketValue', 'weight'];
const MAX_HEADER_SCAN_ROWS = 25;

const normalizeHeader = (cell: CellPrimitive): string => String(cell).trim().toLowerCase().replace(/\s+/g, ' ');

const round4 = (value: number): number => Math.round(value * 10000) / 10000;

export function toNumber(cell: CellPrimitive | undefined): number | null {
  if (cell === null || cell === undefined) return null;
  if (typeof cell === 'number') return Number.isFinite(cell) ? cell : null;

  const cleaned = cell.replace(/[,%\s]/g, '');
  if (cleaned === '') return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

function toText(cell: CellPrimitive | undefined): string | null {
  if (cell === null || cell === undefined) return null;
  const text = String(cell).trim();
  return text === '' ? null : text;
}

export function mapColumns(header: readonly CellPrimitive[]): ColumnMap {
  const mapping: ColumnMap = {};
  for (const column of COLUMNS) {
    const aliases: readonly string[] = headerAliases[column];
    const index = header.findIndex(cell => cell !== null && aliases.includes(normalizeHeader(cell)));
    if (index !== -1) mapping[column] = index;
  }
  return mapping;
}

/** A header row names the instrument plus at least one of ISIN, weight or market value. */
function findHeaderRow(rows: readonly CellPrimitive[][]): { index: number; columns: ColumnMap } | null {
  const limit = Math.min(rows.length, MAX_HEADER_SCAN_ROWS);
  for (let index = 0; index < limit; index++) {
    const columns = mapColumns(rows[index]);
    const hasDetail = columns.isin !== undefined || columns.weight !== undefined || columns.marketValue !== undefined;
    if (columns.name !== undefined && hasDetail) {
      return { index, columns };
    }
  }
  return null;
}

interface ParsedRow {
  name: string | null;
  isin: string | null;
  quantity: number | null;
  marketValue: number | null;
  weight: number | null;
}

function readRow(row: readonly CellPrimitive[], columns: ColumnMap): ParsedRow {
  const at = (column: Column): CellPrimitive | undefined => {
    const index = columns[column];
    return index === undefined ? undefined : row[index];
  };
  return {
    name: toText(at('name')),
    isin: toText(at('isin')),
    quantity: toNumber(at('quantity')),
    marketValue: toNumber(at('marketValue')),
    weight: toNumber(at('weight')),
  };
}

function toHolding(row: ParsedRow): IHolding {
  const holding: IHolding = {
    nameOfInstrument: row.name ?? 'Unknown',
    isinCode: row.isin ?? 'Unknown',
    percentageToNav: `${(row.weight ?? 0).toFixed(4)}%`,
  };
  if (row.marketValue !== null) holding.marketValue = row.marketValue;
  if (row.quantity !== null) holding.quantity = row.quantity;
  return holding;
}

/**
 * Rule-based parser: maps known header aliases to holding fields.
 * When no row carries a weight, weights are derived from market value share.
 */
export class ManualParser implements IPortfolioParser {
  public readonly method = 'manual';

  constructor(private readonly now: () => Date = () => new Date()) {}

  public async parse(input: SheetInput): Promise<IPortfolioData> {
    const header = findHeaderRow(input.rows);
    if (!header) {
      throw new Error(`No holdings header row found in sheet ${input.sheetName}`);
    }

    const parsed = input.rows
      .slice(header.index + 1)
      .map(row => readRow(row, header.columns))
      .filter(row => row.name !== null || row.marketValue !== null);

    const totalValue = parsed.reduce((sum, row) => sum + (row.marketValue ?? 0), 0);
    const anyWeight = parsed.some(row => row.weight !== null);
    if (!anyWeight && totalValue > 0) {
      parsed.forEach(row => {
        row.weight = round4((100 * (row.marketValue ?? 0)) / totalValue);
      });
    }

    const holdings = parsed.map(toHolding);
    return {
      mutualFundName: this.fundName(input, header.index),
      portfolioDate: this.now().toLocaleString('en-US', { month: 'long', year: 'numeric', timeZone: 'UTC' }),
      totalHoldings: holdings.length,
      holdings,
    };
  }

  // Disclosures usually print the scheme name above the table
  private fundName(input: SheetInput, headerIndex: number): string {
    for (const row of input.rows.slice(0, headerIndex)) {
      const title = row.map(toText).find(text => text !== null);
      if (title) return title;
    }
    return `Portfolio ${input.sheetName.replace(/\.xlsx$/i, '').replace(/_/g, ' ')}`;
  }
}
