// src/utils/workbook.ts
import ExcelJS, { CellValue, Worksheet } from 'exceljs';

export type CellPrimitive = string | number | null;
export type SheetRows = CellPrimitive[][];

/** Flattens exceljs cell values (formulas, rich text, links) to plain values. */
export function normalizeCell(value: CellValue): CellPrimitive {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return value.trim() === '' ? null : value.trim();
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  if ('result' in value) return normalizeCell(value.result);
  if ('richText' in value) return normalizeCell(value.richText.map(part => part.text).join(''));
  if ('hyperlink' in value) return normalizeCell(value.text);
  return null; // error cells (#N/A, #REF!)
}

/** Reads the first worksheet of a workbook as rows of primitives, dropping empty rows. */
export async function readSheetRows(filePath: string): Promise<SheetRows> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(filePath);

  const worksheet = workbook.worksheets[0];
  if (!worksheet) return [];

  const rows: SheetRows = [];
  worksheet.eachRow({ includeEmpty: false }, row => {
    const cells: CellPrimitive[] = [];
    for (let col = 1; col <= worksheet.columnCount; col++) {
      cells.push(normalizeCell(row.getCell(col).value));
    }
    if (cells.some(cell => cell !== null)) rows.push(cells);
  });
  return rows;
}

export function sanitizeSheetName(name: string): string {
  return name.replace(/[\\/*?:[\]]/g, '_').slice(0, 31) || 'Sheet';
}

/** Copies one worksheet's cell values into a new single-sheet workbook file. */
export async function writeSingleSheet(source: Worksheet, filePath: string): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();
  const target = workbook.addWorksheet(sanitizeSheetName(source.name));

  source.eachRow({ includeEmpty: false }, (row, rowNumber) => {
    row.eachCell({ includeEmpty: false }, (cell, colNumber) => {
      target.getCell(rowNumber, colNumber).value = cell.value;
    });
  });

  await workbook.xlsx.writeFile(filePath);
}
