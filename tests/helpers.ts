import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import ExcelJS from 'exceljs';

export function makeTempDir(prefix = 'spare-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

/** Write a one-sheet workbook whose first row is the header. */
export async function writeWorkbook(
  path: string,
  sheetName: string,
  rows: Array<Array<string | number | null>>
): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  for (const row of rows) sheet.addRow(row);
  await workbook.xlsx.writeFile(path);
}
