// src/features/spatial/snippet-loader.ts
import { extname } from "path";
import ExcelJS from "exceljs";
import type { Worksheet } from "exceljs";
import { SnippetSourceError } from "./errors.js";

export interface SnippetSource {
  path: string;
  sheet: string;
  column: string;
}

export interface LoadedSnippets {
  values: string[];
  /** 1-based worksheet rows whose cell was blank */
  skippedRows: number[];
}

/**
 * Read one column of a workbook (.xlsx) or CSV file, header in row 1.
 * Values come back in row order; blank cells are skipped.
 */
export async function loadSnippets(src: SnippetSource): Promise<LoadedSnippets> {
  const sheet = await openSheet(src);
  const col = findColumn(sheet, src.column);
  if (col === undefined) {
    throw new SnippetSourceError(
      `Column "${src.column}" not found in sheet "${sheet.name}" of "${src.path}"`,
      "column-not-found",
      { path: src.path, sheet: sheet.name, column: src.column }
    );
  }

  const values: string[] = [];
  const skippedRows: number[] = [];
  for (let r = 2; r <= sheet.rowCount; r++) {
    const text = sheet.getRow(r).getCell(col).text;
    if (text.trim() === "") {
      skippedRows.push(r);
      continue;
    }
    values.push(text);
  }
  return { values, skippedRows };
}

async function openSheet(src: SnippetSource): Promise<Worksheet> {
  const workbook = new ExcelJS.Workbook();
  const isCsv = extname(src.path).toLowerCase() === ".csv";
  let sheet: Worksheet | undefined;
  try {
    if (isCsv) {
      sheet = await workbook.csv.readFile(src.path);
    } else {
      await workbook.xlsx.readFile(src.path);
      sheet = workbook.getWorksheet(src.sheet);
    }
  } catch (e) {
    if (isMissingFile(e)) {
      throw new SnippetSourceError(`Snippet file not found: "${src.path}"`, "file-not-found", { path: src.path });
    }
    const detail = e instanceof Error ? e.message : String(e);
    throw new SnippetSourceError(`Cannot read "${src.path}": ${detail}`, "unreadable", { path: src.path });
  }
  if (!sheet) {
    const available = workbook.worksheets.map(w => w.name);
    throw new SnippetSourceError(
      `Sheet "${src.sheet}" not found in "${src.path}" (available: ${available.join(", ") || "none"})`,
      "sheet-not-found",
      { path: src.path, sheet: src.sheet, available }
    );
  }
  return sheet;
}

function findColumn(sheet: Worksheet, column: string): number | undefined {
  const header = sheet.getRow(1);
  for (let c = 1; c <= header.cellCount; c++) {
    if (header.getCell(c).text.trim() === column) return c;
  }
  return undefined;
}

// exceljs reports a missing file with its own "File not found" message rather than ENOENT.
function isMissingFile(e: unknown): boolean {
  if (!(e instanceof Error)) return false;
  return ("code" in e && e.code === "ENOENT") || e.message.startsWith("File not found");
}
