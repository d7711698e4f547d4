/**
 * Dataset Loader
 *
 * Reads a spreadsheet (.xlsx, .xls, .xlsm) or CSV file into a Grid of cell
 * text. Only the first worksheet is read. No header handling happens here:
 * row indices match the sheet, so row 3 is the fourth row of the file.
 */

import { readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import * as XLSX from "xlsx";

import { DatasetLoadError, errorMessage } from "../shared/errors.js";
import type { Grid } from "../shared/types.js";

export const SPREADSHEET_EXTENSIONS = [".xlsx", ".xls", ".xlsm"];
export const CSV_EXTENSIONS = [".csv"];

export function loadGrid(filePath: string): Grid {
  const ext = path.extname(filePath).toLowerCase();
  if (!SPREADSHEET_EXTENSIONS.includes(ext) && !CSV_EXTENSIONS.includes(ext)) {
    throw new DatasetLoadError(filePath, `unsupported file type "${ext || "(none)"}"`);
  }

  let buffer: Buffer;
  try {
    buffer = readFileSync(filePath);
  } catch (err) {
    throw new DatasetLoadError(filePath, errorMessage(err));
  }

  return CSV_EXTENSIONS.includes(ext)
    ? parseCsvGrid(buffer.toString("utf-8"), filePath)
    : parseWorkbookGrid(buffer, filePath);
}

/** First worksheet as formatted cell text. */
export function parseWorkbookGrid(buffer: Buffer, label = "workbook"): Grid {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: "buffer" });
  } catch (err) {
    throw new DatasetLoadError(label, errorMessage(err));
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new DatasetLoadError(label, "workbook has no worksheets");
  }

  const ref = sheet["!ref"];
  if (!ref) return [];
  // The used range starts at the first filled cell; row and column
  // positions are read from A1.
  const range = XLSX.utils.decode_range(ref);
  range.s.r = 0;
  range.s.c = 0;

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range,
    defval: "",
    raw: false,
    blankrows: true,
  });
  return rows.map((row) => row.map(cellText));
}

export function parseCsvGrid(content: string, label = "csv"): Grid {
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: false,
    });
  } catch (err) {
    throw new DatasetLoadError(label, errorMessage(err));
  }

  if (!Array.isArray(records)) {
    throw new DatasetLoadError(label, "unexpected CSV parser output");
  }
  return records.map((row: unknown) => (Array.isArray(row) ? row.map(cellText) : []));
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value);
}
