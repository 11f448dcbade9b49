// document-engine/08_exportRecords.ts
// ---------------------------------------------------------------------------
// Stage 8: Serialize roster records.
//
// Responsibility:
// - 1 record = 1 row, header row from RECORD_COLUMNS, one sheet named "roster"
// - Output format follows the target extension:
//     .xlsx → Excel workbook
//     .xls  → BIFF8 workbook
//     other → UTF-8 CSV with a byte-order mark
// - No merged cells, no styling
//
// The engine never writes files itself except through writeRecords().

import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import * as XLSX from "xlsx";
import { RECORD_COLUMNS } from "../../../core/types";
import type { RosterRecord } from "../../../core/types";

export type OutputFormat = "csv" | "xlsx" | "xls";

export const SHEET_NAME = "roster";
const CSV_BOM = "\uFEFF";

export function outputFormatFor(outPath: string): OutputFormat {
  const ext = extname(outPath).toLowerCase();
  if (ext === ".xlsx") return "xlsx";
  if (ext === ".xls") return "xls";
  return "csv";
}

export function recordsToRows(records: readonly RosterRecord[]): string[][] {
  const rows: string[][] = [[...RECORD_COLUMNS]];
  for (const record of records) {
    rows.push(RECORD_COLUMNS.map((column) => record[column]));
  }
  return rows;
}

export function buildWorkbook(records: readonly RosterRecord[]): XLSX.WorkBook {
  const worksheet = XLSX.utils.aoa_to_sheet(recordsToRows(records));
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, worksheet, SHEET_NAME);
  return workbook;
}

/** CSV text including the leading BOM. Rows are separated by "\n". */
export function exportRecordsToCsv(records: readonly RosterRecord[]): string {
  const worksheet = XLSX.utils.aoa_to_sheet(recordsToRows(records));
  return CSV_BOM + XLSX.utils.sheet_to_csv(worksheet);
}

export function exportRecordsToSpreadsheet(
  records: readonly RosterRecord[],
  format: "xlsx" | "xls" = "xlsx"
): Buffer {
  const out: Buffer = XLSX.write(buildWorkbook(records), {
    bookType: format === "xls" ? "biff8" : "xlsx",
    type: "buffer",
  });
  return out;
}

export function serializeRecords(records: readonly RosterRecord[], format: OutputFormat): Buffer {
  if (format === "csv") {
    return Buffer.from(exportRecordsToCsv(records), "utf8");
  }
  return exportRecordsToSpreadsheet(records, format);
}

/**
 * Writes records to outPath in the format its extension selects and returns
 * the format used.
 */
export async function writeRecords(
  records: readonly RosterRecord[],
  outPath: string
): Promise<OutputFormat> {
  const format = outputFormatFor(outPath);
  try {
    await writeFile(outPath, serializeRecords(records, format));
  } catch (err) {
    console.error("[document-engine] writeRecords failed", { outPath, format }, err);
    throw err;
  }
  console.log("[document-engine] Records written", { outPath, format, rows: records.length });
  return format;
}
