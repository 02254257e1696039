import * as XLSX from "xlsx";
import type { WorksheetData } from "./types.js";

/**
 * Read an Excel workbook from `ArrayBuffer` and return every sheet as raw cell strings.
 * - Number cells are read as their stored value, so `60%` arrives as `0.6` and
 *   `1,234` as `1234`; other cells keep their formatted text.
 * - Blank cells become `""` and rows keep the full width of the sheet's used range.
 * - `firstRowNumber` is the spreadsheet row of the first returned row, so
 *   diagnostics can point back at the source.
 */
export function readWorkbookSheets(fileBytes: ArrayBuffer): WorksheetData[] {
  const data = new Uint8Array(fileBytes);
  // cellDates keeps date cells out of the number branch below
  const workbook = XLSX.read(data, { type: "array", cellDates: true });
  return workbook.SheetNames.map((name) => sheetToData(name, workbook.Sheets[name]));
}

export function sheetToData(name: string, sheet: XLSX.WorkSheet | undefined): WorksheetData {
  if (!sheet || !sheet["!ref"]) return { name, rows: [], firstRowNumber: 1 };
  const range = XLSX.utils.decode_range(sheet["!ref"]);
  const json = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: "",
    raw: false,
    blankrows: true,
  });
  const rows = json.map((row, r) =>
    row.map((text, c) => {
      const stored = numberValue(sheet[XLSX.utils.encode_cell({ r: range.s.r + r, c: range.s.c + c })]);
      if (stored !== undefined) return String(stored);
      return text === null || text === undefined ? "" : String(text);
    })
  );
  return { name, rows, firstRowNumber: range.s.r + 1 };
}

function numberValue(cell: unknown): number | undefined {
  if (typeof cell !== "object" || cell === null) return undefined;
  if (!("t" in cell) || cell.t !== "n" || !("v" in cell)) return undefined;
  return typeof cell.v === "number" ? cell.v : undefined;
}
