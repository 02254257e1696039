import * as XLSX from "xlsx";
import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { createLogger } from "./logger.js";
import { joinValues } from "./normalize.js";
import type { CleanValue, ProcessedSheet } from "./types.js";

const log = createLogger("writer");

// Written for permitted blanks and for cells missing from the source row
export const NA_VALUE = "NA";

export const DIAGNOSTIC_HEADER = ["row", "column", "kind", "raw_value", "message"] as const;

export function formatValue(value: CleanValue | undefined, delimiter: string): string {
  if (!value) return NA_VALUE;
  switch (value.kind) {
    case "text":
      return value.value;
    case "list":
      return joinValues(value.values, delimiter);
    case "number":
      return String(value.value);
    case "yesNo":
      return value.value;
    case "blank":
      return NA_VALUE;
    case "invalid":
      return value.raw ?? NA_VALUE;
  }
}

/**
 * Clean rows as a table: `row` plus the canonical columns as header, then one
 * line per row in source order.
 */
export function cleanRowsToTable(result: ProcessedSheet): string[][] {
  const table: string[][] = [["row", ...result.columns]];
  for (const row of result.rows) {
    table.push([String(row.row), ...result.columns.map((col) => formatValue(row.values[col], result.splitDelimiter))]);
  }
  return table;
}

export function diagnosticsToTable(result: ProcessedSheet): string[][] {
  const table: string[][] = [[...DIAGNOSTIC_HEADER]];
  for (const d of result.diagnostics) {
    table.push([String(d.row), d.column, d.kind, d.rawValue ?? "", d.message]);
  }
  return table;
}

export function toTsv(table: string[][]): string {
  const sheet = XLSX.utils.aoa_to_sheet(table);
  return XLSX.utils.sheet_to_csv(sheet, { FS: "\t", RS: "\n" });
}

export function sheetFileStem(sheetName: string): string {
  return sheetName.toLowerCase().replace(/\s+/g, "_");
}

/**
 * Write `<sheet>_clean.tsv`, plus `<sheet>_diagnostics.tsv` when there are diagnostics.
 * Both files carry the source row numbers so they can be cross-referenced.
 */
export function writeSheetOutputs(result: ProcessedSheet, outdir: string): { cleanFile: string; diagnosticsFile?: string } {
  mkdirSync(outdir, { recursive: true });
  const stem = sheetFileStem(result.disease);

  const cleanFile = path.join(outdir, `${stem}_clean.tsv`);
  writeFileSync(cleanFile, `${toTsv(cleanRowsToTable(result))}\n`);
  log.info(`Wrote ${result.rows.length} rows to output file '${cleanFile}'`);

  if (!result.diagnostics.length) return { cleanFile };

  const diagnosticsFile = path.join(outdir, `${stem}_diagnostics.tsv`);
  writeFileSync(diagnosticsFile, `${toTsv(diagnosticsToTable(result))}\n`);
  log.info(`Wrote ${result.diagnostics.length} diagnostics to '${diagnosticsFile}'`);
  return { cleanFile, diagnosticsFile };
}
