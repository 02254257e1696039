import { readDelimitedSheet } from "./csv.js";
import { SchemaError } from "./errors.js";
import { createLogger } from "./logger.js";
import { processSheet } from "./processSheet.js";
import { loadRuleSet, type RulesDocument } from "./ruleset.js";
import { readWorkbookSheets } from "./xlsx.js";
import type { ProcessOptions, SheetOutcome, WorksheetData } from "./types.js";

export * from "./types.js";
export * from "./errors.js";
export {
  loadRuleSet,
  parseRulesDocument,
  parseRulesJson,
  classifyColumns,
  DEFAULT_SPLIT_DELIMITER,
  DEFAULT_SAMPLE_ID_COLUMN,
} from "./ruleset.js";
export type { RulesDocument } from "./ruleset.js";
export { resolveColumns } from "./columns.js";
export { normalizeCell, normalizeYesNo, parseQuantitative, splitValue, joinValues, isBlankAllowed } from "./normalize.js";
export { validateRow } from "./validate.js";
export { processSheet } from "./processSheet.js";
export { readWorkbookSheets } from "./xlsx.js";
export { parseDelimited, readDelimitedSheet } from "./csv.js";
export {
  buildMatrices,
  writeMatrices,
  matrixToText,
  matrixColumnName,
  genderCode,
  yesNoCode,
  diagnosisCode,
  tensionCodes,
  caseControlCode,
} from "./matrix.js";
export { writeSheetOutputs, cleanRowsToTable, diagnosticsToTable, formatValue, toTsv } from "./writer.js";

const log = createLogger("workbook");

/**
 * Module: Import Core Entry Point
 * Purpose: Parse a phenotype workbook (XLSX, or a single CSV/TSV sheet) from bytes
 * and run every selected disease sheet through its rules.
 * Notes:
 * - Accepts `ArrayBuffer` so callers decide how bytes are obtained.
 * - Sheets are independent: a schema rejection of one sheet leaves the others running.
 * - A `ConfigError` while loading rules aborts the whole run.
 */
/**
 * Process a workbook and return one outcome per selected sheet, in selection order.
 *
 * Parameters:
 * - `fileBytes`: workbook bytes.
 * - `filename`: used to detect `.xlsx` vs `.csv`/`.tsv`.
 * - `rules`: validated rules document.
 * - `options.sheets`: sheets to process; defaults to `sheets_to_process`.
 *
 * Behavior:
 * - Workbook sheets not listed in `qualified_sheet_names` are reported and skipped.
 * - Qualified sheets not listed in `sheets_to_process` are reported and skipped.
 * - A selected sheet absent from the workbook is rejected with a `SchemaError`.
 * - CSV/TSV input is one sheet; it takes the name of the single selected sheet.
 */
export function processWorkbookFromBuffer(
  fileBytes: ArrayBuffer,
  filename: string,
  rules: RulesDocument,
  options: ProcessOptions = {}
): SheetOutcome[] {
  const selected = options.sheets?.length ? options.sheets : rules.sheets_to_process;
  const lower = filename.toLowerCase();

  let sheets: WorksheetData[];
  if (lower.endsWith(".csv") || lower.endsWith(".tsv")) {
    if (selected.length !== 1) {
      throw new Error(`A delimited file holds one sheet; select exactly one sheet (got ${selected.length})`);
    }
    const text = new TextDecoder("utf-8").decode(fileBytes);
    sheets = [readDelimitedSheet(text, selected[0], filename)];
  } else {
    sheets = readWorkbookSheets(fileBytes);
  }
  return processWorksheets(sheets, rules, selected);
}

/** Run already-read sheets through their rules. */
export function processWorksheets(sheets: WorksheetData[], rules: RulesDocument, selected: readonly string[]): SheetOutcome[] {
  const byName = new Map<string, WorksheetData>();
  for (const sheet of sheets) {
    log.info(`Found sheet name '${sheet.name}'`);
    if (!rules.qualified_sheet_names.includes(sheet.name)) {
      log.warn(`Found unqualified sheet named '${sheet.name}'`);
      continue;
    }
    if (!rules.sheets_to_process.includes(sheet.name)) {
      log.warn(`Will not process worksheet named '${sheet.name}'`);
      continue;
    }
    byName.set(sheet.name, sheet);
  }

  // Rules first: a configuration problem stops the run before any row is read
  const ruleSets = selected.map((name) => loadRuleSet(rules, name));

  return ruleSets.map((ruleSet): SheetOutcome => {
    const sheetName = ruleSet.disease;
    const sheet = byName.get(sheetName);
    if (!sheet) {
      const error = new SchemaError(`Worksheet '${sheetName}' was not found in the workbook`, {
        disease: sheetName,
        kind: "missing_sheet",
      });
      log.error(error.message);
      return { status: "rejected", sheet: sheetName, error };
    }
    try {
      log.info(`Will process worksheet '${sheetName}'`);
      return { status: "processed", sheet: sheetName, result: processSheet(sheet, ruleSet), ruleSet };
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      log.error(err.message);
      return { status: "rejected", sheet: sheetName, error: err };
    }
  });
}
