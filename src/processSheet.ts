import { positionalHeader, resolveColumns } from "./columns.js";
import { SchemaError } from "./errors.js";
import { createLogger } from "./logger.js";
import { isBlank } from "./normalize.js";
import { validateRow } from "./validate.js";
import type { CleanRow, CleanValue, Diagnostic, ProcessedSheet, RuleSet, WorksheetData } from "./types.js";
import { ENGINE_VERSION } from "./types.js";

const log = createLogger("sheet");

/**
 * Module: Sheet Pipeline
 * Purpose: Resolve the header once, then normalize and validate every data row
 * in input order.
 * Design:
 * - Header problems throw `SchemaError` before any row is read; nothing partial is returned.
 * - Row problems are collected as diagnostics; every non-blank row is emitted.
 * - Rows with no content at all are skipped and counted.
 * - Non-blank cells under no header are counted per 1-based column position.
 * Meta:
 * - Emits `totalRows`, `processedRows`, `skippedBlankRows`, `ignoredColumns`, `valueCounts`, `droppedCells`, `engineVersion`.
 */
export function processSheet(sheet: WorksheetData, ruleSet: RuleSet): ProcessedSheet {
  const { disease } = ruleSet;
  let header: string[];
  let dataRows: string[][];
  let firstDataRow: number;

  if (ruleSet.hasHeaderRow) {
    if (sheet.rows.length === 0) {
      throw new SchemaError(`Worksheet '${disease}' has no header row`, { disease, kind: "empty_sheet" });
    }
    log.info(`Found header row in row ${sheet.firstRowNumber} of '${disease}'`);
    header = sheet.rows[0];
    dataRows = sheet.rows.slice(1);
    firstDataRow = sheet.firstRowNumber + 1;
  } else {
    header = positionalHeader(ruleSet);
    dataRows = sheet.rows;
    firstDataRow = sheet.firstRowNumber;
  }

  const columns = resolveColumns(header, ruleSet);

  const rows: CleanRow[] = [];
  const diagnostics: Diagnostic[] = [];
  const valueCounts = new Map<string, Map<string, number>>();
  const droppedCells = new Map<number, number>();
  let skippedBlankRows = 0;

  for (let i = 0; i < dataRows.length; i++) {
    const cells = dataRows[i];
    const rowNumber = firstDataRow + i;
    if (cells.every((cell) => isBlank(cell))) {
      skippedBlankRows++;
      log.debug(`Skipping blank row ${rowNumber} in '${disease}'`);
      continue;
    }
    const { row, diagnostics: rowDiagnostics } = validateRow(rowNumber, cells, columns, ruleSet);
    rows.push(row);
    diagnostics.push(...rowDiagnostics);
    tallyValues(row, ruleSet, valueCounts);
    tallyDropped(cells, header, droppedCells);
  }

  reportValueCounts(disease, valueCounts);
  for (const [index, count] of droppedCells) {
    log.warn(`Dropped ${count} non-blank cells at column position ${index + 1} of '${disease}' since it has no header`);
  }
  log.info(
    `Processed ${rows.length} rows in worksheet '${disease}' with ${diagnostics.length} diagnostics` +
      (skippedBlankRows ? ` (${skippedBlankRows} blank rows skipped)` : "")
  );

  return {
    disease,
    columns: ruleSet.qualifiedColumns,
    splitDelimiter: ruleSet.splitDelimiter,
    rows,
    diagnostics,
    meta: {
      totalRows: dataRows.length,
      processedRows: rows.length,
      skippedBlankRows,
      ignoredColumns: columns.ignored,
      valueCounts: Object.fromEntries([...valueCounts].map(([column, bucket]) => [column, Object.fromEntries(bucket)])),
      droppedCells: Object.fromEntries([...droppedCells].map(([index, count]) => [String(index + 1), count])),
      engineVersion: ENGINE_VERSION,
    },
  };
}

// Census of categorical values, per split and closed-vocabulary column
function tallyValues(row: CleanRow, ruleSet: RuleSet, counts: Map<string, Map<string, number>>): void {
  for (const column of ruleSet.qualifiedColumns) {
    const tag = ruleSet.classification.get(column);
    if (tag !== "split" && tag !== "qualified" && column !== ruleSet.diseaseTypeColumn) continue;
    const seen = countedValues(row.values[column]);
    if (!seen.length) continue;
    let bucket = counts.get(column);
    if (!bucket) counts.set(column, (bucket = new Map()));
    for (const v of seen) bucket.set(v, (bucket.get(v) ?? 0) + 1);
  }
}

function tallyDropped(cells: readonly string[], header: readonly string[], dropped: Map<number, number>): void {
  cells.forEach((cell, i) => {
    if (isBlank(cell)) return;
    if (i < header.length && String(header[i] ?? "").trim()) return;
    dropped.set(i, (dropped.get(i) ?? 0) + 1);
  });
}

function countedValues(value: CleanValue | undefined): string[] {
  if (!value) return [];
  if (value.kind === "list") return value.values;
  if (value.kind === "text") return [value.value];
  return [];
}

function reportValueCounts(disease: string, counts: ReadonlyMap<string, ReadonlyMap<string, number>>): void {
  for (const [column, bucket] of counts) {
    const unique = [...bucket.keys()];
    log.info(`Found ${unique.length} unique values for categorical column '${column}' in '${disease}': ${unique.join(",")}`);
  }
}
