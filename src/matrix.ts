import { mkdirSync, writeFileSync } from "node:fs";
import path from "node:path";
import { createLogger } from "./logger.js";
import { sheetFileStem } from "./writer.js";
import type { CleanRow, CleanValue, MatrixRules, ProcessedSheet, RuleSet } from "./types.js";

/**
 * Module: Sample Matrices
 * Purpose: Recode a processed sheet into one row per sample for downstream
 * association analysis.
 * Outputs:
 * - Binary matrix: yes/no columns, gender, diagnosis as case/control, glaucoma
 *   tension, a derived control/case call and one column per categorical value.
 * - Quantitative matrix: quantitative columns plus derived means.
 * Notes:
 * - Rows are keyed by the sample ID column; rows without a usable ID are skipped.
 * - A sample seen twice keeps its first position and its latest values.
 * - Column names are lowercased with spaces and hyphens turned into `_`.
 */

const log = createLogger("matrix");

export const MATRIX_YES = "2";
export const MATRIX_NO = "1";
export const MATRIX_NA = "NA";

export const MATRIX_CASE = "1";
export const MATRIX_CONTROL = "2";
export const MATRIX_CASE_CONTROL_NA = "0";

export const MATRIX_FEMALE = "1";
export const MATRIX_MALE = "2";
export const MATRIX_GENDER_NA = "0";

export const NORMAL_TENSION_COLUMN = "normal_tension_glaucoma";
export const HIGH_TENSION_COLUMN = "high_tension_glaucoma";

const UNKNOWN_VALUE = "Unknown";
const NA_CATEGORY = "NA";

interface MatrixColumn {
  name: string;
  code: (row: CleanRow) => string;
}

export function matrixColumnName(name: string): string {
  return name.toLowerCase().replace(/ /g, "_").replace(/-/g, "_");
}

const textOf = (value: CleanValue | undefined): string | undefined => (value?.kind === "text" ? value.value : undefined);

export function genderCode(value: CleanValue | undefined): string {
  const s = textOf(value)?.toLowerCase();
  if (s === "f" || s === "female") return MATRIX_FEMALE;
  if (s === "m" || s === "male") return MATRIX_MALE;
  return MATRIX_GENDER_NA;
}

export function yesNoCode(value: CleanValue | undefined): string {
  if (value?.kind !== "yesNo") return MATRIX_NA;
  if (value.value === "Yes") return MATRIX_YES;
  if (value.value === "No") return MATRIX_NO;
  return MATRIX_NA;
}

/** Any entry mentioning "unaffected" makes the sample a control. */
export function diagnosisCode(value: CleanValue | undefined): string {
  const entries = categories(value);
  if (!entries) return MATRIX_NA;
  return entries.some((e) => e.toLowerCase().includes("unaffected")) ? MATRIX_CONTROL : MATRIX_CASE;
}

/** `0` is normal tension, `1` high tension; anything else codes neither. */
export function tensionCodes(value: CleanValue | undefined): { normal: string; high: string } {
  const s = textOf(value);
  if (s === "0") return { normal: MATRIX_CASE, high: MATRIX_CASE_CONTROL_NA };
  if (s === "1") return { normal: MATRIX_CASE_CONTROL_NA, high: MATRIX_CASE };
  return { normal: MATRIX_CASE_CONTROL_NA, high: MATRIX_CASE_CONTROL_NA };
}

/**
 * Control when every source column carries its control value; NA when any
 * source is absent or `Unknown`; case otherwise.
 */
export function caseControlCode(row: CleanRow, controlValues: ReadonlyMap<string, string>): string {
  const sources = [...controlValues].map(([column, control]) => ({ value: textOf(row.values[column]), control }));
  if (sources.every((s) => s.value === s.control)) return MATRIX_CONTROL;
  if (sources.some((s) => s.value === undefined || s.value === UNKNOWN_VALUE)) return MATRIX_NA;
  return MATRIX_CASE;
}

function categories(value: CleanValue | undefined): string[] | undefined {
  if (value?.kind === "list") return value.values.length ? value.values : undefined;
  if (value?.kind === "text") return [value.value];
  return undefined;
}

function quantity(value: CleanValue | undefined): number | undefined {
  return value?.kind === "number" ? value.value : undefined;
}

// Distinct values in first-seen order
function observedValues(rows: readonly CleanRow[], column: string, skip?: string): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const v of categories(row.values[column]) ?? []) {
      if (v !== skip) seen.add(v);
    }
  }
  return [...seen];
}

function oneHotColumns(rows: readonly CleanRow[], column: string, naCategory?: string): MatrixColumn[] {
  return observedValues(rows, column, naCategory).map((category) => ({
    name: matrixColumnName(`${column}_${category}`),
    code: (row) => {
      const present = categories(row.values[column]);
      if (!present || (naCategory !== undefined && present.includes(naCategory))) return MATRIX_NA;
      return present.includes(category) ? MATRIX_YES : MATRIX_NO;
    },
  }));
}

function binaryColumns(rows: readonly CleanRow[], ruleSet: RuleSet): MatrixColumn[] {
  const matrix: MatrixRules = ruleSet.matrix;
  const consumed = new Set<string>(matrix.caseControl?.controlValues.keys() ?? []);
  const columns: MatrixColumn[] = [];

  for (const column of ruleSet.qualifiedColumns) {
    if (column === ruleSet.sampleIdColumn || consumed.has(column)) continue;
    const tag = ruleSet.classification.get(column);

    if (column === matrix.genderColumn) {
      columns.push({ name: "gender", code: (row) => genderCode(row.values[column]) });
    } else if (column === matrix.tensionColumn) {
      columns.push(
        { name: NORMAL_TENSION_COLUMN, code: (row) => tensionCodes(row.values[column]).normal },
        { name: HIGH_TENSION_COLUMN, code: (row) => tensionCodes(row.values[column]).high }
      );
    } else if (matrix.diagnosisColumns.has(column)) {
      columns.push({ name: matrixColumnName(column), code: (row) => diagnosisCode(row.values[column]) });
    } else if (tag === "yesNo" || tag === "yesNoNa") {
      columns.push({ name: matrixColumnName(column), code: (row) => yesNoCode(row.values[column]) });
    } else if (column === ruleSet.diseaseTypeColumn) {
      columns.push(...oneHotColumns(rows, column, NA_CATEGORY));
    } else if (tag === "split" || tag === "qualified") {
      columns.push(...oneHotColumns(rows, column));
    }
  }

  const caseControl = matrix.caseControl;
  if (caseControl) {
    columns.push({
      name: matrixColumnName(caseControl.column),
      code: (row) => caseControlCode(row, caseControl.controlValues),
    });
  }
  return columns;
}

function quantitativeColumns(ruleSet: RuleSet): MatrixColumn[] {
  const columns: MatrixColumn[] = ruleSet.qualifiedColumns
    .filter((column) => ruleSet.classification.get(column) === "quantitative")
    .map((column) => ({
      name: matrixColumnName(column),
      code: (row) => {
        const n = quantity(row.values[column]);
        return n === undefined ? MATRIX_NA : String(n);
      },
    }));

  for (const [name, sources] of ruleSet.matrix.means) {
    columns.push({
      name: matrixColumnName(name),
      code: (row) => {
        const values = sources.map((col) => quantity(row.values[col]));
        if (values.some((v) => v === undefined)) return MATRIX_NA;
        const sum = values.reduce<number>((acc, v) => acc + (v ?? 0), 0);
        return String(sum / values.length);
      },
    });
  }
  return columns;
}

function samples(result: ProcessedSheet, idColumn: string): Map<string, CleanRow> {
  const bySample = new Map<string, CleanRow>();
  for (const row of result.rows) {
    const id = textOf(row.values[idColumn]);
    if (!id) {
      log.warn(`Skipping row ${row.row} of '${result.disease}' in the matrices since '${idColumn}' has no usable value`);
      continue;
    }
    if (bySample.has(id)) log.warn(`Sample '${id}' appears again at row ${row.row} of '${result.disease}'`);
    bySample.set(id, row);
  }
  return bySample;
}

function toMatrix(bySample: ReadonlyMap<string, CleanRow>, columns: readonly MatrixColumn[]): string[][] {
  const table: string[][] = [["ID", ...columns.map((c) => c.name)]];
  for (const [id, row] of bySample) table.push([id, ...columns.map((c) => c.code(row))]);
  return table;
}

/**
 * Build both matrices, header row first. Returns `undefined` when the sheet
 * has no sample ID column to key them by.
 */
export function buildMatrices(
  result: ProcessedSheet,
  ruleSet: RuleSet
): { binary: string[][]; quantitative: string[][] } | undefined {
  const idColumn = ruleSet.sampleIdColumn;
  if (!idColumn) return undefined;
  const bySample = samples(result, idColumn);
  return {
    binary: toMatrix(bySample, binaryColumns(result.rows, ruleSet)),
    quantitative: toMatrix(bySample, quantitativeColumns(ruleSet)),
  };
}

// Plain join: matrix cells hold codes, numbers and sample IDs only
export const matrixToText = (table: string[][]): string => table.map((line) => `${line.join("\t")}\n`).join("");

/** Write `<sheet>_binary.txt` and `<sheet>_quantitative.txt`. */
export function writeMatrices(
  result: ProcessedSheet,
  ruleSet: RuleSet,
  outdir: string
): { binaryFile: string; quantitativeFile: string } | undefined {
  const matrices = buildMatrices(result, ruleSet);
  if (!matrices) {
    log.warn(`No sample ID column for worksheet '${result.disease}'; matrices not written`);
    return undefined;
  }
  mkdirSync(outdir, { recursive: true });
  const stem = sheetFileStem(result.disease);
  const binaryFile = path.join(outdir, `${stem}_binary.txt`);
  const quantitativeFile = path.join(outdir, `${stem}_quantitative.txt`);
  writeFileSync(binaryFile, matrixToText(matrices.binary));
  writeFileSync(quantitativeFile, matrixToText(matrices.quantitative));
  log.info(`Wrote ${matrices.binary.length - 1} samples to '${binaryFile}' and '${quantitativeFile}'`);
  return { binaryFile, quantitativeFile };
}
