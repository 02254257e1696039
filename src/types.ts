import type { SchemaError } from "./errors.js";

/**
 * Module: Public Types & Engine Version
 * Purpose: Define the per-disease rule contract, the normalized row shape, the
 * diagnostic record and the per-sheet result exposed to writers and the CLI.
 */

export type ColumnClass =
  | "split"          // multi-valued, exploded into a list
  | "yesNo"          // Yes / No
  | "yesNoNa"        // Yes / No / NA
  | "quantitative"   // real number
  | "qualified"      // closed vocabulary
  | "plain";         // trimmed free text

export interface RuleSet {
  disease: string;
  qualifiedColumns: readonly string[];
  renameMap: ReadonlyMap<string, string>;
  ignoredColumns: ReadonlySet<string>;
  splitColumns: ReadonlySet<string>;
  yesNoColumns: ReadonlySet<string>;
  yesNoNaColumns: ReadonlySet<string>;
  quantitativeColumns: ReadonlySet<string>;
  qualifiedValues: ReadonlyMap<string, ReadonlySet<string>>;
  blankAllowed: ReadonlyMap<string, boolean>;
  hasHeaderRow: boolean;
  splitDelimiter: string;
  diseaseTypeColumn?: string;
  qualifiedDiseaseTypes: ReadonlySet<string>;
  diseaseTypeAliases: ReadonlyMap<string, string>;
  // Matrix rows are keyed by this column; no matrices without it
  sampleIdColumn?: string;
  matrix: MatrixRules;
  // Resolved once at load so per-cell dispatch is a single lookup
  classification: ReadonlyMap<string, ColumnClass>;
}

/** Derived codings used by the binary and quantitative matrices. */
export interface MatrixRules {
  genderColumn?: string;
  tensionColumn?: string;
  diagnosisColumns: ReadonlySet<string>;
  caseControl?: {
    column: string;
    // source column -> value every control row must carry
    controlValues: ReadonlyMap<string, string>;
  };
  // derived column -> quantitative source columns
  means: ReadonlyMap<string, readonly string[]>;
}

export type YesNo = "Yes" | "No" | "NA" | "Unknown";

export type CleanValue =
  | { kind: "text"; value: string }
  | { kind: "list"; values: string[] }
  | { kind: "number"; value: number }
  | { kind: "yesNo"; value: YesNo }
  | { kind: "blank" }
  | { kind: "invalid"; raw: string | null }; // null: the cell is absent from the row

export interface CleanRow {
  row: number; // spreadsheet row number (1-based, header included)
  values: Record<string, CleanValue>;
}

export type DiagnosticKind =
  | "MissingColumnError"
  | "BlankValueError"
  | "InvalidCategoricalValue"
  | "InvalidNumericValue"
  | "UnqualifiedValueError";

export interface Diagnostic {
  row: number;
  column: string;  // canonical column name
  kind: DiagnosticKind;
  rawValue: string | null;
  message: string;
}

/** A worksheet as handed over by a reader: every row as raw cell strings. */
export interface WorksheetData {
  name: string;
  rows: string[][];
  firstRowNumber: number;
}

export interface ProcessedSheet {
  disease: string;
  columns: readonly string[];
  splitDelimiter: string;
  rows: CleanRow[];
  diagnostics: Diagnostic[];
  meta: {
    totalRows: number;       // data rows found (excluding header)
    processedRows: number;   // rows emitted
    skippedBlankRows: number;
    ignoredColumns: string[];
    valueCounts: Record<string, Record<string, number>>;
    // non-blank cells under no header (empty header cell or past the header's width), by 1-based column position
    droppedCells: Record<string, number>;
    engineVersion: string;
  };
}

export type SheetOutcome =
  | { status: "processed"; sheet: string; result: ProcessedSheet; ruleSet: RuleSet }
  | { status: "rejected"; sheet: string; error: SchemaError };

export interface ProcessOptions {
  // Sheet selector; defaults to every sheet listed under `sheets_to_process`
  sheets?: string[];
}

export const ENGINE_VERSION = "0.1.0";
