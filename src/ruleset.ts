import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { ColumnClass, RuleSet } from "./types.js";

/**
 * Module: Rule Loading
 * Purpose: Validate the declarative rules document and resolve one disease's
 * lookups into a frozen `RuleSet`, including the per-column classification tag.
 * Notes:
 * - Every lookup is keyed by sheet (disease) name, then by column name.
 * - Classified columns use canonical names; ignored columns use raw header names.
 */

export const DEFAULT_SPLIT_DELIMITER = ",";
export const DEFAULT_SAMPLE_ID_COLUMN = "Sample_ID";

const columnList = z.array(z.string().min(1));
const bySheet = <T extends z.ZodTypeAny>(inner: T) => z.record(z.string(), inner);

export const rulesDocumentSchema = z.object({
  split_delimiter: z.string().optional(),
  qualified_sheet_names: columnList,
  sheets_to_process: columnList,
  worksheet_name_to_has_header_row: bySheet(z.boolean()),
  worksheet_name_to_qualified_column_name_list: bySheet(columnList),
  column_name_conversion_lookup: bySheet(z.record(z.string(), z.string().min(1))).optional(),
  ignore_column_lookup: bySheet(columnList).optional(),
  worksheet_name_to_column_name_to_be_split_list: bySheet(columnList).optional(),
  worksheet_name_to_column_name_yes_no: bySheet(columnList).optional(),
  worksheet_name_to_column_name_yes_no_na: bySheet(columnList).optional(),
  worksheet_name_to_column_name_to_be_quantitative_values_list: bySheet(columnList).optional(),
  qualified_value_lookup: bySheet(z.record(z.string(), z.array(z.string()))).optional(),
  disease_type_column_lookup: bySheet(z.string().min(1)).optional(),
  qualified_disease_type_lookup: bySheet(z.array(z.string())).optional(),
  disease_type_alias_lookup: bySheet(z.record(z.string(), z.string())).optional(),
  blank_value_allowed: bySheet(z.record(z.string(), z.boolean())).optional(),
  sample_id_column: z.string().min(1).optional(),
  matrix_gender_column_lookup: bySheet(z.string().min(1)).optional(),
  matrix_diagnosis_column_lookup: bySheet(columnList).optional(),
  matrix_tension_column_lookup: bySheet(z.string().min(1)).optional(),
  matrix_case_control_lookup: bySheet(
    z.object({
      column: z.string().min(1),
      control_values: z.record(z.string(), z.string()),
    })
  ).optional(),
  matrix_mean_column_lookup: bySheet(z.record(z.string().min(1), columnList.min(1))).optional(),
});

export type RulesDocument = z.infer<typeof rulesDocumentSchema>;

/**
 * Validate the shape of a parsed rules document.
 * Throws `ConfigError` listing every offending path.
 */
export function parseRulesDocument(input: unknown): RulesDocument {
  const parsed = rulesDocumentSchema.safeParse(input);
  if (parsed.success) return parsed.data;
  const detail = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
  throw new ConfigError(`Invalid rules document: ${detail}`);
}

/** Parse rules document text (JSON). */
export function parseRulesJson(text: string): RulesDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Rules document is not valid JSON: ${reason}`);
  }
  return parseRulesDocument(raw);
}

// Class sets that must not share a column; yesNo + yesNoNa is the one permitted overlap
const EXCLUSIVE_GROUPS = ["ignored", "split", "yesNo", "quantitative"] as const;
type ExclusiveGroup = (typeof EXCLUSIVE_GROUPS)[number];

/**
 * Resolve the rules for `disease` into a frozen `RuleSet`.
 *
 * Fails with `ConfigError` when the disease is not scheduled in `sheets_to_process`,
 * when a rename target or classified column is not a qualified column, or when a
 * column is claimed by two mutually exclusive classes.
 */
export function loadRuleSet(doc: RulesDocument, disease: string): RuleSet {
  const fail: (message: string, column?: string) => never = (message, column) => {
    throw new ConfigError(`${message} (sheet '${disease}')`, { disease, column });
  };

  if (!doc.sheets_to_process.includes(disease)) {
    fail(`Sheet '${disease}' is not listed in sheets_to_process`);
  }

  const qualifiedColumns = doc.worksheet_name_to_qualified_column_name_list[disease];
  if (!qualifiedColumns || qualifiedColumns.length === 0) {
    return fail("No qualified columns configured");
  }
  const qualified = new Set<string>();
  for (const col of qualifiedColumns) {
    if (qualified.has(col)) fail(`Qualified column '${col}' is listed twice`, col);
    qualified.add(col);
  }

  const hasHeaderRow = doc.worksheet_name_to_has_header_row[disease];
  if (hasHeaderRow === undefined) fail("Header-row flag is not configured");

  const splitDelimiter = doc.split_delimiter ?? DEFAULT_SPLIT_DELIMITER;
  if (splitDelimiter === "") fail("split_delimiter must not be empty");

  const requireQualified = (col: string, what: string) => {
    if (!qualified.has(col)) fail(`${what} '${col}' is not a qualified column`, col);
  };

  const renameMap = new Map<string, string>();
  for (const [raw, target] of Object.entries(doc.column_name_conversion_lookup?.[disease] ?? {})) {
    requireQualified(target, `Rename target of '${raw}'`);
    renameMap.set(raw, target);
  }

  const ignoredColumns = new Set(doc.ignore_column_lookup?.[disease] ?? []);
  const splitColumns = new Set(doc.worksheet_name_to_column_name_to_be_split_list?.[disease] ?? []);
  const yesNoNaColumns = new Set(doc.worksheet_name_to_column_name_yes_no_na?.[disease] ?? []);
  // NA membership is a superset override of plain yes/no
  const yesNoColumns = new Set([...(doc.worksheet_name_to_column_name_yes_no?.[disease] ?? []), ...yesNoNaColumns]);
  const quantitativeColumns = new Set(doc.worksheet_name_to_column_name_to_be_quantitative_values_list?.[disease] ?? []);

  for (const col of splitColumns) requireQualified(col, "Split column");
  for (const col of yesNoColumns) requireQualified(col, "Yes/No column");
  for (const col of quantitativeColumns) requireQualified(col, "Quantitative column");

  const groups: Record<ExclusiveGroup, ReadonlySet<string>> = {
    ignored: ignoredColumns,
    split: splitColumns,
    yesNo: yesNoColumns,
    quantitative: quantitativeColumns,
  };
  for (let i = 0; i < EXCLUSIVE_GROUPS.length; i++) {
    for (let j = i + 1; j < EXCLUSIVE_GROUPS.length; j++) {
      const a = EXCLUSIVE_GROUPS[i];
      const b = EXCLUSIVE_GROUPS[j];
      for (const col of groups[a]) {
        if (groups[b].has(col)) fail(`Column '${col}' cannot be both ${a} and ${b}`, col);
      }
    }
  }

  // Value classes other than plain text or a closed vocabulary
  const typed = (col: string) => splitColumns.has(col) || yesNoColumns.has(col) || quantitativeColumns.has(col);

  const diseaseTypeColumn = doc.disease_type_column_lookup?.[disease];
  if (diseaseTypeColumn !== undefined) {
    requireQualified(diseaseTypeColumn, "Disease type column");
    if (typed(diseaseTypeColumn)) {
      fail(`Disease type column '${diseaseTypeColumn}' must hold plain text`, diseaseTypeColumn);
    }
  }

  const qualifiedValues = new Map<string, ReadonlySet<string>>();
  for (const [col, values] of Object.entries(doc.qualified_value_lookup?.[disease] ?? {})) {
    requireQualified(col, "Closed-vocabulary column");
    if (typed(col)) {
      fail(`Column '${col}' has a closed vocabulary and another value class`, col);
    }
    if (col === diseaseTypeColumn) {
      fail(`Disease type column '${col}' is checked by the disease-type rule, not a closed vocabulary`, col);
    }
    qualifiedValues.set(col, readonlySet(values));
  }

  const blankAllowed = new Map<string, boolean>();
  for (const [col, allowed] of Object.entries(doc.blank_value_allowed?.[disease] ?? {})) {
    requireQualified(col, "Blank-value override column");
    blankAllowed.set(col, allowed);
  }

  const sampleIdColumn = doc.sample_id_column ?? DEFAULT_SAMPLE_ID_COLUMN;
  if (doc.sample_id_column !== undefined) requireQualified(sampleIdColumn, "Sample ID column");

  const textColumn = (col: string | undefined, what: string) => {
    if (col === undefined) return;
    requireQualified(col, what);
    if (yesNoColumns.has(col) || quantitativeColumns.has(col)) fail(`${what} '${col}' must hold text values`, col);
  };

  const genderColumn = doc.matrix_gender_column_lookup?.[disease];
  textColumn(genderColumn, "Gender column");
  const tensionColumn = doc.matrix_tension_column_lookup?.[disease];
  textColumn(tensionColumn, "Tension column");
  const diagnosisColumns = doc.matrix_diagnosis_column_lookup?.[disease] ?? [];
  for (const col of diagnosisColumns) textColumn(col, "Diagnosis column");

  const caseControlDoc = doc.matrix_case_control_lookup?.[disease];
  const caseControl = caseControlDoc && {
    column: caseControlDoc.column,
    controlValues: readonlyMap(Object.entries(caseControlDoc.control_values)),
  };
  for (const col of caseControl?.controlValues.keys() ?? []) textColumn(col, "Case/control source column");

  const means = new Map<string, readonly string[]>();
  for (const [name, sources] of Object.entries(doc.matrix_mean_column_lookup?.[disease] ?? {})) {
    for (const col of sources) {
      requireQualified(col, `Source of mean '${name}'`);
      if (!quantitativeColumns.has(col)) fail(`Source of mean '${name}' '${col}' is not quantitative`, col);
    }
    means.set(name, Object.freeze([...sources]));
  }

  const classification = classifyColumns(qualifiedColumns, {
    splitColumns,
    yesNoColumns,
    yesNoNaColumns,
    quantitativeColumns,
    qualifiedValues,
  });

  const ruleSet: RuleSet = {
    disease,
    qualifiedColumns: Object.freeze([...qualifiedColumns]),
    renameMap: readonlyMap(renameMap),
    ignoredColumns: readonlySet(ignoredColumns),
    splitColumns: readonlySet(splitColumns),
    yesNoColumns: readonlySet(yesNoColumns),
    yesNoNaColumns: readonlySet(yesNoNaColumns),
    quantitativeColumns: readonlySet(quantitativeColumns),
    qualifiedValues: readonlyMap(qualifiedValues),
    blankAllowed: readonlyMap(blankAllowed),
    hasHeaderRow,
    splitDelimiter,
    diseaseTypeColumn,
    qualifiedDiseaseTypes: readonlySet(doc.qualified_disease_type_lookup?.[disease] ?? []),
    diseaseTypeAliases: readonlyMap(Object.entries(doc.disease_type_alias_lookup?.[disease] ?? {})),
    sampleIdColumn: qualified.has(sampleIdColumn) ? sampleIdColumn : undefined,
    matrix: Object.freeze({
      genderColumn,
      tensionColumn,
      diagnosisColumns: readonlySet(diagnosisColumns),
      caseControl: caseControl && Object.freeze(caseControl),
      means: readonlyMap(means),
    }),
    classification: readonlyMap(classification),
  };
  return Object.freeze(ruleSet);
}

const readOnly = (): never => {
  throw new TypeError("Rule sets are read-only");
};

// Set and Map ignore Object.freeze, so their mutators are replaced as well
function readonlySet<T>(values: Iterable<T>): ReadonlySet<T> {
  return Object.freeze(Object.assign(new Set(values), { add: readOnly, delete: readOnly, clear: readOnly }));
}

function readonlyMap<K, V>(entries: Iterable<readonly [K, V]>): ReadonlyMap<K, V> {
  return Object.freeze(Object.assign(new Map(entries), { set: readOnly, delete: readOnly, clear: readOnly }));
}

/**
 * Compute the single value class of every qualified column.
 * Classes are mutually exclusive once the loader has rejected conflicting sets.
 */
export function classifyColumns(
  columns: readonly string[],
  sets: Pick<RuleSet, "splitColumns" | "yesNoColumns" | "yesNoNaColumns" | "quantitativeColumns" | "qualifiedValues">
): ReadonlyMap<string, ColumnClass> {
  const out = new Map<string, ColumnClass>();
  for (const col of columns) {
    let tag: ColumnClass = "plain";
    if (sets.splitColumns.has(col)) tag = "split";
    else if (sets.yesNoNaColumns.has(col)) tag = "yesNoNa";
    else if (sets.yesNoColumns.has(col)) tag = "yesNo";
    else if (sets.quantitativeColumns.has(col)) tag = "quantitative";
    else if (sets.qualifiedValues.has(col)) tag = "qualified";
    out.set(col, tag);
  }
  return out;
}
