import { createLogger } from "./logger.js";
import { normalizeCell } from "./normalize.js";
import type { ResolvedColumns } from "./columns.js";
import type { CleanRow, CleanValue, Diagnostic, RuleSet } from "./types.js";

const log = createLogger("validate");

/**
 * Normalize and validate one data row.
 *
 * Every qualified column gets a value; cells absent from a short row become
 * `MissingColumnError`. The disease-type rule runs after per-cell normalization.
 * The row is always returned, diagnostics alongside.
 */
export function validateRow(
  rowNumber: number,
  cells: readonly string[],
  columns: ResolvedColumns,
  ruleSet: RuleSet
): { row: CleanRow; diagnostics: Diagnostic[] } {
  const values: Record<string, CleanValue> = {};
  const diagnostics: Diagnostic[] = [];

  for (const column of ruleSet.qualifiedColumns) {
    const idx = columns.indexOf.get(column);
    if (idx === undefined || idx >= cells.length) {
      values[column] = { kind: "invalid", raw: null };
      diagnostics.push({
        row: rowNumber,
        column,
        kind: "MissingColumnError",
        rawValue: null,
        message: `Row ${rowNumber} has no cell for column '${column}'`,
      });
      continue;
    }
    const raw = cells[idx];
    const { value, issues } = normalizeCell(raw, column, ruleSet);
    values[column] = value;
    for (const issue of issues) {
      diagnostics.push({ row: rowNumber, column, kind: issue.kind, rawValue: raw, message: issue.message });
    }
  }

  checkDiseaseType(rowNumber, values, diagnostics, ruleSet);

  return { row: { row: rowNumber, values }, diagnostics };
}

// DR-style rule: the disease type must be one of the configured types
function checkDiseaseType(
  rowNumber: number,
  values: Record<string, CleanValue>,
  diagnostics: Diagnostic[],
  ruleSet: RuleSet
): void {
  const column = ruleSet.diseaseTypeColumn;
  if (!column) return;
  const current = values[column];
  if (current?.kind !== "text") return;

  let type = current.value;
  const alias = ruleSet.diseaseTypeAliases.get(type);
  if (alias !== undefined) {
    log.info(`Changed disease type '${type}' to '${alias}' at row ${rowNumber}`);
    type = alias;
  }
  if (ruleSet.qualifiedDiseaseTypes.has(type)) {
    values[column] = { kind: "text", value: type };
    return;
  }
  values[column] = { kind: "invalid", raw: current.value };
  diagnostics.push({
    row: rowNumber,
    column,
    kind: "UnqualifiedValueError",
    rawValue: current.value,
    message: `Unqualified disease type '${current.value}' in worksheet '${ruleSet.disease}'`,
  });
}
