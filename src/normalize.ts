import type { CleanValue, DiagnosticKind, RuleSet, YesNo } from "./types.js";

/**
 * Module: Cell Normalizers
 * Purpose: Turn one raw cell into a typed `CleanValue` according to the
 * column's precomputed class, reporting rule violations as issues.
 * Features:
 * - Split columns explode on the configured delimiter into trimmed, non-empty entries.
 * - Yes/No columns accept yes/no (any case); Yes/No/NA columns add na and n/a.
 * - Quantitative columns accept plain integers and decimals, a range `low-high`
 *   (stored as its midpoint) and `x` for "not measured", which counts as blank.
 * - Closed-vocabulary columns use exact, case-sensitive membership.
 * - Blank cells follow the per-column policy; the default is strict.
 */
export type Issue = { kind: DiagnosticKind; message: string };
export type Normalized = { value: CleanValue; issues: Issue[] };

const NUMBER_RE = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)$/;
const RANGE_RE = /^(\d+(?:\.\d*)?|\.\d+)\s*-\s*(\d+(?:\.\d*)?|\.\d+)$/;
const NOT_MEASURED = "x";
const NA_TOKENS = new Set(["na", "n/a"]);

export const isBlank = (raw: string | null | undefined): boolean => String(raw ?? "").trim() === "";

/** Blank cells are an error unless explicitly allowed for the column. */
export function isBlankAllowed(ruleSet: RuleSet, column: string): boolean {
  return ruleSet.blankAllowed.get(column) === true;
}

export function splitValue(raw: string, delimiter: string): string[] {
  return String(raw ?? "")
    .split(delimiter)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function joinValues(values: readonly string[], delimiter: string): string {
  return values.join(delimiter);
}

/**
 * Map a yes/no token to the tri-state. Returns `undefined` for anything else,
 * including `na` when `allowNa` is false.
 */
export function normalizeYesNo(raw: string, allowNa: boolean): YesNo | undefined {
  const s = String(raw ?? "").trim().toLowerCase();
  if (s === "yes") return "Yes";
  if (s === "no") return "No";
  if (allowNa && NA_TOKENS.has(s)) return "NA";
  return undefined;
}

export function parseQuantitative(raw: string): number | undefined {
  const s = String(raw ?? "").trim();
  const range = RANGE_RE.exec(s);
  if (range) return (Number(range[1]) + Number(range[2])) / 2;
  if (!NUMBER_RE.test(s)) return undefined;
  const n = Number(s);
  return Number.isFinite(n) ? n : undefined;
}

const blankIssue = (column: string): Issue => ({
  kind: "BlankValueError",
  message: `Found blank value for column '${column}'`,
});

/**
 * Normalize one cell of `column`. Never throws: violations come back as issues
 * with the value marked `invalid` (or `Unknown` for yes/no columns).
 */
export function normalizeCell(raw: string, column: string, ruleSet: RuleSet): Normalized {
  const tag = ruleSet.classification.get(column) ?? "plain";
  const value = String(raw ?? "").trim();

  if (tag === "split") {
    const values = splitValue(value, ruleSet.splitDelimiter);
    if (values.length) return { value: { kind: "list", values }, issues: [] };
    if (isBlankAllowed(ruleSet, column)) return { value: { kind: "list", values: [] }, issues: [] };
    return { value: { kind: "invalid", raw: value }, issues: [blankIssue(column)] };
  }

  if (!value || (tag === "quantitative" && value.toLowerCase() === NOT_MEASURED)) {
    if (isBlankAllowed(ruleSet, column)) return { value: { kind: "blank" }, issues: [] };
    return { value: { kind: "invalid", raw: value }, issues: [blankIssue(column)] };
  }

  switch (tag) {
    case "yesNo":
    case "yesNoNa": {
      const allowNa = tag === "yesNoNa";
      const yn = normalizeYesNo(value, allowNa);
      if (yn) return { value: { kind: "yesNo", value: yn }, issues: [] };
      const accepted = allowNa ? "Yes/No/NA" : "Yes/No";
      return {
        value: { kind: "yesNo", value: "Unknown" },
        issues: [{ kind: "InvalidCategoricalValue", message: `Expected ${accepted} for column '${column}' but found '${value}'` }],
      };
    }
    case "quantitative": {
      const n = parseQuantitative(value);
      if (n !== undefined) return { value: { kind: "number", value: n }, issues: [] };
      return {
        value: { kind: "invalid", raw: value },
        issues: [{ kind: "InvalidNumericValue", message: `Expected a number for column '${column}' but found '${value}'` }],
      };
    }
    case "qualified": {
      const allowed = ruleSet.qualifiedValues.get(column);
      if (allowed?.has(value)) return { value: { kind: "text", value }, issues: [] };
      return {
        value: { kind: "invalid", raw: value },
        issues: [{ kind: "UnqualifiedValueError", message: `Unqualified value '${value}' for column '${column}'` }],
      };
    }
    case "plain":
    default:
      return { value: { kind: "text", value }, issues: [] };
  }
}
