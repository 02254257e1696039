/**
 * Fatal errors. Row-level problems are never thrown; they travel as `Diagnostic` values.
 */
export class ConfigError extends Error {
  readonly disease?: string;
  readonly column?: string;

  constructor(message: string, details: { disease?: string; column?: string } = {}) {
    super(message);
    this.name = "ConfigError";
    this.disease = details.disease;
    this.column = details.column;
  }
}

export type SchemaErrorKind = "unqualified" | "missing" | "duplicate" | "missing_sheet" | "empty_sheet";

/** Header cannot be resolved against the rules. Rejects one sheet, not the run. */
export class SchemaError extends Error {
  readonly disease: string;
  readonly column?: string;
  readonly kind: SchemaErrorKind;

  constructor(message: string, details: { disease: string; kind: SchemaErrorKind; column?: string }) {
    super(message);
    this.name = "SchemaError";
    this.disease = details.disease;
    this.kind = details.kind;
    this.column = details.column;
  }
}

/** Input bytes cannot be read as a worksheet. Fatal for the run. */
export class InputError extends Error {
  readonly line?: number;

  constructor(message: string, details: { line?: number } = {}) {
    super(message);
    this.name = "InputError";
    this.line = details.line;
  }
}
