import { describe, it, expect } from "vitest";
import { readFileSync } from "node:fs";
import { SchemaError } from "./errors.js";
import { processSheet } from "./processSheet.js";
import { loadRuleSet, parseRulesJson, type RulesDocument } from "./ruleset.js";
import { ENGINE_VERSION } from "./types.js";

const shipped = parseRulesJson(readFileSync(new URL("../conf/config.json", import.meta.url), "utf8"));

const glaucomaHeader = [
  "Sample_ID",
  "Gender",
  "Ancestry",
  "Glaucoma.diagnosis",
  "Family History",
  "AgeDx",
  "Age.Recruitment",
  "Highest IOP_RE",
  "Highest IOP_LE",
  "NTG HTG",
  "VCDR_RE",
  "VCDR_LE",
  "Highest IOP",
];

const drHeader = [
  "Sample_ID",
  "Gender",
  "Ancestry",
  "Age.Recruitment",
  "Disease Type",
  "Year of DR development",
  "BCVA_OD",
  "BCVA_OS",
  "Retinopathy_OD",
  "Retinopathy_OS",
  "Macular Edema_OD",
  "Macular Edema_OS",
];

describe("processSheet", () => {
  it("accepts permitted blanks and explodes split columns", () => {
    const rules = loadRuleSet(shipped, "Glaucoma");
    const result = processSheet(
      {
        name: "Glaucoma",
        rows: [
          glaucomaHeader,
          ["S1", "F", "EUR", "POAG, PXF", "yes", "61", "70", "21", "", "", "0.7", "0.6", "24"],
          ["S2", "M", "AFR", "POAG", "No", "", "65", "18", "19", "1", "0.5", "0.5", ""],
        ],
        firstRowNumber: 1,
      },
      rules
    );

    expect(result.diagnostics).toEqual([]);
    expect(result.rows.map((r) => r.row)).toEqual([2, 3]);
    const first = result.rows[0].values;
    expect(first["Glaucoma.diagnosis"]).toEqual({ kind: "list", values: ["POAG", "PXF"] });
    expect(first["Family History"]).toEqual({ kind: "yesNo", value: "Yes" });
    expect(first["Age Recruitment"]).toEqual({ kind: "number", value: 70 });
    expect(first["NTG HTG"]).toEqual({ kind: "blank" });
    expect(first["Highest IOP_LE"]).toEqual({ kind: "blank" });
    expect(result.meta.ignoredColumns).toEqual(["Highest IOP"]);
    expect(result.meta.valueCounts).toEqual({
      Gender: { F: 1, M: 1 },
      "Glaucoma.diagnosis": { POAG: 2, PXF: 1 },
      "NTG HTG": { "1": 1 },
    });
    expect(result.meta.engineVersion).toBe(ENGINE_VERSION);
  });

  it("reports a bad number and a bad disease type without dropping rows", () => {
    const rules = loadRuleSet(shipped, "DR");
    const result = processSheet(
      {
        name: "DR",
        rows: [
          drHeader,
          ["S1", "F", "EUR", "54", "Type2-NIDDM", "2010", "abc", "0.6", "PDR", "No DR", "No", "No"],
          ["S2", "M", "EAS", "48", "Type3", "", "", "", "Unknown", "Unknown", "Unknown", "Unknown"],
        ],
        firstRowNumber: 1,
      },
      rules
    );

    expect(result.rows).toHaveLength(2);
    expect(result.diagnostics).toEqual([
      {
        row: 2,
        column: "bcva_right_eye",
        kind: "InvalidNumericValue",
        rawValue: "abc",
        message: "Expected a number for column 'bcva_right_eye' but found 'abc'",
      },
      {
        row: 3,
        column: "Disease Type",
        kind: "UnqualifiedValueError",
        rawValue: "Type3",
        message: "Unqualified disease type 'Type3' in worksheet 'DR'",
      },
    ]);
    expect(result.meta.valueCounts["Disease Type"]).toEqual({ "Type2-NIDDM": 1 });
  });

  it("skips blank rows and keeps spreadsheet row numbers", () => {
    const rules = loadRuleSet(shipped, "AMD");
    const header = ["Sample_ID", "Gender", "Ancestry", "Age.Recruitment", "Diagnosis", "Family History", "Smoking"];
    const result = processSheet(
      {
        name: "AMD",
        rows: [
          header,
          ["S1", "F", "EUR", "80", "GA", "No", ""],
          ["", " ", "", "", "", "", ""],
          ["S2", "M", "EUR", "77", "CNV", "Yes", "n/a"],
        ],
        firstRowNumber: 4,
      },
      rules
    );

    expect(result.rows.map((r) => r.row)).toEqual([5, 7]);
    expect(result.meta).toMatchObject({ totalRows: 3, processedRows: 2, skippedBlankRows: 1 });
    expect(result.rows[0].values.Smoking).toEqual({ kind: "blank" });
    expect(result.rows[1].values.Smoking).toEqual({ kind: "yesNo", value: "NA" });
    expect(result.diagnostics).toEqual([]);
  });

  it("emits one value per qualified column whatever the header order", () => {
    const rules = loadRuleSet(shipped, "DR");
    const row = ["S1", "F", "EUR", "54", "NA", "", "0.8", "0.6", "PDR", "No DR", "No", "No"];
    const order = [...drHeader.keys()].reverse();
    const result = processSheet(
      { name: "DR", rows: [order.map((i) => drHeader[i]), order.map((i) => row[i])], firstRowNumber: 1 },
      rules
    );
    expect(result.diagnostics).toEqual([]);
    expect(Object.keys(result.rows[0].values)).toEqual(rules.qualifiedColumns);
    expect(result.rows[0].values.bcva_right_eye).toEqual({ kind: "number", value: 0.8 });
  });

  it("rejects a header missing a qualified column", () => {
    const rules = loadRuleSet(shipped, "DR");
    const header = drHeader.filter((h) => h !== "Gender");
    expect(() => processSheet({ name: "DR", rows: [header], firstRowNumber: 1 }, rules)).toThrow(SchemaError);
  });

  it("rejects an empty sheet that should have a header", () => {
    const rules = loadRuleSet(shipped, "DR");
    expect(() => processSheet({ name: "DR", rows: [], firstRowNumber: 1 }, rules)).toThrow(
      "Worksheet 'DR' has no header row"
    );
  });

  it("reads headerless sheets positionally", () => {
    const doc: RulesDocument = {
      qualified_sheet_names: ["Pos"],
      sheets_to_process: ["Pos"],
      worksheet_name_to_has_header_row: { Pos: false },
      worksheet_name_to_qualified_column_name_list: { Pos: ["id", "age"] },
      worksheet_name_to_column_name_to_be_quantitative_values_list: { Pos: ["age"] },
    };
    const rules = loadRuleSet(doc, "Pos");
    const result = processSheet({ name: "Pos", rows: [["a", "1"], ["b"]], firstRowNumber: 1 }, rules);

    expect(result.rows.map((r) => r.row)).toEqual([1, 2]);
    expect(result.rows[0].values).toEqual({ id: { kind: "text", value: "a" }, age: { kind: "number", value: 1 } });
    expect(result.diagnostics.map((d) => [d.row, d.column, d.kind])).toEqual([[2, "age", "MissingColumnError"]]);
  });

  it("counts categorical values named like object prototype members", () => {
    const doc: RulesDocument = {
      qualified_sheet_names: ["Test"],
      sheets_to_process: ["Test"],
      worksheet_name_to_has_header_row: { Test: true },
      worksheet_name_to_qualified_column_name_list: { Test: ["id", "dx"] },
      worksheet_name_to_column_name_to_be_split_list: { Test: ["dx"] },
    };
    const rules = loadRuleSet(doc, "Test");
    const result = processSheet(
      {
        name: "Test",
        rows: [
          ["id", "dx"],
          ["s1", "constructor, __proto__"],
          ["s2", "constructor"],
        ],
        firstRowNumber: 1,
      },
      rules
    );
    expect(Object.entries(result.meta.valueCounts.dx)).toEqual([
      ["constructor", 2],
      ["__proto__", 1],
    ]);
  });

  it("records cells that sit under no header", () => {
    const doc: RulesDocument = {
      qualified_sheet_names: ["Test"],
      sheets_to_process: ["Test"],
      worksheet_name_to_has_header_row: { Test: true },
      worksheet_name_to_qualified_column_name_list: { Test: ["id", "dx"] },
    };
    const rules = loadRuleSet(doc, "Test");
    const result = processSheet(
      {
        name: "Test",
        rows: [
          ["id", "", "dx"],
          ["s1", "stray", "a", "extra"],
          ["s2", "", "b"],
        ],
        firstRowNumber: 1,
      },
      rules
    );
    expect(result.diagnostics).toEqual([]);
    expect(result.meta.droppedCells).toEqual({ "2": 1, "4": 1 });
  });
});
