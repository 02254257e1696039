import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { readWorkbookSheets, sheetToData } from "./xlsx.js";

function workbookBytes(sheets: Record<string, unknown[][]>): ArrayBuffer {
  const wb = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), name);
  }
  const out: unknown = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  if (!(out instanceof Uint8Array)) throw new Error("expected workbook bytes");
  const bytes = new ArrayBuffer(out.byteLength);
  new Uint8Array(bytes).set(out);
  return bytes;
}

describe("readWorkbookSheets", () => {
  it("returns every sheet with cells as strings", () => {
    const bytes = workbookBytes({
      DR: [
        ["Sample_ID", "Age.Recruitment"],
        ["S1", 54],
      ],
      Notes: [["free text"]],
    });
    const sheets = readWorkbookSheets(bytes);
    expect(sheets.map((s) => s.name)).toEqual(["DR", "Notes"]);
    expect(sheets[0]).toEqual({
      name: "DR",
      rows: [
        ["Sample_ID", "Age.Recruitment"],
        ["S1", "54"],
      ],
      firstRowNumber: 1,
    });
  });

  it("fills gaps in a row with empty strings", () => {
    const bytes = workbookBytes({ AMD: [["a", "b", "c"], ["1", null, "3"]] });
    expect(readWorkbookSheets(bytes)[0].rows[1]).toEqual(["1", "", "3"]);
  });
});

describe("sheetToData", () => {
  it("numbers rows from the start of the used range", () => {
    const sheet: XLSX.WorkSheet = {
      "!ref": "A3:B4",
      A3: { t: "s", v: "Sample_ID" },
      B3: { t: "s", v: "Gender" },
      A4: { t: "s", v: "S1" },
      B4: { t: "s", v: "M" },
    };
    expect(sheetToData("AMD", sheet)).toEqual({
      name: "AMD",
      rows: [
        ["Sample_ID", "Gender"],
        ["S1", "M"],
      ],
      firstRowNumber: 3,
    });
  });

  it("reads numeric cells from their stored value, not their display format", () => {
    const sheet: XLSX.WorkSheet = {
      "!ref": "A1:C1",
      A1: { t: "n", v: 0.6, w: "60%" },
      B1: { t: "n", v: 1234, w: "1,234" },
      C1: { t: "s", v: "12 mmHg", w: "12 mmHg" },
    };
    expect(sheetToData("Glaucoma", sheet).rows).toEqual([["0.6", "1234", "12 mmHg"]]);
  });

  it("treats a sheet without a range as empty", () => {
    expect(sheetToData("Empty", {})).toEqual({ name: "Empty", rows: [], firstRowNumber: 1 });
    expect(sheetToData("Gone", undefined).rows).toEqual([]);
  });
});
