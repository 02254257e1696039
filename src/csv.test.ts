import { describe, it, expect } from "vitest";
import { InputError } from "./errors.js";
import { parseDelimited, readDelimitedSheet } from "./csv.js";

describe("parseDelimited", () => {
  it("handles quoted separators and doubled quotes", () => {
    const text = 'id,diagnosis\nS1,"POAG, PXF"\nS2,"say ""hi"""\n';
    expect(parseDelimited(text)).toEqual([
      ["id", "diagnosis"],
      ["S1", "POAG, PXF"],
      ["S2", 'say "hi"'],
    ]);
  });

  it("keeps short rows short", () => {
    expect(parseDelimited("a,b,c\r\n1,2\r\n")).toEqual([
      ["a", "b", "c"],
      ["1", "2"],
    ]);
  });

  it("ends lines on a lone carriage return", () => {
    expect(parseDelimited("a,b\r1,2")).toEqual([
      ["a", "b"],
      ["1", "2"],
    ]);
  });

  it("keeps line breaks inside quoted cells", () => {
    expect(parseDelimited('S1,"first\r\nsecond"\n')).toEqual([["S1", "first\r\nsecond"]]);
  });

  it("keeps blank rows and trailing empty cells", () => {
    expect(parseDelimited("a\n\nb,")).toEqual([["a"], [""], ["b", ""]]);
  });

  it("reports the line of an unterminated quote", () => {
    let caught: unknown;
    try {
      parseDelimited('S1,"line one\nline two"\n"oops');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InputError);
    if (!(caught instanceof InputError)) return;
    expect(caught.line).toBe(3);
    expect(caught.message).toBe("Unterminated quoted cell starting on line 3");
  });

  it("returns no rows for empty text", () => {
    expect(parseDelimited("")).toEqual([]);
  });
});

describe("readDelimitedSheet", () => {
  it("picks the tab separator for .tsv files and strips a BOM", () => {
    const sheet = readDelimitedSheet("\uFEFFSample_ID\tGender\nS1\tF\n", "DR", "cohort.TSV");
    expect(sheet).toEqual({
      name: "DR",
      rows: [
        ["Sample_ID", "Gender"],
        ["S1", "F"],
      ],
      firstRowNumber: 1,
    });
  });

  it("uses commas otherwise", () => {
    expect(readDelimitedSheet("a,b\n", "AMD", "cohort.csv").rows).toEqual([["a", "b"]]);
  });
});
