import { InputError } from "./errors.js";
import type { WorksheetData } from "./types.js";

type Mode = "start" | "unquoted" | "quoted" | "closed";

/**
 * Split delimited text into rows of raw cells.
 *
 * Quoted cells may hold separators, line breaks and doubled quotes. `\r\n`,
 * `\n` and a lone `\r` all end a line. Rows keep their own length, so a short
 * row stays short. A trailing line break does not add an empty row.
 * Throws `InputError` naming the line where an unterminated quote opened.
 */
export function parseDelimited(text: string, separator = ","): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let mode: Mode = "start";
  let line = 1;
  let quoteLine = 1;

  const endCell = () => {
    row.push(cell);
    cell = "";
    mode = "start";
  };
  const endRow = () => {
    endCell();
    rows.push(row);
    row = [];
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (mode === "quoted") {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          mode = "closed";
        }
        continue;
      }
      if (ch === "\n" || (ch === "\r" && text[i + 1] !== "\n")) line++;
      cell += ch;
      continue;
    }

    if (ch === separator) {
      endCell();
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && text[i + 1] === "\n") i++;
      endRow();
      line++;
    } else if (ch === '"' && mode === "start") {
      mode = "quoted";
      quoteLine = line;
    } else {
      // text after a closing quote is kept, as spreadsheet programs do
      cell += ch;
      if (mode === "start") mode = "unquoted";
    }
  }

  if (mode === "quoted") {
    throw new InputError(`Unterminated quoted cell starting on line ${quoteLine}`, { line: quoteLine });
  }
  if (mode !== "start" || row.length > 0) endRow();
  return rows;
}

/** Present a CSV/TSV file as a single worksheet named `sheetName`. */
export function readDelimitedSheet(text: string, sheetName: string, filename = ""): WorksheetData {
  const separator = filename.toLowerCase().endsWith(".tsv") ? "\t" : ",";
  return { name: sheetName, rows: parseDelimited(text.replace(/^\uFEFF/, ""), separator), firstRowNumber: 1 };
}
