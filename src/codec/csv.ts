import { CorruptFileError } from "../errors";

const NEEDS_QUOTING = /[",\r\n]/;
const ROW_TERMINATOR = "\r\n";

export function formatCsvField(value: string): string {
  if (NEEDS_QUOTING.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Every row, the last one included, ends with CRLF. */
export function formatCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => row.map(formatCsvField).join(",") + ROW_TERMINATOR).join("");
}

/**
 * Parses RFC 4180 text. Accepts LF or CRLF row terminators, quoted fields
 * spanning lines, and a missing final terminator. Blank lines are skipped.
 *
 * @throws {CorruptFileError} On a stray quote, a bare CR or an unterminated quoted field.
 */
export function parseCsv(text: string): string[][] {
  const src = text.startsWith("\uFEFF") ? text.slice(1) : text;
  const rows: string[][] = [];

  let row: string[] = [];
  let field = "";
  let inQuotes = false;
  let afterQuote = false;
  let rowStarted = false;
  let line = 1;

  const endRow = () => {
    if (rowStarted) {
      row.push(field);
      rows.push(row);
    }
    row = [];
    field = "";
    afterQuote = false;
    rowStarted = false;
  };

  for (let i = 0; i < src.length; i++) {
    const ch = src[i];

    if (inQuotes) {
      if (ch === '"') {
        if (src[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          afterQuote = true;
        }
      } else {
        if (ch === "\n") line++;
        field += ch;
      }
      continue;
    }

    if (ch === ",") {
      row.push(field);
      field = "";
      afterQuote = false;
      rowStarted = true;
    } else if (ch === "\n") {
      endRow();
      line++;
    } else if (ch === "\r") {
      if (src[i + 1] !== "\n") {
        throw new CorruptFileError(`Bare carriage return on line ${line}`);
      }
    } else if (afterQuote) {
      throw new CorruptFileError(`Unexpected character after closing quote on line ${line}`);
    } else if (ch === '"') {
      if (field.length > 0) {
        throw new CorruptFileError(`Unexpected quote inside unquoted field on line ${line}`);
      }
      inQuotes = true;
      rowStarted = true;
    } else {
      field += ch;
      rowStarted = true;
    }
  }

  if (inQuotes) {
    throw new CorruptFileError(`Unterminated quoted field on line ${line}`);
  }
  endRow();
  return rows;
}
