/**
 * RFC 4180 rows for the sink files.
 *
 * Fields containing a comma, a double quote, CR or LF are quoted and
 * their quotes doubled. Rows end in CRLF.
 */

import {
  RECORD_COLUMNS,
  RECORD_HEADER,
  type MonitoringRecord,
  type RecordRow,
} from "@resource-watcher/shared";

export const ROW_TERMINATOR = "\r\n";

const NEEDS_QUOTING = /[",\r\n]/;

function quote(field: string): string {
  return NEEDS_QUOTING.test(field) ? `"${field.replace(/"/g, '""')}"` : field;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(quote).join(",") + ROW_TERMINATOR;
}

/**
 * Split CSV text into rows of fields. Quoted fields may span lines;
 * both CRLF and LF row endings are accepted.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (quoted) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field === "") {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
      if (ch === "\r" && text[i + 1] === "\n") i++;
    } else {
      field += ch;
    }
    i++;
  }

  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export function headerRow(): string {
  return formatCsvRow(RECORD_HEADER);
}

/** Render a record as one CSV row in column order */
export function recordToRow(record: MonitoringRecord): string {
  return formatCsvRow(RECORD_COLUMNS.map(([, key]) => String(record[key])));
}

/** Map one parsed row back onto column names; null when the width is wrong */
export function toRecordRow(fields: readonly string[]): RecordRow | null {
  if (fields.length !== RECORD_COLUMNS.length) return null;
  const row: Partial<RecordRow> = {};
  RECORD_COLUMNS.forEach(([column], i) => {
    row[column] = fields[i];
  });
  return isComplete(row) ? row : null;
}

function isComplete(row: Partial<RecordRow>): row is RecordRow {
  return RECORD_HEADER.every((column) => typeof row[column] === "string");
}
