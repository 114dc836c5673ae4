import Papa from "papaparse";
import type { ImportKind } from "@shared/schema";
import { FatalImportError } from "../people/errors";

export const REQUIRED_COLUMNS: Record<ImportKind, readonly string[]> = {
  "employee-import": ["name", "email", "department", "hire_date"],
  "time-entry-import": ["employee_email", "date", "hours", "description", "billable"],
};

export const OPTIONAL_COLUMNS: Record<ImportKind, readonly string[]> = {
  "employee-import": ["position"],
  "time-entry-import": ["matter_code"],
};

export interface CsvRow {
  /** 1-based; the header is row 0 */
  rowNumber: number;
  /** Known columns only, keyed by normalized header, values trimmed */
  data: Record<string, string>;
  /**
   * Every cell as it appeared in the file. Cells with no usable header
   * (blank, repeated, or past the last header) are keyed `column_<n>`.
   */
  raw: Record<string, string>;
}

export interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

export function normalizeHeader(header: string): string {
  return header.trim().toLowerCase();
}

/**
 * Parses an upload into rows keyed by normalized header. Any defect that
 * prevents processing the file as a whole throws FatalImportError; per-row
 * problems are left for validation.
 */
export function parseImportCsv(content: string, kind: ImportKind): ParsedCsv {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  if (text.trim() === "") {
    throw new FatalImportError("File is empty");
  }

  const result = Papa.parse<string[]>(text, {
    delimiter: ",",
    skipEmptyLines: "greedy",
    dynamicTyping: false,
  });

  const parseErrors = result.errors.filter((error) => error.type === "Quotes" || error.type === "Delimiter");
  if (parseErrors.length > 0) {
    const first = parseErrors[0];
    const where = first.row !== undefined ? ` (row ${first.row})` : "";
    throw new FatalImportError(`Could not parse CSV${where}: ${first.message}`);
  }

  const [headerCells, ...records] = result.data;
  if (!headerCells) {
    throw new FatalImportError("File is empty");
  }

  const headers = headerCells.map((cell) => normalizeHeader(`${cell ?? ""}`));
  const missing = REQUIRED_COLUMNS[kind].filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new FatalImportError(`Missing required columns: ${missing.join(", ")}`);
  }

  if (records.length === 0) {
    throw new FatalImportError("File has a header but no data rows");
  }

  const known = new Set([...REQUIRED_COLUMNS[kind], ...OPTIONAL_COLUMNS[kind]]);
  const rows = records.map((cells, index) => {
    const data: Record<string, string> = {};
    headers.forEach((header, column) => {
      // first occurrence wins for repeated headers
      if (!known.has(header) || header in data) return;
      data[header] = `${cells[column] ?? ""}`.trim();
    });
    const raw: Record<string, string> = {};
    cells.forEach((cell, column) => {
      const header = headers[column];
      const key = header && !(header in raw) ? header : `column_${column + 1}`;
      raw[key] = `${cell ?? ""}`;
    });
    return { rowNumber: index + 1, data, raw };
  });

  return { headers, rows };
}
