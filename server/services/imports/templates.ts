import Papa from "papaparse";
import type { ImportKind } from "@shared/schema";

const TEMPLATES: Record<ImportKind, { fields: string[]; data: string[][] }> = {
  "employee-import": {
    fields: ["name", "email", "department", "hire_date", "position"],
    data: [
      ["Avery Stone", "avery.stone@example.com", "Litigation", "2024-01-15", "Associate"],
      ["Morgan Hale", "morgan.hale@example.com", "Corporate", "2024-03-01", "Paralegal"],
    ],
  },
  "time-entry-import": {
    fields: ["employee_email", "date", "hours", "description", "billable", "matter_code"],
    data: [
      ["avery.stone@example.com", "2024-06-03", "7.50", "Drafted motion to compel discovery", "true", "LIT-104"],
      ["morgan.hale@example.com", "2024-06-03", "1.25", "Internal training on filing system", "false", ""],
    ],
  },
};

/** Header plus two example rows, CRLF line endings. */
export function csvTemplate(kind: ImportKind): string {
  const { fields, data } = TEMPLATES[kind];
  return `${Papa.unparse({ fields, data })}\r\n`;
}
