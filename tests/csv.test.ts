import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { parseImportCsv } from "../server/services/imports/csv";
import { FatalImportError } from "../server/services/people/errors";
import { csv } from "./fixtures";

describe("parseImportCsv", () => {
  it("keys rows by normalized header and numbers them from 1", () => {
    const parsed = parseImportCsv(
      csv(
        " Name ,EMAIL,Department,hire_date",
        "Avery Stone, avery@example.com ,Litigation,2022-03-01",
        "Riley Chen,riley@example.com,Corporate,2021-05-10",
      ),
      "employee-import",
    );

    assert.deepEqual(parsed.headers, ["name", "email", "department", "hire_date"]);
    assert.deepEqual(parsed.rows, [
      {
        rowNumber: 1,
        data: { name: "Avery Stone", email: "avery@example.com", department: "Litigation", hire_date: "2022-03-01" },
        raw: { name: "Avery Stone", email: " avery@example.com ", department: "Litigation", hire_date: "2022-03-01" },
      },
      {
        rowNumber: 2,
        data: { name: "Riley Chen", email: "riley@example.com", department: "Corporate", hire_date: "2021-05-10" },
        raw: { name: "Riley Chen", email: "riley@example.com", department: "Corporate", hire_date: "2021-05-10" },
      },
    ]);
  });

  it("drops unknown columns and keeps optional ones", () => {
    const parsed = parseImportCsv(
      csv("name,email,department,hire_date,position,shoe_size", "Avery Stone,avery@example.com,Litigation,2022-03-01,Partner,42"),
      "employee-import",
    );
    assert.deepEqual(parsed.rows[0].data, {
      name: "Avery Stone",
      email: "avery@example.com",
      department: "Litigation",
      hire_date: "2022-03-01",
      position: "Partner",
    });
  });

  it("keeps every cell as read, naming cells without a usable header by position", () => {
    const parsed = parseImportCsv(
      csv("name,email,department,hire_date,,email", "Avery Stone,avery@example.com,Litigation,2022-03-01,x,alt@example.com,extra"),
      "employee-import",
    );
    assert.equal(parsed.rows[0].data.email, "avery@example.com");
    assert.deepEqual(parsed.rows[0].raw, {
      name: "Avery Stone",
      email: "avery@example.com",
      department: "Litigation",
      hire_date: "2022-03-01",
      column_5: "x",
      column_6: "alt@example.com",
      column_7: "extra",
    });
  });

  it("skips blank and whitespace-only lines", () => {
    const parsed = parseImportCsv(
      csv(
        "employee_email,date,hours,description,billable",
        "avery@example.com,2024-06-03,2,Drafted reply brief,true",
        "",
        "   ",
        "avery@example.com,2024-06-04,3,Reviewed discovery,false",
      ),
      "time-entry-import",
    );
    assert.deepEqual(parsed.rows.map((r) => [r.rowNumber, r.data.date]), [
      [1, "2024-06-03"],
      [2, "2024-06-04"],
    ]);
  });

  it("keeps commas inside quoted fields and strips a byte order mark", () => {
    const parsed = parseImportCsv(
      `\uFEFF${csv("name,email,department,hire_date", '"Stone, Avery",avery@example.com,Litigation,2022-03-01')}`,
      "employee-import",
    );
    assert.equal(parsed.headers[0], "name");
    assert.equal(parsed.rows[0].data.name, "Stone, Avery");
  });

  it("fills missing trailing cells with empty strings", () => {
    const parsed = parseImportCsv(csv("name,email,department,hire_date", "Avery Stone,avery@example.com"), "employee-import");
    assert.equal(parsed.rows[0].data.department, "");
    assert.equal(parsed.rows[0].data.hire_date, "");
  });

  it("names every missing required column", () => {
    assert.throws(
      () => parseImportCsv(csv("employee_email,date,description", "a@example.com,2024-06-03,Work item"), "time-entry-import"),
      { name: "FatalImportError", message: "Missing required columns: hours, billable" },
    );
  });

  it("rejects an empty file and a header without rows", () => {
    assert.throws(() => parseImportCsv("", "employee-import"), { message: "File is empty" });
    assert.throws(() => parseImportCsv("\n  \n", "employee-import"), { message: "File is empty" });
    assert.throws(() => parseImportCsv(csv("name,email,department,hire_date"), "employee-import"), {
      message: "File has a header but no data rows",
    });
  });

  it("treats an unterminated quote as fatal", () => {
    assert.throws(
      () => parseImportCsv('name,email,department,hire_date\n"Avery Stone,avery@example.com,Litigation,2022-03-01\n', "employee-import"),
      (error: unknown) => error instanceof FatalImportError && /^Could not parse CSV/.test(error.message),
    );
  });
});
