import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  validateEmployee,
  validateTimeEntry,
  type EmployeeCandidate,
  type TimeEntryCandidate,
  type TimeEntryValidationContext,
} from "../server/services/people/validation";
import { TODAY } from "./fixtures";

const departmentIds = new Set(["dep-1"]);

function employeeCandidate(overrides: Partial<EmployeeCandidate> = {}): EmployeeCandidate {
  return {
    name: "Ada Lovelace",
    email: "ada@example.com",
    departmentId: "dep-1",
    hireDate: "2024-01-15",
    ...overrides,
  };
}

function entryCandidate(overrides: Partial<TimeEntryCandidate> = {}): TimeEntryCandidate {
  return {
    employeeId: "emp-1",
    date: "2024-06-03",
    hours: "8",
    description: "Reviewed merger documents",
    billable: true,
    ...overrides,
  };
}

function entryContext(overrides: Partial<TimeEntryValidationContext> = {}): TimeEntryValidationContext {
  return {
    today: TODAY,
    employee: { id: "emp-1", deletedAt: null },
    sameDayEntries: [],
    ...overrides,
  };
}

function codes(result: { ok: boolean; violations?: { code: string }[] }): string[] {
  return result.violations?.map((v) => v.code) ?? [];
}

describe("validateEmployee", () => {
  it("normalizes name whitespace and email case", () => {
    const result = validateEmployee(
      employeeCandidate({ name: "  Ada   Lovelace ", email: " ADA@Example.com ", position: " Associate " }),
      { today: TODAY, departmentIds },
    );
    assert.deepEqual(result, {
      ok: true,
      value: {
        name: "Ada Lovelace",
        email: "ada@example.com",
        hireDate: "2024-01-15",
        departmentId: "dep-1",
        position: "Associate",
      },
    });
  });

  it("requires first and last name", () => {
    const result = validateEmployee(employeeCandidate({ name: "Ada" }), { today: TODAY, departmentIds });
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(result.violations, [
      { field: "name", code: "INVALID_NAME", kind: "validation", message: "Name must contain first and last name" },
    ]);
  });

  it("reports every broken rule at once", () => {
    const result = validateEmployee(
      employeeCandidate({ email: "not-an-email", hireDate: "2024-07-01", departmentId: "dep-9" }),
      { today: TODAY, departmentIds },
    );
    assert.deepEqual(codes(result), ["INVALID_EMAIL", "FUTURE_DATE", "DEPARTMENT_NOT_FOUND"]);
  });

  it("caps the email at 255 characters", () => {
    const atLimit = `${"a".repeat(243)}@example.com`;
    assert.equal(validateEmployee(employeeCandidate({ email: atLimit }), { today: TODAY, departmentIds }).ok, true);

    const result = validateEmployee(employeeCandidate({ email: `a${atLimit}` }), { today: TODAY, departmentIds });
    assert.deepEqual(codes(result), ["TOO_LONG"]);
    assert.equal(result.ok ? undefined : result.violations[0].message, "Email cannot exceed 255 characters");
  });

  it("flags an email held by another active employee as a conflict", () => {
    const result = validateEmployee(employeeCandidate(), {
      today: TODAY,
      departmentIds,
      emailOwner: { id: "emp-2", deletedAt: null },
    });
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.equal(result.violations[0].kind, "conflict");
    assert.equal(result.violations[0].message, "Employee with email ada@example.com already exists");
  });

  it("ignores the employee's own email on update", () => {
    const result = validateEmployee(employeeCandidate(), {
      today: TODAY,
      departmentIds,
      emailOwner: { id: "emp-2", deletedAt: null },
      selfId: "emp-2",
    });
    assert.equal(result.ok, true);
  });

  it("marks an unknown department as not found", () => {
    const result = validateEmployee(employeeCandidate({ departmentId: "dep-9" }), { today: TODAY, departmentIds });
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(result.violations, [
      { field: "departmentId", code: "DEPARTMENT_NOT_FOUND", kind: "not_found", message: "Department dep-9 not found" },
    ]);
  });
});

describe("validateTimeEntry", () => {
  it("normalizes hours, billable and matter code", () => {
    const result = validateTimeEntry(
      entryCandidate({ hours: "3", billable: "YES", matterCode: "lit-104", description: "  Drafted reply brief  " }),
      entryContext(),
    );
    assert.deepEqual(result, {
      ok: true,
      value: {
        employeeId: "emp-1",
        date: "2024-06-03",
        hours: "3.00",
        description: "Drafted reply brief",
        billable: true,
        matterCode: "LIT-104",
      },
    });
  });

  it("rejects 5 more hours on a day that already has 20", () => {
    const result = validateTimeEntry(
      entryCandidate({ hours: "5" }),
      entryContext({ sameDayEntries: [{ id: "t-1", hours: "20.00" }] }),
    );
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(result.violations, [
      {
        field: "hours",
        code: "DAILY_HOURS_EXCEEDED",
        kind: "validation",
        message: "Daily total would be 25.00 hours (20.00 already logged); the limit is 24.00",
      },
    ]);
  });

  it("accepts 3 more hours on a day that already has 20", () => {
    const result = validateTimeEntry(
      entryCandidate({ hours: "3" }),
      entryContext({ sameDayEntries: [{ id: "t-1", hours: "20.00" }] }),
    );
    assert.equal(result.ok, true);
  });

  it("leaves the entry being updated out of the daily sum", () => {
    const result = validateTimeEntry(
      entryCandidate({ hours: "23.5" }),
      entryContext({ sameDayEntries: [{ id: "t-1", hours: "20.00" }], selfId: "t-1" }),
    );
    assert.equal(result.ok, true);
  });

  it("distinguishes range, precision and format problems", () => {
    assert.deepEqual(codes(validateTimeEntry(entryCandidate({ hours: "0" }), entryContext())), ["HOURS_OUT_OF_RANGE"]);
    assert.deepEqual(codes(validateTimeEntry(entryCandidate({ hours: "24.01" }), entryContext())), ["HOURS_OUT_OF_RANGE"]);
    assert.deepEqual(codes(validateTimeEntry(entryCandidate({ hours: "7.555" }), entryContext())), ["HOURS_PRECISION"]);
    assert.deepEqual(codes(validateTimeEntry(entryCandidate({ hours: "eight" }), entryContext())), ["INVALID_HOURS"]);
    assert.equal(validateTimeEntry(entryCandidate({ hours: "24" }), entryContext()).ok, true);
  });

  it("checks description, billable, matter code and date", () => {
    const result = validateTimeEntry(
      entryCandidate({ description: "Call", billable: "maybe", matterCode: "BAD", date: "2024-07-02" }),
      entryContext(),
    );
    assert.deepEqual(codes(result), ["FUTURE_DATE", "DESCRIPTION_TOO_SHORT", "INVALID_BILLABLE", "INVALID_MATTER_CODE"]);
  });

  it("treats a soft-deleted employee as not found", () => {
    const result = validateTimeEntry(
      entryCandidate(),
      entryContext({ employee: { id: "emp-1", deletedAt: new Date("2024-06-01T00:00:00Z") } }),
    );
    assert.equal(result.ok, false);
    if (result.ok) return;
    assert.deepEqual(result.violations[0], {
      field: "employeeId",
      code: "EMPLOYEE_NOT_FOUND",
      kind: "not_found",
      message: "Employee emp-1 not found",
    });
  });
});
