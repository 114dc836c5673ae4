/**
 * Validation Layer
 *
 * Pure rule checks for employees and time entries. Callers pass in a
 * snapshot of whatever persisted state a rule needs (departments, the active
 * employee holding an email, the hours already logged on a date) and get
 * back either a normalized record or the full list of violations.
 *
 * Nothing here throws for a business-rule violation and nothing here does
 * I/O; the HTTP services and the import pipeline decide how to surface the
 * result.
 */

import { z } from "zod";
import type { Employee } from "@shared/schema";
import { isIsoDate } from "@shared/dates";
import { formatHours, MAX_DAILY_HUNDREDTHS, MIN_ENTRY_HUNDREDTHS, parseHours, sumHundredths } from "@shared/hours";
import type { Violation, ViolationCode, ViolationKind } from "./errors";

// ============================================================================
// Types
// ============================================================================

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; violations: Violation[] };

export interface EmployeeCandidate {
  name: string;
  email: string;
  departmentId: string | null | undefined;
  hireDate: string;
  position?: string | null;
}

export interface EmployeeValidationContext {
  /** YYYY-MM-DD */
  today: string;
  departmentIds: ReadonlySet<string>;
  /** Active employee currently holding the candidate's email, if any */
  emailOwner?: Pick<Employee, "id" | "deletedAt"> | null;
  /** Id of the employee being updated; its own email never conflicts */
  selfId?: string;
}

export interface TimeEntryCandidate {
  employeeId: string;
  date: string;
  hours: string | number;
  description: string;
  billable: boolean | string;
  matterCode?: string | null;
}

export interface TimeEntryValidationContext {
  today: string;
  employee: Pick<Employee, "id" | "deletedAt"> | null | undefined;
  /** The employee's persisted entries on the candidate's date */
  sameDayEntries: ReadonlyArray<{ id: string; hours: string }>;
  /** Id of the entry being updated; excluded from the daily sum */
  selfId?: string;
}

export interface NormalizedEmployee {
  name: string;
  email: string;
  hireDate: string;
  departmentId: string;
  position: string | null;
}

export interface NormalizedTimeEntry {
  employeeId: string;
  date: string;
  /** two decimals, e.g. "7.50" */
  hours: string;
  description: string;
  billable: boolean;
  matterCode: string | null;
}

// ============================================================================
// Constants
// ============================================================================

export const NAME_MAX_LENGTH = 100;
export const EMAIL_MAX_LENGTH = 255;
export const POSITION_MAX_LENGTH = 100;
export const DESCRIPTION_MIN_LENGTH = 10;
export const DESCRIPTION_MAX_LENGTH = 500;

const TRUE_VALUES = ["true", "yes", "1"];
const FALSE_VALUES = ["false", "no", "0"];
const MATTER_CODE_PATTERN = /^[A-Z]{2,4}-\d{1,4}(-[A-Z]{1,3})?$/;

const emailSchema = z.string().email();

function violation(field: string, code: ViolationCode, message: string, kind: ViolationKind = "validation"): Violation {
  return { field, code, kind, message };
}

function checkDate(field: string, value: string, today: string, label: string, out: Violation[]): void {
  if (!value) {
    out.push(violation(field, "REQUIRED", `${label} is required`));
  } else if (!isIsoDate(value)) {
    out.push(violation(field, "INVALID_DATE", `${label} must be a valid date (YYYY-MM-DD)`));
  } else if (value > today) {
    out.push(violation(field, "FUTURE_DATE", `${label} cannot be in the future`));
  }
}

export function normalizeName(name: string): string {
  return name.trim().split(/\s+/).filter(Boolean).join(" ");
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function parseBillable(value: boolean | string): boolean | undefined {
  if (typeof value === "boolean") return value;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return undefined;
}

// ============================================================================
// Employee
// ============================================================================

export function validateEmployee(
  candidate: EmployeeCandidate,
  context: EmployeeValidationContext,
): ValidationResult<NormalizedEmployee> {
  const violations: Violation[] = [];

  const name = normalizeName(candidate.name);
  if (!name) {
    violations.push(violation("name", "REQUIRED", "Name is required"));
  } else if (name.split(" ").length < 2) {
    violations.push(violation("name", "INVALID_NAME", "Name must contain first and last name"));
  } else if (name.length > NAME_MAX_LENGTH) {
    violations.push(violation("name", "TOO_LONG", `Name cannot exceed ${NAME_MAX_LENGTH} characters`));
  }

  const email = normalizeEmail(candidate.email);
  if (!email) {
    violations.push(violation("email", "REQUIRED", "Email is required"));
  } else if (email.length > EMAIL_MAX_LENGTH) {
    violations.push(violation("email", "TOO_LONG", `Email cannot exceed ${EMAIL_MAX_LENGTH} characters`));
  } else if (!emailSchema.safeParse(email).success) {
    violations.push(violation("email", "INVALID_EMAIL", "Email address is not valid"));
  } else if (
    context.emailOwner &&
    context.emailOwner.deletedAt === null &&
    context.emailOwner.id !== context.selfId
  ) {
    violations.push(violation("email", "EMAIL_ALREADY_EXISTS", `Employee with email ${email} already exists`, "conflict"));
  }

  const hireDate = candidate.hireDate.trim();
  checkDate("hireDate", hireDate, context.today, "Hire date", violations);

  const departmentId = candidate.departmentId?.trim() ?? "";
  if (!departmentId) {
    violations.push(violation("departmentId", "REQUIRED", "Department is required"));
  } else if (!context.departmentIds.has(departmentId)) {
    violations.push(violation("departmentId", "DEPARTMENT_NOT_FOUND", `Department ${departmentId} not found`, "not_found"));
  }

  const position = candidate.position?.trim() || null;
  if (position && position.length > POSITION_MAX_LENGTH) {
    violations.push(violation("position", "TOO_LONG", `Position cannot exceed ${POSITION_MAX_LENGTH} characters`));
  }

  if (violations.length > 0) return { ok: false, violations };
  return { ok: true, value: { name, email, hireDate, departmentId, position } };
}

// ============================================================================
// Time Entry
// ============================================================================

export function validateTimeEntry(
  candidate: TimeEntryCandidate,
  context: TimeEntryValidationContext,
): ValidationResult<NormalizedTimeEntry> {
  const violations: Violation[] = [];

  if (!context.employee || context.employee.deletedAt !== null) {
    violations.push(
      violation("employeeId", "EMPLOYEE_NOT_FOUND", `Employee ${candidate.employeeId} not found`, "not_found"),
    );
  }

  const date = candidate.date.trim();
  checkDate("date", date, context.today, "Date", violations);

  let hundredths: number | undefined;
  const rawHours = typeof candidate.hours === "string" ? candidate.hours.trim() : candidate.hours;
  if (rawHours === "") {
    violations.push(violation("hours", "REQUIRED", "Hours is required"));
  } else {
    const parsed = parseHours(rawHours);
    if (!parsed.ok) {
      violations.push(
        parsed.reason === "precision"
          ? violation("hours", "HOURS_PRECISION", "Hours cannot have more than 2 decimal places")
          : violation("hours", "INVALID_HOURS", "Hours must be a decimal number"),
      );
    } else if (parsed.hundredths < MIN_ENTRY_HUNDREDTHS || parsed.hundredths > MAX_DAILY_HUNDREDTHS) {
      violations.push(violation("hours", "HOURS_OUT_OF_RANGE", "Hours must be between 0.01 and 24.00"));
    } else {
      hundredths = parsed.hundredths;
    }
  }

  const description = candidate.description.trim();
  if (description.length < DESCRIPTION_MIN_LENGTH) {
    violations.push(
      violation("description", "DESCRIPTION_TOO_SHORT", `Description must be at least ${DESCRIPTION_MIN_LENGTH} characters`),
    );
  } else if (description.length > DESCRIPTION_MAX_LENGTH) {
    violations.push(violation("description", "TOO_LONG", `Description cannot exceed ${DESCRIPTION_MAX_LENGTH} characters`));
  }

  const billable = parseBillable(candidate.billable);
  if (billable === undefined) {
    violations.push(violation("billable", "INVALID_BILLABLE", "Billable must be true/false, yes/no, or 1/0"));
  }

  const matterCode = candidate.matterCode?.trim().toUpperCase() || null;
  if (matterCode && !MATTER_CODE_PATTERN.test(matterCode)) {
    violations.push(violation("matterCode", "INVALID_MATTER_CODE", "Matter code must follow format ABC-123 or ABC-123-DEF"));
  }

  if (hundredths !== undefined) {
    const logged = sumHundredths(
      context.sameDayEntries.filter((entry) => entry.id !== context.selfId).map((entry) => entry.hours),
    );
    if (logged + hundredths > MAX_DAILY_HUNDREDTHS) {
      violations.push(
        violation(
          "hours",
          "DAILY_HOURS_EXCEEDED",
          `Daily total would be ${formatHours(logged + hundredths)} hours (${formatHours(logged)} already logged); the limit is 24.00`,
        ),
      );
    }
  }

  if (violations.length > 0 || hundredths === undefined || billable === undefined) {
    return { ok: false, violations };
  }

  return {
    ok: true,
    value: {
      employeeId: candidate.employeeId,
      date,
      hours: formatHours(hundredths),
      description,
      billable,
      matterCode,
    },
  };
}
