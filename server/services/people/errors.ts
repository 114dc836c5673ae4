/**
 * Domain errors.
 *
 * Business-rule violations are NOT thrown: the validation layer returns them
 * as `Violation[]`. The classes below cover the cases that do cross a
 * component boundary as exceptions.
 */

export type ViolationKind = "validation" | "conflict" | "not_found";

export type ViolationCode =
  | "REQUIRED"
  | "INVALID_NAME"
  | "INVALID_EMAIL"
  | "INVALID_DATE"
  | "FUTURE_DATE"
  | "INVALID_HOURS"
  | "HOURS_OUT_OF_RANGE"
  | "HOURS_PRECISION"
  | "DAILY_HOURS_EXCEEDED"
  | "DESCRIPTION_TOO_SHORT"
  | "TOO_LONG"
  | "INVALID_BILLABLE"
  | "INVALID_MATTER_CODE"
  | "EMAIL_ALREADY_EXISTS"
  | "DUPLICATE_IN_BATCH"
  | "DEPARTMENT_NOT_FOUND"
  | "DEPARTMENT_ALREADY_EXISTS"
  | "EMPLOYEE_NOT_FOUND";

export interface Violation {
  field: string;
  code: ViolationCode;
  kind: ViolationKind;
  message: string;
}

export class PeopleAnalyticsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PeopleAnalyticsError";
    Object.setPrototypeOf(this, PeopleAnalyticsError.prototype);
  }
}

/** A referenced record (employee, department, time entry, job) does not exist. */
export class NotFoundError extends PeopleAnalyticsError {
  constructor(readonly resource: string, readonly id: string) {
    super(`${resource} ${id} not found`);
    this.name = "NotFoundError";
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** Malformed request parameters outside the entity rules (date ranges, scopes). */
export class InvalidRequestError extends PeopleAnalyticsError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

/**
 * Carries violations through the HTTP services so the error middleware can
 * render them. The import pipeline never throws this; it records row errors.
 */
export class ViolationError extends PeopleAnalyticsError {
  constructor(readonly violations: Violation[]) {
    super(violations.map((v) => v.message).join("; "));
    this.name = "ViolationError";
    Object.setPrototypeOf(this, ViolationError.prototype);
  }

  /** conflict > not_found > validation */
  get kind(): ViolationKind {
    if (this.violations.some((v) => v.kind === "conflict")) return "conflict";
    if (this.violations.some((v) => v.kind === "not_found")) return "not_found";
    return "validation";
  }
}

/** File-level defect: nothing in the file can be processed. */
export class FatalImportError extends PeopleAnalyticsError {
  constructor(message: string) {
    super(message);
    this.name = "FatalImportError";
    Object.setPrototypeOf(this, FatalImportError.prototype);
  }
}

export class IllegalJobTransitionError extends PeopleAnalyticsError {
  constructor(readonly jobId: string, readonly from: string, readonly to: string) {
    super(`Import job ${jobId} cannot move from ${from} to ${to}`);
    this.name = "IllegalJobTransitionError";
    Object.setPrototypeOf(this, IllegalJobTransitionError.prototype);
  }
}

export function violationStatus(kind: ViolationKind): number {
  switch (kind) {
    case "conflict": return 409;
    case "not_found": return 404;
    default: return 400;
  }
}
