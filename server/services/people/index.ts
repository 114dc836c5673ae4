/**
 * People module: entity rules, summaries and the errors they raise.
 */

// Errors
export {
  PeopleAnalyticsError,
  NotFoundError,
  InvalidRequestError,
  ViolationError,
  FatalImportError,
  IllegalJobTransitionError,
  violationStatus,
  type Violation,
  type ViolationCode,
  type ViolationKind,
} from "./errors";

// Validation
export {
  validateEmployee,
  validateTimeEntry,
  normalizeEmail,
  normalizeName,
  parseBillable,
  type ValidationResult,
  type EmployeeCandidate,
  type EmployeeValidationContext,
  type TimeEntryCandidate,
  type TimeEntryValidationContext,
  type NormalizedEmployee,
  type NormalizedTimeEntry,
} from "./validation";

// Aggregation
export {
  computeSummary,
  computeDailyTrend,
  createAggregationEngine,
  assertValidRange,
  type AggregationEngine,
  type SummaryScope,
  type DateRange,
  type Summary,
  type EmployeeSummary,
  type DepartmentSummary,
  type DailyTrend,
  type SummarySource,
} from "./aggregation";
