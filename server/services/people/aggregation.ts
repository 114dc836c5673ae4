/**
 * Aggregation Engine
 *
 * Hours, billable hours and utilization for one employee, one department or
 * the whole firm over an inclusive date range.
 *
 * `computeSummary` is a pure function over a loaded snapshot. All sums are
 * integer hundredths and every list is fully ordered, so the same snapshot
 * and arguments always produce a deep-equal result.
 */

import type { Department, Employee, TimeEntry } from "@shared/schema";
import { isIsoDate } from "@shared/dates";
import { hundredthsToHours, ratio, toHundredths } from "@shared/hours";
import { InvalidRequestError, NotFoundError } from "./errors";

// ============================================================================
// Types
// ============================================================================

export type SummaryScope =
  | { kind: "employee"; employeeId: string }
  | { kind: "department"; departmentId: string }
  | { kind: "firm" };

export interface DateRange {
  /** inclusive, YYYY-MM-DD */
  start: string;
  /** inclusive, YYYY-MM-DD */
  end: string;
}

export interface HoursTotals {
  totalHours: number;
  billableHours: number;
  nonBillableHours: number;
  /** billable / total in [0, 1]; 0 when there are no hours */
  utilizationRate: number;
  entryCount: number;
}

export interface EmployeeSummary extends HoursTotals {
  employeeId: string;
  name: string;
  email: string;
  departmentId: string | null;
  departmentName: string | null;
  deleted: boolean;
}

export interface DepartmentSummary extends HoursTotals {
  departmentId: string;
  name: string;
  employeeCount: number;
}

export interface UnassignedSummary {
  employeeCount: number;
  totalHours: number;
  billableHours: number;
}

export interface Summary extends HoursTotals {
  scope: SummaryScope;
  range: DateRange;
  includeDeletedEmployees: boolean;
  employees: EmployeeSummary[];
  departments: DepartmentSummary[];
  /** Employees without a department; excluded from `departments` */
  unassigned: UnassignedSummary;
}

export interface SummarySnapshot {
  departments: readonly Department[];
  /** Every employee, soft-deleted ones included */
  employees: readonly Employee[];
  /** Entries within the range */
  entries: readonly Pick<TimeEntry, "employeeId" | "date" | "hours" | "billable">[];
}

export interface SummaryOptions {
  includeDeletedEmployees: boolean;
}

export interface DailyTrendPoint extends HoursTotals {
  date: string;
}

export interface DailyTrend {
  range: DateRange;
  days: DailyTrendPoint[];
  averages: {
    dailyTotalHours: number;
    dailyBillableHours: number;
    periodUtilizationRate: number;
  };
}

/** Read-only slice of the persistence collaborator the engine needs. */
export interface SummarySource {
  listDepartments(): Promise<Department[]>;
  listEmployees(options: { includeDeleted: boolean }): Promise<Employee[]>;
  getTimeEntriesInRange(start: string, end: string): Promise<TimeEntry[]>;
}

// ============================================================================
// Helpers
// ============================================================================

interface Accumulator {
  total: number;
  billable: number;
  count: number;
}

function emptyAccumulator(): Accumulator {
  return { total: 0, billable: 0, count: 0 };
}

function addTo(target: Accumulator, source: Accumulator): void {
  target.total += source.total;
  target.billable += source.billable;
  target.count += source.count;
}

function toTotals(acc: Accumulator): HoursTotals {
  return {
    totalHours: hundredthsToHours(acc.total),
    billableHours: hundredthsToHours(acc.billable),
    nonBillableHours: hundredthsToHours(acc.total - acc.billable),
    utilizationRate: ratio(acc.billable, acc.total),
    entryCount: acc.count,
  };
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function assertValidRange(range: DateRange): void {
  if (!isIsoDate(range.start) || !isIsoDate(range.end)) {
    throw new InvalidRequestError("start and end must be valid dates (YYYY-MM-DD)");
  }
  if (range.start > range.end) {
    throw new InvalidRequestError("start must be on or before end");
  }
}

// ============================================================================
// Summary
// ============================================================================

export function computeSummary(
  snapshot: SummarySnapshot,
  scope: SummaryScope,
  range: DateRange,
  options: SummaryOptions,
): Summary {
  assertValidRange(range);

  const departmentsById = new Map(snapshot.departments.map((d) => [d.id, d]));
  const employeesById = new Map(snapshot.employees.map((e) => [e.id, e]));

  if (scope.kind === "employee" && !employeesById.has(scope.employeeId)) {
    throw new NotFoundError("Employee", scope.employeeId);
  }
  if (scope.kind === "department" && !departmentsById.has(scope.departmentId)) {
    throw new NotFoundError("Department", scope.departmentId);
  }

  const inScope = (employee: Employee): boolean => {
    switch (scope.kind) {
      case "employee": return employee.id === scope.employeeId;
      case "department": return employee.departmentId === scope.departmentId;
      case "firm": return true;
    }
  };

  const perEmployee = new Map<string, Accumulator>();
  for (const entry of snapshot.entries) {
    if (entry.date < range.start || entry.date > range.end) continue;
    const employee = employeesById.get(entry.employeeId);
    if (!employee || !inScope(employee)) continue;
    if (employee.deletedAt !== null && !options.includeDeletedEmployees) continue;

    const acc = perEmployee.get(employee.id) ?? emptyAccumulator();
    const hundredths = toHundredths(entry.hours);
    acc.total += hundredths;
    if (entry.billable) acc.billable += hundredths;
    acc.count += 1;
    perEmployee.set(employee.id, acc);
  }

  // active employees always appear; deleted ones only with counted hours
  const listed = snapshot.employees.filter(
    (e) => inScope(e) && (e.deletedAt === null || perEmployee.has(e.id) || scope.kind === "employee"),
  );

  const departmentName = (employee: Employee): string | null =>
    employee.departmentId ? departmentsById.get(employee.departmentId)?.name ?? null : null;

  const employeeRows: EmployeeSummary[] = listed
    .map((employee) => ({
      employeeId: employee.id,
      name: employee.name,
      email: employee.email,
      departmentId: departmentName(employee) === null ? null : employee.departmentId,
      departmentName: departmentName(employee),
      deleted: employee.deletedAt !== null,
      ...toTotals(perEmployee.get(employee.id) ?? emptyAccumulator()),
    }))
    .sort((a, b) => {
      if (a.departmentName !== b.departmentName) {
        if (a.departmentName === null) return 1;
        if (b.departmentName === null) return -1;
        return compareText(a.departmentName, b.departmentName);
      }
      return compareText(a.name, b.name) || compareText(a.employeeId, b.employeeId);
    });

  const overall = emptyAccumulator();
  const unassigned = { employeeCount: 0, acc: emptyAccumulator() };
  const perDepartment = new Map<string, { acc: Accumulator; employeeCount: number }>();

  for (const department of snapshot.departments) {
    const relevant =
      scope.kind === "firm" ||
      (scope.kind === "department" && department.id === scope.departmentId);
    if (relevant) perDepartment.set(department.id, { acc: emptyAccumulator(), employeeCount: 0 });
  }

  for (const row of employeeRows) {
    const acc = perEmployee.get(row.employeeId) ?? emptyAccumulator();
    addTo(overall, acc);

    if (row.departmentId === null) {
      unassigned.employeeCount += 1;
      addTo(unassigned.acc, acc);
      continue;
    }
    const bucket = perDepartment.get(row.departmentId) ?? { acc: emptyAccumulator(), employeeCount: 0 };
    addTo(bucket.acc, acc);
    bucket.employeeCount += 1;
    perDepartment.set(row.departmentId, bucket);
  }

  const departmentRows: DepartmentSummary[] = Array.from(perDepartment.entries())
    .map(([departmentId, bucket]) => ({
      departmentId,
      name: departmentsById.get(departmentId)?.name ?? "",
      employeeCount: bucket.employeeCount,
      ...toTotals(bucket.acc),
    }))
    .sort((a, b) => compareText(a.name, b.name) || compareText(a.departmentId, b.departmentId));

  return {
    scope,
    range: { start: range.start, end: range.end },
    includeDeletedEmployees: options.includeDeletedEmployees,
    ...toTotals(overall),
    employees: employeeRows,
    departments: departmentRows,
    unassigned: {
      employeeCount: unassigned.employeeCount,
      totalHours: hundredthsToHours(unassigned.acc.total),
      billableHours: hundredthsToHours(unassigned.acc.billable),
    },
  };
}

// ============================================================================
// Daily trend
// ============================================================================

export function computeDailyTrend(
  snapshot: Pick<SummarySnapshot, "employees" | "entries">,
  range: DateRange,
  options: SummaryOptions,
): DailyTrend {
  assertValidRange(range);

  const deleted = new Set(snapshot.employees.filter((e) => e.deletedAt !== null).map((e) => e.id));
  const perDay = new Map<string, Accumulator>();
  const period = emptyAccumulator();

  for (const entry of snapshot.entries) {
    if (entry.date < range.start || entry.date > range.end) continue;
    if (!options.includeDeletedEmployees && deleted.has(entry.employeeId)) continue;

    const acc = perDay.get(entry.date) ?? emptyAccumulator();
    const hundredths = toHundredths(entry.hours);
    acc.total += hundredths;
    if (entry.billable) acc.billable += hundredths;
    acc.count += 1;
    perDay.set(entry.date, acc);
  }

  const days = Array.from(perDay.entries())
    .sort(([a], [b]) => compareText(a, b))
    .map(([date, acc]) => {
      addTo(period, acc);
      return { date, ...toTotals(acc) };
    });

  const dayCount = Math.max(days.length, 1);
  return {
    range: { start: range.start, end: range.end },
    days,
    averages: {
      dailyTotalHours: ratio(period.total, dayCount * 100, 2),
      dailyBillableHours: ratio(period.billable, dayCount * 100, 2),
      periodUtilizationRate: ratio(period.billable, period.total),
    },
  };
}

// ============================================================================
// Engine
// ============================================================================

export interface AggregationEngine {
  summarize(scope: SummaryScope, range: DateRange, options?: Partial<SummaryOptions>): Promise<Summary>;
  dailyTrend(range: DateRange, options?: Partial<SummaryOptions>): Promise<DailyTrend>;
}

/**
 * Loads the snapshot from the persistence collaborator and delegates to the
 * pure functions above. Nothing is written.
 */
export function createAggregationEngine(
  source: SummarySource,
  defaults: SummaryOptions,
): AggregationEngine {
  async function loadSnapshot(range: DateRange): Promise<SummarySnapshot> {
    assertValidRange(range);
    const [departments, employees, entries] = await Promise.all([
      source.listDepartments(),
      source.listEmployees({ includeDeleted: true }),
      source.getTimeEntriesInRange(range.start, range.end),
    ]);
    return { departments, employees, entries };
  }

  return {
    async summarize(scope, range, options = {}) {
      const snapshot = await loadSnapshot(range);
      return computeSummary(snapshot, scope, range, { ...defaults, ...options });
    },

    async dailyTrend(range, options = {}) {
      const snapshot = await loadSnapshot(range);
      return computeDailyTrend(snapshot, range, { ...defaults, ...options });
    },
  };
}
